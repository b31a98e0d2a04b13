/**
 * stratum check — Load and build the policy directory
 *
 * Reports every SchemaError detail or the exact cycle path on failure, and
 * whether the content changed since the last recorded snapshot on success.
 * Exit code 1 on failure.
 */

import { Command } from 'commander';
import { FileStateIO, readSnapshotRecord } from '@stratum/runtime-host';
import { print, printJson } from '../output/print.js';
import { t } from '../output/theme.js';
import { configFor, globalOptions, openHost, runCommand } from './shared.js';

export function checkCommand(): Command {
  return new Command('check')
    .description('Validate every document and the relation graph')
    .action((_options: unknown, command: Command) => {
      const globals = globalOptions(command);
      runCommand(globals, () => {
        const config = configFor(globals);
        const previous = readSnapshotRecord(new FileStateIO(config.home));
        const { snapshot } = openHost(config);
        const changed = previous === null || previous.hash !== snapshot.hash;

        if (globals.json === true) {
          printJson({
            ok: true,
            policyDir: config.policyDir,
            documents: snapshot.store.size,
            tiers: snapshot.graph.tiers().length,
            hash: snapshot.hash,
            changed,
          });
          return;
        }
        print(
          t.green('✓ ') +
          t.white(`${snapshot.store.size} documents`) + t.dim(', ') +
          t.white(`${snapshot.graph.tiers().length} tiers`) + '  ' +
          t.dim('snapshot ') + t.blueDim(snapshot.hash.slice(0, 12)) +
          (changed ? '  ' + t.amber('changed') : ''),
        );
      });
    });
}
