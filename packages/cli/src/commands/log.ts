/**
 * stratum log — Recent resolutions from the resolution log
 *
 * Reads `<home>/logs/resolutions.jsonl` with dedupe-on-read and prints the
 * most recent entries, oldest first.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { ResolutionOutcome } from '@stratum/kernel';
import { FileStateIO, RESOLUTION_LOG_FILE, readLog } from '@stratum/runtime-host';
import { print, printJson } from '../output/print.js';
import { renderLogEvents } from '../output/render.js';
import { t } from '../output/theme.js';
import { configFor, globalOptions, runCommand } from './shared.js';

interface LogOptions {
  readonly limit: number;
  readonly outcome?: string;
}

function parseLimit(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return n;
}

export function logCommand(): Command {
  return new Command('log')
    .description('Show recent resolutions')
    .option('-n, --limit <n>', 'Maximum number of entries', parseLimit, 20)
    .addOption(
      new Option('--outcome <outcome>', 'Only entries with this outcome').choices(Object.values(ResolutionOutcome)),
    )
    .action((options: LogOptions, command: Command) => {
      const globals = globalOptions(command);
      runCommand(globals, () => {
        const { home } = configFor(globals);
        const { events, stats } = readLog(new FileStateIO(home).readLogRaw(RESOLUTION_LOG_FILE));
        const selected = events
          .filter((e) => options.outcome === undefined || e.fields['outcome'] === options.outcome)
          .slice(-options.limit);

        if (globals.json === true) {
          printJson({ entries: selected.map((e) => e.fields), stats });
          return;
        }
        print(renderLogEvents(selected));
        if (stats.parseErrors > 0 || stats.partialTrailingLine) {
          print(t.amber(`  ${stats.parseErrors} malformed line(s)${stats.partialTrailingLine ? ', partial trailing line' : ''} skipped`));
        }
      });
    });
}
