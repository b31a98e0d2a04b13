/**
 * stratum query — Resolve the effective ruleset for a context
 *
 * Prints the composed directives by topic, unresolved conflicts, and the
 * overrides that shaped the result. `--json` prints the wire form.
 */

import { Command } from 'commander';
import { createContext, serializeResult } from '@stratum/kernel';
import { print, printJson } from '../output/print.js';
import { renderResult } from '../output/render.js';
import { configFor, globalOptions, openHost, reportFailure, runCommand } from './shared.js';

interface QueryOptions {
  readonly language: string;
  readonly signal?: ReadonlyArray<string>;
  readonly include?: ReadonlyArray<string>;
}

export function queryCommand(): Command {
  return new Command('query')
    .description('Resolve the effective ruleset for a file or component')
    .argument('<identifier>', 'File or component identifier, matched against appliesTo.paths')
    .requiredOption('-l, --language <language>', 'Language or runtime of the identifier')
    .option('-s, --signal <signals...>', 'Detected framework signals')
    .option('-i, --include <names...>', 'Documents to apply regardless of their applicability')
    .action((identifier: string, options: QueryOptions, command: Command) => {
      const globals = globalOptions(command);
      runCommand(globals, () => {
        const host = openHost(configFor(globals));
        const outcome = host.query(createContext({
          identifier,
          language: options.language,
          frameworkSignals: options.signal,
          include: options.include,
        }));

        if (!outcome.ok) {
          reportFailure(globals, outcome.error);
          return;
        }
        if (globals.json === true) {
          printJson(serializeResult(outcome.result));
          return;
        }
        print(renderResult(outcome.result));
      });
    });
}
