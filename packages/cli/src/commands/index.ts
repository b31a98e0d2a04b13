/**
 * commands/index.ts — Commander program factory
 *
 * Imported by:
 *   src/bin/stratum.ts  (the `stratum` command)
 *   test/cli.test.ts    (a fresh program per test)
 */

import { Command } from 'commander';
import { checkCommand } from './check.js';
import { graphCommand } from './graph.js';
import { logCommand } from './log.js';
import { queryCommand } from './query.js';
import { showCommand } from './show.js';

export function buildProgram(): Command {
  return new Command('stratum')
    .description(
      'Stratum — layered policy resolution for coding-agent rule documents.\n' +
      'Resolves which documents apply to a file and how their directives combine.',
    )
    .version('0.1.0')
    .option('-p, --policies <dir>', 'Policy directory (default: $STRATUM_POLICY_DIR, config file, ./policies)')
    .option('--home <dir>', 'State and log directory (default: $STRATUM_HOME, config file, ~/.stratum)')
    .option('--json', 'Output as JSON')
    .option('--save', 'Remember the given --policies and --home in the user config file')
    .addCommand(queryCommand())
    .addCommand(graphCommand())
    .addCommand(showCommand())
    .addCommand(checkCommand())
    .addCommand(logCommand());
}
