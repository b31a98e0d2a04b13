/**
 * @stratum/cli
 *
 * The `stratum` command-line interface.
 *
 * Usage:
 *   stratum query <identifier> --language <lang> [--signal <s...>] [--include <name...>]
 *   stratum graph
 *   stratum show <name>
 *   stratum check
 *   stratum log [--limit <n>] [--outcome <outcome>]
 *
 * Global options: --policies <dir>, --home <dir>, --json
 */

export { buildProgram } from './commands/index.js';
