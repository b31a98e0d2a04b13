/**
 * stratum show — Print one document as loaded
 */

import { Command } from 'commander';
import { print, printJson } from '../output/print.js';
import { renderDocument } from '../output/render.js';
import { configFor, globalOptions, openHost, runCommand } from './shared.js';

export function showCommand(): Command {
  return new Command('show')
    .description("Show one document's relations, applicability and directives")
    .argument('<name>', 'Document name')
    .action((name: string, _options: unknown, command: Command) => {
      const globals = globalOptions(command);
      runCommand(globals, () => {
        const { snapshot } = openHost(configFor(globals));
        const document = snapshot.store.get(name);
        const tier = snapshot.graph.tierOf(name);

        if (globals.json === true) {
          printJson({ ...document, tier });
          return;
        }
        print(renderDocument(document, tier));
      });
    });
}
