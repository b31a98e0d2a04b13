/**
 * stratum graph — Show the precedence graph, grouped by tier
 */

import { Command } from 'commander';
import { print, printJson } from '../output/print.js';
import { renderGraph } from '../output/render.js';
import { configFor, globalOptions, openHost, runCommand } from './shared.js';

export function graphCommand(): Command {
  return new Command('graph')
    .description('Show policy documents grouped by precedence tier')
    .action((_options: unknown, command: Command) => {
      const globals = globalOptions(command);
      runCommand(globals, () => {
        const { snapshot } = openHost(configFor(globals));

        if (globals.json === true) {
          printJson({
            hash: snapshot.hash,
            tiers: snapshot.graph.tiers().map((documents) =>
              documents.map((d) => ({
                name: d.name,
                relations: d.relations,
                dependents: snapshot.graph.dependentsOf(d.name),
              })),
            ),
          });
          return;
        }
        print(renderGraph(snapshot));
      });
    });
}
