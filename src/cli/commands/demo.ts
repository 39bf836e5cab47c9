/**
 * `clustersched demo` — replay the bundled demonstration scenarios.
 * `demo`        — run every scenario in order
 * `demo <name>` — run a single scenario
 */

import { Command } from 'commander';
import { ScenarioError } from '../../core/errors.js';
import { formatResult } from '../format.js';
import { listBundledScenarios, loadScenarioFile, runScenario, type ScenarioResult } from '../scenario.js';
import { resolveGlobalOptions } from './shared.js';

export function createDemoCommand(): Command {
  const cmd = new Command('demo');

  cmd
    .description('Run the bundled demonstration scenarios')
    .argument('[name]', 'Scenario to run (see `clustersched scenarios`)')
    .option('--json', 'Output as JSON')
    .action((name: string | undefined, options: { json?: boolean }, command: Command) => {
      const { config, logger } = resolveGlobalOptions(command);
      const bundled = listBundledScenarios();

      let paths: string[];
      if (name) {
        const path = bundled.get(name);
        if (!path) {
          throw new ScenarioError(`Unknown scenario "${name}". Available: ${[...bundled.keys()].join(', ')}`);
        }
        paths = [path];
      } else {
        paths = [...bundled.values()];
      }

      const results: ScenarioResult[] = paths.map((path) =>
        runScenario(loadScenarioFile(path), { config, logger }),
      );

      if (options.json) {
        console.log(JSON.stringify(results, null, 2));
        return;
      }

      for (const result of results) {
        console.log();
        console.log(formatResult(result));
      }
      console.log();
    });

  return cmd;
}
