/**
 * `clustersched run <file>` — replay a scenario file.
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { formatResult } from '../format.js';
import { loadScenarioFile, runScenario } from '../scenario.js';
import { resolveGlobalOptions } from './shared.js';

export function createRunCommand(): Command {
  const cmd = new Command('run');

  cmd
    .description('Run a scenario file against a fresh cluster')
    .argument('<file>', 'Scenario YAML file')
    .option('--json', 'Output as JSON')
    .action((file: string, options: { json?: boolean }, command: Command) => {
      const { config, logger } = resolveGlobalOptions(command);
      const result = runScenario(loadScenarioFile(resolve(file)), { config, logger });

      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
        return;
      }

      console.log();
      console.log(formatResult(result));
      console.log();
    });

  return cmd;
}
