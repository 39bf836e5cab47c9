import { Command } from 'commander';
import { listBundledScenarios, loadScenarioFile } from '../scenario.js';

export function createScenariosCommand(): Command {
  const cmd = new Command('scenarios');

  cmd
    .description('List the bundled demonstration scenarios')
    .action(() => {
      console.log();
      for (const [name, path] of listBundledScenarios()) {
        const scenario = loadScenarioFile(path);
        console.log(`  ${name.padEnd(28)} ${scenario.description ?? scenario.name}`);
      }
      console.log();
    });

  return cmd;
}
