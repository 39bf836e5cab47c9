/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { createDemoCommand } from './commands/demo.js';
import { createRunCommand } from './commands/run.js';
import { createScenariosCommand } from './commands/scenarios.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Simulated compute-cluster task scheduler')
    .option('-v, --verbose', 'Pretty-print scheduler logs to the terminal')
    .option('-c, --config <dir>', 'Directory containing .clustersched.yaml');

  program.addCommand(createDemoCommand());
  program.addCommand(createRunCommand());
  program.addCommand(createScenariosCommand());

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`\n❌ ${error.message}\n`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    }
    process.exitCode = 1;
  }
}
