import type { Command } from 'commander';
import type pino from 'pino';
import { ConfigManager } from '../../core/config.js';
import { createLogger } from '../../core/logger.js';
import type { SchedulerConfig } from '../../core/types.js';

export type GlobalOptions = {
  verbose?: boolean;
  config?: string;
};

/**
 * Load configuration and build a logger from the root program's options.
 */
export function resolveGlobalOptions(command: Command): { config: SchedulerConfig; logger: pino.Logger } {
  const options = command.optsWithGlobals<GlobalOptions>();
  const config = new ConfigManager({ projectDir: options.config }).load(
    options.verbose ? { logging: { verbose: true } } : undefined,
  );
  const logger = createLogger('clustersched', config.logging.verbose, config.logging.level);
  return { config, logger };
}
