/**
 * clustersched — simulated compute-cluster task scheduler
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { ClusterScheduler, ConfigManager } from 'clustersched';
 *
 * const config = new ConfigManager().load();
 * const cluster = new ClusterScheduler({ config });
 * cluster.registerWorker({ id: 'W1', cpu: 4, memory: 16, speed: 5 });
 * cluster.submitTask({ id: 'T1', cpu: 2, memory: 8, executionTime: 10, priority: 'high' });
 * cluster.waitFor(10);
 * ```
 */

// Core
export { EventBus } from './core/events.js';
export { ConfigManager, type ConfigManagerOptions } from './core/config.js';
export { createLogger, getLogger, setLogger } from './core/logger.js';
export {
  SchedulerError,
  InvalidArgumentError,
  DuplicateEntityError,
  NotFoundError,
  ConfigError,
  ScenarioError,
  type EntityKind,
} from './core/errors.js';
export {
  SchedulerConfigSchema,
  type SchedulerConfig,
  type SchedulerConfigInput,
} from './core/types.js';

// Cluster
export * from './cluster/index.js';

// Scenarios
export {
  ScenarioSchema,
  StepSchema,
  parseScenario,
  loadScenarioFile,
  listBundledScenarios,
  findScenarioDir,
  runScenario,
  type Scenario,
  type ScenarioStep,
  type ScenarioSnapshot,
  type ScenarioResult,
  type RunScenarioOptions,
} from './cli/scenario.js';

// CLI
export { createCLI, main } from './cli/index.js';

export { VERSION, NAME } from './version.js';
