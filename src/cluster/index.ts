/**
 * Cluster Module — simulated compute-cluster scheduling
 *
 * Fastest-worker-first task placement with a three-tier holding queue,
 * completion sweeps on a simulated clock, failure recovery, timeout retry,
 * cancellation and reactive auto-scaling.
 *
 * @example
 * ```typescript
 * import { ClusterScheduler } from 'clustersched';
 *
 * const cluster = new ClusterScheduler();
 * cluster.registerWorker({ id: 'W1', cpu: 4, memory: 16, speed: 5 });
 * cluster.registerWorker({ id: 'W2', cpu: 8, memory: 32, speed: 10 });
 *
 * cluster.submitTask({ id: 'T1', cpu: 2, memory: 8, executionTime: 10 });
 * cluster.waitFor(10);
 * ```
 */

export { ClusterScheduler, TaskInputSchema, WorkerInputSchema } from './cluster-scheduler.js';
export type { ClusterSchedulerOptions, TaskInput, WorkerInput } from './cluster-scheduler.js';
export { SchedulerService } from './scheduler-service.js';
export type { SchedulerServiceOptions, TimeoutClock } from './scheduler-service.js';
export { TaskQueue } from './priority-queue.js';
export { TaskRegistry } from './task-registry.js';
export { WorkerRegistry, DEFAULT_AUTO_SCALE_PROFILE } from './worker-registry.js';
export { WorkerNode } from './worker-node.js';
export { Task } from './task.js';
export { PRIORITY_ORDER, TERMINAL_STATUSES } from './types.js';
export type {
  Priority,
  TaskStatus,
  WorkerStatus,
  TaskSpec,
  WorkerSpec,
  AutoScaleProfile,
  WorkerCandidate,
  TaskInfo,
  WorkerInfo,
  WorkerRegistryStats,
  ClusterStats,
  SchedulerEvents,
} from './types.js';
