/**
 * Cluster Types — simulated compute-cluster scheduling
 *
 * Priority tiers, task and worker lifecycles, construction inputs,
 * display records, and the event map emitted by the scheduler.
 */

import type { Task } from './task.js';
import type { WorkerNode } from './worker-node.js';

// ═══════════════════════════════════════════════════════════════
// ENUMERATIONS
// ═══════════════════════════════════════════════════════════════

export type Priority = 'high' | 'medium' | 'low';

/** Dequeue order, highest tier first */
export const PRIORITY_ORDER: readonly Priority[] = ['high', 'medium', 'low'];

export type TaskStatus = 'queued' | 'assigned' | 'completed' | 'cancelled' | 'failed';

export const TERMINAL_STATUSES: readonly TaskStatus[] = ['completed', 'cancelled', 'failed'];

export type WorkerStatus = 'active' | 'inactive';

// ═══════════════════════════════════════════════════════════════
// CONSTRUCTION INPUTS
// ═══════════════════════════════════════════════════════════════

export interface TaskSpec {
  id: string;
  cpu: number;
  memory: number;
  /** Estimated execution time in simulated time units */
  executionTime: number;
  priority?: Priority;
}

export interface WorkerSpec {
  id: string;
  cpu: number;
  memory: number;
  speed: number;
}

export interface AutoScaleProfile {
  idPrefix: string;
  cpu: number;
  memory: number;
  speed: number;
}

// ═══════════════════════════════════════════════════════════════
// SELECTION
// ═══════════════════════════════════════════════════════════════

export type WorkerCandidate =
  | { found: true; worker: WorkerNode }
  | { found: false };

// ═══════════════════════════════════════════════════════════════
// DISPLAY RECORDS
// ═══════════════════════════════════════════════════════════════

export interface TaskInfo {
  id: string;
  status: TaskStatus;
  priority: Priority;
  /** Current worker while assigned, the worker that ran it once completed */
  assignedTo: string | null;
  retryCount: number;
  startTime: number | null;
}

export interface WorkerInfo {
  id: string;
  cpu: number;
  memory: number;
  speed: number;
  status: WorkerStatus;
  usedCpu: number;
  usedMemory: number;
  runningTasks: string[];
}

export interface WorkerRegistryStats {
  total: number;
  active: number;
  inactive: number;
  totalCpu: number;
  usedCpu: number;
  totalMemory: number;
  usedMemory: number;
}

export interface ClusterStats {
  currentTime: number;
  queued: number;
  tasks: Record<TaskStatus, number>;
  workers: WorkerRegistryStats;
}

// ═══════════════════════════════════════════════════════════════
// EVENTS
// ═══════════════════════════════════════════════════════════════

export interface SchedulerEvents {
  'task:submitted': { task: Task; time: number };
  'task:assigned': { task: Task; workerId: string; time: number };
  'task:queued': { task: Task; time: number };
  'task:completed': { task: Task; workerId: string; time: number };
  'task:requeued': { task: Task; reason: 'worker-failure' | 'timeout'; time: number };
  'task:timed-out': { task: Task; workerId: string; elapsed: number; time: number };
  'task:cancelled': { task: Task; previousStatus: TaskStatus; time: number };
  'worker:registered': { worker: WorkerNode; time: number };
  'worker:failed': { worker: WorkerNode; affected: Task[]; time: number };
  'worker:reactivated': { worker: WorkerNode; time: number };
  'worker:scaled': { worker: WorkerNode; queued: number; time: number };
}
