/**
 * Task — a unit of work with fixed resource requirements.
 *
 * Requirements and priority are fixed at construction. Status, assignment
 * and start time only move through the transition methods below, which the
 * scheduling service drives. Outside the `assigned` state a task never
 * carries a worker or a start time.
 */

import type { Priority, TaskInfo, TaskSpec, TaskStatus } from './types.js';
import { TERMINAL_STATUSES } from './types.js';
import { requireId, requirePositiveInt } from './validate.js';

export class Task {
  readonly id: string;
  readonly cpu: number;
  readonly memory: number;
  readonly executionTime: number;
  readonly priority: Priority;

  private _status: TaskStatus = 'queued';
  private _assignedTo: string | null = null;
  private _startTime: number | undefined = undefined;
  private _retryCount = 0;
  private _lastWorkerId: string | null = null;

  constructor(spec: TaskSpec) {
    this.id = requireId(spec.id, 'Task ID');
    this.cpu = requirePositiveInt(spec.cpu, 'CPU requirement');
    this.memory = requirePositiveInt(spec.memory, 'Memory requirement');
    this.executionTime = requirePositiveInt(spec.executionTime, 'Execution time');
    this.priority = spec.priority ?? 'medium';
  }

  get status(): TaskStatus {
    return this._status;
  }

  get assignedTo(): string | null {
    return this._assignedTo;
  }

  get startTime(): number | undefined {
    return this._startTime;
  }

  get retryCount(): number {
    return this._retryCount;
  }

  /** Worker the task last ran on, kept after it leaves that worker */
  get lastWorkerId(): string | null {
    return this._lastWorkerId;
  }

  isTerminal(): boolean {
    return TERMINAL_STATUSES.includes(this._status);
  }

  /**
   * True once a running task has been on its worker for at least its
   * estimated execution time. Reaching the estimate exactly counts.
   */
  isExecutionComplete(currentTime: number): boolean {
    if (this._status !== 'assigned' || this._startTime === undefined) {
      return false;
    }
    return currentTime - this._startTime >= this.executionTime;
  }

  markAssigned(workerId: string, currentTime: number): void {
    this._status = 'assigned';
    this._assignedTo = workerId;
    this._lastWorkerId = workerId;
    this._startTime = currentTime;
  }

  /** Back to `queued` with no worker and no start time. */
  resetForReassignment(): void {
    this.leave('queued');
  }

  incrementRetryCount(): void {
    this._retryCount++;
  }

  markCompleted(): void {
    this.leave('completed');
  }

  markCancelled(): void {
    this.leave('cancelled');
  }

  markFailed(): void {
    this.leave('failed');
  }

  toInfo(): TaskInfo {
    return {
      id: this.id,
      status: this._status,
      priority: this.priority,
      assignedTo: this._status === 'assigned' || this._status === 'completed' ? this._lastWorkerId : null,
      retryCount: this._retryCount,
      startTime: this._startTime ?? null,
    };
  }

  private leave(status: Exclude<TaskStatus, 'assigned'>): void {
    this._status = status;
    this._assignedTo = null;
    this._startTime = undefined;
  }
}
