/**
 * WorkerNode — a compute node with a CPU/memory ledger.
 *
 * Usage only moves through allocate/release/deactivate, so
 * 0 <= used <= total holds for both resources at all times. An inactive
 * worker never holds running tasks.
 */

import type { Task } from './task.js';
import type { WorkerInfo, WorkerSpec, WorkerStatus } from './types.js';
import { requireId, requirePositiveInt } from './validate.js';

export class WorkerNode {
  readonly id: string;
  readonly totalCpu: number;
  readonly totalMemory: number;
  readonly speed: number;

  private _status: WorkerStatus = 'active';
  private _usedCpu = 0;
  private _usedMemory = 0;

  /** Running tasks keyed by task ID */
  private running: Map<string, Task> = new Map();

  constructor(spec: WorkerSpec) {
    this.id = requireId(spec.id, 'Worker ID');
    this.totalCpu = requirePositiveInt(spec.cpu, 'CPU capacity');
    this.totalMemory = requirePositiveInt(spec.memory, 'Memory capacity');
    this.speed = requirePositiveInt(spec.speed, 'Processing speed');
  }

  get status(): WorkerStatus {
    return this._status;
  }

  get usedCpu(): number {
    return this._usedCpu;
  }

  get usedMemory(): number {
    return this._usedMemory;
  }

  get availableCpu(): number {
    return this.totalCpu - this._usedCpu;
  }

  get availableMemory(): number {
    return this.totalMemory - this._usedMemory;
  }

  get runningTasks(): Task[] {
    return [...this.running.values()];
  }

  isActive(): boolean {
    return this._status === 'active';
  }

  hasTask(taskId: string): boolean {
    return this.running.has(taskId);
  }

  canAccommodate(cpu: number, memory: number): boolean {
    return this.isActive() && this.availableCpu >= cpu && this.availableMemory >= memory;
  }

  /**
   * Reserve the task's resources. Capacity is checked again here because
   * selection and allocation are separate steps. Returns false, changing
   * nothing, when the task no longer fits.
   */
  allocate(task: Task): boolean {
    if (this.running.has(task.id) || !this.canAccommodate(task.cpu, task.memory)) {
      return false;
    }

    this._usedCpu += task.cpu;
    this._usedMemory += task.memory;
    this.running.set(task.id, task);
    return true;
  }

  /**
   * Free the task's resources. Releasing a task that is not running here
   * does nothing.
   */
  release(task: Task): boolean {
    if (!this.running.delete(task.id)) {
      return false;
    }

    this._usedCpu = Math.max(0, this._usedCpu - task.cpu);
    this._usedMemory = Math.max(0, this._usedMemory - task.memory);
    return true;
  }

  /**
   * Take the worker out of service, emptying the running set. Returns
   * everything that was running on it.
   */
  deactivate(): Task[] {
    const tasks = this.runningTasks;
    this._status = 'inactive';
    this.running.clear();
    this._usedCpu = 0;
    this._usedMemory = 0;
    return tasks;
  }

  activate(): void {
    this._status = 'active';
  }

  toInfo(): WorkerInfo {
    return {
      id: this.id,
      cpu: this.totalCpu,
      memory: this.totalMemory,
      speed: this.speed,
      status: this._status,
      usedCpu: this._usedCpu,
      usedMemory: this._usedMemory,
      runningTasks: [...this.running.keys()],
    };
  }
}
