import { DuplicateEntityError, NotFoundError } from '../core/errors.js';
import type { Task } from './task.js';
import type { TaskStatus } from './types.js';

/**
 * Lookup table for every task ever submitted, terminal ones included.
 * Enumeration follows registration order.
 */
export class TaskRegistry {
  private tasks: Map<string, Task> = new Map();

  register(task: Task): void {
    if (this.tasks.has(task.id)) {
      throw new DuplicateEntityError('task', task.id);
    }
    this.tasks.set(task.id, task);
  }

  get(taskId: string): Task {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw new NotFoundError('task', taskId);
    }
    return task;
  }

  has(taskId: string): boolean {
    return this.tasks.has(taskId);
  }

  getAll(): Task[] {
    return [...this.tasks.values()];
  }

  getByStatus(status: TaskStatus): Task[] {
    return this.getAll().filter((t) => t.status === status);
  }

  getByWorker(workerId: string): Task[] {
    return this.getAll().filter((t) => t.assignedTo === workerId);
  }

  size(): number {
    return this.tasks.size;
  }

  clear(): void {
    this.tasks.clear();
  }
}
