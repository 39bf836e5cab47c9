/**
 * TaskQueue — three FIFO tiers of tasks waiting for capacity.
 *
 * `dequeue` always serves the highest non-empty tier; within a tier tasks
 * leave in arrival order. There is no aging, so a steady stream of high
 * tasks can hold low tasks back indefinitely.
 *
 * Each method runs to completion synchronously, which keeps
 * enqueue/dequeue/remove/size atomic with respect to one another.
 */

import type { Task } from './task.js';
import type { Priority } from './types.js';
import { PRIORITY_ORDER } from './types.js';

export class TaskQueue {
  private tiers: Record<Priority, Task[]> = {
    high: [],
    medium: [],
    low: [],
  };

  enqueue(task: Task): void {
    this.tiers[task.priority].push(task);
  }

  /**
   * Put a task back at the head of its tier, ahead of everything that
   * arrived after it.
   */
  requeue(task: Task): void {
    this.tiers[task.priority].unshift(task);
  }

  dequeue(): Task | undefined {
    for (const priority of PRIORITY_ORDER) {
      const task = this.tiers[priority].shift();
      if (task) return task;
    }
    return undefined;
  }

  peek(): Task | undefined {
    for (const priority of PRIORITY_ORDER) {
      const tier = this.tiers[priority];
      if (tier.length > 0) return tier[0];
    }
    return undefined;
  }

  remove(task: Task): boolean {
    const tier = this.tiers[task.priority];
    const index = tier.findIndex((t) => t.id === task.id);
    if (index < 0) return false;
    tier.splice(index, 1);
    return true;
  }

  contains(task: Task): boolean {
    return this.tiers[task.priority].some((t) => t.id === task.id);
  }

  size(): number {
    return this.tiers.high.length + this.tiers.medium.length + this.tiers.low.length;
  }

  isEmpty(): boolean {
    return this.size() === 0;
  }

  /** Queued tasks in the order `dequeue` would return them. */
  snapshot(): Task[] {
    return PRIORITY_ORDER.flatMap((priority) => [...this.tiers[priority]]);
  }

  clear(): void {
    for (const priority of PRIORITY_ORDER) {
      this.tiers[priority] = [];
    }
  }
}
