/**
 * SchedulerService — fastest-worker-first assignment engine
 *
 * Orchestrates submission, assignment, completion sweeps, worker failure,
 * task timeouts, cancellation, reactivation and reactive auto-scaling on a
 * simulated clock. The queue and both registries are injected, so each
 * service instance owns an isolated cluster.
 *
 * Every time-dependent decision is a pure function of the `now` values
 * passed in; the same sequence of calls always produces the same state.
 */

import type pino from 'pino';
import { EventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import type { TaskQueue } from './priority-queue.js';
import type { Task } from './task.js';
import type { TaskRegistry } from './task-registry.js';
import type { WorkerCandidate } from './types.js';
import type { WorkerNode } from './worker-node.js';
import type { WorkerRegistry } from './worker-registry.js';

export type TimeoutClock = 'elapsed' | 'scheduler';

export interface SchedulerServiceOptions {
  queue: TaskQueue;
  tasks: TaskRegistry;
  workers: WorkerRegistry;
  /** Timeout threshold as a multiple of the task's execution time */
  timeoutMultiplier?: number;
  /** Clock the post-timeout sweep runs at */
  timeoutClock?: TimeoutClock;
  logger?: pino.Logger;
  events?: EventBus;
}

const DEFAULT_TIMEOUT_MULTIPLIER = 1.2;

export class SchedulerService {
  private readonly queue: TaskQueue;
  private readonly tasks: TaskRegistry;
  private readonly workers: WorkerRegistry;
  private readonly timeoutMultiplier: number;
  private readonly timeoutClock: TimeoutClock;
  private readonly logger: pino.Logger;
  readonly events: EventBus;

  constructor(options: SchedulerServiceOptions) {
    this.queue = options.queue;
    this.tasks = options.tasks;
    this.workers = options.workers;
    this.timeoutMultiplier = options.timeoutMultiplier ?? DEFAULT_TIMEOUT_MULTIPLIER;
    this.timeoutClock = options.timeoutClock ?? 'elapsed';
    this.logger = options.logger ?? getLogger().child({ component: 'scheduler' });
    this.events = options.events ?? new EventBus();
  }

  // ─────────────────────────────────────────────────────────
  // SUBMISSION & ASSIGNMENT
  // ─────────────────────────────────────────────────────────

  /**
   * Register a task and try to place it right away.
   */
  submit(task: Task, now: number): void {
    this.tasks.register(task);
    this.logger.debug({ taskId: task.id, priority: task.priority, now }, 'task submitted');
    this.events.emit('task:submitted', { task, time: now });
    this.tryAssign(task, now);
  }

  /**
   * Place the task on the fastest active worker that fits it, or hold it
   * in the queue. Returns whether the task is now assigned. Running and
   * terminal tasks are left as they are.
   */
  tryAssign(task: Task, now: number): boolean {
    if (task.status === 'assigned') return true;
    if (task.isTerminal()) return false;

    const candidate = this.findCandidate(task);
    if (candidate.found && this.bind(task, candidate.worker, now)) {
      return true;
    }

    task.resetForReassignment();
    if (!this.queue.contains(task)) {
      this.queue.enqueue(task);
    }
    this.logger.debug({ taskId: task.id, queued: this.queue.size() }, 'no worker available, task queued');
    this.events.emit('task:queued', { task, time: now });
    return false;
  }

  /**
   * Fastest active worker with room for the task. Equal speeds go to the
   * lowest worker ID.
   */
  findCandidate(task: Task): WorkerCandidate {
    let best: WorkerNode | undefined;

    for (const worker of this.workers.getActive()) {
      if (!worker.canAccommodate(task.cpu, task.memory)) continue;
      if (
        !best ||
        worker.speed > best.speed ||
        (worker.speed === best.speed && worker.id < best.id)
      ) {
        best = worker;
      }
    }

    return best ? { found: true, worker: best } : { found: false };
  }

  /**
   * Drain the queue in priority order against the current capacity.
   * Stops at the first task that cannot be placed and puts it back at the
   * head of its tier, so nothing behind it is served first.
   */
  assignQueued(now: number): Task[] {
    const assigned: Task[] = [];

    for (let task = this.queue.dequeue(); task; task = this.queue.dequeue()) {
      const candidate = this.findCandidate(task);
      if (candidate.found && this.bind(task, candidate.worker, now)) {
        assigned.push(task);
        continue;
      }

      this.queue.requeue(task);
      break;
    }

    return assigned;
  }

  // ─────────────────────────────────────────────────────────
  // COMPLETION
  // ─────────────────────────────────────────────────────────

  /**
   * Complete every running task whose execution time has elapsed, then
   * drain the queue into the freed capacity.
   */
  processCompleted(now: number): Task[] {
    const completed: Task[] = [];

    for (const worker of this.workers.getActive()) {
      const due = worker.runningTasks.filter((t) => t.isExecutionComplete(now));
      for (const task of due) {
        task.markCompleted();
        worker.release(task);
        completed.push(task);
        this.logger.debug({ taskId: task.id, workerId: worker.id, now }, 'task completed');
        this.events.emit('task:completed', { task, workerId: worker.id, time: now });
      }
    }

    this.assignQueued(now);
    return completed;
  }

  // ─────────────────────────────────────────────────────────
  // FAILURE & TIMEOUT
  // ─────────────────────────────────────────────────────────

  /**
   * Take a worker out of service and retry everything it was running.
   * Returns the tasks that found a new worker in this same step.
   */
  handleFailure(workerId: string, now: number): Task[] {
    const worker = this.workers.get(workerId);
    const affected = this.workers.markFailed(workerId);
    this.logger.warn({ workerId, affected: affected.length, now }, 'worker failed');
    this.events.emit('worker:failed', { worker, affected, time: now });

    const reassigned: Task[] = [];
    for (const task of affected) {
      if (task.status !== 'assigned') continue;

      task.resetForReassignment();
      task.incrementRetryCount();
      this.events.emit('task:requeued', { task, reason: 'worker-failure', time: now });
      if (this.tryAssign(task, now)) {
        reassigned.push(task);
      }
    }

    return reassigned;
  }

  /**
   * Apply a timeout to a running task. Once `elapsed` reaches the threshold
   * (execution time times the multiplier, rounded down) the task is pulled
   * off its worker, queued for retry and the queue is drained. Returns
   * whether the task timed out.
   *
   * With the default 'elapsed' clock the drain runs at `now + elapsed`,
   * ahead of the scheduler's own clock.
   */
  timeout(taskId: string, elapsed: number, now: number): boolean {
    const task = this.tasks.get(taskId);
    if (task.status !== 'assigned' || task.assignedTo === null) {
      return false;
    }

    const threshold = Math.floor(task.executionTime * this.timeoutMultiplier);
    if (elapsed < threshold) {
      return false;
    }

    const worker = this.workers.get(task.assignedTo);
    worker.release(task);
    task.resetForReassignment();
    task.incrementRetryCount();
    this.queue.enqueue(task);

    this.logger.info({ taskId, workerId: worker.id, elapsed, threshold }, 'task timed out');
    this.events.emit('task:timed-out', { task, workerId: worker.id, elapsed, time: now });
    this.events.emit('task:requeued', { task, reason: 'timeout', time: now });

    this.assignQueued(this.timeoutClock === 'elapsed' ? now + elapsed : now);
    return true;
  }

  // ─────────────────────────────────────────────────────────
  // CANCELLATION
  // ─────────────────────────────────────────────────────────

  /**
   * Cancel a queued or running task. Returns false for tasks that already
   * reached a terminal state.
   */
  cancel(taskId: string, now: number): boolean {
    const task = this.tasks.get(taskId);
    const previousStatus = task.status;

    switch (task.status) {
      case 'queued':
        this.queue.remove(task);
        task.markCancelled();
        break;
      case 'assigned': {
        if (task.assignedTo !== null) {
          this.workers.get(task.assignedTo).release(task);
        }
        task.markCancelled();
        this.assignQueued(now);
        break;
      }
      case 'completed':
      case 'cancelled':
      case 'failed':
        return false;
    }

    this.logger.info({ taskId, previousStatus, now }, 'task cancelled');
    this.events.emit('task:cancelled', { task, previousStatus, time: now });
    return true;
  }

  // ─────────────────────────────────────────────────────────
  // WORKERS
  // ─────────────────────────────────────────────────────────

  /**
   * Add a worker and let queued work flow onto it.
   */
  registerWorker(worker: WorkerNode, now: number): void {
    this.workers.register(worker);
    this.logger.info(
      { workerId: worker.id, cpu: worker.totalCpu, memory: worker.totalMemory, speed: worker.speed },
      'worker registered',
    );
    this.events.emit('worker:registered', { worker, time: now });
    this.assignQueued(now);
  }

  /**
   * Return a failed worker to service and drain the queue onto it.
   */
  reactivate(workerId: string, now: number): boolean {
    if (!this.workers.reactivate(workerId)) {
      return false;
    }

    const worker = this.workers.get(workerId);
    this.logger.info({ workerId, now }, 'worker reactivated');
    this.events.emit('worker:reactivated', { worker, time: now });
    this.assignQueued(now);
    return true;
  }

  /**
   * Add one standard-size worker when work is waiting. Does nothing on an
   * empty queue.
   */
  autoScale(now: number): WorkerNode | undefined {
    if (this.queue.isEmpty()) {
      return undefined;
    }

    const queued = this.queue.size();
    const worker = this.workers.autoScaleWorker();
    this.logger.info({ workerId: worker.id, queued, now }, 'auto-scaled worker');
    this.events.emit('worker:scaled', { worker, queued, time: now });
    this.assignQueued(now);
    return worker;
  }

  // ─────────────────────────────────────────────────────────
  // READ-ONLY VIEWS
  // ─────────────────────────────────────────────────────────

  getTasks(): Task[] {
    return this.tasks.getAll();
  }

  getWorkers(): WorkerNode[] {
    return this.workers.getAll();
  }

  getQueuedTasks(): Task[] {
    return this.queue.snapshot();
  }

  queueSize(): number {
    return this.queue.size();
  }

  // ─────────────────────────────────────────────────────────
  // INTERNALS
  // ─────────────────────────────────────────────────────────

  private bind(task: Task, worker: WorkerNode, now: number): boolean {
    if (!worker.allocate(task)) {
      return false;
    }

    task.markAssigned(worker.id, now);
    this.queue.remove(task);
    this.logger.debug({ taskId: task.id, workerId: worker.id, now }, 'task assigned');
    this.events.emit('task:assigned', { task, workerId: worker.id, time: now });
    return true;
  }
}
