/**
 * ClusterScheduler — entry point for driving a simulated cluster.
 *
 * Owns the simulated clock and one scheduling service, validates raw
 * parameters before they reach the core, and converts entities into plain
 * display records.
 */

import type pino from 'pino';
import { z } from 'zod';
import { ConfigError, InvalidArgumentError } from '../core/errors.js';
import { EventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import { SchedulerConfigSchema, type SchedulerConfig, type SchedulerConfigInput } from '../core/types.js';
import { TaskQueue } from './priority-queue.js';
import { SchedulerService } from './scheduler-service.js';
import { Task } from './task.js';
import { TaskRegistry } from './task-registry.js';
import type { ClusterStats, SchedulerEvents, TaskInfo, TaskStatus, WorkerInfo } from './types.js';
import { WorkerNode } from './worker-node.js';
import { WorkerRegistry } from './worker-registry.js';

const positiveInt = z.number().int().positive();
const identifier = z.string().trim().min(1);

export const WorkerInputSchema = z.object({
  id: identifier,
  cpu: positiveInt,
  memory: positiveInt,
  speed: positiveInt,
});

export const TaskInputSchema = z.object({
  id: identifier,
  cpu: positiveInt,
  memory: positiveInt,
  executionTime: positiveInt,
  priority: z.enum(['high', 'medium', 'low']).default('medium'),
});

export type WorkerInput = z.input<typeof WorkerInputSchema>;
export type TaskInput = z.input<typeof TaskInputSchema>;

const nonNegative = z.number().nonnegative();

export interface ClusterSchedulerOptions {
  config?: SchedulerConfigInput;
  logger?: pino.Logger;
  events?: EventBus;
}

export class ClusterScheduler {
  private clock = 0;
  private readonly config: SchedulerConfig;
  private readonly queue = new TaskQueue();
  private readonly tasks = new TaskRegistry();
  private readonly workers: WorkerRegistry;
  private readonly service: SchedulerService;
  private readonly events: EventBus;

  constructor(options: ClusterSchedulerOptions = {}) {
    const parsed = SchedulerConfigSchema.safeParse(options.config ?? {});
    if (!parsed.success) {
      throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`, parsed.error);
    }
    this.config = parsed.data;
    this.events = options.events ?? new EventBus();
    this.workers = new WorkerRegistry(this.config.autoScale);
    this.service = new SchedulerService({
      queue: this.queue,
      tasks: this.tasks,
      workers: this.workers,
      timeoutMultiplier: this.config.scheduler.timeoutMultiplier,
      timeoutClock: this.config.scheduler.timeoutClock,
      logger: options.logger ?? getLogger().child({ component: 'scheduler' }),
      events: this.events,
    });
  }

  get currentTime(): number {
    return this.clock;
  }

  // ─────────────────────────────────────────────────────────
  // WORKERS
  // ─────────────────────────────────────────────────────────

  registerWorker(input: WorkerInput): WorkerInfo {
    const spec = validate(WorkerInputSchema, input, 'worker');
    const worker = new WorkerNode(spec);
    this.service.registerWorker(worker, this.clock);
    return worker.toInfo();
  }

  listWorkers(): WorkerInfo[] {
    return this.service.getWorkers().map((w) => w.toInfo());
  }

  simulateWorkerFailure(workerId: string): TaskInfo[] {
    return this.service
      .handleFailure(validate(identifier, workerId, 'worker ID'), this.clock)
      .map((t) => t.toInfo());
  }

  reactivateWorker(workerId: string): boolean {
    return this.service.reactivate(validate(identifier, workerId, 'worker ID'), this.clock);
  }

  autoScale(): WorkerInfo | undefined {
    return this.service.autoScale(this.clock)?.toInfo();
  }

  // ─────────────────────────────────────────────────────────
  // TASKS
  // ─────────────────────────────────────────────────────────

  submitTask(input: TaskInput): TaskInfo {
    const spec = validate(TaskInputSchema, input, 'task');
    const task = new Task(spec);
    this.service.submit(task, this.clock);
    return task.toInfo();
  }

  submitTasks(inputs: TaskInput[]): TaskInfo[] {
    return inputs.map((input) => this.submitTask(input));
  }

  getTask(taskId: string): TaskInfo {
    return this.tasks.get(validate(identifier, taskId, 'task ID')).toInfo();
  }

  listTasks(): TaskInfo[] {
    return this.service.getTasks().map((t) => t.toInfo());
  }

  listQueued(): TaskInfo[] {
    return this.service.getQueuedTasks().map((t) => t.toInfo());
  }

  cancelTask(taskId: string): boolean {
    return this.service.cancel(validate(identifier, taskId, 'task ID'), this.clock);
  }

  simulateTaskTimeout(taskId: string, elapsed: number): boolean {
    return this.service.timeout(
      validate(identifier, taskId, 'task ID'),
      validate(nonNegative, elapsed, 'elapsed time'),
      this.clock,
    );
  }

  // ─────────────────────────────────────────────────────────
  // CLOCK
  // ─────────────────────────────────────────────────────────

  /**
   * Advance the simulated clock and complete whatever is due.
   * Returns the tasks that completed.
   */
  waitFor(duration: number): TaskInfo[] {
    this.clock += validate(nonNegative, duration, 'duration');
    return this.service.processCompleted(this.clock).map((t) => t.toInfo());
  }

  // ─────────────────────────────────────────────────────────
  // INTROSPECTION
  // ─────────────────────────────────────────────────────────

  stats(): ClusterStats {
    const tasks: Record<TaskStatus, number> = {
      queued: 0,
      assigned: 0,
      completed: 0,
      cancelled: 0,
      failed: 0,
    };
    for (const task of this.service.getTasks()) {
      tasks[task.status]++;
    }

    return {
      currentTime: this.clock,
      queued: this.service.queueSize(),
      tasks,
      workers: this.workers.stats(),
    };
  }

  getConfig(): SchedulerConfig {
    return this.config;
  }

  on<K extends keyof SchedulerEvents>(event: K, listener: (data: SchedulerEvents[K]) => void): void {
    this.events.on(event, listener);
  }

  off<K extends keyof SchedulerEvents>(event: K, listener: (data: SchedulerEvents[K]) => void): void {
    this.events.off(event, listener);
  }
}

function validate<T extends z.ZodTypeAny>(schema: T, value: unknown, label: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(`Invalid ${label}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
