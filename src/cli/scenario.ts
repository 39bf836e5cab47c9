/**
 * Scenario runner — replays a scripted sequence of cluster events.
 *
 * A scenario is a YAML document with a name and a list of steps. Each step
 * maps onto one ClusterScheduler call; `print` steps capture a snapshot.
 *
 * @example
 * ```yaml
 * name: fastest-worker
 * steps:
 *   - { op: register, id: W1, cpu: 4, memory: 16, speed: 5 }
 *   - { op: register, id: W2, cpu: 8, memory: 32, speed: 10 }
 *   - { op: submit, id: T1, cpu: 2, memory: 8, time: 10 }
 *   - { op: print, what: tasks }
 * ```
 */

import { readFileSync, readdirSync, existsSync } from 'fs';
import { basename, dirname, extname, join } from 'path';
import { fileURLToPath } from 'url';
import { nanoid } from 'nanoid';
import type pino from 'pino';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ClusterScheduler } from '../cluster/cluster-scheduler.js';
import type { ClusterStats, TaskInfo, WorkerInfo } from '../cluster/types.js';
import { ScenarioError } from '../core/errors.js';
import type { SchedulerConfigInput } from '../core/types.js';

// ═══════════════════════════════════════════════════════════════
// SCHEMA
// ═══════════════════════════════════════════════════════════════

export const StepSchema = z.discriminatedUnion('op', [
  z.object({
    op: z.literal('register'),
    id: z.string(),
    cpu: z.number(),
    memory: z.number(),
    speed: z.number(),
  }),
  z.object({
    op: z.literal('submit'),
    id: z.string().optional(),
    cpu: z.number(),
    memory: z.number(),
    time: z.number(),
    priority: z.enum(['high', 'medium', 'low']).optional(),
  }),
  z.object({ op: z.literal('wait'), duration: z.number() }),
  z.object({ op: z.literal('fail'), worker: z.string() }),
  z.object({ op: z.literal('timeout'), task: z.string(), elapsed: z.number() }),
  z.object({ op: z.literal('cancel'), task: z.string() }),
  z.object({ op: z.literal('autoscale') }),
  z.object({ op: z.literal('reactivate'), worker: z.string() }),
  z.object({ op: z.literal('print'), what: z.enum(['tasks', 'workers', 'queue', 'stats']) }),
]);

export const ScenarioSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  steps: z.array(StepSchema).min(1),
});

export type ScenarioStep = z.infer<typeof StepSchema>;
export type Scenario = z.infer<typeof ScenarioSchema>;

export type ScenarioSnapshot =
  | { step: number; what: 'tasks' | 'queue'; tasks: TaskInfo[] }
  | { step: number; what: 'workers'; workers: WorkerInfo[] }
  | { step: number; what: 'stats'; stats: ClusterStats };

export interface ScenarioResult {
  name: string;
  description?: string;
  /** One line per step describing what happened */
  transcript: string[];
  snapshots: ScenarioSnapshot[];
  final: { tasks: TaskInfo[]; workers: WorkerInfo[]; stats: ClusterStats };
}

export interface RunScenarioOptions {
  config?: SchedulerConfigInput;
  logger?: pino.Logger;
  /** Generates IDs for submit steps that leave `id` out */
  generateTaskId?: () => string;
}

// ═══════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════

export function parseScenario(text: string, source: string = 'scenario'): Scenario {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    throw new ScenarioError(`Failed to parse ${source}`, err instanceof Error ? err : undefined);
  }

  const result = ScenarioSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ScenarioError(`Invalid ${source}: ${issues}`, result.error);
  }
  return result.data;
}

export function loadScenarioFile(path: string): Scenario {
  if (!existsSync(path)) {
    throw new ScenarioError(`Scenario file not found: ${path}`);
  }
  return parseScenario(readFileSync(path, 'utf-8'), path);
}

/**
 * Directory holding the bundled scenarios. Searched upward from this
 * module so it resolves from both the sources and a build.
 */
export function findScenarioDir(from: string = dirname(fileURLToPath(import.meta.url))): string {
  let dir = from;
  for (;;) {
    const candidate = join(dir, 'scenarios');
    if (existsSync(candidate)) return candidate;
    const parent = dirname(dir);
    if (parent === dir) {
      throw new ScenarioError(`No scenarios directory found above ${from}`);
    }
    dir = parent;
  }
}

/** Bundled scenarios keyed by file name without extension, in file order. */
export function listBundledScenarios(dir: string = findScenarioDir()): Map<string, string> {
  const entries = readdirSync(dir)
    .filter((file) => extname(file) === '.yaml')
    .sort();
  return new Map(entries.map((file) => [basename(file, '.yaml'), join(dir, file)]));
}

// ═══════════════════════════════════════════════════════════════
// EXECUTION
// ═══════════════════════════════════════════════════════════════

export function runScenario(scenario: Scenario, options: RunScenarioOptions = {}): ScenarioResult {
  const cluster = new ClusterScheduler({ config: options.config, logger: options.logger });
  const generateTaskId = options.generateTaskId ?? (() => `T-${nanoid(6)}`);
  const transcript: string[] = [];
  const snapshots: ScenarioSnapshot[] = [];

  scenario.steps.forEach((step, index) => {
    const line = applyStep(cluster, step, index, generateTaskId, snapshots);
    transcript.push(`[t=${cluster.currentTime}] ${line}`);
  });

  return {
    name: scenario.name,
    description: scenario.description,
    transcript,
    snapshots,
    final: {
      tasks: cluster.listTasks(),
      workers: cluster.listWorkers(),
      stats: cluster.stats(),
    },
  };
}

function applyStep(
  cluster: ClusterScheduler,
  step: ScenarioStep,
  index: number,
  generateTaskId: () => string,
  snapshots: ScenarioSnapshot[],
): string {
  switch (step.op) {
    case 'register': {
      const worker = cluster.registerWorker({
        id: step.id,
        cpu: step.cpu,
        memory: step.memory,
        speed: step.speed,
      });
      return `register ${worker.id} (cpu=${worker.cpu}, memory=${worker.memory}, speed=${worker.speed})`;
    }
    case 'submit': {
      const task = cluster.submitTask({
        id: step.id ?? generateTaskId(),
        cpu: step.cpu,
        memory: step.memory,
        executionTime: step.time,
        priority: step.priority,
      });
      const placement = task.status === 'assigned' ? `assigned to ${task.assignedTo}` : task.status;
      return `submit ${task.id}: ${placement}`;
    }
    case 'wait': {
      const completed = cluster.waitFor(step.duration);
      const ids = completed.map((t) => t.id).join(', ');
      return `wait ${step.duration}: ${completed.length} completed${ids ? ` (${ids})` : ''}`;
    }
    case 'fail': {
      const reassigned = cluster.simulateWorkerFailure(step.worker);
      return `fail ${step.worker}: ${reassigned.length} reassigned`;
    }
    case 'timeout': {
      const timedOut = cluster.simulateTaskTimeout(step.task, step.elapsed);
      return `timeout ${step.task} after ${step.elapsed}: ${timedOut ? 'timed out' : 'no change'}`;
    }
    case 'cancel': {
      const cancelled = cluster.cancelTask(step.task);
      return `cancel ${step.task}: ${cancelled ? 'cancelled' : 'rejected'}`;
    }
    case 'autoscale': {
      const worker = cluster.autoScale();
      return worker ? `autoscale: added ${worker.id}` : 'autoscale: queue empty';
    }
    case 'reactivate': {
      const reactivated = cluster.reactivateWorker(step.worker);
      return `reactivate ${step.worker}: ${reactivated ? 'active' : 'no change'}`;
    }
    case 'print': {
      switch (step.what) {
        case 'tasks':
          snapshots.push({ step: index, what: 'tasks', tasks: cluster.listTasks() });
          break;
        case 'queue':
          snapshots.push({ step: index, what: 'queue', tasks: cluster.listQueued() });
          break;
        case 'workers':
          snapshots.push({ step: index, what: 'workers', workers: cluster.listWorkers() });
          break;
        case 'stats':
          snapshots.push({ step: index, what: 'stats', stats: cluster.stats() });
          break;
      }
      return `print ${step.what}`;
    }
  }
}
