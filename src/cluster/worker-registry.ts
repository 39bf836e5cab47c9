/**
 * Worker Registry — tracks every worker node in the cluster.
 * Handles registration, failure marking, reactivation, and auto-scaled
 * node creation.
 */

import { DuplicateEntityError, NotFoundError } from '../core/errors.js';
import type { Task } from './task.js';
import type { AutoScaleProfile, WorkerRegistryStats, WorkerStatus } from './types.js';
import { WorkerNode } from './worker-node.js';

export const DEFAULT_AUTO_SCALE_PROFILE: AutoScaleProfile = {
  idPrefix: 'W',
  cpu: 2,
  memory: 4,
  speed: 10,
};

export class WorkerRegistry {
  private workers: Map<string, WorkerNode> = new Map();
  private autoScaleCounter = 1;
  private profile: AutoScaleProfile;

  constructor(profile: Partial<AutoScaleProfile> = {}) {
    this.profile = { ...DEFAULT_AUTO_SCALE_PROFILE, ...profile };
  }

  register(worker: WorkerNode): void {
    if (this.workers.has(worker.id)) {
      throw new DuplicateEntityError('worker', worker.id);
    }
    this.workers.set(worker.id, worker);
  }

  get(workerId: string): WorkerNode {
    const worker = this.workers.get(workerId);
    if (!worker) {
      throw new NotFoundError('worker', workerId);
    }
    return worker;
  }

  has(workerId: string): boolean {
    return this.workers.has(workerId);
  }

  getAll(): WorkerNode[] {
    return [...this.workers.values()];
  }

  getActive(): WorkerNode[] {
    return this.getAll().filter((w) => w.isActive());
  }

  getByStatus(status: WorkerStatus): WorkerNode[] {
    return this.getAll().filter((w) => w.status === status);
  }

  /**
   * Take a worker out of service and hand back the tasks it was running.
   */
  markFailed(workerId: string): Task[] {
    return this.get(workerId).deactivate();
  }

  /**
   * Register a new worker with the standard auto-scale capacity. IDs come
   * from a counter that only grows; an ID already in use is skipped.
   */
  autoScaleWorker(): WorkerNode {
    let id = this.nextAutoScaleId();
    while (this.workers.has(id)) {
      id = this.nextAutoScaleId();
    }

    const worker = new WorkerNode({
      id,
      cpu: this.profile.cpu,
      memory: this.profile.memory,
      speed: this.profile.speed,
    });
    this.workers.set(id, worker);
    return worker;
  }

  /**
   * Return an inactive worker to service. False when the worker is
   * unknown or already active.
   */
  reactivate(workerId: string): boolean {
    const worker = this.workers.get(workerId);
    if (!worker || worker.isActive()) {
      return false;
    }
    worker.activate();
    return true;
  }

  size(): number {
    return this.workers.size;
  }

  stats(): WorkerRegistryStats {
    const workers = this.getAll();
    return {
      total: workers.length,
      active: workers.filter((w) => w.isActive()).length,
      inactive: workers.filter((w) => !w.isActive()).length,
      totalCpu: workers.reduce((sum, w) => sum + w.totalCpu, 0),
      usedCpu: workers.reduce((sum, w) => sum + w.usedCpu, 0),
      totalMemory: workers.reduce((sum, w) => sum + w.totalMemory, 0),
      usedMemory: workers.reduce((sum, w) => sum + w.usedMemory, 0),
    };
  }

  clear(): void {
    this.workers.clear();
    this.autoScaleCounter = 1;
  }

  private nextAutoScaleId(): string {
    return `${this.profile.idPrefix}${this.workers.size + this.autoScaleCounter++}`;
  }
}
