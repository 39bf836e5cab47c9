import type { ClusterStats, TaskInfo, WorkerInfo } from '../cluster/types.js';
import type { ScenarioResult, ScenarioSnapshot } from './scenario.js';

export function formatTask(task: TaskInfo): string {
  const parts = [`taskId: "${task.id}"`, `status: "${task.status}"`];
  if (task.assignedTo) {
    parts.push(`assignedTo: "${task.assignedTo}"`);
  }
  if (task.retryCount > 0) {
    parts.push(`retries: ${task.retryCount}`);
  }
  return `{ ${parts.join(', ')} }`;
}

export function formatWorker(worker: WorkerInfo): string {
  return (
    `{ nodeId: "${worker.id}", cpu: ${worker.usedCpu}/${worker.cpu}, ` +
    `memory: ${worker.usedMemory}/${worker.memory}, speed: ${worker.speed}, status: "${worker.status}" }`
  );
}

export function formatStats(stats: ClusterStats): string {
  const t = stats.tasks;
  const w = stats.workers;
  return (
    `t=${stats.currentTime} queue=${stats.queued} | tasks: ${t.assigned} assigned, ${t.queued} queued, ` +
    `${t.completed} completed, ${t.cancelled} cancelled, ${t.failed} failed | ` +
    `workers: ${w.active}/${w.total} active, cpu ${w.usedCpu}/${w.totalCpu}, memory ${w.usedMemory}/${w.totalMemory}`
  );
}

export function formatSnapshot(snapshot: ScenarioSnapshot): string[] {
  switch (snapshot.what) {
    case 'tasks':
    case 'queue':
      return snapshot.tasks.length > 0 ? snapshot.tasks.map(formatTask) : ['(none)'];
    case 'workers':
      return snapshot.workers.length > 0 ? snapshot.workers.map(formatWorker) : ['(none)'];
    case 'stats':
      return [formatStats(snapshot.stats)];
  }
}

export function formatResult(result: ScenarioResult): string {
  const lines: string[] = [`▶ ${result.name}`];
  if (result.description) {
    lines.push(`  ${result.description}`);
  }
  lines.push('─'.repeat(60));

  let snapshotIndex = 0;
  result.transcript.forEach((entry, step) => {
    lines.push(`  ${entry}`);
    while (snapshotIndex < result.snapshots.length && result.snapshots[snapshotIndex].step === step) {
      for (const line of formatSnapshot(result.snapshots[snapshotIndex])) {
        lines.push(`      ${line}`);
      }
      snapshotIndex++;
    }
  });

  lines.push(`  ${formatStats(result.final.stats)}`);
  return lines.join('\n');
}
