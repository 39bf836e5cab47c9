import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createCLI } from '../../../src/cli/index.js';
import type { ScenarioResult } from '../../../src/cli/scenario.js';
import { createLogger } from '../../../src/core/logger.js';

vi.mock('../../../src/core/logger.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../src/core/logger.js')>();
  const { default: pino } = await import('pino');
  return { ...actual, createLogger: vi.fn(() => pino({ level: 'silent' })) };
});

function printed(log: { mock: { calls: unknown[][] } }): string[] {
  return log.mock.calls.map((call) => call.map(String).join(' '));
}

describe('createCLI', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'clustersched-cli-'));
    vi.mocked(createLogger).mockClear();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('registers the scenario commands', () => {
    const program = createCLI();
    expect(program.name()).toBe('clustersched');
    expect(program.commands.map((c) => c.name())).toEqual(['demo', 'run', 'scenarios']);
  });

  it('lists bundled scenarios', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    await createCLI().parseAsync(['node', 'clustersched', 'scenarios']);

    const lines = printed(log);
    expect(lines.filter((line) => line.trim().length > 0)).toHaveLength(12);
    expect(lines[1].trim().startsWith('01-register-workers')).toBe(true);
  });

  it('runs one bundled scenario as JSON', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    await createCLI().parseAsync(['node', 'clustersched', '--config', dir, 'demo', '02-fastest-worker', '--json']);

    expect(log).toHaveBeenCalledTimes(1);
    const results: ScenarioResult[] = JSON.parse(printed(log)[0]);
    expect(results.map((r) => r.name)).toHaveLength(1);
    const t1 = results[0].final.tasks.find((t) => t.id === 'T1');
    expect(t1).toMatchObject({ status: 'assigned', assignedTo: 'W2' });
  });

  it('applies the project config from --config', async () => {
    writeFileSync(
      join(dir, '.clustersched.yaml'),
      'autoScale:\n  idPrefix: node-\nlogging:\n  level: warn\n',
    );
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    await createCLI().parseAsync(['node', 'clustersched', '--config', dir, 'demo', '07-auto-scaling', '--json']);

    const results: ScenarioResult[] = JSON.parse(printed(log)[0]);
    expect(results[0].transcript[4]).toBe('[t=0] autoscale: added node-2');
    expect(createLogger).toHaveBeenCalledWith('clustersched', false, 'warn');
  });

  it('runs a scenario file as JSON', async () => {
    const file = join(dir, 'custom.yaml');
    writeFileSync(
      file,
      [
        'name: custom',
        'steps:',
        '  - { op: register, id: W1, cpu: 2, memory: 8, speed: 3 }',
        '  - { op: submit, id: T1, cpu: 2, memory: 4, time: 4 }',
        '  - { op: wait, duration: 4 }',
      ].join('\n'),
    );
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    await createCLI().parseAsync(['node', 'clustersched', '--config', dir, 'run', file, '--json']);

    const result: ScenarioResult = JSON.parse(printed(log)[0]);
    expect(result.name).toBe('custom');
    expect(result.transcript).toEqual([
      '[t=0] register W1 (cpu=2, memory=8, speed=3)',
      '[t=0] submit T1: assigned to W1',
      '[t=4] wait 4: 1 completed (T1)',
    ]);
    expect(result.final.tasks).toEqual([
      { id: 'T1', status: 'completed', priority: 'medium', assignedTo: 'W1', retryCount: 0, startTime: null },
    ]);
  });

  it('turns on pretty logging with --verbose', async () => {
    const file = join(dir, 'one.yaml');
    writeFileSync(file, 'name: one\nsteps:\n  - { op: autoscale }\n');
    vi.spyOn(console, 'log').mockImplementation(() => {});
    await createCLI().parseAsync(['node', 'clustersched', '-v', '--config', dir, 'run', file, '--json']);

    expect(createLogger).toHaveBeenCalledWith('clustersched', true, 'info');
  });
});
