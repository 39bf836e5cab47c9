import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { parseScenario, runScenario } from '../../../src/cli/scenario.js';
import { formatResult, formatTask, formatWorker } from '../../../src/cli/format.js';
import { ScenarioError } from '../../../src/core/errors.js';

const silent = pino({ level: 'silent' });

describe('parseScenario', () => {
  it('parses steps from YAML', () => {
    const scenario = parseScenario(
      [
        'name: tiny',
        'steps:',
        '  - { op: register, id: W1, cpu: 2, memory: 4, speed: 1 }',
        '  - { op: submit, cpu: 1, memory: 1, time: 3, priority: high }',
        '  - { op: autoscale }',
      ].join('\n'),
    );

    expect(scenario.name).toBe('tiny');
    expect(scenario.steps.map((s) => s.op)).toEqual(['register', 'submit', 'autoscale']);
  });

  it('rejects unknown operations', () => {
    expect(() => parseScenario('name: bad\nsteps:\n  - { op: explode }\n')).toThrow(ScenarioError);
  });

  it('rejects a scenario without steps', () => {
    expect(() => parseScenario('name: empty\nsteps: []\n')).toThrow(/steps/);
  });
});

describe('runScenario', () => {
  it('replays steps and records a transcript', () => {
    const scenario = parseScenario(
      [
        'name: queueing',
        'steps:',
        '  - { op: register, id: W1, cpu: 2, memory: 8, speed: 5 }',
        '  - { op: submit, id: T1, cpu: 2, memory: 4, time: 10 }',
        '  - { op: submit, id: T2, cpu: 2, memory: 4, time: 5 }',
        '  - { op: print, what: queue }',
        '  - { op: wait, duration: 10 }',
        '  - { op: cancel, task: T1 }',
      ].join('\n'),
    );

    const result = runScenario(scenario, { logger: silent });

    expect(result.transcript).toEqual([
      '[t=0] register W1 (cpu=2, memory=8, speed=5)',
      '[t=0] submit T1: assigned to W1',
      '[t=0] submit T2: queued',
      '[t=0] print queue',
      '[t=10] wait 10: 1 completed (T1)',
      '[t=10] cancel T1: rejected',
    ]);
    expect(result.snapshots).toHaveLength(1);
    expect(result.snapshots[0]).toMatchObject({ step: 3, what: 'queue' });
    expect(result.final.tasks.map((t) => [t.id, t.status])).toEqual([
      ['T1', 'completed'],
      ['T2', 'assigned'],
    ]);
  });

  it('generates ids for submit steps without one', () => {
    const scenario = parseScenario('name: ids\nsteps:\n  - { op: submit, cpu: 1, memory: 1, time: 1 }\n');
    let n = 0;
    const result = runScenario(scenario, { logger: silent, generateTaskId: () => `gen-${++n}` });
    expect(result.final.tasks.map((t) => t.id)).toEqual(['gen-1']);
  });

  it('applies configuration to the cluster', () => {
    const scenario = parseScenario(
      [
        'name: scaled',
        'steps:',
        '  - { op: submit, id: T1, cpu: 1, memory: 1, time: 1 }',
        '  - { op: autoscale }',
      ].join('\n'),
    );
    const result = runScenario(scenario, { logger: silent, config: { autoScale: { idPrefix: 'node-' } } });
    expect(result.transcript[1]).toBe('[t=0] autoscale: added node-1');
  });
});

describe('format', () => {
  it('renders tasks with their worker and retries', () => {
    expect(
      formatTask({ id: 'T1', status: 'assigned', priority: 'low', assignedTo: 'W1', retryCount: 2, startTime: 4 }),
    ).toBe('{ taskId: "T1", status: "assigned", assignedTo: "W1", retries: 2 }');
    expect(
      formatTask({ id: 'T2', status: 'queued', priority: 'low', assignedTo: null, retryCount: 0, startTime: null }),
    ).toBe('{ taskId: "T2", status: "queued" }');
  });

  it('renders workers with usage', () => {
    expect(
      formatWorker({
        id: 'W1',
        cpu: 4,
        memory: 16,
        speed: 5,
        status: 'inactive',
        usedCpu: 0,
        usedMemory: 0,
        runningTasks: [],
      }),
    ).toBe('{ nodeId: "W1", cpu: 0/4, memory: 0/16, speed: 5, status: "inactive" }');
  });

  it('renders a result with its snapshots under the step that printed them', () => {
    const result = runScenario(
      parseScenario(
        'name: one\nsteps:\n  - { op: register, id: W1, cpu: 1, memory: 1, speed: 1 }\n  - { op: print, what: workers }\n',
      ),
      { logger: silent },
    );

    expect(formatResult(result).split('\n')).toEqual([
      '▶ one',
      '─'.repeat(60),
      '  [t=0] register W1 (cpu=1, memory=1, speed=1)',
      '  [t=0] print workers',
      '      { nodeId: "W1", cpu: 0/1, memory: 0/1, speed: 1, status: "active" }',
      '  t=0 queue=0 | tasks: 0 assigned, 0 queued, 0 completed, 0 cancelled, 0 failed | workers: 1/1 active, cpu 0/1, memory 0/1',
    ]);
  });
});
