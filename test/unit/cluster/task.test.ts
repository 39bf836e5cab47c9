import { describe, it, expect } from 'vitest';
import { Task } from '../../../src/cluster/task.js';
import { InvalidArgumentError } from '../../../src/core/errors.js';

function makeTask(overrides: Partial<ConstructorParameters<typeof Task>[0]> = {}): Task {
  return new Task({ id: 'T1', cpu: 2, memory: 8, executionTime: 10, ...overrides });
}

describe('Task', () => {
  describe('constructor', () => {
    it('starts queued with no worker, no start time and zero retries', () => {
      const task = makeTask();
      expect(task.status).toBe('queued');
      expect(task.assignedTo).toBeNull();
      expect(task.startTime).toBeUndefined();
      expect(task.retryCount).toBe(0);
    });

    it('defaults priority to medium', () => {
      expect(makeTask().priority).toBe('medium');
      expect(makeTask({ priority: 'high' }).priority).toBe('high');
    });

    it.each([
      ['cpu', { cpu: 0 }, /CPU requirement/],
      ['memory', { memory: -1 }, /Memory requirement/],
      ['executionTime', { executionTime: 0 }, /Execution time/],
      ['fractional cpu', { cpu: 1.5 }, /CPU requirement/],
    ])('rejects a non-positive %s', (_label, overrides, message) => {
      expect(() => makeTask(overrides)).toThrow(InvalidArgumentError);
      expect(() => makeTask(overrides)).toThrow(message);
    });

    it('rejects an empty id', () => {
      expect(() => makeTask({ id: '  ' })).toThrow('Task ID cannot be empty');
    });
  });

  describe('transitions', () => {
    it('records worker and start time when assigned', () => {
      const task = makeTask();
      task.markAssigned('W1', 4);
      expect(task.status).toBe('assigned');
      expect(task.assignedTo).toBe('W1');
      expect(task.startTime).toBe(4);
    });

    it('clears worker and start time when reset for reassignment', () => {
      const task = makeTask();
      task.markAssigned('W1', 4);
      task.resetForReassignment();
      expect(task.status).toBe('queued');
      expect(task.assignedTo).toBeNull();
      expect(task.startTime).toBeUndefined();
      expect(task.lastWorkerId).toBe('W1');
    });

    it('clears worker and start time on completion and cancellation', () => {
      const completed = makeTask();
      completed.markAssigned('W1', 0);
      completed.markCompleted();
      expect(completed.assignedTo).toBeNull();
      expect(completed.startTime).toBeUndefined();
      expect(completed.isTerminal()).toBe(true);

      const cancelled = makeTask({ id: 'T2' });
      cancelled.markAssigned('W1', 0);
      cancelled.markCancelled();
      expect(cancelled.status).toBe('cancelled');
      expect(cancelled.assignedTo).toBeNull();
    });

    it('only ever increases the retry count', () => {
      const task = makeTask();
      task.incrementRetryCount();
      task.resetForReassignment();
      task.incrementRetryCount();
      expect(task.retryCount).toBe(2);
    });
  });

  describe('isExecutionComplete', () => {
    it('is false for a task that is not running', () => {
      expect(makeTask().isExecutionComplete(100)).toBe(false);
    });

    it('completes exactly at the execution time', () => {
      const task = makeTask({ executionTime: 10 });
      task.markAssigned('W1', 5);
      expect(task.isExecutionComplete(14)).toBe(false);
      expect(task.isExecutionComplete(15)).toBe(true);
      expect(task.isExecutionComplete(30)).toBe(true);
    });
  });

  describe('toInfo', () => {
    it('shows the worker while assigned and after completion', () => {
      const task = makeTask();
      task.markAssigned('W2', 0);
      expect(task.toInfo()).toEqual({
        id: 'T1',
        status: 'assigned',
        priority: 'medium',
        assignedTo: 'W2',
        retryCount: 0,
        startTime: 0,
      });

      task.markCompleted();
      expect(task.toInfo().assignedTo).toBe('W2');
      expect(task.toInfo().startTime).toBeNull();
    });

    it('hides the last worker once the task is queued again or cancelled', () => {
      const task = makeTask();
      task.markAssigned('W2', 0);
      task.resetForReassignment();
      expect(task.toInfo().assignedTo).toBeNull();
      task.markCancelled();
      expect(task.toInfo().assignedTo).toBeNull();
    });
  });
});
