export class SchedulerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'SchedulerError';
  }
}

export class InvalidArgumentError extends SchedulerError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENT');
    this.name = 'InvalidArgumentError';
  }
}

export type EntityKind = 'task' | 'worker';

export class DuplicateEntityError extends SchedulerError {
  constructor(public readonly entity: EntityKind, public readonly id: string) {
    super(`${entity === 'task' ? 'Task' : 'Worker'} already registered: ${id}`, 'DUPLICATE_ENTITY');
    this.name = 'DuplicateEntityError';
  }
}

/**
 * Raised when an identifier is not registered. Every id that reaches the
 * scheduling core is expected to exist, so callers should let this propagate.
 */
export class NotFoundError extends SchedulerError {
  constructor(public readonly entity: EntityKind, public readonly id: string) {
    super(`${entity === 'task' ? 'Task' : 'Worker'} not found: ${id}`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class ConfigError extends SchedulerError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

export class ScenarioError extends SchedulerError {
  constructor(message: string, cause?: Error) {
    super(message, 'SCENARIO_ERROR', cause);
    this.name = 'ScenarioError';
  }
}
