import { InvalidArgumentError } from '../core/errors.js';

export function requireId(id: string, label: string): string {
  if (typeof id !== 'string' || id.trim().length === 0) {
    throw new InvalidArgumentError(`${label} cannot be empty`);
  }
  return id;
}

export function requirePositiveInt(value: number, label: string): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidArgumentError(`${label} must be a positive integer (got ${value})`);
  }
  return value;
}
