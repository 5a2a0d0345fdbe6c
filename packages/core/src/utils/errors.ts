import type { ManErrorType } from '../types/index.js';

/**
 * Fatal conversion error. Thrown for problems that abort a run:
 * unreadable sources, bad configuration, malformed tables, output failures.
 */
export class ManError extends Error {
  readonly type: ManErrorType;
  readonly context: Record<string, unknown>;

  constructor(type: ManErrorType, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'ManError';
    this.type = type;
    this.context = context;
  }
}

/**
 * Check if a value is a ManError
 */
export function isManError(value: unknown): value is ManError {
  return value instanceof ManError;
}
