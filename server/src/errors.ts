/**
 * Error taxonomy for grading and due selection.
 *
 * - InvalidGradeError: bad grade value, not retried
 * - UnknownCardError: the referenced card does not exist, not retried
 * - ConcurrentGradeConflict: lost a compare-and-swap race, retry the grade
 * - StoreUnavailableError: the database failed, surfaced with its cause
 */

import { SchedulingError } from '@spaced-review/shared/scheduler';
import type { ProgressKey } from './types';

export {
  SchedulingError,
  InvalidGradeError,
  InvalidRequestError,
  InvalidSettingsError,
  type SchedulingErrorCode,
} from '@spaced-review/shared/scheduler';

export class UnknownCardError extends SchedulingError {
  readonly cardId: string;

  constructor(cardId: string) {
    super('UNKNOWN_CARD', `Card not found: ${cardId}`);
    this.name = 'UnknownCardError';
    this.cardId = cardId;
  }
}

export class ConcurrentGradeConflict extends SchedulingError {
  readonly key: ProgressKey;

  constructor(key: ProgressKey, attempts: number) {
    super(
      'CONCURRENT_GRADE_CONFLICT',
      `Progress for learner ${key.learnerId} on card ${key.cardId} kept changing; gave up after ${attempts} attempts`,
      { retryable: true }
    );
    this.name = 'ConcurrentGradeConflict';
    this.key = key;
  }
}

export class StoreUnavailableError extends SchedulingError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('STORE_UNAVAILABLE', `Store failed during ${operation}: ${detail}`, { retryable: true, cause });
    this.name = 'StoreUnavailableError';
    this.operation = operation;
  }
}

export class ConfigError extends SchedulingError {
  constructor(message: string) {
    super('CONFIG_ERROR', message);
    this.name = 'ConfigError';
  }
}

export function isRetryable(error: unknown): boolean {
  return error instanceof SchedulingError && error.retryable;
}
