/**
 * Errors raised by the pure scheduler. The server extends `SchedulingError`
 * for the failures that only exist once storage is involved.
 */

export type SchedulingErrorCode =
  | 'INVALID_GRADE'
  | 'INVALID_REQUEST'
  | 'INVALID_SETTINGS'
  | 'UNKNOWN_CARD'
  | 'CONCURRENT_GRADE_CONFLICT'
  | 'STORE_UNAVAILABLE'
  | 'CONFIG_ERROR';

export class SchedulingError extends Error {
  readonly code: SchedulingErrorCode;
  /** Whether repeating the same call may succeed */
  readonly retryable: boolean;

  constructor(code: SchedulingErrorCode, message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'SchedulingError';
    this.code = code;
    this.retryable = options.retryable ?? false;
  }
}

// JSON.stringify throws on bigints and cycles
function describeValue(value: unknown): string {
  if (typeof value === 'bigint' || typeof value === 'symbol') {
    return String(value);
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

export class InvalidGradeError extends SchedulingError {
  readonly grade: unknown;

  constructor(grade: unknown) {
    super('INVALID_GRADE', `Invalid grade ${describeValue(grade)}: expected 1 (again), 2 (hard), 3 (good) or 4 (easy)`);
    this.name = 'InvalidGradeError';
    this.grade = grade;
  }
}

export class InvalidRequestError extends SchedulingError {
  constructor(message: string) {
    super('INVALID_REQUEST', message);
    this.name = 'InvalidRequestError';
  }
}

export class InvalidSettingsError extends SchedulingError {
  constructor(message: string) {
    super('INVALID_SETTINGS', message);
    this.name = 'InvalidSettingsError';
  }
}
