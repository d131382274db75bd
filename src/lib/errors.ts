import type { ZodIssue } from 'zod';

export type TimeTrackingErrorCode =
  | 'ALREADY_CLOCKED_IN'
  | 'NOT_CLOCKED_IN'
  | 'INVALID_STATE'
  | 'STORE_ERROR'
  | 'VALIDATION_ERROR';

/**
 * Base class for every failure the engine reports. Callers switch on `code`
 * rather than on the class so the value survives serialization.
 */
export class TimeTrackingError extends Error {
  public readonly code: TimeTrackingErrorCode;

  constructor(code: TimeTrackingErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TimeTrackingError';
    this.code = code;
  }
}

export class AlreadyClockedInError extends TimeTrackingError {
  public readonly workerId: string;

  constructor(workerId: string) {
    super('ALREADY_CLOCKED_IN', 'Worker is already clocked in');
    this.name = 'AlreadyClockedInError';
    this.workerId = workerId;
  }
}

export class NotClockedInError extends TimeTrackingError {
  public readonly workerId: string;

  constructor(workerId: string) {
    super('NOT_CLOCKED_IN', 'Worker is not currently clocked in');
    this.name = 'NotClockedInError';
    this.workerId = workerId;
  }
}

export class InvalidStateError extends TimeTrackingError {
  constructor(message: string) {
    super('INVALID_STATE', message);
    this.name = 'InvalidStateError';
  }
}

export type StoreErrorReason = 'conflict' | 'not_found' | 'io';

export class StoreError extends TimeTrackingError {
  public readonly reason: StoreErrorReason;

  constructor(reason: StoreErrorReason, message: string, cause?: unknown) {
    super('STORE_ERROR', message, { cause });
    this.name = 'StoreError';
    this.reason = reason;
  }
}

export class ValidationError extends TimeTrackingError {
  public readonly issues: ZodIssue[];

  constructor(message: string, issues: ZodIssue[] = []) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export function isTimeTrackingError(error: unknown): error is TimeTrackingError {
  return error instanceof TimeTrackingError;
}
