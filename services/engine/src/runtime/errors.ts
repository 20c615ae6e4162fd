import { EngineError, describeError } from '../errors';

/** Application-level failure reported by the runtime; status reconciliation maps it to FAILED. */
export class ApplicationFailure extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ApplicationFailure';
  }
}

export class ActivityFailure extends Error {
  readonly activity: string;
  readonly attempts: number;

  constructor(activity: string, attempts: number, cause: unknown) {
    super(describeError(cause), { cause });
    this.name = 'ActivityFailure';
    this.activity = activity;
    this.attempts = attempts;
  }
}

export class ActivityTimeoutError extends Error {
  constructor(activity: string, timeoutMs: number) {
    super(`activity ${activity} timed out after ${timeoutMs}ms`);
    this.name = 'ActivityTimeoutError';
  }
}

export class StatusLookupTimeoutError extends Error {
  constructor(executionId: string, timeoutMs: number) {
    super(`status lookup for ${executionId} timed out after ${timeoutMs}ms`);
    this.name = 'StatusLookupTimeoutError';
  }
}

export class ExecutionNotFoundError extends Error {
  readonly executionId: string;

  constructor(executionId: string) {
    super(`execution ${executionId} not found`);
    this.name = 'ExecutionNotFoundError';
    this.executionId = executionId;
  }
}

export class ExecutionAlreadyStartedError extends EngineError {
  readonly executionId: string;

  constructor(executionId: string) {
    super(`execution ${executionId} already started`, 409);
    this.executionId = executionId;
  }
}
