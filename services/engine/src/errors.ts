import { ZodError } from 'zod';

export class EngineError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 500, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

/** A node id referenced by the graph is missing, or the graph loops back on itself. */
export class DefinitionError extends EngineError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class ValidationError extends EngineError {
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message, 400);
    this.details = details;
  }
}

export type ExecutionErrorKind = 'infrastructure' | 'logical';

/**
 * Raised by the orchestrator when a node cannot complete. `infrastructure` means the executor
 * itself threw; `logical` means it returned `success: false`.
 */
export class ExecutionError extends EngineError {
  readonly kind: ExecutionErrorKind;
  readonly nodeId: string;

  constructor(message: string, options: { kind: ExecutionErrorKind; nodeId: string; cause?: unknown }) {
    super(message, 500, { cause: options.cause });
    this.kind = options.kind;
    this.nodeId = options.nodeId;
  }
}

export class PaginationError extends EngineError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class NotFoundError extends EngineError {
  constructor(message: string) {
    super(message, 404);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join('.') : '<root>';
      return `${location}: ${issue.message}`;
    })
    .join('; ');
}
