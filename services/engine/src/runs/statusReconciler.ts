import { describeError } from '../errors';
import { logger as defaultLogger, type Logger } from '../observability/logger';
import type { EngineMetrics } from '../observability/metrics';
import { withTimeout } from '../runtime/activityRunner';
import { ApplicationFailure, ExecutionNotFoundError, StatusLookupTimeoutError } from '../runtime/errors';
import { isTerminalStatus, type RunStatus } from '../runtime/status';
import type { DurableRuntime } from '../runtime/types';

export const DEFAULT_STATUS_TIMEOUT_MS = 5_000;

export type ResolveRunStatusOptions = {
  logger?: Logger;
  metrics?: EngineMetrics;
  timeoutMs?: number;
};

function fallbackReason(err: unknown): string {
  if (err instanceof ExecutionNotFoundError) {
    return 'not_found';
  }
  if (err instanceof StatusLookupTimeoutError) {
    return 'timeout';
  }
  return 'lookup_error';
}

/**
 * Asks the runtime for the live status of an execution. Lookup failures never reach the caller:
 * an application failure reads as FAILED, anything else as the terminal last-known status or,
 * failing that, RUNNING. A lookup that outlasts `timeoutMs` counts as a failure.
 */
export async function resolveRunStatus(
  runtime: DurableRuntime,
  executionId: string,
  lastKnown: RunStatus | null,
  options: ResolveRunStatusOptions = {}
): Promise<RunStatus> {
  const logger = options.logger ?? defaultLogger;
  const timeoutMs = options.timeoutMs ?? DEFAULT_STATUS_TIMEOUT_MS;
  try {
    return await withTimeout(
      () => runtime.describe(executionId),
      timeoutMs,
      () => new StatusLookupTimeoutError(executionId, timeoutMs)
    );
  } catch (err) {
    if (err instanceof ApplicationFailure) {
      options.metrics?.statusLookupFallbacks.inc({ reason: 'application_failure' });
      return 'FAILED';
    }

    const fallback: RunStatus = lastKnown && isTerminalStatus(lastKnown) ? lastKnown : 'RUNNING';
    options.metrics?.statusLookupFallbacks.inc({ reason: fallbackReason(err) });
    logger.warn('Run status lookup failed; using fallback status', {
      executionId,
      fallback,
      error: describeError(err)
    });
    return fallback;
  }
}
