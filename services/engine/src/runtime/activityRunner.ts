import { ActivityFailure, ActivityTimeoutError } from './errors';
import { computeRetryDelay, type ActivityOptions } from './retryPolicy';
import type { Logger } from '../observability/logger';

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/** Rejects with `onTimeout()` when `work` has not settled within `timeoutMs`. */
export async function withTimeout<T>(
  work: () => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });
  try {
    return await Promise.race([work(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export type RetryingRunOptions = {
  activity: string;
  executionId: string;
  options: ActivityOptions;
  logger: Logger;
  sleep?: Sleep;
};

/**
 * Runs an activity in-process under its retry policy. Every attempt is bounded by the
 * start-to-close timeout; the last failure is wrapped in an ActivityFailure.
 */
export async function runWithRetries<T>(work: () => Promise<T>, params: RetryingRunOptions): Promise<T> {
  const { activity, executionId, options, logger } = params;
  const sleep = params.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, options.retry.maximumAttempts);

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await withTimeout(
        work,
        options.startToCloseTimeoutMs,
        () => new ActivityTimeoutError(activity, options.startToCloseTimeoutMs)
      );
    } catch (err) {
      if (attempt >= maxAttempts) {
        throw new ActivityFailure(activity, attempt, err);
      }
      const delayMs = computeRetryDelay(options.retry, attempt);
      logger.warn('Activity attempt failed; retrying', {
        activity,
        executionId,
        attempt,
        delayMs,
        error: err instanceof Error ? err.message : String(err)
      });
      await sleep(delayMs);
    }
  }
}
