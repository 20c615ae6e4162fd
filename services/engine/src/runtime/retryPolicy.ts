import { z } from 'zod';
import { computeExponentialBackoff } from '@stepgraph/shared';

export const retryPolicySchema = z.object({
  initialIntervalMs: z.number().int().positive(),
  backoffCoefficient: z.number().min(1),
  maximumIntervalMs: z.number().int().positive(),
  maximumAttempts: z.number().int().min(1)
});

export type RetryPolicy = z.infer<typeof retryPolicySchema>;

export type ActivityOptions = {
  retry: RetryPolicy;
  startToCloseTimeoutMs: number;
};

/** Delay before the attempt that follows the given (1-based) failed attempt. */
export function computeRetryDelay(policy: RetryPolicy, failedAttempt: number): number {
  return computeExponentialBackoff(failedAttempt, {
    baseMs: policy.initialIntervalMs,
    factor: policy.backoffCoefficient,
    maxMs: policy.maximumIntervalMs,
    jitterRatio: 0
  });
}

/** Longest an activity can take across every attempt and the backoff between them. */
export function computeActivityDeadline(options: ActivityOptions): number {
  const attempts = Math.max(1, options.retry.maximumAttempts);
  let total = options.startToCloseTimeoutMs * attempts;
  for (let failedAttempt = 1; failedAttempt < attempts; failedAttempt += 1) {
    total += computeRetryDelay(options.retry, failedAttempt);
  }
  return total;
}
