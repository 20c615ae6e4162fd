export type BackoffOptions = {
  baseMs?: number;
  factor?: number;
  maxMs?: number;
  jitterRatio?: number;
  random?: () => number;
};

const DEFAULT_BACKOFF: Required<Omit<BackoffOptions, 'random'>> = {
  baseMs: 1_000,
  factor: 2,
  maxMs: 60_000,
  jitterRatio: 0
};

function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) {
    return min;
  }
  return Math.min(Math.max(value, min), max);
}

/**
 * Delay before the attempt that follows `attempt` (1-based): `baseMs * factor^(attempt - 1)`,
 * capped at `maxMs` and optionally spread by `jitterRatio` in both directions.
 */
export function computeExponentialBackoff(attempt: number, options: BackoffOptions = {}): number {
  const normalizedAttempt = Math.max(1, Math.floor(attempt));

  const {
    baseMs = DEFAULT_BACKOFF.baseMs,
    factor = DEFAULT_BACKOFF.factor,
    maxMs = DEFAULT_BACKOFF.maxMs,
    jitterRatio = DEFAULT_BACKOFF.jitterRatio,
    random = Math.random
  } = options;

  const rawDelay = baseMs * Math.pow(factor, normalizedAttempt - 1);
  const cappedDelay = clamp(rawDelay, baseMs, Math.max(baseMs, maxMs));

  if (jitterRatio <= 0) {
    return Math.round(cappedDelay);
  }

  const jitterSpan = cappedDelay * jitterRatio;
  const jitter = (random() * 2 - 1) * jitterSpan;
  return Math.round(clamp(cappedDelay + jitter, baseMs, Math.max(baseMs, maxMs)));
}
