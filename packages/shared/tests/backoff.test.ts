import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { computeExponentialBackoff } from '../src/retries/backoff';

describe('computeExponentialBackoff', () => {
  it('doubles the delay per attempt without jitter', () => {
    const options = { baseMs: 1_000, factor: 2, maxMs: 60_000 };
    assert.equal(computeExponentialBackoff(1, options), 1_000);
    assert.equal(computeExponentialBackoff(2, options), 2_000);
    assert.equal(computeExponentialBackoff(3, options), 4_000);
  });

  it('caps the delay at maxMs', () => {
    const delay = computeExponentialBackoff(10, { baseMs: 1_000, factor: 2, maxMs: 60_000 });
    assert.equal(delay, 60_000);
  });

  it('applies exponential growth with deterministic jitter', () => {
    const delay = computeExponentialBackoff(1, {
      baseMs: 1_000,
      factor: 2,
      maxMs: 10_000,
      jitterRatio: 0.1,
      random: () => 1
    });

    assert.equal(delay, 1_100);
  });

  it('clamps jittered value to minimum base', () => {
    const delay = computeExponentialBackoff(2, {
      baseMs: 1_000,
      factor: 2,
      maxMs: 10_000,
      jitterRatio: 0.5,
      random: () => 0
    });

    assert.equal(delay, 1_000);
  });

  it('treats attempts below one as the first attempt', () => {
    assert.equal(computeExponentialBackoff(0, { baseMs: 250, factor: 3 }), 250);
  });
});
