import assert from 'node:assert/strict';
import { test } from 'node:test';

import { HTTP_ACTIVITY_OPTIONS, HTTP_RETRY_POLICY } from '../src/nodes/http';
import { createMetrics } from '../src/observability/metrics';
import { resolveRunStatus } from '../src/runs/statusReconciler';
import { retryPolicyBackoffStrategy } from '../src/runtime/bullmq';
import { ApplicationFailure, ExecutionNotFoundError } from '../src/runtime/errors';
import { computeActivityDeadline } from '../src/runtime/retryPolicy';
import { isTerminalStatus, mapJobState, parseRunStatus } from '../src/runtime/status';
import { createCapturingLogger } from './helpers/logger';
import { StubRuntime } from './helpers/stubRuntime';

test('the live runtime status wins when the lookup succeeds', async () => {
  const runtime = new StubRuntime();
  runtime.statuses.set('exec-1', 'TIMED_OUT');
  const { logger } = createCapturingLogger();

  assert.equal(await resolveRunStatus(runtime, 'exec-1', 'RUNNING', { logger }), 'TIMED_OUT');
});

test('an application failure reads as FAILED', async () => {
  const runtime = new StubRuntime();
  runtime.failures.set('exec-1', new ApplicationFailure('workflow task failed'));
  const { logger } = createCapturingLogger();

  assert.equal(await resolveRunStatus(runtime, 'exec-1', 'RUNNING', { logger }), 'FAILED');
});

test('other lookup failures fall back to RUNNING', async () => {
  const runtime = new StubRuntime();
  runtime.failures.set('exec-1', new Error('connection reset'));
  runtime.failures.set('exec-2', new ExecutionNotFoundError('exec-2'));
  const capture = createCapturingLogger();
  const metrics = createMetrics();

  assert.equal(await resolveRunStatus(runtime, 'exec-1', 'RUNNING', { logger: capture.logger, metrics }), 'RUNNING');
  assert.equal(await resolveRunStatus(runtime, 'exec-1', null, { logger: capture.logger, metrics }), 'RUNNING');
  assert.equal(await resolveRunStatus(runtime, 'exec-2', null, { logger: capture.logger, metrics }), 'RUNNING');

  const { values } = await metrics.statusLookupFallbacks.get();
  assert.deepEqual(
    values.map((entry) => [entry.labels.reason, entry.value]),
    [
      ['lookup_error', 2],
      ['not_found', 1]
    ]
  );
  assert.deepEqual(capture.entries[0]?.meta, {
    executionId: 'exec-1',
    fallback: 'RUNNING',
    error: 'connection reset'
  });
});

test('a terminal last-known status survives a lookup failure', async () => {
  const runtime = new StubRuntime();
  runtime.failures.set('exec-1', new Error('connection reset'));
  const { logger } = createCapturingLogger();

  assert.equal(await resolveRunStatus(runtime, 'exec-1', 'COMPLETED', { logger }), 'COMPLETED');
});

test('a lookup that never answers falls back once the timeout passes', async () => {
  const runtime = new StubRuntime();
  runtime.unresponsive.add('exec-1');
  const capture = createCapturingLogger();
  const metrics = createMetrics();

  const status = await resolveRunStatus(runtime, 'exec-1', 'RUNNING', {
    logger: capture.logger,
    metrics,
    timeoutMs: 20
  });

  assert.equal(status, 'RUNNING');
  const { values } = await metrics.statusLookupFallbacks.get();
  assert.deepEqual(
    values.map((entry) => [entry.labels.reason, entry.value]),
    [['timeout', 1]]
  );
  assert.deepEqual(capture.entries[0]?.meta, {
    executionId: 'exec-1',
    fallback: 'RUNNING',
    error: 'status lookup for exec-1 timed out after 20ms'
  });
});

test('a timed-out lookup keeps a terminal last-known status', async () => {
  const runtime = new StubRuntime();
  runtime.unresponsive.add('exec-1');
  const { logger } = createCapturingLogger();

  assert.equal(await resolveRunStatus(runtime, 'exec-1', 'FAILED', { logger, timeoutMs: 20 }), 'FAILED');
});

test('job states map onto run statuses', () => {
  assert.equal(mapJobState('completed'), 'COMPLETED');
  assert.equal(mapJobState('failed'), 'FAILED');
  assert.equal(mapJobState('waiting-children'), 'RUNNING');
  assert.equal(mapJobState('delayed'), 'RUNNING');
  assert.equal(mapJobState('unknown'), 'UNKNOWN(unknown)');
});

test('status strings parse case-insensitively and keep unknown codes', () => {
  assert.equal(parseRunStatus('failed'), 'FAILED');
  assert.equal(parseRunStatus(' continued_as_new '), 'CONTINUED_AS_NEW');
  assert.equal(parseRunStatus('UNKNOWN(7)'), 'UNKNOWN(7)');
  assert.equal(parseRunStatus('bogus'), null);
  assert.equal(parseRunStatus(null), null);
  assert.equal(isTerminalStatus('RUNNING'), false);
  assert.equal(isTerminalStatus('UNKNOWN(7)'), false);
  assert.equal(isTerminalStatus('CANCELLED'), true);
});

test('queued activity retries follow the retry policy', () => {
  const job = { data: { retryPolicy: HTTP_RETRY_POLICY } };
  assert.equal(retryPolicyBackoffStrategy(1, 'retry-policy', undefined, job), 1_000);
  assert.equal(retryPolicyBackoffStrategy(2, 'retry-policy', undefined, job), 2_000);
  assert.equal(retryPolicyBackoffStrategy(10, 'retry-policy', undefined, job), 60_000);
  assert.equal(retryPolicyBackoffStrategy(1, 'fixed', undefined, job), 0);
  assert.equal(retryPolicyBackoffStrategy(1, 'retry-policy', undefined, { data: { retryPolicy: 'soon' } }), 0);
});

test('waiting on a queued activity is bounded by every attempt plus its backoff', () => {
  assert.equal(computeActivityDeadline(HTTP_ACTIVITY_OPTIONS), 60_000 * 3 + 1_000 + 2_000);
  assert.equal(
    computeActivityDeadline({ retry: { ...HTTP_RETRY_POLICY, maximumAttempts: 1 }, startToCloseTimeoutMs: 500 }),
    500
  );
  assert.equal(
    computeActivityDeadline({
      retry: { initialIntervalMs: 100, backoffCoefficient: 3, maximumIntervalMs: 500, maximumAttempts: 4 },
      startToCloseTimeoutMs: 1_000
    }),
    4_000 + 100 + 300 + 500
  );
});
