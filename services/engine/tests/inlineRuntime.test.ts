import assert from 'node:assert/strict';
import { test } from 'node:test';

import type { ActivityHandlers, HttpRequestInput } from '../src/activities/types';
import { HTTP_ACTIVITY_OPTIONS } from '../src/nodes/http';
import { InlineRuntime } from '../src/runtime/inline';
import type { ActivityOptions } from '../src/runtime/retryPolicy';
import type { RunHandler } from '../src/runtime/types';
import { httpDefinition } from './helpers/definitions';
import { createCapturingLogger } from './helpers/logger';

const REQUEST: HttpRequestInput = { url: 'http://svc.test/orders', method: 'GET', headers: {} };

const callActivity =
  (options: ActivityOptions = HTTP_ACTIVITY_OPTIONS): RunHandler =>
  async (_definition, context) => {
    await context.activities.execute('http.request', REQUEST, options);
  };

const flakyHandlers = (failures: number) => {
  let attempts = 0;
  const handlers: ActivityHandlers = {
    'http.request': async () => {
      attempts += 1;
      if (attempts <= failures) {
        throw new Error('connect ECONNREFUSED');
      }
      return { statusCode: 200, headers: {}, body: 'ok' };
    }
  };
  return { handlers, attempts: () => attempts };
};

const recordingSleep = () => {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    }
  };
};

test('activities are retried with exponential backoff until they succeed', async () => {
  const { handlers, attempts } = flakyHandlers(2);
  const { delays, sleep } = recordingSleep();
  const capture = createCapturingLogger();
  const runtime = new InlineRuntime({ handler: callActivity(), activities: handlers, logger: capture.logger, sleep });

  await runtime.start({ executionId: 'exec-1', domain: 'pipeline', definition: httpDefinition('orders', REQUEST.url) });
  assert.equal(await runtime.waitForCompletion('exec-1'), 'COMPLETED');

  assert.equal(attempts(), 3);
  assert.deepEqual(delays, [1_000, 2_000]);
  assert.deepEqual(capture.messages('warn'), ['Activity attempt failed; retrying', 'Activity attempt failed; retrying']);
});

test('retries stop after the maximum attempts and fail the run', async () => {
  const { handlers, attempts } = flakyHandlers(10);
  const { delays, sleep } = recordingSleep();
  const { logger } = createCapturingLogger();
  const runtime = new InlineRuntime({ handler: callActivity(), activities: handlers, logger, sleep });

  await runtime.start({ executionId: 'exec-2', domain: 'policy', definition: httpDefinition('orders', REQUEST.url) });

  assert.equal(await runtime.waitForCompletion('exec-2'), 'FAILED');
  assert.equal(attempts(), 3);
  assert.deepEqual(delays, [1_000, 2_000]);
  assert.equal(runtime.getFailure('exec-2'), 'connect ECONNREFUSED');
});

test('runs start after start() resolves', async () => {
  let calls = 0;
  const { logger } = createCapturingLogger();
  const runtime = new InlineRuntime({
    handler: async () => {
      calls += 1;
    },
    activities: flakyHandlers(0).handlers,
    logger
  });

  const id = await runtime.start({ executionId: 'exec-3', domain: 'pipeline', definition: httpDefinition('a', REQUEST.url) });
  assert.equal(id, 'exec-3');
  assert.equal(await runtime.describe('exec-3'), 'RUNNING');
  assert.equal(calls, 0);

  await runtime.drain();
  assert.equal(calls, 1);
  assert.equal(await runtime.describe('exec-3'), 'COMPLETED');
});

test('an execution id can only be started once', async () => {
  const { logger } = createCapturingLogger();
  const runtime = new InlineRuntime({ handler: async () => {}, activities: flakyHandlers(0).handlers, logger });
  const input = { executionId: 'exec-4', domain: 'pipeline' as const, definition: httpDefinition('a', REQUEST.url) };

  await runtime.start(input);
  await assert.rejects(runtime.start(input), {
    name: 'ExecutionAlreadyStartedError',
    statusCode: 409,
    message: 'execution exec-4 already started'
  });
  await runtime.close();
});

test('describing an unknown execution fails', async () => {
  const { logger } = createCapturingLogger();
  const runtime = new InlineRuntime({ handler: async () => {}, activities: flakyHandlers(0).handlers, logger });

  await assert.rejects(runtime.describe('missing'), {
    name: 'ExecutionNotFoundError',
    message: 'execution missing not found'
  });
});

test('an activity that outlives its start-to-close timeout fails the attempt', async () => {
  const { logger } = createCapturingLogger();
  const handlers: ActivityHandlers = {
    'http.request': () => new Promise(() => {})
  };
  const runtime = new InlineRuntime({
    handler: callActivity({ retry: { ...HTTP_ACTIVITY_OPTIONS.retry, maximumAttempts: 1 }, startToCloseTimeoutMs: 20 }),
    activities: handlers,
    logger
  });

  await runtime.start({ executionId: 'exec-5', domain: 'pipeline', definition: httpDefinition('a', REQUEST.url) });

  assert.equal(await runtime.waitForCompletion('exec-5'), 'FAILED');
  assert.equal(runtime.getFailure('exec-5'), 'activity http.request timed out after 20ms');
});

test('finished executions beyond the retention limit are forgotten oldest first', async () => {
  const { logger } = createCapturingLogger();
  const runtime = new InlineRuntime({
    handler: async () => {},
    activities: flakyHandlers(0).handlers,
    logger,
    maxRetainedExecutions: 2
  });

  for (const executionId of ['exec-a', 'exec-b', 'exec-c']) {
    await runtime.start({ executionId, domain: 'pipeline', definition: httpDefinition('a', REQUEST.url) });
    await runtime.waitForCompletion(executionId);
  }

  await assert.rejects(runtime.describe('exec-a'), { name: 'ExecutionNotFoundError' });
  assert.equal(await runtime.describe('exec-b'), 'COMPLETED');
  assert.equal(await runtime.describe('exec-c'), 'COMPLETED');
});

test('running executions are never evicted', async () => {
  const { logger } = createCapturingLogger();
  let release = () => {};
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  const runtime = new InlineRuntime({
    handler: async (_definition, context) => {
      if (context.executionId === 'slow') {
        await gate;
      }
    },
    activities: flakyHandlers(0).handlers,
    logger,
    maxRetainedExecutions: 1
  });
  const definition = httpDefinition('a', REQUEST.url);

  await runtime.start({ executionId: 'slow', domain: 'pipeline', definition });
  await runtime.start({ executionId: 'fast-1', domain: 'pipeline', definition });
  await runtime.start({ executionId: 'fast-2', domain: 'pipeline', definition });
  await runtime.waitForCompletion('fast-2');

  assert.equal(await runtime.describe('slow'), 'RUNNING');
  await assert.rejects(runtime.describe('fast-1'), { name: 'ExecutionNotFoundError' });

  release();
  assert.equal(await runtime.waitForCompletion('slow'), 'COMPLETED');
  await assert.rejects(runtime.describe('fast-2'), { name: 'ExecutionNotFoundError' });
  assert.equal(await runtime.describe('slow'), 'COMPLETED');
});
