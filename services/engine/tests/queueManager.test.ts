import assert from 'node:assert/strict';
import { test } from 'node:test';

import type { QueueTelemetryEvent } from '../src/observability/metrics';
import { QUEUE_KEYS, registerEngineQueues } from '../src/queue';
import { QueueManager } from '../src/queueManager';

test('inline mode registers queues without touching redis', async () => {
  const events: QueueTelemetryEvent[] = [];
  const manager = new QueueManager({ redisUrl: 'inline', inlineMode: true, telemetry: (event) => events.push(event) });

  registerEngineQueues(manager, { runs: 'test-runs', activities: 'test-activities' });

  assert.equal(manager.isInlineMode(), true);
  assert.equal(manager.getQueueName(QUEUE_KEYS.runs), 'test-runs');
  assert.equal(manager.getQueueName(QUEUE_KEYS.activities), 'test-activities');
  assert.equal(manager.tryGetQueue(QUEUE_KEYS.runs), null);
  assert.throws(() => manager.getQueue(QUEUE_KEYS.runs), { message: 'Queue unavailable in inline mode' });
  assert.throws(() => manager.getConnection(), { message: 'Redis connection unavailable in inline mode' });
  assert.deepEqual(events, [
    { type: 'register', queue: 'test-runs', mode: 'inline' },
    { type: 'register', queue: 'test-activities', mode: 'inline' }
  ]);

  await manager.collectMetrics();
  await manager.verifyConnectivity();
  await manager.close();
  assert.equal(events.length, 2);
});

test('a queue key can only be registered once', () => {
  const manager = new QueueManager({ redisUrl: 'inline', inlineMode: true, telemetry: () => {} });
  manager.registerQueue({ key: 'runs', queueName: 'a' });
  assert.throws(() => manager.registerQueue({ key: 'runs', queueName: 'b' }), {
    message: 'Queue with key runs is already registered'
  });
  assert.throws(() => manager.getQueueName('unknown'), { message: 'Queue with key unknown has not been registered' });
});

test('REDIS_URL=inline requires inline mode', () => {
  assert.throws(() => new QueueManager({ redisUrl: 'inline', inlineMode: false }), {
    message: 'REDIS_URL=inline is only supported when inline mode is enabled'
  });
});
