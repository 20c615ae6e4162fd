import assert from 'node:assert/strict';
import { test } from 'node:test';

import { createLogger, normalizeMeta, type LogPayload } from '../src/observability/logger';

test('metadata is normalised into JSON values', () => {
  assert.deepEqual(
    normalizeMeta({
      at: new Date(Date.UTC(2024, 2, 1, 12, 0, 0)),
      error: new Error('boom'),
      skipped: undefined,
      nested: { list: [1, undefined, 'two'] }
    }),
    {
      at: '2024-03-01T12:00:00.000Z',
      error: 'boom',
      nested: { list: [1, 'two'] }
    }
  );
  assert.equal(normalizeMeta({ skipped: undefined }), undefined);
});

test('long strings are chunked and the source is stamped on every entry', () => {
  const entries: LogPayload[] = [];
  const logger = createLogger({ source: 'engine-tests', stringChunkSize: 1024, write: (payload) => entries.push(payload) });

  logger.warn('Large payload', { body: 'x'.repeat(2_500) });
  logger.info('No metadata');

  assert.equal(entries.length, 2);
  assert.equal(entries[0]?.level, 'warn');
  assert.equal(entries[0]?.source, 'engine-tests');
  const body = entries[0]?.meta?.body;
  assert.ok(Array.isArray(body));
  assert.deepEqual(
    body.map((chunk) => (typeof chunk === 'string' ? chunk.length : -1)),
    [1024, 1024, 452]
  );
  assert.equal(entries[1]?.meta, undefined);
  assert.equal('meta' in (entries[1] ?? {}), false);
});
