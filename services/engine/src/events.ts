import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';
import IORedis, { type Redis } from 'ioredis';
import { z } from 'zod';
import { logger as defaultLogger, type Logger } from './observability/logger';
import { parseRunStatus, type RunStatus } from './runtime/status';
import type { RunDomain } from './runtime/types';

export type RunEventSummary = {
  id: number;
  externalExecutionId: string;
  status: RunStatus;
};

export type EngineEvent =
  | { type: 'run.submitted'; data: { domain: RunDomain; run: RunEventSummary } }
  | { type: 'run.completed'; data: { domain: RunDomain; run: RunEventSummary } };

export type EngineEventListener = (event: EngineEvent) => void;

export interface EventBroadcaster {
  readonly mode: 'inline' | 'redis';
  /** Best effort: delivery failures are logged, never thrown. */
  broadcast(event: EngineEvent): Promise<void>;
  subscribe(listener: EngineEventListener): () => void;
  close(): Promise<void>;
}

export type EventBroadcasterOptions = {
  redisUrl: string | null;
  channel: string;
  logger?: Logger;
  createRedis?: (url: string) => Redis;
};

const runStatusSchema = z.string().transform((value, ctx) => {
  const status = parseRunStatus(value);
  if (!status) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown run status ${value}` });
    return z.NEVER;
  }
  return status;
});

const eventDataSchema = z.object({
  domain: z.enum(['pipeline', 'policy']),
  run: z.object({
    id: z.number().int(),
    externalExecutionId: z.string(),
    status: runStatusSchema
  })
});

const envelopeSchema = z.object({
  origin: z.string(),
  event: z.object({
    type: z.enum(['run.submitted', 'run.completed']),
    data: eventDataSchema
  })
});

function parseEnvelope(message: string): { origin: string; event: EngineEvent } | null {
  let raw: unknown;
  try {
    raw = JSON.parse(message);
  } catch {
    return null;
  }
  const parsed = envelopeSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

function isConnectionRefused(err: unknown): boolean {
  if (!(err instanceof Error)) {
    return false;
  }
  return Reflect.get(err, 'code') === 'ECONNREFUSED' || err.message.includes('ECONNREFUSED');
}

export function createEventBroadcaster(options: EventBroadcasterOptions): EventBroadcaster {
  const logger = options.logger ?? defaultLogger;
  const bus = new EventEmitter();
  bus.setMaxListeners(0);
  const originId = `${process.pid}:${randomUUID()}`;

  let publisher: Redis | null = null;
  let subscriber: Redis | null = null;
  let redisFailureNotified = false;

  const emitLocal = (event: EngineEvent) => {
    bus.emit('event', event);
  };

  const disableRedis = (reason: string) => {
    if (!redisFailureNotified) {
      logger.warn('Falling back to in-process event delivery', { reason });
      redisFailureNotified = true;
    }
    for (const client of [publisher, subscriber]) {
      if (client) {
        client.removeAllListeners();
        client.disconnect();
      }
    }
    publisher = null;
    subscriber = null;
  };

  if (options.redisUrl) {
    const create =
      options.createRedis ?? ((url: string) => new IORedis(url, { maxRetriesPerRequest: null }));
    const onError = (role: string) => (err: unknown) => {
      if (isConnectionRefused(err)) {
        disableRedis('Redis unavailable');
        return;
      }
      logger.error('Redis event channel error', {
        role,
        error: err instanceof Error ? err.message : String(err)
      });
    };

    publisher = create(options.redisUrl);
    publisher.on('error', onError('publisher'));

    subscriber = create(options.redisUrl);
    subscriber.on('error', onError('subscriber'));
    subscriber.on('message', (channel: string, message: string) => {
      if (channel !== options.channel) {
        return;
      }
      const envelope = parseEnvelope(message);
      if (!envelope || envelope.origin === originId) {
        return;
      }
      emitLocal(envelope.event);
    });
    subscriber.subscribe(options.channel).catch((err: unknown) => {
      logger.error('Failed to subscribe to event channel', {
        channel: options.channel,
        error: err instanceof Error ? err.message : String(err)
      });
    });
  }

  return {
    get mode() {
      return publisher ? 'redis' : 'inline';
    },

    async broadcast(event) {
      emitLocal(event);
      if (!publisher) {
        return;
      }
      try {
        await publisher.publish(options.channel, JSON.stringify({ origin: originId, event }));
      } catch (err) {
        logger.error('Failed to publish event', {
          type: event.type,
          error: err instanceof Error ? err.message : String(err)
        });
      }
    },

    subscribe(listener) {
      const wrapped = (event: EngineEvent) => {
        try {
          listener(event);
        } catch (err) {
          logger.error('Event listener failed', {
            type: event.type,
            error: err instanceof Error ? err.message : String(err)
          });
        }
      };
      bus.on('event', wrapped);
      return () => {
        bus.off('event', wrapped);
      };
    },

    async close() {
      bus.removeAllListeners();
      const clients = [publisher, subscriber];
      publisher = null;
      subscriber = null;
      for (const client of clients) {
        if (client) {
          await client.quit().catch(() => undefined);
        }
      }
    }
  };
}
