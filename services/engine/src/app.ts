import fastify, { type FastifyInstance } from 'fastify';
import { stdTimeFunctions } from 'pino';
import type { EngineConfig } from './config';
import { createEngine, type EngineOptions } from './engine';
import { registerHealthRoutes } from './routes/health';
import { registerRunRoutes } from './routes/runs';
import { RUN_DOMAINS } from './runs/types';
import type { AppContext } from './types';

type SerializablePrimitive = string | number | boolean | null;

function sanitizePayload(value: unknown, depth = 0): unknown {
  if (value === null || value === undefined) {
    return null;
  }

  if (depth > 2) {
    return '[Truncated]';
  }

  if (typeof value === 'string') {
    return value.length > 2048 ? `${value.slice(0, 2048)}…` : value;
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    const primitive: SerializablePrimitive = value;
    return primitive;
  }

  if (Array.isArray(value)) {
    return value.slice(0, 20).map((entry) => sanitizePayload(entry, depth + 1));
  }

  if (typeof value === 'object') {
    const result: Record<string, unknown> = {};
    let count = 0;
    for (const [key, entry] of Object.entries(value)) {
      result[key] = sanitizePayload(entry, depth + 1);
      count += 1;
      if (count >= 20) {
        result['__truncated__'] = true;
        break;
      }
    }
    return result;
  }

  return '[Unserializable]';
}

interface CreateAppResult {
  app: FastifyInstance;
  ctx: AppContext;
}

export type CreateAppOptions = Omit<EngineOptions, 'config'> & {
  /** Pino logging for requests; disabled in tests. */
  requestLogging?: boolean;
};

export const createApp = async (
  config: EngineConfig,
  options: CreateAppOptions = {}
): Promise<CreateAppResult> => {
  const { requestLogging = true, ...engineOptions } = options;
  const app = fastify({
    logger: requestLogging
      ? { level: config.logLevel, base: undefined, timestamp: stdTimeFunctions.isoTime }
      : false
  });

  const engine = createEngine({ ...engineOptions, config });
  const ctx: AppContext = {
    config,
    engine,
    metrics: engine.metrics
  };

  app.setErrorHandler((error, request, reply) => {
    const explicitStatus = error.statusCode;
    const statusCode = typeof explicitStatus === 'number' && explicitStatus >= 400 ? explicitStatus : 500;

    const logPayload = {
      err: error,
      request: {
        id: request.id,
        method: request.method,
        url: request.url,
        params: sanitizePayload(request.params),
        query: sanitizePayload(request.query),
        body: sanitizePayload(request.body)
      }
    };

    if (statusCode >= 500) {
      request.log.error(logPayload, 'Unhandled request error');
    } else {
      request.log.warn(logPayload, 'Request failed with handled error');
    }

    if (reply.raw.headersSent) {
      return;
    }

    reply.status(statusCode);

    if (statusCode >= 500) {
      void reply.send({ error: 'Internal Server Error' });
      return;
    }

    void reply.send({ error: error.message.length > 0 ? error.message : 'Request failed' });
  });

  registerHealthRoutes(app, ctx);
  for (const domain of RUN_DOMAINS) {
    registerRunRoutes(app, ctx, domain);
  }

  app.addHook('onClose', async () => {
    await engine.close();
  });

  return { app, ctx };
};
