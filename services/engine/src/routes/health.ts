import type { FastifyInstance } from 'fastify';
import type { AppContext } from '../types';

export const registerHealthRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.get('/health', async () => ({ status: 'ok' }));

  app.get('/metrics', async (request, reply) => {
    await ctx.engine.queueManager.collectMetrics();
    reply.header('Content-Type', ctx.metrics.register.contentType);
    return ctx.metrics.register.metrics();
  });
};
