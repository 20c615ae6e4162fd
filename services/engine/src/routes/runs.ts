import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { parseDefinition } from '../definitions/parse';
import { parseRunStatus } from '../runtime/status';
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from '../runs/service';
import type { RunDomain } from '../runs/types';
import type { AppContext } from '../types';

const numberParam = (val: unknown) => (val === undefined || val === '' ? undefined : Number(val));

const dateParam = z
  .string()
  .trim()
  .optional()
  .refine((value) => !value || !Number.isNaN(Date.parse(value)), { message: 'Invalid date' });

const runIdParamsSchema = z.object({
  id: z.preprocess((val) => Number(val), z.number().int().positive())
});

const listRunsQuerySchema = z.object({
  page: z.preprocess(numberParam, z.number().int().min(1).default(1)),
  pageSize: z.preprocess(numberParam, z.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE)),
  status: z
    .string()
    .trim()
    .optional()
    .transform((value, ctx) => {
      if (!value) {
        return undefined;
      }
      const status = parseRunStatus(value);
      if (!status) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown status ${value}` });
        return z.NEVER;
      }
      return status;
    }),
  search: z.string().trim().optional(),
  submittedAfter: dateParam,
  submittedBefore: dateParam,
  completedAfter: dateParam,
  completedBefore: dateParam
});

export const registerRunRoutes = (app: FastifyInstance, ctx: AppContext, domain: RunDomain) => {
  const service = ctx.engine.getService(domain);

  app.post(`/${domain}`, async (request, reply) => {
    const definition = parseDefinition(request.body);
    const run = await service.submit(definition);
    reply.status(201);
    return run;
  });

  app.get(`/${domain}/:id`, async (request, reply) => {
    const parseParams = runIdParamsSchema.safeParse(request.params);
    if (!parseParams.success) {
      reply.status(400);
      return { error: parseParams.error.flatten() };
    }
    return service.getRun(parseParams.data.id);
  });

  app.get(`/${domain}`, async (request, reply) => {
    const parseQuery = listRunsQuerySchema.safeParse(request.query ?? {});
    if (!parseQuery.success) {
      reply.status(400);
      return { error: parseQuery.error.flatten() };
    }
    return service.listRuns(parseQuery.data);
  });
};
