import { z } from 'zod';
import type { HttpRequestInput, HttpResponse } from '../activities/types';
import { ValidationError, describeError, formatZodIssues } from '../errors';
import type { ActivityOptions, RetryPolicy } from '../runtime/retryPolicy';
import type { NodeExecutionContext, NodeExecutor, NodeResult } from './types';

export const HTTP_RETRY_POLICY: RetryPolicy = {
  initialIntervalMs: 1_000,
  backoffCoefficient: 2,
  maximumIntervalMs: 60_000,
  maximumAttempts: 3
};

export const HTTP_ACTIVITY_OPTIONS: ActivityOptions = {
  retry: HTTP_RETRY_POLICY,
  startToCloseTimeoutMs: 60_000
};

const headersSchema = z.record(z.string()).nullable().optional();

// `Headers` and `Body` are accepted for configs written against the capitalised field names.
const requestSchema = z.object({
  url: z.string().optional(),
  method: z.string().optional(),
  headers: headersSchema,
  Headers: headersSchema,
  body: z.unknown(),
  Body: z.unknown()
});

const configObjectSchema = z.object({
  url: z.string().optional(),
  method: z.string().optional(),
  requests: z.array(requestSchema).nullable().optional()
});

const configSchema = z.union([z.array(requestSchema), configObjectSchema]);

export type HttpRequestSpec = {
  url: string;
  method: string;
  headers: Record<string, string>;
  body?: string;
};

export type HttpNodeConfig = {
  url: string;
  method: string;
  requests: HttpRequestSpec[];
};

function serializeBody(value: unknown): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  return typeof value === 'string' ? value : JSON.stringify(value);
}

function normalizeRequest(raw: z.infer<typeof requestSchema>): HttpRequestSpec {
  const body = serializeBody(raw.body !== undefined ? raw.body : raw.Body);
  return {
    url: raw.url ?? '',
    method: raw.method ?? '',
    headers: raw.headers ?? raw.Headers ?? {},
    ...(body !== undefined ? { body } : {})
  };
}

/** Accepts `{ url?, method?, requests? }` or a bare array of requests. */
export function parseHttpNodeConfig(config: unknown): HttpNodeConfig {
  const result = configSchema.safeParse(config ?? {});
  if (!result.success) {
    throw new ValidationError(`invalid http node config: ${formatZodIssues(result.error)}`);
  }

  const value = result.data;
  if (Array.isArray(value)) {
    return { url: '', method: '', requests: value.map(normalizeRequest) };
  }
  return {
    url: value.url ?? '',
    method: value.method ?? '',
    requests: (value.requests ?? []).map(normalizeRequest)
  };
}

export function validateHttpNodeConfig(config: HttpNodeConfig): void {
  if (config.requests.length === 0) {
    if (!config.url) {
      throw new ValidationError('either url or requests array is required');
    }
    return;
  }
  config.requests.forEach((request, index) => {
    if (!request.url && !config.url) {
      throw new ValidationError(`request ${index} missing url and no default url configured`);
    }
  });
}

/** Applies node-level defaults to every request; an empty request list becomes one default request. */
export function resolveHttpRequests(config: HttpNodeConfig): HttpRequestInput[] {
  const requests: HttpRequestSpec[] =
    config.requests.length === 0 && config.url
      ? [{ url: config.url, method: config.method, headers: {} }]
      : config.requests;

  return requests.map((request) => ({
    url: request.url || config.url,
    method: request.method || config.method || 'GET',
    headers: request.headers,
    ...(request.body !== undefined ? { body: request.body } : {})
  }));
}

export type HttpNodeExecutorOptions = {
  activityOptions?: ActivityOptions;
  now?: () => number;
};

export class HttpNodeExecutor implements NodeExecutor {
  readonly type = 'http';
  private readonly activityOptions: ActivityOptions;
  private readonly now: () => number;

  constructor(options: HttpNodeExecutorOptions = {}) {
    this.activityOptions = options.activityOptions ?? HTTP_ACTIVITY_OPTIONS;
    this.now = options.now ?? Date.now;
  }

  validateConfig(config: unknown): void {
    validateHttpNodeConfig(parseHttpNodeConfig(config));
  }

  async execute(context: NodeExecutionContext, config: unknown): Promise<NodeResult> {
    const parsed = parseHttpNodeConfig(config);
    validateHttpNodeConfig(parsed);
    const requests = resolveHttpRequests(parsed);

    const startedAt = this.now();
    const responses: HttpResponse[] = [];
    for (const request of requests) {
      try {
        responses.push(await context.activities.execute('http.request', request, this.activityOptions));
      } catch (err) {
        context.logger.warn('HTTP activity failed', {
          executionId: context.executionId,
          nodeId: context.nodeId,
          url: request.url,
          error: describeError(err)
        });
        return { success: false, error: `http activity failed: ${describeError(err)}` };
      }
    }

    const data = {
      results: responses.map((response) => ({
        statusCode: response.statusCode,
        headers: response.headers,
        body: response.body
      })),
      executionTime: this.now() - startedAt
    };

    // Every request has already been issued; this only picks the first failing status.
    const failedIndex = responses.findIndex((response) => response.statusCode < 200 || response.statusCode > 299);
    if (failedIndex >= 0) {
      return {
        success: false,
        data,
        error: `request ${failedIndex} failed with status code ${responses[failedIndex].statusCode}`
      };
    }

    return { success: true, data };
  }
}
