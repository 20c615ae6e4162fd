import type { HttpRequestInput, HttpResponse } from './types';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type HttpActivityOptions = {
  timeoutMs: number;
  fetchImpl?: FetchLike;
};

const BODYLESS_METHODS = new Set(['GET', 'HEAD']);

/**
 * Performs a single HTTP call. Transport failures (DNS, refused connections, client timeout)
 * reject so the runtime can retry them; any response, whatever its status code, resolves.
 */
export function createHttpActivity(options: HttpActivityOptions) {
  const fetchImpl: FetchLike = options.fetchImpl ?? fetch;

  return async function performHttpRequest(input: HttpRequestInput): Promise<HttpResponse> {
    const method = input.method.toUpperCase();
    const sendBody = !BODYLESS_METHODS.has(method) && input.body !== undefined && input.body !== '';

    const response = await fetchImpl(input.url, {
      method,
      headers: input.headers,
      body: sendBody ? input.body : undefined,
      signal: AbortSignal.timeout(options.timeoutMs)
    });

    const body = await response.text();
    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      if (!(key in headers)) {
        headers[key] = value;
      }
    });

    return {
      statusCode: response.status,
      headers,
      body
    };
  };
}
