import { createHttpActivity, type FetchLike } from './http';
import type { ActivityHandlers } from './types';

export type ActivityHandlerOptions = {
  httpTimeoutMs: number;
  fetchImpl?: FetchLike;
};

export function createActivityHandlers(options: ActivityHandlerOptions): ActivityHandlers {
  return {
    'http.request': createHttpActivity({ timeoutMs: options.httpTimeoutMs, fetchImpl: options.fetchImpl })
  };
}

export * from './types';
export type { FetchLike } from './http';
