import type { JsonValue } from '../types';

export type LogLevel = 'info' | 'warn' | 'error';

export type LogPayload = {
  level: LogLevel;
  message: string;
  timestamp: string;
  source: string;
  meta?: Record<string, JsonValue>;
};

export type LogMeta = Record<string, unknown>;

export interface Logger {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

export type LoggerOptions = {
  source?: string;
  stringChunkSize?: number;
  write?: (payload: LogPayload) => void;
};

const DEFAULT_SOURCE = process.env.STEPGRAPH_LOG_SOURCE?.trim() || 'stepgraph-engine';
const DEFAULT_CHUNK_SIZE = 8192;

function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value instanceof Error) {
    return value.message;
  }
  if (Array.isArray(value)) {
    const result: JsonValue[] = [];
    for (const item of value) {
      const converted = toJsonValue(item);
      if (converted !== undefined) {
        result.push(converted);
      }
    }
    return result;
  }
  if (typeof value === 'object') {
    const result: Record<string, JsonValue> = {};
    for (const [key, entry] of Object.entries(value)) {
      const converted = toJsonValue(entry);
      if (converted !== undefined) {
        result[key] = converted;
      }
    }
    return result;
  }
  return String(value);
}

export function normalizeMeta(meta?: LogMeta): Record<string, JsonValue> | undefined {
  if (!meta) {
    return undefined;
  }
  const result: Record<string, JsonValue> = {};
  for (const [key, value] of Object.entries(meta)) {
    const converted = toJsonValue(value);
    if (converted !== undefined) {
      result[key] = converted;
    }
  }
  return Object.keys(result).length > 0 ? result : undefined;
}

function chunkJsonValue(value: JsonValue, chunkSize: number): JsonValue {
  if (typeof value === 'string') {
    if (value.length <= chunkSize) {
      return value;
    }
    const chunks: string[] = [];
    for (let index = 0; index < value.length; index += chunkSize) {
      chunks.push(value.slice(index, index + chunkSize));
    }
    return chunks;
  }
  if (Array.isArray(value)) {
    return value.map((entry) => chunkJsonValue(entry, chunkSize));
  }
  if (value && typeof value === 'object') {
    const next: Record<string, JsonValue> = {};
    for (const [key, entry] of Object.entries(value)) {
      next[key] = chunkJsonValue(entry, chunkSize);
    }
    return next;
  }
  return value;
}

function chunkMeta(meta: Record<string, JsonValue>, chunkSize: number): Record<string, JsonValue> {
  const result: Record<string, JsonValue> = {};
  for (const [key, value] of Object.entries(meta)) {
    result[key] = chunkJsonValue(value, chunkSize);
  }
  return result;
}

function outputToConsole(payload: LogPayload): void {
  const record = JSON.stringify(payload);
  switch (payload.level) {
    case 'info':
      console.log(record); // eslint-disable-line no-console
      break;
    case 'warn':
      console.warn(record); // eslint-disable-line no-console
      break;
    case 'error':
    default:
      console.error(record); // eslint-disable-line no-console
      break;
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const source = options.source ?? DEFAULT_SOURCE;
  const chunkSize = Math.max(1024, options.stringChunkSize ?? DEFAULT_CHUNK_SIZE);
  const write = options.write ?? outputToConsole;

  const log = (level: LogLevel, message: string, meta?: LogMeta) => {
    const normalized = normalizeMeta(meta);
    const payload: LogPayload = {
      level,
      message,
      timestamp: new Date().toISOString(),
      source,
      ...(normalized ? { meta: chunkMeta(normalized, chunkSize) } : {})
    };
    write(payload);
  };

  return {
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta)
  };
}

export const logger = createLogger();
