import type { EngineConfig } from './config';
import type { Engine } from './engine';
import type { EngineMetrics } from './observability/metrics';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export interface AppContext {
  config: EngineConfig;
  engine: Engine;
  metrics: EngineMetrics;
}
