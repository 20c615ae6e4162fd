export { createApp, type CreateAppOptions } from './app';
export { createEngine, type Engine, type EngineOptions } from './engine';
export { loadEngineConfig, InlineModeNotAllowedError, type EngineConfig } from './config';
export * from './errors';
export { parseDefinition, definitionSchema } from './definitions/parse';
export type { Definition, NodeDefinition } from './definitions/types';
export { NodeRegistry, createNodeRegistry, type NodeRegistryOptions } from './nodes/registry';
export {
  HttpNodeExecutor,
  HTTP_ACTIVITY_OPTIONS,
  HTTP_RETRY_POLICY,
  parseHttpNodeConfig,
  resolveHttpRequests,
  validateHttpNodeConfig,
  type HttpNodeConfig,
  type HttpNodeExecutorOptions
} from './nodes/http';
export type { NodeExecutionContext, NodeExecutor, NodeResult } from './nodes/types';
export { executeDefinition, type ExecutedNode, type OrchestratorOptions } from './orchestrator';
export { createActivityHandlers, type ActivityHandlers, type FetchLike } from './activities';
export { InlineRuntime, type InlineRuntimeOptions } from './runtime/inline';
export { BullmqRuntime, startActivityWorker, startRunWorker, type WorkerHandle } from './runtime/bullmq';
export * from './runtime/errors';
export { RUN_STATUSES, parseRunStatus, isTerminalStatus, type RunStatus } from './runtime/status';
export type { DurableRuntime, RunContext, RunDomain, RunHandler } from './runtime/types';
export { RunService, DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from './runs/service';
export { resolveRunStatus } from './runs/statusReconciler';
export type { ListRunsParams, ListRunsResult, RunRecord, RunRepository, RunRow } from './runs/types';
export { PostgresRunRepository } from './db/runs';
export { createEventBroadcaster, type EngineEvent, type EventBroadcaster } from './events';
