import { createActivityHandlers, type ActivityHandlers, type FetchLike } from './activities';
import type { EngineConfig } from './config';
import { PostgresRunRepository } from './db/runs';
import { createEventBroadcaster, type EventBroadcaster } from './events';
import { HTTP_ACTIVITY_OPTIONS } from './nodes/http';
import { createNodeRegistry, type NodeRegistry } from './nodes/registry';
import { logger as defaultLogger, type Logger } from './observability/logger';
import { applyQueueTelemetry, createMetrics, type EngineMetrics } from './observability/metrics';
import { registerEngineQueues } from './queue';
import { QueueManager } from './queueManager';
import { createRunHandler } from './runs/execution';
import { RunService } from './runs/service';
import { RUN_DOMAINS, type RunDomain, type RunRepository } from './runs/types';
import type { Sleep } from './runtime/activityRunner';
import { BullmqRuntime } from './runtime/bullmq';
import { InlineRuntime } from './runtime/inline';
import type { DurableRuntime, RunHandler } from './runtime/types';

export type EngineOptions = {
  config: EngineConfig;
  logger?: Logger;
  metrics?: EngineMetrics;
  /** Defaults to the Postgres repository of each domain. */
  repositories?: Partial<Record<RunDomain, RunRepository>>;
  fetchImpl?: FetchLike;
  sleep?: Sleep;
  clock?: () => Date;
  events?: EventBroadcaster;
};

export type Engine = {
  config: EngineConfig;
  logger: Logger;
  metrics: EngineMetrics;
  registry: NodeRegistry;
  activities: ActivityHandlers;
  queueManager: QueueManager;
  runtime: DurableRuntime;
  /** Present in inline mode only. */
  inlineRuntime: InlineRuntime | null;
  runHandler: RunHandler;
  events: EventBroadcaster;
  getService(domain: RunDomain): RunService;
  close(): Promise<void>;
};

export function createEngine(options: EngineOptions): Engine {
  const { config } = options;
  const logger = options.logger ?? defaultLogger;
  const metrics = options.metrics ?? createMetrics({ collectDefaults: true });

  const queueManager = new QueueManager({
    redisUrl: config.redisUrl,
    inlineMode: config.inlineMode,
    commandTimeoutMs: config.statusTimeoutMs,
    telemetry: (event) => applyQueueTelemetry(metrics, event)
  });
  registerEngineQueues(queueManager, config.queues);

  const registry = createNodeRegistry({
    http: {
      activityOptions: { ...HTTP_ACTIVITY_OPTIONS, startToCloseTimeoutMs: config.activityTimeoutMs }
    }
  });
  const activities = createActivityHandlers({ httpTimeoutMs: config.httpTimeoutMs, fetchImpl: options.fetchImpl });

  const services = new Map<RunDomain, RunService>();
  const getService = (domain: RunDomain): RunService => {
    const service = services.get(domain);
    if (!service) {
      throw new Error(`No run service registered for domain ${domain}`);
    }
    return service;
  };

  const runHandler = createRunHandler({
    registry,
    logger,
    metrics,
    recordCompletion: (domain, executionId, status) => getService(domain).recordCompletion(executionId, status)
  });

  const inlineRuntime = config.inlineMode
    ? new InlineRuntime({
        handler: runHandler,
        activities,
        logger,
        sleep: options.sleep,
        maxRetainedExecutions: config.inlineRetainedRuns
      })
    : null;
  const runtime: DurableRuntime = inlineRuntime ?? new BullmqRuntime({ queueManager, logger });

  const events =
    options.events ??
    createEventBroadcaster({
      redisUrl: config.inlineMode ? null : config.redisUrl,
      channel: config.eventsChannel,
      logger
    });

  for (const domain of RUN_DOMAINS) {
    services.set(
      domain,
      new RunService({
        domain,
        repository: options.repositories?.[domain] ?? new PostgresRunRepository(domain),
        runtime,
        events,
        logger,
        metrics,
        clock: options.clock,
        statusScanBatchSize: config.statusScanBatchSize,
        statusTimeoutMs: config.statusTimeoutMs
      })
    );
  }

  return {
    config,
    logger,
    metrics,
    registry,
    activities,
    queueManager,
    runtime,
    inlineRuntime,
    runHandler,
    events,
    getService,
    async close() {
      await runtime.close();
      await queueManager.close();
      await events.close();
    }
  };
}
