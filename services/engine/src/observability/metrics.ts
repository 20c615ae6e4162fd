import { Counter, Gauge, Registry, collectDefaultMetrics } from 'prom-client';

const QUEUE_STATES = ['waiting', 'active', 'completed', 'failed', 'delayed', 'paused'] as const;

export interface EngineMetrics {
  register: Registry;
  nodeExecutions: Counter<'type' | 'outcome'>;
  runCompletions: Counter<'domain' | 'status'>;
  statusLookupFallbacks: Counter<'reason'>;
  queueJobs: Gauge<'queue' | 'state'>;
}

export type CreateMetricsOptions = {
  collectDefaults?: boolean;
};

export const createMetrics = (options: CreateMetricsOptions = {}): EngineMetrics => {
  const register = new Registry();
  if (options.collectDefaults) {
    collectDefaultMetrics({ register });
  }

  const nodeExecutions = new Counter({
    name: 'stepgraph_node_executions_total',
    help: 'Node executions by node type and outcome',
    registers: [register],
    labelNames: ['type', 'outcome'] as const
  });

  const runCompletions = new Counter({
    name: 'stepgraph_run_completions_total',
    help: 'Runs that reached a terminal status, by domain',
    registers: [register],
    labelNames: ['domain', 'status'] as const
  });

  const statusLookupFallbacks = new Counter({
    name: 'stepgraph_status_lookup_fallbacks_total',
    help: 'Status lookups answered from the fallback instead of the runtime',
    registers: [register],
    labelNames: ['reason'] as const
  });

  const queueJobs = new Gauge({
    name: 'stepgraph_queue_jobs_total',
    help: 'BullMQ queue job counts by state',
    registers: [register],
    labelNames: ['queue', 'state'] as const
  });

  return {
    register,
    nodeExecutions,
    runCompletions,
    statusLookupFallbacks,
    queueJobs
  };
};

export type QueueTelemetryEvent = {
  type: string;
  queue: string;
  mode: 'inline' | 'queue';
  meta?: Record<string, unknown>;
};

function readCount(counts: unknown, state: string): number {
  if (!counts || typeof counts !== 'object') {
    return 0;
  }
  const value: unknown = Reflect.get(counts, state);
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

export function applyQueueTelemetry(metrics: EngineMetrics, event: QueueTelemetryEvent): void {
  if (event.type === 'metrics' && event.mode === 'queue') {
    const counts = event.meta?.counts;
    for (const state of QUEUE_STATES) {
      metrics.queueJobs.set({ queue: event.queue, state }, readCount(counts, state));
    }
    return;
  }

  if (event.type === 'queue-disposed' && event.queue !== '*') {
    for (const state of QUEUE_STATES) {
      metrics.queueJobs.set({ queue: event.queue, state }, 0);
    }
  }
}
