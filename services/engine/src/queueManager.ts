import { Queue, type JobsOptions } from 'bullmq';
import IORedis, { type Redis } from 'ioredis';
import { once } from 'node:events';
import type { QueueTelemetryEvent } from './observability/metrics';
import { withTimeout } from './runtime/activityRunner';

type QueueMode = 'inline' | 'queue';

export type QueueTelemetryHandler = (event: QueueTelemetryEvent) => void;

export type QueueRegistration = {
  key: string;
  queueName: string;
  defaultJobOptions?: JobsOptions;
};

export type QueueManagerOptions = {
  redisUrl: string;
  inlineMode: boolean;
  telemetry?: QueueTelemetryHandler;
  createRedis?: (url: string) => Redis;
  /** Bound on queue reads made on behalf of API callers. */
  commandTimeoutMs?: number;
};

const DEFAULT_COMMAND_TIMEOUT_MS = 5_000;

export class QueueManager {
  private readonly inlineMode: boolean;
  private connection: Redis | null = null;
  private readonly registrations = new Map<string, QueueRegistration>();
  private readonly queues = new Map<string, Queue>();

  constructor(private readonly options: QueueManagerOptions) {
    this.inlineMode = options.inlineMode;
    if (!this.inlineMode && options.redisUrl.trim().toLowerCase() === 'inline') {
      throw new Error('REDIS_URL=inline is only supported when inline mode is enabled');
    }
  }

  registerQueue(registration: QueueRegistration): void {
    if (this.registrations.has(registration.key)) {
      throw new Error(`Queue with key ${registration.key} is already registered`);
    }

    this.registrations.set(registration.key, registration);
    this.emit({ type: 'register', queue: registration.queueName, mode: this.mode() });

    if (!this.inlineMode) {
      this.ensureQueue(registration.key);
    }
  }

  isInlineMode(): boolean {
    return this.inlineMode;
  }

  getQueueName(key: string): string {
    const registration = this.registrations.get(key);
    if (!registration) {
      throw new Error(`Queue with key ${key} has not been registered`);
    }
    return registration.queueName;
  }

  getConnection(): Redis {
    if (this.inlineMode) {
      throw new Error('Redis connection unavailable in inline mode');
    }
    if (!this.connection) {
      this.connection = this.createConnection();
    }
    return this.connection;
  }

  /**
   * A dedicated connection for blocking consumers (workers, queue events). These wait out
   * Redis outages, unlike the shared connection that API reads go through.
   */
  createBlockingConnection(): Redis {
    return this.getConnection().duplicate({ maxRetriesPerRequest: null, enableOfflineQueue: true });
  }

  getQueue<TData>(key: string): Queue<TData> {
    if (this.inlineMode) {
      throw new Error('Queue unavailable in inline mode');
    }
    const queue = this.ensureQueue<TData>(key);
    return queue;
  }

  tryGetQueue<TData>(key: string): Queue<TData> | null {
    if (this.inlineMode) {
      return null;
    }
    return this.ensureQueue(key);
  }

  async getQueueCounts(key: string): Promise<Record<string, number>> {
    const queue = this.tryGetQueue(key);
    if (!queue) {
      return {};
    }
    const timeoutMs = this.options.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    try {
      return await withTimeout(
        () => queue.getJobCounts('waiting', 'active', 'completed', 'failed', 'delayed', 'paused'),
        timeoutMs,
        () => new Error(`job counts for ${queue.name} timed out after ${timeoutMs}ms`)
      );
    } catch (err) {
      this.emit({
        type: 'metrics-error',
        queue: queue.name,
        mode: 'queue',
        meta: { error: err instanceof Error ? err.message : String(err) }
      });
      return {};
    }
  }

  async collectMetrics(): Promise<void> {
    if (this.inlineMode) {
      return;
    }
    for (const registration of this.registrations.values()) {
      const counts = await this.getQueueCounts(registration.key);
      this.emit({ type: 'metrics', queue: registration.queueName, mode: 'queue', meta: { counts } });
    }
  }

  async verifyConnectivity(): Promise<void> {
    if (this.inlineMode) {
      return;
    }
    const connection = this.getConnection();
    if (connection.status === 'wait') {
      await connection.connect();
    } else if (connection.status !== 'ready') {
      await once(connection, 'ready');
    }
    await connection.ping();
  }

  async close(): Promise<void> {
    const queues = Array.from(this.queues.entries());
    this.queues.clear();
    for (const [, queue] of queues) {
      await queue.close();
      this.emit({ type: 'queue-disposed', queue: queue.name, mode: 'queue', meta: { reason: 'close' } });
    }

    const connection = this.connection;
    this.connection = null;
    if (!connection || isConnectionClosed(connection)) {
      return;
    }
    try {
      await connection.quit();
    } catch (err) {
      if (err instanceof Error && err.message.includes('Connection is closed')) {
        return;
      }
      throw err;
    }
  }

  private mode(): QueueMode {
    return this.inlineMode ? 'inline' : 'queue';
  }

  private createConnection(): Redis {
    const redisUrl = this.options.redisUrl;
    const instance = this.options.createRedis
      ? this.options.createRedis(redisUrl)
      : new IORedis(redisUrl, { maxRetriesPerRequest: 1, enableOfflineQueue: false });
    instance.on('error', (err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      this.emit({ type: 'connection-error', queue: '*', mode: 'queue', meta: { message } });
    });
    return instance;
  }

  private ensureQueue<TData>(key: string): Queue<TData> {
    const existing = this.queues.get(key);
    if (existing) {
      return existing;
    }

    const registration = this.registrations.get(key);
    if (!registration) {
      throw new Error(`Queue with key ${key} has not been registered`);
    }

    const queue = new Queue<TData>(registration.queueName, {
      connection: this.getConnection(),
      defaultJobOptions: registration.defaultJobOptions
    });

    this.queues.set(key, queue);
    this.emit({ type: 'queue-created', queue: registration.queueName, mode: 'queue' });
    return queue;
  }

  private emit(event: QueueTelemetryEvent): void {
    if (this.options.telemetry) {
      this.options.telemetry(event);
      return;
    }
    const payload = { queue: event.queue, mode: event.mode, ...event.meta };
    console.info(`[queue-manager] ${event.type} ${JSON.stringify(payload)}`); // eslint-disable-line no-console
  }
}

function isConnectionClosed(instance: Redis): boolean {
  return instance.status === 'end' || instance.status === 'close';
}
