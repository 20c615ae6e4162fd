import { QueueEvents, Worker } from 'bullmq';
import { z } from 'zod';
import {
  activityNameSchema,
  activitySchemas,
  invokeActivity,
  type ActivityHandlers,
  type ActivityInput,
  type ActivityName,
  type ActivityOutput
} from '../activities/types';
import { parseDefinition } from '../definitions/parse';
import type { Definition } from '../definitions/types';
import { describeError } from '../errors';
import { logger as defaultLogger, type Logger } from '../observability/logger';
import { ACTIVITY_JOB_NAME, QUEUE_KEYS, RETRY_POLICY_BACKOFF, RUN_JOB_NAME } from '../queue';
import type { QueueManager } from '../queueManager';
import { withTimeout } from './activityRunner';
import {
  ActivityFailure,
  ActivityTimeoutError,
  ApplicationFailure,
  ExecutionAlreadyStartedError,
  ExecutionNotFoundError
} from './errors';
import { computeActivityDeadline, computeRetryDelay, retryPolicySchema, type ActivityOptions } from './retryPolicy';
import { mapJobState, type RunStatus } from './status';
import type { ActivityInvoker, DurableRuntime, RunHandler, StartRunInput } from './types';

const runJobSchema = z.object({
  domain: z.enum(['pipeline', 'policy']),
  definition: z.unknown()
});

const activityJobSchema = z.object({
  executionId: z.string(),
  name: activityNameSchema,
  input: z.unknown(),
  retryPolicy: retryPolicySchema,
  startToCloseTimeoutMs: z.number().int().positive()
});

export type RunJobData = {
  domain: StartRunInput['domain'];
  definition: Definition;
};

export type ActivityJobData = z.infer<typeof activityJobSchema>;

const retryPolicyHolderSchema = z.object({ retryPolicy: retryPolicySchema });

/** BullMQ backoff strategy that follows the retry policy carried by each activity job. */
export function retryPolicyBackoffStrategy(
  attemptsMade: number,
  type?: string,
  _err?: Error,
  job?: { data: unknown }
): number {
  if (type !== RETRY_POLICY_BACKOFF) {
    return 0;
  }
  const parsed = retryPolicyHolderSchema.safeParse(job?.data);
  if (!parsed.success) {
    return 0;
  }
  return computeRetryDelay(parsed.data.retryPolicy, attemptsMade);
}

export type BullmqRuntimeOptions = {
  queueManager: QueueManager;
  logger?: Logger;
};

export class BullmqRuntime implements DurableRuntime {
  readonly mode = 'queue';
  private readonly logger: Logger;

  constructor(private readonly options: BullmqRuntimeOptions) {
    this.logger = options.logger ?? defaultLogger;
  }

  async start(input: StartRunInput): Promise<string> {
    const queue = this.options.queueManager.getQueue<RunJobData>(QUEUE_KEYS.runs);
    const existing = await queue.getJob(input.executionId);
    if (existing) {
      throw new ExecutionAlreadyStartedError(input.executionId);
    }

    await queue.add(
      RUN_JOB_NAME,
      { domain: input.domain, definition: input.definition },
      { jobId: input.executionId, attempts: 1 }
    );
    this.logger.info('Run started', { executionId: input.executionId, domain: input.domain, mode: this.mode });
    return input.executionId;
  }

  async describe(executionId: string): Promise<RunStatus> {
    const queue = this.options.queueManager.getQueue<RunJobData>(QUEUE_KEYS.runs);
    const job = await queue.getJob(executionId);
    if (!job) {
      throw new ExecutionNotFoundError(executionId);
    }
    if (job.name !== RUN_JOB_NAME) {
      throw new ApplicationFailure(`execution ${executionId} is not a run (found job ${job.name})`);
    }
    const state = await job.getState();
    return mapJobState(state);
  }

  async close(): Promise<void> {
    await this.options.queueManager.close();
  }
}

export type QueueActivityInvokerOptions = {
  queueManager: QueueManager;
  queueEvents: QueueEvents;
  executionId: string;
};

export function createQueueActivityInvoker(options: QueueActivityInvokerOptions): ActivityInvoker {
  const { queueManager, queueEvents, executionId } = options;
  return {
    async execute<N extends ActivityName>(
      name: N,
      input: ActivityInput<N>,
      activityOptions: ActivityOptions
    ): Promise<ActivityOutput<N>> {
      const queue = queueManager.getQueue<ActivityJobData>(QUEUE_KEYS.activities);
      const attempts = Math.max(1, activityOptions.retry.maximumAttempts);
      const job = await queue.add(
        ACTIVITY_JOB_NAME,
        {
          executionId,
          name,
          input,
          retryPolicy: activityOptions.retry,
          startToCloseTimeoutMs: activityOptions.startToCloseTimeoutMs
        },
        { attempts, backoff: { type: RETRY_POLICY_BACKOFF } }
      );

      let result: unknown;
      try {
        result = await job.waitUntilFinished(queueEvents, computeActivityDeadline(activityOptions));
      } catch (err) {
        throw new ActivityFailure(name, attempts, err);
      }
      return activitySchemas[name].output.parse(result);
    }
  };
}

export type WorkerHandle = {
  close(): Promise<void>;
};

export type RunWorkerOptions = {
  queueManager: QueueManager;
  handler: RunHandler;
  concurrency: number;
  logger?: Logger;
};

export function startRunWorker(options: RunWorkerOptions): WorkerHandle {
  const { queueManager, handler } = options;
  const logger = options.logger ?? defaultLogger;
  const queueEvents = new QueueEvents(queueManager.getQueueName(QUEUE_KEYS.activities), {
    connection: queueManager.createBlockingConnection()
  });

  const worker = new Worker<RunJobData>(
    queueManager.getQueueName(QUEUE_KEYS.runs),
    async (job) => {
      const executionId = job.id;
      if (!executionId) {
        throw new Error('run job is missing its execution id');
      }
      const data = runJobSchema.parse(job.data);
      const definition = parseDefinition(data.definition);
      await handler(definition, {
        executionId,
        domain: data.domain,
        activities: createQueueActivityInvoker({ queueManager, queueEvents, executionId })
      });
    },
    {
      connection: queueManager.createBlockingConnection(),
      concurrency: options.concurrency
    }
  );

  worker.on('completed', (job) => {
    logger.info('Run completed', { executionId: job.id ?? 'unknown' });
  });

  worker.on('failed', (job, err) => {
    logger.warn('Run failed', {
      executionId: job?.id ?? 'unknown',
      error: describeError(err)
    });
  });

  return {
    async close() {
      await worker.close();
      await queueEvents.close();
    }
  };
}

export type ActivityWorkerOptions = {
  queueManager: QueueManager;
  handlers: ActivityHandlers;
  concurrency: number;
  logger?: Logger;
};

export function startActivityWorker(options: ActivityWorkerOptions): WorkerHandle {
  const { queueManager, handlers } = options;
  const logger = options.logger ?? defaultLogger;

  const worker = new Worker<ActivityJobData>(
    queueManager.getQueueName(QUEUE_KEYS.activities),
    async (job) => {
      const data = activityJobSchema.parse(job.data);
      return withTimeout(
        () => invokeActivity(handlers, data.name, data.input),
        data.startToCloseTimeoutMs,
        () => new ActivityTimeoutError(data.name, data.startToCloseTimeoutMs)
      );
    },
    {
      connection: queueManager.createBlockingConnection(),
      concurrency: options.concurrency,
      settings: {
        backoffStrategy: retryPolicyBackoffStrategy
      }
    }
  );

  worker.on('failed', (job, err) => {
    logger.warn('Activity attempt failed', {
      jobId: job?.id ?? 'unknown',
      attemptsMade: job?.attemptsMade ?? 0,
      error: describeError(err)
    });
  });

  return {
    close: () => worker.close()
  };
}
