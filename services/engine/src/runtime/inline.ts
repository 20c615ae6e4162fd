import {
  invokeActivity,
  type ActivityHandlers,
  type ActivityInput,
  type ActivityName,
  type ActivityOutput
} from '../activities/types';
import { describeError } from '../errors';
import type { Definition } from '../definitions/types';
import { logger as defaultLogger, type Logger } from '../observability/logger';
import { runWithRetries, type Sleep } from './activityRunner';
import { ExecutionAlreadyStartedError, ExecutionNotFoundError } from './errors';
import type { ActivityOptions } from './retryPolicy';
import type { RunStatus } from './status';
import type { ActivityInvoker, DurableRuntime, RunDomain, RunHandler, StartRunInput } from './types';

type InlineExecution = {
  executionId: string;
  domain: RunDomain;
  status: RunStatus;
  error: string | null;
  done: Promise<void>;
};

export type InlineRuntimeOptions = {
  handler: RunHandler;
  activities: ActivityHandlers;
  logger?: Logger;
  sleep?: Sleep;
  /** Finished executions kept for status lookups; the oldest are forgotten first. */
  maxRetainedExecutions?: number;
};

const DEFAULT_MAX_RETAINED_EXECUTIONS = 1_000;

/**
 * In-process runtime used in inline mode and tests. Runs start on the next turn of the
 * event loop after `start` resolves. Status lives in memory: running executions are always
 * kept, finished ones up to `maxRetainedExecutions`.
 */
export class InlineRuntime implements DurableRuntime {
  readonly mode = 'inline';
  private readonly executions = new Map<string, InlineExecution>();
  private readonly finished: string[] = [];
  private readonly maxRetained: number;
  private readonly logger: Logger;

  constructor(private readonly options: InlineRuntimeOptions) {
    this.logger = options.logger ?? defaultLogger;
    this.maxRetained = Math.max(1, options.maxRetainedExecutions ?? DEFAULT_MAX_RETAINED_EXECUTIONS);
  }

  async start(input: StartRunInput): Promise<string> {
    if (this.executions.has(input.executionId)) {
      throw new ExecutionAlreadyStartedError(input.executionId);
    }

    const execution: InlineExecution = {
      executionId: input.executionId,
      domain: input.domain,
      status: 'RUNNING',
      error: null,
      done: Promise.resolve()
    };
    this.executions.set(input.executionId, execution);
    execution.done = new Promise<void>((resolve) => {
      setImmediate(resolve);
    }).then(() => this.run(execution, input.definition));

    this.logger.info('Run started', { executionId: input.executionId, domain: input.domain, mode: this.mode });
    return input.executionId;
  }

  async describe(executionId: string): Promise<RunStatus> {
    return this.getExecution(executionId).status;
  }

  async waitForCompletion(executionId: string): Promise<RunStatus> {
    const execution = this.getExecution(executionId);
    await execution.done;
    return execution.status;
  }

  getFailure(executionId: string): string | null {
    return this.getExecution(executionId).error;
  }

  async drain(): Promise<void> {
    await Promise.all(Array.from(this.executions.values(), (execution) => execution.done));
  }

  async close(): Promise<void> {
    await this.drain();
  }

  private getExecution(executionId: string): InlineExecution {
    const execution = this.executions.get(executionId);
    if (!execution) {
      throw new ExecutionNotFoundError(executionId);
    }
    return execution;
  }

  private async run(execution: InlineExecution, definition: Definition): Promise<void> {
    try {
      await this.options.handler(definition, {
        executionId: execution.executionId,
        domain: execution.domain,
        activities: this.createActivityInvoker(execution.executionId)
      });
      execution.status = 'COMPLETED';
      this.logger.info('Run completed', { executionId: execution.executionId, domain: execution.domain });
    } catch (err) {
      execution.status = 'FAILED';
      execution.error = describeError(err);
      this.logger.warn('Run failed', {
        executionId: execution.executionId,
        domain: execution.domain,
        error: execution.error
      });
    }
    this.retire(execution.executionId);
  }

  private retire(executionId: string): void {
    this.finished.push(executionId);
    while (this.finished.length > this.maxRetained) {
      const evicted = this.finished.shift();
      if (evicted !== undefined) {
        this.executions.delete(evicted);
      }
    }
  }

  private createActivityInvoker(executionId: string): ActivityInvoker {
    const { activities, sleep } = this.options;
    const logger = this.logger;
    return {
      execute<N extends ActivityName>(
        name: N,
        input: ActivityInput<N>,
        options: ActivityOptions
      ): Promise<ActivityOutput<N>> {
        return runWithRetries(() => invokeActivity(activities, name, input), {
          activity: name,
          executionId,
          options,
          logger,
          sleep
        });
      }
    };
  }
}
