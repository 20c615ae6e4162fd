import { describeError } from '../errors';
import type { NodeRegistry } from '../nodes/registry';
import { logger as defaultLogger, type Logger } from '../observability/logger';
import type { EngineMetrics } from '../observability/metrics';
import { executeDefinition } from '../orchestrator';
import type { RunDomain, RunHandler } from '../runtime/types';

export type RunCompletionRecorder = (
  domain: RunDomain,
  executionId: string,
  status: 'COMPLETED' | 'FAILED'
) => Promise<unknown>;

export type RunHandlerOptions = {
  registry: NodeRegistry;
  recordCompletion: RunCompletionRecorder;
  logger?: Logger;
  metrics?: EngineMetrics;
};

/** Orchestrates a run and records its completion; an orchestration failure is rethrown. */
export function createRunHandler(options: RunHandlerOptions): RunHandler {
  const logger = options.logger ?? defaultLogger;

  return async (definition, context) => {
    try {
      const executed = await executeDefinition(definition, {
        registry: options.registry,
        context,
        logger,
        metrics: options.metrics
      });
      logger.info('Run orchestration finished', {
        executionId: context.executionId,
        domain: context.domain,
        nodes: executed.map((entry) => entry.nodeId)
      });
    } catch (err) {
      logger.warn('Run orchestration aborted', {
        executionId: context.executionId,
        domain: context.domain,
        error: describeError(err)
      });
      await options.recordCompletion(context.domain, context.executionId, 'FAILED');
      throw err;
    }
    await options.recordCompletion(context.domain, context.executionId, 'COMPLETED');
  };
}
