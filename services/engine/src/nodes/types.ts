import type { Logger } from '../observability/logger';
import type { ActivityInvoker } from '../runtime/types';

export type NodeResult = {
  success: boolean;
  data?: Record<string, unknown>;
  error?: string;
};

export type NodeExecutionContext = {
  executionId: string;
  nodeId: string;
  activities: ActivityInvoker;
  logger: Logger;
};

/**
 * Executes one node type. Rejecting from `execute` signals an infrastructure failure; an
 * unacceptable outcome is reported as `{ success: false, error }` instead.
 */
export interface NodeExecutor {
  readonly type: string;
  /** Throws a ValidationError when the config cannot be executed. */
  validateConfig(config: unknown): void;
  execute(context: NodeExecutionContext, config: unknown): Promise<NodeResult>;
}
