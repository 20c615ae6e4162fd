import type { ActivityInput, ActivityName, ActivityOutput } from '../activities/types';
import type { Definition } from '../definitions/types';
import type { ActivityOptions } from './retryPolicy';
import type { RunStatus } from './status';

export type RunDomain = 'pipeline' | 'policy';

export interface ActivityInvoker {
  execute<N extends ActivityName>(
    name: N,
    input: ActivityInput<N>,
    options: ActivityOptions
  ): Promise<ActivityOutput<N>>;
}

export type RunContext = {
  executionId: string;
  domain: RunDomain;
  activities: ActivityInvoker;
};

/** Executes one run to completion; rejecting marks the execution FAILED. */
export type RunHandler = (definition: Definition, context: RunContext) => Promise<void>;

export type StartRunInput = {
  executionId: string;
  domain: RunDomain;
  definition: Definition;
};

export interface DurableRuntime {
  readonly mode: 'inline' | 'queue';
  start(input: StartRunInput): Promise<string>;
  describe(executionId: string): Promise<RunStatus>;
  close(): Promise<void>;
}
