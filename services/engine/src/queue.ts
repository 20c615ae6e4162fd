import type { QueueManager } from './queueManager';

export const QUEUE_KEYS = {
  runs: 'runs',
  activities: 'activities'
} as const;

export const RUN_JOB_NAME = 'run';
export const ACTIVITY_JOB_NAME = 'activity';
export const RETRY_POLICY_BACKOFF = 'retry-policy';

const DAY_SECONDS = 24 * 60 * 60;

export type QueueNames = {
  runs: string;
  activities: string;
};

export function registerEngineQueues(manager: QueueManager, names: QueueNames): void {
  // Run jobs are the status oracle, so they outlive the run by a week.
  manager.registerQueue({
    key: QUEUE_KEYS.runs,
    queueName: names.runs,
    defaultJobOptions: {
      attempts: 1,
      removeOnComplete: { age: 7 * DAY_SECONDS },
      removeOnFail: { age: 7 * DAY_SECONDS }
    }
  });

  manager.registerQueue({
    key: QUEUE_KEYS.activities,
    queueName: names.activities,
    defaultJobOptions: {
      removeOnComplete: { age: 60 * 60 },
      removeOnFail: { age: DAY_SECONDS }
    }
  });
}
