import { loadEngineConfig } from './config';
import { closePool, configureDatabasePool, poolOptionsFromConfig } from './db/client';
import { ensureDatabase } from './db/init';
import { createEngine } from './engine';
import { describeError } from './errors';
import { logger } from './observability/logger';
import { startActivityWorker, startRunWorker, type WorkerHandle } from './runtime/bullmq';

export async function runQueueWorkers(): Promise<void> {
  const config = loadEngineConfig();
  if (config.inlineMode) {
    logger.info('Inline mode enabled; runs execute inside the API process and no worker is needed');
    return;
  }

  await configureDatabasePool(poolOptionsFromConfig(config));
  await ensureDatabase();
  const engine = createEngine({ config });
  await engine.queueManager.verifyConnectivity();

  const handles: WorkerHandle[] = [
    startRunWorker({
      queueManager: engine.queueManager,
      handler: engine.runHandler,
      concurrency: config.runConcurrency
    }),
    startActivityWorker({
      queueManager: engine.queueManager,
      handlers: engine.activities,
      concurrency: config.activityConcurrency
    })
  ];

  logger.info('Engine workers ready', {
    runQueue: config.queues.runs,
    activityQueue: config.queues.activities,
    runConcurrency: config.runConcurrency,
    activityConcurrency: config.activityConcurrency
  });

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info('Shutdown signal received');
    for (const handle of handles) {
      await handle.close();
    }
    try {
      await engine.close();
      await closePool();
    } catch (err) {
      logger.error('Failed to release worker resources', { error: describeError(err) });
    }
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown();
  });
  process.on('SIGTERM', () => {
    void shutdown();
  });
}

if (require.main === module) {
  runQueueWorkers().catch((err) => {
    console.error('[engine-worker] Worker crashed', err);
    process.exit(1);
  });
}
