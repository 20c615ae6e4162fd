import process from 'node:process';

import { createApp } from './app';
import { loadEngineConfig } from './config';
import { ensureDatabase } from './db/init';
import { closePool, configureDatabasePool, poolOptionsFromConfig } from './db/client';

const start = async () => {
  const config = loadEngineConfig();
  await configureDatabasePool(poolOptionsFromConfig(config));
  await ensureDatabase();
  const { app, ctx } = await createApp(config);

  try {
    await ctx.engine.queueManager.verifyConnectivity();
  } catch (error) {
    app.log.error({ err: error }, 'Redis connectivity check failed during startup');
    await app.close();
    await closePool();
    process.exit(1);
  }

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(
      { port: config.port, host: config.host, mode: ctx.engine.runtime.mode },
      'Stepgraph engine listening'
    );
  } catch (error) {
    app.log.error({ err: error }, 'Failed to start stepgraph engine');
    process.exit(1);
  }

  const shutdown = async (signal: NodeJS.Signals) => {
    app.log.info({ signal }, 'Shutting down stepgraph engine');
    try {
      await app.close();
      await closePool();
      process.exit(0);
    } catch (error) {
      app.log.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.once('SIGTERM', () => void shutdown('SIGTERM'));
  process.once('SIGINT', () => void shutdown('SIGINT'));
};

start().catch((error) => {
  // eslint-disable-next-line no-console
  console.error('Uncaught error in stepgraph engine', error);
  process.exit(1);
});
