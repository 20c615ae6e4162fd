import type { Pool, PoolClient } from 'pg';
import { createPostgresPool, type PostgresHelpers } from '@stepgraph/shared';
import type { EngineConfig } from '../config';
import { logger } from '../observability/logger';

export type PoolOptions = {
  connectionString: string;
  schema: string | null;
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
};

/** One configured pool; migration state is tracked per handle, so a new pool migrates again. */
export type DatabaseHandle = {
  readonly schema: string | null;
  withConnection<T>(fn: (client: PoolClient) => Promise<T>): Promise<T>;
  withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T>;
  getPool(): Pool;
  close(): Promise<void>;
};

function openDatabase(options: PoolOptions): DatabaseHandle {
  const helpers: PostgresHelpers = createPostgresPool({
    connectionString: options.connectionString,
    schema: options.schema ?? undefined,
    max: options.max,
    idleTimeoutMillis: options.idleTimeoutMillis,
    connectionTimeoutMillis: options.connectionTimeoutMillis,
    onError: (message, error) => {
      logger.error(`Postgres ${message}`, { error: error instanceof Error ? error.message : String(error) });
    }
  });

  return {
    schema: options.schema,
    withConnection: helpers.withConnection,
    withTransaction: helpers.withTransaction,
    getPool: helpers.getPool,
    close: helpers.closePool
  };
}

let current: DatabaseHandle | null = null;

export function getDatabase(): DatabaseHandle {
  if (!current) {
    throw new Error('Database pool is not configured; call configureDatabasePool() first');
  }
  return current;
}

export async function configureDatabasePool(options: PoolOptions): Promise<DatabaseHandle> {
  await closePool();
  current = openDatabase(options);
  return current;
}

export async function closePool(): Promise<void> {
  const database = current;
  current = null;
  if (database) {
    await database.close();
  }
}

export function poolOptionsFromConfig(config: EngineConfig): PoolOptions {
  return {
    connectionString: config.database.url,
    schema: config.database.schema,
    max: config.database.poolMax,
    idleTimeoutMillis: config.database.idleTimeoutMs,
    connectionTimeoutMillis: config.database.connectionTimeoutMs
  };
}
