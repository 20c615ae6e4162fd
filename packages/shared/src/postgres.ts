import pg, { Pool, type PoolClient, type PoolConfig } from 'pg';

let int8Configured = false;

function configureGlobalParsers(): void {
  if (int8Configured) {
    return;
  }
  pg.types.setTypeParser(pg.types.builtins.INT8, (value: string) => Number.parseInt(value, 10));
  int8Configured = true;
}

export function quoteIdentifier(input: string): string {
  return `"${input.replace(/"/g, '""')}"`;
}

export type PostgresErrorReporter = (message: string, error: unknown) => void;

export interface PostgresPoolOptions extends PoolConfig {
  schema?: string;
  onError?: PostgresErrorReporter;
}

export interface PostgresHelpers {
  getClient(): Promise<PoolClient>;
  withConnection<T>(fn: (client: PoolClient) => Promise<T>): Promise<T>;
  withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T>;
  closePool(): Promise<void>;
  getPool(): Pool;
}

const defaultErrorReporter: PostgresErrorReporter = (message, error) => {
  console.error(`[postgres] ${message}`, error);
};

export function createPostgresPool(options: PostgresPoolOptions = {}): PostgresHelpers {
  configureGlobalParsers();
  const { schema, onError, ...poolConfig } = options;
  const reportError = onError ?? defaultErrorReporter;
  const pool = new Pool(poolConfig);

  pool.on('error', (err: Error) => {
    reportError('unexpected error on idle client', err);
  });

  async function getClient(): Promise<PoolClient> {
    const client = await pool.connect();
    if (!schema) {
      return client;
    }
    try {
      await client.query(`SET search_path TO ${quoteIdentifier(schema)}, public`);
    } catch (err) {
      client.release();
      throw err;
    }
    return client;
  }

  async function withConnection<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await getClient();
    try {
      return await fn(client);
    } finally {
      client.release();
    }
  }

  async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    return withConnection(async (client) => {
      await client.query('BEGIN');
      try {
        const result = await fn(client);
        await client.query('COMMIT');
        return result;
      } catch (err) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackErr) {
          reportError('failed to rollback transaction', rollbackErr);
        }
        throw err;
      }
    });
  }

  return {
    getClient,
    withConnection,
    withTransaction,
    closePool: () => pool.end(),
    getPool: () => pool
  };
}
