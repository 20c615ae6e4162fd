import { quoteIdentifier } from '@stepgraph/shared';
import { getDatabase, type DatabaseHandle } from './client';
import { runMigrations, type MigrationClient } from './migrations';

// First key of the two-key advisory lock; the second is hashtext(<schema>).
const MIGRATION_LOCK_NAMESPACE = 0x73746570;

export type MigrationTarget = {
  readonly schema: string | null;
  withConnection<T>(fn: (client: MigrationClient) => Promise<T>): Promise<T>;
};

const migrated = new WeakMap<MigrationTarget, Promise<void>>();

async function migrate(target: MigrationTarget): Promise<void> {
  const lockScope = target.schema ?? 'public';
  await target.withConnection(async (client) => {
    await client.query(`SET TIME ZONE 'UTC'`);
    await client.query('SELECT pg_advisory_lock($1, hashtext($2))', [MIGRATION_LOCK_NAMESPACE, lockScope]);
    try {
      if (target.schema) {
        await client.query(`CREATE SCHEMA IF NOT EXISTS ${quoteIdentifier(target.schema)}`);
      }
      await runMigrations(client);
    } finally {
      await client.query('SELECT pg_advisory_unlock($1, hashtext($2))', [MIGRATION_LOCK_NAMESPACE, lockScope]);
    }
  });
}

/**
 * Migrates the run tables of one pool's schema. Concurrent callers share a single attempt per
 * pool; a failed attempt is retried by the next caller.
 */
export async function migrateOnce(target: MigrationTarget): Promise<void> {
  let pending = migrated.get(target);
  if (!pending) {
    pending = migrate(target);
    migrated.set(target, pending);
    void pending.catch(() => migrated.delete(target));
  }
  await pending;
}

export async function ensureDatabase(): Promise<DatabaseHandle> {
  const database = getDatabase();
  await migrateOnce(database);
  return database;
}
