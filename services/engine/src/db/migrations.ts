
type Migration = {
  id: string;
  statements: string[];
};

function runTableStatements(table: 'pipeline' | 'policy'): string[] {
  return [
    `CREATE TABLE IF NOT EXISTS ${table} (
       id SERIAL PRIMARY KEY,
       workflow_id TEXT NOT NULL,
       definition JSON NOT NULL,
       status TEXT,
       submitted_date TIMESTAMPTZ NOT NULL,
       completed_date TIMESTAMPTZ
     );`,
    `CREATE INDEX IF NOT EXISTS idx_${table}_workflow_id ON ${table}(workflow_id);`,
    `CREATE INDEX IF NOT EXISTS idx_${table}_status ON ${table}(status);`,
    `CREATE INDEX IF NOT EXISTS idx_${table}_submitted_date ON ${table}(submitted_date DESC);`,
    `CREATE INDEX IF NOT EXISTS idx_${table}_definition ON ${table} USING GIN ((definition::jsonb));`
  ];
}

const migrations: Migration[] = [
  {
    id: '001_create_pipeline_runs',
    statements: runTableStatements('pipeline')
  },
  {
    id: '002_create_policy_runs',
    statements: runTableStatements('policy')
  },
  {
    id: '003_index_definition_name',
    statements: [
      `CREATE INDEX IF NOT EXISTS idx_pipeline_definition_name ON pipeline((definition->>'name'));`,
      `CREATE INDEX IF NOT EXISTS idx_policy_definition_name ON policy((definition->>'name'));`
    ]
  }
];

/** The slice of a pg client that migrations need; a `PoolClient` satisfies it. */
export type MigrationClient = {
  query(text: string, values?: unknown[]): Promise<{ rows: Array<Record<string, unknown>> }>;
};

export async function runMigrations(client: MigrationClient): Promise<void> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  const { rows } = await client.query('SELECT id FROM schema_migrations');
  const applied = new Set(rows.map((row) => String(row.id)));

  for (const migration of migrations) {
    if (applied.has(migration.id)) {
      continue;
    }

    await client.query('BEGIN');
    try {
      for (const statement of migration.statements) {
        await client.query(statement);
      }
      await client.query('INSERT INTO schema_migrations (id) VALUES ($1) ON CONFLICT DO NOTHING', [migration.id]);
      await client.query('COMMIT');
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    }
  }
}
