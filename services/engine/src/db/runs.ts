import type { PoolClient } from 'pg';
import { parseDefinition } from '../definitions/parse';
import { parseRunStatus } from '../runtime/status';
import type {
  InsertRunOptions,
  NewRunInput,
  RunCompletionUpdate,
  RunDomain,
  RunFilters,
  RunPage,
  RunRepository,
  RunRow
} from '../runs/types';
import { buildRunFilterClause } from './filters';
import { ensureDatabase } from './init';

export type RunTableRow = {
  id: number;
  workflow_id: string;
  definition: unknown;
  status: string | null;
  submitted_date: Date | string;
  completed_date: Date | string | null;
};

const RUN_TABLES: Record<RunDomain, string> = {
  pipeline: 'pipeline',
  policy: 'policy'
};

const RUN_COLUMNS = 'id, workflow_id, definition, status, submitted_date, completed_date';

function toIso(value: Date | string): string {
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}

function decodeDefinition(value: unknown) {
  return parseDefinition(typeof value === 'string' ? JSON.parse(value) : value);
}

export function mapRunRow(row: RunTableRow): RunRow {
  return {
    id: Number(row.id),
    workflowId: row.workflow_id,
    definition: decodeDefinition(row.definition),
    status: row.status === null ? null : parseRunStatus(row.status),
    submittedAt: toIso(row.submitted_date),
    completedAt: row.completed_date === null ? null : toIso(row.completed_date)
  };
}

export class PostgresRunRepository implements RunRepository {
  private readonly table: string;

  constructor(domain: RunDomain) {
    this.table = RUN_TABLES[domain];
  }

  async insertRun(input: NewRunInput, options: InsertRunOptions = {}): Promise<RunRow> {
    const database = await ensureDatabase();
    return database.withTransaction(async (client) => {
      const row = await this.insertWithClient(client, input);
      if (options.beforeCommit) {
        await options.beforeCommit(row);
      }
      return row;
    });
  }

  async getRunById(id: number): Promise<RunRow | null> {
    const database = await ensureDatabase();
    return database.withConnection(async (client) => {
      const { rows } = await client.query<RunTableRow>(
        `SELECT ${RUN_COLUMNS} FROM ${this.table} WHERE id = $1`,
        [id]
      );
      return rows.length > 0 ? mapRunRow(rows[0]) : null;
    });
  }

  async countRuns(filters: RunFilters): Promise<number> {
    const { whereClause, values } = buildRunFilterClause(filters);
    const database = await ensureDatabase();
    return database.withConnection(async (client) => {
      const { rows } = await client.query<{ count: string | number }>(
        `SELECT COUNT(*) AS count FROM ${this.table} ${whereClause}`,
        values
      );
      return rows.length > 0 ? Number(rows[0].count) : 0;
    });
  }

  async listRuns(filters: RunFilters, page: RunPage): Promise<RunRow[]> {
    const { whereClause, values } = buildRunFilterClause(filters);
    const params = [...values, page.limit, page.offset];
    const limitIndex = values.length + 1;
    const offsetIndex = values.length + 2;

    const database = await ensureDatabase();
    return database.withConnection(async (client) => {
      const { rows } = await client.query<RunTableRow>(
        `SELECT ${RUN_COLUMNS}
           FROM ${this.table}
           ${whereClause}
          ORDER BY submitted_date DESC, id DESC
          LIMIT $${limitIndex}
         OFFSET $${offsetIndex}`,
        params
      );
      return rows.map(mapRunRow);
    });
  }

  async markRunCompleted(workflowId: string, update: RunCompletionUpdate): Promise<RunRow | null> {
    const database = await ensureDatabase();
    return database.withConnection(async (client) => {
      const { rows } = await client.query<RunTableRow>(
        `UPDATE ${this.table}
            SET status = $2,
                completed_date = $3
          WHERE workflow_id = $1
            AND completed_date IS NULL
        RETURNING ${RUN_COLUMNS}`,
        [workflowId, update.status, update.completedAt.toISOString()]
      );
      return rows.length > 0 ? mapRunRow(rows[0]) : null;
    });
  }

  private async insertWithClient(client: PoolClient, input: NewRunInput): Promise<RunRow> {
    const { rows } = await client.query<RunTableRow>(
      `INSERT INTO ${this.table} (workflow_id, definition, status, submitted_date)
       VALUES ($1, $2, $3, $4)
       RETURNING ${RUN_COLUMNS}`,
      [input.workflowId, JSON.stringify(input.definition), input.status, input.submittedAt.toISOString()]
    );
    return mapRunRow(rows[0]);
  }
}
