import type {
  InsertRunOptions,
  NewRunInput,
  RunCompletionUpdate,
  RunFilters,
  RunPage,
  RunRepository,
  RunRow
} from '../../src/runs/types';

function parseBound(value: string | undefined): number | null {
  if (!value) {
    return null;
  }
  const time = Date.parse(value);
  return Number.isNaN(time) ? null : time;
}

function matchesFilters(row: RunRow, filters: RunFilters): boolean {
  const search = filters.search?.trim().toLowerCase();
  if (search) {
    const haystacks = [row.workflowId.toLowerCase(), row.definition.name.toLowerCase()];
    if (!haystacks.some((value) => value.includes(search))) {
      return false;
    }
  }

  const submitted = Date.parse(row.submittedAt);
  const completed = row.completedAt ? Date.parse(row.completedAt) : null;
  const submittedAfter = parseBound(filters.submittedAfter);
  const submittedBefore = parseBound(filters.submittedBefore);
  const completedAfter = parseBound(filters.completedAfter);
  const completedBefore = parseBound(filters.completedBefore);

  if (submittedAfter !== null && submitted < submittedAfter) {
    return false;
  }
  if (submittedBefore !== null && submitted > submittedBefore) {
    return false;
  }
  if (completedAfter !== null && (completed === null || completed < completedAfter)) {
    return false;
  }
  if (completedBefore !== null && (completed === null || completed > completedBefore)) {
    return false;
  }
  return true;
}

/** In-process stand-in for the Postgres repository. */
export class MemoryRunRepository implements RunRepository {
  readonly rows: RunRow[] = [];
  private nextId = 1;

  async insertRun(input: NewRunInput, options: InsertRunOptions = {}): Promise<RunRow> {
    const row: RunRow = {
      id: this.nextId,
      workflowId: input.workflowId,
      definition: structuredClone(input.definition),
      status: input.status,
      submittedAt: input.submittedAt.toISOString(),
      completedAt: null
    };
    if (options.beforeCommit) {
      await options.beforeCommit({ ...row });
    }
    this.nextId += 1;
    this.rows.push(row);
    return { ...row };
  }

  async getRunById(id: number): Promise<RunRow | null> {
    const row = this.rows.find((entry) => entry.id === id);
    return row ? { ...row } : null;
  }

  async countRuns(filters: RunFilters): Promise<number> {
    return this.rows.filter((row) => matchesFilters(row, filters)).length;
  }

  async listRuns(filters: RunFilters, page: RunPage): Promise<RunRow[]> {
    return this.rows
      .filter((row) => matchesFilters(row, filters))
      .sort((a, b) => b.submittedAt.localeCompare(a.submittedAt) || b.id - a.id)
      .slice(page.offset, page.offset + page.limit)
      .map((row) => ({ ...row }));
  }

  async markRunCompleted(workflowId: string, update: RunCompletionUpdate): Promise<RunRow | null> {
    const row = this.rows.find((entry) => entry.workflowId === workflowId && entry.completedAt === null);
    if (!row) {
      return null;
    }
    row.status = update.status;
    row.completedAt = update.completedAt.toISOString();
    return { ...row };
  }
}
