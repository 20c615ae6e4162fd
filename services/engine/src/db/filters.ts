import type { RunFilters } from '../runs/types';

export type FilterClause = {
  whereClause: string;
  values: unknown[];
};

function escapeLikePattern(input: string): string {
  return input.replace(/[\\%_]/g, '\\$&');
}

function normalizeDate(value: string | undefined): string | null {
  if (!value) {
    return null;
  }
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    return null;
  }
  return parsed.toISOString();
}

/**
 * Builds the WHERE clause shared by run counting and listing. Placeholders start at `$1`;
 * callers append their own parameters after `values`.
 */
export function buildRunFilterClause(filters: RunFilters): FilterClause {
  const conditions: string[] = [];
  const values: unknown[] = [];

  const search = filters.search?.trim();
  if (search) {
    values.push(`%${escapeLikePattern(search)}%`);
    const index = values.length;
    conditions.push(
      `(workflow_id ILIKE $${index} ESCAPE '\\' OR definition->>'name' ILIKE $${index} ESCAPE '\\')`
    );
  }

  const bounds: Array<[string | undefined, string]> = [
    [filters.submittedAfter, 'submitted_date >='],
    [filters.submittedBefore, 'submitted_date <='],
    [filters.completedAfter, 'completed_date >='],
    [filters.completedBefore, 'completed_date <=']
  ];
  for (const [raw, predicate] of bounds) {
    const value = normalizeDate(raw);
    if (!value) {
      continue;
    }
    values.push(value);
    conditions.push(`${predicate} $${values.length}`);
  }

  return {
    whereClause: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
    values
  };
}
