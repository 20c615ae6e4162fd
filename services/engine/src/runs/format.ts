import type { Definition } from '../definitions/types';
import type { RunStatus } from '../runtime/status';
import type { RunDomain, RunRecord, RunRow } from './types';

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** `YYYYMMDDHHmmss` in UTC. */
export function formatCompactTimestamp(date: Date): string {
  return [
    pad(date.getUTCFullYear(), 4),
    pad(date.getUTCMonth() + 1),
    pad(date.getUTCDate()),
    pad(date.getUTCHours()),
    pad(date.getUTCMinutes()),
    pad(date.getUTCSeconds())
  ].join('');
}

export function buildExecutionId(domain: RunDomain, definition: Definition, submittedAt: Date): string {
  return `${domain}_${definition.name}_${definition.version}_${formatCompactTimestamp(submittedAt)}`;
}

/** RFC 3339 with second precision, e.g. `2024-03-01T12:00:00Z`. */
export function formatTimestamp(value: string | Date): string {
  const date = typeof value === 'string' ? new Date(value) : value;
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function toRunRecord(row: RunRow, status: RunStatus): RunRecord {
  return {
    id: row.id,
    externalExecutionId: row.workflowId,
    status,
    submittedDate: formatTimestamp(row.submittedAt),
    ...(row.completedAt ? { completedDate: formatTimestamp(row.completedAt) } : {}),
    definition: row.definition
  };
}
