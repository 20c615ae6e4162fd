export const RUN_STATUSES = [
  'RUNNING',
  'COMPLETED',
  'FAILED',
  'CANCELLED',
  'TERMINATED',
  'TIMED_OUT',
  'CONTINUED_AS_NEW'
] as const;

export type KnownRunStatus = (typeof RUN_STATUSES)[number];
export type UnknownRunStatus = `UNKNOWN(${string})`;
export type RunStatus = KnownRunStatus | UnknownRunStatus;

const KNOWN_STATUSES: ReadonlySet<string> = new Set<string>(RUN_STATUSES);
const UNKNOWN_PATTERN = /^UNKNOWN\((.*)\)$/;

const TERMINAL_STATUSES: ReadonlySet<RunStatus> = new Set<RunStatus>([
  'COMPLETED',
  'FAILED',
  'CANCELLED',
  'TERMINATED',
  'TIMED_OUT',
  'CONTINUED_AS_NEW'
]);

export function isKnownRunStatus(value: string): value is KnownRunStatus {
  return KNOWN_STATUSES.has(value);
}

export function unknownStatus(code: string | number): UnknownRunStatus {
  return `UNKNOWN(${code})`;
}

export function parseRunStatus(value: string | null | undefined): RunStatus | null {
  if (!value) {
    return null;
  }
  const normalized = value.trim().toUpperCase();
  if (isKnownRunStatus(normalized)) {
    return normalized;
  }
  const match = UNKNOWN_PATTERN.exec(value.trim());
  if (match) {
    return unknownStatus(match[1] ?? '');
  }
  return null;
}

export function isTerminalStatus(status: RunStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

/** Maps a BullMQ job state onto the run status vocabulary. */
export function mapJobState(state: string): RunStatus {
  switch (state) {
    case 'completed':
      return 'COMPLETED';
    case 'failed':
      return 'FAILED';
    case 'active':
    case 'waiting':
    case 'waiting-children':
    case 'delayed':
    case 'prioritized':
    case 'paused':
      return 'RUNNING';
    default:
      return unknownStatus(state);
  }
}
