import type { Definition } from '../definitions/types';
import type { RunStatus } from '../runtime/status';
import type { RunDomain } from '../runtime/types';

export type { RunDomain } from '../runtime/types';

export const RUN_DOMAINS: readonly RunDomain[] = ['pipeline', 'policy'];

/** A persisted run row. Timestamps are ISO-8601 strings. */
export type RunRow = {
  id: number;
  workflowId: string;
  definition: Definition;
  /** Last known status; advisory only. */
  status: RunStatus | null;
  submittedAt: string;
  completedAt: string | null;
};

export type NewRunInput = {
  workflowId: string;
  definition: Definition;
  status: RunStatus;
  submittedAt: Date;
};

export type RunCompletionUpdate = {
  status: RunStatus;
  completedAt: Date;
};

export type RunFilters = {
  search?: string;
  submittedAfter?: string;
  submittedBefore?: string;
  completedAfter?: string;
  completedBefore?: string;
};

export type RunPage = {
  limit: number;
  offset: number;
};

export type InsertRunOptions = {
  /** Runs inside the insert transaction; rejecting rolls the insert back. */
  beforeCommit?: (row: RunRow) => Promise<void>;
};

export interface RunRepository {
  insertRun(input: NewRunInput, options?: InsertRunOptions): Promise<RunRow>;
  getRunById(id: number): Promise<RunRow | null>;
  countRuns(filters: RunFilters): Promise<number>;
  /** Ordered by submission time, newest first. */
  listRuns(filters: RunFilters, page: RunPage): Promise<RunRow[]>;
  /** Records completion once; returns null when the run is unknown or already completed. */
  markRunCompleted(workflowId: string, update: RunCompletionUpdate): Promise<RunRow | null>;
}

export type RunRecord = {
  id: number;
  externalExecutionId: string;
  status: RunStatus;
  submittedDate: string;
  completedDate?: string;
  definition: Definition;
};

export type ListRunsParams = RunFilters & {
  page: number;
  pageSize: number;
  status?: RunStatus;
};

export type ListRunsResult = {
  items: RunRecord[];
  totalItems: number;
  currentPage: number;
  totalPages: number;
};
