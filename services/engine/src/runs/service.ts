import type { Definition } from '../definitions/types';
import { NotFoundError, PaginationError, ValidationError, describeError } from '../errors';
import type { EventBroadcaster } from '../events';
import { logger as defaultLogger, type Logger } from '../observability/logger';
import type { EngineMetrics } from '../observability/metrics';
import { isTerminalStatus, type RunStatus } from '../runtime/status';
import type { DurableRuntime } from '../runtime/types';
import { buildExecutionId, toRunRecord } from './format';
import { resolveRunStatus } from './statusReconciler';
import type {
  ListRunsParams,
  ListRunsResult,
  RunDomain,
  RunFilters,
  RunRecord,
  RunRepository,
  RunRow
} from './types';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;
const DEFAULT_STATUS_SCAN_BATCH = 200;

export type RunServiceOptions = {
  domain: RunDomain;
  repository: RunRepository;
  runtime: DurableRuntime;
  events: EventBroadcaster;
  logger?: Logger;
  metrics?: EngineMetrics;
  clock?: () => Date;
  statusScanBatchSize?: number;
  statusTimeoutMs?: number;
};

export function computeTotalPages(totalItems: number, pageSize: number): number {
  return Math.max(1, Math.ceil(totalItems / pageSize));
}

function assertPageInRange(page: number, totalPages: number): void {
  if (page > totalPages) {
    throw new PaginationError(`page ${page} exceeds total pages ${totalPages}`);
  }
}

export class RunService {
  readonly domain: RunDomain;
  private readonly repository: RunRepository;
  private readonly runtime: DurableRuntime;
  private readonly events: EventBroadcaster;
  private readonly logger: Logger;
  private readonly metrics?: EngineMetrics;
  private readonly clock: () => Date;
  private readonly statusScanBatchSize: number;
  private readonly statusTimeoutMs?: number;

  constructor(options: RunServiceOptions) {
    this.domain = options.domain;
    this.repository = options.repository;
    this.runtime = options.runtime;
    this.events = options.events;
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics;
    this.clock = options.clock ?? (() => new Date());
    this.statusScanBatchSize = Math.max(1, options.statusScanBatchSize ?? DEFAULT_STATUS_SCAN_BATCH);
    this.statusTimeoutMs = options.statusTimeoutMs;
  }

  /** Stores the run and starts it on the runtime in one transaction. */
  async submit(definition: Definition): Promise<RunRecord> {
    const submittedAt = this.clock();
    const executionId = buildExecutionId(this.domain, definition, submittedAt);

    const row = await this.repository.insertRun(
      { workflowId: executionId, definition, status: 'RUNNING', submittedAt },
      {
        beforeCommit: async () => {
          await this.runtime.start({ executionId, domain: this.domain, definition });
        }
      }
    );

    const status = await this.reconcile(row);
    this.logger.info('Run submitted', { domain: this.domain, id: row.id, executionId, status });
    await this.events.broadcast({
      type: 'run.submitted',
      data: { domain: this.domain, run: { id: row.id, externalExecutionId: executionId, status } }
    });

    // A fast run can finish before the insert commits, leaving its completion unrecorded.
    if (isTerminalStatus(status)) {
      const completed = await this.recordCompletion(executionId, status);
      if (completed) {
        return toRunRecord(completed, status);
      }
    }

    return toRunRecord(row, status);
  }

  async getRun(id: number): Promise<RunRecord> {
    const row = await this.repository.getRunById(id);
    if (!row) {
      throw new NotFoundError(`${this.domain} ${id} not found`);
    }
    return toRunRecord(row, await this.reconcile(row));
  }

  async listRuns(params: ListRunsParams): Promise<ListRunsResult> {
    const { page, pageSize, status, ...filters } = params;
    if (!Number.isInteger(page) || page < 1) {
      throw new ValidationError('page must be greater than 0');
    }
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
      throw new ValidationError(`pageSize must be between 1 and ${MAX_PAGE_SIZE}`);
    }

    if (status) {
      return this.listRunsByStatus(filters, status, page, pageSize);
    }

    const totalItems = await this.repository.countRuns(filters);
    const totalPages = computeTotalPages(totalItems, pageSize);
    assertPageInRange(page, totalPages);

    const rows = await this.repository.listRuns(filters, { limit: pageSize, offset: (page - 1) * pageSize });
    const items = await Promise.all(rows.map(async (row) => toRunRecord(row, await this.reconcile(row))));

    return { items, totalItems, currentPage: page, totalPages };
  }

  /**
   * Completion bookkeeping for a finished run. Failures are logged and swallowed so that they
   * never change the outcome of the run itself.
   */
  async recordCompletion(executionId: string, status: RunStatus): Promise<RunRow | null> {
    try {
      const row = await this.repository.markRunCompleted(executionId, { status, completedAt: this.clock() });
      if (!row) {
        return null;
      }
      this.metrics?.runCompletions.inc({ domain: this.domain, status });
      this.logger.info('Run completion recorded', { domain: this.domain, id: row.id, executionId, status });
      await this.events.broadcast({
        type: 'run.completed',
        data: { domain: this.domain, run: { id: row.id, externalExecutionId: executionId, status } }
      });
      return row;
    } catch (err) {
      this.logger.error('Failed to record run completion', {
        domain: this.domain,
        executionId,
        status,
        error: describeError(err)
      });
      return null;
    }
  }

  // Status is not stored authoritatively, so every candidate row is reconciled before counting.
  private async listRunsByStatus(
    filters: RunFilters,
    status: RunStatus,
    page: number,
    pageSize: number
  ): Promise<ListRunsResult> {
    const matches: RunRecord[] = [];
    for (let offset = 0; ; offset += this.statusScanBatchSize) {
      const rows = await this.repository.listRuns(filters, { limit: this.statusScanBatchSize, offset });
      const records = await Promise.all(rows.map(async (row) => toRunRecord(row, await this.reconcile(row))));
      for (const record of records) {
        if (record.status === status) {
          matches.push(record);
        }
      }
      if (rows.length < this.statusScanBatchSize) {
        break;
      }
    }

    const totalItems = matches.length;
    const totalPages = computeTotalPages(totalItems, pageSize);
    assertPageInRange(page, totalPages);

    const start = (page - 1) * pageSize;
    return {
      items: matches.slice(start, start + pageSize),
      totalItems,
      currentPage: page,
      totalPages
    };
  }

  private reconcile(row: RunRow): Promise<RunStatus> {
    return resolveRunStatus(this.runtime, row.workflowId, row.status, {
      logger: this.logger,
      metrics: this.metrics,
      timeoutMs: this.statusTimeoutMs
    });
  }
}
