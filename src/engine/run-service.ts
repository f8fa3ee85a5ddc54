/**
 * Batch run service.
 *
 * Creates, executes and cancels batch runs on behalf of the HTTP surface.
 * Each run gets a fresh orchestrator; its lifecycle is mirrored in the run
 * store so callers can poll for the summary.
 */

import { SourceKind } from '../domain/deny-event';
import {
  ExtractionError,
  TypedError,
  errorMessage,
  internalError,
  invalidRangeError,
  noSourcesError,
  notFoundError,
  runInvalidStateTransition,
  validationError,
} from '../domain/errors';
import { BatchRun, BatchRunStatus, TimeWindow } from '../domain/run';
import { Logger, logger as rootLogger } from '../logger';
import { RunStore } from '../storage/store';
import { v4 as uuid } from 'uuid';
import { ExtractionOrchestrator, ExtractionSource } from './orchestrator';

export interface CreateRunInput {
  window: TimeWindow;
  /** Subset of the configured sources; all of them when omitted. */
  sources?: readonly SourceKind[];
  maxRecords?: number;
}

export interface BatchRunServiceDeps {
  store: RunStore;
  /** Sources available to runs. */
  sources: readonly ExtractionSource[];
  createOrchestrator: () => ExtractionOrchestrator;
  logger?: Logger;
}

const ACTIVE_STATUSES: readonly BatchRunStatus[] = [BatchRunStatus.Queued, BatchRunStatus.Running];

export class BatchRunService {
  private readonly controllers = new Map<string, AbortController>();
  private readonly log: Logger;

  constructor(private readonly deps: BatchRunServiceDeps) {
    this.log = deps.logger ?? rootLogger;
  }

  /** Validate the request and record a queued run. Throws ExtractionError. */
  async createRun(input: CreateRunInput): Promise<BatchRun> {
    const { start, end } = input.window;
    if (Number.isNaN(start.getTime()) || Number.isNaN(end.getTime()) || start.getTime() >= end.getTime()) {
      throw new ExtractionError(invalidRangeError(start, end));
    }
    if (this.deps.sources.length === 0) {
      throw new ExtractionError(noSourcesError());
    }
    const selected = this.selectSources(input.sources);

    const now = new Date().toISOString();
    const run: BatchRun = {
      id: `run_${uuid()}`,
      status: BatchRunStatus.Queued,
      window: { start: start.toISOString(), end: end.toISOString() },
      sources: selected.map((s) => s.sourceKind),
      ...(input.maxRecords !== undefined ? { maxRecords: input.maxRecords } : {}),
      createdAt: now,
      updatedAt: now,
    };
    this.controllers.set(run.id, new AbortController());
    this.log.info('Batch run queued', { runId: run.id, sources: run.sources });
    return this.deps.store.create(run);
  }

  /**
   * Execute a queued run to completion. Never rejects for run-level
   * failures; they are recorded on the run.
   */
  async executeRun(runId: string): Promise<BatchRun> {
    const run = await this.requireRun(runId);
    if (run.status !== BatchRunStatus.Queued) {
      throw new ExtractionError(runInvalidStateTransition(runId, run.status, BatchRunStatus.Running));
    }
    const controller = this.controllers.get(runId) ?? new AbortController();
    this.controllers.set(runId, controller);

    await this.deps.store.update(runId, { status: BatchRunStatus.Running });
    const sources = this.selectSources(run.sources).map((source) =>
      run.maxRecords !== undefined ? { ...source, maxRecords: run.maxRecords } : source,
    );

    try {
      const summary = await this.deps.createOrchestrator().run({
        window: { start: new Date(run.window.start), end: new Date(run.window.end) },
        sources,
        runId,
        signal: controller.signal,
      });
      return await this.finish(runId, { status: BatchRunStatus.Completed, summary });
    } catch (err) {
      const error: TypedError = err instanceof ExtractionError
        ? err.typedError
        : internalError(errorMessage(err, 'Run failed'));
      this.log.error('Batch run failed', { runId, code: error.code, error: error.message });
      return await this.finish(runId, { status: BatchRunStatus.Failed, error });
    }
  }

  /** Abandon a queued or running run; sources not yet started fail as canceled. */
  async cancelRun(runId: string, reason?: string): Promise<BatchRun> {
    const run = await this.requireRun(runId);
    if (!ACTIVE_STATUSES.includes(run.status)) {
      throw new ExtractionError(runInvalidStateTransition(runId, run.status, 'canceled'));
    }
    this.controllers.get(runId)?.abort();
    this.log.warn('Batch run cancel requested', { runId, reason });
    return run;
  }

  async getRun(runId: string): Promise<BatchRun | null> {
    return this.deps.store.getById(runId);
  }

  private async finish(runId: string, updates: Partial<BatchRun>): Promise<BatchRun> {
    this.controllers.delete(runId);
    const updated = await this.deps.store.update(runId, updates);
    if (!updated) {
      throw new ExtractionError(notFoundError('Run', runId));
    }
    return updated;
  }

  private async requireRun(runId: string): Promise<BatchRun> {
    const run = await this.deps.store.getById(runId);
    if (!run) {
      throw new ExtractionError(notFoundError('Run', runId));
    }
    return run;
  }

  private selectSources(kinds?: readonly SourceKind[]): ExtractionSource[] {
    if (!kinds) return [...this.deps.sources];
    const unconfigured = kinds.filter((kind) => !this.deps.sources.some((s) => s.sourceKind === kind));
    if (unconfigured.length > 0) {
      throw new ExtractionError(validationError(
        `Source not configured: ${unconfigured.join(', ')}`,
        { unconfigured },
      ));
    }
    if (new Set(kinds).size !== kinds.length) {
      throw new ExtractionError(validationError('Each source may be requested once', { sources: kinds }));
    }
    if (kinds.length === 0) {
      throw new ExtractionError(noSourcesError());
    }
    return this.deps.sources.filter((s) => kinds.includes(s.sourceKind));
  }
}
