/**
 * Extraction job: retrieve, classify, write, report.
 *
 * A job never throws for a source-scoped failure. Retrieval, sink and
 * unexpected internal errors are captured in the returned result; only
 * caller errors (an invalid window) propagate as ExtractionError.
 */

import { Classifier } from '../classification/classifier';
import { DenyEvent, SOURCE_KIND_LABELS, SourceKind } from '../domain/deny-event';
import {
  ExtractionError,
  TypedError,
  errorMessage,
  internalError,
  malformedRecordsSkippedWarning,
  maskSecretsInMessage,
  sinkWriteError,
} from '../domain/errors';
import { ExtractionJobResult, JobStatus, createPendingResult } from '../domain/job';
import { TimeWindow } from '../domain/run';
import { Logger, logger as rootLogger } from '../logger';
import { retrieveAll } from '../retrieval/paged-retriever';
import { QueryEndpoint } from '../retrieval/query-endpoint';
import { EventSink } from '../sinks/sink';
import { transitionJobStatus } from './state-machine';

/** Issues kept on the malformed-records warning. */
const MAX_SAMPLE_ISSUES = 5;

export interface ExtractionJobRequest {
  sourceKind: SourceKind;
  query: string;
  window: TimeWindow;
  endpoint: QueryEndpoint;
  classifier: Classifier;
  sink: EventSink;
  destination: string;
  pageSize?: number;
  maxRecords?: number;
  /** Secret values to mask out of any error attached to the result. */
  secrets?: string[];
  signal?: AbortSignal;
}

/**
 * Tracks one job result through pending -> running -> terminal. The result
 * is finalized exactly once; a second finalization is a programming error.
 */
export class JobResultTracker {
  private result: ExtractionJobResult;
  private startedAtMs?: number;

  constructor(sourceKind: SourceKind, private readonly secrets: string[] = []) {
    this.result = createPendingResult(sourceKind);
  }

  get current(): ExtractionJobResult {
    return this.result;
  }

  start(): void {
    this.move(JobStatus.Running);
    this.startedAtMs = Date.now();
    this.result = { ...this.result, status: JobStatus.Running, startedAt: new Date(this.startedAtMs).toISOString() };
  }

  succeed(fields: Partial<Pick<ExtractionJobResult, 'eventCount' | 'rawCount' | 'discardedCount' | 'malformedCount' | 'truncated' | 'outputLocation' | 'warnings'>>): ExtractionJobResult {
    this.move(JobStatus.Succeeded);
    this.result = {
      ...this.result,
      ...fields,
      warnings: (fields.warnings ?? this.result.warnings).map((w) => this.mask(w)),
      status: JobStatus.Succeeded,
      succeeded: true,
      ...this.timing(),
    };
    return this.result;
  }

  fail(error: TypedError, fields: Partial<Pick<ExtractionJobResult, 'rawCount' | 'discardedCount' | 'malformedCount' | 'truncated' | 'warnings'>> = {}): ExtractionJobResult {
    this.move(JobStatus.Failed);
    const masked = this.mask({ ...error, sourceKind: error.sourceKind ?? this.result.sourceKind });
    this.result = {
      ...this.result,
      ...fields,
      warnings: (fields.warnings ?? this.result.warnings).map((w) => this.mask(w)),
      status: JobStatus.Failed,
      succeeded: false,
      eventCount: 0,
      outputLocation: undefined,
      errorDetail: masked.message,
      error: masked,
      ...this.timing(),
    };
    return this.result;
  }

  private move(target: JobStatus): void {
    const transition = transitionJobStatus(this.result.status, target);
    if (!transition.success) {
      throw new Error(transition.error?.message ?? `Invalid job transition to ${target}`);
    }
  }

  private timing(): Pick<ExtractionJobResult, 'completedAt' | 'durationMs'> {
    const completedAtMs = Date.now();
    return {
      completedAt: new Date(completedAtMs).toISOString(),
      durationMs: this.startedAtMs === undefined ? undefined : completedAtMs - this.startedAtMs,
    };
  }

  private mask(error: TypedError): TypedError {
    if (this.secrets.length === 0) return error;
    return { ...error, message: maskSecretsInMessage(error.message, this.secrets) };
  }
}

/** Output file name for a source and window, e.g. "InteractionAudit-2026-01-25.csv". */
export function defaultDestination(sourceKind: SourceKind, window: TimeWindow): string {
  return `${SOURCE_KIND_LABELS[sourceKind]}-${window.start.toISOString().slice(0, 10)}.csv`;
}

export async function runExtractionJob(
  job: ExtractionJobRequest,
  log: Logger = rootLogger,
): Promise<ExtractionJobResult> {
  const jobLog = log.child({ sourceKind: job.sourceKind });
  const tracker = new JobResultTracker(job.sourceKind, job.secrets);
  tracker.start();
  jobLog.info('Extraction started', {
    start: job.window.start.toISOString(),
    end: job.window.end.toISOString(),
  });

  try {
    const retrieval = await retrieveAll(job.endpoint, {
      sourceKind: job.sourceKind,
      query: job.query,
      startTime: job.window.start,
      endTime: job.window.end,
      pageSize: job.pageSize,
      maxRecords: job.maxRecords,
      signal: job.signal,
    }, jobLog);

    if (!retrieval.success) {
      const result = tracker.fail(retrieval.error);
      jobLog.error('Retrieval failed', { code: result.error?.code, error: result.errorDetail });
      return result;
    }

    const { records, termination, warning } = retrieval.value;
    const warnings: TypedError[] = warning ? [warning] : [];
    const truncated = termination === 'capped';

    if (records.length === 0) {
      jobLog.info('No raw records in window');
      return tracker.succeed({ eventCount: 0, rawCount: 0, truncated, warnings });
    }

    const events: DenyEvent[] = [];
    let discardedCount = 0;
    let malformedCount = 0;
    const sampleIssues: string[] = [];

    for (const [index, raw] of records.entries()) {
      const outcome = job.classifier(raw);
      switch (outcome.kind) {
        case 'event':
          events.push(outcome.event);
          break;
        case 'discard':
          discardedCount++;
          break;
        case 'malformed':
          malformedCount++;
          if (sampleIssues.length < MAX_SAMPLE_ISSUES) sampleIssues.push(outcome.error.message);
          jobLog.warn('Skipping malformed record', { recordIndex: index, error: outcome.error.message });
          break;
      }
    }

    if (malformedCount > 0) {
      warnings.push(malformedRecordsSkippedWarning(job.sourceKind, malformedCount, sampleIssues));
    }

    const counts = { rawCount: records.length, discardedCount, malformedCount, truncated, warnings };

    if (events.length === 0) {
      jobLog.info('Raw records retrieved but nothing actionable', { rawCount: records.length, discardedCount, malformedCount });
      return tracker.succeed({ ...counts, eventCount: 0 });
    }

    const written = await job.sink.write(events, job.destination);
    if (!written.success) {
      const result = tracker.fail(
        sinkWriteError(job.sourceKind, job.destination, written.error.message),
        counts,
      );
      jobLog.error('Sink write failed', { destination: job.destination, error: result.errorDetail });
      return result;
    }

    const result = tracker.succeed({
      ...counts,
      eventCount: events.length,
      outputLocation: written.value.location,
    });
    jobLog.info('Extraction completed', {
      rawCount: result.rawCount,
      eventCount: result.eventCount,
      discardedCount,
      malformedCount,
      outputLocation: result.outputLocation,
    });
    return result;
  } catch (err) {
    if (err instanceof ExtractionError) throw err;
    const result = tracker.fail(internalError(errorMessage(err, 'Extraction job failed')));
    jobLog.error('Extraction job failed unexpectedly', { error: result.errorDetail });
    return result;
  }
}
