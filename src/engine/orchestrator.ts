/**
 * Extraction orchestrator.
 *
 * Runs one extraction job per configured source, aggregates the results
 * into an OrchestrationSummary and decides the exit code. A job failure
 * never aborts the run; only an invalid window or an empty source list
 * is thrown back to the caller.
 *
 * Lifecycle: not-started -> running (once per source) -> aggregating ->
 * completed. An orchestrator instance runs exactly once.
 */

import { v4 as uuid } from 'uuid';
import { ClassifierOptions, createClassifier } from '../classification';
import { CredentialSource } from '../credentials/credential-source';
import { SOURCE_KIND_LABELS, SOURCE_KIND_ORDER, SourceKind } from '../domain/deny-event';
import {
  ExtractionError,
  TypedError,
  createTypedError,
  credentialUnavailableError,
  duplicateSourceError,
  errorMessage,
  invalidRangeError,
  noSourcesError,
  notificationFailureError,
  retrievalFailureError,
  runCanceledError,
  uploadFailureError,
} from '../domain/errors';
import { ExtractionJobResult } from '../domain/job';
import { Outcome, fail, succeed } from '../domain/outcome';
import {
  ExecutionMode,
  ExportReport,
  NotificationReport,
  OrchestrationSummary,
  OrchestratorState,
  OverallStatus,
  TimeWindow,
} from '../domain/run';
import { Exporter } from '../export/evidence-exporter';
import { Logger, logger as rootLogger } from '../logger';
import { SummaryNotifier } from '../notifications/webhook';
import { QueryEndpoint, QueryEndpointFactory } from '../retrieval/query-endpoint';
import { EventSink } from '../sinks/sink';
import { JobResultTracker, defaultDestination, runExtractionJob } from './extraction-job';
import { transitionOrchestratorState } from './state-machine';
import { computeOverallStatus, exitCodeFor, totalEventCount } from './summary';

export interface ExtractionSource {
  sourceKind: SourceKind;
  /** Record type or query text passed to the endpoint. */
  query: string;
  createEndpoint: QueryEndpointFactory;
  /** Credential reference resolved through the CredentialSource. */
  credentialRef?: string;
  pageSize?: number;
  maxRecords?: number;
  classifierOptions?: ClassifierOptions;
  /** Sink destination; defaults to "<Label>-<start date>.csv". */
  destination?: string;
}

export interface OrchestratorDeps {
  sink: EventSink;
  credentials: CredentialSource;
  exporter?: Exporter;
  notifier?: SummaryNotifier;
  logger?: Logger;
}

export interface OrchestratorConfig {
  executionMode?: ExecutionMode;
  /** Applied to sources without their own limit. */
  maxRecords?: number;
  pageSize?: number;
}

export interface OrchestrationRequest {
  window: TimeWindow;
  sources: readonly ExtractionSource[];
  runId?: string;
  /** Defaults to the window start date (YYYY-MM-DD). */
  batchId?: string;
  signal?: AbortSignal;
}

interface RunContext {
  runId: string;
  window: TimeWindow;
  credentials: Map<string, Outcome<string>>;
  signal?: AbortSignal;
  log: Logger;
}

/** Detached, frozen copy of a finished job result. */
function freezeResult(result: ExtractionJobResult): ExtractionJobResult {
  const warnings = [...result.warnings];
  warnings.forEach((warning) => Object.freeze(warning));
  Object.freeze(warnings);
  if (result.error) Object.freeze(result.error);
  return Object.freeze({ ...result, warnings });
}

/** Validate the window and source list. Throws ExtractionError. */
export function validateOrchestrationRequest(request: OrchestrationRequest): void {
  const { start, end } = request.window;
  if (Number.isNaN(start.getTime()) || Number.isNaN(end.getTime()) || start.getTime() >= end.getTime()) {
    throw new ExtractionError(invalidRangeError(start, end));
  }
  if (request.sources.length === 0) {
    throw new ExtractionError(noSourcesError());
  }
  const seen = new Set<SourceKind>();
  for (const source of request.sources) {
    if (seen.has(source.sourceKind)) {
      throw new ExtractionError(duplicateSourceError(source.sourceKind));
    }
    seen.add(source.sourceKind);
  }
}

export class ExtractionOrchestrator {
  private state = OrchestratorState.NotStarted;
  private sourceIndex = -1;
  private readonly log: Logger;
  private readonly executionMode: ExecutionMode;

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly config: OrchestratorConfig = {},
  ) {
    this.log = deps.logger ?? rootLogger;
    this.executionMode = config.executionMode ?? 'sequential';
  }

  get currentState(): OrchestratorState {
    return this.state;
  }

  /** Index of the source currently running (sequential mode), -1 before the first. */
  get currentSourceIndex(): number {
    return this.sourceIndex;
  }

  async run(request: OrchestrationRequest): Promise<OrchestrationSummary> {
    if (this.state !== OrchestratorState.NotStarted) {
      throw new ExtractionError(createTypedError({
        code: 'RUN.ALREADY_STARTED',
        message: `Orchestrator already ${this.state}; create a new instance per run`,
        retryable: false,
      }));
    }
    validateOrchestrationRequest(request);

    const runId = request.runId ?? `run_${uuid()}`;
    const batchId = request.batchId ?? request.window.start.toISOString().slice(0, 10);
    const log = this.log.child({ runId });
    const startedAt = new Date().toISOString();

    this.moveTo(OrchestratorState.Running);
    log.info('Run started', {
      batchId,
      start: request.window.start.toISOString(),
      end: request.window.end.toISOString(),
      sources: request.sources.map((s) => s.sourceKind),
      executionMode: this.executionMode,
    });

    const sources = [...request.sources].sort(
      (a, b) => SOURCE_KIND_ORDER.indexOf(a.sourceKind) - SOURCE_KIND_ORDER.indexOf(b.sourceKind),
    );
    const ctx: RunContext = {
      runId,
      window: request.window,
      credentials: await this.resolveCredentials(sources, log),
      signal: request.signal,
      log,
    };

    let results: ExtractionJobResult[];
    if (this.executionMode === 'parallel') {
      this.sourceIndex = 0;
      results = await Promise.all(sources.map((source) => this.runSource(source, ctx)));
    } else {
      results = [];
      for (const [index, source] of sources.entries()) {
        if (index > 0) this.moveTo(OrchestratorState.Running);
        this.sourceIndex = index;
        results.push(await this.runSource(source, ctx));
      }
    }

    this.moveTo(OrchestratorState.Aggregating);
    const overallStatus = computeOverallStatus(results);
    const warnings: TypedError[] = results.flatMap((r) => r.warnings);

    if (overallStatus === OverallStatus.PartialFailure) {
      const failed = results.filter((r) => !r.succeeded).map((r) => SOURCE_KIND_LABELS[r.sourceKind]);
      log.warn('PARTIAL FAILURE: some sources failed, results are incomplete', {
        failedSources: failed,
        failedCount: failed.length,
        sourceCount: results.length,
      });
    } else if (overallStatus === OverallStatus.AllFailed) {
      log.error('All sources failed', { sourceCount: results.length });
    }

    const exportReport = await this.exportOutputs(results, batchId, warnings, log);

    const draft: OrchestrationSummary = {
      runId,
      batchId,
      window: { start: request.window.start.toISOString(), end: request.window.end.toISOString() },
      results,
      totalEvents: totalEventCount(results),
      overallStatus,
      exitCode: exitCodeFor(overallStatus),
      warnings,
      ...(exportReport ? { export: exportReport } : {}),
      startedAt,
      completedAt: new Date().toISOString(),
    };

    const notification = await this.notify(draft, warnings, log);
    const summary: OrchestrationSummary = Object.freeze({
      ...draft,
      results: Object.freeze(results.map(freezeResult)),
      warnings: Object.freeze([...warnings]),
      ...(notification ? { notification } : {}),
    });

    this.moveTo(OrchestratorState.Completed);
    log.info('Run completed', {
      overallStatus: summary.overallStatus,
      totalEvents: summary.totalEvents,
      exitCode: summary.exitCode,
      warningCount: summary.warnings.length,
    });
    return summary;
  }

  private moveTo(target: OrchestratorState): void {
    const transition = transitionOrchestratorState(this.state, target);
    if (!transition.success || transition.newStatus === undefined) {
      throw new Error(transition.error?.message ?? `Invalid orchestrator transition to ${target}`);
    }
    this.state = transition.newStatus;
  }

  /** Resolve each distinct credential reference once. */
  private async resolveCredentials(
    sources: readonly ExtractionSource[],
    log: Logger,
  ): Promise<Map<string, Outcome<string>>> {
    const refs = [...new Set(sources.flatMap((s) => (s.credentialRef ? [s.credentialRef] : [])))];
    const resolved = await Promise.all(refs.map(async (ref): Promise<[string, Outcome<string>]> => {
      try {
        return [ref, succeed(await this.deps.credentials.resolve(ref))];
      } catch (err) {
        log.warn('Credential unavailable', { credentialRef: ref, error: errorMessage(err) });
        return [ref, fail(credentialUnavailableError(ref))];
      }
    }));
    return new Map(resolved);
  }

  private async runSource(source: ExtractionSource, ctx: RunContext): Promise<ExtractionJobResult> {
    const { sourceKind } = source;
    const credential = source.credentialRef ? ctx.credentials.get(source.credentialRef) : undefined;
    const secret = credential?.success ? credential.value : undefined;
    const tracker = new JobResultTracker(sourceKind, secret ? [secret] : []);

    if (ctx.signal?.aborted) {
      ctx.log.warn('Source skipped, run canceled', { sourceKind });
      return tracker.fail({ ...runCanceledError(ctx.runId, 'run abandoned before source started'), sourceKind });
    }

    if (credential && !credential.success) {
      ctx.log.error('Source failed, credential unavailable', { sourceKind, credentialRef: source.credentialRef });
      return tracker.fail({ ...credential.error, sourceKind });
    }

    let endpoint: QueryEndpoint;
    try {
      endpoint = source.createEndpoint(secret);
    } catch (err) {
      const result = tracker.fail(retrievalFailureError(sourceKind, errorMessage(err, 'Endpoint setup failed')));
      ctx.log.error('Source failed, endpoint could not be created', { sourceKind, error: result.errorDetail });
      return result;
    }

    try {
      return await runExtractionJob({
        sourceKind,
        query: source.query,
        window: ctx.window,
        endpoint,
        classifier: createClassifier(sourceKind, source.classifierOptions),
        sink: this.deps.sink,
        destination: source.destination ?? defaultDestination(sourceKind, ctx.window),
        pageSize: source.pageSize ?? this.config.pageSize,
        maxRecords: source.maxRecords ?? this.config.maxRecords,
        secrets: secret ? [secret] : [],
        signal: ctx.signal,
      }, ctx.log);
    } catch (err) {
      // A source-level limit error fails that source only
      if (err instanceof ExtractionError) {
        ctx.log.error('Source rejected', { sourceKind, code: err.typedError.code, error: err.message });
        return tracker.fail({ ...err.typedError, sourceKind });
      }
      throw err;
    }
  }

  private async exportOutputs(
    results: readonly ExtractionJobResult[],
    batchId: string,
    warnings: TypedError[],
    log: Logger,
  ): Promise<ExportReport | undefined> {
    if (!this.deps.exporter) return undefined;
    const locations = results.flatMap((r) => (r.outputLocation ? [r.outputLocation] : []));
    if (locations.length === 0) {
      log.info('Export skipped, no output produced');
      return undefined;
    }

    try {
      const report = await this.deps.exporter.export(locations, batchId);
      for (const file of report.files) {
        if (!file.success) {
          warnings.push(uploadFailureError(file.location, file.error ?? 'export failed'));
        }
      }
      log.info('Export finished', {
        batchId,
        exported: report.files.filter((f) => f.success).length,
        total: report.files.length,
        manifestLocation: report.manifestLocation,
      });
      return report;
    } catch (err) {
      const message = errorMessage(err, 'Export failed');
      log.warn('Export failed', { batchId, error: message });
      for (const location of locations) {
        warnings.push(uploadFailureError(location, message));
      }
      return {
        batchId,
        files: locations.map((location) => ({ location, success: false, error: message })),
      };
    }
  }

  private async notify(
    summary: OrchestrationSummary,
    warnings: TypedError[],
    log: Logger,
  ): Promise<NotificationReport | undefined> {
    if (!this.deps.notifier) return undefined;

    let report: NotificationReport;
    try {
      report = await this.deps.notifier.notify(summary);
    } catch (err) {
      report = { success: false, error: errorMessage(err, 'Notification failed') };
    }

    if (!report.success) {
      warnings.push(notificationFailureError(report.error ?? 'delivery failed', report.statusCode));
      log.warn('Summary notification failed', { error: report.error, statusCode: report.statusCode });
    }
    return report;
  }
}
