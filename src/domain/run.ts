/**
 * Batch run domain model.
 *
 * A single invocation of the orchestrator over a time window, producing
 * one job result per configured source and one immutable summary.
 */

import { SourceKind } from './deny-event';
import { TypedError } from './errors';
import { ExtractionJobResult } from './job';

/** Orchestrator lifecycle states. */
export enum OrchestratorState {
  NotStarted = 'not-started',
  Running = 'running',
  Aggregating = 'aggregating',
  Completed = 'completed',
}

/** Valid state transitions for the orchestrator. */
export const VALID_ORCHESTRATOR_TRANSITIONS: Record<OrchestratorState, OrchestratorState[]> = {
  [OrchestratorState.NotStarted]: [OrchestratorState.Running],
  // running -> running advances to the next source
  [OrchestratorState.Running]: [OrchestratorState.Running, OrchestratorState.Aggregating],
  [OrchestratorState.Aggregating]: [OrchestratorState.Completed],
  [OrchestratorState.Completed]: [],
};

/** Aggregate outcome across all jobs of a run. */
export enum OverallStatus {
  AllSucceeded = 'all-succeeded',
  PartialFailure = 'partial-failure',
  AllFailed = 'all-failed',
}

/** Process exit codes. */
export enum ExitCode {
  Success = 0,
  Fatal = 1,
  InvalidArguments = 2,
}

/** How independent jobs are scheduled. */
export type ExecutionMode = 'sequential' | 'parallel';

/** Half-open interval [start, end). */
export interface TimeWindow {
  start: Date;
  end: Date;
}

/** Per-file outcome of the export step. */
export interface ExportFileResult {
  location: string;
  success: boolean;
  exportedTo?: string;
  sha256?: string;
  error?: string;
}

export interface ExportReport {
  batchId: string;
  files: ExportFileResult[];
  manifestLocation?: string;
}

export interface NotificationReport {
  success: boolean;
  statusCode?: number;
  error?: string;
}

export interface OrchestrationSummary {
  runId: string;
  batchId: string;
  window: { start: string; end: string };
  results: readonly ExtractionJobResult[];
  totalEvents: number;
  overallStatus: OverallStatus;
  exitCode: ExitCode;
  /** Every non-fatal condition of the run, job warnings included. */
  warnings: readonly TypedError[];
  export?: ExportReport;
  notification?: NotificationReport;
  startedAt: string;
  completedAt: string;
}

/** Run lifecycle as tracked by the run store and the HTTP surface. */
export enum BatchRunStatus {
  Queued = 'queued',
  Running = 'running',
  Completed = 'completed',
  Failed = 'failed',
}

/** A batch run record, as kept by the run store. */
export interface BatchRun {
  id: string;
  status: BatchRunStatus;
  window: { start: string; end: string };
  sources: SourceKind[];
  maxRecords?: number;
  createdAt: string;
  updatedAt: string;
  summary?: OrchestrationSummary;
  /** Set when the run failed before any job could run. */
  error?: TypedError;
}
