/**
 * Extraction job domain model.
 *
 * One job per configured source per run. Its result starts as a pending
 * placeholder and is finalized exactly once.
 */

import { SourceKind } from './deny-event';
import { TypedError } from './errors';

/** Extraction job lifecycle states. */
export enum JobStatus {
  Pending = 'pending',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
}

/** Valid state transitions for jobs. */
export const VALID_JOB_TRANSITIONS: Record<JobStatus, JobStatus[]> = {
  // pending -> failed covers jobs that never start (missing credential, cancellation)
  [JobStatus.Pending]: [JobStatus.Running, JobStatus.Failed],
  [JobStatus.Running]: [JobStatus.Succeeded, JobStatus.Failed],
  [JobStatus.Succeeded]: [],
  [JobStatus.Failed]: [],
};

/** How retrieval ended for a source. */
export type RetrievalTermination = 'exhausted' | 'capped';

export interface ExtractionJobResult {
  sourceKind: SourceKind;
  status: JobStatus;
  succeeded: boolean;
  /** Deny events written to the sink. */
  eventCount: number;
  /** Raw records retrieved from the source. */
  rawCount: number;
  /** Records without any deny signal. */
  discardedCount: number;
  /** Records skipped because required fields were missing or mistyped. */
  malformedCount: number;
  /** True when retrieval stopped at the record cap. */
  truncated: boolean;
  outputLocation?: string;
  errorDetail?: string;
  error?: TypedError;
  /** Non-fatal conditions (cap exceeded, malformed records). */
  warnings: TypedError[];
  startedAt?: string;
  completedAt?: string;
  durationMs?: number;
}

/** Placeholder created when a job is scheduled. */
export function createPendingResult(sourceKind: SourceKind): ExtractionJobResult {
  return {
    sourceKind,
    status: JobStatus.Pending,
    succeeded: false,
    eventCount: 0,
    rawCount: 0,
    discardedCount: 0,
    malformedCount: 0,
    truncated: false,
    warnings: [],
  };
}
