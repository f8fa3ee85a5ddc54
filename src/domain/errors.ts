/**
 * Typed error model for machine-actionable error handling.
 *
 * Failures scoped to a single record or a single source are returned as
 * typed values and attached to job results; only caller errors are thrown,
 * wrapped in an ExtractionError.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'VALIDATION'
  | 'CONFIG'
  | 'SOURCE'
  | 'RECORD'
  | 'SECRETS'
  | 'SINK'
  | 'EXPORT'
  | 'NOTIFY'
  | 'JOB'
  | 'RUN'
  | 'SYSTEM';

/** Typed suggested fix that operators or agents can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure attached to results and API responses. */
export interface TypedError {
  /** Namespaced error code (e.g., "SOURCE.RETRIEVAL_FAILED"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Associated batch run if applicable. */
  runId?: string;
  /** Associated source if applicable. */
  sourceKind?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  runId?: string;
  sourceKind?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    runId: params.runId,
    sourceKind: params.sourceKind,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Domain part of an error code ("SOURCE.RETRIEVAL_FAILED" -> "SOURCE"). */
export function errorDomain(error: TypedError): string {
  const dot = error.code.indexOf('.');
  return dot === -1 ? error.code : error.code.slice(0, dot);
}

// --- Common error factory functions ---

export function validationError(message: string, details?: Record<string, unknown>, fixes?: SuggestedFix[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    retryable: false,
    details,
    suggestedFixes: fixes,
  });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.NOT_FOUND',
    message: `${resourceType} not found: ${resourceId}`,
    retryable: false,
  });
}

export function invalidRangeError(startTime: Date, endTime: Date): TypedError {
  return createTypedError({
    code: 'VALIDATION.INVALID_RANGE',
    message: `Start time must be before end time (start=${describeInstant(startTime)}, end=${describeInstant(endTime)})`,
    retryable: false,
    details: { startTime: describeInstant(startTime), endTime: describeInstant(endTime) },
    suggestedFixes: [
      { type: 'FIX_TIME_WINDOW', params: {}, description: 'Pass a start time strictly earlier than the end time' },
    ],
  });
}

export function noSourcesError(): TypedError {
  return createTypedError({
    code: 'CONFIG.NO_SOURCES',
    message: 'No extraction source is configured for this run',
    retryable: false,
    suggestedFixes: [
      { type: 'CONFIGURE_SOURCE', params: { env: 'DENY_<SOURCE>_ENDPOINT' }, description: 'Set the endpoint of at least one source' },
    ],
  });
}

export function retrievalFailureError(
  sourceKind: string,
  message: string,
  details?: Record<string, unknown>,
): TypedError {
  return createTypedError({
    code: 'SOURCE.RETRIEVAL_FAILED',
    message,
    sourceKind,
    retryable: true,
    details,
    suggestedFixes: [
      { type: 'WAIT_AND_RETRY', params: { delayMs: 60_000 }, description: 'Re-run the extraction for this source' },
    ],
  });
}

export function capExceededWarning(sourceKind: string, maxRecords: number, retrieved: number): TypedError {
  return createTypedError({
    code: 'SOURCE.CAP_EXCEEDED',
    message: `Results truncated at ${retrieved} records (cap ${maxRecords}); narrow the time window to retrieve the remainder`,
    sourceKind,
    retryable: false,
    details: { maxRecords, retrieved },
    suggestedFixes: [
      { type: 'REDUCE_SCOPE', params: {}, description: 'Split the run into smaller time windows' },
    ],
  });
}

export function malformedRecordError(sourceKind: string, issues: string[]): TypedError {
  return createTypedError({
    code: 'RECORD.MALFORMED',
    message: `Malformed ${sourceKind} record: ${issues.join('; ')}`,
    sourceKind,
    retryable: false,
    details: { issues },
  });
}

export function malformedRecordsSkippedWarning(sourceKind: string, count: number, sampleIssues: string[]): TypedError {
  return createTypedError({
    code: 'RECORD.MALFORMED',
    message: `Skipped ${count} malformed ${sourceKind} record${count === 1 ? '' : 's'}`,
    sourceKind,
    retryable: false,
    details: { count, sampleIssues },
  });
}

export function credentialUnavailableError(credentialRef: string, sourceKind?: string): TypedError {
  return createTypedError({
    code: 'SECRETS.UNAVAILABLE',
    message: 'credential unavailable',
    sourceKind,
    retryable: false,
    details: { credentialRef },
    suggestedFixes: [
      { type: 'PROVIDE_SECRET', params: { key: credentialRef }, description: `Provide a value for credential "${credentialRef}"` },
    ],
  });
}

export function sinkWriteError(sourceKind: string, destination: string, message: string): TypedError {
  return createTypedError({
    code: 'SINK.WRITE_FAILED',
    message: `Failed to write events to ${destination}: ${message}`,
    sourceKind,
    retryable: true,
    details: { destination },
  });
}

export function uploadFailureError(location: string, message: string): TypedError {
  return createTypedError({
    code: 'EXPORT.UPLOAD_FAILED',
    message: `Export of ${location} failed: ${message}`,
    retryable: true,
    details: { location },
  });
}

export function notificationFailureError(message: string, statusCode?: number): TypedError {
  return createTypedError({
    code: 'NOTIFY.DELIVERY_FAILED',
    message: `Summary notification failed: ${message}`,
    retryable: true,
    details: statusCode === undefined ? undefined : { statusCode },
  });
}

export function duplicateSourceError(sourceKind: string): TypedError {
  return createTypedError({
    code: 'CONFIG.DUPLICATE_SOURCE',
    message: `Source configured more than once: ${sourceKind}`,
    sourceKind,
    retryable: false,
  });
}

export function runCanceledError(runId?: string, reason?: string): TypedError {
  return createTypedError({
    code: 'RUN.CANCELED',
    message: reason ? `Run canceled: ${reason}` : 'Run canceled',
    runId,
    retryable: false,
    details: reason ? { reason } : undefined,
  });
}

export function runInvalidStateTransition(runId: string, from: string, to: string): TypedError {
  return createTypedError({
    code: 'RUN.INVALID_STATE_TRANSITION',
    message: `Cannot transition run from "${from}" to "${to}"`,
    runId,
    retryable: false,
    details: { from, to },
  });
}

export function internalError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'SYSTEM.INTERNAL',
    message,
    retryable: false,
    details,
  });
}

/** Thrown for caller errors (invalid range, missing configuration). */
export class ExtractionError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'ExtractionError';
  }
}

/** Extract a message from an unknown thrown value. */
export function errorMessage(err: unknown, fallback = 'Unknown error'): string {
  if (err instanceof Error) return err.message;
  // Errors raised in another realm (vm contexts, test sandboxes) fail instanceof
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  if (typeof err === 'string' && err.length > 0) return err;
  return fallback;
}

function describeInstant(value: Date): string {
  return Number.isNaN(value.getTime()) ? 'invalid date' : value.toISOString();
}

/**
 * Mask a secret value, preserving only the last 4 characters for
 * identification. Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/**
 * Replace each occurrence of the given secrets in a message with its masked
 * form. Source endpoints occasionally echo bearer tokens in error bodies;
 * every message attached to a job result passes through here first.
 */
export function maskSecretsInMessage(message: string, secrets: string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      // split/join avoids regex escaping of secret characters
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
