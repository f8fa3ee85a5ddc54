/**
 * Paged retrieval over a continuation-token query endpoint.
 *
 * Sources cap both the page size and the total result count, so retrieval
 * ends in one of two ways:
 *   - exhausted: a page came back short (or without a continuation token)
 *   - capped:    the accumulated count reached maxRecords
 *
 * A capped retrieval is NOT complete. The collector attaches a
 * SOURCE.CAP_EXCEEDED warning so the truncation stays visible in the run
 * summary. Pages are fetched strictly one after another: each call needs the
 * token returned by the previous one.
 */

import { SourceKind } from '../domain/deny-event';
import {
  ExtractionError,
  TypedError,
  capExceededWarning,
  createTypedError,
  errorMessage,
  invalidRangeError,
  retrievalFailureError,
  runCanceledError,
} from '../domain/errors';
import { RetrievalTermination } from '../domain/job';
import { Outcome, fail, succeed } from '../domain/outcome';
import { Logger, logger as rootLogger } from '../logger';
import { QueryEndpoint, SourceQueryError } from './query-endpoint';

/** Known ceiling of the upstream audit search APIs. */
export const DEFAULT_MAX_RECORDS = 50_000;
export const DEFAULT_PAGE_SIZE = 5_000;

export interface RetrievalRequest {
  sourceKind: SourceKind;
  query: string;
  startTime: Date;
  endTime: Date;
  pageSize?: number;
  maxRecords?: number;
  signal?: AbortSignal;
}

export interface RetrievedPage {
  pageIndex: number;
  records: unknown[];
  /** Records retrieved so far, this page included. */
  cumulativeCount: number;
  /** Set on the final page only. */
  termination?: RetrievalTermination;
}

export interface RetrievalResult {
  records: unknown[];
  pageCount: number;
  termination: RetrievalTermination;
  /** SOURCE.CAP_EXCEEDED when termination is capped. */
  warning?: TypedError;
}

class RetrievalCanceledError extends Error {
  constructor() {
    super('Retrieval canceled');
    this.name = 'RetrievalCanceledError';
  }
}

/**
 * Validate a request and resolve its limits. Throws an ExtractionError for
 * caller errors; nothing has been sent to the endpoint at that point.
 */
export function resolveRetrievalLimits(request: RetrievalRequest): { pageSize: number; maxRecords: number } {
  const { startTime, endTime } = request;
  if (
    Number.isNaN(startTime.getTime()) ||
    Number.isNaN(endTime.getTime()) ||
    startTime.getTime() >= endTime.getTime()
  ) {
    throw new ExtractionError(invalidRangeError(startTime, endTime));
  }

  const pageSize = request.pageSize ?? DEFAULT_PAGE_SIZE;
  const maxRecords = request.maxRecords ?? DEFAULT_MAX_RECORDS;
  if (!Number.isInteger(pageSize) || pageSize <= 0 || !Number.isInteger(maxRecords) || maxRecords <= 0) {
    throw new ExtractionError(createTypedError({
      code: 'VALIDATION.INVALID_LIMITS',
      message: `pageSize and maxRecords must be positive integers (pageSize=${pageSize}, maxRecords=${maxRecords})`,
      sourceKind: request.sourceKind,
      retryable: false,
      details: { pageSize, maxRecords },
    }));
  }
  return { pageSize, maxRecords };
}

/**
 * Lazily iterate the pages of one source. The request is validated
 * immediately; the generator is finite and cannot be restarted.
 */
export function paginate(endpoint: QueryEndpoint, request: RetrievalRequest): AsyncGenerator<RetrievedPage> {
  const limits = resolveRetrievalLimits(request);
  return pageGenerator(endpoint, request, limits.pageSize, limits.maxRecords);
}

async function* pageGenerator(
  endpoint: QueryEndpoint,
  request: RetrievalRequest,
  pageSize: number,
  maxRecords: number,
): AsyncGenerator<RetrievedPage> {
  let continuationToken: string | undefined;
  let cumulativeCount = 0;

  for (let pageIndex = 0; ; pageIndex++) {
    if (request.signal?.aborted) {
      throw new RetrievalCanceledError();
    }

    const page = await endpoint.query({
      query: request.query,
      startTime: request.startTime,
      endTime: request.endTime,
      continuationToken,
      pageSize,
      signal: request.signal,
    });

    cumulativeCount += page.records.length;
    const exhausted = page.records.length < pageSize || !page.nextContinuationToken;
    const capped = !exhausted && cumulativeCount >= maxRecords;

    yield {
      pageIndex,
      records: page.records,
      cumulativeCount,
      termination: exhausted ? 'exhausted' : capped ? 'capped' : undefined,
    };

    if (exhausted || capped) return;
    continuationToken = page.nextContinuationToken;
  }
}

/**
 * Retrieve every record of a window into memory.
 *
 * Throws only for an invalid request. Transport and authentication errors
 * come back as a SOURCE.RETRIEVAL_FAILED outcome; an aborted signal comes
 * back as RUN.CANCELED.
 */
export async function retrieveAll(
  endpoint: QueryEndpoint,
  request: RetrievalRequest,
  log: Logger = rootLogger,
): Promise<Outcome<RetrievalResult>> {
  const pages = paginate(endpoint, request);
  const { maxRecords } = resolveRetrievalLimits(request);
  const records: unknown[] = [];
  let pageCount = 0;
  let termination: RetrievalTermination = 'exhausted';

  try {
    for await (const page of pages) {
      for (const record of page.records) records.push(record);
      pageCount++;
      log.debug('Page retrieved', {
        pageIndex: page.pageIndex,
        pageRecords: page.records.length,
        cumulativeCount: page.cumulativeCount,
      });
      if (page.termination) termination = page.termination;
    }
  } catch (err) {
    // An abort mid-request surfaces as a transport error from the endpoint
    if (err instanceof RetrievalCanceledError || request.signal?.aborted) {
      return fail(runCanceledError(undefined, 'retrieval abandoned by caller'));
    }
    const message = errorMessage(err, 'Unknown retrieval error');
    return fail(retrievalFailureError(request.sourceKind, message, {
      pageIndex: pageCount,
      recordsBeforeFailure: records.length,
      statusCode: err instanceof SourceQueryError ? err.statusCode : undefined,
    }));
  }

  if (termination === 'capped') {
    const warning = capExceededWarning(request.sourceKind, maxRecords, records.length);
    log.warn('Retrieval capped; results are truncated', { maxRecords, retrieved: records.length, pageCount });
    return succeed({ records, pageCount, termination, warning });
  }

  log.debug('Retrieval exhausted', { retrieved: records.length, pageCount });
  return succeed({ records, pageCount, termination });
}
