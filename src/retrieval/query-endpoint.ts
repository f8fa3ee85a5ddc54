/**
 * Query endpoint contract and the HTTP implementation.
 *
 * A query endpoint answers one page of a time-windowed query and hands back
 * an opaque continuation token for the next page. Vendor wire formats are
 * kept behind a gateway; this client speaks a single JSON contract:
 *
 *   POST <url>
 *   { query, startTime, endTime, continuationToken, pageSize }
 *   -> { records: [...], nextContinuationToken?: string | null }
 */

import { z } from 'zod';
import { errorMessage } from '../domain/errors';

export interface QueryRequest {
  /** Record type or query text understood by the source. */
  query: string;
  startTime: Date;
  endTime: Date;
  /** Absent on the first page. */
  continuationToken?: string;
  pageSize: number;
  signal?: AbortSignal;
}

export interface QueryPage {
  records: unknown[];
  nextContinuationToken?: string;
}

/** One page of one source. Implementations throw on transport or auth failure. */
export interface QueryEndpoint {
  query(request: QueryRequest): Promise<QueryPage>;
}

/** Builds an endpoint once the source's credential is known. */
export type QueryEndpointFactory = (credential: string | undefined) => QueryEndpoint;

/** Error raised by an endpoint for a failed page call. */
export class SourceQueryError extends Error {
  constructor(message: string, public statusCode?: number) {
    super(message);
    this.name = 'SourceQueryError';
  }
}

const QueryPageResponseSchema = z.object({
  records: z.array(z.unknown()),
  nextContinuationToken: z.string().nullish(),
});

export interface HttpQueryEndpointOptions {
  url: string;
  /** Bearer token, when the gateway requires one. */
  credential?: string;
  /** Per-page timeout. Default: 60_000. */
  timeoutMs?: number;
  /** Injectable for tests. */
  fetchFn?: typeof fetch;
}

/** Query endpoint over HTTP with bearer authentication and a per-page timeout. */
export class HttpQueryEndpoint implements QueryEndpoint {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(private readonly options: HttpQueryEndpointOptions) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async query(request: QueryRequest): Promise<QueryPage> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };
    if (this.options.credential) {
      headers.Authorization = `Bearer ${this.options.credential}`;
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const onCallerAbort = () => controller.abort();
    request.signal?.addEventListener('abort', onCallerAbort, { once: true });

    let res: Response;
    try {
      res = await this.fetchFn(this.url, {
        method: 'POST',
        headers,
        body: JSON.stringify({
          query: request.query,
          startTime: request.startTime.toISOString(),
          endTime: request.endTime.toISOString(),
          continuationToken: request.continuationToken ?? null,
          pageSize: request.pageSize,
        }),
        signal: controller.signal,
      });
    } catch (err) {
      const reason = controller.signal.aborted && !request.signal?.aborted
        ? `timed out after ${this.timeoutMs}ms`
        : errorMessage(err, 'unknown error');
      throw new SourceQueryError(`Query endpoint unreachable (${this.url}): ${reason}`);
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener('abort', onCallerAbort);
    }

    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw new SourceQueryError(
        `Query endpoint returned HTTP ${res.status}: ${text.slice(0, 200)}`,
        res.status,
      );
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch {
      throw new SourceQueryError(`Query endpoint returned non-JSON response (HTTP ${res.status})`, res.status);
    }

    const parsed = QueryPageResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new SourceQueryError(
        `Query endpoint returned an unexpected page shape: ${parsed.error.issues.map((i) => i.message).join('; ')}`,
        res.status,
      );
    }

    return {
      records: parsed.data.records,
      nextContinuationToken: parsed.data.nextContinuationToken ?? undefined,
    };
  }
}

/** Factory for HttpQueryEndpoint bound to a URL. */
export function httpEndpointFactory(url: string, timeoutMs?: number): QueryEndpointFactory {
  return (credential) => new HttpQueryEndpoint({ url, credential, timeoutMs });
}
