/**
 * Classifier contract shared by every source.
 *
 * A classifier inspects one raw record and decides: emit a deny event,
 * discard the record (no deny signal), or report it as malformed. Classifiers
 * are pure functions of their input and options; they never log and never
 * throw for bad data. The extraction job does the logging.
 */

import { z } from 'zod';
import { DenyEvent, SourceKind } from '../domain/deny-event';
import { TypedError, malformedRecordError } from '../domain/errors';

export type ClassificationOutcome =
  | { kind: 'event'; event: DenyEvent }
  | { kind: 'discard'; reason: string }
  | { kind: 'malformed'; error: TypedError };

export type Classifier = (raw: unknown) => ClassificationOutcome;

/** The event keeps its own copy of the raw record. */
export function emit(event: DenyEvent): ClassificationOutcome {
  return { kind: 'event', event: { ...event, rawPayload: structuredClone(event.rawPayload) } };
}

export function discard(reason: string): ClassificationOutcome {
  return { kind: 'discard', reason };
}

export function malformed(sourceKind: SourceKind, issues: string[]): ClassificationOutcome {
  return { kind: 'malformed', error: malformedRecordError(sourceKind, issues) };
}

/** Render zod issues as "path: message" lines. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(record)';
    return `${path}: ${issue.message}`;
  });
}

/** Parse a raw record against its source schema. */
export function parseRecord<S extends z.ZodTypeAny>(
  schema: S,
  raw: unknown,
  sourceKind: SourceKind,
): { ok: true; record: z.infer<S> } | { ok: false; outcome: ClassificationOutcome } {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, outcome: malformed(sourceKind, formatIssues(parsed.error)) };
  }
  return { ok: true, record: parsed.data };
}

const ZONE_DESIGNATOR = /(?:Z|[+-]\d{2}:?\d{2})$/i;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Normalize a source timestamp to an ISO-8601 UTC string. Audit sources
 * emit local-looking timestamps without a zone designator; those are UTC.
 * Returns null when the value does not parse.
 */
export function normalizeTimestamp(value: string): string | null {
  const trimmed = value.trim();
  if (trimmed.length === 0) return null;

  let candidate = trimmed;
  if (DATE_ONLY.test(trimmed)) {
    candidate = `${trimmed}T00:00:00Z`;
  } else if (!ZONE_DESIGNATOR.test(trimmed)) {
    candidate = `${trimmed}Z`;
  }

  const ms = Date.parse(candidate);
  if (Number.isNaN(ms)) return null;
  return new Date(ms).toISOString();
}

/** Case-insensitive substring test. */
export function containsIgnoreCase(haystack: string | undefined, needle: string): boolean {
  if (!haystack || needle.length === 0) return false;
  return haystack.toLowerCase().includes(needle.toLowerCase());
}
