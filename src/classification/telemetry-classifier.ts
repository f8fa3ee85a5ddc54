/**
 * Content-filter telemetry classifier.
 *
 * The telemetry query already selects content-filter events, so every
 * well-formed record becomes a deny event. Records missing the agent,
 * session or category are malformed.
 */

import { SourceKind } from '../domain/deny-event';
import { ContentFilterTelemetryRecordSchema } from '../domain/raw-records';
import { ClassificationOutcome, emit, malformed, normalizeTimestamp, parseRecord } from './classifier';
import { parseSeverity } from './severity';

export function classifyContentFilterTelemetry(raw: unknown): ClassificationOutcome {
  const parsed = parseRecord(ContentFilterTelemetryRecordSchema, raw, SourceKind.ContentFilterTelemetry);
  if (!parsed.ok) return parsed.outcome;
  const record = parsed.record;
  const dimensions = record.customDimensions;

  const timestamp = normalizeTimestamp(record.timestamp);
  if (!timestamp) {
    return malformed(SourceKind.ContentFilterTelemetry, [`timestamp: unparseable timestamp "${record.timestamp}"`]);
  }

  const turnId = dimensions.turnId?.trim() || undefined;

  return emit({
    timestamp,
    subjectId: dimensions.userId?.trim() || dimensions.agentId,
    sourceKind: SourceKind.ContentFilterTelemetry,
    reasonCodes: new Set([dimensions.filterCategory]),
    policyNames: new Set<string>(),
    severity: parseSeverity(dimensions.filterSeverity),
    overrideUsed: false,
    correlation: {
      agentId: dimensions.agentId,
      sessionId: dimensions.sessionId,
      ...(turnId ? { turnId } : {}),
    },
    rawPayload: raw,
  });
}
