import { createClassifier } from '../../src/classification';
import { classifyContentFilterTelemetry } from '../../src/classification/telemetry-classifier';
import { Severity, SourceKind } from '../../src/domain/deny-event';
import { telemetryRecord } from '../helpers/fakes';

describe('classifyContentFilterTelemetry', () => {
  test('every well-formed record becomes an event', () => {
    const raw = telemetryRecord();
    const outcome = classifyContentFilterTelemetry(raw);

    expect(outcome.kind).toBe('event');
    if (outcome.kind !== 'event') return;
    expect(outcome.event).toEqual({
      timestamp: '2026-01-25T12:30:00.000Z',
      subjectId: 'agent-1',
      sourceKind: SourceKind.ContentFilterTelemetry,
      reasonCodes: new Set(['Violence']),
      policyNames: new Set(),
      severity: Severity.Medium,
      overrideUsed: false,
      correlation: { agentId: 'agent-1', sessionId: 'session-1', turnId: 'turn-1' },
      rawPayload: raw,
    });
  });

  test('the user is the subject when present', () => {
    const outcome = classifyContentFilterTelemetry(telemetryRecord({ userId: 'carol@example.test' }));
    expect(outcome.kind === 'event' && outcome.event.subjectId).toBe('carol@example.test');
  });

  test('an unknown severity maps to null', () => {
    const outcome = classifyContentFilterTelemetry(telemetryRecord({ filterSeverity: 'Severe' }));
    expect(outcome.kind === 'event' && outcome.event.severity).toBeNull();
  });

  test('a blank turn id is dropped from the correlation', () => {
    const outcome = classifyContentFilterTelemetry(telemetryRecord({ turnId: ' ' }));
    expect(outcome.kind === 'event' && outcome.event.correlation).toEqual({ agentId: 'agent-1', sessionId: 'session-1' });
  });

  test('a record missing a correlation field is malformed', () => {
    const outcome = classifyContentFilterTelemetry(telemetryRecord({ sessionId: undefined }));
    expect(outcome.kind).toBe('malformed');
    if (outcome.kind !== 'malformed') return;
    expect(outcome.error.message).toBe(
      'Malformed content-filter-telemetry record: customDimensions.sessionId: Required',
    );
  });

  test('a blank category is malformed', () => {
    const outcome = classifyContentFilterTelemetry(telemetryRecord({ filterCategory: '  ' }));
    expect(outcome.kind).toBe('malformed');
  });

  test('the registry returns the telemetry classifier', () => {
    expect(createClassifier(SourceKind.ContentFilterTelemetry)).toBe(classifyContentFilterTelemetry);
  });
});
