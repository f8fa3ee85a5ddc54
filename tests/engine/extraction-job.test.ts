import { classifyAuditInteraction } from '../../src/classification/audit-classifier';
import { SourceKind } from '../../src/domain/deny-event';
import { ExtractionError, createTypedError } from '../../src/domain/errors';
import { JobStatus } from '../../src/domain/job';
import { fail } from '../../src/domain/outcome';
import { ExtractionJobRequest, JobResultTracker, defaultDestination, runExtractionJob } from '../../src/engine/extraction-job';
import { SourceQueryError } from '../../src/retrieval/query-endpoint';
import { MemorySink } from '../../src/sinks/memory-sink';
import { EventSink } from '../../src/sinks/sink';
import { ArrayQueryEndpoint, EndlessQueryEndpoint, WINDOW, auditRecord, auditWithResources, captureLogs } from '../helpers/fakes';

const DESTINATION = 'InteractionAudit-2026-01-25.csv';

function jobRequest(overrides: Partial<ExtractionJobRequest> = {}): ExtractionJobRequest {
  return {
    sourceKind: SourceKind.InteractionAudit,
    query: 'CopilotInteraction',
    window: WINDOW,
    endpoint: new ArrayQueryEndpoint([]),
    classifier: classifyAuditInteraction,
    sink: new MemorySink(),
    destination: DESTINATION,
    pageSize: 50,
    maxRecords: 1000,
    ...overrides,
  };
}

const failingSink: EventSink = {
  write: async () => fail(createTypedError({ code: 'SINK.WRITE_FAILED', message: 'disk full' })),
};

describe('runExtractionJob', () => {
  let logs: ReturnType<typeof captureLogs>;

  beforeEach(() => {
    logs = captureLogs();
  });

  afterEach(() => {
    logs.restore();
  });

  test('three audit records with two deny signals produce two events', async () => {
    const sink = new MemorySink();
    const endpoint = new ArrayQueryEndpoint([
      auditWithResources([{ Name: 'doc', Status: 'failure' }]),
      auditWithResources([{ Name: 'page', XPIADetected: true }]),
      auditRecord(),
    ]);

    const result = await runExtractionJob(jobRequest({ endpoint, sink }));

    expect(result).toMatchObject({
      sourceKind: SourceKind.InteractionAudit,
      status: JobStatus.Succeeded,
      succeeded: true,
      eventCount: 2,
      rawCount: 3,
      discardedCount: 1,
      malformedCount: 0,
      truncated: false,
      outputLocation: `memory://${DESTINATION}`,
      warnings: [],
    });
    expect(result.errorDetail).toBeUndefined();
    expect(sink.getWritten(DESTINATION)).toHaveLength(2);
    expect(typeof result.durationMs).toBe('number');
  });

  test('zero raw records succeed without a sink write', async () => {
    const sink = new MemorySink();
    const result = await runExtractionJob(jobRequest({ sink }));

    expect(result.succeeded).toBe(true);
    expect(result.eventCount).toBe(0);
    expect(result.outputLocation).toBeUndefined();
    expect(sink.destinations()).toEqual([]);
    expect(logs.entries.map((e) => e.message)).toContain('No raw records in window');
  });

  test('records without deny signals succeed with nothing actionable', async () => {
    const sink = new MemorySink();
    const endpoint = new ArrayQueryEndpoint([auditRecord(), auditRecord()]);
    const result = await runExtractionJob(jobRequest({ endpoint, sink }));

    expect(result).toMatchObject({ succeeded: true, eventCount: 0, rawCount: 2, discardedCount: 2 });
    expect(sink.destinations()).toEqual([]);
    expect(logs.entries.map((e) => e.message)).toContain('Raw records retrieved but nothing actionable');
  });

  test('a retrieval failure fails the job without throwing', async () => {
    const endpoint = new ArrayQueryEndpoint([auditRecord()], { failOnCall: 1 });
    const result = await runExtractionJob(jobRequest({ endpoint }));

    expect(result.status).toBe(JobStatus.Failed);
    expect(result.succeeded).toBe(false);
    expect(result.eventCount).toBe(0);
    expect(result.errorDetail).toBe('Query endpoint returned HTTP 503: unavailable');
    expect(result.error?.code).toBe('SOURCE.RETRIEVAL_FAILED');
    expect(result.error?.sourceKind).toBe(SourceKind.InteractionAudit);
  });

  test('the credential is masked in the error detail', async () => {
    const endpoint = new ArrayQueryEndpoint([], {
      failOnCall: 1,
      error: new SourceQueryError('HTTP 401: token test-secret-value rejected', 401),
    });
    const result = await runExtractionJob(jobRequest({ endpoint, secrets: ['test-secret-value'] }));

    expect(result.errorDetail).toBe('HTTP 401: token *************alue rejected');
    expect(result.error?.message).toBe(result.errorDetail);
  });

  test('malformed records are skipped and reported once as a warning', async () => {
    const endpoint = new ArrayQueryEndpoint([
      auditWithResources([{ Status: 'failure' }]),
      auditRecord({ UserId: undefined }),
    ]);
    const result = await runExtractionJob(jobRequest({ endpoint }));

    expect(result).toMatchObject({ succeeded: true, eventCount: 1, malformedCount: 1, discardedCount: 0 });
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0].code).toBe('RECORD.MALFORMED');
    expect(result.warnings[0].details).toEqual({
      count: 1,
      sampleIssues: ['Malformed interaction-audit record: UserId: Required'],
    });
    expect(logs.entries.filter((e) => e.message === 'Skipping malformed record')).toHaveLength(1);
  });

  test('a sink failure fails the job', async () => {
    const endpoint = new ArrayQueryEndpoint([auditWithResources([{ Status: 'failure' }])]);
    const result = await runExtractionJob(jobRequest({ endpoint, sink: failingSink }));

    expect(result.succeeded).toBe(false);
    expect(result.error?.code).toBe('SINK.WRITE_FAILED');
    expect(result.errorDetail).toBe(`Failed to write events to ${DESTINATION}: disk full`);
    expect(result.rawCount).toBe(1);
    expect(result.outputLocation).toBeUndefined();
  });

  test('a capped retrieval succeeds as truncated with a warning', async () => {
    const result = await runExtractionJob(jobRequest({
      endpoint: new EndlessQueryEndpoint(),
      pageSize: 2,
      maxRecords: 3,
    }));

    // Endless pages hold no audit fields, so every record is malformed
    expect(result).toMatchObject({ succeeded: true, truncated: true, rawCount: 4, malformedCount: 4 });
    expect(result.warnings.map((w) => w.code)).toEqual(['SOURCE.CAP_EXCEEDED', 'RECORD.MALFORMED']);
  });

  test('an unexpected error becomes a failed result', async () => {
    const endpoint = new ArrayQueryEndpoint([auditRecord()]);
    const result = await runExtractionJob(jobRequest({
      endpoint,
      classifier: () => {
        throw new Error('classifier exploded');
      },
    }));

    expect(result.succeeded).toBe(false);
    expect(result.error?.code).toBe('SYSTEM.INTERNAL');
    expect(result.errorDetail).toBe('classifier exploded');
  });

  test('an invalid window is thrown to the caller', async () => {
    await expect(runExtractionJob(jobRequest({ window: { start: WINDOW.end, end: WINDOW.start } }))).rejects.toThrow(
      ExtractionError,
    );
  });
});

describe('JobResultTracker', () => {
  test('finalizes exactly once', () => {
    const tracker = new JobResultTracker(SourceKind.DlpRuleMatch);
    tracker.start();
    tracker.succeed({ eventCount: 1 });
    expect(() => tracker.fail(createTypedError({ code: 'X', message: 'late' }))).toThrow(
      'Invalid job state transition: succeeded -> failed',
    );
  });

  test('fails a job that never started', () => {
    const tracker = new JobResultTracker(SourceKind.DlpRuleMatch);
    const result = tracker.fail(createTypedError({ code: 'RUN.CANCELED', message: 'Run canceled' }));

    expect(result.status).toBe(JobStatus.Failed);
    expect(result.error?.sourceKind).toBe(SourceKind.DlpRuleMatch);
    expect(result.durationMs).toBeUndefined();
  });
});

describe('defaultDestination', () => {
  test('names the file after the source label and window start', () => {
    expect(defaultDestination(SourceKind.ContentFilterTelemetry, WINDOW)).toBe('ContentFilterTelemetry-2026-01-25.csv');
  });
});
