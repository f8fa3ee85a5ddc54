import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { DenyEvent, Severity, SourceKind } from '../../src/domain/deny-event';
import { CsvFileSink } from '../../src/sinks/csv-file-sink';
import { MemorySink } from '../../src/sinks/memory-sink';
import { EVENT_COLUMNS, escapeCsvField, joinSet, toCsv, toEventRow } from '../../src/sinks/sink';

const HEADER = 'timestamp,subjectId,sourceKind,reasonCodes,policyNames,severity,overrideUsed,rawPayload';

function dlpEvent(overrides: Partial<DenyEvent> = {}): DenyEvent {
  return {
    timestamp: '2026-01-25T11:00:00.000Z',
    subjectId: 'bob@example.test',
    sourceKind: SourceKind.DlpRuleMatch,
    reasonCodes: new Set(['NotifyUser', 'BlockAccess']),
    policyNames: new Set(['Block PII']),
    severity: Severity.High,
    overrideUsed: true,
    justification: 'business need',
    rawPayload: { a: 'x,y' },
    ...overrides,
  };
}

describe('row serialization', () => {
  test('sets are joined in sorted order', () => {
    expect(joinSet(new Set(['b', 'a', 'c']))).toBe('a;b;c');
    expect(joinSet(new Set())).toBe('');
    expect(joinSet(undefined)).toBe('');
  });

  test('an event maps onto the unified columns', () => {
    expect(toEventRow(dlpEvent())).toEqual({
      timestamp: '2026-01-25T11:00:00.000Z',
      subjectId: 'bob@example.test',
      sourceKind: 'DlpRuleMatch',
      reasonCodes: 'BlockAccess;NotifyUser',
      policyNames: 'Block PII',
      severity: 'High',
      overrideUsed: 'true',
      rawPayload: '{"a":"x,y"}',
    });
  });

  test('a missing severity and payload serialize as empty', () => {
    const row = toEventRow(dlpEvent({ severity: null, rawPayload: undefined, overrideUsed: false }));
    expect(row.severity).toBe('');
    expect(row.rawPayload).toBe('');
    expect(row.overrideUsed).toBe('false');
  });

  test('fields with delimiters are quoted', () => {
    expect(escapeCsvField('plain')).toBe('plain');
    expect(escapeCsvField('a,b')).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField('two\nlines')).toBe('"two\nlines"');
  });

  test('toCsv writes a header and one line per event', () => {
    expect(toCsv([dlpEvent()])).toBe(
      `${HEADER}\n2026-01-25T11:00:00.000Z,bob@example.test,DlpRuleMatch,BlockAccess;NotifyUser,Block PII,High,true,"{""a"":""x,y""}"\n`,
    );
    expect(EVENT_COLUMNS.join(',')).toBe(HEADER);
  });
});

describe('CsvFileSink', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'deny-ledger-sink-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('writes one file per destination, creating the directory', async () => {
    const outputDir = path.join(dir, 'output');
    const sink = new CsvFileSink({ outputDir });

    const result = await sink.write([dlpEvent(), dlpEvent({ subjectId: 'carol@example.test' })], 'DlpRuleMatch-2026-01-25.csv');

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.value).toEqual({ location: path.join(outputDir, 'DlpRuleMatch-2026-01-25.csv'), rowCount: 2 });
    const content = await readFile(result.value.location, 'utf8');
    expect(content.split('\n')).toHaveLength(4);
    expect(content.startsWith(`${HEADER}\n`)).toBe(true);
  });

  test('a second write to a destination replaces it', async () => {
    const sink = new CsvFileSink({ outputDir: dir });
    await sink.write([dlpEvent(), dlpEvent()], 'out.csv');
    await sink.write([dlpEvent()], 'out.csv');

    expect(await readFile(path.join(dir, 'out.csv'), 'utf8')).toBe(toCsv([dlpEvent()]));
  });

  test('a destination outside the directory is refused', async () => {
    const result = await new CsvFileSink({ outputDir: dir }).write([dlpEvent()], '../escape.csv');

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe('SINK.INVALID_DESTINATION');
    expect(result.error.message).toBe('Destination must be a plain file name: ../escape.csv');
  });

  test('a filesystem error is reported as a failed write', async () => {
    const blocker = path.join(dir, 'not-a-dir');
    await writeFile(blocker, 'x');

    const result = await new CsvFileSink({ outputDir: blocker }).write([dlpEvent()], 'out.csv');

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe('SINK.WRITE_FAILED');
    expect(result.error.retryable).toBe(true);
  });
});

describe('MemorySink', () => {
  test('keeps the last write per destination', async () => {
    const sink = new MemorySink();
    await sink.write([dlpEvent(), dlpEvent()], 'a.csv');
    const result = await sink.write([dlpEvent()], 'a.csv');

    expect(result).toEqual({ success: true, value: { location: 'memory://a.csv', rowCount: 1 } });
    expect(sink.getWritten('a.csv')).toHaveLength(1);
    expect(sink.getWritten('b.csv')).toEqual([]);
    expect(sink.destinations()).toEqual(['a.csv']);
  });
});
