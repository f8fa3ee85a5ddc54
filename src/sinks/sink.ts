/**
 * Event sink contract and row serialization.
 *
 * Sets are joined into strings here and nowhere earlier.
 */

import { DenyEvent, SOURCE_KIND_LABELS } from '../domain/deny-event';
import { Outcome } from '../domain/outcome';

export interface SinkWriteResult {
  /** Where the events landed (file path, URI). */
  location: string;
  rowCount: number;
}

export interface EventSink {
  write(events: readonly DenyEvent[], destination: string): Promise<Outcome<SinkWriteResult>>;
}

export const EVENT_COLUMNS = [
  'timestamp',
  'subjectId',
  'sourceKind',
  'reasonCodes',
  'policyNames',
  'severity',
  'overrideUsed',
  'rawPayload',
] as const;

export type EventColumn = (typeof EVENT_COLUMNS)[number];
export type EventRow = Record<EventColumn, string>;

export const SET_SEPARATOR = ';';

/** Join a set in a stable order. */
export function joinSet(values: ReadonlySet<string> | undefined): string {
  if (!values || values.size === 0) return '';
  return [...values].sort().join(SET_SEPARATOR);
}

export function toEventRow(event: DenyEvent): EventRow {
  return {
    timestamp: event.timestamp,
    subjectId: event.subjectId,
    sourceKind: SOURCE_KIND_LABELS[event.sourceKind],
    reasonCodes: joinSet(event.reasonCodes),
    policyNames: joinSet(event.policyNames),
    severity: event.severity ?? '',
    overrideUsed: event.overrideUsed ? 'true' : 'false',
    rawPayload: JSON.stringify(event.rawPayload) ?? '',
  };
}

/** Quote a CSV field when it contains a delimiter, quote or line break. */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsv(events: readonly DenyEvent[]): string {
  const lines = [EVENT_COLUMNS.join(',')];
  for (const event of events) {
    const row = toEventRow(event);
    lines.push(EVENT_COLUMNS.map((column) => escapeCsvField(row[column])).join(','));
  }
  return `${lines.join('\n')}\n`;
}
