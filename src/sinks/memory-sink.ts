/**
 * In-memory sink for tests and dry runs.
 */

import { DenyEvent } from '../domain/deny-event';
import { Outcome, succeed } from '../domain/outcome';
import { EventSink, SinkWriteResult } from './sink';

export class MemorySink implements EventSink {
  private written = new Map<string, DenyEvent[]>();

  async write(events: readonly DenyEvent[], destination: string): Promise<Outcome<SinkWriteResult>> {
    this.written.set(destination, [...events]);
    return succeed({ location: `memory://${destination}`, rowCount: events.length });
  }

  /** Events last written to a destination. */
  getWritten(destination: string): DenyEvent[] {
    return [...(this.written.get(destination) ?? [])];
  }

  destinations(): string[] {
    return [...this.written.keys()];
  }
}
