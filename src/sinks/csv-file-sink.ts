/**
 * CSV file sink: one file per destination under an output directory.
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { DenyEvent } from '../domain/deny-event';
import { createTypedError, errorMessage } from '../domain/errors';
import { Outcome, fail, succeed } from '../domain/outcome';
import { EventSink, SinkWriteResult, toCsv } from './sink';

export interface CsvFileSinkOptions {
  outputDir: string;
}

export class CsvFileSink implements EventSink {
  constructor(private readonly options: CsvFileSinkOptions) {}

  async write(events: readonly DenyEvent[], destination: string): Promise<Outcome<SinkWriteResult>> {
    if (path.basename(destination) !== destination || destination === '.' || destination === '..') {
      return fail(createTypedError({
        code: 'SINK.INVALID_DESTINATION',
        message: `Destination must be a plain file name: ${destination}`,
        retryable: false,
        details: { destination },
      }));
    }

    const location = path.resolve(this.options.outputDir, destination);
    try {
      await mkdir(this.options.outputDir, { recursive: true });
      await writeFile(location, toCsv(events), 'utf8');
    } catch (err) {
      return fail(createTypedError({
        code: 'SINK.WRITE_FAILED',
        message: errorMessage(err, 'File write failed'),
        retryable: true,
        details: { location },
      }));
    }

    return succeed({ location, rowCount: events.length });
  }
}
