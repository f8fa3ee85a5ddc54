/**
 * Run aggregation and the human-readable summary.
 *
 * The exit-code policy lives here and only here: jobs report outcomes,
 * this module turns them into a process-level signal.
 */

import { SOURCE_KIND_LABELS } from '../domain/deny-event';
import { ExtractionJobResult } from '../domain/job';
import { ExitCode, OrchestrationSummary, OverallStatus } from '../domain/run';

export function computeOverallStatus(results: readonly ExtractionJobResult[]): OverallStatus {
  const succeeded = results.filter((r) => r.succeeded).length;
  if (succeeded === results.length) return OverallStatus.AllSucceeded;
  if (succeeded === 0) return OverallStatus.AllFailed;
  return OverallStatus.PartialFailure;
}

export function totalEventCount(results: readonly ExtractionJobResult[]): number {
  return results.reduce((sum, r) => sum + (r.succeeded ? r.eventCount : 0), 0);
}

/** AllFailed is fatal; a partial failure still exits 0. */
export function exitCodeFor(status: OverallStatus): ExitCode {
  return status === OverallStatus.AllFailed ? ExitCode.Fatal : ExitCode.Success;
}

const LABEL_WIDTH = 24;

function formatResultLine(result: ExtractionJobResult): string {
  const label = SOURCE_KIND_LABELS[result.sourceKind].padEnd(LABEL_WIDTH);
  if (!result.succeeded) {
    return `  FAIL ${label} ${result.errorDetail ?? 'failed'}`;
  }
  const events = `${result.eventCount} event${result.eventCount === 1 ? '' : 's'}`;
  return result.outputLocation
    ? `  OK   ${label} ${events} -> ${result.outputLocation}`
    : `  OK   ${label} ${events}`;
}

/** Render the summary as printable lines. Warnings are always listed. */
export function formatSummary(summary: OrchestrationSummary): string {
  const lines: string[] = [];
  lines.push(`Run ${summary.runId} (batch ${summary.batchId}): ${summary.window.start} -> ${summary.window.end}`);
  for (const result of summary.results) {
    lines.push(formatResultLine(result));
  }
  lines.push(`Total events: ${summary.totalEvents}`);
  lines.push(`Overall status: ${summary.overallStatus}`);

  if (summary.overallStatus === OverallStatus.PartialFailure) {
    const failed = summary.results.filter((r) => !r.succeeded).map((r) => SOURCE_KIND_LABELS[r.sourceKind]);
    lines.push(`WARNING: ${failed.length} of ${summary.results.length} sources failed (${failed.join(', ')})`);
  }

  if (summary.export) {
    const exported = summary.export.files.filter((f) => f.success).length;
    lines.push(`Export: ${exported}/${summary.export.files.length} files exported for batch ${summary.export.batchId}`);
  }

  if (summary.warnings.length > 0) {
    lines.push(`Warnings (${summary.warnings.length}):`);
    for (const warning of summary.warnings) {
      lines.push(`  - [${warning.code}] ${warning.message}`);
    }
  }

  return lines.join('\n');
}
