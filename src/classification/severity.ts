/**
 * Severity ranking.
 */

import { Severity } from '../domain/deny-event';

export const SEVERITY_RANK: Record<Severity, number> = {
  [Severity.Low]: 1,
  [Severity.Medium]: 2,
  [Severity.High]: 3,
};

/** Parse a severity label case-insensitively. Unknown labels yield null. */
export function parseSeverity(value: string | null | undefined): Severity | null {
  if (!value) return null;
  switch (value.trim().toLowerCase()) {
    case 'low':
      return Severity.Low;
    case 'medium':
      return Severity.Medium;
    case 'high':
      return Severity.High;
    default:
      return null;
  }
}

/** Highest-ranked severity, or null for an empty input. */
export function maxSeverity(severities: Iterable<Severity>): Severity | null {
  let highest: Severity | null = null;
  for (const severity of severities) {
    if (highest === null || SEVERITY_RANK[severity] >= SEVERITY_RANK[highest]) {
      highest = severity;
    }
  }
  return highest;
}
