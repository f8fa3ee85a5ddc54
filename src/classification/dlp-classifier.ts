/**
 * DLP rule-match classifier.
 *
 * DLP rule matches cover every workload in the tenant; only those on the
 * target surface are kept. A record is relevant when:
 *   - its Workload contains the target marker, or
 *   - any matched policy name contains the marker, or
 *   - an explicit policy filter (anything but "*") matched a policy name.
 *
 * With the default "*" filter, a record that carries no marker is discarded
 * without a warning. Tenants that do not name their policies after the
 * target surface will see fewer DLP events than they expect.
 */

import { SourceKind, Severity } from '../domain/deny-event';
import { DlpRuleMatchRecordSchema } from '../domain/raw-records';
import {
  ClassificationOutcome,
  containsIgnoreCase,
  discard,
  emit,
  malformed,
  normalizeTimestamp,
  parseRecord,
} from './classifier';
import { maxSeverity, parseSeverity } from './severity';

export const MATCH_ALL_FILTER = '*';
export const DEFAULT_TARGET_MARKER = 'Copilot';

export interface DlpClassifierOptions {
  /** Wildcard pattern (* and ?) matched against policy names. Default "*". */
  policyFilter?: string;
  /** Marker identifying the target surface. Default "Copilot". */
  targetMarker?: string;
}

/** Compile a wildcard pattern into an anchored, case-insensitive RegExp. */
export function wildcardToRegExp(pattern: string): RegExp {
  const body = pattern
    .split('')
    .map((ch) => {
      if (ch === '*') return '.*';
      if (ch === '?') return '.';
      return ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    })
    .join('');
  return new RegExp(`^${body}$`, 'i');
}

export function createDlpClassifier(options: DlpClassifierOptions = {}) {
  const filter = options.policyFilter?.trim() || MATCH_ALL_FILTER;
  const explicitFilter = filter !== MATCH_ALL_FILTER;
  const filterPattern = wildcardToRegExp(filter);
  const marker = options.targetMarker?.trim() || DEFAULT_TARGET_MARKER;

  return function classifyDlpRuleMatch(raw: unknown): ClassificationOutcome {
    const parsed = parseRecord(DlpRuleMatchRecordSchema, raw, SourceKind.DlpRuleMatch);
    if (!parsed.ok) return parsed.outcome;
    const record = parsed.record;

    const timestamp = normalizeTimestamp(record.CreationTime);
    if (!timestamp) {
      return malformed(SourceKind.DlpRuleMatch, [`CreationTime: unparseable timestamp "${record.CreationTime}"`]);
    }

    const policies = record.PolicyDetails ?? [];
    const policyNames = new Set<string>();
    for (const policy of policies) {
      const name = policy.PolicyName?.trim();
      if (name) policyNames.add(name);
    }

    const filterMatched = [...policyNames].some((name) => filterPattern.test(name));
    if (explicitFilter && !filterMatched) {
      return discard(`no policy matches filter "${filter}"`);
    }

    const relevant =
      containsIgnoreCase(record.Workload, marker) ||
      [...policyNames].some((name) => containsIgnoreCase(name, marker)) ||
      (explicitFilter && filterMatched);
    if (!relevant) {
      return discard(`not related to ${marker}`);
    }

    const ruleNames = new Set<string>();
    const actions = new Set<string>();
    const severities: Severity[] = [];
    for (const policy of policies) {
      for (const rule of policy.Rules ?? []) {
        const ruleName = rule.RuleName?.trim();
        if (ruleName) ruleNames.add(ruleName);
        for (const action of rule.Actions ?? []) {
          const trimmed = action.trim();
          if (trimmed) actions.add(trimmed);
        }
        const severity = parseSeverity(rule.Severity);
        if (severity) severities.push(severity);
      }
    }

    if (actions.size === 0) {
      return discard('rule match carries no action');
    }

    const justification =
      record.ExceptionInfo?.Justification?.trim() || record.ExceptionInfo?.Reason?.trim() || undefined;

    return emit({
      timestamp,
      subjectId: record.UserId,
      sourceKind: SourceKind.DlpRuleMatch,
      reasonCodes: actions,
      policyNames,
      severity: maxSeverity(severities),
      overrideUsed: justification !== undefined,
      justification,
      ruleNames,
      rawPayload: raw,
    });
  };
}
