/**
 * Deny event domain model.
 *
 * The normalized unit of output: one instance of a user or agent action
 * being blocked, flagged or filtered, whatever source reported it.
 */

/** Source systems a deny event can originate from. */
export enum SourceKind {
  InteractionAudit = 'interaction-audit',
  DlpRuleMatch = 'dlp-rule-match',
  ContentFilterTelemetry = 'content-filter-telemetry',
}

/** Fixed processing order for sequential runs. */
export const SOURCE_KIND_ORDER: readonly SourceKind[] = [
  SourceKind.InteractionAudit,
  SourceKind.DlpRuleMatch,
  SourceKind.ContentFilterTelemetry,
];

/** Display labels used in summaries and output file names. */
export const SOURCE_KIND_LABELS: Record<SourceKind, string> = {
  [SourceKind.InteractionAudit]: 'InteractionAudit',
  [SourceKind.DlpRuleMatch]: 'DlpRuleMatch',
  [SourceKind.ContentFilterTelemetry]: 'ContentFilterTelemetry',
};

/** Accepts a kind ("dlp-rule-match") or its label ("DlpRuleMatch"), any case. */
export function parseSourceKind(value: string): SourceKind | undefined {
  const normalized = value.trim().toLowerCase();
  return SOURCE_KIND_ORDER.find(
    (kind) => kind === normalized || SOURCE_KIND_LABELS[kind].toLowerCase() === normalized,
  );
}

/** Ordinal severity attached to policy or filter matches. */
export enum Severity {
  Low = 'Low',
  Medium = 'Medium',
  High = 'High',
}

/** Reason codes emitted by the audit-interaction classifier. */
export enum AuditReasonCode {
  PolicyBlock = 'PolicyBlock',
  XPIA = 'XPIA',
  Jailbreak = 'Jailbreak',
  ResourceFailure = 'ResourceFailure',
}

/** Derived flags of an audit interaction, kept for querying. */
export interface AuditIndicators {
  xpia: boolean;
  jailbreak: boolean;
  policyBlock: boolean;
  resourceFailure: boolean;
}

/** Correlation identifiers carried by content-filter telemetry. */
export interface TelemetryCorrelation {
  agentId: string;
  sessionId: string;
  turnId?: string;
}

export interface DenyEvent {
  /** ISO-8601 UTC instant the denial occurred. */
  timestamp: string;
  /** Acting principal (user or service). */
  subjectId: string;
  sourceKind: SourceKind;
  /** Never empty. */
  reasonCodes: ReadonlySet<string>;
  policyNames: ReadonlySet<string>;
  severity: Severity | null;
  /** True when the subject bypassed a block with justification text. */
  overrideUsed: boolean;
  /** Override justification, present only when overrideUsed is true. */
  justification?: string;
  /** DLP rule names that matched. */
  ruleNames?: ReadonlySet<string>;
  indicators?: AuditIndicators;
  correlation?: TelemetryCorrelation;
  /** Original record, retained for audit traceability. */
  rawPayload: unknown;
}
