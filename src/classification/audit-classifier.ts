/**
 * Interaction audit classifier.
 *
 * An interaction record lists the resources the assistant touched and the
 * messages exchanged. Deny signals:
 *   - resource Status "failure"          -> ResourceFailure
 *   - resource PolicyDetails present     -> PolicyBlock (+ policy name)
 *   - resource XPIADetected              -> XPIA
 *   - message JailbreakDetected          -> Jailbreak
 * A record with none of these is discarded.
 */

import { AuditReasonCode, SourceKind } from '../domain/deny-event';
import { AuditInteractionRecordSchema } from '../domain/raw-records';
import { ClassificationOutcome, discard, emit, malformed, normalizeTimestamp, parseRecord } from './classifier';

const FAILURE_STATUS = 'failure';

export function classifyAuditInteraction(raw: unknown): ClassificationOutcome {
  const parsed = parseRecord(AuditInteractionRecordSchema, raw, SourceKind.InteractionAudit);
  if (!parsed.ok) return parsed.outcome;
  const record = parsed.record;

  const timestamp = normalizeTimestamp(record.CreationTime);
  if (!timestamp) {
    return malformed(SourceKind.InteractionAudit, [`CreationTime: unparseable timestamp "${record.CreationTime}"`]);
  }

  const reasonCodes = new Set<string>();
  const policyNames = new Set<string>();

  for (const resource of record.CopilotEventData?.AccessedResources ?? []) {
    if (resource.Status?.trim().toLowerCase() === FAILURE_STATUS) {
      reasonCodes.add(AuditReasonCode.ResourceFailure);
    }
    if (resource.PolicyDetails) {
      reasonCodes.add(AuditReasonCode.PolicyBlock);
      const policyName = resource.PolicyDetails.PolicyName?.trim();
      if (policyName) policyNames.add(policyName);
    }
    if (resource.XPIADetected === true) {
      reasonCodes.add(AuditReasonCode.XPIA);
    }
  }

  for (const message of record.CopilotEventData?.Messages ?? []) {
    if (message.JailbreakDetected === true) {
      reasonCodes.add(AuditReasonCode.Jailbreak);
    }
  }

  if (reasonCodes.size === 0) {
    return discard('no deny indicators');
  }

  return emit({
    timestamp,
    subjectId: record.UserId,
    sourceKind: SourceKind.InteractionAudit,
    reasonCodes,
    policyNames,
    severity: null,
    overrideUsed: false,
    indicators: {
      xpia: reasonCodes.has(AuditReasonCode.XPIA),
      jailbreak: reasonCodes.has(AuditReasonCode.Jailbreak),
      policyBlock: reasonCodes.has(AuditReasonCode.PolicyBlock),
      resourceFailure: reasonCodes.has(AuditReasonCode.ResourceFailure),
    },
    rawPayload: raw,
  });
}
