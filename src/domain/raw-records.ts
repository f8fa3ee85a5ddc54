/**
 * Raw record schemas, one per source.
 *
 * Source payloads arrive as loosely-typed JSON. Each classifier parses its
 * input against the schema below before reading any field, so untyped
 * access never travels past the classifier boundary. Unknown fields are
 * preserved (passthrough) because the original record is retained on the
 * emitted event.
 */

import { z } from 'zod';

// --- Interaction audit ---

export const PolicyDetailsSchema = z
  .object({
    PolicyId: z.string().optional(),
    PolicyName: z.string().optional(),
  })
  .passthrough();

export const AccessedResourceSchema = z
  .object({
    Name: z.string().optional(),
    Type: z.string().optional(),
    Status: z.string().optional(),
    PolicyDetails: PolicyDetailsSchema.nullish(),
    XPIADetected: z.boolean().optional(),
  })
  .passthrough();

export const InteractionMessageSchema = z
  .object({
    Id: z.string().optional(),
    isPrompt: z.boolean().optional(),
    JailbreakDetected: z.boolean().optional(),
  })
  .passthrough();

export const AuditInteractionRecordSchema = z
  .object({
    CreationTime: z.string().trim().min(1),
    UserId: z.string().trim().min(1),
    Operation: z.string().optional(),
    Workload: z.string().optional(),
    CopilotEventData: z
      .object({
        AppHost: z.string().optional(),
        AccessedResources: z.array(AccessedResourceSchema).optional(),
        Messages: z.array(InteractionMessageSchema).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type AuditInteractionRecord = z.infer<typeof AuditInteractionRecordSchema>;

// --- DLP rule match ---

export const DlpRuleSchema = z
  .object({
    RuleName: z.string().optional(),
    Actions: z.array(z.string()).optional(),
    Severity: z.string().optional(),
  })
  .passthrough();

export const DlpPolicySchema = z
  .object({
    PolicyId: z.string().optional(),
    PolicyName: z.string().optional(),
    Rules: z.array(DlpRuleSchema).optional(),
  })
  .passthrough();

export const DlpRuleMatchRecordSchema = z
  .object({
    CreationTime: z.string().trim().min(1),
    UserId: z.string().trim().min(1),
    Workload: z.string().optional(),
    Operation: z.string().optional(),
    PolicyDetails: z.array(DlpPolicySchema).optional(),
    ExceptionInfo: z
      .object({
        Justification: z.string().nullish(),
        Reason: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export type DlpRuleMatchRecord = z.infer<typeof DlpRuleMatchRecordSchema>;

// --- Content-filter telemetry ---

export const ContentFilterTelemetryRecordSchema = z
  .object({
    timestamp: z.string().trim().min(1),
    name: z.string().optional(),
    customDimensions: z
      .object({
        agentId: z.string().trim().min(1),
        sessionId: z.string().trim().min(1),
        turnId: z.string().optional(),
        userId: z.string().optional(),
        filterCategory: z.string().trim().min(1),
        filterSeverity: z.string().optional(),
      })
      .passthrough(),
  })
  .passthrough();

export type ContentFilterTelemetryRecord = z.infer<typeof ContentFilterTelemetryRecordSchema>;
