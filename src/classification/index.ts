/**
 * Classifier registry.
 */

import { SourceKind } from '../domain/deny-event';
import { classifyAuditInteraction } from './audit-classifier';
import { Classifier } from './classifier';
import { DlpClassifierOptions, createDlpClassifier } from './dlp-classifier';
import { classifyContentFilterTelemetry } from './telemetry-classifier';

export interface ClassifierOptions {
  dlp?: DlpClassifierOptions;
}

/** Classifier for a source kind. */
export function createClassifier(sourceKind: SourceKind, options: ClassifierOptions = {}): Classifier {
  switch (sourceKind) {
    case SourceKind.InteractionAudit:
      return classifyAuditInteraction;
    case SourceKind.DlpRuleMatch:
      return createDlpClassifier(options.dlp);
    case SourceKind.ContentFilterTelemetry:
      return classifyContentFilterTelemetry;
  }
}

export * from './classifier';
export * from './severity';
export { classifyAuditInteraction } from './audit-classifier';
export { createDlpClassifier, wildcardToRegExp, MATCH_ALL_FILTER, DEFAULT_TARGET_MARKER } from './dlp-classifier';
export type { DlpClassifierOptions } from './dlp-classifier';
export { classifyContentFilterTelemetry } from './telemetry-classifier';
