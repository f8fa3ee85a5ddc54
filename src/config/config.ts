/**
 * Runtime configuration.
 *
 * Read from environment variables, validated with zod and merged over
 * typed defaults. A source is enabled when its endpoint is set.
 */

import { z } from 'zod';
import { DEFAULT_TARGET_MARKER, MATCH_ALL_FILTER } from '../classification/dlp-classifier';
import { SourceKind } from '../domain/deny-event';
import { ExecutionMode } from '../domain/run';
import { ExtractionSource } from '../engine/orchestrator';
import { LogLevel, parseLogLevel } from '../logger';
import { DEFAULT_MAX_RECORDS, DEFAULT_PAGE_SIZE } from '../retrieval/paged-retriever';
import { QueryEndpointFactory, httpEndpointFactory } from '../retrieval/query-endpoint';

export const DEFAULT_OUTPUT_DIR = './output';
export const DEFAULT_PORT = 5000;

/** Record type or query text sent to each source when none is configured. */
export const DEFAULT_QUERIES: Record<SourceKind, string> = {
  [SourceKind.InteractionAudit]: 'CopilotInteraction',
  [SourceKind.DlpRuleMatch]: 'DLPRuleMatch',
  [SourceKind.ContentFilterTelemetry]: 'customEvents | where name == "ContentFilterTriggered"',
};

/** Environment variable prefix per source. */
export const SOURCE_ENV_PREFIX: Record<SourceKind, string> = {
  [SourceKind.InteractionAudit]: 'DENY_AUDIT',
  [SourceKind.DlpRuleMatch]: 'DENY_DLP',
  [SourceKind.ContentFilterTelemetry]: 'DENY_TELEMETRY',
};

export interface SourceConfig {
  sourceKind: SourceKind;
  endpoint: string;
  query: string;
  credentialRef?: string;
}

export interface DenyLedgerConfig {
  outputDir: string;
  /** Evidence export is enabled when set. */
  exportDir?: string;
  maxRecords: number;
  pageSize: number;
  executionMode: ExecutionMode;
  logLevel: LogLevel;
  port: number;
  sources: SourceConfig[];
  dlp: { policyFilter: string; targetMarker: string };
  webhook?: { url: string; secretRef?: string };
}

export type ConfigResult =
  | { valid: true; config: DenyLedgerConfig; errors: [] }
  | { valid: false; errors: string[] };

// Blank values count as unset
const unsetIfBlank = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const optionalString = z.preprocess(unsetIfBlank, z.string().trim().optional());

const stringWithDefault = (fallback: string) => z.preprocess(unsetIfBlank, z.string().trim().default(fallback));

const toNumber = (value: unknown) => {
  const present = unsetIfBlank(value);
  return typeof present === 'string' ? Number(present.trim()) : present;
};

const positiveInt = (fallback: number) => z.preprocess(toNumber, z.number().int().positive().default(fallback));

const EnvSchema = z.object({
  DENY_OUTPUT_DIR: stringWithDefault(DEFAULT_OUTPUT_DIR),
  DENY_EXPORT_DIR: optionalString,
  DENY_MAX_RECORDS: positiveInt(DEFAULT_MAX_RECORDS),
  DENY_PAGE_SIZE: positiveInt(DEFAULT_PAGE_SIZE),
  DENY_EXECUTION_MODE: z.preprocess(unsetIfBlank, z.enum(['sequential', 'parallel']).default('sequential')),
  DENY_LOG_LEVEL: stringWithDefault(LogLevel.Info).transform((value, ctx) => {
    const level = parseLogLevel(value);
    if (!level) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown log level "${value}"` });
      return z.NEVER;
    }
    return level;
  }),
  PORT: z.preprocess(toNumber, z.number().int().min(0).max(65535).default(DEFAULT_PORT)),
  DENY_AUDIT_ENDPOINT: optionalString,
  DENY_AUDIT_CREDENTIAL_REF: optionalString,
  DENY_AUDIT_QUERY: optionalString,
  DENY_DLP_ENDPOINT: optionalString,
  DENY_DLP_CREDENTIAL_REF: optionalString,
  DENY_DLP_QUERY: optionalString,
  DENY_TELEMETRY_ENDPOINT: optionalString,
  DENY_TELEMETRY_CREDENTIAL_REF: optionalString,
  DENY_TELEMETRY_QUERY: optionalString,
  DENY_DLP_POLICY_FILTER: stringWithDefault(MATCH_ALL_FILTER),
  DENY_DLP_MARKER: stringWithDefault(DEFAULT_TARGET_MARKER),
  DENY_WEBHOOK_URL: optionalString,
  DENY_WEBHOOK_SECRET_REF: optionalString,
});

type ParsedEnv = z.infer<typeof EnvSchema>;

function sourceFromEnv(env: ParsedEnv, sourceKind: SourceKind): SourceConfig | undefined {
  const fields = {
    [SourceKind.InteractionAudit]: [env.DENY_AUDIT_ENDPOINT, env.DENY_AUDIT_CREDENTIAL_REF, env.DENY_AUDIT_QUERY],
    [SourceKind.DlpRuleMatch]: [env.DENY_DLP_ENDPOINT, env.DENY_DLP_CREDENTIAL_REF, env.DENY_DLP_QUERY],
    [SourceKind.ContentFilterTelemetry]: [
      env.DENY_TELEMETRY_ENDPOINT,
      env.DENY_TELEMETRY_CREDENTIAL_REF,
      env.DENY_TELEMETRY_QUERY,
    ],
  }[sourceKind];
  const [endpoint, credentialRef, query] = fields;
  if (!endpoint) return undefined;
  return {
    sourceKind,
    endpoint,
    query: query ?? DEFAULT_QUERIES[sourceKind],
    ...(credentialRef ? { credentialRef } : {}),
  };
}

/**
 * Load configuration from an environment map. Never throws; invalid values
 * are listed as "VARIABLE: message".
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ConfigResult {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    return {
      valid: false,
      errors: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(env)'}: ${issue.message}`),
    };
  }

  const e = parsed.data;
  const sources = [SourceKind.InteractionAudit, SourceKind.DlpRuleMatch, SourceKind.ContentFilterTelemetry]
    .map((kind) => sourceFromEnv(e, kind))
    .filter((source): source is SourceConfig => source !== undefined);

  const errors: string[] = [];
  for (const source of sources) {
    if (!isHttpUrl(source.endpoint)) {
      errors.push(`${SOURCE_ENV_PREFIX[source.sourceKind]}_ENDPOINT: must be an http(s) URL`);
    }
  }
  if (errors.length > 0) return { valid: false, errors };

  return {
    valid: true,
    errors: [],
    config: {
      outputDir: e.DENY_OUTPUT_DIR,
      ...(e.DENY_EXPORT_DIR ? { exportDir: e.DENY_EXPORT_DIR } : {}),
      maxRecords: e.DENY_MAX_RECORDS,
      pageSize: e.DENY_PAGE_SIZE,
      executionMode: e.DENY_EXECUTION_MODE,
      logLevel: e.DENY_LOG_LEVEL,
      port: e.PORT,
      sources,
      dlp: { policyFilter: e.DENY_DLP_POLICY_FILTER, targetMarker: e.DENY_DLP_MARKER },
      ...(e.DENY_WEBHOOK_URL
        ? { webhook: { url: e.DENY_WEBHOOK_URL, ...(e.DENY_WEBHOOK_SECRET_REF ? { secretRef: e.DENY_WEBHOOK_SECRET_REF } : {}) } }
        : {}),
    },
  };
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

export interface BuildSourcesOptions {
  /** Restrict to these kinds. Unknown or unconfigured kinds are reported. */
  only?: readonly SourceKind[];
  maxRecords?: number;
  /** Replaces the HTTP endpoint factory (tests, dry runs). */
  endpointFactory?: (source: SourceConfig) => QueryEndpointFactory;
}

export type BuildSourcesResult =
  | { success: true; sources: ExtractionSource[] }
  | { success: false; errors: string[] };

/** Turn configured sources into orchestrator sources. */
export function buildSources(config: DenyLedgerConfig, options: BuildSourcesOptions = {}): BuildSourcesResult {
  let selected = config.sources;
  if (options.only) {
    const missing = options.only.filter((kind) => !config.sources.some((s) => s.sourceKind === kind));
    if (missing.length > 0) {
      return {
        success: false,
        errors: missing.map((kind) => `Source "${kind}" is not configured (set ${SOURCE_ENV_PREFIX[kind]}_ENDPOINT)`),
      };
    }
    const wanted = new Set(options.only);
    selected = config.sources.filter((s) => wanted.has(s.sourceKind));
  }

  const makeFactory = options.endpointFactory ?? ((source: SourceConfig) => httpEndpointFactory(source.endpoint));
  return {
    success: true,
    sources: selected.map((source) => ({
      sourceKind: source.sourceKind,
      query: source.query,
      createEndpoint: makeFactory(source),
      ...(source.credentialRef ? { credentialRef: source.credentialRef } : {}),
      pageSize: config.pageSize,
      maxRecords: options.maxRecords ?? config.maxRecords,
      ...(source.sourceKind === SourceKind.DlpRuleMatch ? { classifierOptions: { dlp: config.dlp } } : {}),
    })),
  };
}
