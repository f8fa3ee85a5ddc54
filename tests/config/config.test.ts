import { DenyLedgerConfig, buildSources, loadConfig } from '../../src/config/config';
import { SourceKind } from '../../src/domain/deny-event';
import { LogLevel } from '../../src/logger';
import { HttpQueryEndpoint } from '../../src/retrieval/query-endpoint';
import { ArrayQueryEndpoint } from '../helpers/fakes';

function validConfig(env: NodeJS.ProcessEnv): DenyLedgerConfig {
  const result = loadConfig(env);
  if (!result.valid) {
    throw new Error(`unexpected config errors: ${result.errors.join(', ')}`);
  }
  return result.config;
}

function configErrors(env: NodeJS.ProcessEnv): string[] {
  const result = loadConfig(env);
  return result.valid ? [] : result.errors;
}

const ALL_SOURCES = {
  DENY_AUDIT_ENDPOINT: 'https://gateway.example.test/audit',
  DENY_AUDIT_CREDENTIAL_REF: 'AUDIT_TOKEN',
  DENY_DLP_ENDPOINT: 'https://gateway.example.test/dlp',
  DENY_TELEMETRY_ENDPOINT: 'http://telemetry.example.test/query',
  DENY_TELEMETRY_QUERY: 'customEvents | take 10',
};

describe('loadConfig', () => {
  test('an empty environment yields the defaults', () => {
    expect(validConfig({})).toEqual({
      outputDir: './output',
      maxRecords: 50_000,
      pageSize: 5_000,
      executionMode: 'sequential',
      logLevel: LogLevel.Info,
      port: 5000,
      sources: [],
      dlp: { policyFilter: '*', targetMarker: 'Copilot' },
    });
  });

  test('a source is enabled by its endpoint', () => {
    const config = validConfig(ALL_SOURCES);
    expect(config.sources).toEqual([
      {
        sourceKind: SourceKind.InteractionAudit,
        endpoint: 'https://gateway.example.test/audit',
        query: 'CopilotInteraction',
        credentialRef: 'AUDIT_TOKEN',
      },
      { sourceKind: SourceKind.DlpRuleMatch, endpoint: 'https://gateway.example.test/dlp', query: 'DLPRuleMatch' },
      {
        sourceKind: SourceKind.ContentFilterTelemetry,
        endpoint: 'http://telemetry.example.test/query',
        query: 'customEvents | take 10',
      },
    ]);
  });

  test('values are parsed and normalized', () => {
    const config = validConfig({
      DENY_OUTPUT_DIR: '/var/lib/deny-ledger',
      DENY_EXPORT_DIR: '/evidence',
      DENY_MAX_RECORDS: '1000',
      DENY_PAGE_SIZE: '250',
      DENY_EXECUTION_MODE: 'parallel',
      DENY_LOG_LEVEL: 'DEBUG',
      PORT: '0',
      DENY_DLP_POLICY_FILTER: 'Block*',
      DENY_DLP_MARKER: 'Agent',
      DENY_WEBHOOK_URL: 'https://hooks.example.test/runs',
      DENY_WEBHOOK_SECRET_REF: 'WEBHOOK_SECRET',
    });

    expect(config).toMatchObject({
      outputDir: '/var/lib/deny-ledger',
      exportDir: '/evidence',
      maxRecords: 1000,
      pageSize: 250,
      executionMode: 'parallel',
      logLevel: LogLevel.Debug,
      port: 0,
      dlp: { policyFilter: 'Block*', targetMarker: 'Agent' },
      webhook: { url: 'https://hooks.example.test/runs', secretRef: 'WEBHOOK_SECRET' },
    });
  });

  test('blank values fall back to defaults', () => {
    const config = validConfig({ DENY_MAX_RECORDS: '', DENY_AUDIT_ENDPOINT: '  ' });
    expect(config.maxRecords).toBe(50_000);
    expect(config.sources).toEqual([]);
  });

  test('every defaulted variable treats a blank value as unset', () => {
    const config = validConfig({
      DENY_OUTPUT_DIR: '',
      DENY_LOG_LEVEL: '',
      DENY_EXECUTION_MODE: '',
      DENY_DLP_POLICY_FILTER: '',
      DENY_DLP_MARKER: '  ',
      DENY_MAX_RECORDS: '  ',
      DENY_PAGE_SIZE: ' ',
      PORT: '   ',
    });

    expect(config).toMatchObject({
      outputDir: './output',
      logLevel: LogLevel.Info,
      executionMode: 'sequential',
      maxRecords: 50_000,
      pageSize: 5_000,
      port: 5000,
      dlp: { policyFilter: '*', targetMarker: 'Copilot' },
    });
  });

  test('numeric values may carry surrounding whitespace', () => {
    expect(validConfig({ DENY_PAGE_SIZE: ' 250 ', PORT: ' 8080' })).toMatchObject({ pageSize: 250, port: 8080 });
  });

  test('invalid values are listed per variable', () => {
    expect(configErrors({ DENY_MAX_RECORDS: '0', DENY_LOG_LEVEL: 'loud' })).toEqual([
      'DENY_MAX_RECORDS: Number must be greater than 0',
      'DENY_LOG_LEVEL: Unknown log level "loud"',
    ]);
  });

  test('an out-of-range port is rejected', () => {
    const errors = configErrors({ PORT: '70000' });
    expect(errors).toHaveLength(1);
    expect(errors[0].startsWith('PORT: ')).toBe(true);
  });

  test('a source endpoint must be an http(s) URL', () => {
    expect(configErrors({ DENY_DLP_ENDPOINT: 'ftp://gateway.example.test/dlp' })).toEqual([
      'DENY_DLP_ENDPOINT: must be an http(s) URL',
    ]);
  });
});

describe('buildSources', () => {
  const config = validConfig({ ...ALL_SOURCES, DENY_PAGE_SIZE: '100', DENY_MAX_RECORDS: '500' });

  test('every configured source becomes an orchestrator source', () => {
    const result = buildSources(config);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.sources.map((s) => [s.sourceKind, s.query, s.credentialRef, s.pageSize, s.maxRecords])).toEqual([
      [SourceKind.InteractionAudit, 'CopilotInteraction', 'AUDIT_TOKEN', 100, 500],
      [SourceKind.DlpRuleMatch, 'DLPRuleMatch', undefined, 100, 500],
      [SourceKind.ContentFilterTelemetry, 'customEvents | take 10', undefined, 100, 500],
    ]);
    expect(result.sources[1].classifierOptions).toEqual({ dlp: { policyFilter: '*', targetMarker: 'Copilot' } });
    expect(result.sources[0].classifierOptions).toBeUndefined();
    expect(result.sources[0].createEndpoint('test-token')).toBeInstanceOf(HttpQueryEndpoint);
  });

  test('a subset with a record cap override', () => {
    const result = buildSources(config, { only: [SourceKind.DlpRuleMatch], maxRecords: 20 });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.sources).toHaveLength(1);
    expect(result.sources[0].sourceKind).toBe(SourceKind.DlpRuleMatch);
    expect(result.sources[0].maxRecords).toBe(20);
  });

  test('an unconfigured source is reported with its variable', () => {
    const partial = validConfig({ DENY_AUDIT_ENDPOINT: 'https://gateway.example.test/audit' });
    expect(buildSources(partial, { only: [SourceKind.ContentFilterTelemetry, SourceKind.InteractionAudit] })).toEqual({
      success: false,
      errors: ['Source "content-filter-telemetry" is not configured (set DENY_TELEMETRY_ENDPOINT)'],
    });
  });

  test('the endpoint factory can be replaced', () => {
    const endpoint = new ArrayQueryEndpoint([]);
    const seen: string[] = [];
    const result = buildSources(config, {
      endpointFactory: (source) => {
        seen.push(source.endpoint);
        return () => endpoint;
      },
    });

    expect(seen).toEqual([
      'https://gateway.example.test/audit',
      'https://gateway.example.test/dlp',
      'http://telemetry.example.test/query',
    ]);
    expect(result.success && result.sources[2].createEndpoint(undefined)).toBe(endpoint);
  });
});
