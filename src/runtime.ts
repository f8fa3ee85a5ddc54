/**
 * Runtime assembly.
 *
 * Wires configuration into the concrete sink, credential source, exporter
 * and notifier shared by the CLI and the HTTP server.
 */

import { BuildSourcesOptions, DenyLedgerConfig, buildSources } from './config/config';
import { CredentialSource, EnvCredentialSource } from './credentials/credential-source';
import { errorMessage } from './domain/errors';
import { ExtractionOrchestrator, ExtractionSource } from './engine/orchestrator';
import { EvidenceExporter } from './export/evidence-exporter';
import { Logger, logger as rootLogger } from './logger';
import { SummaryNotifier, WebhookNotifier } from './notifications/webhook';
import { CsvFileSink } from './sinks/csv-file-sink';
import { EventSink } from './sinks/sink';

export interface Runtime {
  config: DenyLedgerConfig;
  /** Every configured source. */
  sources: ExtractionSource[];
  createOrchestrator(): ExtractionOrchestrator;
}

export interface RuntimeOverrides {
  credentials?: CredentialSource;
  sink?: EventSink;
  notifier?: SummaryNotifier;
  endpointFactory?: BuildSourcesOptions['endpointFactory'];
  logger?: Logger;
}

/** Resolve the webhook signing secret, if any, and build the notifier. */
async function createNotifier(
  config: DenyLedgerConfig,
  credentials: CredentialSource,
  log: Logger,
): Promise<SummaryNotifier | undefined> {
  if (!config.webhook) return undefined;
  let signingSecret: string | undefined;
  if (config.webhook.secretRef) {
    try {
      signingSecret = await credentials.resolve(config.webhook.secretRef);
    } catch (err) {
      log.warn('Webhook signing secret unavailable; summaries will be sent unsigned', {
        credentialRef: config.webhook.secretRef,
        error: errorMessage(err),
      });
    }
  }
  return new WebhookNotifier({ url: config.webhook.url, signingSecret });
}

export async function createRuntime(config: DenyLedgerConfig, overrides: RuntimeOverrides = {}): Promise<Runtime> {
  const log = overrides.logger ?? rootLogger;
  const credentials = overrides.credentials ?? new EnvCredentialSource();
  const sink = overrides.sink ?? new CsvFileSink({ outputDir: config.outputDir });
  const exporter = config.exportDir ? new EvidenceExporter({ exportDir: config.exportDir }) : undefined;
  const notifier = overrides.notifier ?? await createNotifier(config, credentials, log);

  const built = buildSources(config, { endpointFactory: overrides.endpointFactory });
  const sources = built.success ? built.sources : [];

  return {
    config,
    sources,
    createOrchestrator: () =>
      new ExtractionOrchestrator(
        { sink, credentials, exporter, notifier, logger: log },
        { executionMode: config.executionMode, maxRecords: config.maxRecords, pageSize: config.pageSize },
      ),
  };
}
