/**
 * Webhook Summary Notifier.
 *
 * Delivers the run summary to a configured webhook endpoint via HTTP POST.
 * Includes an HMAC signature for payload verification when a signing secret
 * is configured. Delivery failure never changes any job outcome; the
 * orchestrator records it as a warning.
 */

import { v4 as uuid } from 'uuid';
import { createHmac } from 'crypto';
import { NotificationReport, OrchestrationSummary } from '../domain/run';
import { SOURCE_KIND_LABELS } from '../domain/deny-event';

export type SummaryEventType = 'run.completed';

/** Webhook payload for a completed run. */
export interface SummaryWebhookPayload {
  id: string;
  event: SummaryEventType;
  timestamp: string;
  runId: string;
  batchId: string;
  window: { start: string; end: string };
  overallStatus: string;
  exitCode: number;
  totalEvents: number;
  sources: Array<{
    source: string;
    succeeded: boolean;
    eventCount: number;
    errorDetail?: string;
  }>;
  warnings: Array<{ code: string; message: string }>;
}

/** Webhook delivery function type (injectable for testing). */
export type WebhookDeliveryFn = (
  url: string,
  payload: SummaryWebhookPayload,
  signingSecret?: string,
) => Promise<{ statusCode: number }>;

export interface SummaryNotifier {
  notify(summary: OrchestrationSummary): Promise<NotificationReport>;
}

/**
 * Validate that a webhook URL is safe to send HTTP requests to.
 * Returns an error message if the URL is unsafe, or null if safe.
 *
 * Blocks non-HTTP(S) protocols, localhost, cloud metadata endpoints and
 * private/link-local IPv4 ranges.
 */
export function validateWebhookUrl(url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return `Invalid webhook URL: ${url}`;
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return `Webhook URL must use http or https protocol, got: ${parsed.protocol}`;
  }

  const hostname = parsed.hostname.toLowerCase();

  if (hostname === 'localhost' || hostname === '127.0.0.1' || hostname === '::1' || hostname === '[::1]') {
    return `Webhook URL must not point to localhost: ${hostname}`;
  }

  if (hostname === '169.254.169.254' || hostname === 'metadata.google.internal') {
    return `Webhook URL must not point to cloud metadata endpoints: ${hostname}`;
  }

  const ipv4Match = hostname.match(/^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/);
  if (ipv4Match) {
    const a = Number(ipv4Match[1]);
    const b = Number(ipv4Match[2]);
    // 10.0.0.0/8
    if (a === 10) return `Webhook URL must not point to private IP range: ${hostname}`;
    // 172.16.0.0/12
    if (a === 172 && b >= 16 && b <= 31) return `Webhook URL must not point to private IP range: ${hostname}`;
    // 192.168.0.0/16
    if (a === 192 && b === 168) return `Webhook URL must not point to private IP range: ${hostname}`;
    // 169.254.0.0/16 (link-local)
    if (a === 169 && b === 254) return `Webhook URL must not point to link-local range: ${hostname}`;
    if (a === 0) return `Webhook URL must not point to unspecified address: ${hostname}`;
  }

  return null;
}

/** Hex HMAC-SHA256 of a payload body, as sent in X-Webhook-Signature. */
export function signPayload(body: string, signingSecret: string): string {
  return `sha256=${createHmac('sha256', signingSecret).update(body).digest('hex')}`;
}

/** Retries after the first attempt; 5xx and network errors only. */
const WEBHOOK_MAX_RETRIES = 3;
const WEBHOOK_BACKOFF_BASE_MS = 1000;

function webhookSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** HTTP webhook delivery using native fetch with HMAC signing and retry. */
const httpDelivery: WebhookDeliveryFn = async (
  url: string,
  payload: SummaryWebhookPayload,
  signingSecret?: string,
) => {
  const body = JSON.stringify(payload);
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    'User-Agent': 'deny-ledger-webhook/0.1.0',
    'X-Webhook-Id': payload.id,
    'X-Webhook-Event': payload.event,
  };

  if (signingSecret) {
    headers['X-Webhook-Signature'] = signPayload(body, signingSecret);
  }

  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= WEBHOOK_MAX_RETRIES; attempt++) {
    if (attempt > 0) {
      await webhookSleep(WEBHOOK_BACKOFF_BASE_MS * Math.pow(2, attempt - 1));
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), 10_000);

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers,
        body,
        signal: controller.signal,
      });
      clearTimeout(timeout);

      // Below 500: final answer, success or client error
      if (response.status < 500) {
        return { statusCode: response.status };
      }

      lastError = new Error(`Webhook returned HTTP ${response.status}`);
    } catch (err) {
      clearTimeout(timeout);
      lastError = err instanceof Error ? err : new Error('Unknown webhook error');
    }
  }

  throw lastError ?? new Error('Webhook delivery failed after retries');
};

/** Build the webhook payload for a summary. */
export function buildSummaryPayload(summary: OrchestrationSummary): SummaryWebhookPayload {
  return {
    id: `whk_${uuid()}`,
    event: 'run.completed',
    timestamp: new Date().toISOString(),
    runId: summary.runId,
    batchId: summary.batchId,
    window: { ...summary.window },
    overallStatus: summary.overallStatus,
    exitCode: summary.exitCode,
    totalEvents: summary.totalEvents,
    sources: summary.results.map((r) => ({
      source: SOURCE_KIND_LABELS[r.sourceKind],
      succeeded: r.succeeded,
      eventCount: r.eventCount,
      ...(r.errorDetail ? { errorDetail: r.errorDetail } : {}),
    })),
    warnings: summary.warnings.map((w) => ({ code: w.code, message: w.message })),
  };
}

export interface WebhookNotifierOptions {
  url: string;
  signingSecret?: string;
  deliveryFn?: WebhookDeliveryFn;
}

/** Posts run summaries to a webhook. */
export class WebhookNotifier implements SummaryNotifier {
  private deliveryFn: WebhookDeliveryFn;
  /** Record of delivery attempts for audit. */
  private deliveryLog: Array<NotificationReport & { payload: SummaryWebhookPayload }> = [];

  constructor(private readonly options: WebhookNotifierOptions) {
    this.deliveryFn = options.deliveryFn ?? httpDelivery;
  }

  async notify(summary: OrchestrationSummary): Promise<NotificationReport> {
    const payload = buildSummaryPayload(summary);

    // SSRF protection: validate URL before making any request
    const urlError = validateWebhookUrl(this.options.url);
    if (urlError) {
      return this.record({ success: false, error: urlError }, payload);
    }

    try {
      const response = await this.deliveryFn(this.options.url, payload, this.options.signingSecret);
      return this.record({
        success: response.statusCode >= 200 && response.statusCode < 300,
        statusCode: response.statusCode,
        ...(response.statusCode >= 300 ? { error: `Webhook returned HTTP ${response.statusCode}` } : {}),
      }, payload);
    } catch (err) {
      return this.record({
        success: false,
        error: err instanceof Error ? err.message : 'Webhook delivery failed',
      }, payload);
    }
  }

  /** Get delivery log (for testing/audit). */
  getDeliveryLog(): Array<NotificationReport & { payload: SummaryWebhookPayload }> {
    return [...this.deliveryLog];
  }

  private record(report: NotificationReport, payload: SummaryWebhookPayload): NotificationReport {
    this.deliveryLog.push({ ...report, payload });
    return report;
  }
}
