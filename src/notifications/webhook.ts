/**
 * Webhook notification channel.
 *
 * Delivers session reports to a webhook endpoint via HTTP POST.
 * Includes an HMAC signature for payload verification when a signing secret is configured.
 */

import { v4 as uuid } from 'uuid';
import { createHmac } from 'crypto';
import { NotificationChannel } from '../adapters/interfaces';

/** Webhook payload for a session report. */
export interface WebhookPayload {
  id: string;
  event: 'update.reported';
  timestamp: string;
  targetId: string;
  sessionId: string;
  text: string;
}

/** Webhook delivery function type (injectable for testing). */
export type WebhookDeliveryFn = (
  url: string,
  payload: WebhookPayload,
  signingSecret?: string,
) => Promise<{ statusCode: number }>;

/**
 * Validate that a webhook URL is safe to send HTTP requests to.
 * Returns an error message if the URL is unsafe, or null if safe.
 *
 * Blocks non-HTTP(S) protocols, localhost, cloud metadata endpoints and
 * private or link-local IPv4 ranges.
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
    // 127.0.0.0/8
    if (a === 127) return `Webhook URL must not point to localhost: ${hostname}`;
    if (a === 0) return `Webhook URL must not point to unspecified address: ${hostname}`;
  }

  return null;
}

/**
 * Up to 3 retries with exponential backoff (1s, 2s, 4s) on network errors
 * and 5xx responses. 4xx responses fail immediately.
 */
const WEBHOOK_MAX_RETRIES = 3;
const WEBHOOK_BACKOFF_BASE_MS = 1000;
const WEBHOOK_TIMEOUT_MS = 10_000;

function webhookSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** HTTP webhook delivery using native fetch with HMAC signing and retry. */
export const httpDelivery: WebhookDeliveryFn = async (
  url: string,
  payload: WebhookPayload,
  signingSecret?: string,
) => {
  const body = JSON.stringify(payload);
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    'User-Agent': 'genswitch-webhook/0.1.0',
    'X-Webhook-Id': payload.id,
    'X-Webhook-Event': payload.event,
  };

  if (signingSecret) {
    const signature = createHmac('sha256', signingSecret).update(body).digest('hex');
    headers['X-Webhook-Signature'] = `sha256=${signature}`;
  }

  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= WEBHOOK_MAX_RETRIES; attempt++) {
    if (attempt > 0) {
      await webhookSleep(WEBHOOK_BACKOFF_BASE_MS * Math.pow(2, attempt - 1));
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), WEBHOOK_TIMEOUT_MS);

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers,
        body,
        signal: controller.signal,
      });
      clearTimeout(timeout);

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

export interface WebhookChannelOptions {
  url: string;
  signingSecret?: string;
  deliveryFn?: WebhookDeliveryFn;
}

/** Notification channel posting reports to a webhook. */
export class WebhookChannel implements NotificationChannel {
  private readonly deliveryFn: WebhookDeliveryFn;

  constructor(private readonly options: WebhookChannelOptions) {
    this.deliveryFn = options.deliveryFn ?? httpDelivery;
  }

  /** Throws when the URL is unsafe or the endpoint does not answer 2xx. */
  async send(message: string, meta: { sessionId: string; targetId: string }): Promise<void> {
    const urlError = validateWebhookUrl(this.options.url);
    if (urlError) {
      throw new Error(urlError);
    }

    const payload: WebhookPayload = {
      id: `whk_${uuid()}`,
      event: 'update.reported',
      timestamp: new Date().toISOString(),
      targetId: meta.targetId,
      sessionId: meta.sessionId,
      text: message,
    };

    const response = await this.deliveryFn(this.options.url, payload, this.options.signingSecret);
    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new Error(`Webhook rejected report with HTTP ${response.statusCode}`);
    }
  }
}
