// ═══════════════════════════════════════════════════════════════════════════════
// NOTIFICATION PROVIDERS — Push Gateway, Log-Only and Mock Delivery
// ═══════════════════════════════════════════════════════════════════════════════

import { loadConfig, type NotificationConfig } from '../config/index.js';
import { getLogger } from '../observability/logging/index.js';
import type { Notifier, PushNotification } from './types.js';

const logger = getLogger({ component: 'notifications' });

// ─────────────────────────────────────────────────────────────────────────────────
// PUSH GATEWAY
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * POSTs `{ token, title, body, data }` as JSON to an HTTP push gateway.
 */
export class GatewayPushNotifier implements Notifier {
  private readonly url: string;
  private readonly apiKey?: string;
  private readonly timeoutMs: number;

  constructor(url: string, options: { apiKey?: string; timeoutMs?: number } = {}) {
    this.url = url;
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? 5000;
  }

  async send(token: string, title: string, body: string, data?: Readonly<Record<string, string>>): Promise<boolean> {
    const payload: PushNotification = { token, title, body, ...(data && { data }) };
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(this.url, {
        method: 'POST',
        headers,
        body: JSON.stringify(payload),
        signal: controller.signal,
      });

      if (response.status < 200 || response.status >= 300) {
        logger.error('Push gateway rejected notification', undefined, { statusCode: response.status, title });
        return false;
      }

      logger.info('Notification sent', { title });
      return true;
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        logger.error('Push gateway timed out', undefined, { timeoutMs: this.timeoutMs, title });
      } else {
        logger.error('Failed to send notification', error, { title });
      }
      return false;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOG ONLY
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Used when no gateway is configured.
 */
export class LogOnlyNotifier implements Notifier {
  async send(_token: string, title: string, body: string): Promise<boolean> {
    logger.info('Push gateway not configured, notification logged only', { title, bodyLength: body.length });
    return false;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// MOCK
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Records every notification; `failFor` tokens report failure.
 */
export class MockNotifier implements Notifier {
  readonly sent: PushNotification[] = [];
  private readonly failing: Set<string>;

  constructor(failFor: readonly string[] = []) {
    this.failing = new Set(failFor);
  }

  async send(token: string, title: string, body: string, data?: Readonly<Record<string, string>>): Promise<boolean> {
    if (this.failing.has(token)) {
      logger.error('Mock notification failure', undefined, { title });
      return false;
    }
    this.sent.push({ token, title, body, ...(data && { data }) });
    return true;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// FACTORY
// ─────────────────────────────────────────────────────────────────────────────────

export function createNotifier(config: NotificationConfig = loadConfig().notifications): Notifier {
  if (!config.gatewayUrl) {
    logger.warn('PUSH_GATEWAY_URL not set, notifications will only be logged');
    return new LogOnlyNotifier();
  }
  return new GatewayPushNotifier(config.gatewayUrl, { apiKey: config.gatewayKey, timeoutMs: config.timeoutMs });
}
