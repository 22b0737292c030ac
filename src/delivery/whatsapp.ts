/**
 * Newsbrief — WhatsApp Delivery
 *
 * Sends text messages through the WhatsApp Cloud API. Long reports are split
 * into several messages; each part is retried with backoff and, when a
 * limiter is given, rate limited. `deliver` never throws: it logs and
 * reports false.
 */

import { DeliveryError, errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';
import { withRetry, type RateLimiter, type RetryOptions } from '../resilience';
import { splitMessage, WHATSAPP_MESSAGE_LIMIT } from './formatter';

const log = logger.child({ module: 'whatsapp' });

const GRAPH_API_BASE = 'https://graph.facebook.com/v20.0';
const REQUEST_TIMEOUT_MS = 15_000;

// ============================================================
// TYPES
// ============================================================

export interface Delivery {
  readonly name: string;
  /** True when the whole text was delivered */
  deliver(text: string): Promise<boolean>;
}

export interface WhatsAppConfig {
  token: string;
  phoneNumberId: string;
  /** Digits only, with country code */
  recipient: string;
  apiBase?: string;
}

export interface WhatsAppDeliveryOptions {
  limiter?: RateLimiter;
  retry?: RetryOptions;
  fetchImpl?: typeof fetch;
}

// 4xx other than 429 will not get better on retry
function isRetryable(error: unknown): boolean {
  if (error instanceof DeliveryError && error.status !== undefined) {
    return error.status === 429 || error.status >= 500;
  }
  return true;
}

// ============================================================
// WHATSAPP
// ============================================================

export class WhatsAppDelivery implements Delivery {
  readonly name = 'whatsapp';

  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly config: WhatsAppConfig,
    private readonly options: WhatsAppDeliveryOptions = {}
  ) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async deliver(text: string): Promise<boolean> {
    const parts = splitMessage(text, WHATSAPP_MESSAGE_LIMIT);

    try {
      for (const [index, part] of parts.entries()) {
        await withRetry(() => this.sendLimited(part), {
          retries: 2,
          initialBackoffSeconds: 2,
          label: 'WhatsApp send',
          retryOn: isRetryable,
          ...this.options.retry,
        });
        log.debug('Message part sent', { part: index + 1, of: parts.length });
      }
    } catch (error) {
      log.error('WhatsApp delivery failed', { error: errorMessage(error), parts: parts.length });
      return false;
    }

    log.info('WhatsApp message delivered', { parts: parts.length, chars: text.length });
    return true;
  }

  private sendLimited(body: string): Promise<void> {
    const { limiter } = this.options;
    return limiter ? limiter.schedule(() => this.send(body)) : this.send(body);
  }

  private async send(body: string): Promise<void> {
    const base = this.config.apiBase ?? GRAPH_API_BASE;
    const res = await this.fetchImpl(`${base}/${this.config.phoneNumberId}/messages`, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.config.token}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        messaging_product: 'whatsapp',
        to: this.config.recipient,
        type: 'text',
        text: { preview_url: false, body },
      }),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });

    if (!res.ok) {
      const detail = await res.text().catch(() => '');
      throw new DeliveryError(`WhatsApp API responded ${res.status}${detail ? `: ${detail.slice(0, 200)}` : ''}`, res.status);
    }
  }
}

// ============================================================
// CONSOLE
// ============================================================

/**
 * Prints instead of sending. Used for dry runs and when WhatsApp is not
 * configured.
 */
export class ConsoleDelivery implements Delivery {
  readonly name = 'console';

  constructor(private readonly write: (text: string) => void = text => console.log(text)) {}

  async deliver(text: string): Promise<boolean> {
    this.write(`--- REPORT PREVIEW ---\n${text}`);
    return true;
  }
}
