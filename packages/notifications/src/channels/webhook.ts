import { postJson, DEFAULT_HTTP_TIMEOUT_MS } from './http.js';
import type { DeliveryResult, NotificationChannel, NotificationMessage } from '../types.js';

/**
 * Generic JSON webhook. The body is the message's `webhook` payload.
 */
export class WebhookChannel implements NotificationChannel {
  readonly id = 'webhook' as const;

  constructor(
    private readonly url: string,
    private readonly timeoutMs = DEFAULT_HTTP_TIMEOUT_MS
  ) {}

  send(message: NotificationMessage): Promise<DeliveryResult> {
    return postJson(this.url, message.webhook, this.timeoutMs);
  }
}
