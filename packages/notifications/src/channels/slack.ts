/**
 * Slack Channel - Incoming Webhooks
 *
 * Posts Block Kit messages to a Slack incoming webhook.
 */

import { postJson, DEFAULT_HTTP_TIMEOUT_MS } from './http.js';
import type { DeliveryResult, NotificationChannel, NotificationMessage, SlackBlock, SlackMessage } from '../types.js';

// =============================================================================
// Block Helpers
// =============================================================================

export function slackHeader(text: string): SlackBlock {
  return { type: 'header', text: { type: 'plain_text', text: text.slice(0, 150), emoji: true } };
}

export function slackText(text: string): SlackBlock {
  return { type: 'section', text: { type: 'mrkdwn', text } };
}

export function slackDivider(): SlackBlock {
  return { type: 'divider' };
}

export function slackContext(text: string): SlackBlock {
  return { type: 'context', elements: [{ type: 'mrkdwn', text }] };
}

/**
 * Two-column label/value section. Slack allows at most 10 fields.
 */
export function slackFieldsSection(fields: Record<string, string>): SlackBlock {
  return {
    type: 'section',
    fields: Object.entries(fields)
      .slice(0, 10)
      .map(([label, value]) => ({ type: 'mrkdwn', text: `*${label}:*\n${value}` })),
  };
}

// =============================================================================
// Sending
// =============================================================================

export async function sendSlackMessage(
  message: SlackMessage,
  webhookUrl: string,
  timeoutMs = DEFAULT_HTTP_TIMEOUT_MS
): Promise<DeliveryResult> {
  return postJson(webhookUrl, message, timeoutMs);
}

export class SlackChannel implements NotificationChannel {
  readonly id = 'slack' as const;

  constructor(
    private readonly webhookUrl: string,
    private readonly timeoutMs = DEFAULT_HTTP_TIMEOUT_MS
  ) {}

  send(message: NotificationMessage): Promise<DeliveryResult> {
    return sendSlackMessage(message.slack, this.webhookUrl, this.timeoutMs);
  }
}
