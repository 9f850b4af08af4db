/**
 * Email Channel - Resend Integration
 *
 * Sends alert and digest emails via the Resend API.
 */

import { Resend } from 'resend';
import type { DeliveryResult, NotificationChannel, NotificationMessage } from '../types.js';

// =============================================================================
// Types
// =============================================================================

export interface OutgoingEmail {
  from: string;
  to: string[];
  subject: string;
  html: string;
  text: string;
}

export interface EmailResult {
  success: boolean;
  messageId?: string;
  error?: string;
  /** Set on failures worth another attempt */
  retryable?: boolean;
}

export interface EmailTransport {
  send(email: OutgoingEmail): Promise<EmailResult>;
}

// Resend error names that clear up on their own
const TRANSIENT_RESEND_ERRORS = new Set(['rate_limit_exceeded', 'application_error', 'internal_server_error']);

// =============================================================================
// Resend Transport
// =============================================================================

export function createResendTransport(apiKey: string): EmailTransport {
  const resend = new Resend(apiKey);

  return {
    async send(email: OutgoingEmail): Promise<EmailResult> {
      try {
        const { data, error } = await resend.emails.send(email);
        if (error) {
          return { success: false, error: error.message, retryable: TRANSIENT_RESEND_ERRORS.has(error.name) };
        }
        return { success: true, messageId: data?.id };
      } catch (error) {
        return {
          success: false,
          error: error instanceof Error ? error.message : 'Unknown error',
          retryable: true,
        };
      }
    },
  };
}

// =============================================================================
// Channel
// =============================================================================

export interface EmailChannelOptions {
  from: string;
  to: string[];
  transport: EmailTransport;
}

export class EmailChannel implements NotificationChannel {
  readonly id = 'email' as const;

  constructor(private readonly options: EmailChannelOptions) {}

  async send(message: NotificationMessage): Promise<DeliveryResult> {
    const result = await this.options.transport.send({
      from: this.options.from,
      to: this.options.to,
      subject: message.subject,
      html: message.html,
      text: message.text,
    });

    if (result.success) {
      return { status: 'success', messageId: result.messageId };
    }
    const error = result.error ?? 'Email delivery failed';
    return result.retryable ? { status: 'transient', error } : { status: 'permanent', error };
  }
}

// =============================================================================
// Email Template Helpers
// =============================================================================

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);
}

export function wrapEmailTemplate(content: string): string {
  return `
<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
</head>
<body style="font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; line-height: 1.6; color: #333; max-width: 640px; margin: 0 auto; padding: 20px;">
  <div style="margin-bottom: 24px;">
    <h1 style="color: #111; font-size: 22px; margin: 0;">SanctionWatch</h1>
    <p style="color: #666; font-size: 13px; margin: 4px 0 0 0;">Sanctions list monitoring</p>
  </div>

  ${content}

  <hr style="border: none; border-top: 1px solid #e5e7eb; margin: 30px 0;">
  <p style="color: #888; font-size: 12px; margin: 0;">Automated message from SanctionWatch.</p>
</body>
</html>
  `.trim();
}

export function emailInfoBox(content: string, type: 'info' | 'warning' | 'error' = 'info'): string {
  const styles = {
    info: 'background: #f0f9ff; border: 1px solid #0ea5e9; color: #0369a1;',
    warning: 'background: #fffbeb; border: 1px solid #fcd34d; color: #92400e;',
    error: 'background: #fef2f2; border: 1px solid #fca5a5; color: #b91c1c;',
  };

  return `
<div style="${styles[type]} border-radius: 8px; padding: 20px; margin: 20px 0;">
  ${content}
</div>
  `.trim();
}
