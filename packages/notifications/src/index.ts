/**
 * @sanctionwatch/notifications
 *
 * Delivery channels and message formatting for sanctions change alerts.
 * Channels: email (Resend), Slack (incoming webhook), generic JSON
 * webhook and the log.
 *
 * Usage:
 * ```typescript
 * import { EmailChannel, createResendTransport, formatCriticalAlert } from '@sanctionwatch/notifications';
 *
 * const email = new EmailChannel({ from, to, transport: createResendTransport(apiKey) });
 * const result = await email.send(formatCriticalAlert(change));
 * ```
 */

export * from './types.js';

export {
  EmailChannel,
  createResendTransport,
  escapeHtml,
  wrapEmailTemplate,
  emailInfoBox,
  type EmailChannelOptions,
  type EmailResult,
  type EmailTransport,
  type OutgoingEmail,
} from './channels/email.js';

export {
  SlackChannel,
  sendSlackMessage,
  slackHeader,
  slackText,
  slackDivider,
  slackContext,
  slackFieldsSection,
} from './channels/slack.js';

export { WebhookChannel } from './channels/webhook.js';
export { LogChannel } from './channels/log.js';
export { isTransientStatus, postJson } from './channels/http.js';

export {
  formatCriticalAlert,
  formatDigest,
  formatUtc,
  summarizeChangeTypes,
  DIGEST_DETAIL_LIMIT,
} from './change-alerts.js';
