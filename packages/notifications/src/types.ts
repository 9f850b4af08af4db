/**
 * Shared notification types.
 *
 * Channels take a fully formatted message and report one of three
 * outcomes. Retrying is the caller's business.
 */

export type ChannelId = 'email' | 'webhook' | 'slack' | 'log';

export const CHANNEL_IDS: readonly ChannelId[] = ['email', 'webhook', 'slack', 'log'];

export type AlertPriority = 'Critical' | 'High' | 'Medium' | 'Low';

/**
 * The change fields a notification needs. Stored change events
 * satisfy this structurally.
 */
export interface ChangeNotice {
  eventId: string;
  entityUid: string;
  entityName: string;
  source: string;
  changeType: 'Added' | 'Modified' | 'Removed';
  riskLevel: AlertPriority;
  changeSummary: string;
  detectedAt: Date;
}

export interface SlackTextObject {
  type: 'plain_text' | 'mrkdwn';
  text: string;
  emoji?: boolean;
}

export type SlackBlock =
  | { type: 'header'; text: SlackTextObject }
  | { type: 'section'; text?: SlackTextObject; fields?: SlackTextObject[] }
  | { type: 'divider' }
  | { type: 'context'; elements: SlackTextObject[] };

export interface SlackMessage {
  text: string;
  blocks?: SlackBlock[];
}

export interface WebhookPayload {
  priority: AlertPriority;
  timestamp: string;
  changeCount: number;
  message: string;
  changes: Array<{
    eventId: string;
    source: string;
    entityUid: string;
    entityName: string;
    changeType: ChangeNotice['changeType'];
    riskLevel: AlertPriority;
    summary: string;
  }>;
}

export interface NotificationMessage {
  priority: AlertPriority;
  eventIds: string[];
  subject: string;
  text: string;
  html: string;
  slack: SlackMessage;
  webhook: WebhookPayload;
}

export type DeliveryResult =
  | { status: 'success'; messageId?: string }
  | { status: 'transient'; error: string }
  | { status: 'permanent'; error: string };

export interface NotificationChannel {
  readonly id: ChannelId;
  send(message: NotificationMessage): Promise<DeliveryResult>;
}
