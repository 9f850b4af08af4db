import type { ILogger } from '@sanctionwatch/logger';
import type { DeliveryResult, NotificationChannel, NotificationMessage } from '../types.js';

/**
 * Writes notifications to the log. Always available, never fails.
 */
export class LogChannel implements NotificationChannel {
  readonly id = 'log' as const;

  constructor(private readonly log: ILogger) {}

  async send(message: NotificationMessage): Promise<DeliveryResult> {
    const meta = {
      event_name: 'NOTIFICATION_LOGGED',
      priority: message.priority,
      changeCount: message.eventIds.length,
      subject: message.subject,
      body: message.text,
    };

    if (message.priority === 'Critical') {
      this.log.error(message.subject, meta);
    } else if (message.priority === 'High') {
      this.log.warn(message.subject, meta);
    } else {
      this.log.info(message.subject, meta);
    }
    return { status: 'success' };
  }
}
