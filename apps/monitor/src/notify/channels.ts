import type { ILogger } from '@sanctionwatch/logger'
import {
  createResendTransport,
  EmailChannel,
  LogChannel,
  SlackChannel,
  WebhookChannel,
  type EmailTransport,
  type NotificationChannel,
} from '@sanctionwatch/notifications'
import { loggers } from '../config/logger.js'
import type { NotifySettings } from '../config/settings.js'
import { ConfigurationError } from '../domain/errors.js'

export interface ChannelDependencies {
  log?: ILogger
  /** Replaces the Resend transport */
  emailTransport?: EmailTransport
}

function required(value: string | undefined, key: string): string {
  if (!value) {
    throw new ConfigurationError([`${key}: Required when its channel is enabled`])
  }
  return value
}

/**
 * Build the enabled channels, in settings order.
 */
export function buildChannels(settings: NotifySettings, deps: ChannelDependencies = {}): NotificationChannel[] {
  return settings.channels.map((id): NotificationChannel => {
    switch (id) {
      case 'email':
        return new EmailChannel({
          from: settings.emailFrom,
          to: settings.emailTo,
          transport: deps.emailTransport ?? createResendTransport(required(settings.resendApiKey, 'RESEND_API_KEY')),
        })
      case 'webhook':
        return new WebhookChannel(required(settings.webhookUrl, 'NOTIFY_WEBHOOK_URL'))
      case 'slack':
        return new SlackChannel(required(settings.slackWebhookUrl, 'SLACK_ALERTS_WEBHOOK_URL'))
      case 'log':
        return new LogChannel(deps.log ?? loggers.notify.child('alerts'))
    }
  })
}
