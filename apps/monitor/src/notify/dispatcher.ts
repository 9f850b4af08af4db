/**
 * Notification Dispatcher
 *
 * Critical changes go out one alert per event as soon as they arrive,
 * all in flight together. High, Medium and Low changes wait in per-tier
 * buffers until the ticker fires (every batchWindowMs) or a Critical
 * event arrives, and then go out as one digest per tier.
 *
 * Every channel is tried independently with its own retry budget. A
 * change is stamped as notified with the channels that delivered it;
 * when none did, it stays unstamped. Delivery problems are logged and
 * never thrown: detection results do not depend on them.
 */

import type { ChangeEvent, RiskLevel, SanctionsRepository } from '@sanctionwatch/db'
import type { ILogger } from '@sanctionwatch/logger'
import {
  formatCriticalAlert,
  formatDigest,
  type ChannelId,
  type DeliveryResult,
  type NotificationChannel,
  type NotificationMessage,
} from '@sanctionwatch/notifications'
import { loggers } from '../config/logger.js'
import type { NotifySettings } from '../config/settings.js'
import { NotificationError } from '../domain/errors.js'
import { computeBackoffDelay } from '../utils/backoff.js'
import { sleep as defaultSleep, systemClock, type Clock, type Sleep } from '../utils/time.js'

export const DIGEST_TIERS = ['High', 'Medium', 'Low'] as const
export type DigestTier = (typeof DIGEST_TIERS)[number]

const MAX_RETRY_DELAY_MS = 60_000

export interface ChannelFailure {
  channel: ChannelId
  kind: 'permanent' | 'exhausted'
  error: string
  attempts: number
}

export interface DeliveryReport {
  priority: RiskLevel
  eventIds: string[]
  delivered: ChannelId[]
  failed: ChannelFailure[]
}

export interface DispatcherOptions {
  channels: NotificationChannel[]
  repository: Pick<SanctionsRepository, 'markEventsNotified'>
  settings: Pick<NotifySettings, 'batchWindowMs' | 'maxAttempts' | 'initialDelayMs'>
  clock?: Clock
  sleep?: Sleep
  random?: () => number
  logger?: ILogger
}

type ChannelOutcome = { ok: true; channel: ChannelId } | { ok: false; failure: ChannelFailure }

function isDigestTier(level: RiskLevel): level is DigestTier {
  return level !== 'Critical'
}

export class NotificationDispatcher {
  private readonly channels: NotificationChannel[]
  private readonly repository: Pick<SanctionsRepository, 'markEventsNotified'>
  private readonly settings: DispatcherOptions['settings']
  private readonly clock: Clock
  private readonly sleep: Sleep
  private readonly random: () => number
  private readonly log: ILogger

  private readonly buffers = new Map<DigestTier, ChangeEvent[]>(DIGEST_TIERS.map(tier => [tier, []]))
  private readonly pendingFlushes = new Set<Promise<unknown>>()
  private ticker: NodeJS.Timeout | null = null

  constructor(options: DispatcherOptions) {
    this.channels = options.channels
    this.repository = options.repository
    this.settings = options.settings
    this.clock = options.clock ?? systemClock
    this.sleep = options.sleep ?? defaultSleep
    this.random = options.random ?? Math.random
    this.log = options.logger ?? loggers.notify
  }

  /**
   * Start the background ticker that flushes the digest buffers.
   */
  start(): void {
    if (this.ticker) return
    this.ticker = setInterval(() => this.flushInBackground('interval'), this.settings.batchWindowMs)
    this.ticker.unref()
    this.log.info('Notification dispatcher started', {
      batchWindowMs: this.settings.batchWindowMs,
      channels: this.channels.map(channel => channel.id),
    })
  }

  /**
   * Stop the ticker and deliver whatever is still buffered.
   */
  async stop(): Promise<void> {
    if (this.ticker) {
      clearInterval(this.ticker)
      this.ticker = null
    }
    await Promise.allSettled([...this.pendingFlushes])
    await this.flush()
  }

  /**
   * Send Critical events now and buffer the rest.
   * A Critical event also flushes the digest buffers.
   */
  async dispatch(events: ChangeEvent[]): Promise<DeliveryReport[]> {
    const critical: ChangeEvent[] = []
    for (const event of events) {
      if (isDigestTier(event.riskLevel)) {
        this.bufferFor(event.riskLevel).push(event)
      } else {
        critical.push(event)
      }
    }

    this.log.debug('Changes queued for notification', {
      critical: critical.length,
      buffered: this.pending(),
    })

    if (critical.length === 0) return []

    // One message per event, all in flight together: a channel retrying
    // one alert does not hold back the next
    const reports = await Promise.all(
      critical.map(event => this.deliver([event], formatCriticalAlert(event, this.clock())))
    )
    reports.push(...(await this.flush()))
    return reports
  }

  /**
   * Deliver one digest per non-empty tier.
   */
  async flush(): Promise<DeliveryReport[]> {
    const reports: DeliveryReport[] = []
    for (const tier of DIGEST_TIERS) {
      const buffer = this.bufferFor(tier)
      if (buffer.length === 0) continue
      // Taken before the first await so an overlapping flush cannot resend them
      const events = buffer.splice(0, buffer.length)
      reports.push(await this.deliver(events, formatDigest(tier, events, this.clock())))
    }
    return reports
  }

  pending(): Record<DigestTier, number> {
    return {
      High: this.bufferFor('High').length,
      Medium: this.bufferFor('Medium').length,
      Low: this.bufferFor('Low').length,
    }
  }

  private bufferFor(tier: DigestTier): ChangeEvent[] {
    let buffer = this.buffers.get(tier)
    if (!buffer) {
      buffer = []
      this.buffers.set(tier, buffer)
    }
    return buffer
  }

  private flushInBackground(trigger: string): void {
    const flush = this.flush()
      .catch(error => {
        this.log.error('Notification flush failed', { trigger }, error)
      })
      .finally(() => {
        this.pendingFlushes.delete(flush)
      })
    this.pendingFlushes.add(flush)
  }

  private async deliver(events: ChangeEvent[], message: NotificationMessage): Promise<DeliveryReport> {
    const outcomes = await Promise.all(this.channels.map(channel => this.sendWithRetry(channel, message)))

    const delivered: ChannelId[] = []
    const failed: ChannelFailure[] = []
    for (const outcome of outcomes) {
      if (outcome.ok) {
        delivered.push(outcome.channel)
      } else {
        failed.push(outcome.failure)
      }
    }

    const report: DeliveryReport = { priority: message.priority, eventIds: message.eventIds, delivered, failed }

    if (delivered.length > 0) {
      try {
        await this.repository.markEventsNotified(message.eventIds, this.clock(), delivered)
      } catch (error) {
        this.log.error('Failed to stamp notified change events', {
          priority: message.priority,
          eventIds: message.eventIds,
        }, error)
      }
    }

    this.log.info('NOTIFICATION_DISPATCHED', {
      event_name: 'NOTIFICATION_DISPATCHED',
      priority: message.priority,
      changeCount: events.length,
      delivered,
      failed: failed.map(failure => failure.channel),
    })

    return report
  }

  private async sendWithRetry(channel: NotificationChannel, message: NotificationMessage): Promise<ChannelOutcome> {
    const maxAttempts = this.settings.maxAttempts
    const log = this.log.child({ channel: channel.id, priority: message.priority })

    for (let attempt = 1; ; attempt++) {
      let result: DeliveryResult
      try {
        result = await channel.send(message)
      } catch (error) {
        result = { status: 'transient', error: error instanceof Error ? error.message : String(error) }
      }

      if (result.status === 'success') {
        return { ok: true, channel: channel.id }
      }

      if (result.status === 'permanent') {
        log.error('NOTIFICATION_CHANNEL_FAILED', {
          event_name: 'NOTIFICATION_CHANNEL_FAILED',
          attempts: attempt,
          reason: result.error,
          eventIds: message.eventIds,
        })
        return { ok: false, failure: { channel: channel.id, kind: 'permanent', error: result.error, attempts: attempt } }
      }

      if (attempt >= maxAttempts) {
        const exhausted = new NotificationError(channel.id, 'exhausted', result.error)
        log.error('NOTIFICATION_CHANNEL_EXHAUSTED', {
          event_name: 'NOTIFICATION_CHANNEL_EXHAUSTED',
          attempts: attempt,
          eventIds: message.eventIds,
        }, exhausted)
        return { ok: false, failure: { channel: channel.id, kind: 'exhausted', error: result.error, attempts: attempt } }
      }

      const delayMs = computeBackoffDelay(attempt, this.settings.initialDelayMs, MAX_RETRY_DELAY_MS, this.random)
      log.warn('NOTIFICATION_RETRY', {
        event_name: 'NOTIFICATION_RETRY',
        attempt,
        maxAttempts,
        delayMs,
        reason: result.error,
      })
      await this.sleep(delayMs)
    }
  }
}
