/**
 * Monitor settings
 *
 * Validated once at startup from the environment. Any invalid or missing
 * value fails the whole load with a ConfigurationError naming every key
 * at fault.
 */

import { z } from 'zod'
import { CronExpressionParser } from 'cron-parser'
import type { SanctionSource } from '@sanctionwatch/db'
import { CHANNEL_IDS, type ChannelId } from '@sanctionwatch/notifications'
import { ConfigurationError } from '../domain/errors.js'

export interface DownloadSettings {
  maxAttempts: number
  initialDelayMs: number
  maxDelayMs: number
  timeoutMs: number
  maxBytes: number
  maxConnections: number
  minIntervalMs: number
  userAgent: string
}

export interface NotifySettings {
  batchWindowMs: number
  maxAttempts: number
  initialDelayMs: number
  channels: ChannelId[]
  emailTo: string[]
  emailFrom: string
  resendApiKey: string | undefined
  webhookUrl: string | undefined
  slackWebhookUrl: string | undefined
}

export interface RunSettings {
  maxLifetimeMs: number
  sweepIntervalMs: number
  workerConcurrency: number
  lockTtlMs: number
  /** Whether this process owns the repeatable jobs; exactly one process should */
  schedulerEnabled: boolean
}

export interface SourceOverrides {
  url: string | undefined
  schedule: string | undefined
}

export interface MonitorSettings {
  nodeEnv: string
  download: DownloadSettings
  notify: NotifySettings
  run: RunSettings
  sources: Record<SanctionSource, SourceOverrides>
  databaseUrl: string | undefined
}

export function isValidCron(expression: string): boolean {
  try {
    CronExpressionParser.parse(expression, { tz: 'UTC' })
    return true
  } catch {
    return false
  }
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback)

const cronExpression = z.string().refine(isValidCron, { message: 'Invalid cron expression' })

const commaList = (value: string) =>
  value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0)

const envSchema = z
  .object({
    NODE_ENV: z.string().default('development'),

    DOWNLOAD_MAX_ATTEMPTS: positiveInt(5),
    DOWNLOAD_INITIAL_DELAY_MS: positiveInt(1_000),
    DOWNLOAD_MAX_DELAY_MS: positiveInt(30_000),
    DOWNLOAD_TIMEOUT_MS: positiveInt(120_000),
    DOWNLOAD_MAX_BYTES: positiveInt(100 * 1024 * 1024),
    DOWNLOAD_MAX_CONNECTIONS: positiveInt(4),
    DOWNLOAD_MIN_INTERVAL_MS: z.coerce.number().int().nonnegative().default(5_000),
    DOWNLOAD_USER_AGENT: z.string().default('SanctionWatch/0.1 (sanctions list monitor)'),

    NOTIFY_BATCH_WINDOW_MS: positiveInt(5 * 60_000),
    NOTIFY_MAX_ATTEMPTS: positiveInt(4),
    NOTIFY_INITIAL_DELAY_MS: positiveInt(2_000),
    NOTIFY_CHANNELS: z
      .string()
      .default('log')
      .transform(commaList)
      .pipe(z.array(z.enum(['email', 'webhook', 'slack', 'log'])).min(1)),
    NOTIFY_EMAIL_TO: z
      .string()
      .default('')
      .transform(commaList)
      .pipe(z.array(z.string().email())),
    EMAIL_FROM: z.string().default('SanctionWatch <alerts@sanctionwatch.local>'),
    RESEND_API_KEY: z.string().optional(),
    NOTIFY_WEBHOOK_URL: z.string().url().optional(),
    SLACK_ALERTS_WEBHOOK_URL: z.string().url().optional(),

    RUN_MAX_LIFETIME_MS: positiveInt(2 * 60 * 60_000),
    RUN_SWEEP_INTERVAL_MS: positiveInt(5 * 60_000),
    WORKER_CONCURRENCY: positiveInt(2),
    SOURCE_LOCK_TTL_MS: positiveInt(10 * 60_000),
    SCHEDULER_ENABLED: z
      .enum(['true', 'false'])
      .default('true')
      .transform(value => value === 'true'),

    OFAC_URL: z.string().url().optional(),
    OFAC_SCHEDULE: cronExpression.optional(),
    UN_URL: z.string().url().optional(),
    UN_SCHEDULE: cronExpression.optional(),
    UK_HMT_URL: z.string().url().optional(),
    UK_HMT_SCHEDULE: cronExpression.optional(),

    DATABASE_URL: z.string().optional(),
  })
  .superRefine((env, ctx) => {
    const requireFor = (enabled: boolean, key: string, present: boolean, channel: string) => {
      if (enabled && !present) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: `Required when the ${channel} channel is enabled` })
      }
    }
    const channels = new Set(env.NOTIFY_CHANNELS)
    requireFor(channels.has('email'), 'NOTIFY_EMAIL_TO', env.NOTIFY_EMAIL_TO.length > 0, 'email')
    requireFor(channels.has('email'), 'RESEND_API_KEY', Boolean(env.RESEND_API_KEY), 'email')
    requireFor(channels.has('webhook'), 'NOTIFY_WEBHOOK_URL', Boolean(env.NOTIFY_WEBHOOK_URL), 'webhook')
    requireFor(channels.has('slack'), 'SLACK_ALERTS_WEBHOOK_URL', Boolean(env.SLACK_ALERTS_WEBHOOK_URL), 'slack')

    if (env.DOWNLOAD_INITIAL_DELAY_MS > env.DOWNLOAD_MAX_DELAY_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DOWNLOAD_INITIAL_DELAY_MS'],
        message: 'Must not exceed DOWNLOAD_MAX_DELAY_MS',
      })
    }
  })

type ParsedEnv = z.infer<typeof envSchema>

function sourceOverrides(env: ParsedEnv): Record<SanctionSource, SourceOverrides> {
  return {
    OFAC: { url: env.OFAC_URL, schedule: env.OFAC_SCHEDULE },
    UN: { url: env.UN_URL, schedule: env.UN_SCHEDULE },
    UK_HMT: { url: env.UK_HMT_URL, schedule: env.UK_HMT_SCHEDULE },
  }
}

/**
 * Validate the environment and build typed settings.
 * Empty variables count as unset.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): MonitorSettings {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''))
  const result = envSchema.safeParse(present)

  if (!result.success) {
    throw new ConfigurationError(result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`))
  }

  const parsed = result.data
  const channels = [...new Set(parsed.NOTIFY_CHANNELS)].sort((a, b) => CHANNEL_IDS.indexOf(a) - CHANNEL_IDS.indexOf(b))

  return Object.freeze({
    nodeEnv: parsed.NODE_ENV,
    download: {
      maxAttempts: parsed.DOWNLOAD_MAX_ATTEMPTS,
      initialDelayMs: parsed.DOWNLOAD_INITIAL_DELAY_MS,
      maxDelayMs: parsed.DOWNLOAD_MAX_DELAY_MS,
      timeoutMs: parsed.DOWNLOAD_TIMEOUT_MS,
      maxBytes: parsed.DOWNLOAD_MAX_BYTES,
      maxConnections: parsed.DOWNLOAD_MAX_CONNECTIONS,
      minIntervalMs: parsed.DOWNLOAD_MIN_INTERVAL_MS,
      userAgent: parsed.DOWNLOAD_USER_AGENT,
    },
    notify: {
      batchWindowMs: parsed.NOTIFY_BATCH_WINDOW_MS,
      maxAttempts: parsed.NOTIFY_MAX_ATTEMPTS,
      initialDelayMs: parsed.NOTIFY_INITIAL_DELAY_MS,
      channels,
      emailTo: parsed.NOTIFY_EMAIL_TO,
      emailFrom: parsed.EMAIL_FROM,
      resendApiKey: parsed.RESEND_API_KEY,
      webhookUrl: parsed.NOTIFY_WEBHOOK_URL,
      slackWebhookUrl: parsed.SLACK_ALERTS_WEBHOOK_URL,
    },
    run: {
      maxLifetimeMs: parsed.RUN_MAX_LIFETIME_MS,
      sweepIntervalMs: parsed.RUN_SWEEP_INTERVAL_MS,
      workerConcurrency: parsed.WORKER_CONCURRENCY,
      lockTtlMs: parsed.SOURCE_LOCK_TTL_MS,
      schedulerEnabled: parsed.SCHEDULER_ENABLED,
    },
    sources: sourceOverrides(parsed),
    databaseUrl: parsed.DATABASE_URL,
  })
}
