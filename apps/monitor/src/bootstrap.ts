/**
 * Runtime wiring
 *
 * `service` talks to PostgreSQL and Redis. `dry-run` keeps everything in
 * process: an in-memory repository, in-process locks and rate limiting,
 * and notifications written to the log only.
 */

import {
  createPool,
  InMemorySanctionsRepository,
  PgSanctionsRepository,
  type SanctionsRepository,
} from '@sanctionwatch/db'
import { disconnectRedis, getRedisClient } from '@sanctionwatch/redis'
import { loggers } from './config/logger.js'
import type { MonitorSettings } from './config/settings.js'
import { ContentDeduplicator } from './dedupe/content-deduplicator.js'
import { DownloadManager } from './download/download-manager.js'
import { InMemoryRateLimiter, RedisRateLimiter, type SourceRateLimiter } from './download/rate-limiter.js'
import { ConfigurationError } from './domain/errors.js'
import { RunLedger } from './ledger/run-ledger.js'
import { buildChannels } from './notify/channels.js'
import { NotificationDispatcher } from './notify/dispatcher.js'
import { LoggingStageObserver } from './observability/stage-events.js'
import { RunOrchestrator } from './orchestrator/orchestrator.js'
import { InMemorySourceLockProvider, RedisSourceLockProvider, type SourceLockProvider } from './orchestrator/source-lock.js'
import { createDefaultRegistry } from './sources/adapters/index.js'
import type { SourceRegistry } from './sources/registry.js'

const log = loggers.config

export type RuntimeMode = 'service' | 'dry-run'

export interface Runtime {
  mode: RuntimeMode
  settings: MonitorSettings
  registry: SourceRegistry
  repository: SanctionsRepository
  dispatcher: NotificationDispatcher
  orchestrator: RunOrchestrator
  /** Flush notifications and release connections */
  close(): Promise<void>
}

export function createRuntime(settings: MonitorSettings, mode: RuntimeMode): Runtime {
  const registry = createDefaultRegistry()

  let repository: SanctionsRepository
  let rateLimiter: SourceRateLimiter
  let locks: SourceLockProvider
  let usesRedis = false

  if (mode === 'service') {
    if (!settings.databaseUrl) {
      throw new ConfigurationError(['DATABASE_URL: Required'])
    }
    const redis = getRedisClient()
    repository = new PgSanctionsRepository(createPool(settings.databaseUrl))
    rateLimiter = new RedisRateLimiter(redis, { minIntervalMs: settings.download.minIntervalMs })
    locks = new RedisSourceLockProvider(redis)
    usesRedis = true
  } else {
    repository = new InMemorySanctionsRepository()
    rateLimiter = new InMemoryRateLimiter({ minIntervalMs: settings.download.minIntervalMs })
    locks = new InMemorySourceLockProvider()
  }

  const notifySettings = mode === 'service' ? settings.notify : { ...settings.notify, channels: ['log' as const] }
  const dispatcher = new NotificationDispatcher({
    channels: buildChannels(notifySettings),
    repository,
    settings: settings.notify,
  })

  const ledger = new RunLedger(repository)
  const orchestrator = new RunOrchestrator({
    registry,
    downloads: new DownloadManager({ settings: settings.download, rateLimiter }),
    deduplicator: new ContentDeduplicator(repository),
    repository,
    ledger,
    dispatcher,
    locks,
    settings,
    observer: new LoggingStageObserver(),
  })

  log.info('Runtime ready', {
    mode,
    sources: registry.ids(),
    channels: notifySettings.channels,
  })

  return {
    mode,
    settings,
    registry,
    repository,
    dispatcher,
    orchestrator,
    close: async () => {
      try {
        await dispatcher.stop()
      } finally {
        await repository.close()
        if (usesRedis) {
          await disconnectRedis()
        }
      }
    },
  }
}
