#!/usr/bin/env node

/**
 * Monitor Worker
 *
 * Schedules every source on its cron, consumes run jobs, sweeps stale
 * runs and delivers notifications until SIGTERM or SIGINT.
 */

// Load environment variables first, before any other imports
import './env.js'

import { buildRedisOptions, warmupRedis } from '@sanctionwatch/redis'
import { loggers } from './config/logger.js'
import { createMonitorQueue } from './config/queues.js'
import { loadSettings } from './config/settings.js'
import { createRuntime } from './bootstrap.js'
import { createMonitorWorker } from './scheduler/monitor-worker.js'
import { SourceScheduler } from './scheduler/scheduler.js'

const log = loggers.worker

async function main(): Promise<void> {
  const settings = loadSettings()

  const redisReady = await warmupRedis()
  if (!redisReady) {
    log.warn('Starting without a confirmed Redis connection; expect queue errors until it recovers')
  }

  const runtime = createRuntime(settings, 'service')
  runtime.dispatcher.start()

  const connection = buildRedisOptions()
  const queue = createMonitorQueue(connection)
  const scheduler = new SourceScheduler(queue, runtime.registry, settings)
  const worker = createMonitorWorker(runtime.orchestrator, connection, settings.run.workerConcurrency)

  if (settings.run.schedulerEnabled) {
    await scheduler.start()
  } else {
    log.info('Scheduler disabled; consuming queued jobs only')
  }

  let isShuttingDown = false

  const shutdown = async (signal: string) => {
    if (isShuttingDown) {
      log.info('Shutdown already in progress')
      return
    }
    isShuttingDown = true
    const shutdownStart = Date.now()
    log.info('SHUTDOWN_STARTED', { event_name: 'SHUTDOWN_STARTED', signal })

    try {
      // No-op when this process never started the scheduler
      await scheduler.stop()

      // In-flight runs fail at their next stage boundary
      const aborted = runtime.orchestrator.abortAll('aborted: worker shutting down')
      log.info('Aborting in-flight runs', { runIds: aborted })

      await worker.close()
      await queue.close()
      await runtime.close()

      log.info('SHUTDOWN_COMPLETED', { event_name: 'SHUTDOWN_COMPLETED', durationMs: Date.now() - shutdownStart })
      process.exit(0)
    } catch (error) {
      log.error('SHUTDOWN_FAILED', { event_name: 'SHUTDOWN_FAILED' }, error)
      process.exit(1)
    }
  }

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM')
  })
  process.on('SIGINT', () => {
    void shutdown('SIGINT')
  })

  log.info('Worker running', { sources: runtime.registry.ids() })
}

main().catch(error => {
  log.fatal('Worker failed to start', {}, error)
  process.exit(1)
})
