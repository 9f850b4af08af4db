/**
 * Source Scheduler
 *
 * One BullMQ repeatable job per registered source, on the source's cron
 * pattern in UTC, plus a repeatable liveness sweep. stop() removes the
 * repeatable jobs, so exactly one process runs the scheduler
 * (SCHEDULER_ENABLED); any number of workers may consume the queue.
 */

import type { Queue } from 'bullmq'
import type { SanctionSource } from '@sanctionwatch/db'
import type { ILogger } from '@sanctionwatch/logger'
import { loggers } from '../config/logger.js'
import { JOB_NAMES, type MonitorJobData, type RunSourceJobData } from '../config/queues.js'
import type { MonitorSettings } from '../config/settings.js'
import type { SourceRegistry } from '../sources/registry.js'
import { systemClock, type Clock } from '../utils/time.js'
import { nextRunAt } from './cron.js'

export type SchedulerQueue = Pick<Queue<MonitorJobData>, 'add' | 'getRepeatableJobs' | 'removeRepeatableByKey'>

export interface SourceSchedule {
  source: SanctionSource
  pattern: string
  nextRunAt: Date
}

const SCHEDULED_JOB_NAMES: ReadonlySet<string> = new Set([JOB_NAMES.RUN_SOURCE, JOB_NAMES.SWEEP_STALE_RUNS])

export class SourceScheduler {
  private running = false
  private readonly clock: Clock
  private readonly log: ILogger

  constructor(
    private readonly queue: SchedulerQueue,
    private readonly registry: SourceRegistry,
    private readonly settings: Pick<MonitorSettings, 'run' | 'sources'>,
    options: { clock?: Clock; logger?: ILogger } = {}
  ) {
    this.clock = options.clock ?? systemClock
    this.log = options.logger ?? loggers.scheduler
  }

  schedules(): SourceSchedule[] {
    const now = this.clock()
    return this.registry.list().map(adapter => {
      const pattern = this.settings.sources[adapter.id].schedule ?? adapter.metadata.defaultSchedule
      return { source: adapter.id, pattern, nextRunAt: nextRunAt(pattern, now) }
    })
  }

  /**
   * Replace whatever repeatable jobs a previous scheduler left behind
   * with the current schedule.
   */
  async start(): Promise<void> {
    if (this.running) {
      this.log.warn('SCHEDULER_ALREADY_RUNNING', { event_name: 'SCHEDULER_ALREADY_RUNNING' })
      return
    }

    try {
      const removed = await this.removeRepeatableJobs()
      const schedules = this.schedules()

      for (const schedule of schedules) {
        await this.queue.add(
          JOB_NAMES.RUN_SOURCE,
          { kind: 'run-source', source: schedule.source, forceRefresh: false, trigger: 'SCHEDULED' },
          {
            repeat: { pattern: schedule.pattern, tz: 'UTC' },
            jobId: `scheduled-${schedule.source}`,
          }
        )
      }

      await this.queue.add(
        JOB_NAMES.SWEEP_STALE_RUNS,
        { kind: 'sweep-stale-runs' },
        { repeat: { every: this.settings.run.sweepIntervalMs }, jobId: 'scheduled-sweep' }
      )

      this.running = true
      this.log.info('SCHEDULER_STARTED', {
        event_name: 'SCHEDULER_STARTED',
        removedRepeatableJobs: removed,
        sweepIntervalMs: this.settings.run.sweepIntervalMs,
        schedules: schedules.map(schedule => ({
          source: schedule.source,
          pattern: schedule.pattern,
          nextRunAt: schedule.nextRunAt.toISOString(),
        })),
      })
    } catch (error) {
      this.log.error('SCHEDULER_SETUP_FAILED', { event_name: 'SCHEDULER_SETUP_FAILED' }, error)
      throw error
    }
  }

  async stop(): Promise<void> {
    if (!this.running) return
    try {
      const removed = await this.removeRepeatableJobs()
      this.log.info('SCHEDULER_STOPPED', { event_name: 'SCHEDULER_STOPPED', removedRepeatableJobs: removed })
    } finally {
      this.running = false
    }
  }

  isRunning(): boolean {
    return this.running
  }

  /**
   * Queue a one-off run for a worker to pick up.
   * @returns the BullMQ job id
   */
  async trigger(source: string, forceRefresh = false): Promise<string | undefined> {
    const adapter = this.registry.get(source)
    const data: RunSourceJobData = { kind: 'run-source', source: adapter.id, forceRefresh, trigger: 'MANUAL' }
    const job = await this.queue.add(JOB_NAMES.RUN_SOURCE, data)
    this.log.info('RUN_ENQUEUED', { event_name: 'RUN_ENQUEUED', source: adapter.id, forceRefresh, jobId: job.id })
    return job.id
  }

  private async removeRepeatableJobs(): Promise<number> {
    const repeatable = await this.queue.getRepeatableJobs()
    let removed = 0
    for (const job of repeatable) {
      if (SCHEDULED_JOB_NAMES.has(job.name)) {
        await this.queue.removeRepeatableByKey(job.key)
        removed += 1
      }
    }
    return removed
  }
}
