/**
 * Run Orchestrator
 *
 * Drives one source through
 *   Downloading → Deduplicating → Parsing → Diffing → Classifying → Persisting → Notifying
 * and ends in Completed, Failed or Skipped. Each run holds the source's
 * lock from before beginRun until its terminal record is written;
 * notification happens after the lock is released.
 *
 * A failure at any stage fails the run with the metrics reached so far.
 * Nothing computed by a failed run is persisted and nothing is notified.
 */

import type {
  ChangeEvent,
  RunMetrics,
  RunStatus,
  SanctionSource,
  SanctionsRepository,
  ScraperRun,
} from '@sanctionwatch/db'
import { emptyRunMetrics } from '@sanctionwatch/db'
import type { ILogger } from '@sanctionwatch/logger'
import { loggers } from '../config/logger.js'
import type { MonitorSettings } from '../config/settings.js'
import { ConflictError, RunAbortedError, describeError, type ParseError } from '../domain/errors.js'
import { classifyChanges, detectChanges, retainSkippedEntities } from '../changes/change-detector.js'
import { countByRisk } from '../changes/risk-classifier.js'
import type { ContentDeduplicator } from '../dedupe/content-deduplicator.js'
import type { DownloadManager } from '../download/download-manager.js'
import type { RunLedger, StaleRunSweep } from '../ledger/run-ledger.js'
import type { NotificationDispatcher } from '../notify/dispatcher.js'
import { LoggingStageObserver, type RunStage, type StageObserver, type StageOutcome } from '../observability/stage-events.js'
import { scheduleIntervalMs } from '../scheduler/cron.js'
import type { SourceRegistry } from '../sources/registry.js'
import type { SourceAdapter } from '../sources/types.js'
import { mapWithConcurrency } from '../utils/semaphore.js'
import { systemClock, type Clock } from '../utils/time.js'
import type { SourceLockProvider } from './source-lock.js'

const MAX_LOGGED_SKIPPED_RECORDS = 20

export interface OrchestratorDependencies {
  registry: SourceRegistry
  downloads: Pick<DownloadManager, 'fetch'>
  deduplicator: Pick<ContentDeduplicator, 'check'>
  repository: Pick<SanctionsRepository, 'getLatestEntities'>
  ledger: RunLedger
  dispatcher: Pick<NotificationDispatcher, 'dispatch'>
  locks: SourceLockProvider
  settings: Pick<MonitorSettings, 'run' | 'sources'>
  observer?: StageObserver
  clock?: Clock
  logger?: ILogger
}

export interface RunOptions {
  /** Process the payload even when it matches the latest snapshot */
  forceRefresh?: boolean
}

export type SourceRunOutcome =
  | { source: SanctionSource; ok: true; runId: string; status: RunStatus }
  | { source: SanctionSource; ok: false; error: string }

export interface SourceStatus {
  source: SanctionSource
  windowHours: number
  totalRuns: number
  runsByStatus: Record<RunStatus, number>
  lastRun: ScraperRun | null
  lastSuccessfulRun: ScraperRun | null
  changes: { added: number; modified: number; removed: number }
  riskCounts: RunMetrics['riskCounts']
  /** Last run is recent (within 2x the schedule interval) and did not fail */
  healthy: boolean
}

interface RunContext {
  source: SanctionSource
  runId: string
  signal: AbortSignal
}

interface Execution {
  run: ScraperRun
  /** Sends the committed changes; absent for Skipped and Failed runs */
  notify?: () => Promise<void>
}

interface StageResult<T> {
  value: T
  durationMs: number
}

export class RunOrchestrator {
  private readonly registry: SourceRegistry
  private readonly downloads: Pick<DownloadManager, 'fetch'>
  private readonly deduplicator: Pick<ContentDeduplicator, 'check'>
  private readonly repository: Pick<SanctionsRepository, 'getLatestEntities'>
  private readonly ledger: RunLedger
  private readonly dispatcher: Pick<NotificationDispatcher, 'dispatch'>
  private readonly locks: SourceLockProvider
  private readonly settings: Pick<MonitorSettings, 'run' | 'sources'>
  private readonly observer: StageObserver
  private readonly clock: Clock
  private readonly log: ILogger
  private readonly controllers = new Map<string, AbortController>()

  constructor(deps: OrchestratorDependencies) {
    this.registry = deps.registry
    this.downloads = deps.downloads
    this.deduplicator = deps.deduplicator
    this.repository = deps.repository
    this.ledger = deps.ledger
    this.dispatcher = deps.dispatcher
    this.locks = deps.locks
    this.settings = deps.settings
    this.observer = deps.observer ?? new LoggingStageObserver()
    this.clock = deps.clock ?? systemClock
    this.log = deps.logger ?? loggers.orchestrator
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Triggers
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Run one source to completion and return its runId. A run that fails
   * still returns; its status and errorMessage are in the ledger.
   * @throws UnknownSourceError for a source with no adapter
   * @throws ConflictError when the source already has a run in flight
   */
  async runSource(source: string, forceRefresh = false): Promise<string> {
    const run = await this.run(source, { forceRefresh })
    return run.runId
  }

  /**
   * Same as runSource, returning the terminal run record.
   */
  async run(source: string, options: RunOptions = {}): Promise<ScraperRun> {
    const adapter = this.registry.get(source)
    const lock = await this.locks.acquire(adapter.id, this.settings.run.lockTtlMs)
    if (!lock) {
      this.log.warn('RUN_REJECTED', { event_name: 'RUN_REJECTED', source: adapter.id, reason: 'already running' })
      throw new ConflictError(adapter.id)
    }

    let execution: Execution
    try {
      const runId = await this.ledger.beginRun(adapter.id)
      const controller = new AbortController()
      this.controllers.set(runId, controller)
      const lifetimeTimer = setTimeout(() => {
        controller.abort(
          new RunAbortedError(runId, `exceeded maximum lifetime of ${this.settings.run.maxLifetimeMs}ms`)
        )
      }, this.settings.run.maxLifetimeMs)
      lifetimeTimer.unref()

      try {
        execution = await this.execute(adapter, { source: adapter.id, runId, signal: controller.signal }, options)
      } finally {
        clearTimeout(lifetimeTimer)
        this.controllers.delete(runId)
      }
    } finally {
      await lock.release()
    }

    // Terminal from here on; the next run of the source may already start
    if (execution.notify) await execution.notify()
    return execution.run
  }

  /**
   * Trigger every registered source, at most WORKER_CONCURRENCY at a time.
   */
  async runAllSources(forceRefresh = false): Promise<SourceRunOutcome[]> {
    return mapWithConcurrency(this.registry.ids(), this.settings.run.workerConcurrency, async source => {
      try {
        const run = await this.run(source, { forceRefresh })
        const outcome: SourceRunOutcome = { source, ok: true, runId: run.runId, status: run.status }
        return outcome
      } catch (error) {
        this.log.warn('Source trigger rejected', { source }, error)
        const outcome: SourceRunOutcome = { source, ok: false, error: describeError(error) }
        return outcome
      }
    })
  }

  /**
   * Abort an in-flight run. It fails at its next stage boundary, or
   * sooner if the current stage watches the signal.
   */
  abort(runId: string, reason = 'aborted'): boolean {
    const controller = this.controllers.get(runId)
    if (!controller) return false
    controller.abort(new RunAbortedError(runId, reason))
    return true
  }

  abortAll(reason = 'aborted'): string[] {
    const runIds = Array.from(this.controllers.keys())
    for (const runId of runIds) {
      this.abort(runId, reason)
    }
    return runIds
  }

  inFlight(): string[] {
    return Array.from(this.controllers.keys())
  }

  /**
   * Fail orphaned Running runs. Stale runs this process still owns are
   * aborted so they fail through the normal path.
   */
  async sweepStaleRuns(): Promise<StaleRunSweep> {
    const sweep = await this.ledger.sweepStaleRuns(this.settings.run.maxLifetimeMs)
    for (const runId of sweep.ownedByProcess) {
      this.abort(runId, `exceeded maximum lifetime of ${this.settings.run.maxLifetimeMs}ms`)
    }
    return sweep
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Queries
  // ═══════════════════════════════════════════════════════════════════════════

  async getRunStatus(runId: string): Promise<ScraperRun | null> {
    return this.ledger.getRun(runId)
  }

  async getSourceStatus(source: string, windowHours = 24): Promise<SourceStatus> {
    const adapter = this.registry.get(source)
    const now = this.clock()
    const startedAfter = new Date(now.getTime() - windowHours * 3_600_000)

    const [windowRuns, latest, lastSuccess, lastPartial] = await Promise.all([
      this.ledger.listRuns({ source: adapter.id, startedAfter }),
      this.ledger.listRuns({ source: adapter.id, limit: 1 }),
      this.ledger.listRuns({ source: adapter.id, status: 'Success', limit: 1 }),
      this.ledger.listRuns({ source: adapter.id, status: 'Partial', limit: 1 }),
    ])

    const runsByStatus: Record<RunStatus, number> = { Running: 0, Success: 0, Failed: 0, Skipped: 0, Partial: 0 }
    const changes = { added: 0, modified: 0, removed: 0 }
    const riskCounts = { critical: 0, high: 0, medium: 0, low: 0 }
    for (const run of windowRuns) {
      runsByStatus[run.status] += 1
      changes.added += run.entitiesAdded
      changes.modified += run.entitiesModified
      changes.removed += run.entitiesRemoved
      riskCounts.critical += run.riskCounts.critical
      riskCounts.high += run.riskCounts.high
      riskCounts.medium += run.riskCounts.medium
      riskCounts.low += run.riskCounts.low
    }

    const lastRun = latest[0] ?? null
    const lastSuccessfulRun = newest(lastSuccess[0] ?? null, lastPartial[0] ?? null)

    return {
      source: adapter.id,
      windowHours,
      totalRuns: windowRuns.length,
      runsByStatus,
      lastRun,
      lastSuccessfulRun,
      changes,
      riskCounts,
      healthy: this.isHealthy(adapter, lastRun, now),
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Pipeline
  // ═══════════════════════════════════════════════════════════════════════════

  private async execute(adapter: SourceAdapter, ctx: RunContext, options: RunOptions): Promise<Execution> {
    const metrics = emptyRunMetrics()
    const log = this.log.child({ source: ctx.source, runId: ctx.runId })
    const overrides = this.settings.sources[ctx.source]
    this.emit(ctx, 'Idle', 'succeeded', null)

    let events: ChangeEvent[] = []
    let completed: ScraperRun

    try {
      const download = await this.stage(ctx, 'Downloading', () =>
        this.downloads.fetch({
          source: ctx.source,
          config: adapter.fetchConfig(overrides.url),
          signal: ctx.signal,
          onRetry: () => {
            metrics.retryCount += 1
          },
        })
      )
      const body = download.value.body
      metrics.retryCount = download.value.retryCount
      metrics.timings.downloadMs = download.durationMs

      const dedupe = await this.stage(ctx, 'Deduplicating', () => this.deduplicator.check(ctx.source, body))
      metrics.contentHash = dedupe.value.contentHash

      if (dedupe.value.skip && !options.forceRefresh) {
        this.emit(ctx, 'Skipped', 'skipped', null, 'content unchanged since last snapshot')
        completed = await this.ledger.completeRun(ctx.runId, 'Skipped', metrics)
        this.emit(ctx, 'Idle', 'entered', null)
        return { run: completed }
      }

      const observedAt = this.clock()
      const parsed = await this.stage(ctx, 'Parsing', () => adapter.parse(body, observedAt))
      const { entities, skipped } = parsed.value
      metrics.timings.parseMs = parsed.durationMs
      metrics.entitiesProcessed = entities.length
      metrics.recordsSkipped = skipped.length
      if (skipped.length > 0) {
        log.warn('PARSE_RECORDS_SKIPPED', {
          event_name: 'PARSE_RECORDS_SKIPPED',
          count: skipped.length,
          samples: skipped.slice(0, MAX_LOGGED_SKIPPED_RECORDS).map(error => error.message),
        })
      }

      const diff = await this.stage(ctx, 'Diffing', async () => {
        const previous = await this.repository.getLatestEntities(ctx.source)
        const current = retainSkippedEntities(previous, entities, skippedRecordIds(skipped))
        const changes = detectChanges(previous, current, {
          source: ctx.source,
          runId: ctx.runId,
          detectedAt: observedAt,
        })
        return { current, changes }
      })
      metrics.timings.diffMs = diff.durationMs
      const { current, changes } = diff.value
      if (current.length > entities.length) {
        log.info('Skipped records kept at their stored state', { retained: current.length - entities.length })
      }
      for (const change of changes) {
        if (change.changeType === 'Added') metrics.entitiesAdded += 1
        else if (change.changeType === 'Modified') metrics.entitiesModified += 1
        else metrics.entitiesRemoved += 1
      }

      const classified = await this.stage(ctx, 'Classifying', () => classifyChanges(changes))
      events = classified.value
      metrics.riskCounts = countByRisk(events)

      const status = metrics.recordsSkipped > 0 ? 'Partial' : 'Success'
      const persistStart = Date.now()
      const persisted = await this.stage(ctx, 'Persisting', () => {
        // The commit shares a transaction with the run record, so storeMs
        // covers the stage up to the commit; the stage event has the total.
        metrics.timings.storeMs = Date.now() - persistStart
        return this.ledger.completeRun(ctx.runId, status, metrics, {
          results: {
            entities: current,
            events,
            snapshot: {
              source: ctx.source,
              contentHash: dedupe.value.contentHash,
              sizeBytes: body.length,
              capturedAt: observedAt,
              runId: ctx.runId,
              archivePath: null,
            },
          },
        })
      })
      completed = persisted.value
    } catch (error) {
      return { run: await this.failRun(ctx, metrics, error, log) }
    }

    return {
      run: completed,
      notify: async () => {
        // Delivery problems never change the run
        await this.notify(ctx, events, log)
        this.emit(ctx, 'Completed', 'succeeded', null)
        this.emit(ctx, 'Idle', 'entered', null)
      },
    }
  }

  private async notify(ctx: RunContext, events: ChangeEvent[], log: ILogger): Promise<void> {
    const startedAt = Date.now()
    this.emit(ctx, 'Notifying', 'entered', null)
    if (events.length === 0) {
      this.emit(ctx, 'Notifying', 'skipped', 0, 'no changes')
      return
    }
    try {
      await this.dispatcher.dispatch(events)
      this.emit(ctx, 'Notifying', 'succeeded', Date.now() - startedAt)
    } catch (error) {
      log.error('Notification dispatch failed', { events: events.length }, error)
      this.emit(ctx, 'Notifying', 'failed', Date.now() - startedAt, describeError(error))
    }
  }

  private async failRun(ctx: RunContext, metrics: RunMetrics, error: unknown, log: ILogger): Promise<ScraperRun> {
    const errorMessage = describeError(error)
    this.emit(ctx, 'Failed', 'failed', null, errorMessage)

    try {
      const failed = await this.ledger.completeRun(ctx.runId, 'Failed', metrics, { errorMessage })
      this.emit(ctx, 'Idle', 'entered', null)
      return failed
    } catch (writeError) {
      log.error('Could not record run failure', { cause: errorMessage }, writeError)
      this.ledger.abandonRun(ctx.runId)
      throw writeError
    }
  }

  private async stage<T>(ctx: RunContext, stage: RunStage, work: () => Promise<T> | T): Promise<StageResult<T>> {
    ctx.signal.throwIfAborted()
    const startedAt = Date.now()
    this.emit(ctx, stage, 'entered', null)
    try {
      const value = await work()
      const durationMs = Date.now() - startedAt
      this.emit(ctx, stage, 'succeeded', durationMs)
      return { value, durationMs }
    } catch (error) {
      this.emit(ctx, stage, 'failed', Date.now() - startedAt, describeError(error))
      throw error
    }
  }

  private emit(
    ctx: RunContext,
    stage: RunStage,
    outcome: StageOutcome,
    durationMs: number | null,
    detail?: string
  ): void {
    this.observer.onStage({
      source: ctx.source,
      runId: ctx.runId,
      stage,
      timestampMs: this.clock().getTime(),
      outcome,
      durationMs,
      ...(detail === undefined ? {} : { detail }),
    })
  }

  private isHealthy(adapter: SourceAdapter, lastRun: ScraperRun | null, now: Date): boolean {
    if (!lastRun || lastRun.status === 'Failed') return false
    const schedule = this.settings.sources[adapter.id].schedule ?? adapter.metadata.defaultSchedule
    const intervalMs = scheduleIntervalMs(schedule, now)
    return now.getTime() - lastRun.startedAt.getTime() <= 2 * intervalMs
  }
}

function skippedRecordIds(skipped: ParseError[]): string[] {
  return skipped.flatMap(error => (error.recordId ? [error.recordId] : []))
}

function newest(a: ScraperRun | null, b: ScraperRun | null): ScraperRun | null {
  if (!a) return b
  if (!b) return a
  return a.startedAt.getTime() >= b.startedAt.getTime() ? a : b
}
