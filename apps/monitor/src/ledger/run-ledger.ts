/**
 * Run Ledger
 *
 * One ScraperRun per scrape attempt. beginRun() claims the source (in
 * this process, then in storage through the one-Running-run-per-source
 * constraint) and completeRun() moves the run to its terminal status
 * exactly once. A successful run's entities, events and snapshot are
 * written in the same commit as its terminal record.
 */

import {
  emptyRunMetrics,
  RunningRunExistsError,
  TerminalRunError,
  type CanonicalEntity,
  type ChangeEvent,
  type ContentSnapshot,
  type RunMetrics,
  type RunQuery,
  type SanctionSource,
  type SanctionsRepository,
  type ScraperRun,
  type TerminalRunStatus,
} from '@sanctionwatch/db'
import type { ILogger } from '@sanctionwatch/logger'
import { loggers } from '../config/logger.js'
import { ConflictError, InvalidStateError, RunAbortedError, describeError } from '../domain/errors.js'
import { systemClock, type Clock } from '../utils/time.js'

export function buildRunId(source: SanctionSource, startedAt: Date): string {
  return `${source}_${startedAt.getTime()}`
}

export interface RunResults {
  entities: CanonicalEntity[]
  events: ChangeEvent[]
  snapshot: ContentSnapshot
}

export interface CompleteRunOptions {
  errorMessage?: string | null
  /** Written atomically with the terminal record */
  results?: RunResults
}

export interface StaleRunSweep {
  /** Runs this sweep moved to Failed */
  failed: string[]
  /** Stale runs still owned by this process; the caller must abort them */
  ownedByProcess: string[]
}

export class RunLedger {
  private readonly claimedSources = new Set<SanctionSource>()
  private readonly activeRuns = new Map<string, ScraperRun>()
  private readonly clock: Clock
  private readonly log: ILogger

  constructor(
    private readonly repository: SanctionsRepository,
    options: { clock?: Clock; logger?: ILogger } = {}
  ) {
    this.clock = options.clock ?? systemClock
    this.log = options.logger ?? loggers.ledger
  }

  /**
   * Start a run for a source.
   * @throws ConflictError when the source already has a Running run
   */
  async beginRun(source: SanctionSource): Promise<string> {
    // Checked and claimed before the first await so same-tick callers conflict
    if (this.claimedSources.has(source)) {
      throw new ConflictError(source)
    }
    this.claimedSources.add(source)

    const startedAt = this.clock()
    const run: ScraperRun = {
      runId: buildRunId(source, startedAt),
      source,
      startedAt,
      completedAt: null,
      status: 'Running',
      errorMessage: null,
      ...emptyRunMetrics(),
    }

    try {
      await this.repository.upsertRun(run)
    } catch (error) {
      this.claimedSources.delete(source)
      if (error instanceof RunningRunExistsError) {
        throw new ConflictError(source)
      }
      throw error
    }

    this.activeRuns.set(run.runId, run)
    this.log.info('RUN_STARTED', { event_name: 'RUN_STARTED', source, runId: run.runId })
    return run.runId
  }

  isActive(runId: string): boolean {
    return this.activeRuns.has(runId)
  }

  /**
   * Move a run to its terminal status.
   * @throws InvalidStateError when the run is unknown or already terminal
   */
  async completeRun(
    runId: string,
    status: TerminalRunStatus,
    metrics: RunMetrics,
    options: CompleteRunOptions = {}
  ): Promise<ScraperRun> {
    const run = this.activeRuns.get(runId)
    if (!run) {
      throw await this.notActiveError(runId)
    }
    // Removed before the write so a concurrent second call fails
    this.activeRuns.delete(runId)

    const completed: ScraperRun = {
      ...run,
      ...metrics,
      status,
      completedAt: this.clock(),
      errorMessage: options.errorMessage ?? null,
    }

    try {
      if (options.results) {
        await this.repository.commitRun({ run: completed, ...options.results })
      } else {
        await this.repository.upsertRun(completed)
      }
    } catch (error) {
      if (error instanceof TerminalRunError) {
        this.claimedSources.delete(run.source)
        throw new InvalidStateError(`Run ${runId} is already in a terminal state`)
      }
      // Still Running in storage: keep it completable so the caller can fail it
      this.activeRuns.set(runId, run)
      throw error
    }

    this.claimedSources.delete(run.source)

    const durationMs = completed.completedAt ? completed.completedAt.getTime() - run.startedAt.getTime() : null
    const meta = {
      event_name: 'RUN_COMPLETED',
      source: run.source,
      runId,
      status,
      durationMs,
      entitiesProcessed: completed.entitiesProcessed,
      entitiesAdded: completed.entitiesAdded,
      entitiesModified: completed.entitiesModified,
      entitiesRemoved: completed.entitiesRemoved,
      recordsSkipped: completed.recordsSkipped,
      riskCounts: completed.riskCounts,
      timings: completed.timings,
      retryCount: completed.retryCount,
      errorMessage: completed.errorMessage,
    }
    if (status === 'Failed') {
      this.log.error('RUN_COMPLETED', meta)
    } else {
      this.log.info('RUN_COMPLETED', meta)
    }

    return completed
  }

  /**
   * Drop this process's claim on a run whose terminal write failed. The
   * stored record stays Running until the liveness sweep fails it.
   */
  abandonRun(runId: string): void {
    const run = this.activeRuns.get(runId)
    if (!run) return
    this.activeRuns.delete(runId)
    this.claimedSources.delete(run.source)
    this.log.error('RUN_ABANDONED', { event_name: 'RUN_ABANDONED', source: run.source, runId })
  }

  async recordSnapshot(
    source: SanctionSource,
    contentHash: string,
    runId: string,
    details: { sizeBytes: number; capturedAt?: Date; archivePath?: string | null }
  ): Promise<ContentSnapshot> {
    const snapshot: ContentSnapshot = {
      source,
      contentHash,
      runId,
      sizeBytes: details.sizeBytes,
      capturedAt: details.capturedAt ?? this.clock(),
      archivePath: details.archivePath ?? null,
    }
    await this.repository.saveSnapshot(snapshot)
    return snapshot
  }

  async getRun(runId: string): Promise<ScraperRun | null> {
    return this.repository.getRun(runId)
  }

  async listRuns(query: RunQuery): Promise<ScraperRun[]> {
    return this.repository.listRuns(query)
  }

  /**
   * Fail every Running run older than maxLifetimeMs that no live run in
   * this process owns. Stale runs this process does own are returned so
   * the orchestrator can abort them through the normal failure path.
   */
  async sweepStaleRuns(maxLifetimeMs: number): Promise<StaleRunSweep> {
    const now = this.clock()
    const cutoff = now.getTime() - maxLifetimeMs
    const running = await this.repository.listRuns({ status: 'Running' })
    const stale = running.filter(run => run.startedAt.getTime() < cutoff)

    const sweep: StaleRunSweep = { failed: [], ownedByProcess: [] }

    for (const run of stale) {
      if (this.activeRuns.has(run.runId)) {
        sweep.ownedByProcess.push(run.runId)
        continue
      }

      const reason = new RunAbortedError(run.runId, `exceeded maximum lifetime of ${maxLifetimeMs}ms`)
      try {
        await this.repository.upsertRun({
          ...run,
          status: 'Failed',
          completedAt: now,
          errorMessage: describeError(reason),
        })
      } catch (error) {
        // Finished by its owner between the listing and this write
        if (error instanceof TerminalRunError) continue
        throw error
      }

      sweep.failed.push(run.runId)
      this.log.warn('RUN_FORCE_FAILED', {
        event_name: 'RUN_FORCE_FAILED',
        source: run.source,
        runId: run.runId,
        startedAt: run.startedAt.toISOString(),
        maxLifetimeMs,
      })
    }

    return sweep
  }

  private async notActiveError(runId: string): Promise<InvalidStateError> {
    const stored = await this.repository.getRun(runId)
    if (!stored) {
      return new InvalidStateError(`Run ${runId} does not exist`)
    }
    if (stored.status !== 'Running') {
      return new InvalidStateError(`Run ${runId} is already ${stored.status}`)
    }
    return new InvalidStateError(`Run ${runId} is not owned by this process`)
  }
}
