import type { CanonicalEntity, ChangeEvent, ContentSnapshot, SanctionSource, ScraperRun } from './types.js'

/**
 * Everything one successful run writes, committed together.
 * Readers never observe the new entities without the matching
 * events, snapshot and run record.
 */
export interface RunCommit {
  run: ScraperRun
  entities: CanonicalEntity[]
  events: ChangeEvent[]
  snapshot: ContentSnapshot
}

export interface RunQuery {
  source?: SanctionSource
  status?: ScraperRun['status']
  startedAfter?: Date
  limit?: number
}

export interface SanctionsRepository {
  getLatestEntities(source: SanctionSource): Promise<CanonicalEntity[]>
  /** Atomically swap the stored entity set of a source */
  replaceEntities(source: SanctionSource, entities: CanonicalEntity[], runId: string): Promise<void>

  getLatestSnapshot(source: SanctionSource): Promise<ContentSnapshot | null>
  saveSnapshot(snapshot: ContentSnapshot): Promise<void>

  appendChangeEvents(events: ChangeEvent[]): Promise<void>
  markEventsNotified(eventIds: string[], sentAt: Date, channels: string[]): Promise<void>
  listChangeEvents(runId: string): Promise<ChangeEvent[]>

  upsertRun(run: ScraperRun): Promise<void>
  getRun(runId: string): Promise<ScraperRun | null>
  /** Newest first */
  listRuns(query: RunQuery): Promise<ScraperRun[]>

  commitRun(commit: RunCommit): Promise<void>

  close(): Promise<void>
}
