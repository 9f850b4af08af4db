/**
 * In-process repository with the same write rules as the PostgreSQL one.
 * Backs tests and the CLI's --dry-run mode.
 */

import { RunningRunExistsError, TerminalRunError } from './errors.js'
import type { RunCommit, RunQuery, SanctionsRepository } from './repository.js'
import type { CanonicalEntity, ChangeEvent, ContentSnapshot, SanctionSource, ScraperRun } from './types.js'

export class InMemorySanctionsRepository implements SanctionsRepository {
  private readonly entities = new Map<SanctionSource, CanonicalEntity[]>()
  private readonly snapshots: ContentSnapshot[] = []
  private readonly events = new Map<string, ChangeEvent>()
  private readonly runs = new Map<string, ScraperRun>()

  async getLatestEntities(source: SanctionSource): Promise<CanonicalEntity[]> {
    return structuredClone(this.entities.get(source) ?? [])
  }

  async replaceEntities(source: SanctionSource, entities: CanonicalEntity[], _runId: string): Promise<void> {
    this.entities.set(source, structuredClone(entities))
  }

  async getLatestSnapshot(source: SanctionSource): Promise<ContentSnapshot | null> {
    let latest: ContentSnapshot | null = null
    for (const snapshot of this.snapshots) {
      if (snapshot.source === source && (!latest || snapshot.capturedAt >= latest.capturedAt)) {
        latest = snapshot
      }
    }
    return latest ? structuredClone(latest) : null
  }

  async saveSnapshot(snapshot: ContentSnapshot): Promise<void> {
    if (this.snapshots.some(existing => existing.runId === snapshot.runId)) return
    this.snapshots.push(structuredClone(snapshot))
  }

  async appendChangeEvents(events: ChangeEvent[]): Promise<void> {
    for (const event of events) {
      if (this.events.has(event.eventId)) {
        throw new Error(`Duplicate change event ${event.eventId}`)
      }
    }
    for (const event of events) {
      this.events.set(event.eventId, structuredClone(event))
    }
  }

  async markEventsNotified(eventIds: string[], sentAt: Date, channels: string[]): Promise<void> {
    for (const id of eventIds) {
      const event = this.events.get(id)
      if (event && event.notificationSentAt === null) {
        event.notificationSentAt = new Date(sentAt)
        event.notificationChannels = [...channels]
      }
    }
  }

  async listChangeEvents(runId: string): Promise<ChangeEvent[]> {
    return [...this.events.values()].filter(event => event.runId === runId).map(event => structuredClone(event))
  }

  async upsertRun(run: ScraperRun): Promise<void> {
    this.checkRunWrite(run)
    this.runs.set(run.runId, structuredClone(run))
  }

  async getRun(runId: string): Promise<ScraperRun | null> {
    const run = this.runs.get(runId)
    return run ? structuredClone(run) : null
  }

  async listRuns(query: RunQuery): Promise<ScraperRun[]> {
    const { startedAfter } = query
    const runs = [...this.runs.values()]
      .filter(run => !query.source || run.source === query.source)
      .filter(run => !query.status || run.status === query.status)
      .filter(run => !startedAfter || run.startedAt >= startedAfter)
      .sort((a, b) => b.startedAt.getTime() - a.startedAt.getTime())
    return (query.limit === undefined ? runs : runs.slice(0, query.limit)).map(run => structuredClone(run))
  }

  async commitRun(commit: RunCommit): Promise<void> {
    // Validate everything first so a rejected commit leaves no trace
    this.checkRunWrite(commit.run)
    for (const event of commit.events) {
      if (this.events.has(event.eventId)) {
        throw new Error(`Duplicate change event ${event.eventId}`)
      }
    }

    await this.replaceEntities(commit.run.source, commit.entities, commit.run.runId)
    await this.appendChangeEvents(commit.events)
    this.runs.set(commit.run.runId, structuredClone(commit.run))
    await this.saveSnapshot(commit.snapshot)
  }

  async close(): Promise<void> {}

  private checkRunWrite(run: ScraperRun): void {
    const existing = this.runs.get(run.runId)
    if (existing && existing.status !== 'Running') {
      throw new TerminalRunError(run.runId)
    }
    if (run.status === 'Running') {
      for (const other of this.runs.values()) {
        if (other.source === run.source && other.status === 'Running' && other.runId !== run.runId) {
          throw new RunningRunExistsError(run.source)
        }
      }
    }
  }
}
