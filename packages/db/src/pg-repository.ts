/**
 * PostgreSQL repository on a pg Pool.
 *
 * List-valued entity fields and field changes are stored as JSONB.
 * Bulk writes go through jsonb_to_recordset so one statement inserts
 * a whole entity set regardless of its size.
 */

import type pg from 'pg'
import { createLogger } from '@sanctionwatch/logger'
import { RunningRunExistsError, TerminalRunError } from './errors.js'
import type { RunCommit, RunQuery, SanctionsRepository } from './repository.js'
import {
  ENTITY_TYPES,
  RISK_LEVELS,
  RUN_STATUSES,
  SANCTION_SOURCES,
  type CanonicalEntity,
  type ChangeEvent,
  type ContentSnapshot,
  type EntityAddress,
  type FieldChange,
  type SanctionSource,
  type ScraperRun,
} from './types.js'

const log = createLogger('db').child('pg')

const UNIQUE_VIOLATION = '23505'

// ═══════════════════════════════════════════════════════════════════════════════
// Row shapes
// ═══════════════════════════════════════════════════════════════════════════════

interface EntityRow {
  source: string
  uid: string
  name: string
  entity_type: string
  programs: string[]
  aliases: string[]
  addresses: EntityAddress[]
  dates_of_birth: string[]
  places_of_birth: string[]
  nationalities: string[]
  remarks: string | null
  content_hash: string
  last_seen: Date
}

interface SnapshotRow {
  source: string
  content_hash: string
  size_bytes: string
  captured_at: Date
  run_id: string
  archive_path: string | null
}

interface RunRow {
  run_id: string
  source: string
  status: string
  started_at: Date
  completed_at: Date | null
  entities_processed: number
  entities_added: number
  entities_modified: number
  entities_removed: number
  records_skipped: number
  critical_changes: number
  high_changes: number
  medium_changes: number
  low_changes: number
  download_ms: number | null
  parse_ms: number | null
  diff_ms: number | null
  store_ms: number | null
  content_hash: string | null
  retry_count: number
  error_message: string | null
}

interface EventRow {
  event_id: string
  run_id: string
  source: string
  entity_uid: string
  entity_name: string
  change_type: string
  risk_level: string
  field_changes: FieldChange[]
  change_summary: string
  old_content_hash: string | null
  new_content_hash: string | null
  detected_at: Date
  notification_sent_at: Date | null
  notification_channels: string[]
}

function oneOf<T extends string>(values: readonly T[], value: string, column: string): T {
  const match = values.find(candidate => candidate === value)
  if (match === undefined) {
    throw new Error(`Unexpected ${column} value in database: ${value}`)
  }
  return match
}

const CHANGE_TYPES = ['Added', 'Modified', 'Removed'] as const

// ═══════════════════════════════════════════════════════════════════════════════
// Row mapping
// ═══════════════════════════════════════════════════════════════════════════════

export function rowToEntity(row: EntityRow): CanonicalEntity {
  return {
    uid: row.uid,
    name: row.name,
    entityType: oneOf(ENTITY_TYPES, row.entity_type, 'entity_type'),
    source: oneOf(SANCTION_SOURCES, row.source, 'source'),
    programs: row.programs,
    aliases: row.aliases,
    addresses: row.addresses,
    datesOfBirth: row.dates_of_birth,
    placesOfBirth: row.places_of_birth,
    nationalities: row.nationalities,
    remarks: row.remarks,
    contentHash: row.content_hash,
    lastSeen: row.last_seen,
  }
}

export function rowToRun(row: RunRow): ScraperRun {
  return {
    runId: row.run_id,
    source: oneOf(SANCTION_SOURCES, row.source, 'source'),
    status: oneOf(RUN_STATUSES, row.status, 'status'),
    startedAt: row.started_at,
    completedAt: row.completed_at,
    entitiesProcessed: row.entities_processed,
    entitiesAdded: row.entities_added,
    entitiesModified: row.entities_modified,
    entitiesRemoved: row.entities_removed,
    recordsSkipped: row.records_skipped,
    riskCounts: {
      critical: row.critical_changes,
      high: row.high_changes,
      medium: row.medium_changes,
      low: row.low_changes,
    },
    timings: {
      downloadMs: row.download_ms,
      parseMs: row.parse_ms,
      diffMs: row.diff_ms,
      storeMs: row.store_ms,
    },
    contentHash: row.content_hash,
    retryCount: row.retry_count,
    errorMessage: row.error_message,
  }
}

function rowToSnapshot(row: SnapshotRow): ContentSnapshot {
  return {
    source: oneOf(SANCTION_SOURCES, row.source, 'source'),
    contentHash: row.content_hash,
    sizeBytes: Number(row.size_bytes),
    capturedAt: row.captured_at,
    runId: row.run_id,
    archivePath: row.archive_path,
  }
}

function rowToEvent(row: EventRow): ChangeEvent {
  return {
    eventId: row.event_id,
    runId: row.run_id,
    source: oneOf(SANCTION_SOURCES, row.source, 'source'),
    entityUid: row.entity_uid,
    entityName: row.entity_name,
    changeType: oneOf(CHANGE_TYPES, row.change_type, 'change_type'),
    riskLevel: oneOf(RISK_LEVELS, row.risk_level, 'risk_level'),
    fieldChanges: row.field_changes,
    changeSummary: row.change_summary,
    oldContentHash: row.old_content_hash,
    newContentHash: row.new_content_hash,
    detectedAt: row.detected_at,
    notificationSentAt: row.notification_sent_at,
    notificationChannels: row.notification_channels,
  }
}

/**
 * Values for one scraper_runs row, in RUN_COLUMNS order.
 */
export function runValues(run: ScraperRun): unknown[] {
  return [
    run.runId,
    run.source,
    run.status,
    run.startedAt,
    run.completedAt,
    run.entitiesProcessed,
    run.entitiesAdded,
    run.entitiesModified,
    run.entitiesRemoved,
    run.recordsSkipped,
    run.riskCounts.critical,
    run.riskCounts.high,
    run.riskCounts.medium,
    run.riskCounts.low,
    run.timings.downloadMs,
    run.timings.parseMs,
    run.timings.diffMs,
    run.timings.storeMs,
    run.contentHash,
    run.retryCount,
    run.errorMessage,
  ]
}

const RUN_COLUMNS = [
  'run_id',
  'source',
  'status',
  'started_at',
  'completed_at',
  'entities_processed',
  'entities_added',
  'entities_modified',
  'entities_removed',
  'records_skipped',
  'critical_changes',
  'high_changes',
  'medium_changes',
  'low_changes',
  'download_ms',
  'parse_ms',
  'diff_ms',
  'store_ms',
  'content_hash',
  'retry_count',
  'error_message',
]

const UPSERT_RUN_SQL = `
  INSERT INTO scraper_runs (${RUN_COLUMNS.join(', ')})
  VALUES (${RUN_COLUMNS.map((_, i) => `$${i + 1}`).join(', ')})
  ON CONFLICT (run_id) DO UPDATE SET
    ${RUN_COLUMNS.filter(c => c !== 'run_id').map(c => `${c} = EXCLUDED.${c}`).join(',\n    ')}
  WHERE scraper_runs.status = 'Running'
`

const INSERT_ENTITIES_SQL = `
  INSERT INTO sanctioned_entities (
    source, uid, name, entity_type, programs, aliases, addresses, dates_of_birth,
    places_of_birth, nationalities, remarks, content_hash, last_seen, last_run_id
  )
  SELECT
    source, uid, name, entity_type, programs, aliases, addresses, dates_of_birth,
    places_of_birth, nationalities, remarks, content_hash, last_seen, $2
  FROM jsonb_to_recordset($1::jsonb) AS e(
    source text, uid text, name text, entity_type text, programs jsonb, aliases jsonb,
    addresses jsonb, dates_of_birth jsonb, places_of_birth jsonb, nationalities jsonb,
    remarks text, content_hash text, last_seen timestamptz
  )
`

const INSERT_EVENTS_SQL = `
  INSERT INTO change_events (
    event_id, run_id, source, entity_uid, entity_name, change_type, risk_level,
    field_changes, change_summary, old_content_hash, new_content_hash, detected_at,
    notification_sent_at, notification_channels
  )
  SELECT
    event_id, run_id, source, entity_uid, entity_name, change_type, risk_level,
    field_changes, change_summary, old_content_hash, new_content_hash, detected_at,
    notification_sent_at, notification_channels
  FROM jsonb_to_recordset($1::jsonb) AS e(
    event_id text, run_id text, source text, entity_uid text, entity_name text,
    change_type text, risk_level text, field_changes jsonb, change_summary text,
    old_content_hash text, new_content_hash text, detected_at timestamptz,
    notification_sent_at timestamptz, notification_channels jsonb
  )
`

export function entityRecordset(entities: CanonicalEntity[]): string {
  return JSON.stringify(
    entities.map(entity => ({
      source: entity.source,
      uid: entity.uid,
      name: entity.name,
      entity_type: entity.entityType,
      programs: entity.programs,
      aliases: entity.aliases,
      addresses: entity.addresses,
      dates_of_birth: entity.datesOfBirth,
      places_of_birth: entity.placesOfBirth,
      nationalities: entity.nationalities,
      remarks: entity.remarks,
      content_hash: entity.contentHash,
      last_seen: entity.lastSeen.toISOString(),
    }))
  )
}

function eventRecordset(events: ChangeEvent[]): string {
  return JSON.stringify(
    events.map(event => ({
      event_id: event.eventId,
      run_id: event.runId,
      source: event.source,
      entity_uid: event.entityUid,
      entity_name: event.entityName,
      change_type: event.changeType,
      risk_level: event.riskLevel,
      field_changes: event.fieldChanges,
      change_summary: event.changeSummary,
      old_content_hash: event.oldContentHash,
      new_content_hash: event.newContentHash,
      detected_at: event.detectedAt.toISOString(),
      notification_sent_at: event.notificationSentAt?.toISOString() ?? null,
      notification_channels: event.notificationChannels,
    }))
  )
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === UNIQUE_VIOLATION
}

// ═══════════════════════════════════════════════════════════════════════════════
// Repository
// ═══════════════════════════════════════════════════════════════════════════════

type Queryable = pg.Pool | pg.PoolClient

export class PgSanctionsRepository implements SanctionsRepository {
  constructor(private readonly pool: pg.Pool) {}

  async getLatestEntities(source: SanctionSource): Promise<CanonicalEntity[]> {
    const result = await this.pool.query<EntityRow>(
      'SELECT * FROM sanctioned_entities WHERE source = $1 ORDER BY uid',
      [source]
    )
    return result.rows.map(rowToEntity)
  }

  async replaceEntities(source: SanctionSource, entities: CanonicalEntity[], runId: string): Promise<void> {
    await this.transaction(client => this.writeEntities(client, source, entities, runId))
  }

  async getLatestSnapshot(source: SanctionSource): Promise<ContentSnapshot | null> {
    const result = await this.pool.query<SnapshotRow>(
      'SELECT * FROM content_snapshots WHERE source = $1 ORDER BY captured_at DESC LIMIT 1',
      [source]
    )
    const row = result.rows[0]
    return row ? rowToSnapshot(row) : null
  }

  async saveSnapshot(snapshot: ContentSnapshot): Promise<void> {
    await this.writeSnapshot(this.pool, snapshot)
  }

  async appendChangeEvents(events: ChangeEvent[]): Promise<void> {
    await this.writeEvents(this.pool, events)
  }

  async markEventsNotified(eventIds: string[], sentAt: Date, channels: string[]): Promise<void> {
    if (eventIds.length === 0) return
    await this.pool.query(
      `UPDATE change_events
          SET notification_sent_at = $2, notification_channels = $3::jsonb
        WHERE event_id = ANY($1::text[]) AND notification_sent_at IS NULL`,
      [eventIds, sentAt, JSON.stringify(channels)]
    )
  }

  async listChangeEvents(runId: string): Promise<ChangeEvent[]> {
    const result = await this.pool.query<EventRow>(
      'SELECT * FROM change_events WHERE run_id = $1 ORDER BY detected_at, event_id',
      [runId]
    )
    return result.rows.map(rowToEvent)
  }

  async upsertRun(run: ScraperRun): Promise<void> {
    await this.writeRun(this.pool, run)
  }

  async getRun(runId: string): Promise<ScraperRun | null> {
    const result = await this.pool.query<RunRow>('SELECT * FROM scraper_runs WHERE run_id = $1', [runId])
    const row = result.rows[0]
    return row ? rowToRun(row) : null
  }

  async listRuns(query: RunQuery): Promise<ScraperRun[]> {
    const conditions: string[] = []
    const values: unknown[] = []

    if (query.source) {
      values.push(query.source)
      conditions.push(`source = $${values.length}`)
    }
    if (query.status) {
      values.push(query.status)
      conditions.push(`status = $${values.length}`)
    }
    if (query.startedAfter) {
      values.push(query.startedAfter)
      conditions.push(`started_at >= $${values.length}`)
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : ''
    let sql = `SELECT * FROM scraper_runs ${where} ORDER BY started_at DESC`
    if (query.limit !== undefined) {
      values.push(query.limit)
      sql += ` LIMIT $${values.length}`
    }

    const result = await this.pool.query<RunRow>(sql, values)
    return result.rows.map(rowToRun)
  }

  async commitRun(commit: RunCommit): Promise<void> {
    await this.transaction(async client => {
      await this.writeEntities(client, commit.run.source, commit.entities, commit.run.runId)
      await this.writeEvents(client, commit.events)
      await this.writeRun(client, commit.run)
      await this.writeSnapshot(client, commit.snapshot)
    })
  }

  async close(): Promise<void> {
    await this.pool.end()
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Statement helpers
  // ─────────────────────────────────────────────────────────────────────────────

  private async writeEntities(
    client: Queryable,
    source: SanctionSource,
    entities: CanonicalEntity[],
    runId: string
  ): Promise<void> {
    await client.query('DELETE FROM sanctioned_entities WHERE source = $1', [source])
    if (entities.length > 0) {
      await client.query(INSERT_ENTITIES_SQL, [entityRecordset(entities), runId])
    }
  }

  private async writeEvents(client: Queryable, events: ChangeEvent[]): Promise<void> {
    if (events.length === 0) return
    await client.query(INSERT_EVENTS_SQL, [eventRecordset(events)])
  }

  private async writeSnapshot(client: Queryable, snapshot: ContentSnapshot): Promise<void> {
    await client.query(
      `INSERT INTO content_snapshots (run_id, source, content_hash, size_bytes, captured_at, archive_path)
       VALUES ($1, $2, $3, $4, $5, $6)
       ON CONFLICT (run_id) DO NOTHING`,
      [snapshot.runId, snapshot.source, snapshot.contentHash, snapshot.sizeBytes, snapshot.capturedAt, snapshot.archivePath]
    )
  }

  private async writeRun(client: Queryable, run: ScraperRun): Promise<void> {
    let rowCount: number | null
    try {
      const result = await client.query(UPSERT_RUN_SQL, runValues(run))
      rowCount = result.rowCount
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new RunningRunExistsError(run.source)
      }
      throw error
    }
    if (rowCount === 0) {
      throw new TerminalRunError(run.runId)
    }
  }

  private async transaction<T>(work: (client: pg.PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect()
    try {
      await client.query('BEGIN')
      const result = await work(client)
      await client.query('COMMIT')
      return result
    } catch (error) {
      try {
        await client.query('ROLLBACK')
      } catch (rollbackError) {
        log.error('Rollback failed', {}, rollbackError)
      }
      throw error
    } finally {
      client.release()
    }
  }
}
