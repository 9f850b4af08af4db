/**
 * Persisted model of the sanctions monitor.
 *
 * Four logical tables: sanctioned_entities, content_snapshots,
 * change_events and scraper_runs.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Enumerations
// ═══════════════════════════════════════════════════════════════════════════════

export const SANCTION_SOURCES = ['OFAC', 'UN', 'UK_HMT'] as const
export type SanctionSource = (typeof SANCTION_SOURCES)[number]

export function isSanctionSource(value: string): value is SanctionSource {
  return SANCTION_SOURCES.some(source => source === value)
}

export const ENTITY_TYPES = ['Person', 'Company', 'Vessel', 'Aircraft', 'Other'] as const
export type EntityType = (typeof ENTITY_TYPES)[number]

export type ChangeType = 'Added' | 'Modified' | 'Removed'

/** Ordered from most to least severe. */
export const RISK_LEVELS = ['Critical', 'High', 'Medium', 'Low'] as const
export type RiskLevel = (typeof RISK_LEVELS)[number]

export const RUN_STATUSES = ['Running', 'Success', 'Failed', 'Skipped', 'Partial'] as const
export type RunStatus = (typeof RUN_STATUSES)[number]
export type TerminalRunStatus = Exclude<RunStatus, 'Running'>

// ═══════════════════════════════════════════════════════════════════════════════
// Entities
// ═══════════════════════════════════════════════════════════════════════════════

export interface EntityAddress {
  street: string | null
  city: string | null
  stateOrProvince: string | null
  postalCode: string | null
  country: string | null
}

export interface CanonicalEntity {
  uid: string
  name: string
  entityType: EntityType
  source: SanctionSource
  programs: string[]
  aliases: string[]
  addresses: EntityAddress[]
  datesOfBirth: string[]
  placesOfBirth: string[]
  nationalities: string[]
  remarks: string | null
  /** Digest of every field above; ignores list ordering */
  contentHash: string
  lastSeen: Date
}

export interface ContentSnapshot {
  source: SanctionSource
  /** sha256 of the normalized raw payload, unrelated to entity hashes */
  contentHash: string
  sizeBytes: number
  capturedAt: Date
  runId: string
  archivePath: string | null
}

// ═══════════════════════════════════════════════════════════════════════════════
// Change events
// ═══════════════════════════════════════════════════════════════════════════════

/** Compared fields, in the order field changes are reported */
export const TRACKED_FIELDS = [
  'name',
  'entityType',
  'programs',
  'aliases',
  'addresses',
  'datesOfBirth',
  'placesOfBirth',
  'nationalities',
  'remarks',
] as const
export type TrackedField = (typeof TRACKED_FIELDS)[number]

export type FieldValue = CanonicalEntity[TrackedField]

export interface FieldChange {
  field: TrackedField
  oldValue: FieldValue
  newValue: FieldValue
}

export interface ChangeEvent {
  eventId: string
  entityUid: string
  entityName: string
  source: SanctionSource
  changeType: ChangeType
  riskLevel: RiskLevel
  /** Empty for Added and Removed */
  fieldChanges: FieldChange[]
  changeSummary: string
  oldContentHash: string | null
  newContentHash: string | null
  detectedAt: Date
  runId: string
  notificationSentAt: Date | null
  /** Channels that delivered the event; filled in after dispatch */
  notificationChannels: string[]
}

// ═══════════════════════════════════════════════════════════════════════════════
// Runs
// ═══════════════════════════════════════════════════════════════════════════════

export interface RiskCounts {
  critical: number
  high: number
  medium: number
  low: number
}

export interface StageTimings {
  downloadMs: number | null
  parseMs: number | null
  diffMs: number | null
  storeMs: number | null
}

export interface RunMetrics {
  entitiesProcessed: number
  entitiesAdded: number
  entitiesModified: number
  entitiesRemoved: number
  /** Records dropped by record-level parse errors */
  recordsSkipped: number
  riskCounts: RiskCounts
  timings: StageTimings
  contentHash: string | null
  retryCount: number
}

export interface ScraperRun extends RunMetrics {
  runId: string
  source: SanctionSource
  startedAt: Date
  completedAt: Date | null
  status: RunStatus
  errorMessage: string | null
}

export function emptyRunMetrics(): RunMetrics {
  return {
    entitiesProcessed: 0,
    entitiesAdded: 0,
    entitiesModified: 0,
    entitiesRemoved: 0,
    recordsSkipped: 0,
    riskCounts: { critical: 0, high: 0, medium: 0, low: 0 },
    timings: { downloadMs: null, parseMs: null, diffMs: null, storeMs: null },
    contentHash: null,
    retryCount: 0,
  }
}
