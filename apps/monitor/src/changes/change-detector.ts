/**
 * Change Detector
 *
 * Structural diff between the stored entity set of a source and a fresh
 * parse. Entities are matched by uid only: a subject re-issued under a
 * new uid shows up as one Removed and one Added event.
 *
 * Runs in O(n) over both sets. Pure apart from id generation.
 */

import { createId } from '@paralleldrive/cuid2'
import {
  TRACKED_FIELDS,
  type CanonicalEntity,
  type ChangeEvent,
  type FieldChange,
  type SanctionSource,
} from '@sanctionwatch/db'
import { canonicalFieldValue } from '../sources/normalize.js'
import { classify } from './risk-classifier.js'

/** A change event before the Risk Classifier has seen it */
export type DetectedChange = Omit<ChangeEvent, 'riskLevel'>

export interface DetectionContext {
  source: SanctionSource
  runId: string
  detectedAt: Date
  createEventId?: () => string
}

/**
 * Tracked fields whose normalized values differ, in TRACKED_FIELDS order.
 * List fields compare as sets.
 */
export function diffFields(previous: CanonicalEntity, current: CanonicalEntity): FieldChange[] {
  const changes: FieldChange[] = []
  for (const field of TRACKED_FIELDS) {
    if (canonicalFieldValue(field, previous) !== canonicalFieldValue(field, current)) {
      changes.push({ field, oldValue: previous[field], newValue: current[field] })
    }
  }
  return changes
}

export function describeAdded(entity: CanonicalEntity): string {
  return `New ${entity.entityType.toLowerCase()} added: ${entity.name}`
}

export function describeRemoved(entity: CanonicalEntity): string {
  return `Entity removed from sanctions list: ${entity.name}`
}

export function describeModified(entity: CanonicalEntity, fieldChanges: FieldChange[]): string {
  if (fieldChanges.length === 0) {
    return `Modified ${entity.name}: content hash changed`
  }
  return `Modified ${entity.name}: updated ${fieldChanges.map(change => change.field).join(', ')}`
}

function indexByUid(entities: CanonicalEntity[]): Map<string, CanonicalEntity> {
  const index = new Map<string, CanonicalEntity>()
  for (const entity of entities) {
    index.set(entity.uid, entity)
  }
  return index
}

/**
 * Diff two snapshots of one source.
 *
 * Events come out as Added and Modified in `current` order, then Removed
 * in `previous` order.
 */
export function detectChanges(
  previous: CanonicalEntity[],
  current: CanonicalEntity[],
  context: DetectionContext
): DetectedChange[] {
  const createEventId = context.createEventId ?? createId
  const previousByUid = indexByUid(previous)
  const currentByUid = indexByUid(current)

  const base = (entity: CanonicalEntity) => ({
    eventId: createEventId(),
    entityUid: entity.uid,
    entityName: entity.name,
    source: context.source,
    detectedAt: context.detectedAt,
    runId: context.runId,
    notificationSentAt: null,
    notificationChannels: [],
  })

  const changes: DetectedChange[] = []

  for (const entity of currentByUid.values()) {
    const before = previousByUid.get(entity.uid)

    if (!before) {
      changes.push({
        ...base(entity),
        changeType: 'Added',
        fieldChanges: [],
        changeSummary: describeAdded(entity),
        oldContentHash: null,
        newContentHash: entity.contentHash,
      })
      continue
    }

    if (before.contentHash === entity.contentHash) continue

    const fieldChanges = diffFields(before, entity)
    changes.push({
      ...base(entity),
      changeType: 'Modified',
      fieldChanges,
      changeSummary: describeModified(entity, fieldChanges),
      oldContentHash: before.contentHash,
      newContentHash: entity.contentHash,
    })
  }

  for (const entity of previousByUid.values()) {
    if (currentByUid.has(entity.uid)) continue
    changes.push({
      ...base(entity),
      changeType: 'Removed',
      fieldChanges: [],
      changeSummary: describeRemoved(entity),
      oldContentHash: entity.contentHash,
      newContentHash: null,
    })
  }

  return changes
}

/**
 * Keep the stored entity of every uid whose record was skipped this run.
 * A record that failed to parse is still on the published list, so it is
 * carried forward unchanged instead of reading as delisted.
 */
export function retainSkippedEntities(
  previous: CanonicalEntity[],
  parsed: CanonicalEntity[],
  skippedUids: Iterable<string>
): CanonicalEntity[] {
  const parsedUids = new Set(parsed.map(entity => entity.uid))
  const skipped = new Set(skippedUids)
  const retained = previous.filter(entity => skipped.has(entity.uid) && !parsedUids.has(entity.uid))
  return retained.length === 0 ? parsed : [...parsed, ...retained]
}

/**
 * Attach the Risk Classifier's level to each detected change.
 */
export function classifyChanges(changes: DetectedChange[]): ChangeEvent[] {
  return changes.map(change => ({ ...change, riskLevel: classify(change) }))
}
