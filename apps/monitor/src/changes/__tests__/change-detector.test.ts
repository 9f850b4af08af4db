import { describe, it, expect } from 'vitest'
import type { CanonicalEntity } from '@sanctionwatch/db'
import { buildEntity, type EntityDraft } from '../../sources/normalize.js'
import {
  classifyChanges,
  detectChanges,
  diffFields,
  retainSkippedEntities,
  type DetectionContext,
} from '../change-detector.js'

const detectedAt = new Date('2026-01-15T06:00:00Z')

function entity(draft: Partial<EntityDraft> & { uid: string }): CanonicalEntity {
  return buildEntity('OFAC', { name: `Subject ${draft.uid}`, entityType: 'Person', ...draft }, detectedAt)
}

function context(): DetectionContext {
  let next = 0
  return {
    source: 'OFAC',
    runId: 'OFAC_1768456800000',
    detectedAt,
    createEventId: () => `evt_${++next}`,
  }
}

describe('detectChanges', () => {
  it('finds nothing between identical snapshots', () => {
    const snapshot = [entity({ uid: 'A' }), entity({ uid: 'B', programs: ['SDGT'] })]
    expect(detectChanges(snapshot, snapshot, context())).toEqual([])
  })

  it('ignores list reordering', () => {
    const before = [entity({ uid: 'A', programs: ['SDGT', 'IRAN'] })]
    const after = [entity({ uid: 'A', programs: ['IRAN', 'SDGT'] })]
    expect(detectChanges(before, after, context())).toEqual([])
  })

  it('reports a program addition as one High Modified event', () => {
    const before = [entity({ uid: 'X1', name: 'John Doe', programs: ['SDGT'] })]
    const after = [entity({ uid: 'X1', name: 'John Doe', programs: ['SDGT', 'CYBER'] })]

    const events = classifyChanges(detectChanges(before, after, context()))

    expect(events).toHaveLength(1)
    expect(events[0]).toMatchObject({
      eventId: 'evt_1',
      entityUid: 'X1',
      entityName: 'John Doe',
      source: 'OFAC',
      changeType: 'Modified',
      riskLevel: 'High',
      fieldChanges: [{ field: 'programs', oldValue: ['SDGT'], newValue: ['SDGT', 'CYBER'] }],
      changeSummary: 'Modified John Doe: updated programs',
      oldContentHash: before[0]?.contentHash,
      newContentHash: after[0]?.contentHash,
      runId: 'OFAC_1768456800000',
      detectedAt,
      notificationSentAt: null,
      notificationChannels: [],
    })
  })

  it('reports a disappeared entity as one Critical Removed event', () => {
    const removed = entity({ uid: 'X2', name: 'Jane Roe' })
    const events = classifyChanges(detectChanges([removed], [], context()))

    expect(events).toHaveLength(1)
    expect(events[0]).toMatchObject({
      entityUid: 'X2',
      changeType: 'Removed',
      riskLevel: 'Critical',
      fieldChanges: [],
      changeSummary: 'Entity removed from sanctions list: Jane Roe',
      oldContentHash: removed.contentHash,
      newContentHash: null,
    })
  })

  it('describes additions by entity type', () => {
    const added = buildEntity('OFAC', { uid: 'V1', name: 'SEA SPRAY', entityType: 'Vessel' }, detectedAt)
    const [event] = detectChanges([], [added], context())

    expect(event?.changeType).toBe('Added')
    expect(event?.changeSummary).toBe('New vessel added: SEA SPRAY')
    expect(event?.oldContentHash).toBeNull()
    expect(event?.newContentHash).toBe(added.contentHash)
  })

  it('partitions keys into Added, Modified and Removed without overlap', () => {
    const previous = [entity({ uid: 'keep' }), entity({ uid: 'edit', remarks: 'old' }), entity({ uid: 'gone' })]
    const current = [entity({ uid: 'keep' }), entity({ uid: 'edit', remarks: 'new' }), entity({ uid: 'new' })]

    const events = detectChanges(previous, current, context())
    const byType = (type: string) => events.filter(event => event.changeType === type).map(event => event.entityUid)

    expect(byType('Added')).toEqual(['new'])
    expect(byType('Modified')).toEqual(['edit'])
    expect(byType('Removed')).toEqual(['gone'])
    expect(events).toHaveLength(3)
  })

  it('treats a re-issued uid as an unrelated Removed and Added pair', () => {
    const before = [entity({ uid: 'OLD-1', name: 'Same Person' })]
    const after = [entity({ uid: 'NEW-1', name: 'Same Person' })]

    const events = detectChanges(before, after, context())
    expect(events.map(event => [event.changeType, event.entityUid])).toEqual([
      ['Added', 'NEW-1'],
      ['Removed', 'OLD-1'],
    ])
  })

  it('gives the same events on repeated runs apart from ids', () => {
    const previous = [entity({ uid: 'A', aliases: ['X'] }), entity({ uid: 'B' })]
    const current = [entity({ uid: 'A', aliases: ['Y'] }), entity({ uid: 'C' })]

    const strip = (events: ReturnType<typeof detectChanges>) => events.map(({ eventId: _eventId, ...rest }) => rest)
    expect(strip(detectChanges(previous, current, context()))).toEqual(strip(detectChanges(previous, current, context())))
  })
})

describe('diffFields', () => {
  it('lists changed fields in tracked-field order', () => {
    const before = entity({ uid: 'A', name: 'Old Name', remarks: 'r1', aliases: ['a'] })
    const after = entity({ uid: 'A', name: 'New Name', remarks: 'r2', aliases: ['b'] })

    expect(diffFields(before, after).map(change => change.field)).toEqual(['name', 'aliases', 'remarks'])
  })
})

describe('retainSkippedEntities', () => {
  it('carries the stored entity of a skipped uid into the current set', () => {
    const stored = [entity({ uid: 'A' }), entity({ uid: 'B' }), entity({ uid: 'C' })]
    const parsed = [entity({ uid: 'A', remarks: 'updated' })]

    const current = retainSkippedEntities(stored, parsed, ['B', '#7'])

    expect(current.map(e => e.uid)).toEqual(['A', 'B'])
    expect(detectChanges(stored, current, context()).map(event => [event.changeType, event.entityUid])).toEqual([
      ['Modified', 'A'],
      ['Removed', 'C'],
    ])
  })

  it('prefers the parsed entity when a duplicate of its uid was skipped', () => {
    const stored = [entity({ uid: 'A' })]
    const parsed = [entity({ uid: 'A', remarks: 'updated' })]

    expect(retainSkippedEntities(stored, parsed, ['A'])).toBe(parsed)
  })
})
