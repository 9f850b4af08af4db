import { describe, it, expect } from 'vitest'
import { InMemorySanctionsRepository } from '../memory-repository.js'
import { RunningRunExistsError, TerminalRunError } from '../errors.js'
import { emptyRunMetrics, type CanonicalEntity, type ChangeEvent, type ScraperRun } from '../types.js'

function run(overrides: Partial<ScraperRun> = {}): ScraperRun {
  return {
    ...emptyRunMetrics(),
    runId: 'OFAC_1000',
    source: 'OFAC',
    startedAt: new Date(1000),
    completedAt: null,
    status: 'Running',
    errorMessage: null,
    ...overrides,
  }
}

function entity(uid: string): CanonicalEntity {
  return {
    uid,
    name: `Subject ${uid}`,
    entityType: 'Person',
    source: 'OFAC',
    programs: ['SDGT'],
    aliases: [],
    addresses: [],
    datesOfBirth: [],
    placesOfBirth: [],
    nationalities: [],
    remarks: null,
    contentHash: `hash-${uid}`,
    lastSeen: new Date(1000),
  }
}

function event(eventId: string, runId = 'OFAC_1000'): ChangeEvent {
  return {
    eventId,
    entityUid: 'X1',
    entityName: 'Subject X1',
    source: 'OFAC',
    changeType: 'Added',
    riskLevel: 'High',
    fieldChanges: [],
    changeSummary: 'New person added: Subject X1',
    oldContentHash: null,
    newContentHash: 'hash-X1',
    detectedAt: new Date(2000),
    runId,
    notificationSentAt: null,
    notificationChannels: [],
  }
}

describe('InMemorySanctionsRepository', () => {
  it('rejects a second Running run for the same source', async () => {
    const repo = new InMemorySanctionsRepository()
    await repo.upsertRun(run())

    await expect(repo.upsertRun(run({ runId: 'OFAC_2000', startedAt: new Date(2000) }))).rejects.toBeInstanceOf(
      RunningRunExistsError
    )
    await expect(repo.upsertRun(run({ runId: 'UN_2000', source: 'UN' }))).resolves.toBeUndefined()
  })

  it('refuses to overwrite a terminal run', async () => {
    const repo = new InMemorySanctionsRepository()
    await repo.upsertRun(run())
    await repo.upsertRun(run({ status: 'Success', completedAt: new Date(3000) }))

    await expect(repo.upsertRun(run({ status: 'Failed' }))).rejects.toBeInstanceOf(TerminalRunError)
    expect((await repo.getRun('OFAC_1000'))?.status).toBe('Success')
  })

  it('returns copies so callers cannot mutate stored entities', async () => {
    const repo = new InMemorySanctionsRepository()
    await repo.replaceEntities('OFAC', [entity('X1')], 'OFAC_1000')

    const first = await repo.getLatestEntities('OFAC')
    first[0].programs.push('CYBER')

    const second = await repo.getLatestEntities('OFAC')
    expect(second[0].programs).toEqual(['SDGT'])
  })

  it('commits nothing when the run write is rejected', async () => {
    const repo = new InMemorySanctionsRepository()
    await repo.upsertRun(run({ status: 'Failed', completedAt: new Date(3000) }))

    await expect(
      repo.commitRun({
        run: run({ status: 'Success' }),
        entities: [entity('X1')],
        events: [event('e1')],
        snapshot: {
          source: 'OFAC',
          contentHash: 'a'.repeat(64),
          sizeBytes: 10,
          capturedAt: new Date(3000),
          runId: 'OFAC_1000',
          archivePath: null,
        },
      })
    ).rejects.toBeInstanceOf(TerminalRunError)

    expect(await repo.getLatestEntities('OFAC')).toEqual([])
    expect(await repo.listChangeEvents('OFAC_1000')).toEqual([])
    expect(await repo.getLatestSnapshot('OFAC')).toBeNull()
  })

  it('stamps notification metadata only once', async () => {
    const repo = new InMemorySanctionsRepository()
    await repo.appendChangeEvents([event('e1')])

    await repo.markEventsNotified(['e1'], new Date(5000), ['email'])
    await repo.markEventsNotified(['e1'], new Date(6000), ['slack'])

    const [stored] = await repo.listChangeEvents('OFAC_1000')
    expect(stored.notificationSentAt).toEqual(new Date(5000))
    expect(stored.notificationChannels).toEqual(['email'])
  })

  it('lists runs newest first with filters', async () => {
    const repo = new InMemorySanctionsRepository()
    await repo.upsertRun(run({ runId: 'OFAC_1000', status: 'Success' }))
    await repo.upsertRun(run({ runId: 'OFAC_5000', startedAt: new Date(5000), status: 'Failed' }))
    await repo.upsertRun(run({ runId: 'UN_3000', source: 'UN', startedAt: new Date(3000), status: 'Success' }))

    const all = await repo.listRuns({})
    expect(all.map(r => r.runId)).toEqual(['OFAC_5000', 'UN_3000', 'OFAC_1000'])

    const ofac = await repo.listRuns({ source: 'OFAC', startedAfter: new Date(2000) })
    expect(ofac.map(r => r.runId)).toEqual(['OFAC_5000'])

    const limited = await repo.listRuns({ status: 'Success', limit: 1 })
    expect(limited.map(r => r.runId)).toEqual(['UN_3000'])
  })
})
