import { describe, it, expect } from 'vitest'
import { emptyRunMetrics, InMemorySanctionsRepository } from '@sanctionwatch/db'
import { ConflictError, InvalidStateError } from '../../domain/errors.js'
import { buildRunId, RunLedger } from '../run-ledger.js'

function fixedClock(iso: string) {
  let current = new Date(iso)
  return {
    clock: () => new Date(current),
    advance(ms: number) {
      current = new Date(current.getTime() + ms)
    },
  }
}

describe('RunLedger', () => {
  it('builds run ids from the source and start time', () => {
    expect(buildRunId('OFAC', new Date('2026-01-15T06:00:00.000Z'))).toBe('OFAC_1768456800000')
  })

  it('lets exactly one of two concurrent beginRun calls for a source through', async () => {
    const ledger = new RunLedger(new InMemorySanctionsRepository())

    const results = await Promise.allSettled([ledger.beginRun('OFAC'), ledger.beginRun('OFAC')])

    const fulfilled = results.filter(result => result.status === 'fulfilled')
    const rejected = results.filter((result): result is PromiseRejectedResult => result.status === 'rejected')
    expect(fulfilled).toHaveLength(1)
    expect(rejected).toHaveLength(1)
    expect(rejected[0]?.reason).toBeInstanceOf(ConflictError)
  })

  it('rejects a second process starting a source that is already running', async () => {
    const repository = new InMemorySanctionsRepository()
    const time = fixedClock('2026-01-15T06:00:00Z')
    const first = new RunLedger(repository, { clock: time.clock })
    const second = new RunLedger(repository, { clock: time.clock })

    await first.beginRun('OFAC')
    time.advance(1_000)

    await expect(second.beginRun('OFAC')).rejects.toBeInstanceOf(ConflictError)
    await expect(second.beginRun('UN')).resolves.toBe('UN_1768456801000')
  })

  it('records the terminal state and frees the source', async () => {
    const repository = new InMemorySanctionsRepository()
    const time = fixedClock('2026-01-15T06:00:00Z')
    const ledger = new RunLedger(repository, { clock: time.clock })

    const runId = await ledger.beginRun('UN')
    time.advance(2_500)
    const completed = await ledger.completeRun(runId, 'Success', { ...emptyRunMetrics(), entitiesProcessed: 12 })

    expect(completed).toMatchObject({
      runId,
      source: 'UN',
      status: 'Success',
      entitiesProcessed: 12,
      completedAt: new Date('2026-01-15T06:00:02.500Z'),
      errorMessage: null,
    })
    expect(await ledger.getRun(runId)).toEqual(completed)

    time.advance(1)
    await expect(ledger.beginRun('UN')).resolves.toBe('UN_1768456802501')
  })

  it('fails loudly when a run is completed twice', async () => {
    const ledger = new RunLedger(new InMemorySanctionsRepository())
    const runId = await ledger.beginRun('OFAC')

    await ledger.completeRun(runId, 'Failed', emptyRunMetrics(), { errorMessage: 'boom' })

    await expect(ledger.completeRun(runId, 'Success', emptyRunMetrics())).rejects.toThrowError(
      new InvalidStateError(`Run ${runId} is already Failed`)
    )
    expect((await ledger.getRun(runId))?.status).toBe('Failed')
  })

  it('rejects completing an unknown run', async () => {
    const ledger = new RunLedger(new InMemorySanctionsRepository())
    await expect(ledger.completeRun('OFAC_1', 'Success', emptyRunMetrics())).rejects.toBeInstanceOf(InvalidStateError)
  })

  it('commits results together with the terminal record', async () => {
    const repository = new InMemorySanctionsRepository()
    const ledger = new RunLedger(repository)
    const runId = await ledger.beginRun('OFAC')

    await ledger.completeRun(runId, 'Success', emptyRunMetrics(), {
      results: {
        entities: [],
        events: [],
        snapshot: {
          source: 'OFAC',
          contentHash: 'abc',
          sizeBytes: 3,
          capturedAt: new Date('2026-01-15T06:00:00Z'),
          runId,
          archivePath: null,
        },
      },
    })

    expect((await repository.getLatestSnapshot('OFAC'))?.contentHash).toBe('abc')
  })

  it('saves standalone snapshots', async () => {
    const repository = new InMemorySanctionsRepository()
    const ledger = new RunLedger(repository, { clock: fixedClock('2026-01-15T06:00:00Z').clock })

    const snapshot = await ledger.recordSnapshot('UK_HMT', 'def', 'UK_HMT_1', { sizeBytes: 10 })

    expect(snapshot).toEqual({
      source: 'UK_HMT',
      contentHash: 'def',
      runId: 'UK_HMT_1',
      sizeBytes: 10,
      capturedAt: new Date('2026-01-15T06:00:00Z'),
      archivePath: null,
    })
    expect(await repository.getLatestSnapshot('UK_HMT')).toEqual(snapshot)
  })

  describe('sweepStaleRuns', () => {
    it('fails orphaned runs past the maximum lifetime', async () => {
      const repository = new InMemorySanctionsRepository()
      const time = fixedClock('2026-01-15T06:00:00Z')
      const crashed = new RunLedger(repository, { clock: time.clock })
      const runId = await crashed.beginRun('OFAC')

      time.advance(3 * 60 * 60_000)
      const sweeper = new RunLedger(repository, { clock: time.clock })
      const sweep = await sweeper.sweepStaleRuns(2 * 60 * 60_000)

      expect(sweep).toEqual({ failed: [runId], ownedByProcess: [] })
      const run = await repository.getRun(runId)
      expect(run?.status).toBe('Failed')
      expect(run?.errorMessage).toBe(`RUN_ABORTED: Run ${runId} exceeded maximum lifetime of 7200000ms`)
    })

    it('leaves young runs alone and hands back stale runs this process owns', async () => {
      const repository = new InMemorySanctionsRepository()
      const time = fixedClock('2026-01-15T06:00:00Z')
      const ledger = new RunLedger(repository, { clock: time.clock })
      const ownRun = await ledger.beginRun('OFAC')

      time.advance(3 * 60 * 60_000)
      const youngRun = await ledger.beginRun('UN')

      const sweep = await ledger.sweepStaleRuns(2 * 60 * 60_000)

      expect(sweep).toEqual({ failed: [], ownedByProcess: [ownRun] })
      expect((await repository.getRun(youngRun))?.status).toBe('Running')
    })
  })

  it('releases the source when a run is abandoned', async () => {
    const ledger = new RunLedger(new InMemorySanctionsRepository())
    const runId = await ledger.beginRun('OFAC')

    ledger.abandonRun(runId)

    expect(ledger.isActive(runId)).toBe(false)
  })
})
