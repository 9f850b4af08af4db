import { describe, it, expect, vi, beforeEach } from 'vitest'
import {
  InMemorySanctionsRepository,
  type CanonicalEntity,
  type ChangeEvent,
  type SanctionSource,
} from '@sanctionwatch/db'
import type { MonitorSettings } from '../../config/settings.js'
import { ConflictError, DownloadError, ParseError } from '../../domain/errors.js'
import { ContentDeduplicator, computeContentHash } from '../../dedupe/content-deduplicator.js'
import type { DownloadRequest, DownloadResult } from '../../download/download-manager.js'
import { RunLedger } from '../../ledger/run-ledger.js'
import type { DeliveryReport } from '../../notify/dispatcher.js'
import { RecordingStageObserver } from '../../observability/stage-events.js'
import { OFAC_METADATA, OfacAdapter } from '../../sources/adapters/ofac.js'
import { buildEntity } from '../../sources/normalize.js'
import { SourceRegistry } from '../../sources/registry.js'
import type { FetchConfig, ParseResult, SourceAdapter } from '../../sources/types.js'
import { RunOrchestrator } from '../orchestrator.js'
import { InMemorySourceLockProvider } from '../source-lock.js'

const START = new Date('2026-01-15T06:00:00Z')

class FakeAdapter implements SourceAdapter {
  readonly metadata = OFAC_METADATA
  readonly parse = vi.fn<(raw: Buffer, observedAt: Date) => ParseResult>()

  constructor(readonly id: SanctionSource) {}

  fetchConfig(urlOverride?: string): FetchConfig {
    return { url: urlOverride ?? `https://lists.example.test/${this.id}`, headers: {} }
  }
}

function entity(uid: string, name: string, programs: string[] = ['SDGT']): CanonicalEntity {
  return buildEntity('OFAC', { uid, name, entityType: 'Company', programs }, START)
}

function sdnList(entries: Array<[uid: string, lastName: string]>): string {
  const body = entries
    .map(
      ([uid, lastName]) =>
        `<sdnEntry><uid>${uid}</uid><lastName>${lastName}</lastName><sdnType>Entity</sdnType>` +
        '<programList><program>SDGT</program></programList></sdnEntry>'
    )
    .join('')
  return `<sdnList>${body}</sdnList>`
}

function downloaded(text: string, retryCount = 0): DownloadResult {
  const body = Buffer.from(text)
  return {
    body,
    metadata: {
      url: 'https://lists.example.test/OFAC',
      statusCode: 200,
      contentType: 'application/xml',
      etag: null,
      lastModified: null,
      sizeBytes: body.length,
      fetchedAt: START,
    },
    retryCount,
    durationMs: 5,
  }
}

const settings: Pick<MonitorSettings, 'run' | 'sources'> = {
  run: { maxLifetimeMs: 7_200_000, sweepIntervalMs: 300_000, workerConcurrency: 2, lockTtlMs: 600_000, schedulerEnabled: true },
  sources: {
    OFAC: { url: undefined, schedule: undefined },
    UN: { url: undefined, schedule: undefined },
    UK_HMT: { url: undefined, schedule: undefined },
  },
}

function setup(adapters: SourceAdapter[] = [new FakeAdapter('OFAC')]) {
  let now = START.getTime()
  const clock = () => new Date(now)
  const advance = (ms: number) => {
    now += ms
  }

  const repository = new InMemorySanctionsRepository()
  const ledger = new RunLedger(repository, { clock })
  const fetch = vi.fn<(request: DownloadRequest) => Promise<DownloadResult>>()
  const dispatch = vi.fn<(events: ChangeEvent[]) => Promise<DeliveryReport[]>>().mockResolvedValue([])
  const locks = new InMemorySourceLockProvider()
  const observer = new RecordingStageObserver()

  const orchestrator = new RunOrchestrator({
    registry: new SourceRegistry(adapters),
    downloads: { fetch },
    deduplicator: new ContentDeduplicator(repository),
    repository,
    ledger,
    dispatcher: { dispatch },
    locks,
    settings,
    observer,
    clock,
  })

  return { orchestrator, repository, fetch, dispatch, locks, observer, advance }
}

describe('RunOrchestrator', () => {
  let adapter: FakeAdapter

  beforeEach(() => {
    adapter = new FakeAdapter('OFAC')
  })

  it('runs every stage, persists the results and notifies', async () => {
    const t = setup([adapter])
    t.fetch.mockResolvedValue(downloaded('<sdnList>v1</sdnList>', 1))
    adapter.parse.mockReturnValue({
      entities: [entity('OFAC-100', 'Example Trading LLC'), entity('OFAC-200', 'Sample Shipping Co')],
      skipped: [],
    })

    const run = await t.orchestrator.run('OFAC')

    expect(run).toMatchObject({
      runId: 'OFAC_1768456800000',
      status: 'Success',
      entitiesProcessed: 2,
      entitiesAdded: 2,
      entitiesModified: 0,
      entitiesRemoved: 0,
      recordsSkipped: 0,
      retryCount: 1,
      riskCounts: { critical: 0, high: 2, medium: 0, low: 0 },
      contentHash: computeContentHash(Buffer.from('<sdnList>v1</sdnList>')),
      errorMessage: null,
    })
    expect(await t.repository.getLatestEntities('OFAC')).toHaveLength(2)
    expect((await t.repository.getLatestSnapshot('OFAC'))?.runId).toBe(run.runId)
    expect(t.dispatch).toHaveBeenCalledTimes(1)
    expect(t.dispatch.mock.calls[0]?.[0].map(event => event.entityUid)).toEqual(['OFAC-100', 'OFAC-200'])
    expect(t.fetch.mock.calls[0]?.[0].config.url).toBe('https://lists.example.test/OFAC')

    expect(t.observer.stagesFor(run.runId)).toEqual([
      ['Idle', 'succeeded'],
      ['Downloading', 'entered'],
      ['Downloading', 'succeeded'],
      ['Deduplicating', 'entered'],
      ['Deduplicating', 'succeeded'],
      ['Parsing', 'entered'],
      ['Parsing', 'succeeded'],
      ['Diffing', 'entered'],
      ['Diffing', 'succeeded'],
      ['Classifying', 'entered'],
      ['Classifying', 'succeeded'],
      ['Persisting', 'entered'],
      ['Persisting', 'succeeded'],
      ['Notifying', 'entered'],
      ['Notifying', 'succeeded'],
      ['Completed', 'succeeded'],
      ['Idle', 'entered'],
    ])
  })

  it('skips identical content without parsing or notifying', async () => {
    const t = setup([adapter])
    t.fetch.mockResolvedValue(downloaded('<sdnList>v1</sdnList>'))
    adapter.parse.mockReturnValue({ entities: [entity('OFAC-100', 'Example Trading LLC')], skipped: [] })

    await t.orchestrator.run('OFAC')
    t.advance(60_000)
    const second = await t.orchestrator.run('OFAC')

    expect(second.status).toBe('Skipped')
    expect(second.runId).toBe('OFAC_1768456860000')
    expect(adapter.parse).toHaveBeenCalledTimes(1)
    expect(t.dispatch).toHaveBeenCalledTimes(1)
    expect(t.observer.stagesFor(second.runId)).toEqual([
      ['Idle', 'succeeded'],
      ['Downloading', 'entered'],
      ['Downloading', 'succeeded'],
      ['Deduplicating', 'entered'],
      ['Deduplicating', 'succeeded'],
      ['Skipped', 'skipped'],
      ['Idle', 'entered'],
    ])
  })

  it('processes identical content when forced and finds no changes', async () => {
    const t = setup([adapter])
    t.fetch.mockResolvedValue(downloaded('<sdnList>v1</sdnList>'))
    adapter.parse.mockReturnValue({ entities: [entity('OFAC-100', 'Example Trading LLC')], skipped: [] })

    await t.orchestrator.run('OFAC')
    t.advance(60_000)
    const forced = await t.orchestrator.run('OFAC', { forceRefresh: true })

    expect(forced).toMatchObject({ status: 'Success', entitiesProcessed: 1, entitiesAdded: 0 })
    expect(adapter.parse).toHaveBeenCalledTimes(2)
    expect(t.dispatch).toHaveBeenCalledTimes(1)
    expect(t.observer.stagesFor(forced.runId)).toContainEqual(['Notifying', 'skipped'])
  })

  it('marks a run with skipped records Partial', async () => {
    const t = setup([adapter])
    t.fetch.mockResolvedValue(downloaded('<sdnList>v1</sdnList>'))
    adapter.parse.mockReturnValue({
      entities: [entity('OFAC-100', 'Example Trading LLC')],
      skipped: [new ParseError('record', 'uid', 'Missing uid', '#2')],
    })

    const run = await t.orchestrator.run('OFAC')

    expect(run).toMatchObject({ status: 'Partial', recordsSkipped: 1, entitiesAdded: 1 })
    expect(await t.repository.getLatestEntities('OFAC')).toHaveLength(1)
  })

  it('keeps a record that failed to parse at its stored state', async () => {
    const t = setup([new OfacAdapter({ minContentBytes: 0 })])
    const published = sdnList([
      ['1', 'Example Trading LLC'],
      ['2', 'Sample Shipping Co'],
    ])
    t.fetch.mockResolvedValueOnce(downloaded(published))
    await t.orchestrator.run('OFAC')

    t.advance(60_000)
    t.fetch.mockResolvedValueOnce(
      downloaded(
        sdnList([
          ['1', 'Example Trading LLC'],
          ['2', ''],
        ])
      )
    )
    const partial = await t.orchestrator.run('OFAC')

    expect(partial).toMatchObject({
      status: 'Partial',
      entitiesProcessed: 1,
      recordsSkipped: 1,
      entitiesAdded: 0,
      entitiesModified: 0,
      entitiesRemoved: 0,
      riskCounts: { critical: 0, high: 0, medium: 0, low: 0 },
    })
    expect(await t.repository.listChangeEvents(partial.runId)).toEqual([])
    expect((await t.repository.getLatestEntities('OFAC')).map(e => e.uid).sort()).toEqual(['1', '2'])

    t.advance(60_000)
    t.fetch.mockResolvedValueOnce(downloaded(published))
    const clean = await t.orchestrator.run('OFAC')

    expect(clean).toMatchObject({ status: 'Success', entitiesProcessed: 2, entitiesAdded: 0, entitiesRemoved: 0 })
    expect(t.dispatch).toHaveBeenCalledTimes(1)
  })

  it('fails on a format error, keeps previous state and sends nothing', async () => {
    const t = setup([adapter])
    t.fetch.mockResolvedValueOnce(downloaded('<sdnList>v1</sdnList>'))
    adapter.parse.mockReturnValueOnce({ entities: [entity('OFAC-100', 'Example Trading LLC')], skipped: [] })
    await t.orchestrator.run('OFAC')

    t.advance(60_000)
    t.fetch.mockResolvedValueOnce(downloaded('<html>maintenance</html>'))
    adapter.parse.mockImplementationOnce(() => {
      throw new ParseError('format', 'content', 'Payload is an HTML page, not the sanctions list')
    })
    const failed = await t.orchestrator.run('OFAC')

    expect(failed).toMatchObject({
      status: 'Failed',
      errorMessage: 'PARSE_FORMAT: content: Payload is an HTML page, not the sanctions list',
      contentHash: computeContentHash(Buffer.from('<html>maintenance</html>')),
      entitiesProcessed: 0,
    })
    expect(failed.timings.downloadMs).not.toBeNull()
    expect(failed.timings.parseMs).toBeNull()
    expect((await t.repository.getLatestEntities('OFAC')).map(e => e.uid)).toEqual(['OFAC-100'])
    expect(await t.repository.listChangeEvents(failed.runId)).toEqual([])
    expect(t.dispatch).toHaveBeenCalledTimes(1)
    expect(t.observer.stagesFor(failed.runId).slice(-4)).toEqual([
      ['Parsing', 'entered'],
      ['Parsing', 'failed'],
      ['Failed', 'failed'],
      ['Idle', 'entered'],
    ])
  })

  it('discards computed events when the commit fails', async () => {
    const t = setup([adapter])
    t.fetch.mockResolvedValue(downloaded('<sdnList>v1</sdnList>'))
    adapter.parse.mockReturnValue({ entities: [entity('OFAC-100', 'Example Trading LLC')], skipped: [] })
    vi.spyOn(t.repository, 'commitRun').mockRejectedValueOnce(new Error('connection lost'))

    const run = await t.orchestrator.run('OFAC')

    expect(run).toMatchObject({
      status: 'Failed',
      errorMessage: 'INTERNAL_ERROR: connection lost',
      entitiesAdded: 1,
      riskCounts: { critical: 0, high: 1, medium: 0, low: 0 },
    })
    expect(await t.repository.getRun(run.runId)).toMatchObject({ status: 'Failed' })
    expect(await t.repository.listChangeEvents(run.runId)).toEqual([])
    expect(await t.repository.getLatestSnapshot('OFAC')).toBeNull()
    expect(t.dispatch).not.toHaveBeenCalled()
  })

  it('fails the run when downloads are exhausted', async () => {
    const t = setup([adapter])
    t.fetch.mockRejectedValue(new DownloadError('Gave up after 5 attempts: HTTP 503', 'transient', 503))

    const run = await t.orchestrator.run('OFAC')

    expect(run.status).toBe('Failed')
    expect(run.errorMessage).toBe('DOWNLOAD_TRANSIENT: Gave up after 5 attempts: HTTP 503')
    expect(adapter.parse).not.toHaveBeenCalled()
  })

  it('keeps the run successful when notification dispatch throws', async () => {
    const t = setup([adapter])
    t.fetch.mockResolvedValue(downloaded('<sdnList>v1</sdnList>'))
    adapter.parse.mockReturnValue({ entities: [entity('OFAC-100', 'Example Trading LLC')], skipped: [] })
    t.dispatch.mockRejectedValueOnce(new Error('buffer closed'))

    const run = await t.orchestrator.run('OFAC')

    expect(run.status).toBe('Success')
    expect(await t.repository.getRun(run.runId)).toMatchObject({ status: 'Success' })
    expect(t.observer.stagesFor(run.runId)).toContainEqual(['Notifying', 'failed'])
  })

  it('releases the source lock before notifying', async () => {
    const t = setup([adapter])
    t.fetch.mockResolvedValue(downloaded('<sdnList>v1</sdnList>'))
    adapter.parse.mockReturnValue({ entities: [entity('OFAC-100', 'Example Trading LLC')], skipped: [] })
    const heldWhileNotifying: boolean[] = []
    t.dispatch.mockImplementationOnce(async () => {
      heldWhileNotifying.push(t.locks.isHeld('OFAC'))
      return []
    })

    const run = await t.orchestrator.run('OFAC')

    expect(heldWhileNotifying).toEqual([false])
    expect(run.status).toBe('Success')
    expect(t.observer.stagesFor(run.runId).slice(-4)).toEqual([
      ['Notifying', 'entered'],
      ['Notifying', 'succeeded'],
      ['Completed', 'succeeded'],
      ['Idle', 'entered'],
    ])
  })

  it('rejects a second trigger while the source is running', async () => {
    const t = setup([adapter])
    t.fetch.mockResolvedValue(downloaded('<sdnList>v1</sdnList>'))
    adapter.parse.mockReturnValue({ entities: [], skipped: [] })

    const results = await Promise.allSettled([t.orchestrator.runSource('OFAC'), t.orchestrator.runSource('OFAC')])

    expect(results[0]).toEqual({ status: 'fulfilled', value: 'OFAC_1768456800000' })
    expect(results[1]?.status).toBe('rejected')
    if (results[1]?.status === 'rejected') {
      expect(results[1].reason).toBeInstanceOf(ConflictError)
    }
    expect(t.fetch).toHaveBeenCalledTimes(1)
    expect(t.locks.isHeld('OFAC')).toBe(false)
  })

  it('fails an aborted run at the next stage boundary', async () => {
    const t = setup([adapter])
    t.fetch.mockImplementation(async () => {
      const [runId] = t.orchestrator.inFlight()
      if (runId) t.orchestrator.abort(runId, 'shutting down')
      return downloaded('<sdnList>v1</sdnList>')
    })

    const run = await t.orchestrator.run('OFAC')

    expect(run.status).toBe('Failed')
    expect(run.errorMessage).toBe('RUN_ABORTED: Run OFAC_1768456800000 shutting down')
    expect(t.orchestrator.inFlight()).toEqual([])
  })

  it('reports per-source outcomes from runAllSources', async () => {
    const un = new FakeAdapter('UN')
    const t = setup([adapter, un])
    t.fetch.mockResolvedValue(downloaded('<sdnList>v1</sdnList>'))
    adapter.parse.mockReturnValue({ entities: [], skipped: [] })
    await t.locks.acquire('UN', 1_000)

    const outcomes = await t.orchestrator.runAllSources()

    expect(outcomes).toEqual([
      { source: 'OFAC', ok: true, runId: 'OFAC_1768456800000', status: 'Success' },
      { source: 'UN', ok: false, error: 'RUN_CONFLICT: A run for UN is already running' },
    ])
  })

  it('summarizes recent runs and health for a source', async () => {
    const t = setup([adapter])
    t.fetch.mockResolvedValue(downloaded('<sdnList>v1</sdnList>'))
    adapter.parse.mockReturnValue({
      entities: [entity('OFAC-100', 'Example Trading LLC'), entity('OFAC-200', 'Sample Shipping Co')],
      skipped: [],
    })
    const first = await t.orchestrator.run('OFAC')

    t.advance(3_600_000)
    const status = await t.orchestrator.getSourceStatus('OFAC', 24)

    expect(status).toMatchObject({
      source: 'OFAC',
      windowHours: 24,
      totalRuns: 1,
      runsByStatus: { Running: 0, Success: 1, Failed: 0, Skipped: 0, Partial: 0 },
      changes: { added: 2, modified: 0, removed: 0 },
      riskCounts: { critical: 0, high: 2, medium: 0, low: 0 },
      healthy: true,
    })
    expect(status.lastRun?.runId).toBe(first.runId)
    expect(status.lastSuccessfulRun?.runId).toBe(first.runId)

    // Schedule is every 6 hours; 14 hours without a run is unhealthy
    t.advance(13 * 3_600_000)
    expect((await t.orchestrator.getSourceStatus('OFAC', 24)).healthy).toBe(false)
  })

  it('returns null for an unknown run id', async () => {
    const t = setup([adapter])
    expect(await t.orchestrator.getRunStatus('OFAC_1')).toBeNull()
  })
})
