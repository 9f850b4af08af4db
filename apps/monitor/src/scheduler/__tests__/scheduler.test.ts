import { describe, it, expect, vi } from 'vitest'
import type { MonitorSettings } from '../../config/settings.js'
import { OfacAdapter, UnAdapter } from '../../sources/adapters/index.js'
import { SourceRegistry } from '../../sources/registry.js'
import { scheduleIntervalMs, nextRunAt } from '../cron.js'
import { SourceScheduler } from '../scheduler.js'

const settings: Pick<MonitorSettings, 'run' | 'sources'> = {
  run: { maxLifetimeMs: 7_200_000, sweepIntervalMs: 300_000, workerConcurrency: 2, lockTtlMs: 600_000, schedulerEnabled: true },
  sources: {
    OFAC: { url: undefined, schedule: undefined },
    UN: { url: undefined, schedule: '30 1 * * *' },
    UK_HMT: { url: undefined, schedule: undefined },
  },
}

function fakeQueue(repeatable: Array<{ name: string; key: string }> = []) {
  return {
    add: vi.fn().mockResolvedValue({ id: 'job-1' }),
    getRepeatableJobs: vi.fn().mockResolvedValue(repeatable),
    removeRepeatableByKey: vi.fn().mockResolvedValue(true),
  }
}

const clock = () => new Date('2026-01-15T07:00:00Z')

describe('cron helpers', () => {
  it('measures the gap between firings', () => {
    expect(scheduleIntervalMs('0 */6 * * *', new Date('2026-01-15T07:00:00Z'))).toBe(6 * 3_600_000)
    expect(scheduleIntervalMs('0 3 * * *', new Date('2026-01-15T07:00:00Z'))).toBe(24 * 3_600_000)
  })

  it('finds the next firing in UTC', () => {
    expect(nextRunAt('0 */6 * * *', new Date('2026-01-15T07:00:00Z')).toISOString()).toBe('2026-01-15T12:00:00.000Z')
  })
})

describe('SourceScheduler', () => {
  it('uses per-source overrides over adapter defaults', () => {
    const registry = new SourceRegistry([new OfacAdapter(), new UnAdapter()])
    const scheduler = new SourceScheduler(fakeQueue(), registry, settings, { clock })

    expect(scheduler.schedules()).toEqual([
      { source: 'OFAC', pattern: '0 */6 * * *', nextRunAt: new Date('2026-01-15T12:00:00Z') },
      { source: 'UN', pattern: '30 1 * * *', nextRunAt: new Date('2026-01-16T01:30:00Z') },
    ])
  })

  it('replaces stale repeatable jobs with one per source and a sweep', async () => {
    const queue = fakeQueue([
      { name: 'RUN_SOURCE', key: 'old-ofac' },
      { name: 'SOMETHING_ELSE', key: 'unrelated' },
    ])
    const registry = new SourceRegistry([new OfacAdapter(), new UnAdapter()])
    const scheduler = new SourceScheduler(queue, registry, settings, { clock })

    await scheduler.start()

    expect(queue.removeRepeatableByKey.mock.calls).toEqual([['old-ofac']])
    expect(queue.add.mock.calls).toEqual([
      [
        'RUN_SOURCE',
        { kind: 'run-source', source: 'OFAC', forceRefresh: false, trigger: 'SCHEDULED' },
        { repeat: { pattern: '0 */6 * * *', tz: 'UTC' }, jobId: 'scheduled-OFAC' },
      ],
      [
        'RUN_SOURCE',
        { kind: 'run-source', source: 'UN', forceRefresh: false, trigger: 'SCHEDULED' },
        { repeat: { pattern: '30 1 * * *', tz: 'UTC' }, jobId: 'scheduled-UN' },
      ],
      ['SWEEP_STALE_RUNS', { kind: 'sweep-stale-runs' }, { repeat: { every: 300_000 }, jobId: 'scheduled-sweep' }],
    ])
    expect(scheduler.isRunning()).toBe(true)
  })

  it('propagates setup failures', async () => {
    const queue = fakeQueue()
    queue.getRepeatableJobs.mockRejectedValueOnce(new Error('redis unavailable'))
    const scheduler = new SourceScheduler(queue, new SourceRegistry([new OfacAdapter()]), settings, { clock })

    await expect(scheduler.start()).rejects.toThrow('redis unavailable')
    expect(scheduler.isRunning()).toBe(false)
  })

  it('enqueues manual runs for known sources only', async () => {
    const queue = fakeQueue()
    const scheduler = new SourceScheduler(queue, new SourceRegistry([new OfacAdapter()]), settings, { clock })

    await expect(scheduler.trigger('OFAC', true)).resolves.toBe('job-1')
    expect(queue.add).toHaveBeenCalledWith('RUN_SOURCE', {
      kind: 'run-source',
      source: 'OFAC',
      forceRefresh: true,
      trigger: 'MANUAL',
    })
    await expect(scheduler.trigger('EU', false)).rejects.toThrow('No adapter registered for source EU')
  })
})
