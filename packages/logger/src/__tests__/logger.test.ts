import { afterEach, describe, expect, it, vi } from 'vitest'
import { createLogger, redactContext, setLogSink, type LogEntry } from '../index.js'

describe('logger', () => {
  let restore: (() => void) | undefined

  afterEach(() => {
    restore?.()
    restore = undefined
    vi.unstubAllEnvs()
  })

  function capture(): LogEntry[] {
    const entries: LogEntry[] = []
    restore = setLogSink(entry => entries.push(entry))
    return entries
  }

  it('builds component paths and inherits context through children', () => {
    const entries = capture()
    const log = createLogger('monitor').child('download').child({ source: 'OFAC' }).child('retry')

    log.info('DOWNLOAD_RETRY', { attempt: 2 })

    expect(entries).toHaveLength(1)
    expect(entries[0]).toMatchObject({
      level: 'info',
      service: 'monitor',
      component: 'download:retry',
      message: 'DOWNLOAD_RETRY',
      source: 'OFAC',
      attempt: 2,
    })
  })

  it('drops entries below LOG_LEVEL', () => {
    vi.stubEnv('LOG_LEVEL', 'warn')
    const entries = capture()
    const log = createLogger('monitor')

    log.info('ignored')
    log.warn('kept')

    expect(entries.map(entry => entry.message)).toEqual(['kept'])
  })

  it('attaches error details', () => {
    const entries = capture()
    const error = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' })

    createLogger('monitor').error('Download failed', { source: 'UN' }, error)

    expect(entries[0]?.error).toMatchObject({ name: 'Error', message: 'socket hang up', code: 'ECONNRESET' })
  })
})

describe('redactContext', () => {
  it('masks secret-looking keys one level deep', () => {
    expect(
      redactContext({
        apiKey: 'test-secret',
        source: 'OFAC',
        channel: { webhookUrl: 'https://hooks.example.test/abc', id: 'slack' },
      })
    ).toEqual({
      apiKey: '[REDACTED]',
      source: 'OFAC',
      channel: { webhookUrl: '[REDACTED]', id: 'slack' },
    })
  })
})
