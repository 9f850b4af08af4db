/**
 * Download Manager
 *
 * Shared fetch layer for every source adapter.
 * - Retries transient failures (timeouts, 408/429/5xx, connection resets)
 *   with exponential backoff and jitter, up to a maximum attempt count
 * - Fails fast on permanent failures (other 4xx, TLS certificate errors,
 *   oversized bodies)
 * - Spaces requests per source through a SourceRateLimiter
 * - Caps open connections across all sources with one shared Semaphore
 *
 * Stateless across calls apart from those two shared limits.
 */

import type { ILogger } from '@sanctionwatch/logger'
import { loggers } from '../config/logger.js'
import type { DownloadSettings } from '../config/settings.js'
import { DownloadError } from '../domain/errors.js'
import type { FetchConfig } from '../sources/types.js'
import { computeBackoffDelay } from '../utils/backoff.js'
import { Semaphore } from '../utils/semaphore.js'
import { sleep as defaultSleep, type Sleep } from '../utils/time.js'
import type { SourceRateLimiter } from './rate-limiter.js'

export interface HttpMetadata {
  /** Final URL after redirects */
  url: string
  statusCode: number
  contentType: string | null
  etag: string | null
  lastModified: string | null
  sizeBytes: number
  fetchedAt: Date
}

export interface DownloadResult {
  body: Buffer
  metadata: HttpMetadata
  /** Attempts beyond the first */
  retryCount: number
  durationMs: number
}

export interface DownloadRequest {
  source: string
  config: FetchConfig
  signal?: AbortSignal
  /** Called before each retry with the attempt that failed */
  onRetry?: (attempt: number, error: DownloadError) => void
}

export interface DownloadManagerOptions {
  settings: DownloadSettings
  rateLimiter: SourceRateLimiter
  /** Global connection cap; built from settings.maxConnections when omitted */
  connections?: Semaphore
  sleep?: Sleep
  random?: () => number
  logger?: ILogger
}

const RETRYABLE_STATUS_CODES = new Set([408, 425, 429])

const PERMANENT_NETWORK_CODES = new Set([
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'ERR_TLS_CERT_ALTNAME_INVALID',
  'ERR_INVALID_URL',
])

export function isRetryableStatus(status: number): boolean {
  return status >= 500 || RETRYABLE_STATUS_CODES.has(status)
}

function errorCode(error: unknown): string | null {
  if (!(error instanceof Error)) return null
  if ('code' in error && typeof error.code === 'string') return error.code
  // undici wraps the socket error: TypeError('fetch failed', { cause })
  return error.cause === undefined ? null : errorCode(error.cause)
}

/**
 * Map a thrown fetch failure to a DownloadError.
 */
export function classifyNetworkError(error: unknown): DownloadError {
  const code = errorCode(error)
  const detail = error instanceof Error ? error.message : String(error)
  const message = code ? `${detail} (${code})` : detail

  if (code !== null && PERMANENT_NETWORK_CODES.has(code)) {
    return new DownloadError(message, 'permanent', null, { cause: error })
  }
  return new DownloadError(message, 'transient', null, { cause: error })
}

export class DownloadManager {
  private readonly settings: DownloadSettings
  private readonly rateLimiter: SourceRateLimiter
  private readonly connections: Semaphore
  private readonly sleep: Sleep
  private readonly random: () => number
  private readonly log: ILogger

  constructor(options: DownloadManagerOptions) {
    this.settings = options.settings
    this.rateLimiter = options.rateLimiter
    this.connections = options.connections ?? new Semaphore(options.settings.maxConnections)
    this.sleep = options.sleep ?? defaultSleep
    this.random = options.random ?? Math.random
    this.log = options.logger ?? loggers.download
  }

  /**
   * Download one payload.
   * @throws DownloadError when the failure is permanent or attempts run out
   */
  async fetch(request: DownloadRequest): Promise<DownloadResult> {
    const { source, config, signal } = request
    const log = this.log.child({ source, url: config.url })
    const startTime = Date.now()
    const maxAttempts = this.settings.maxAttempts

    for (let attempt = 1; ; attempt++) {
      signal?.throwIfAborted()
      await this.rateLimiter.acquire(source, signal)

      try {
        const { body, metadata } = await this.connections.run(() => this.fetchOnce(config, signal))
        const durationMs = Date.now() - startTime

        log.info('DOWNLOAD_COMPLETED', {
          event_name: 'DOWNLOAD_COMPLETED',
          statusCode: metadata.statusCode,
          sizeBytes: metadata.sizeBytes,
          attempts: attempt,
          durationMs,
        })

        return { body, metadata, retryCount: attempt - 1, durationMs }
      } catch (error) {
        if (signal?.aborted) throw signal.reason
        if (!(error instanceof DownloadError)) throw error

        if (error.kind === 'permanent') {
          log.error('DOWNLOAD_FAILED', {
            event_name: 'DOWNLOAD_FAILED',
            kind: 'permanent',
            statusCode: error.statusCode,
            attempts: attempt,
          }, error)
          throw error
        }

        if (attempt >= maxAttempts) {
          log.error('DOWNLOAD_FAILED', {
            event_name: 'DOWNLOAD_FAILED',
            kind: 'exhausted',
            statusCode: error.statusCode,
            attempts: attempt,
          }, error)
          throw new DownloadError(
            `Gave up after ${attempt} attempts: ${error.message}`,
            'transient',
            error.statusCode,
            { cause: error }
          )
        }

        const delayMs = computeBackoffDelay(attempt, this.settings.initialDelayMs, this.settings.maxDelayMs, this.random)
        log.warn('DOWNLOAD_RETRY', {
          event_name: 'DOWNLOAD_RETRY',
          attempt,
          maxAttempts,
          delayMs,
          statusCode: error.statusCode,
          reason: error.message,
        })
        request.onRetry?.(attempt, error)
        await this.sleep(delayMs)
      }
    }
  }

  /**
   * Single attempt, no retries.
   */
  private async fetchOnce(
    config: FetchConfig,
    signal: AbortSignal | undefined
  ): Promise<{ body: Buffer; metadata: HttpMetadata }> {
    const timeoutMs = config.timeoutMs ?? this.settings.timeoutMs
    const controller = new AbortController()
    let timedOut = false
    const timeoutId = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, timeoutMs)
    const forwardAbort = () => controller.abort()
    signal?.addEventListener('abort', forwardAbort, { once: true })

    try {
      const response = await fetch(config.url, {
        method: 'GET',
        headers: {
          'User-Agent': this.settings.userAgent,
          'Accept-Encoding': 'gzip, deflate',
          ...config.headers,
        },
        signal: controller.signal,
        redirect: 'follow',
      })

      if (!response.ok) {
        await response.body?.cancel()
        const kind = isRetryableStatus(response.status) ? 'transient' : 'permanent'
        throw new DownloadError(`HTTP ${response.status}: ${response.statusText}`, kind, response.status)
      }

      const contentLength = Number(response.headers.get('content-length') ?? '')
      if (Number.isFinite(contentLength) && contentLength > this.settings.maxBytes) {
        await response.body?.cancel()
        throw new DownloadError(
          `Response too large: ${contentLength} bytes exceeds ${this.settings.maxBytes}`,
          'permanent',
          response.status
        )
      }

      const body = await this.readBodyWithLimit(response)

      return {
        body,
        metadata: {
          url: response.url || config.url,
          statusCode: response.status,
          contentType: response.headers.get('content-type'),
          etag: response.headers.get('etag'),
          lastModified: response.headers.get('last-modified'),
          sizeBytes: body.length,
          fetchedAt: new Date(),
        },
      }
    } catch (error) {
      if (error instanceof DownloadError) throw error
      if (timedOut) {
        throw new DownloadError(`Request timed out after ${timeoutMs}ms`, 'transient', null, { cause: error })
      }
      if (signal?.aborted) throw error
      throw classifyNetworkError(error)
    } finally {
      clearTimeout(timeoutId)
      signal?.removeEventListener('abort', forwardAbort)
    }
  }

  /**
   * Read the body, giving up once it exceeds settings.maxBytes.
   */
  private async readBodyWithLimit(response: Response): Promise<Buffer> {
    const reader = response.body?.getReader()
    if (!reader) {
      return Buffer.alloc(0)
    }

    const chunks: Uint8Array[] = []
    let totalSize = 0

    try {
      while (true) {
        const { done, value } = await reader.read()
        if (done) break

        totalSize += value.length
        if (totalSize > this.settings.maxBytes) {
          await reader.cancel()
          throw new DownloadError(
            `Response exceeded size limit of ${this.settings.maxBytes} bytes`,
            'permanent',
            response.status
          )
        }
        chunks.push(value)
      }
      return Buffer.concat(chunks)
    } finally {
      reader.releaseLock()
    }
  }
}
