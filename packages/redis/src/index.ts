/**
 * @sanctionwatch/redis - Shared Redis connection utilities
 *
 * One place for Redis connection configuration across the monitor's
 * worker, scheduler and CLI. BullMQ queues and workers, the download
 * rate limiter and the per-source run locks all connect through here.
 */

import { Redis, type RedisOptions } from 'ioredis'
import { createLogger } from '@sanctionwatch/logger'

const log = createLogger('redis')

// =============================================================================
// Configuration Parsing
// =============================================================================

export interface RedisConfig {
  host: string
  port: number
  password: string | undefined
  redisUrl: string | undefined
}

/**
 * Parse Redis configuration from environment variables.
 *
 * - REDIS_URL: Full URL (e.g., redis://:password@host:port), split into components
 * - REDIS_HOST/PORT/PASSWORD: Individual variables, used when REDIS_URL is absent
 *   or cannot be parsed
 */
export function parseRedisConfig(env: NodeJS.ProcessEnv = process.env): RedisConfig {
  const redisUrl = env.REDIS_URL

  if (redisUrl) {
    if (URL.canParse(redisUrl)) {
      const url = new URL(redisUrl)
      return {
        host: url.hostname,
        port: parseInt(url.port || '6379', 10),
        password: url.password ? decodeURIComponent(url.password) : undefined,
        redisUrl,
      }
    }
    log.warn('Failed to parse REDIS_URL, falling back to REDIS_HOST/PORT')
  }

  return {
    host: env.REDIS_HOST || 'localhost',
    port: parseInt(env.REDIS_PORT || '6379', 10),
    password: env.REDIS_PASSWORD || undefined,
    redisUrl: undefined,
  }
}

/**
 * Connection description for logs, password masked.
 */
export function describeRedisConfig(config: RedisConfig): string {
  return config.redisUrl ? config.redisUrl.replace(/\/\/([^:@/]*):[^@]+@/, '//$1:***@') : `${config.host}:${config.port}`
}

// =============================================================================
// Connection Options
// =============================================================================

const RECONNECT_ERRORS = ['READONLY', 'ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'EHOSTUNREACH', 'ENETUNREACH', 'ENOTFOUND']

const CIRCUIT_BREAKER_ATTEMPTS = 20
const MAX_RECONNECT_DELAY_MS = 30_000

/**
 * Build ioredis options with keepalive and capped reconnect backoff.
 * `maxRetriesPerRequest` is null because BullMQ workers require it.
 */
export function buildRedisOptions(config: RedisConfig = parseRedisConfig()): RedisOptions {
  const target = describeRedisConfig(config)
  let lastCircuitBreakerLog = 0

  return {
    host: config.host,
    port: config.port,
    password: config.password,
    maxRetriesPerRequest: null,
    keepAlive: 10_000,
    connectTimeout: 10_000,
    commandTimeout: 30_000,
    enableOfflineQueue: true,

    retryStrategy(times: number) {
      if (times > CIRCUIT_BREAKER_ATTEMPTS) {
        // Log once per minute during a prolonged outage
        const now = Date.now()
        if (now - lastCircuitBreakerLog > 60_000) {
          lastCircuitBreakerLog = now
          log.error('Circuit breaker: prolonged outage', { attempts: times, connection: target })
        }
        return MAX_RECONNECT_DELAY_MS
      }

      const delay = Math.min(times * 500, MAX_RECONNECT_DELAY_MS)
      log.info('Reconnecting', { attempt: times, delayMs: delay })
      return delay
    },

    reconnectOnError(err: Error) {
      return RECONNECT_ERRORS.some(code => err.message.includes(code))
    },
  }
}

// =============================================================================
// Client Factory Functions
// =============================================================================

/**
 * Create a dedicated Redis client (BullMQ connections, blocking commands).
 */
export function createRedisClient(config: RedisConfig = parseRedisConfig()): Redis {
  return new Redis(buildRedisOptions(config))
}

let singletonClient: Redis | null = null

/**
 * Shared client for short commands (locks, rate limiting).
 * Lazily created on first call.
 */
export function getRedisClient(): Redis {
  if (!singletonClient) {
    const config = parseRedisConfig()
    const client = new Redis(buildRedisOptions(config))

    client.on('error', (err: Error) => {
      log.error('Connection error', { connection: describeRedisConfig(config) }, err)
    })

    client.on('connect', () => {
      log.info('Connected', { connection: describeRedisConfig(config) })
    })

    singletonClient = client
  }
  return singletonClient
}

/**
 * Quit the shared client. Safe to call when none was created.
 */
export async function disconnectRedis(): Promise<void> {
  if (singletonClient) {
    const client = singletonClient
    singletonClient = null
    await client.quit()
  }
}

// =============================================================================
// Warmup
// =============================================================================

/**
 * Ping Redis with retries before starting workers.
 * Returns false when every attempt failed.
 */
export async function warmupRedis(maxAttempts = 5, config: RedisConfig = parseRedisConfig()): Promise<boolean> {
  const target = describeRedisConfig(config)

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const client = new Redis({
      host: config.host,
      port: config.port,
      password: config.password,
      maxRetriesPerRequest: 1,
      retryStrategy: () => null,
      connectTimeout: 5_000,
      lazyConnect: true,
    })

    try {
      log.info('Warmup attempt', { attempt, maxAttempts, connection: target })
      await client.connect()
      await client.ping()
      log.info('Warmup successful', { connection: target })
      return true
    } catch (error) {
      log.warn('Warmup failed', { attempt, connection: target }, error)
      if (attempt < maxAttempts) {
        const delayMs = Math.min(2_000 * Math.pow(2, attempt - 1), MAX_RECONNECT_DELAY_MS)
        await new Promise(resolve => setTimeout(resolve, delayMs))
      }
    } finally {
      client.disconnect()
    }
  }

  log.error('Warmup failed after all attempts', { maxAttempts, connection: target })
  return false
}

export { Redis }
export type { RedisOptions }
