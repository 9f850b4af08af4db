/**
 * Per-source request spacing
 *
 * Each source gets at most one request per `minIntervalMs`, across every
 * worker process when the Redis implementation is used. acquire() blocks
 * until the caller may send its request.
 */

import type { Redis } from '@sanctionwatch/redis'
import { sleep as defaultSleep, type Sleep } from '../utils/time.js'

export interface SourceRateLimiter {
  acquire(source: string, signal?: AbortSignal): Promise<void>
}

/** Key prefix for rate limiter state in Redis */
const REDIS_KEY_PREFIX = 'sanctionwatch:ratelimit:'

/**
 * Claim the slot for PX ms if it is free; otherwise report how long
 * the current holder still has.
 * Returns 0 when acquired, else the wait in ms.
 */
const ACQUIRE_SLOT_SCRIPT = `
  local claimed = redis.call('SET', KEYS[1], ARGV[1], 'PX', ARGV[2], 'NX')
  if claimed then
    return 0
  end
  local ttl = redis.call('PTTL', KEYS[1])
  if ttl < 0 then
    redis.call('PEXPIRE', KEYS[1], ARGV[2])
    return tonumber(ARGV[2])
  end
  return ttl
`

export type RateLimitRedisClient = Pick<Redis, 'eval'>

export interface RateLimiterOptions {
  minIntervalMs: number
  sleep?: Sleep
}

export class RedisRateLimiter implements SourceRateLimiter {
  private readonly minIntervalMs: number
  private readonly sleep: Sleep

  constructor(
    private readonly redis: RateLimitRedisClient,
    options: RateLimiterOptions
  ) {
    this.minIntervalMs = options.minIntervalMs
    this.sleep = options.sleep ?? defaultSleep
  }

  async acquire(source: string, signal?: AbortSignal): Promise<void> {
    if (this.minIntervalMs <= 0) return

    const key = `${REDIS_KEY_PREFIX}${source}`
    while (true) {
      signal?.throwIfAborted()
      const result = await this.redis.eval(
        ACQUIRE_SLOT_SCRIPT,
        1,
        key,
        Date.now().toString(),
        this.minIntervalMs.toString()
      )
      const waitMs = typeof result === 'number' ? result : this.minIntervalMs
      if (waitMs <= 0) return
      await this.sleep(waitMs)
    }
  }
}

/**
 * Single-process limiter, used by the CLI and in tests.
 */
export class InMemoryRateLimiter implements SourceRateLimiter {
  private readonly minIntervalMs: number
  private readonly sleep: Sleep
  private readonly nextSlot = new Map<string, number>()

  constructor(
    options: RateLimiterOptions,
    private readonly now: () => number = Date.now
  ) {
    this.minIntervalMs = options.minIntervalMs
    this.sleep = options.sleep ?? defaultSleep
  }

  async acquire(source: string, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted()
    if (this.minIntervalMs <= 0) return

    // Reserve the slot before waiting so concurrent callers queue up behind it
    const now = this.now()
    const slot = Math.max(now, this.nextSlot.get(source) ?? 0)
    this.nextSlot.set(source, slot + this.minIntervalMs)

    const waitMs = slot - now
    if (waitMs > 0) {
      await this.sleep(waitMs)
      signal?.throwIfAborted()
    }
  }
}
