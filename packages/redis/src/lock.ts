/**
 * Renewing leases
 *
 * A lease is a key set with SET NX PX to a random owner token. While it
 * is held a background timer pushes the expiry forward; release and
 * renewal are compare-and-act Lua scripts, so an owner whose lease has
 * already expired can never delete or extend someone else's.
 */

import { randomUUID } from 'node:crypto'
import type { Redis } from 'ioredis'

const DELETE_IF_OWNER = `
  if redis.call("get", KEYS[1]) == ARGV[1] then
    return redis.call("del", KEYS[1])
  end
  return 0
`

const PEXPIRE_IF_OWNER = `
  if redis.call("get", KEYS[1]) == ARGV[1] then
    return redis.call("pexpire", KEYS[1], ARGV[2])
  end
  return 0
`

const SOURCE_LEASE_PREFIX = 'sanctionwatch:source-lock:'
const MAX_RENEW_EVERY_MS = 30_000
const MIN_RENEW_EVERY_MS = 1_000

/** Commands a lease issues; a full ioredis client satisfies it */
export type LeaseRedisClient = Pick<Redis, 'set' | 'eval'>

export type LeaseLostReason = 'expired' | 'error'

export interface LeaseOptions {
  ttlMs: number
  /** Called once when renewal stops before release */
  onLost?: (reason: LeaseLostReason, error?: unknown) => void
}

export interface Lease {
  readonly key: string
  readonly token: string
  /** False when the lease had already expired or changed owner */
  release(): Promise<boolean>
}

export function sourceLeaseKey(source: string): string {
  return `${SOURCE_LEASE_PREFIX}${source}`
}

/**
 * Renew at a third of the TTL, between 1s and 30s.
 */
export function renewEveryMs(ttlMs: number): number {
  return Math.min(MAX_RENEW_EVERY_MS, Math.max(MIN_RENEW_EVERY_MS, Math.floor(ttlMs / 3)))
}

async function runIfOwner(redis: LeaseRedisClient, script: string, key: string, token: string, ...args: string[]) {
  const result = await redis.eval(script, 1, key, token, ...args)
  return Number(result) === 1
}

/**
 * Take the lease on `key`, or null when another owner holds it.
 * Redis errors propagate.
 */
export async function acquireLease(
  redis: LeaseRedisClient,
  key: string,
  options: LeaseOptions
): Promise<Lease | null> {
  const token = randomUUID()
  const { ttlMs, onLost } = options
  if ((await redis.set(key, token, 'PX', ttlMs, 'NX')) !== 'OK') {
    return null
  }

  let renewing = true
  const stopRenewing = (reason?: LeaseLostReason, error?: unknown) => {
    if (!renewing) return
    renewing = false
    clearInterval(timer)
    if (reason) onLost?.(reason, error)
  }

  const timer = setInterval(() => {
    runIfOwner(redis, PEXPIRE_IF_OWNER, key, token, ttlMs.toString())
      .then(extended => {
        if (!extended) stopRenewing('expired')
      })
      .catch(error => stopRenewing('error', error))
  }, renewEveryMs(ttlMs))
  timer.unref()

  return {
    key,
    token,
    release: async () => {
      stopRenewing()
      return runIfOwner(redis, DELETE_IF_OWNER, key, token)
    },
  }
}
