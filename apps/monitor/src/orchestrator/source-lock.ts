/**
 * Per-source mutual exclusion
 *
 * The orchestrator holds a source's lock from before beginRun until the
 * run's terminal record is written, so only one run per source is in
 * flight across every worker process. In Redis the lock is a renewing
 * lease (see @sanctionwatch/redis/lock).
 */

import { acquireLease, sourceLeaseKey, type LeaseRedisClient } from '@sanctionwatch/redis/lock'
import type { ILogger } from '@sanctionwatch/logger'
import { loggers } from '../config/logger.js'

export interface SourceLock {
  readonly source: string
  release(): Promise<void>
}

export interface SourceLockProvider {
  /** Null when another owner holds the source */
  acquire(source: string, ttlMs: number): Promise<SourceLock | null>
}

export class RedisSourceLockProvider implements SourceLockProvider {
  private readonly log: ILogger

  constructor(
    private readonly redis: LeaseRedisClient,
    logger: ILogger = loggers.orchestrator.child('lock')
  ) {
    this.log = logger
  }

  async acquire(source: string, ttlMs: number): Promise<SourceLock | null> {
    const lease = await acquireLease(this.redis, sourceLeaseKey(source), {
      ttlMs,
      onLost: (reason, error) => {
        this.log.warn('Source lock renewal stopped', { source, reason }, error)
      },
    })
    if (!lease) {
      this.log.debug('Source lock not available', { source })
      return null
    }
    this.log.debug('Source lock acquired', { source })

    return {
      source,
      release: async () => {
        try {
          if (await lease.release()) {
            this.log.debug('Source lock released', { source })
          } else {
            this.log.warn('Source lock had expired before release', { source })
          }
        } catch (error) {
          // The key expires on its own after ttlMs
          this.log.warn('Source lock release error', { source }, error)
        }
      },
    }
  }
}

/**
 * Locks that only exclude runs inside this process.
 */
export class InMemorySourceLockProvider implements SourceLockProvider {
  private readonly held = new Set<string>()

  async acquire(source: string, _ttlMs: number): Promise<SourceLock | null> {
    if (this.held.has(source)) return null
    this.held.add(source)
    return {
      source,
      release: async () => {
        this.held.delete(source)
      },
    }
  }

  isHeld(source: string): boolean {
    return this.held.has(source)
  }
}
