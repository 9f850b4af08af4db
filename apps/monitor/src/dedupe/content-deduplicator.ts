/**
 * Content Deduplicator
 *
 * Skips reprocessing when a source republishes byte-identical content.
 * The raw payload is normalized before hashing so the digest does not
 * depend on a byte-order mark or on line-ending conversions by mirrors.
 * HTTP content encoding never reaches this point: fetch decodes it.
 *
 * A false negative only costs a parse and an empty diff.
 */

import { createHash } from 'node:crypto'
import type { SanctionSource, SanctionsRepository } from '@sanctionwatch/db'
import type { ILogger } from '@sanctionwatch/logger'
import { loggers } from '../config/logger.js'

const UTF8_BOM = Buffer.from([0xef, 0xbb, 0xbf])

/**
 * Drop a leading UTF-8 BOM and convert CRLF and CR line endings to LF.
 * latin1 round-trips every byte unchanged, so non-ASCII content is kept as-is.
 */
export function normalizeContent(raw: Buffer): Buffer {
  const withoutBom = raw.subarray(0, 3).equals(UTF8_BOM) ? raw.subarray(3) : raw
  if (!withoutBom.includes(0x0d)) {
    return withoutBom
  }
  return Buffer.from(withoutBom.toString('latin1').replace(/\r\n?/g, '\n'), 'latin1')
}

/**
 * sha256 hex digest of the normalized payload.
 */
export function computeContentHash(raw: Buffer): string {
  return createHash('sha256').update(normalizeContent(raw)).digest('hex')
}

export interface DedupeDecision {
  skip: boolean
  contentHash: string
  previousHash: string | null
}

export class ContentDeduplicator {
  private readonly log: ILogger

  constructor(
    private readonly repository: Pick<SanctionsRepository, 'getLatestSnapshot'>,
    logger: ILogger = loggers.dedupe
  ) {
    this.log = logger
  }

  /**
   * Hash the payload and compare it with the source's latest snapshot.
   */
  async check(source: SanctionSource, raw: Buffer): Promise<DedupeDecision> {
    const contentHash = computeContentHash(raw)
    const latest = await this.repository.getLatestSnapshot(source)
    const previousHash = latest?.contentHash ?? null
    const skip = previousHash === contentHash

    this.log.debug('CONTENT_HASH_COMPARED', {
      event_name: 'CONTENT_HASH_COMPARED',
      source,
      contentHash,
      previousHash,
      skip,
    })

    return { skip, contentHash, previousHash }
  }

  async shouldSkip(source: SanctionSource, raw: Buffer): Promise<boolean> {
    return (await this.check(source, raw)).skip
  }
}
