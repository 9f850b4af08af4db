/**
 * Source adapter contracts
 *
 * An adapter knows where one authority publishes its list and how to
 * turn the raw payload into canonical entities. Downloading, dedupe and
 * diffing are shared and live elsewhere.
 */

import type { CanonicalEntity, SanctionSource } from '@sanctionwatch/db'
import type { ParseError } from '../domain/errors.js'

export type ContentKind = 'xml' | 'csv'

export interface SourceMetadata {
  displayName: string
  authority: string
  region: string
  format: ContentKind
  /** Default download location, overridable per deployment */
  defaultUrl: string
  /** Cron pattern, evaluated in UTC */
  defaultSchedule: string
  /** Rough list size, for sanity checks and the CLI listing */
  expectedEntityCount: number
  /** Payloads smaller than this are treated as a changed or broken format */
  minContentBytes: number
}

export interface FetchConfig {
  url: string
  headers: Record<string, string>
  /** Overrides the download manager's default timeout */
  timeoutMs?: number
}

export interface ParseResult {
  entities: CanonicalEntity[]
  /** Record-level failures; the records were left out */
  skipped: ParseError[]
}

export interface SourceAdapter {
  readonly id: SanctionSource
  readonly metadata: SourceMetadata

  fetchConfig(urlOverride?: string): FetchConfig

  /**
   * Parse a downloaded payload.
   * @throws ParseError with level `format` when the payload is not the expected layout
   */
  parse(raw: Buffer, observedAt: Date): ParseResult
}
