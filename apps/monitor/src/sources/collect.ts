import type { CanonicalEntity } from '@sanctionwatch/db'
import { ParseError } from '../domain/errors.js'
import type { ParseResult } from './types.js'

/**
 * Run a per-record parser over every record of a payload.
 *
 * Record-level ParseErrors skip the record; anything else propagates.
 * A repeated uid skips the later record. A payload that yields no
 * entity at all is a format error: an empty list would read as every
 * subject being delisted.
 */
export function collectEntities<T>(
  records: T[],
  parseRecord: (record: T, index: number) => CanonicalEntity,
  recordLabel: string
): ParseResult {
  if (records.length === 0) {
    throw new ParseError('format', recordLabel, `No ${recordLabel} records found`)
  }

  const entities: CanonicalEntity[] = []
  const skipped: ParseError[] = []
  const seen = new Set<string>()

  records.forEach((record, index) => {
    try {
      const entity = parseRecord(record, index)
      if (seen.has(entity.uid)) {
        throw new ParseError('record', 'uid', 'Duplicate uid in payload', entity.uid)
      }
      seen.add(entity.uid)
      entities.push(entity)
    } catch (error) {
      if (error instanceof ParseError && error.level === 'record') {
        skipped.push(error)
        return
      }
      throw error
    }
  })

  if (entities.length === 0) {
    throw new ParseError('format', recordLabel, `All ${records.length} ${recordLabel} records failed to parse`)
  }

  return { entities, skipped }
}

/**
 * Label for a record that has no usable id yet: `#12`.
 */
export function recordPosition(index: number): string {
  return `#${index + 1}`
}
