import { ParseError } from '../domain/errors.js'
import type { SourceMetadata } from './types.js'

const UTF8_BOM = '\uFEFF'

/**
 * Reject payloads that cannot be the list we expect before parsing them:
 * truncated downloads, HTML error pages served with 200, a CSV without
 * its header row.
 *
 * @param requiredHeaders CSV column names that must appear in the first lines
 */
export function assertContentShape(
  raw: Buffer,
  metadata: SourceMetadata,
  requiredHeaders: string[] = []
): string {
  if (raw.length < metadata.minContentBytes) {
    throw new ParseError(
      'format',
      'content',
      `Payload is ${raw.length} bytes, expected at least ${metadata.minContentBytes}`
    )
  }

  let text = raw.toString('utf8')
  if (text.startsWith(UTF8_BOM)) {
    text = text.slice(1)
  }
  const head = text.slice(0, 4096).trimStart()

  if (metadata.format === 'xml') {
    if (!head.startsWith('<')) {
      throw new ParseError('format', 'content', 'Payload is not XML')
    }
    if (/^<!doctype html|^<html/i.test(head)) {
      throw new ParseError('format', 'content', 'Payload is an HTML page, not the sanctions list')
    }
    return text
  }

  const missing = requiredHeaders.filter(header => !head.includes(header))
  if (missing.length > 0) {
    throw new ParseError('format', 'header', `Missing CSV columns: ${missing.join(', ')}`)
  }
  return text
}
