import { XMLValidator } from 'fast-xml-parser'
import { ParseError } from '../../domain/errors.js'
import { createXmlParser, isXmlNode, type XmlNode } from '../xml.js'
import type { FetchConfig, SourceMetadata } from '../types.js'

export const XML_ACCEPT = 'application/xml, text/xml;q=0.9, */*;q=0.5'
export const CSV_ACCEPT = 'text/csv, text/plain;q=0.9, */*;q=0.5'

export function buildFetchConfig(metadata: SourceMetadata, accept: string, urlOverride?: string): FetchConfig {
  return {
    url: urlOverride ?? metadata.defaultUrl,
    headers: { Accept: accept },
  }
}

/**
 * Validate and parse an XML document, returning its root element.
 */
export function parseXmlRoot(text: string, rootName: string): XmlNode {
  const validation = XMLValidator.validate(text)
  if (validation !== true) {
    throw new ParseError(
      'format',
      'xml',
      `Malformed XML at line ${validation.err.line}: ${validation.err.msg}`
    )
  }

  const document: unknown = createXmlParser().parse(text)
  const root = isXmlNode(document) ? document[rootName] : undefined
  // <root></root> parses to an empty string
  if (root === '') return {}
  if (!isXmlNode(root)) {
    throw new ParseError('format', rootName, `Missing <${rootName}> root element`)
  }
  return root
}
