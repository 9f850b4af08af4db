/**
 * Helpers for walking fast-xml-parser output without trusting its shape.
 */

import { XMLParser } from 'fast-xml-parser'

export type XmlNode = Record<string, unknown>

export function createXmlParser(): XMLParser {
  return new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    removeNSPrefix: true,
    trimValues: true,
    // Keep identifiers like "0012" intact
    parseTagValue: false,
    parseAttributeValue: false,
  })
}

export function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null || value === '') return []
  return Array.isArray(value) ? value : [value]
}

/**
 * Text content of a leaf, or null when empty.
 */
export function textOf(value: unknown): string | null {
  if (typeof value === 'string') {
    const trimmed = value.trim()
    return trimmed.length > 0 ? trimmed : null
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value)
  }
  if (isXmlNode(value)) {
    return textOf(value['#text'])
  }
  return null
}

export function childText(node: XmlNode, key: string): string | null {
  return textOf(node[key])
}

export function childNode(node: XmlNode, key: string): XmlNode | null {
  const value = node[key]
  return isXmlNode(value) ? value : null
}

/**
 * All element children under `key`, whether the parser produced one or many.
 */
export function childNodes(node: XmlNode | null, key: string): XmlNode[] {
  if (!node) return []
  return asArray(node[key]).filter(isXmlNode)
}

/**
 * Text of every `key` child, for lists of leaves like <program>.
 */
export function childTexts(node: XmlNode | null, key: string): string[] {
  if (!node) return []
  return asArray(node[key])
    .map(textOf)
    .filter((text): text is string => text !== null)
}

export function joinPresent(parts: Array<string | null>, separator = ' '): string {
  return parts.filter((part): part is string => part !== null && part.length > 0).join(separator)
}
