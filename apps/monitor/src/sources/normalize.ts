/**
 * Shared entity normalization
 *
 * Every adapter builds entities through buildEntity() so that content
 * hashes compare across sources and across runs. The same canonical
 * field values drive the change detector's field-level comparison, so a
 * hash difference always shows up as at least one changed field.
 */

import { createHash } from 'node:crypto'
import {
  TRACKED_FIELDS,
  type CanonicalEntity,
  type EntityAddress,
  type EntityType,
  type SanctionSource,
  type TrackedField,
} from '@sanctionwatch/db'

export interface EntityDraft {
  uid: string
  name: string
  entityType: EntityType
  programs?: Array<string | null>
  aliases?: Array<string | null>
  addresses?: Array<Partial<EntityAddress>>
  datesOfBirth?: Array<string | null>
  placesOfBirth?: Array<string | null>
  nationalities?: Array<string | null>
  remarks?: string | null
}

export type TrackedFields = Pick<CanonicalEntity, TrackedField>

const ADDRESS_PARTS = ['street', 'city', 'stateOrProvince', 'postalCode', 'country'] as const

// ═══════════════════════════════════════════════════════════════════════════════
// Text cleanup
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Collapse whitespace and trim. Empty input becomes null.
 */
export function cleanText(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null
  const cleaned = value.replace(/\s+/g, ' ').trim()
  return cleaned.length > 0 ? cleaned : null
}

/**
 * Case- and width-insensitive form used for equality.
 */
export function comparisonKey(value: string): string {
  return value.normalize('NFKC').replace(/\s+/g, ' ').trim().toLowerCase()
}

/**
 * Clean every value, drop blanks and keep the first spelling of duplicates.
 */
export function cleanList(values: Array<string | null | undefined>): string[] {
  const seen = new Set<string>()
  const result: string[] = []
  for (const value of values) {
    const cleaned = cleanText(value)
    if (cleaned === null) continue
    const key = comparisonKey(cleaned)
    if (seen.has(key)) continue
    seen.add(key)
    result.push(cleaned)
  }
  return result
}

function addressKey(address: EntityAddress): string {
  return JSON.stringify(ADDRESS_PARTS.map(part => comparisonKey(address[part] ?? '')))
}

export function cleanAddresses(addresses: Array<Partial<EntityAddress>>): EntityAddress[] {
  const seen = new Set<string>()
  const result: EntityAddress[] = []
  for (const raw of addresses) {
    const address: EntityAddress = {
      street: cleanText(raw.street),
      city: cleanText(raw.city),
      stateOrProvince: cleanText(raw.stateOrProvince),
      postalCode: cleanText(raw.postalCode),
      country: cleanText(raw.country),
    }
    if (ADDRESS_PARTS.every(part => address[part] === null)) continue
    const key = addressKey(address)
    if (seen.has(key)) continue
    seen.add(key)
    result.push(address)
  }
  return result
}

// ═══════════════════════════════════════════════════════════════════════════════
// Canonical values and hashing
// ═══════════════════════════════════════════════════════════════════════════════

function sortedKeys(values: string[]): string[] {
  return [...new Set(values.map(comparisonKey))].sort()
}

/**
 * Order-independent, case-insensitive form of one field, as a string.
 * Two entities differ in a field exactly when these strings differ.
 */
export function canonicalFieldValue(field: TrackedField, entity: TrackedFields): string {
  switch (field) {
    case 'name':
      return JSON.stringify(comparisonKey(entity.name))
    case 'entityType':
      return JSON.stringify(entity.entityType)
    case 'remarks':
      return JSON.stringify(entity.remarks === null ? null : comparisonKey(entity.remarks))
    case 'addresses':
      return JSON.stringify([...new Set(entity.addresses.map(addressKey))].sort())
    case 'programs':
    case 'aliases':
    case 'datesOfBirth':
    case 'placesOfBirth':
    case 'nationalities':
      return JSON.stringify(sortedKeys(entity[field]))
  }
}

export function computeEntityHash(
  entity: TrackedFields & Pick<CanonicalEntity, 'uid' | 'source'>
): string {
  const canonical = [
    ['uid', entity.uid],
    ['source', entity.source],
    ...TRACKED_FIELDS.map(field => [field, canonicalFieldValue(field, entity)]),
  ]
  return createHash('sha256').update(JSON.stringify(canonical)).digest('hex')
}

/**
 * Build a canonical entity from adapter output.
 */
export function buildEntity(source: SanctionSource, draft: EntityDraft, lastSeen: Date): CanonicalEntity {
  const fields = {
    uid: draft.uid.trim(),
    source,
    name: cleanText(draft.name) ?? draft.uid.trim(),
    entityType: draft.entityType,
    programs: cleanList(draft.programs ?? []),
    aliases: cleanList(draft.aliases ?? []),
    addresses: cleanAddresses(draft.addresses ?? []),
    datesOfBirth: cleanList(draft.datesOfBirth ?? []),
    placesOfBirth: cleanList(draft.placesOfBirth ?? []),
    nationalities: cleanList(draft.nationalities ?? []),
    remarks: cleanText(draft.remarks),
  }

  return {
    ...fields,
    contentHash: computeEntityHash(fields),
    lastSeen,
  }
}
