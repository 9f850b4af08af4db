import { SourceRegistry } from '../registry.js'
import type { SourceMetadata } from '../types.js'
import type { SanctionSource } from '@sanctionwatch/db'
import { OfacAdapter } from './ofac.js'
import { UkHmtAdapter } from './uk-hmt.js'
import { UnAdapter } from './un.js'

export { OfacAdapter, OFAC_METADATA } from './ofac.js'
export { UnAdapter, UN_METADATA } from './un.js'
export { UkHmtAdapter, UK_HMT_METADATA, UK_HMT_REQUIRED_HEADERS } from './uk-hmt.js'

export type MetadataOverrides = Partial<Record<SanctionSource, Partial<SourceMetadata>>>

/**
 * Registry with every built-in source.
 */
export function createDefaultRegistry(overrides: MetadataOverrides = {}): SourceRegistry {
  return new SourceRegistry([
    new OfacAdapter(overrides.OFAC),
    new UnAdapter(overrides.UN),
    new UkHmtAdapter(overrides.UK_HMT),
  ])
}
