/**
 * OFAC SDN adapter
 *
 * Parses the Treasury's Specially Designated Nationals XML export
 * (`<sdnList>` of `<sdnEntry>`). The SDN uid is stable across
 * publications and used as-is.
 */

import type { CanonicalEntity, EntityType } from '@sanctionwatch/db'
import { ParseError } from '../../domain/errors.js'
import { assertContentShape } from '../content-checks.js'
import { collectEntities, recordPosition } from '../collect.js'
import { buildEntity } from '../normalize.js'
import type { FetchConfig, ParseResult, SourceAdapter, SourceMetadata } from '../types.js'
import { asArray, childNode, childNodes, childText, childTexts, isXmlNode, joinPresent } from '../xml.js'
import { buildFetchConfig, parseXmlRoot, XML_ACCEPT } from './shared.js'

export const OFAC_METADATA: SourceMetadata = {
  displayName: 'OFAC Specially Designated Nationals List',
  authority: 'U.S. Department of the Treasury, Office of Foreign Assets Control',
  region: 'United States',
  format: 'xml',
  defaultUrl: 'https://www.treasury.gov/ofac/downloads/sdn.xml',
  defaultSchedule: '0 */6 * * *',
  expectedEntityCount: 12_000,
  minContentBytes: 10_000,
}

const SDN_TYPES: Record<string, EntityType> = {
  individual: 'Person',
  entity: 'Company',
  vessel: 'Vessel',
  aircraft: 'Aircraft',
}

export class OfacAdapter implements SourceAdapter {
  readonly id = 'OFAC' as const
  readonly metadata: SourceMetadata

  constructor(metadata: Partial<SourceMetadata> = {}) {
    this.metadata = { ...OFAC_METADATA, ...metadata }
  }

  fetchConfig(urlOverride?: string): FetchConfig {
    return buildFetchConfig(this.metadata, XML_ACCEPT, urlOverride)
  }

  parse(raw: Buffer, observedAt: Date): ParseResult {
    const text = assertContentShape(raw, this.metadata)
    const root = parseXmlRoot(text, 'sdnList')

    return collectEntities(asArray(root.sdnEntry), (entry, index) => this.parseEntry(entry, index, observedAt), 'sdnEntry')
  }

  private parseEntry(entry: unknown, index: number, observedAt: Date): CanonicalEntity {
    if (!isXmlNode(entry)) {
      throw new ParseError('record', 'sdnEntry', 'Entry is empty', recordPosition(index))
    }

    const uid = childText(entry, 'uid')
    if (!uid) {
      throw new ParseError('record', 'uid', 'Missing uid', recordPosition(index))
    }

    const entityType = SDN_TYPES[(childText(entry, 'sdnType') ?? '').toLowerCase()] ?? 'Other'
    const firstName = childText(entry, 'firstName')
    const lastName = childText(entry, 'lastName')
    const title = childText(entry, 'title')

    const name = entityType === 'Person' && firstName ? joinPresent([firstName, lastName]) : lastName ?? title
    if (!name) {
      throw new ParseError('record', 'lastName', 'Entry has no name', uid)
    }

    return buildEntity(
      'OFAC',
      {
        uid,
        name,
        entityType,
        programs: childTexts(childNode(entry, 'programList'), 'program'),
        aliases: childNodes(childNode(entry, 'akaList'), 'aka').map(
          aka => joinPresent([childText(aka, 'firstName'), childText(aka, 'lastName')]) || childText(aka, 'title')
        ),
        addresses: childNodes(childNode(entry, 'addressList'), 'address').map(address => ({
          street: joinPresent(
            [childText(address, 'address1'), childText(address, 'address2'), childText(address, 'address3')],
            ', '
          ),
          city: childText(address, 'city'),
          stateOrProvince: childText(address, 'stateOrProvince'),
          postalCode: childText(address, 'postalCode'),
          country: childText(address, 'country'),
        })),
        datesOfBirth: childNodes(childNode(entry, 'dateOfBirthList'), 'dateOfBirthItem').map(item =>
          childText(item, 'dateOfBirth')
        ),
        placesOfBirth: childNodes(childNode(entry, 'placeOfBirthList'), 'placeOfBirthItem').map(item =>
          childText(item, 'placeOfBirth')
        ),
        nationalities: childNodes(childNode(entry, 'nationalityList'), 'nationality').map(item =>
          childText(item, 'country')
        ),
        remarks: childText(entry, 'remarks'),
      },
      observedAt
    )
  }
}
