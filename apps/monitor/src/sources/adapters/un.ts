/**
 * UN Security Council Consolidated List adapter
 *
 * The consolidated XML keeps individuals and entities in separate
 * sections with different element names. DATAID is only unique within
 * a section, so uids carry an IND/ENT prefix.
 */

import type { CanonicalEntity, EntityAddress } from '@sanctionwatch/db'
import { ParseError } from '../../domain/errors.js'
import { assertContentShape } from '../content-checks.js'
import { collectEntities, recordPosition } from '../collect.js'
import { buildEntity } from '../normalize.js'
import type { FetchConfig, ParseResult, SourceAdapter, SourceMetadata } from '../types.js'
import { asArray, childNode, childNodes, childText, childTexts, isXmlNode, joinPresent, type XmlNode } from '../xml.js'
import { buildFetchConfig, parseXmlRoot, XML_ACCEPT } from './shared.js'

export const UN_METADATA: SourceMetadata = {
  displayName: 'UN Security Council Consolidated List',
  authority: 'United Nations Security Council',
  region: 'International',
  format: 'xml',
  defaultUrl: 'https://scsanctions.un.org/resources/xml/en/consolidated.xml',
  defaultSchedule: '0 2 * * *',
  expectedEntityCount: 1_000,
  minContentBytes: 10_000,
}

type UnRecord = { kind: 'individual' | 'entity'; node: unknown }

function parseAddresses(nodes: XmlNode[]): Array<Partial<EntityAddress>> {
  return nodes.map(address => ({
    street: childText(address, 'STREET'),
    city: childText(address, 'CITY'),
    stateOrProvince: childText(address, 'STATE_PROVINCE'),
    postalCode: childText(address, 'ZIP_CODE'),
    country: childText(address, 'COUNTRY'),
  }))
}

function aliasNames(nodes: XmlNode[]): Array<string | null> {
  return nodes.map(alias => childText(alias, 'ALIAS_NAME'))
}

function listPrograms(node: XmlNode): Array<string | null> {
  return [childText(node, 'UN_LIST_TYPE'), childText(node, 'COMMITTEE')]
}

export class UnAdapter implements SourceAdapter {
  readonly id = 'UN' as const
  readonly metadata: SourceMetadata

  constructor(metadata: Partial<SourceMetadata> = {}) {
    this.metadata = { ...UN_METADATA, ...metadata }
  }

  fetchConfig(urlOverride?: string): FetchConfig {
    return buildFetchConfig(this.metadata, XML_ACCEPT, urlOverride)
  }

  parse(raw: Buffer, observedAt: Date): ParseResult {
    const text = assertContentShape(raw, this.metadata)
    const root = parseXmlRoot(text, 'CONSOLIDATED_LIST')

    const individuals = childNode(root, 'INDIVIDUALS')
    const entities = childNode(root, 'ENTITIES')
    const records: UnRecord[] = [
      ...asArray(individuals?.INDIVIDUAL).map(node => ({ kind: 'individual' as const, node })),
      ...asArray(entities?.ENTITY).map(node => ({ kind: 'entity' as const, node })),
    ]

    return collectEntities(
      records,
      (record, index) =>
        record.kind === 'individual'
          ? this.parseIndividual(record.node, index, observedAt)
          : this.parseEntity(record.node, index, observedAt),
      'INDIVIDUAL/ENTITY'
    )
  }

  private requireDataId(node: unknown, index: number): { node: XmlNode; dataId: string } {
    if (!isXmlNode(node)) {
      throw new ParseError('record', 'record', 'Record is empty', recordPosition(index))
    }
    const dataId = childText(node, 'DATAID')
    if (!dataId) {
      throw new ParseError('record', 'DATAID', 'Missing DATAID', recordPosition(index))
    }
    return { node, dataId }
  }

  private parseIndividual(raw: unknown, index: number, observedAt: Date): CanonicalEntity {
    const { node, dataId } = this.requireDataId(raw, index)
    const uid = `UN-IND-${dataId}`

    const name =
      joinPresent([
        childText(node, 'FIRST_NAME'),
        childText(node, 'SECOND_NAME'),
        childText(node, 'THIRD_NAME'),
        childText(node, 'FOURTH_NAME'),
      ]) || childText(node, 'NAME_ORIGINAL_SCRIPT')
    if (!name) {
      throw new ParseError('record', 'FIRST_NAME', 'Individual has no name', uid)
    }

    return buildEntity(
      'UN',
      {
        uid,
        name,
        entityType: 'Person',
        programs: listPrograms(node),
        aliases: aliasNames(childNodes(node, 'INDIVIDUAL_ALIAS')),
        addresses: parseAddresses(childNodes(node, 'INDIVIDUAL_ADDRESS')),
        datesOfBirth: childNodes(node, 'INDIVIDUAL_DATE_OF_BIRTH').map(
          dob => childText(dob, 'DATE') ?? childText(dob, 'YEAR')
        ),
        placesOfBirth: childNodes(node, 'INDIVIDUAL_PLACE_OF_BIRTH').map(place =>
          joinPresent([childText(place, 'CITY'), childText(place, 'STATE_PROVINCE'), childText(place, 'COUNTRY')], ', ')
        ),
        nationalities: childNodes(node, 'NATIONALITY').flatMap(nationality => childTexts(nationality, 'VALUE')),
        remarks: childText(node, 'COMMENTS1'),
      },
      observedAt
    )
  }

  private parseEntity(raw: unknown, index: number, observedAt: Date): CanonicalEntity {
    const { node, dataId } = this.requireDataId(raw, index)
    const uid = `UN-ENT-${dataId}`

    const name = childText(node, 'FIRST_NAME') ?? childText(node, 'NAME_ORIGINAL_SCRIPT')
    if (!name) {
      throw new ParseError('record', 'FIRST_NAME', 'Entity has no name', uid)
    }

    return buildEntity(
      'UN',
      {
        uid,
        name,
        entityType: 'Company',
        programs: listPrograms(node),
        aliases: aliasNames(childNodes(node, 'ENTITY_ALIAS')),
        addresses: parseAddresses(childNodes(node, 'ENTITY_ADDRESS')),
        remarks: childText(node, 'COMMENTS1'),
      },
      observedAt
    )
  }
}
