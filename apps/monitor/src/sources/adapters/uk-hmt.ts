/**
 * UK HM Treasury Consolidated List adapter
 *
 * The CSV export has one row per name: a "Primary name" row plus one row
 * for each alias, all sharing a Group ID. Rows are grouped into one
 * entity per Group ID; the primary row supplies every other field.
 */

import { parse as csvParse } from 'csv-parse/sync'
import type { CanonicalEntity, EntityType } from '@sanctionwatch/db'
import { ParseError } from '../../domain/errors.js'
import { assertContentShape } from '../content-checks.js'
import { collectEntities, recordPosition } from '../collect.js'
import { buildEntity } from '../normalize.js'
import type { FetchConfig, ParseResult, SourceAdapter, SourceMetadata } from '../types.js'
import { joinPresent } from '../xml.js'
import { buildFetchConfig, CSV_ACCEPT } from './shared.js'

export const UK_HMT_METADATA: SourceMetadata = {
  displayName: 'UK HM Treasury Consolidated List',
  authority: 'HM Treasury, Office of Financial Sanctions Implementation',
  region: 'United Kingdom',
  format: 'csv',
  defaultUrl: 'https://ofsistorage.blob.core.windows.net/publishlive/2022format/ConList.csv',
  defaultSchedule: '0 3 * * *',
  expectedEntityCount: 4_000,
  minContentBytes: 10_000,
}

export const UK_HMT_REQUIRED_HEADERS = ['Name 6', 'Group ID', 'Group Type']

const GROUP_TYPES: Record<string, EntityType> = {
  individual: 'Person',
  entity: 'Company',
  ship: 'Vessel',
}

const PRIMARY_ALIAS_TYPE = 'primary name'

type CsvRow = Record<string, string>

interface RowGroup {
  groupId: string
  rows: CsvRow[]
}

function isCsvRow(value: unknown): value is CsvRow {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every(cell => typeof cell === 'string')
  )
}

function cell(row: CsvRow, column: string): string | null {
  const value = row[column]?.trim()
  return value ? value : null
}

function rowName(row: CsvRow, entityType: EntityType): string {
  if (entityType !== 'Person') {
    return cell(row, 'Name 6') ?? ''
  }
  return joinPresent([
    cell(row, 'Name 1'),
    cell(row, 'Name 2'),
    cell(row, 'Name 3'),
    cell(row, 'Name 4'),
    cell(row, 'Name 5'),
    cell(row, 'Name 6'),
  ])
}

/**
 * Parse the CSV into rows, skipping the "Last Updated" banner line the
 * export puts above the header row.
 */
export function parseHmtRows(text: string): CsvRow[] {
  const hasBanner = /^\s*"?last updated/i.test(text)
  const parsed: unknown = csvParse(text, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
    relax_quotes: true,
    from_line: hasBanner ? 2 : 1,
  })

  if (!Array.isArray(parsed)) {
    throw new ParseError('format', 'csv', 'CSV parser returned no rows')
  }
  return parsed.filter(isCsvRow)
}

/**
 * Group rows by Group ID, keeping first-seen order.
 * Rows without a Group ID form their own group keyed by position.
 */
export function groupRows(rows: CsvRow[]): RowGroup[] {
  const groups = new Map<string, RowGroup>()
  rows.forEach((row, index) => {
    const groupId = cell(row, 'Group ID') ?? ''
    const key = groupId || recordPosition(index)
    const group = groups.get(key)
    if (group) {
      group.rows.push(row)
    } else {
      groups.set(key, { groupId, rows: [row] })
    }
  })
  return [...groups.values()]
}

export class UkHmtAdapter implements SourceAdapter {
  readonly id = 'UK_HMT' as const
  readonly metadata: SourceMetadata

  constructor(metadata: Partial<SourceMetadata> = {}) {
    this.metadata = { ...UK_HMT_METADATA, ...metadata }
  }

  fetchConfig(urlOverride?: string): FetchConfig {
    return buildFetchConfig(this.metadata, CSV_ACCEPT, urlOverride)
  }

  parse(raw: Buffer, observedAt: Date): ParseResult {
    const text = assertContentShape(raw, this.metadata, UK_HMT_REQUIRED_HEADERS)
    const groups = groupRows(parseHmtRows(text))
    return collectEntities(groups, (group, index) => this.parseGroup(group, index, observedAt), 'Group ID')
  }

  private parseGroup(group: RowGroup, index: number, observedAt: Date): CanonicalEntity {
    if (!group.groupId) {
      throw new ParseError('record', 'Group ID', 'Missing Group ID', recordPosition(index))
    }
    const uid = `HMT-${group.groupId}`

    const primary =
      group.rows.find(row => (cell(row, 'Alias Type') ?? '').toLowerCase() === PRIMARY_ALIAS_TYPE) ?? group.rows[0]
    if (!primary) {
      throw new ParseError('record', 'Group ID', 'Group has no rows', uid)
    }

    const entityType = GROUP_TYPES[(cell(primary, 'Group Type') ?? '').toLowerCase()] ?? 'Other'
    const name = rowName(primary, entityType)
    if (!name) {
      throw new ParseError('record', 'Name 6', 'Primary row has no name', uid)
    }

    const aliases = group.rows.filter(row => row !== primary).map(row => rowName(row, entityType))
    const regimes = group.rows.map(row => cell(row, 'Regime'))

    return buildEntity(
      'UK_HMT',
      {
        uid,
        name,
        entityType,
        programs: regimes,
        aliases,
        addresses: group.rows.map(row => ({
          street: joinPresent(
            [
              cell(row, 'Address 1'),
              cell(row, 'Address 2'),
              cell(row, 'Address 3'),
              cell(row, 'Address 4'),
              cell(row, 'Address 5'),
            ],
            ', '
          ),
          city: cell(row, 'Address 6'),
          postalCode: cell(row, 'Post/Zip Code'),
          country: cell(row, 'Country'),
        })),
        datesOfBirth: group.rows.map(row => cell(row, 'DOB')),
        placesOfBirth: group.rows.map(row =>
          joinPresent([cell(row, 'Town of Birth'), cell(row, 'Country of Birth')], ', ')
        ),
        nationalities: group.rows.map(row => cell(row, 'Nationality')),
        remarks: cell(primary, 'Other Information'),
      },
      observedAt
    )
  }
}
