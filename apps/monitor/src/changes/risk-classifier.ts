/**
 * Risk Classifier
 *
 * Severity comes from RISK_RULES, listed in precedence order: the first
 * rule that matches decides. Adding a field or a tier is a table edit.
 */

import type { ChangeEvent, ChangeType, RiskCounts, RiskLevel, TrackedField } from '@sanctionwatch/db'

export type ClassifiableChange = Pick<ChangeEvent, 'changeType' | 'fieldChanges'>

export interface RiskRule {
  id: string
  level: RiskLevel
  changeTypes: readonly ChangeType[]
  /** Matches when at least one of these fields changed */
  anyOf?: readonly TrackedField[]
  /** Matches when something changed and every changed field is in this list */
  onlyWithin?: readonly TrackedField[]
}

export const RISK_RULES: readonly RiskRule[] = [
  { id: 'delisted', level: 'Critical', changeTypes: ['Removed'] },
  { id: 'designated', level: 'High', changeTypes: ['Added'] },
  {
    id: 'scope-or-identity',
    level: 'High',
    changeTypes: ['Modified'],
    anyOf: ['programs', 'aliases', 'name', 'nationalities'],
  },
  { id: 'low-salience-only', level: 'Low', changeTypes: ['Modified'], onlyWithin: ['remarks', 'placesOfBirth'] },
  { id: 'other-modification', level: 'Medium', changeTypes: ['Modified'] },
]

function ruleMatches(rule: RiskRule, change: ClassifiableChange): boolean {
  if (!rule.changeTypes.includes(change.changeType)) return false

  const changed = change.fieldChanges.map(fieldChange => fieldChange.field)
  const { anyOf, onlyWithin } = rule
  if (anyOf && !changed.some(field => anyOf.includes(field))) return false
  if (onlyWithin && (changed.length === 0 || !changed.every(field => onlyWithin.includes(field)))) return false
  return true
}

/**
 * Find the rule that decides a change's level.
 * @throws Error if the table has no rule for the change type
 */
export function matchRiskRule(change: ClassifiableChange, rules: readonly RiskRule[] = RISK_RULES): RiskRule {
  const rule = rules.find(candidate => ruleMatches(candidate, change))
  if (!rule) {
    throw new Error(`No risk rule matches change type ${change.changeType}`)
  }
  return rule
}

export function classify(change: ClassifiableChange, rules: readonly RiskRule[] = RISK_RULES): RiskLevel {
  return matchRiskRule(change, rules).level
}

export function countByRisk(events: ReadonlyArray<Pick<ChangeEvent, 'riskLevel'>>): RiskCounts {
  const counts: RiskCounts = { critical: 0, high: 0, medium: 0, low: 0 }
  for (const event of events) {
    switch (event.riskLevel) {
      case 'Critical':
        counts.critical++
        break
      case 'High':
        counts.high++
        break
      case 'Medium':
        counts.medium++
        break
      case 'Low':
        counts.low++
        break
    }
  }
  return counts
}
