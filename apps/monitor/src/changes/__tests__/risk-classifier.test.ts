import { describe, it, expect } from 'vitest'
import type { FieldChange, TrackedField } from '@sanctionwatch/db'
import { classify, countByRisk, matchRiskRule, type RiskRule } from '../risk-classifier.js'

function modified(...fields: TrackedField[]) {
  const fieldChanges: FieldChange[] = fields.map(field => ({ field, oldValue: null, newValue: null }))
  return { changeType: 'Modified' as const, fieldChanges }
}

describe('classify', () => {
  it('rates a removal Critical', () => {
    expect(classify({ changeType: 'Removed', fieldChanges: [] })).toBe('Critical')
  })

  it('rates an addition High', () => {
    expect(classify({ changeType: 'Added', fieldChanges: [] })).toBe('High')
  })

  it.each<TrackedField>(['programs', 'aliases', 'name', 'nationalities'])('rates a %s change High', field => {
    expect(classify(modified(field))).toBe('High')
  })

  it('rates remarks and place-of-birth changes Low', () => {
    expect(classify(modified('remarks'))).toBe('Low')
    expect(classify(modified('placesOfBirth'))).toBe('Low')
    expect(classify(modified('remarks', 'placesOfBirth'))).toBe('Low')
  })

  it('lets a high-salience field outrank a low one in the same change', () => {
    expect(classify(modified('remarks', 'programs'))).toBe('High')
  })

  it('rates any other modification Medium', () => {
    expect(classify(modified('addresses'))).toBe('Medium')
    expect(classify(modified('datesOfBirth', 'remarks'))).toBe('Medium')
    expect(classify(modified('entityType'))).toBe('Medium')
    expect(classify(modified())).toBe('Medium')
  })

  it('returns the same level on every call', () => {
    const change = modified('aliases', 'remarks')
    expect(new Set([classify(change), classify(change), classify(change)])).toEqual(new Set(['High']))
  })

  it('reports which rule decided', () => {
    expect(matchRiskRule(modified('remarks')).id).toBe('low-salience-only')
  })

  it('accepts a custom table', () => {
    const rules: RiskRule[] = [
      { id: 'addresses-matter', level: 'High', changeTypes: ['Modified'], anyOf: ['addresses'] },
      { id: 'rest', level: 'Low', changeTypes: ['Added', 'Removed', 'Modified'] },
    ]
    expect(classify(modified('addresses'), rules)).toBe('High')
    expect(classify({ changeType: 'Removed', fieldChanges: [] }, rules)).toBe('Low')
  })

  it('throws when no rule covers the change', () => {
    expect(() => classify({ changeType: 'Added', fieldChanges: [] }, [])).toThrowError(
      'No risk rule matches change type Added'
    )
  })
})

describe('countByRisk', () => {
  it('counts events per tier', () => {
    const counts = countByRisk([
      { riskLevel: 'Critical' },
      { riskLevel: 'High' },
      { riskLevel: 'High' },
      { riskLevel: 'Low' },
    ])
    expect(counts).toEqual({ critical: 1, high: 2, medium: 0, low: 1 })
  })
})
