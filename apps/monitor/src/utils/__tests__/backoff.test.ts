import { describe, it, expect } from 'vitest'
import { computeBackoffDelay } from '../backoff.js'

describe('computeBackoffDelay', () => {
  it('doubles per attempt with jitter between half and all of the step', () => {
    expect(computeBackoffDelay(1, 1_000, 30_000, () => 0)).toBe(500)
    expect(computeBackoffDelay(3, 1_000, 30_000, () => 1)).toBe(4_000)
  })

  it('caps the step at the maximum delay', () => {
    expect(computeBackoffDelay(10, 1_000, 30_000, () => 1)).toBe(30_000)
  })
})
