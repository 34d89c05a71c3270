import { describe, it, expect } from 'vitest'
import type { GenerationRequest } from './password-rules'
import { computeStrength, describeStrength, estimateEntropyBits, MAX_POOL_SIZE, poolSize } from './password-strength'

const NONE = { symbols: false, digits: false, uppercase: false, lowercase: false }
const ALL = { symbols: true, digits: true, uppercase: true, lowercase: true }

function request(length: number, flags: Omit<GenerationRequest, 'length'> = ALL): GenerationRequest {
  return { length, ...flags }
}

describe('poolSize', () => {
  it('sums the enabled alphabets', () => {
    expect(MAX_POOL_SIZE).toBe(94)
    expect(poolSize(request(8))).toBe(94)
    expect(poolSize(request(8, { ...NONE, digits: true }))).toBe(10)
    expect(poolSize(request(8, { ...NONE, symbols: true, lowercase: true }))).toBe(58)
    expect(poolSize(request(8, NONE))).toBe(0)
  })
})

describe('computeStrength', () => {
  it('is zero for lengths 0 and 1 whatever the classes', () => {
    expect(computeStrength(request(0))).toBe(0)
    expect(computeStrength(request(1))).toBe(0)
    expect(computeStrength(request(1, NONE))).toBe(0)
  })

  it('maps every class at length 10 onto the 255-based scale', () => {
    expect(computeStrength(request(10))).toBeCloseTo(53.243, 3)
  })

  it('reaches 100 with every class at the maximum length', () => {
    expect(computeStrength(request(255))).toBe(100)
  })

  it('scores a five digit pin just above the baseline', () => {
    expect(computeStrength(request(5, { ...NONE, digits: true }))).toBeCloseTo(22.472, 3)
  })

  it('returns the baseline when no class is enabled', () => {
    expect(computeStrength(request(10, NONE))).toBe(20)
  })

  it('grows with length', () => {
    expect(computeStrength(request(16))).toBeGreaterThan(computeStrength(request(12)))
  })
})

describe('estimateEntropyBits', () => {
  it('multiplies length by the bits per character', () => {
    expect(estimateEntropyBits(request(4, { ...NONE, digits: true }))).toBeCloseTo(13.2877, 4)
    expect(estimateEntropyBits(request(0))).toBe(0)
    expect(estimateEntropyBits(request(10, NONE))).toBe(0)
  })
})

describe('describeStrength', () => {
  it('labels percentages by band', () => {
    expect(describeStrength(0)).toBe('very-weak')
    expect(describeStrength(39.9)).toBe('very-weak')
    expect(describeStrength(40)).toBe('weak')
    expect(describeStrength(53.2)).toBe('weak')
    expect(describeStrength(69)).toBe('fair')
    expect(describeStrength(84.99)).toBe('good')
    expect(describeStrength(100)).toBe('strong')
  })
})
