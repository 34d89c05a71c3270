import { alphabetSize, enabledRules, RULE_ORDER, type GenerationRequest } from './password-rules'

export type StrengthLevel = 'very-weak' | 'weak' | 'fair' | 'good' | 'strong'

export const STRENGTH_BASELINE = 20
export const STRENGTH_SPAN = 80
const NORMALIZATION_BASE = 255

// 32 symbols + 10 digits + 26 uppercase + 26 lowercase
export const MAX_POOL_SIZE = RULE_ORDER.reduce((total, rule) => total + alphabetSize(rule), 0)

const LEVEL_THRESHOLDS: ReadonlyArray<[number, StrengthLevel]> = [
  [40, 'very-weak'],
  [55, 'weak'],
  [70, 'fair'],
  [85, 'good'],
]

export function poolSize(request: GenerationRequest): number {
  return enabledRules(request).reduce((total, rule) => total + alphabetSize(rule), 0)
}

/**
 * Strength score in percent: `20 + 80 * log_b(a)` where `a = length ^ poolSize`
 * and `b = 255 ^ 94`. Both powers overflow a double for realistic inputs, so the
 * logarithm is taken term by term. Passwords of length 0 or 1 score 0.
 */
export function computeStrength(request: GenerationRequest): number {
  const { length } = request
  if (length <= 1) {
    return 0
  }
  const ratio = (poolSize(request) * Math.log(length)) / (MAX_POOL_SIZE * Math.log(NORMALIZATION_BASE))
  return STRENGTH_BASELINE + STRENGTH_SPAN * ratio
}

/** Keyspace entropy in bits, `length * log2(poolSize)`. */
export function estimateEntropyBits(request: GenerationRequest): number {
  const size = poolSize(request)
  if (request.length <= 0 || size <= 1) {
    return 0
  }
  return request.length * Math.log2(size)
}

export function describeStrength(percentage: number): StrengthLevel {
  for (const [limit, level] of LEVEL_THRESHOLDS) {
    if (percentage < limit) return level
  }
  return 'strong'
}
