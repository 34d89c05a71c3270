import { PasswordErrorCode, PasswordGeneratorError } from './errors'
import {
  createCharacterPools,
  enabledRules,
  MAX_PASSWORD_LENGTH,
  type CharacterPools,
  type CharacterRule,
  type GenerationRequest,
} from './password-rules'
import { computeStrength } from './password-strength'
import { CryptoRandomSource, pickElement, type RandomSource } from './random'

/**
 * `front-back` flips a coin per rule to append or prepend it, which keeps the
 * historical (non-uniform) ordering. `uniform` runs a Fisher–Yates shuffle.
 */
export type PlacementStrategy = 'front-back' | 'uniform'

export const PLACEMENT_STRATEGIES: readonly PlacementStrategy[] = ['front-back', 'uniform']

export type PasswordGeneratorOptions = {
  random?: RandomSource
  placement?: PlacementStrategy
}

export function isPlacementStrategy(value: string): value is PlacementStrategy {
  return PLACEMENT_STRATEGIES.some(strategy => strategy === value)
}

export function assertValidLength(length: number): void {
  if (!Number.isInteger(length) || length < 0 || length > MAX_PASSWORD_LENGTH) {
    throw new PasswordGeneratorError(
      PasswordErrorCode.INVALID_LENGTH,
      `Password length must be an integer between 0 and ${MAX_PASSWORD_LENGTH}, got ${length}`,
    )
  }
}

/**
 * Round-robin over the enabled rules in symbol, digit, lower, upper order, so
 * each enabled class gets `floor(length / k)` or `ceil(length / k)` positions.
 */
export function distributeRules(request: GenerationRequest): CharacterRule[] {
  assertValidLength(request.length)
  if (request.length === 0) {
    return []
  }
  const queue = enabledRules(request)
  if (queue.length === 0) {
    throw new PasswordGeneratorError(
      PasswordErrorCode.NO_CLASS_ENABLED,
      'At least one character class must be enabled to generate a password',
    )
  }

  return Array.from({ length: request.length }, (_, index) => queue[index % queue.length])
}

export class PasswordGenerator {
  private readonly pools: CharacterPools
  private readonly random: RandomSource
  private readonly placement: PlacementStrategy

  constructor(options: PasswordGeneratorOptions = {}) {
    this.pools = createCharacterPools()
    this.random = options.random ?? new CryptoRandomSource()
    this.placement = options.placement ?? 'front-back'
  }

  get placementStrategy(): PlacementStrategy {
    return this.placement
  }

  generatePassword(request: GenerationRequest): string {
    const rules = this.placeRules(distributeRules(request))
    return this.fillPassword(rules)
  }

  getPasswordStrength(request: GenerationRequest): number {
    assertValidLength(request.length)
    return computeStrength(request)
  }

  placeRules(rules: readonly CharacterRule[]): CharacterRule[] {
    return this.placement === 'uniform' ? this.shuffleRules(rules) : this.insertFrontOrBack(rules)
  }

  private insertFrontOrBack(rules: readonly CharacterRule[]): CharacterRule[] {
    const placed: CharacterRule[] = []
    for (const rule of rules) {
      if (this.random.nextBoolean()) {
        placed.unshift(rule)
      } else {
        placed.push(rule)
      }
    }
    return placed
  }

  private shuffleRules(rules: readonly CharacterRule[]): CharacterRule[] {
    const result = [...rules]
    for (let index = result.length - 1; index > 0; index -= 1) {
      const swapIndex = this.random.nextInt(index + 1)
      const temp = result[index]
      result[index] = result[swapIndex]
      result[swapIndex] = temp
    }
    return result
  }

  private fillPassword(rules: readonly CharacterRule[]): string {
    return rules.map(rule => pickElement(this.random, this.pools[rule])).join('')
  }
}
