export { PasswordGenerator, distributeRules, assertValidLength, isPlacementStrategy, PLACEMENT_STRATEGIES } from './lib/password-generator'
export type { PasswordGeneratorOptions, PlacementStrategy } from './lib/password-generator'
export {
  LOWERCASE_CHARS,
  UPPERCASE_CHARS,
  DIGIT_CHARS,
  SYMBOL_CHARS,
  MAX_PASSWORD_LENGTH,
  RULE_ORDER,
  classifyCharacter,
  enabledRules,
} from './lib/password-rules'
export type { CharacterRule, GenerationRequest } from './lib/password-rules'
export { computeStrength, describeStrength, estimateEntropyBits, poolSize, MAX_POOL_SIZE } from './lib/password-strength'
export type { StrengthLevel } from './lib/password-strength'
export { CryptoRandomSource } from './lib/random'
export type { RandomSource } from './lib/random'
export { PasswordGeneratorError, PasswordErrorCode, resolveErrorMessage } from './lib/errors'
export { runCli } from './cli'
