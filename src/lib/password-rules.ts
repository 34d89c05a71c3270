export const LOWERCASE_CHARS = 'abcdefghijklmnopqrstuvwxyz'
export const UPPERCASE_CHARS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ'
export const DIGIT_CHARS = '0123456789'
export const SYMBOL_CHARS = '!"#$%&\'()*+,-./:;<=>?@[\\]^_`{|}~'

export const MAX_PASSWORD_LENGTH = 255

export type CharacterRule = 'symbol' | 'digit' | 'lower' | 'upper'

// Order in which enabled rules enter the distribution queue.
export const RULE_ORDER: readonly CharacterRule[] = ['symbol', 'digit', 'lower', 'upper']

export type CharacterPools = Readonly<Record<CharacterRule, readonly string[]>>

export type GenerationRequest = {
  length: number
  symbols: boolean
  digits: boolean
  uppercase: boolean
  lowercase: boolean
}

const ALPHABETS: Record<CharacterRule, string> = {
  symbol: SYMBOL_CHARS,
  digit: DIGIT_CHARS,
  lower: LOWERCASE_CHARS,
  upper: UPPERCASE_CHARS,
}

export function createCharacterPools(): CharacterPools {
  return Object.freeze({
    symbol: Object.freeze(Array.from(ALPHABETS.symbol)),
    digit: Object.freeze(Array.from(ALPHABETS.digit)),
    lower: Object.freeze(Array.from(ALPHABETS.lower)),
    upper: Object.freeze(Array.from(ALPHABETS.upper)),
  })
}

export function alphabetSize(rule: CharacterRule): number {
  return ALPHABETS[rule].length
}

export function isRuleEnabled(request: GenerationRequest, rule: CharacterRule): boolean {
  switch (rule) {
    case 'symbol':
      return request.symbols
    case 'digit':
      return request.digits
    case 'lower':
      return request.lowercase
    case 'upper':
      return request.uppercase
  }
}

export function enabledRules(request: GenerationRequest): CharacterRule[] {
  return RULE_ORDER.filter(rule => isRuleEnabled(request, rule))
}

export function classifyCharacter(char: string): CharacterRule | undefined {
  if (char.length !== 1) return undefined
  return RULE_ORDER.find(rule => ALPHABETS[rule].includes(char))
}
