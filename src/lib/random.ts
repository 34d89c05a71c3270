const UINT32_RANGE = 0x1_0000_0000

export interface RandomSource {
  nextInt(max: number): number
  nextBoolean(): boolean
}

export type RandomValuesProvider = {
  getRandomValues(array: Uint32Array): Uint32Array
}

const cryptoSource: RandomValuesProvider | undefined =
  typeof globalThis !== 'undefined' &&
  typeof globalThis.crypto !== 'undefined' &&
  typeof globalThis.crypto.getRandomValues === 'function'
    ? globalThis.crypto
    : undefined

function assertCrypto(): RandomValuesProvider {
  if (!cryptoSource) {
    throw new Error('Secure random number generator is not available in this environment.')
  }
  return cryptoSource
}

/**
 * Random source backed by the runtime's Web Crypto implementation, which is
 * seeded from OS entropy. Indexes are drawn by rejection sampling so every
 * value below `max` is equally likely.
 */
export class CryptoRandomSource implements RandomSource {
  private readonly provider: RandomValuesProvider
  private readonly buffer = new Uint32Array(1)

  constructor(provider: RandomValuesProvider = assertCrypto()) {
    this.provider = provider
  }

  nextInt(max: number): number {
    if (!Number.isInteger(max) || max <= 0 || max > UINT32_RANGE) {
      throw new RangeError(`Random range must be an integer between 1 and ${UINT32_RANGE}, got ${max}`)
    }
    const limit = UINT32_RANGE - (UINT32_RANGE % max)
    for (;;) {
      const value = this.nextUint32()
      if (value < limit) {
        return value % max
      }
    }
  }

  nextBoolean(): boolean {
    return (this.nextUint32() & 1) === 1
  }

  private nextUint32(): number {
    this.provider.getRandomValues(this.buffer)
    return this.buffer[0]
  }
}

export function pickElement<T>(random: RandomSource, elements: readonly T[]): T {
  if (elements.length === 0) {
    throw new Error('Cannot pick from an empty collection.')
  }
  return elements[random.nextInt(elements.length)]
}
