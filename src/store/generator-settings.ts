import { createStore } from 'zustand/vanilla'
import { isPlacementStrategy, type PlacementStrategy } from '../lib/password-generator'
import { MAX_PASSWORD_LENGTH } from '../lib/password-rules'

export type SettingsEnv = Record<string, string | undefined>

type SettingsValues = {
  defaultLength: number
  placement: PlacementStrategy
  verbose: boolean
}

interface GeneratorSettingsState extends SettingsValues {
  setDefaultLength: (length: number) => void
  setPlacement: (placement: PlacementStrategy) => void
  setVerbose: (verbose: boolean) => void
  loadFromEnv: (env: SettingsEnv, warn?: (message: string) => void) => void
  reset: () => void
}

export const DEFAULT_GENERATOR_SETTINGS: SettingsValues = {
  defaultLength: 10,
  placement: 'front-back',
  verbose: false,
}

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on'])
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off', ''])

export function parseLength(raw: string): number | undefined {
  const trimmed = raw.trim()
  if (!/^\d+$/.test(trimmed)) return undefined
  const value = Number(trimmed)
  return value <= MAX_PASSWORD_LENGTH ? value : undefined
}

function parseFlag(raw: string): boolean | undefined {
  const normalized = raw.trim().toLowerCase()
  if (TRUE_VALUES.has(normalized)) return true
  if (FALSE_VALUES.has(normalized)) return false
  return undefined
}

export const generatorSettings = createStore<GeneratorSettingsState>()((set) => ({
  ...DEFAULT_GENERATOR_SETTINGS,
  setDefaultLength(length) {
    set({ defaultLength: length })
  },
  setPlacement(placement) {
    set({ placement })
  },
  setVerbose(verbose) {
    set({ verbose })
  },
  loadFromEnv(env, warn = () => {}) {
    const next: SettingsValues = { ...DEFAULT_GENERATOR_SETTINGS }

    const rawLength = env.PASSGEN_DEFAULT_LENGTH
    if (rawLength !== undefined) {
      const length = parseLength(rawLength)
      if (length === undefined) {
        warn(`Ignoring PASSGEN_DEFAULT_LENGTH="${rawLength}": expected an integer between 0 and ${MAX_PASSWORD_LENGTH}`)
      } else {
        next.defaultLength = length
      }
    }

    const rawPlacement = env.PASSGEN_PLACEMENT
    if (rawPlacement !== undefined) {
      const placement = rawPlacement.trim()
      if (isPlacementStrategy(placement)) {
        next.placement = placement
      } else {
        warn(`Ignoring PASSGEN_PLACEMENT="${rawPlacement}": expected front-back or uniform`)
      }
    }

    const rawVerbose = env.PASSGEN_VERBOSE
    if (rawVerbose !== undefined) {
      const verbose = parseFlag(rawVerbose)
      if (verbose === undefined) {
        warn(`Ignoring PASSGEN_VERBOSE="${rawVerbose}": expected true or false`)
      } else {
        next.verbose = verbose
      }
    }

    set(next)
  },
  reset() {
    set({ ...DEFAULT_GENERATOR_SETTINGS })
  },
}))
