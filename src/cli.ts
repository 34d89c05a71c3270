import { parseArgs } from 'node:util'
import { isPasswordGeneratorError, PasswordErrorCode, PasswordGeneratorError, resolveErrorMessage } from './lib/errors'
import { createLogger } from './lib/logger'
import { isPlacementStrategy, PasswordGenerator, type PlacementStrategy } from './lib/password-generator'
import type { GenerationRequest } from './lib/password-rules'
import { describeStrength } from './lib/password-strength'
import { generatorSettings, parseLength, type SettingsEnv } from './store/generator-settings'

export const GENERATE_COMMAND = 'password-generate'
export const BANNER = 'Welcome to the password generator 5000'

const INVALID_LENGTH_MESSAGE = 'length should be a positive number between 0 and 255'
const LENGTH_OPTION_ERROR = /^Option '--length[ ']/

const PASSWORD_TYPES = ['random', 'pin', 'memorable'] as const
type PasswordType = (typeof PASSWORD_TYPES)[number]

export type CliIo = {
  stdout: (line: string) => void
  stderr: (line: string) => void
  env: SettingsEnv
}

const defaultIo: CliIo = {
  stdout: line => process.stdout.write(`${line}\n`),
  stderr: line => process.stderr.write(`${line}\n`),
  env: process.env,
}

type GenerateOptions = {
  length?: string
  numbers?: boolean
  symbols?: boolean
  capitalized?: boolean
  type?: string
  placement?: string
  verbose?: boolean
}

type ModeOutput = {
  request: Omit<GenerationRequest, 'length'>
  passwordLabel: string
  strengthLabel: string
}

function isPasswordType(value: string): value is PasswordType {
  return PASSWORD_TYPES.some(type => type === value)
}

function invalidArgument(message: string): PasswordGeneratorError {
  return new PasswordGeneratorError(PasswordErrorCode.INVALID_ARGUMENT, message)
}

function parseCommandLine(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        length: { type: 'string' },
        numbers: { type: 'boolean' },
        symbols: { type: 'boolean' },
        capitalized: { type: 'boolean' },
        type: { type: 'string' },
        placement: { type: 'string' },
        verbose: { type: 'boolean' },
      },
    })
  } catch (error) {
    const message = resolveErrorMessage(error, 'Invalid arguments') ?? 'Invalid arguments'
    // A missing or dash-prefixed value after --length fails inside parseArgs.
    throw invalidArgument(LENGTH_OPTION_ERROR.test(message) ? INVALID_LENGTH_MESSAGE : message)
  }
}

function resolveLength(raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback
  const length = parseLength(raw)
  if (length === undefined) {
    throw invalidArgument(INVALID_LENGTH_MESSAGE)
  }
  return length
}

function resolvePlacement(raw: string | undefined, fallback: PlacementStrategy): PlacementStrategy {
  if (raw === undefined) return fallback
  if (!isPlacementStrategy(raw)) {
    throw invalidArgument(`placement should be one of: front-back, uniform (got "${raw}")`)
  }
  return raw
}

function resolveMode(options: GenerateOptions): ModeOutput {
  const type = options.type
  if (type === undefined) {
    return {
      request: {
        symbols: options.symbols === true,
        digits: options.numbers === true,
        uppercase: options.capitalized === true,
        lowercase: true,
      },
      passwordLabel: 'Generated password',
      strengthLabel: "Password's strength",
    }
  }
  if (!isPasswordType(type)) {
    throw invalidArgument(`type should be one of: ${PASSWORD_TYPES.join(', ')} (got "${type}")`)
  }
  switch (type) {
    case 'random':
      return {
        request: { symbols: true, digits: true, uppercase: true, lowercase: true },
        passwordLabel: 'Generated fully random password',
        strengthLabel: "Fully random password's strength",
      }
    case 'pin':
      return {
        request: { symbols: false, digits: true, uppercase: false, lowercase: false },
        passwordLabel: 'Generated pin',
        strengthLabel: "Generated pin's strength",
      }
    case 'memorable':
      throw new PasswordGeneratorError(PasswordErrorCode.NOT_IMPLEMENTED, 'Memorable passwords are not implemented yet')
  }
}

function runGenerate(options: GenerateOptions, io: CliIo): void {
  const settings = generatorSettings.getState()
  const logger = createLogger(() => options.verbose === true || generatorSettings.getState().verbose, io.stderr)

  const length = resolveLength(options.length, settings.defaultLength)
  const placement = resolvePlacement(options.placement, settings.placement)
  const mode = resolveMode(options)
  const request: GenerationRequest = { length, ...mode.request }
  logger.debug('generation request', { ...request, placement })

  const generator = new PasswordGenerator({ placement })
  const password = generator.generatePassword(request)
  const strength = generator.getPasswordStrength(request)
  logger.debug('strength level', describeStrength(strength))

  io.stdout(`${mode.passwordLabel}: ${password}`)
  io.stderr(`${mode.strengthLabel}: ${strength.toFixed(0)}%`)
}

function execute(argv: string[], io: CliIo): void {
  const { values, positionals } = parseCommandLine(argv)
  const [command] = positionals
  if (command !== GENERATE_COMMAND) {
    throw new PasswordGeneratorError(
      PasswordErrorCode.COMMAND_NOT_FOUND,
      `Please choose a valid subcommand: (${GENERATE_COMMAND})`,
    )
  }
  if (positionals.length > 1) {
    throw invalidArgument(`Unexpected argument: ${positionals[1]}`)
  }
  if (Object.keys(values).length === 0) {
    throw new PasswordGeneratorError(
      PasswordErrorCode.ARGUMENTS_NOT_FOUND,
      `${GENERATE_COMMAND} needs at least one option, e.g. --length 16`,
    )
  }
  runGenerate(values, io)
}

export function runCli(argv: string[], io: CliIo = defaultIo): number {
  const logger = createLogger(() => generatorSettings.getState().verbose, io.stderr)
  generatorSettings.getState().loadFromEnv(io.env, message => logger.warn(message))
  io.stdout(BANNER)

  try {
    execute(argv, io)
    return 0
  } catch (error) {
    if (!isPasswordGeneratorError(error)) {
      throw error
    }
    io.stderr(`Error: ${resolveErrorMessage(error, error.code)}`)
    logger.debug('failed with', error.code)
    return 1
  }
}
