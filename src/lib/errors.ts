export const PasswordErrorCode = {
  INVALID_LENGTH: 'INVALID_LENGTH',
  NO_CLASS_ENABLED: 'NO_CLASS_ENABLED',
  COMMAND_NOT_FOUND: 'COMMAND_NOT_FOUND',
  ARGUMENTS_NOT_FOUND: 'ARGUMENTS_NOT_FOUND',
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
  NOT_IMPLEMENTED: 'NOT_IMPLEMENTED',
} as const

export type PasswordErrorCode = (typeof PasswordErrorCode)[keyof typeof PasswordErrorCode]

export class PasswordGeneratorError extends Error {
  readonly code: PasswordErrorCode

  constructor(code: PasswordErrorCode, message: string) {
    super(message)
    this.name = 'PasswordGeneratorError'
    this.code = code
  }
}

export function isPasswordGeneratorError(error: unknown): error is PasswordGeneratorError {
  return error instanceof PasswordGeneratorError
}

export function resolveErrorMessage(error: unknown, fallback?: string): string | undefined {
  if (error instanceof Error && typeof error.message === 'string' && error.message.trim()) {
    return error.message.trim()
  }
  if (typeof error === 'string' && error.trim()) {
    return error.trim()
  }
  return fallback?.trim() ? fallback.trim() : fallback
}
