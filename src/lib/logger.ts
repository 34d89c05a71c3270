import { format } from 'node:util'

const PREFIX = '[passgen]'

export type Logger = {
  debug: (...args: unknown[]) => void
  info: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
  error: (...args: unknown[]) => void
}

export type LogSink = (line: string) => void

const consoleSink: LogSink = line => console.error(line)

// Everything goes to stderr; stdout is reserved for the generated password.
export function createLogger(isVerbose: () => boolean = () => false, sink: LogSink = consoleSink): Logger {
  const write = (args: unknown[]) => sink(format(PREFIX, ...args))
  return {
    debug(...args) {
      if (isVerbose()) write(args)
    },
    info(...args) {
      write(args)
    },
    warn(...args) {
      write(args)
    },
    error(...args) {
      write(args)
    },
  }
}
