export type LogLevel = 'info' | 'warn' | 'error' | 'debug'

export type Logger = {
  info: (message: unknown, ...args: unknown[]) => void
  warn: (message: unknown, ...args: unknown[]) => void
  error: (message: unknown, ...args: unknown[]) => void
  debug: (message: unknown, ...args: unknown[]) => void
}

const styles = {
  info: { label: 'INFO', ansi: '\x1b[32m' },
  warn: { label: 'WARN', ansi: '\x1b[33m' },
  error: { label: 'ERROR', ansi: '\x1b[31m' },
  debug: { label: 'DEBUG', ansi: '\x1b[34m' }
}

const severity: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
}

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const

let threshold: LogLevel = 'info'

export function setLogLevel(level: LogLevel): void {
  threshold = level
}

function enabled(level: LogLevel): boolean {
  return severity[level] >= severity[threshold]
}

function format(level: LogLevel, message: unknown, args: unknown[]): unknown[] {
  const style = styles[level]
  // Colors only when writing to a terminal
  const label = process.stderr.isTTY ? `${style.ansi}[${style.label}]\x1b[0m` : `[${style.label}]`
  return [label, message, ...args]
}

/**
 * Leveled console logger. Everything goes to stderr so stdout stays free for
 * command output.
 */
export const log: Logger = {
  info: (message, ...args) => {
    if (enabled('info')) console.error(...format('info', message, args))
  },
  warn: (message, ...args) => {
    if (enabled('warn')) console.error(...format('warn', message, args))
  },
  error: (message, ...args) => {
    if (enabled('error')) console.error(...format('error', message, args))
  },
  debug: (message, ...args) => {
    if (enabled('debug')) console.error(...format('debug', message, args))
  }
}

/** Logger that drops everything, for tests and embedding. */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {}
}
