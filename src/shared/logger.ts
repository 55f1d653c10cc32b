export type LogLevel = 'info' | 'warn' | 'error' | 'debug'

const styles = {
  debug: { label: 'DEBUG', rank: 0, ansi: '\x1b[34m' },
  info: { label: 'INFO', rank: 1, ansi: '\x1b[32m' },
  warn: { label: 'WARN', rank: 2, ansi: '\x1b[33m' },
  error: { label: 'ERROR', rank: 3, ansi: '\x1b[31m' }
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in styles
}

const envLevel = process.env.LOG_LEVEL
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'info'

/**
 * Changes the minimum level written to the console.
 */
export function setLogLevel(level: LogLevel): void {
  threshold = level
}

function enabled(level: LogLevel): boolean {
  return styles[level].rank >= styles[threshold].rank
}

function format(level: LogLevel, message: unknown, args: unknown[]): unknown[] {
  const style = styles[level]
  return [`${style.ansi}[${style.label}]\x1b[0m`, message, ...args]
}

export const log = {
  info: (message: unknown, ...args: unknown[]) => {
    if (enabled('info')) console.info(...format('info', message, args))
  },
  warn: (message: unknown, ...args: unknown[]) => {
    if (enabled('warn')) console.warn(...format('warn', message, args))
  },
  error: (message: unknown, ...args: unknown[]) => {
    if (enabled('error')) console.error(...format('error', message, args))
  },
  debug: (message: unknown, ...args: unknown[]) => {
    if (enabled('debug')) console.debug(...format('debug', message, args))
  }
}
