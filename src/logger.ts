/**
 * Leveled console logger. Silent under NODE_ENV=test unless a level is
 * given explicitly; otherwise LOG_LEVEL, then info.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent']

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LEVELS.some((l) => l === value)
}

class ConsoleLogger implements Logger {
  private level: LogLevel
  private prefix: string

  constructor(prefix: string, level: LogLevel) {
    this.prefix = prefix
    this.level = level
  }

  private shouldLog(level: LogLevel): boolean {
    return this.level !== 'silent' && LEVELS.indexOf(this.level) <= LEVELS.indexOf(level)
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog('debug')) console.debug(`${this.prefix}${message}`, ...args)
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) console.info(`${this.prefix}${message}`, ...args)
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog('warn')) console.warn(`${this.prefix}${message}`, ...args)
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog('error')) console.error(`${this.prefix}${message}`, ...args)
  }
}

export function resolveLogLevel(level?: LogLevel): LogLevel {
  if (level) return level
  if (process.env['NODE_ENV'] === 'test') return 'silent'
  const fromEnv = process.env['LOG_LEVEL']
  return isLogLevel(fromEnv) ? fromEnv : 'info'
}

export function createLogger(prefix = '', level?: LogLevel): Logger {
  return new ConsoleLogger(prefix, resolveLogLevel(level))
}
