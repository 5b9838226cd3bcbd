export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface Logger {
  debug(message: string, ...details: unknown[]): void
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 }

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER
}

function currentLevel(): LogLevel {
  const configured = typeof process !== 'undefined' ? process.env.LOG_LEVEL : undefined
  return isLogLevel(configured) ? configured : 'info'
}

/** Console logger tagged `[stockroom:<scope>]` */
export function createLogger(scope?: string): Logger {
  const prefix = scope ? `[stockroom:${scope}]` : '[stockroom]'
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel()]

  return {
    debug(message, ...details) {
      if (enabled('debug')) console.debug(prefix, message, ...details)
    },
    info(message, ...details) {
      if (enabled('info')) console.info(prefix, message, ...details)
    },
    warn(message, ...details) {
      if (enabled('warn')) console.warn(prefix, message, ...details)
    },
    error(message, ...details) {
      if (enabled('error')) console.error(prefix, message, ...details)
    },
  }
}
