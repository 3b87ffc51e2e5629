export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const

export type LogFn = (message: string, ...args: unknown[]) => void

export interface Logger {
  debug: LogFn
  info: LogFn
  warn: LogFn
  error: LogFn
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export function passesLevel(msgLevel: LogLevel, configLevel: LogLevel): boolean {
  return LEVEL_PRIORITY[msgLevel] >= LEVEL_PRIORITY[configLevel]
}

const NOOP: LogFn = () => {}

/**
 * Wrap `base` so each message carries a `[scope]` prefix and anything below
 * `level` is dropped.
 */
export function withScopeAndLevel(base: Logger, scope: string, level: LogLevel): Logger {
  const prefix = `[${scope}]`

  const getLogger = (msgLevel: LogLevel): LogFn => {
    if (!passesLevel(msgLevel, level)) return NOOP
    // Bound rather than wrapped, so devtools attribute the line to the caller
    // and not to this file.
    return base[msgLevel].bind(base, prefix)
  }

  return {
    get debug() {
      return getLogger('debug')
    },
    get info() {
      return getLogger('info')
    },
    get warn() {
      return getLogger('warn')
    },
    get error() {
      return getLogger('error')
    },
  }
}

export function basicLogger(): Logger {
  return console
}

export function nullLogger(): Logger {
  return { debug: NOOP, info: NOOP, warn: NOOP, error: NOOP }
}

export function defaultLogger(): Logger {
  return basicLogger()
}
