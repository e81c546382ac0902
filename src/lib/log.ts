export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export type Logger = {
  error: (message: string, ...details: unknown[]) => void
  warn: (message: string, ...details: unknown[]) => void
  info: (message: string, ...details: unknown[]) => void
  debug: (message: string, ...details: unknown[]) => void
}

function enabled(current: LogLevel, wanted: LogLevel) {
  return LOG_LEVELS.indexOf(current) >= LOG_LEVELS.indexOf(wanted)
}

// Console-backed logger; calls below the configured level are dropped
export function createLogger(level: LogLevel, sink: Pick<Console, 'error' | 'warn' | 'info' | 'debug'> = console): Logger {
  return {
    error: (message, ...details) => {
      if (enabled(level, 'error')) sink.error(message, ...details)
    },
    warn: (message, ...details) => {
      if (enabled(level, 'warn')) sink.warn(message, ...details)
    },
    info: (message, ...details) => {
      if (enabled(level, 'info')) sink.info(message, ...details)
    },
    debug: (message, ...details) => {
      if (enabled(level, 'debug')) sink.debug(message, ...details)
    },
  }
}
