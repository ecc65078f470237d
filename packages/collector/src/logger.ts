import type { Logger, LogLevel } from './types.js'

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 }

export function createLogger(opts?: { json?: boolean; level?: LogLevel }): Logger {
  const json = opts?.json === true
  const threshold = LEVEL_ORDER[opts?.level ?? 'info']
  const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= threshold

  if (json) {
    const write = (level: LogLevel, sink: (line: string) => void) =>
      (message: string, meta?: Record<string, unknown>) => {
        if (enabled(level)) sink(JSON.stringify({ level, message, ...meta }))
      }
    return {
      debug: write('debug', console.debug),
      info: write('info', console.info),
      warn: write('warn', console.warn),
      error: write('error', console.error)
    }
  }

  const write = (level: LogLevel, sink: (message: string, meta: unknown) => void) =>
    (message: string, meta?: Record<string, unknown>) => {
      if (enabled(level)) sink(message, meta ?? '')
    }
  return {
    debug: write('debug', console.debug),
    info: write('info', console.info),
    warn: write('warn', console.warn),
    error: write('error', console.error)
  }
}
