export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type Logger = {
  debug: (message: string, ...details: unknown[]) => void
  info: (message: string, ...details: unknown[]) => void
  warn: (message: string, ...details: unknown[]) => void
  error: (message: string, ...details: unknown[]) => void
  child: (scope: string) => Logger
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

export function createLogger(scope: string, options: { level?: LogLevel } = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info']

  const write = (level: LogLevel) => (message: string, ...details: unknown[]) => {
    if (LEVEL_ORDER[level] < threshold) return
    console[level](`[${scope}] ${message}`, ...details)
  }

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    child: (child) => createLogger(`${scope}:${child}`, options),
  }
}

/** Logger that drops everything; used where a caller passes none. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
}
