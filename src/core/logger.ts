const PREFIX = '[google-api-hubs]'

export type TLogLevel = 'debug' | 'warn' | 'error' | 'silent'

const LEVEL_ORDER: Record<TLogLevel, number> = { debug: 0, warn: 1, error: 2, silent: 3 }

function isLogLevel(value: string | undefined): value is TLogLevel {
  return value !== undefined && value in LEVEL_ORDER
}

const envLevel = process.env.GOOGLE_API_HUBS_LOG_LEVEL
let currentLevel: TLogLevel = isLogLevel(envLevel) ? envLevel : 'warn'

export function setLogLevel(level: TLogLevel): TLogLevel {
  const previous = currentLevel
  currentLevel = level
  return previous
}

function enabled(level: Exclude<TLogLevel, 'silent'>): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel]
}

export const logger = {
  debug(message: string, ...args: unknown[]): void {
    if (enabled('debug')) console.debug(PREFIX, message, ...args)
  },

  warn(message: string, ...args: unknown[]): void {
    if (enabled('warn')) console.warn(PREFIX, message, ...args)
  },

  error(message: string, ...args: unknown[]): void {
    if (enabled('error')) console.error(PREFIX, message, ...args)
  },
}
