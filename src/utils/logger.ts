import { loadRuntimeConfig, type LogLevel } from '@/config'

export interface Logger {
  debug: (message: string) => void
  info: (message: string) => void
  warn: (message: string) => void
  error: (message: string) => void
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

let globalLevel: LogLevel | null = null

function currentLevel(): LogLevel {
  if (globalLevel === null) globalLevel = loadRuntimeConfig().config.logLevel
  return globalLevel
}

export function setLogLevel(level: LogLevel) {
  globalLevel = level
}

/**
 * Console logger tagged with an upper-case scope, e.g. `[SUMMARY] ...`.
 * A fixed `level` overrides the process-wide threshold.
 */
export function createLogger(scope: string, level?: LogLevel): Logger {
  const tag = `[${scope.toUpperCase()}]`
  const enabled = (l: LogLevel) => LEVEL_RANK[l] >= LEVEL_RANK[level ?? currentLevel()]
  return {
    debug: (message) => {
      if (enabled('debug')) console.debug(`${tag} ${message}`)
    },
    info: (message) => {
      if (enabled('info')) console.info(`${tag} ${message}`)
    },
    warn: (message) => {
      if (enabled('warn')) console.warn(`${tag} ${message}`)
    },
    error: (message) => {
      if (enabled('error')) console.error(`${tag} ${message}`)
    },
  }
}
