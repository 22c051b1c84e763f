import { z } from 'zod'

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

const RuntimeConfigSchema = z.object({
  BIOSCREEN_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(LOG_LEVELS))
    .optional(),
  BIOSCREEN_TIME_UNIT: z.string().trim().min(1).optional(),
})

export interface RuntimeConfig {
  logLevel: LogLevel
  timeUnit: string
}

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = {
  logLevel: 'info',
  timeUnit: 'hours',
}

/**
 * Reads settings from the environment. Invalid values fall back to the
 * defaults; their issues are returned for the caller to log.
 */
export function loadRuntimeConfig(
  env: Record<string, string | undefined> = process.env
): { config: RuntimeConfig; issues: string[] } {
  const parsed = RuntimeConfigSchema.safeParse({
    BIOSCREEN_LOG_LEVEL: env.BIOSCREEN_LOG_LEVEL || undefined,
    BIOSCREEN_TIME_UNIT: env.BIOSCREEN_TIME_UNIT || undefined,
  })
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    return { config: { ...DEFAULT_RUNTIME_CONFIG }, issues }
  }
  return {
    config: {
      logLevel: parsed.data.BIOSCREEN_LOG_LEVEL ?? DEFAULT_RUNTIME_CONFIG.logLevel,
      timeUnit: parsed.data.BIOSCREEN_TIME_UNIT ?? DEFAULT_RUNTIME_CONFIG.timeUnit,
    },
    issues: [],
  }
}
