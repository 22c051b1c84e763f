import { describe, expect, it } from 'vitest'
import { DEFAULT_RUNTIME_CONFIG, loadRuntimeConfig } from './config'

describe('loadRuntimeConfig', () => {
  it('uses defaults when nothing is set', () => {
    expect(loadRuntimeConfig({})).toEqual({ config: DEFAULT_RUNTIME_CONFIG, issues: [] })
  })

  it('reads and normalizes the log level and time unit', () => {
    const { config, issues } = loadRuntimeConfig({ BIOSCREEN_LOG_LEVEL: ' WARN ', BIOSCREEN_TIME_UNIT: 'minutes' })
    expect(issues).toEqual([])
    expect(config).toEqual({ logLevel: 'warn', timeUnit: 'minutes' })
  })

  it('falls back to defaults and reports an invalid level', () => {
    const { config, issues } = loadRuntimeConfig({ BIOSCREEN_LOG_LEVEL: 'loud' })
    expect(config).toEqual(DEFAULT_RUNTIME_CONFIG)
    expect(issues).toHaveLength(1)
    expect(issues[0]).toMatch(/^BIOSCREEN_LOG_LEVEL: /)
  })
})
