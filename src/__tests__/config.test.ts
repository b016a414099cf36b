import { describe, it, expect, afterEach, vi } from 'vitest'
import { loadConfig } from '../config.js'
import { initDatabase } from '../db/connection.js'
import { spiceSplit } from '../services/refinery.js'

describe('loadConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('falls back to defaults', () => {
    vi.stubEnv('REFINERY_PORT', '')
    vi.stubEnv('REFINERY_SAND_PER_MELANGE', '')
    vi.stubEnv('REFINERY_SERVICE_TOKENS', '')
    vi.stubEnv('REFINERY_GUILD_NAME', '')

    const config = loadConfig()

    expect(config.port).toBe(3100)
    expect(config.defaultSandPerMelange).toBe(50)
    expect(config.serviceTokens).toEqual([])
    expect(config.guildName).toBe('Default Guild')
  })

  it('reads lists and numbers from the environment', () => {
    vi.stubEnv('REFINERY_SERVICE_TOKENS', 'test-secret, other-secret,')
    vi.stubEnv('REFINERY_ADMIN_ROLES', 'officer')
    vi.stubEnv('REFINERY_GUILD_CUT_PCT', '12.5')
    vi.stubEnv('REFINERY_RATE_LIMIT_MAX', '3')

    const config = loadConfig()

    expect(config.serviceTokens).toEqual(['test-secret', 'other-secret'])
    expect(config.adminRoleIds).toEqual(['officer'])
    expect(config.defaultGuildCutPct).toBe(12.5)
    expect(config.rateLimit.maxInvocations).toBe(3)
  })

  it('fails on invalid numbers', () => {
    vi.stubEnv('REFINERY_SAND_PER_MELANGE', '0')
    expect(() => loadConfig()).toThrow('REFINERY_SAND_PER_MELANGE must be a positive integer (got "0")')

    vi.stubEnv('REFINERY_SAND_PER_MELANGE', '50')
    vi.stubEnv('REFINERY_GUILD_CUT_PCT', 'lots')
    expect(() => loadConfig()).toThrow('REFINERY_GUILD_CUT_PCT must be between 0 and 100 (got "lots")')
  })

  it('seeds a guild cut with more than two decimals that splits exactly', () => {
    vi.stubEnv('REFINERY_GUILD_CUT_PCT', '12.345')

    const config = loadConfig()
    expect(config.defaultGuildCutPct).toBe(12.345)

    const db = initDatabase(':memory:', { defaultGuildCutPct: config.defaultGuildCutPct })
    try {
      const ctx = { userId: '100', username: 'Member', isAdmin: false }
      const { split } = spiceSplit(db, ctx, config.guildName, 1000, ['1'], 0)

      // floor(1000 * 12.345 / 100)
      expect(split).toMatchObject({ guildCutPct: 12.345, guildSand: 123, perParticipantSand: 877 })
    } finally {
      db.close()
    }
  })
})
