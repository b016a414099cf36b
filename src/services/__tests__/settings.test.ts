import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { Database } from 'better-sqlite3'
import { initDatabase } from '../../db/connection.js'
import { getGuildCutPct, getSandPerMelange, getSettingInfo, setGuildCutPct, setRate } from '../settings.js'
import { SettingKeys } from '../../types/index.js'
import { InvalidInputError } from '../../utils/errors.js'

describe('settings', () => {
  let db: Database

  beforeEach(() => {
    db = initDatabase(':memory:')
  })

  afterEach(() => {
    db.close()
  })

  it('seeds the default rate and guild cut', () => {
    expect(getSandPerMelange(db)).toBe(50)
    expect(getGuildCutPct(db)).toBe(10)
    expect(getSettingInfo(db, SettingKeys.SAND_PER_MELANGE).modifiedBy).toBe('seed')
  })

  it('seeds from the given defaults on a fresh database', () => {
    const seeded = initDatabase(':memory:', { defaultSandPerMelange: 75, defaultGuildCutPct: 12.5 })
    try {
      expect(getSandPerMelange(seeded)).toBe(75)
      expect(getGuildCutPct(seeded)).toBe(12.5)
    } finally {
      seeded.close()
    }
  })

  it('stores a new rate with who changed it', () => {
    expect(setRate(db, 40, 'admin-1')).toBe(40)

    expect(getSandPerMelange(db)).toBe(40)
    expect(getSettingInfo(db, SettingKeys.SAND_PER_MELANGE).modifiedBy).toBe('admin-1')
  })

  it('rejects rates that are not positive whole numbers', () => {
    expect(() => setRate(db, 0)).toThrow(InvalidInputError)
    expect(() => setRate(db, -5)).toThrow(InvalidInputError)
    expect(() => setRate(db, 2.5)).toThrow(InvalidInputError)
    expect(getSandPerMelange(db)).toBe(50)
  })

  it('updates the guild cut within 0-100 with two decimals at most', () => {
    expect(setGuildCutPct(db, 7.25, 'admin-1')).toBe(7.25)
    expect(getGuildCutPct(db)).toBe(7.25)

    expect(() => setGuildCutPct(db, 101)).toThrow(InvalidInputError)
    expect(() => setGuildCutPct(db, 1.234)).toThrow(InvalidInputError)
    expect(getGuildCutPct(db)).toBe(7.25)
  })

  it('falls back to the default when a stored value is unusable', () => {
    db.prepare(`UPDATE settings SET value = 'lots' WHERE key = ?`).run(SettingKeys.SAND_PER_MELANGE)

    expect(getSandPerMelange(db)).toBe(50)
  })
})
