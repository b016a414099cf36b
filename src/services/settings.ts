/**
 * Settings Service
 * Runtime-configurable values stored in the settings table
 *
 * Configuration sources:
 * - Database (primary): values changed by admins
 * - Environment variables: seed the table on first start (see initDatabase)
 *
 * Priority: DB value > hardcoded default
 */

import type { Database } from 'better-sqlite3'
import type { SettingKey, SettingRow } from '../types/index.js'
import { DEFAULT_GUILD_CUT_PCT, DEFAULT_SAND_PER_MELANGE, SettingKeys } from '../types/index.js'
import { withTransaction } from '../db/connection.js'
import { InvalidInputError } from '../utils/errors.js'
import { toPercentShare } from './split.js'
import { logger } from '../utils/logger.js'

/**
 * Read a raw setting row
 */
function getSettingRow(db: Database, key: SettingKey): SettingRow | undefined {
  return db.prepare(`
    SELECT key, value, modified_by, modified_at FROM settings WHERE key = ?
  `).get(key) as SettingRow | undefined
}

/**
 * Read a numeric setting, falling back when missing or unparseable
 */
function getNumericSetting(
  db: Database,
  key: SettingKey,
  fallback: number,
  isValid: (value: number) => boolean
): number {
  const row = getSettingRow(db, key)
  if (!row) {
    return fallback
  }

  const value = Number(row.value)
  if (!isValid(value)) {
    logger.warn({ key, value: row.value }, 'Stored setting is invalid, using default')
    return fallback
  }
  return value
}

/**
 * Upsert a setting with modification tracking
 */
function writeSetting(db: Database, key: SettingKey, value: string, modifiedBy: string | null): void {
  withTransaction(db, () => {
    db.prepare(`
      INSERT INTO settings (key, value, modified_by, modified_at)
      VALUES (?, ?, ?, datetime('now'))
      ON CONFLICT(key) DO UPDATE SET
        value = excluded.value,
        modified_by = excluded.modified_by,
        modified_at = excluded.modified_at
    `).run(key, value, modifiedBy ?? 'unknown')
  })
}

/**
 * Current conversion rate (sand per melange)
 */
export function getSandPerMelange(db: Database): number {
  return getNumericSetting(
    db,
    SettingKeys.SAND_PER_MELANGE,
    DEFAULT_SAND_PER_MELANGE,
    v => Number.isSafeInteger(v) && v > 0
  )
}

/**
 * Update the conversion rate
 *
 * Totals accumulated under the previous rate are not recalculated.
 */
export function setRate(db: Database, newRate: number, modifiedBy: string | null = null): number {
  if (!Number.isSafeInteger(newRate) || newRate <= 0) {
    throw new InvalidInputError(
      `Conversion rate must be a positive whole number of sand per melange (got ${newRate})`,
      'rate > 0',
      { rate: newRate }
    )
  }

  const previous = getSandPerMelange(db)
  writeSetting(db, SettingKeys.SAND_PER_MELANGE, String(newRate), modifiedBy)

  logger.info({ previous, rate: newRate, modifiedBy }, 'Updated conversion rate')

  return newRate
}

/**
 * Default guild cut percentage applied to new expeditions
 */
export function getGuildCutPct(db: Database): number {
  return getNumericSetting(
    db,
    SettingKeys.GUILD_CUT_PCT,
    DEFAULT_GUILD_CUT_PCT,
    v => Number.isFinite(v) && v >= 0 && v <= 100
  )
}

/**
 * Update the default guild cut percentage
 */
export function setGuildCutPct(db: Database, pct: number, modifiedBy: string | null = null): number {
  toPercentShare(pct, 'guildCutPct')

  const previous = getGuildCutPct(db)
  writeSetting(db, SettingKeys.GUILD_CUT_PCT, String(pct), modifiedBy)

  logger.info({ previous, guildCutPct: pct, modifiedBy }, 'Updated default guild cut')

  return pct
}

/**
 * Who last changed a setting, and when
 */
export function getSettingInfo(db: Database, key: SettingKey): {
  modifiedBy: string | null
  modifiedAt: string | null
} {
  const row = getSettingRow(db, key)
  return {
    modifiedBy: row?.modified_by ?? null,
    modifiedAt: row?.modified_at ?? null,
  }
}
