/**
 * SQLite Database Connection
 */

import Database from 'better-sqlite3'
import { existsSync, mkdirSync } from 'fs'
import { dirname } from 'path'
import { SCHEMA } from './schema.js'
import { logger } from '../utils/logger.js'
import { ConsistencyError, RefineryError, StorageError } from '../utils/errors.js'
import { DEFAULT_GUILD_CUT_PCT, DEFAULT_SAND_PER_MELANGE, SettingKeys } from '../types/index.js'

export type { Database } from 'better-sqlite3'

export interface InitDatabaseOptions {
  /** Busy timeout: how long a write waits for the lock before failing */
  timeoutMs?: number
  /** Seed values for settings that are not stored yet */
  defaultSandPerMelange?: number
  defaultGuildCutPct?: number
}

/** Driver error codes that may succeed when retried */
const TRANSIENT_CODES = ['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_IOERR', 'SQLITE_PROTOCOL']

/** Driver error codes meaning the database itself is unusable */
const UNAVAILABLE_CODES = ['SQLITE_CANTOPEN', 'SQLITE_FULL', 'SQLITE_READONLY', 'SQLITE_CORRUPT', 'SQLITE_NOTADB', 'SQLITE_PERM']

/**
 * Initialize database connection and create schema
 */
export function initDatabase(dbPath: string, options: InitDatabaseOptions = {}): Database.Database {
  // Ensure directory exists
  if (dbPath !== ':memory:') {
    const dir = dirname(dbPath)
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true })
      logger.info({ dir }, 'Created database directory')
    }
  }

  try {
    const db = new Database(dbPath, { timeout: options.timeoutMs ?? 5000 })

    // Enable WAL mode for better concurrency
    db.pragma('journal_mode = WAL')

    // Enable foreign keys (expedition references are RESTRICT)
    db.pragma('foreign_keys = ON')

    // Create schema
    db.exec(SCHEMA)

    // Seed settings; stored values always win over the seeds
    const seed = db.prepare(`INSERT OR IGNORE INTO settings (key, value, modified_by) VALUES (?, ?, 'seed')`)
    seed.run(SettingKeys.SAND_PER_MELANGE, String(options.defaultSandPerMelange ?? DEFAULT_SAND_PER_MELANGE))
    seed.run(SettingKeys.GUILD_CUT_PCT, String(options.defaultGuildCutPct ?? DEFAULT_GUILD_CUT_PCT))

    logger.info({ dbPath }, 'Database initialized')

    return db
  } catch (error) {
    throw new StorageError(
      `Failed to initialize database: ${error instanceof Error ? error.message : String(error)}`,
      false,
      error
    )
  }
}

/**
 * Close database connection
 */
export function closeDatabase(db: Database.Database): void {
  try {
    db.close()
    logger.info('Database connection closed')
  } catch (error) {
    logger.error({ error }, 'Error closing database')
  }
}

/**
 * Extract the driver error code, if the error carries one
 */
function sqliteCode(error: unknown): string | null {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string' && error.code.startsWith('SQLITE_')) {
    return error.code
  }
  return null
}

/**
 * Map a driver error onto the refinery error kinds
 *
 * Errors that are already RefineryErrors pass through untouched.
 */
export function toRefineryError(error: unknown, db: Database.Database): unknown {
  if (error instanceof RefineryError) {
    return error
  }

  if (!db.open) {
    return new StorageError('Database connection is not open', false, error)
  }

  const code = sqliteCode(error)
  if (code === null) {
    return error
  }

  if (TRANSIENT_CODES.some(prefix => code.startsWith(prefix))) {
    return new StorageError(`Storage temporarily unavailable (${code})`, true, error)
  }
  if (UNAVAILABLE_CODES.some(prefix => code.startsWith(prefix))) {
    return new StorageError(`Storage unavailable (${code})`, false, error)
  }
  if (code.startsWith('SQLITE_CONSTRAINT')) {
    return new ConsistencyError('Write rejected by a ledger constraint', {
      code,
      reason: error instanceof Error ? error.message : String(error),
    })
  }

  return error
}

/**
 * Run a function in a transaction
 *
 * All writes inside `fn` land together or not at all. Driver failures are
 * rethrown as StorageError or ConsistencyError.
 */
export function withTransaction<T>(
  db: Database.Database,
  fn: () => T
): T {
  try {
    const transaction = db.transaction(fn)
    return transaction.immediate()
  } catch (error) {
    const mapped = toRefineryError(error, db)
    if (mapped !== error && mapped instanceof ConsistencyError) {
      logger.error({ error: mapped, details: mapped.details, alert: 'operator' }, 'Ledger consistency violation, transaction rolled back')
    }
    throw mapped
  }
}

/**
 * Run a storage operation, retrying exactly once on a transient StorageError
 */
export function withStorageRetry<T>(operation: string, fn: () => T): T {
  try {
    return fn()
  } catch (error) {
    if (!(error instanceof StorageError) || !error.transient) {
      throw error
    }

    logger.warn({ operation, error: error.message }, 'Transient storage error, retrying once')
    return fn()
  }
}

/**
 * Parse a SQLite `datetime('now')` value (UTC, no zone suffix)
 */
export function parseSqliteDate(value: string): Date {
  return new Date(value.replace(' ', 'T') + 'Z')
}
