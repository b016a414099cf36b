/**
 * Ledger Service
 * Per-user running totals, the guild treasury and its audit trail
 *
 * Every mutation runs inside withTransaction, and totals are incremented in
 * SQL (`x = x + ?`) so overlapping credits never lose an update.
 */

import type { Database } from 'better-sqlite3'
import type {
  Deposit,
  DepositRow,
  DepositType,
  GuildTransaction,
  GuildTransactionMeta,
  GuildTransactionRow,
  GuildTransactionType,
  GuildTreasury,
  GuildTreasuryRow,
  LeaderboardEntry,
  TreasuryReconciliation,
  UserRow,
  UserTotals,
} from '../types/index.js'
import { DEPOSIT_TYPES, GUILD_TRANSACTION_TYPES } from '../types/index.js'
import { parseSqliteDate, withTransaction } from '../db/connection.js'
import { ConsistencyError, InvalidInputError } from '../utils/errors.js'
import { convert } from './conversion.js'
import { logger } from '../utils/logger.js'

export const MAX_LEADERBOARD_LIMIT = 25

/**
 * Reject anything that is not a non-negative safe integer
 */
function assertAmount(value: number, field: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidInputError(
      `${field} must be a non-negative whole number (got ${value})`,
      `${field} >= 0`,
      { [field]: value }
    )
  }
}

function parseUserRow(row: UserRow): UserTotals {
  return {
    userId: row.id,
    username: row.username,
    sandTotal: row.sand_total,
    melangeTotal: row.melange_total,
    updatedAt: parseSqliteDate(row.updated_at),
  }
}

function parseTreasuryRow(row: GuildTreasuryRow): GuildTreasury {
  return {
    guildName: row.guild_name,
    totalSand: row.total_sand,
    totalMelange: row.total_melange,
    createdAt: parseSqliteDate(row.created_at),
    updatedAt: parseSqliteDate(row.updated_at),
  }
}

function isDepositType(value: string): value is DepositType {
  return DEPOSIT_TYPES.some(type => type === value)
}

function parseDepositRow(row: DepositRow): Deposit {
  if (!isDepositType(row.deposit_type)) {
    throw new ConsistencyError(`Unknown deposit type "${row.deposit_type}"`, { id: row.id })
  }

  return {
    id: row.id,
    userId: row.user_id,
    username: row.username,
    type: row.deposit_type,
    sandAmount: row.sand_amount,
    melangeAmount: row.melange_amount,
    sandPerMelange: row.sand_per_melange,
    expeditionId: row.expedition_id,
    createdAt: parseSqliteDate(row.created_at),
    paidAt: row.paid_at ? parseSqliteDate(row.paid_at) : null,
    paidBy: row.paid_by,
  }
}

function isGuildTransactionType(value: string): value is GuildTransactionType {
  return GUILD_TRANSACTION_TYPES.some(type => type === value)
}

function parseGuildTransactionRow(row: GuildTransactionRow): GuildTransaction {
  if (!isGuildTransactionType(row.transaction_type)) {
    throw new ConsistencyError(`Unknown guild transaction type "${row.transaction_type}"`, { id: row.id })
  }

  return {
    id: row.id,
    guildName: row.guild_name,
    type: row.transaction_type,
    sandAmount: row.sand_amount,
    melangeAmount: row.melange_amount,
    expeditionId: row.expedition_id,
    adminUserId: row.admin_user_id,
    adminUsername: row.admin_username,
    targetUserId: row.target_user_id,
    targetUsername: row.target_username,
    description: row.description,
    createdAt: parseSqliteDate(row.created_at),
  }
}

// ============================================================================
// Users
// ============================================================================

/**
 * Get a user's cumulative totals
 *
 * Unknown users read as zero; no row is created.
 */
export function getUserTotals(db: Database, userId: string): UserTotals {
  const row = db.prepare(`
    SELECT id, username, sand_total, melange_total, sand_remainder, remainder_rate, created_at, updated_at
    FROM users WHERE id = ?
  `).get(userId) as UserRow | undefined

  if (!row) {
    return {
      userId,
      username: null,
      sandTotal: 0,
      melangeTotal: 0,
      updatedAt: null,
    }
  }

  return parseUserRow(row)
}

/**
 * Add sand and melange to a user's totals
 *
 * Creates the user with zero totals first if they have never been credited.
 * A non-null `username` refreshes the cached display name.
 */
export function creditUser(
  db: Database,
  userId: string,
  username: string | null,
  sandDelta: number,
  melangeDelta: number
): UserTotals {
  assertAmount(sandDelta, 'sandDelta')
  assertAmount(melangeDelta, 'melangeDelta')

  return withTransaction(db, () => {
    const row = db.prepare(`
      INSERT INTO users (id, username, sand_total, melange_total)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        sand_total = sand_total + excluded.sand_total,
        melange_total = melange_total + excluded.melange_total,
        username = COALESCE(excluded.username, username),
        updated_at = datetime('now')
      RETURNING id, username, sand_total, melange_total, sand_remainder, remainder_rate, created_at, updated_at
    `).get(userId, username, sandDelta, melangeDelta) as UserRow

    if (!Number.isSafeInteger(row.sand_total) || !Number.isSafeInteger(row.melange_total)) {
      throw new ConsistencyError('User totals exceeded the exact integer range', { userId })
    }

    logger.debug({
      userId,
      sandDelta,
      melangeDelta,
      sandTotal: row.sand_total,
      melangeTotal: row.melange_total,
    }, 'Credited user')

    return parseUserRow(row)
  })
}

/**
 * Solo sand a user has not refined yet, if it was harvested at this rate
 *
 * Sand carried under a different rate is never refined at the new one.
 */
export function getRefiningCarry(db: Database, userId: string, sandPerMelange: number): number {
  const row = db.prepare(`
    SELECT sand_remainder, remainder_rate FROM users WHERE id = ?
  `).get(userId) as Pick<UserRow, 'sand_remainder' | 'remainder_rate'> | undefined

  return row && row.remainder_rate === sandPerMelange ? row.sand_remainder : 0
}

interface NewDeposit {
  userId: string
  username: string | null
  type: DepositType
  sandAmount: number
  melangeAmount: number
  sandPerMelange: number
  expeditionId: number | null
}

/**
 * Append a row to the deposit log
 */
function recordDeposit(db: Database, deposit: NewDeposit): Deposit {
  const row = db.prepare(`
    INSERT INTO deposits (
      user_id, username, deposit_type, sand_amount, melange_amount, sand_per_melange, expedition_id
    ) VALUES (?, ?, ?, ?, ?, ?, ?)
    RETURNING *
  `).get(
    deposit.userId,
    deposit.username,
    deposit.type,
    deposit.sandAmount,
    deposit.melangeAmount,
    deposit.sandPerMelange,
    deposit.expeditionId
  ) as DepositRow

  return parseDepositRow(row)
}

export interface SandCredit {
  totals: UserTotals
  melangeDelta: number
  deposit: Deposit
}

export interface SoloDeposit extends SandCredit {
  /** Sand carried toward the next melange at this rate */
  remainderSand: number
}

/**
 * Credit solo sand to a user and refine whatever melange it completes
 *
 * The new sand is refined together with the user's carry from earlier solo
 * harvests at the same rate. Melange already credited is never touched, so a
 * rate change only affects sand deposited after it.
 */
export function depositSand(
  db: Database,
  userId: string,
  username: string | null,
  sandDelta: number,
  sandPerMelange: number
): SoloDeposit {
  assertAmount(sandDelta, 'sandDelta')

  return withTransaction(db, () => {
    const carried = getRefiningCarry(db, userId, sandPerMelange)
    const { melange, remainderSand } = convert(carried + sandDelta, sandPerMelange)

    const totals = creditUser(db, userId, username, sandDelta, melange)
    db.prepare(`
      UPDATE users SET sand_remainder = ?, remainder_rate = ? WHERE id = ?
    `).run(remainderSand, sandPerMelange, userId)

    const deposit = recordDeposit(db, {
      userId,
      username,
      type: 'solo',
      sandAmount: sandDelta,
      melangeAmount: melange,
      sandPerMelange,
      expeditionId: null,
    })

    return { totals, melangeDelta: melange, remainderSand, deposit }
  })
}

/**
 * Credit one expedition share, refined on its own at the expedition's rate
 *
 * The melange credited is exactly `convert(sandAmount, rate).melange`, the
 * figure the split reports. The user's solo carry is left alone.
 */
export function creditExpeditionShare(
  db: Database,
  userId: string,
  username: string | null,
  sandAmount: number,
  sandPerMelange: number,
  expeditionId: number
): SandCredit {
  assertAmount(sandAmount, 'sandAmount')

  return withTransaction(db, () => {
    const { melange } = convert(sandAmount, sandPerMelange)
    const totals = creditUser(db, userId, username, sandAmount, melange)
    const deposit = recordDeposit(db, {
      userId,
      username,
      type: 'expedition',
      sandAmount,
      melangeAmount: melange,
      sandPerMelange,
      expeditionId,
    })

    return { totals, melangeDelta: melange, deposit }
  })
}

/**
 * A user's deposit log, newest first
 */
export function getUserDeposits(db: Database, userId: string, limit: number = 10): Deposit[] {
  const rows = db.prepare(`
    SELECT * FROM deposits
    WHERE user_id = ?
    ORDER BY id DESC
    LIMIT ?
  `).all(userId, limit) as DepositRow[]

  return rows.map(parseDepositRow)
}

/**
 * Users ordered by melange, then sand (both descending), then user ID
 *
 * Users whose totals are both zero (never credited, or zeroed by a reset)
 * are left out, so a reset clears the board.
 */
export function getLeaderboard(db: Database, limit: number = 10): LeaderboardEntry[] {
  if (!Number.isSafeInteger(limit) || limit < 1 || limit > MAX_LEADERBOARD_LIMIT) {
    throw new InvalidInputError(
      `Leaderboard limit must be between 1 and ${MAX_LEADERBOARD_LIMIT} (got ${limit})`,
      `1 <= limit <= ${MAX_LEADERBOARD_LIMIT}`,
      { limit }
    )
  }

  const rows = db.prepare(`
    SELECT id, username, sand_total, melange_total, sand_remainder, remainder_rate, created_at, updated_at,
      ROW_NUMBER() OVER (ORDER BY melange_total DESC, sand_total DESC, id ASC) as rank
    FROM users
    WHERE sand_total > 0 OR melange_total > 0
    ORDER BY melange_total DESC, sand_total DESC, id ASC
    LIMIT ?
  `).all(limit) as Array<UserRow & { rank: number }>

  return rows.map(row => ({
    ...parseUserRow(row),
    rank: row.rank,
  }))
}

/**
 * Zero every user's totals in one statement
 *
 * Solo carries are dropped too. The guild treasury, its transaction log and
 * the deposit log (with its payout status) are left untouched.
 */
export function resetAllStats(db: Database): number {
  return withTransaction(db, () => {
    const result = db.prepare(`
      UPDATE users SET
        sand_total = 0, melange_total = 0, sand_remainder = 0, remainder_rate = NULL,
        updated_at = datetime('now')
    `).run()

    logger.warn({ usersReset: result.changes }, 'Reset all user stats')

    return result.changes
  })
}

// ============================================================================
// Guild treasury
// ============================================================================

/**
 * Create the guild's treasury row if it does not exist yet
 */
function ensureGuildTreasury(db: Database, guildName: string): void {
  db.prepare(`
    INSERT OR IGNORE INTO guild_treasury (guild_name) VALUES (?)
  `).run(guildName)
}

/**
 * Get the guild treasury (zero totals if nothing was ever deposited)
 */
export function getGuildTreasury(db: Database, guildName: string): GuildTreasury {
  const row = db.prepare(`
    SELECT * FROM guild_treasury WHERE guild_name = ?
  `).get(guildName) as GuildTreasuryRow | undefined

  if (!row) {
    const now = new Date()
    return {
      guildName,
      totalSand: 0,
      totalMelange: 0,
      createdAt: now,
      updatedAt: now,
    }
  }

  return parseTreasuryRow(row)
}

/**
 * Compare the treasury row with the sum of its transaction log
 */
export function reconcileTreasury(db: Database, guildName: string): TreasuryReconciliation {
  const treasury = getGuildTreasury(db, guildName)

  const ledger = db.prepare(`
    SELECT
      COALESCE(SUM(CASE WHEN transaction_type = 'deposit' THEN sand_amount ELSE -sand_amount END), 0) as sand,
      COALESCE(SUM(CASE WHEN transaction_type = 'deposit' THEN melange_amount ELSE -melange_amount END), 0) as melange
    FROM guild_transactions
    WHERE guild_name = ?
  `).get(guildName) as { sand: number; melange: number }

  return {
    guildName,
    consistent: ledger.sand === treasury.totalSand && ledger.melange === treasury.totalMelange,
    treasurySand: treasury.totalSand,
    treasuryMelange: treasury.totalMelange,
    ledgerSand: ledger.sand,
    ledgerMelange: ledger.melange,
  }
}

/**
 * Abort the surrounding transaction if the treasury no longer matches its log
 */
function assertReconciled(db: Database, guildName: string): void {
  const reconciliation = reconcileTreasury(db, guildName)
  if (!reconciliation.consistent) {
    logger.error({ ...reconciliation, alert: 'operator' }, 'Guild treasury does not match its transaction log')
    throw new ConsistencyError('Guild treasury does not match its transaction log', { ...reconciliation })
  }
}

/**
 * Append a guild transaction row and return it
 */
function insertGuildTransaction(
  db: Database,
  guildName: string,
  type: GuildTransactionType,
  sandAmount: number,
  melangeAmount: number,
  meta: GuildTransactionMeta
): GuildTransaction {
  const row = db.prepare(`
    INSERT INTO guild_transactions (
      guild_name, transaction_type, sand_amount, melange_amount, expedition_id,
      admin_user_id, admin_username, target_user_id, target_username, description
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    RETURNING *
  `).get(
    guildName,
    type,
    sandAmount,
    melangeAmount,
    meta.expeditionId ?? null,
    meta.adminUserId ?? null,
    meta.adminUsername ?? null,
    meta.targetUserId ?? null,
    meta.targetUsername ?? null,
    meta.description ?? null
  ) as GuildTransactionRow

  return parseGuildTransactionRow(row)
}

/**
 * Deposit into the guild treasury together with its audit record
 */
export function creditGuildTreasury(
  db: Database,
  guildName: string,
  sandDelta: number,
  melangeDelta: number,
  meta: GuildTransactionMeta = {}
): GuildTransaction {
  assertAmount(sandDelta, 'sandDelta')
  assertAmount(melangeDelta, 'melangeDelta')
  if (sandDelta === 0 && melangeDelta === 0) {
    throw new InvalidInputError('A treasury deposit must move some sand or melange', 'sandDelta + melangeDelta > 0')
  }

  return withTransaction(db, () => {
    ensureGuildTreasury(db, guildName)

    db.prepare(`
      UPDATE guild_treasury SET
        total_sand = total_sand + ?,
        total_melange = total_melange + ?,
        updated_at = datetime('now')
      WHERE guild_name = ?
    `).run(sandDelta, melangeDelta, guildName)

    const transaction = insertGuildTransaction(db, guildName, 'deposit', sandDelta, melangeDelta, meta)
    assertReconciled(db, guildName)

    logger.info({
      guildName,
      sandDelta,
      melangeDelta,
      transactionId: transaction.id,
      expeditionId: transaction.expeditionId,
    }, 'Deposited into guild treasury')

    return transaction
  })
}

/**
 * Withdraw from the guild treasury together with its audit record
 */
export function withdrawFromGuildTreasury(
  db: Database,
  guildName: string,
  sandAmount: number,
  melangeAmount: number,
  meta: GuildTransactionMeta = {}
): GuildTransaction {
  assertAmount(sandAmount, 'sandAmount')
  assertAmount(melangeAmount, 'melangeAmount')
  if (sandAmount === 0 && melangeAmount === 0) {
    throw new InvalidInputError('A treasury withdrawal must move some sand or melange', 'sandAmount + melangeAmount > 0')
  }

  return withTransaction(db, () => {
    const treasury = getGuildTreasury(db, guildName)
    if (sandAmount > treasury.totalSand || melangeAmount > treasury.totalMelange) {
      throw new InvalidInputError(
        `The treasury holds ${treasury.totalSand} sand and ${treasury.totalMelange} melange; ` +
        `cannot withdraw ${sandAmount} sand and ${melangeAmount} melange`,
        'withdrawal <= treasury balance',
        { available: { sand: treasury.totalSand, melange: treasury.totalMelange } }
      )
    }

    db.prepare(`
      UPDATE guild_treasury SET
        total_sand = total_sand - ?,
        total_melange = total_melange - ?,
        updated_at = datetime('now')
      WHERE guild_name = ?
    `).run(sandAmount, melangeAmount, guildName)

    const transaction = insertGuildTransaction(db, guildName, 'withdrawal', sandAmount, melangeAmount, meta)
    assertReconciled(db, guildName)

    logger.info({
      guildName,
      sandAmount,
      melangeAmount,
      transactionId: transaction.id,
      adminUserId: transaction.adminUserId,
      targetUserId: transaction.targetUserId,
    }, 'Withdrew from guild treasury')

    return transaction
  })
}

/**
 * Most recent guild transactions, newest first
 */
export function getGuildTransactions(db: Database, guildName: string, limit: number = 10): GuildTransaction[] {
  const rows = db.prepare(`
    SELECT * FROM guild_transactions
    WHERE guild_name = ?
    ORDER BY id DESC
    LIMIT ?
  `).all(guildName, limit) as GuildTransactionRow[]

  return rows.map(parseGuildTransactionRow)
}
