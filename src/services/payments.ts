/**
 * Payments Service
 * Tracks which deposits have had their melange paid out
 *
 * A deposit is owed until an admin pays it; paying stamps `paid_at` and
 * `paid_by` on every unpaid deposit it covers, in one transaction.
 */

import type { Database } from 'better-sqlite3'
import type { UserPayout } from '../types/index.js'
import { withTransaction } from '../db/connection.js'
import { logger } from '../utils/logger.js'

interface PayoutRow {
  user_id: string
  username: string | null
  deposit_count: number
  sand_amount: number
  melange_amount: number
}

function parsePayoutRow(row: PayoutRow): UserPayout {
  return {
    userId: row.user_id,
    username: row.username,
    depositCount: row.deposit_count,
    sandAmount: row.sand_amount,
    melangeAmount: row.melange_amount,
  }
}

const UNPAID_BY_USER = `
  SELECT
    d.user_id,
    u.username,
    COUNT(*) as deposit_count,
    SUM(d.sand_amount) as sand_amount,
    SUM(d.melange_amount) as melange_amount
  FROM deposits d
  JOIN users u ON u.id = d.user_id
  WHERE d.paid_at IS NULL
`

/**
 * Unpaid deposits grouped by user, largest melange owed first
 */
export function getPendingPayouts(db: Database): UserPayout[] {
  const rows = db.prepare(`
    ${UNPAID_BY_USER}
    GROUP BY d.user_id
    ORDER BY melange_amount DESC, sand_amount DESC, d.user_id ASC
  `).all() as PayoutRow[]

  return rows.map(parsePayoutRow)
}

/**
 * What one user is owed (zeros when nothing is pending)
 */
export function getPendingPayout(db: Database, userId: string): UserPayout {
  const row = db.prepare(`
    ${UNPAID_BY_USER}
      AND d.user_id = ?
    GROUP BY d.user_id
  `).get(userId) as PayoutRow | undefined

  return row
    ? parsePayoutRow(row)
    : { userId, username: null, depositCount: 0, sandAmount: 0, melangeAmount: 0 }
}

/**
 * Mark every unpaid deposit of one user as paid
 *
 * Returns what was paid; nothing changes when the user is owed nothing.
 */
export function markUserPaid(db: Database, userId: string, paidBy: string): UserPayout {
  return withTransaction(db, () => {
    const payout = getPendingPayout(db, userId)
    if (payout.depositCount === 0) {
      return payout
    }

    db.prepare(`
      UPDATE deposits SET paid_at = datetime('now'), paid_by = ?
      WHERE user_id = ? AND paid_at IS NULL
    `).run(paidBy, userId)

    logger.info({
      userId,
      paidBy,
      deposits: payout.depositCount,
      sand: payout.sandAmount,
      melange: payout.melangeAmount,
    }, 'Paid user deposits')

    return payout
  })
}

/**
 * Mark every unpaid deposit as paid, for all users at once
 */
export function markAllPaid(db: Database, paidBy: string): UserPayout[] {
  return withTransaction(db, () => {
    const payouts = getPendingPayouts(db)
    if (payouts.length === 0) {
      return payouts
    }

    const result = db.prepare(`
      UPDATE deposits SET paid_at = datetime('now'), paid_by = ?
      WHERE paid_at IS NULL
    `).run(paidBy)

    logger.info({
      paidBy,
      users: payouts.length,
      deposits: result.changes,
      melange: payouts.reduce((sum, p) => sum + p.melangeAmount, 0),
    }, 'Ran payroll')

    return payouts
  })
}
