/**
 * Refinery Commands
 * The operations behind each chat command, independent of Discord
 *
 * Admin-only operations trust the `isAdmin` flag on the CommandContext; the
 * chat platform decides who holds it.
 */

import type { Database } from 'better-sqlite3'
import type {
  CommandContext,
  Deposit,
  ExpeditionCredit,
  ExpeditionResult,
  Expedition,
  GuildTransaction,
  LeaderboardEntry,
  TreasuryReconciliation,
  GuildTreasury,
  UserPayout,
  UserTotals,
} from '../types/index.js'
import { SettingKeys } from '../types/index.js'
import { withStorageRetry } from '../db/connection.js'
import { InvalidInputError, PermissionDeniedError } from '../utils/errors.js'
import { landsraadRate } from './conversion.js'
import {
  depositSand,
  getGuildTransactions,
  getRefiningCarry,
  getGuildTreasury,
  getLeaderboard,
  getUserDeposits,
  getUserTotals,
  reconcileTreasury,
  resetAllStats,
  withdrawFromGuildTreasury,
} from './ledger.js'
import { getExpeditionDetails, runExpedition } from './expedition.js'
import { getPendingPayout, getPendingPayouts, markAllPaid, markUserPaid } from './payments.js'
import {
  getGuildCutPct,
  getSandPerMelange,
  getSettingInfo,
  setGuildCutPct,
  setRate as storeRate,
} from './settings.js'
import { logger } from '../utils/logger.js'

/** Largest single solo harvest that can be logged */
export const MAX_SOLO_HARVEST = 10_000

function requireAdmin(ctx: CommandContext, action: string): void {
  if (!ctx.isAdmin) {
    logger.warn({ userId: ctx.userId, action }, 'Unauthorized admin command attempt')
    throw new PermissionDeniedError(action)
  }
}

export interface SoloHarvestResult {
  sandAdded: number
  melangeProduced: number
  totals: UserTotals
  sandPerMelange: number
  /** Solo sand carried toward the next melange */
  remainderSand: number
  sandToNextMelange: number
}

/**
 * Log a solo harvest for the calling user
 */
export function logSolo(db: Database, ctx: CommandContext, amount: number): SoloHarvestResult {
  if (!Number.isSafeInteger(amount) || amount < 1 || amount > MAX_SOLO_HARVEST) {
    throw new InvalidInputError(
      `Amount must be between 1 and ${MAX_SOLO_HARVEST.toLocaleString('en-US')} spice sand (got ${amount})`,
      `1 <= amount <= ${MAX_SOLO_HARVEST}`,
      { amount }
    )
  }

  return withStorageRetry('logSolo', () => {
    const sandPerMelange = getSandPerMelange(db)
    const { totals, melangeDelta, remainderSand } = depositSand(db, ctx.userId, ctx.username, amount, sandPerMelange)

    logger.info({
      userId: ctx.userId,
      amount,
      melangeProduced: melangeDelta,
      sandTotal: totals.sandTotal,
    }, 'Logged solo harvest')

    return {
      sandAdded: amount,
      melangeProduced: melangeDelta,
      totals,
      sandPerMelange,
      remainderSand,
      sandToNextMelange: sandPerMelange - remainderSand,
    }
  })
}

export interface SplitOptions {
  /** Overrides the configured guild cut; admins only */
  guildCutPct?: number
  /** Display names keyed by user ID */
  participantNames?: Record<string, string | null>
  /** Refine the shares at the Landsraad-reduced rate */
  landsraadBonus?: boolean
}

/**
 * Split an expedition's sand, with the calling user as harvester
 *
 * The guild cut defaults to the configured setting; only admins may
 * override it.
 */
export function spiceSplit(
  db: Database,
  ctx: CommandContext,
  guildName: string,
  totalSand: number,
  participantIds: string[],
  harvesterCutPct: number,
  options: SplitOptions = {}
): ExpeditionResult {
  const { guildCutPct, participantNames, landsraadBonus = false } = options

  return withStorageRetry('spiceSplit', () => {
    const configuredGuildCut = getGuildCutPct(db)
    if (guildCutPct !== undefined && guildCutPct !== configuredGuildCut) {
      requireAdmin(ctx, 'override the guild cut')
    }

    const rate = getSandPerMelange(db)

    return runExpedition(db, {
      totalSand,
      participantIds,
      participantNames,
      harvesterCutPct,
      guildCutPct: guildCutPct ?? configuredGuildCut,
      harvesterId: ctx.userId,
      harvesterName: ctx.username,
      sandPerMelange: landsraadBonus ? landsraadRate(rate) : rate,
      landsraadBonus,
      guildName,
    })
  })
}

export interface RefinesResult extends UserTotals {
  sandPerMelange: number
  /** Solo sand carried toward the next melange at the current rate */
  remainderSand: number
}

/**
 * Cumulative totals for a user (read-only, repeatable)
 */
export function myRefines(db: Database, userId: string): RefinesResult {
  return withStorageRetry('myRefines', () => {
    const totals = getUserTotals(db, userId)
    const sandPerMelange = getSandPerMelange(db)
    return {
      ...totals,
      sandPerMelange,
      remainderSand: getRefiningCarry(db, userId, sandPerMelange),
    }
  })
}

/** Most deposits one ledger page shows */
export const MAX_LEDGER_LIMIT = 25

export interface LedgerView {
  deposits: Deposit[]
  unpaid: UserPayout
}

/**
 * A user's recent deposits and what they are still owed (read-only)
 */
export function myLedger(db: Database, userId: string, limit: number = 10): LedgerView {
  if (!Number.isSafeInteger(limit) || limit < 1 || limit > MAX_LEDGER_LIMIT) {
    throw new InvalidInputError(
      `Ledger limit must be between 1 and ${MAX_LEDGER_LIMIT} (got ${limit})`,
      `1 <= limit <= ${MAX_LEDGER_LIMIT}`,
      { limit }
    )
  }

  return withStorageRetry('myLedger', () => ({
    deposits: getUserDeposits(db, userId, limit),
    unpaid: getPendingPayout(db, userId),
  }))
}

/**
 * Top refiners by melange
 */
export function leaderboard(db: Database, limit: number = 10): LeaderboardEntry[] {
  return withStorageRetry('leaderboard', () => getLeaderboard(db, limit))
}

/**
 * Change the conversion rate [admin]
 */
export function setRate(db: Database, ctx: CommandContext, newRate: number): { previousRate: number; rate: number } {
  requireAdmin(ctx, 'change the conversion rate')

  return withStorageRetry('setRate', () => {
    const previousRate = getSandPerMelange(db)
    const rate = storeRate(db, newRate, ctx.userId)
    return { previousRate, rate }
  })
}

/**
 * Change the default guild cut [admin]
 */
export function setGuildCut(db: Database, ctx: CommandContext, pct: number): { previousPct: number; pct: number } {
  requireAdmin(ctx, 'change the guild cut')

  return withStorageRetry('setGuildCut', () => {
    const previousPct = getGuildCutPct(db)
    return { previousPct, pct: setGuildCutPct(db, pct, ctx.userId) }
  })
}

export type ResetStatsResult =
  | { status: 'confirmation_required' }
  | { status: 'reset'; usersReset: number }

/**
 * Zero every user's totals [admin]
 *
 * Nothing happens until the caller passes `confirm === true`.
 */
export function resetStats(db: Database, ctx: CommandContext, confirm: boolean): ResetStatsResult {
  requireAdmin(ctx, 'reset refinery statistics')

  if (confirm !== true) {
    return { status: 'confirmation_required' }
  }

  const usersReset = withStorageRetry('resetStats', () => resetAllStats(db))
  logger.warn({ adminUserId: ctx.userId, usersReset }, 'Admin reset all refinery statistics')

  return { status: 'reset', usersReset }
}

export interface ConversionInfo {
  sandPerMelange: number
  guildCutPct: number
  rateModifiedBy: string | null
  rateModifiedAt: string | null
}

/**
 * Current conversion settings
 */
export function conversionInfo(db: Database): ConversionInfo {
  return withStorageRetry('conversionInfo', () => {
    const info = getSettingInfo(db, SettingKeys.SAND_PER_MELANGE)
    return {
      sandPerMelange: getSandPerMelange(db),
      guildCutPct: getGuildCutPct(db),
      rateModifiedBy: info.modifiedBy,
      rateModifiedAt: info.modifiedAt,
    }
  })
}

export interface TreasuryOverview {
  treasury: GuildTreasury
  recentTransactions: GuildTransaction[]
  reconciliation: TreasuryReconciliation
}

/**
 * Guild treasury totals, recent movements and their reconciliation
 */
export function guildTreasury(db: Database, guildName: string, transactionLimit: number = 5): TreasuryOverview {
  return withStorageRetry('guildTreasury', () => ({
    treasury: getGuildTreasury(db, guildName),
    recentTransactions: getGuildTransactions(db, guildName, transactionLimit),
    reconciliation: reconcileTreasury(db, guildName),
  }))
}

/**
 * Pay sand or melange out of the guild treasury [admin]
 */
export function guildWithdraw(
  db: Database,
  ctx: CommandContext,
  guildName: string,
  sandAmount: number,
  melangeAmount: number,
  target?: { userId: string; username: string | null },
  description?: string
): GuildTransaction {
  requireAdmin(ctx, 'withdraw from the guild treasury')

  return withStorageRetry('guildWithdraw', () =>
    withdrawFromGuildTreasury(db, guildName, sandAmount, melangeAmount, {
      adminUserId: ctx.userId,
      adminUsername: ctx.username,
      targetUserId: target?.userId ?? null,
      targetUsername: target?.username ?? null,
      description: description ?? null,
    })
  )
}

/**
 * One expedition and the credits it applied
 */
export function expeditionDetails(
  db: Database,
  expeditionId: number
): { expedition: Expedition; credits: ExpeditionCredit[] } {
  if (!Number.isSafeInteger(expeditionId) || expeditionId < 1) {
    throw new InvalidInputError(
      `Expedition ID must be a positive whole number (got ${expeditionId})`,
      'expeditionId >= 1',
      { expeditionId }
    )
  }
  return withStorageRetry('expeditionDetails', () => getExpeditionDetails(db, expeditionId))
}

export interface PayoutReport {
  payouts: UserPayout[]
  totalDeposits: number
  totalSand: number
  totalMelange: number
}

function summarizePayouts(payouts: UserPayout[]): PayoutReport {
  return {
    payouts,
    totalDeposits: payouts.reduce((sum, p) => sum + p.depositCount, 0),
    totalSand: payouts.reduce((sum, p) => sum + p.sandAmount, 0),
    totalMelange: payouts.reduce((sum, p) => sum + p.melangeAmount, 0),
  }
}

/**
 * Everyone with unpaid deposits [admin]
 */
export function pendingPayments(db: Database, ctx: CommandContext): PayoutReport {
  requireAdmin(ctx, 'view pending payments')
  return withStorageRetry('pendingPayments', () => summarizePayouts(getPendingPayouts(db)))
}

/**
 * Pay out one user's unpaid deposits [admin]
 */
export function payUser(db: Database, ctx: CommandContext, userId: string): UserPayout {
  requireAdmin(ctx, 'process payments')

  return withStorageRetry('payUser', () => markUserPaid(db, userId, ctx.userId))
}

/**
 * Pay out every unpaid deposit [admin]
 */
export function payroll(db: Database, ctx: CommandContext): PayoutReport {
  requireAdmin(ctx, 'process payroll')

  return summarizePayouts(withStorageRetry('payroll', () => markAllPaid(db, ctx.userId)))
}
