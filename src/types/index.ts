/**
 * Refinery Core Type Definitions
 */

// Re-export all types
export * from './db.js'
export * from './api.js'

/**
 * Guild transaction types (closed set, mirrored by a CHECK constraint)
 */
export const GUILD_TRANSACTION_TYPES = ['deposit', 'withdrawal'] as const
export type GuildTransactionType = typeof GUILD_TRANSACTION_TYPES[number]

/**
 * How a user was credited by an expedition
 */
export type ExpeditionCreditRole =
  | 'participant' // Even share of the post-cut remainder
  | 'harvester'   // Harvester cut, paid to the initiating user

/**
 * Where a user's sand came from
 */
export const DEPOSIT_TYPES = ['solo', 'expedition'] as const
export type DepositType = typeof DEPOSIT_TYPES[number]

/**
 * Result of converting sand to melange
 */
export interface ConversionResult {
  melange: number
  remainderSand: number
}

/**
 * Breakdown of one expedition split
 *
 * Sand figures are authoritative; the melange figures are each share
 * converted at `sandPerMelange`, which is what the shares are credited as.
 */
export interface SplitResult {
  totalSand: number
  participantCount: number
  harvesterCutPct: number
  guildCutPct: number
  guildSand: number
  remainingSand: number        // totalSand - guildSand
  harvesterSand: number
  distributableSand: number    // remainingSand - harvesterSand
  perParticipantSand: number
  unallocatedSand: number      // division remainder, kept out of every share
  sandPerMelange: number
  melange: {
    guild: number
    harvester: number
    perParticipant: number
  }
}

/**
 * Cumulative totals for one user
 */
export interface UserTotals {
  userId: string
  username: string | null
  sandTotal: number
  melangeTotal: number
  updatedAt: Date | null       // null when the user has never been credited
}

/**
 * One sand credit from the user's deposit log
 */
export interface Deposit {
  id: number
  userId: string
  username: string | null
  type: DepositType
  sandAmount: number
  melangeAmount: number        // melange this credit refined
  sandPerMelange: number       // rate it was refined at
  expeditionId: number | null
  createdAt: Date
  paidAt: Date | null
  paidBy: string | null
}

/**
 * Unpaid deposits of one user, summed
 */
export interface UserPayout {
  userId: string
  username: string | null
  depositCount: number
  sandAmount: number
  melangeAmount: number
}

export interface LeaderboardEntry extends UserTotals {
  rank: number
}

export interface GuildTreasury {
  guildName: string
  totalSand: number
  totalMelange: number
  createdAt: Date
  updatedAt: Date
}

export interface GuildTransaction {
  id: number
  guildName: string
  type: GuildTransactionType
  sandAmount: number
  melangeAmount: number
  expeditionId: number | null
  adminUserId: string | null
  adminUsername: string | null
  targetUserId: string | null
  targetUsername: string | null
  description: string | null
  createdAt: Date
}

/**
 * Audit metadata attached to a treasury movement
 */
export interface GuildTransactionMeta {
  expeditionId?: number | null
  adminUserId?: string | null
  adminUsername?: string | null
  targetUserId?: string | null
  targetUsername?: string | null
  description?: string | null
}

/**
 * Treasury totals compared against the transaction log
 */
export interface TreasuryReconciliation {
  guildName: string
  consistent: boolean
  treasurySand: number
  treasuryMelange: number
  ledgerSand: number           // sum(deposits) - sum(withdrawals)
  ledgerMelange: number
}

export interface Expedition {
  id: number
  initiatorId: string
  initiatorUsername: string | null
  totalSand: number
  participantCount: number
  harvesterCutPct: number
  guildCutPct: number
  sandPerMelange: number
  guildSand: number
  harvesterSand: number
  perParticipantSand: number
  unallocatedSand: number
  landsraadBonus: boolean
  createdAt: Date
}

export interface ExpeditionCredit {
  userId: string
  username: string | null
  role: ExpeditionCreditRole
  sandAmount: number
  melangeAmount: number        // melange actually credited to the user's total
}

export interface ExpeditionResult {
  expeditionId: number
  split: SplitResult
  credits: ExpeditionCredit[]
  guildTransactionId: number | null
}

/**
 * Identity and capabilities of the user invoking a command
 *
 * `isAdmin` is decided by the chat platform's permission model.
 */
export interface CommandContext {
  userId: string
  username: string | null
  isAdmin: boolean
}

/**
 * Rate limiter settings
 */
export interface RateLimitConfig {
  maxInvocations: number       // per (user, command) within the window
  windowSeconds: number
}

/**
 * Process configuration
 */
export interface RefineryConfig {
  port: number
  databasePath: string
  serviceTokens: string[]
  discordToken: string | null
  devGuildId: string | null
  guildName: string
  defaultSandPerMelange: number  // seeds the settings table
  defaultGuildCutPct: number     // seeds the settings table
  storageTimeoutMs: number       // SQLite busy timeout
  rateLimit: RateLimitConfig
  adminUserIds: string[]
  adminRoleIds: string[]
}

/**
 * Setting keys stored in the settings table
 */
export const SettingKeys = {
  SAND_PER_MELANGE: 'sand_per_melange',
  GUILD_CUT_PCT: 'guild_cut_pct',
} as const

export type SettingKey = typeof SettingKeys[keyof typeof SettingKeys]

export const DEFAULT_SAND_PER_MELANGE = 50
export const DEFAULT_GUILD_CUT_PCT = 10
