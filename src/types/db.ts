/**
 * Database Row Types
 * These match the SQLite schema structure
 */

/**
 * User record (keyed by Discord user ID)
 */
export interface UserRow {
  id: string                  // Discord user ID
  username: string | null     // Display name (cached)
  sand_total: number
  melange_total: number
  sand_remainder: number      // solo sand not yet refined
  remainder_rate: number | null
  created_at: string          // SQLite UTC datetime
  updated_at: string
}

/**
 * Key/value setting (conversion rate, default guild cut)
 */
export interface SettingRow {
  key: string
  value: string
  modified_by: string | null
  modified_at: string
}

/**
 * Expedition record (immutable once inserted)
 */
export interface ExpeditionRow {
  id: number
  initiator_id: string
  initiator_username: string | null
  total_sand: number
  participant_count: number
  harvester_cut_pct: number
  guild_cut_pct: number
  sand_per_melange: number
  guild_sand: number
  harvester_sand: number
  per_participant_sand: number
  unallocated_sand: number
  landsraad_bonus: number     // 0 | 1
  created_at: string
}

/**
 * One credit applied by an expedition
 */
export interface ExpeditionParticipantRow {
  expedition_id: number
  user_id: string
  username: string | null
  role: string                // ExpeditionCreditRole
  sand_amount: number
  melange_amount: number
}

/**
 * One sand credit to a user (append-only apart from its payout)
 */
export interface DepositRow {
  id: number
  user_id: string
  username: string | null
  deposit_type: string        // DepositType
  sand_amount: number
  melange_amount: number
  sand_per_melange: number
  expedition_id: number | null
  created_at: string
  paid_at: string | null
  paid_by: string | null
}

/**
 * Guild treasury (one row per guild)
 */
export interface GuildTreasuryRow {
  id: number
  guild_name: string
  total_sand: number
  total_melange: number
  created_at: string
  updated_at: string
}

/**
 * Guild transaction record (append-only audit log)
 */
export interface GuildTransactionRow {
  id: number
  guild_name: string
  transaction_type: string    // GuildTransactionType
  sand_amount: number
  melange_amount: number
  expedition_id: number | null
  admin_user_id: string | null
  admin_username: string | null
  target_user_id: string | null
  target_username: string | null
  description: string | null
  created_at: string
}
