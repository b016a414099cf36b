/**
 * API Request/Response Types
 */

// ============================================================================
// GET /health
// ============================================================================

export interface HealthResponse {
  status: 'ok' | 'degraded'
  version: string
  uptime: number
  database: 'ok' | 'unavailable'
}

// ============================================================================
// GET /leaderboard
// ============================================================================

export interface LeaderboardResponse {
  entries: Array<{
    rank: number
    userId: string
    username: string | null
    sandTotal: number
    melangeTotal: number
  }>
  limit: number
}

// ============================================================================
// GET /users/:userId/refines
// ============================================================================

export interface UserRefinesResponse {
  userId: string
  username: string | null
  sandTotal: number
  melangeTotal: number
  updatedAt: string | null
  sandPerMelange: number
}

// ============================================================================
// GET /users/:userId/deposits
// ============================================================================

export interface UserDepositsResponse {
  userId: string
  deposits: Array<{
    id: number
    type: 'solo' | 'expedition'
    sandAmount: number
    melangeAmount: number
    sandPerMelange: number
    expeditionId: number | null
    createdAt: string
    paidAt: string | null
  }>
  unpaid: {
    depositCount: number
    sandAmount: number
    melangeAmount: number
  }
  limit: number
}

// ============================================================================
// GET /treasury
// ============================================================================

export interface TreasuryResponse {
  guildName: string
  totalSand: number
  totalMelange: number
  updatedAt: string
  consistent: boolean
  transactions: Array<{
    id: number
    type: 'deposit' | 'withdrawal'
    sandAmount: number
    melangeAmount: number
    expeditionId: number | null
    description: string | null
    createdAt: string
  }>
}

// ============================================================================
// GET /expeditions, GET /expeditions/:id
// ============================================================================

export interface ExpeditionSummary {
  id: number
  initiatorId: string
  totalSand: number
  participantCount: number
  createdAt: string
}

export interface ExpeditionListResponse {
  expeditions: ExpeditionSummary[]
  limit: number
}

export interface ExpeditionResponse {
  id: number
  initiatorId: string
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
  createdAt: string
  credits: Array<{
    userId: string
    role: 'participant' | 'harvester'
    sandAmount: number
    melangeAmount: number
  }>
}

// ============================================================================
// GET /settings
// ============================================================================

export interface SettingsResponse {
  sandPerMelange: number
  guildCutPct: number
}
