/**
 * Expedition Service
 * Applies a team split to the ledger as one all-or-nothing unit
 */

import type { Database } from 'better-sqlite3'
import type {
  Expedition,
  ExpeditionCredit,
  ExpeditionCreditRole,
  ExpeditionParticipantRow,
  ExpeditionResult,
  ExpeditionRow,
} from '../types/index.js'
import { parseSqliteDate, withTransaction } from '../db/connection.js'
import { ConsistencyError, InvalidInputError, NotFoundError } from '../utils/errors.js'
import { computeSplit } from './split.js'
import { creditExpeditionShare, creditGuildTreasury } from './ledger.js'
import { logger } from '../utils/logger.js'

export interface RunExpeditionParams {
  totalSand: number
  /** Ordered, distinct user IDs sharing the even split */
  participantIds: string[]
  /** Display names keyed by user ID, cached on the user rows */
  participantNames?: Record<string, string | null>
  harvesterCutPct: number
  guildCutPct: number
  /** Initiating user; receives the harvester cut */
  harvesterId: string
  harvesterName?: string | null
  /** Rate the shares are refined at (already reduced when the Landsraad bonus applies) */
  sandPerMelange: number
  landsraadBonus?: boolean
  guildName: string
}

function isCreditRole(value: string): value is ExpeditionCreditRole {
  return value === 'participant' || value === 'harvester'
}

function parseExpeditionRow(row: ExpeditionRow): Expedition {
  return {
    id: row.id,
    initiatorId: row.initiator_id,
    initiatorUsername: row.initiator_username,
    totalSand: row.total_sand,
    participantCount: row.participant_count,
    harvesterCutPct: row.harvester_cut_pct,
    guildCutPct: row.guild_cut_pct,
    sandPerMelange: row.sand_per_melange,
    guildSand: row.guild_sand,
    harvesterSand: row.harvester_sand,
    perParticipantSand: row.per_participant_sand,
    unallocatedSand: row.unallocated_sand,
    landsraadBonus: row.landsraad_bonus === 1,
    createdAt: parseSqliteDate(row.created_at),
  }
}

function parseParticipantRow(row: ExpeditionParticipantRow): ExpeditionCredit {
  if (!isCreditRole(row.role)) {
    throw new ConsistencyError(`Unknown expedition credit role "${row.role}"`, {
      expeditionId: row.expedition_id,
      userId: row.user_id,
    })
  }

  return {
    userId: row.user_id,
    username: row.username,
    role: row.role,
    sandAmount: row.sand_amount,
    melangeAmount: row.melange_amount,
  }
}

/**
 * Check the participant list before anything is computed or written
 */
function validateParticipants(participantIds: string[]): void {
  if (participantIds.length === 0) {
    throw new InvalidInputError('An expedition needs at least one participant', 'participantIds is non-empty')
  }

  const seen = new Set<string>()
  for (const id of participantIds) {
    if (id.trim().length === 0) {
      throw new InvalidInputError('Participant IDs cannot be blank', 'participantIds has no blank entries')
    }
    if (seen.has(id)) {
      throw new InvalidInputError(
        `Participant ${id} is listed more than once`,
        'participantIds are distinct',
        { duplicate: id }
      )
    }
    seen.add(id)
  }
}

/**
 * Run one expedition: split the sand, credit everyone, fund the treasury
 *
 * Everything happens in a single transaction, so a failure on any credit
 * leaves no trace of the expedition at all.
 */
export function runExpedition(db: Database, params: RunExpeditionParams): ExpeditionResult {
  validateParticipants(params.participantIds)

  if (!Number.isSafeInteger(params.totalSand) || params.totalSand < 1) {
    throw new InvalidInputError(
      `Total sand must be at least 1 (got ${params.totalSand})`,
      'totalSand >= 1',
      { totalSand: params.totalSand }
    )
  }

  const split = computeSplit(
    params.totalSand,
    params.participantIds.length,
    params.harvesterCutPct,
    params.guildCutPct,
    params.sandPerMelange
  )

  const nameOf = (userId: string): string | null =>
    params.participantNames?.[userId] ?? (userId === params.harvesterId ? params.harvesterName ?? null : null)

  const result = withTransaction(db, () => {
    const inserted = db.prepare(`
      INSERT INTO expeditions (
        initiator_id, initiator_username, total_sand, participant_count,
        harvester_cut_pct, guild_cut_pct, sand_per_melange,
        guild_sand, harvester_sand, per_participant_sand, unallocated_sand, landsraad_bonus
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      params.harvesterId,
      params.harvesterName ?? null,
      split.totalSand,
      split.participantCount,
      split.harvesterCutPct,
      split.guildCutPct,
      split.sandPerMelange,
      split.guildSand,
      split.harvesterSand,
      split.perParticipantSand,
      split.unallocatedSand,
      params.landsraadBonus ? 1 : 0
    )
    const expeditionId = Number(inserted.lastInsertRowid)

    const recordCredit = db.prepare(`
      INSERT INTO expedition_participants (expedition_id, user_id, username, role, sand_amount, melange_amount)
      VALUES (?, ?, ?, ?, ?, ?)
    `)

    const credits: ExpeditionCredit[] = []
    const applyCredit = (userId: string, role: ExpeditionCreditRole, sandAmount: number): void => {
      const username = nameOf(userId)
      const { melangeDelta } = creditExpeditionShare(db, userId, username, sandAmount, split.sandPerMelange, expeditionId)
      recordCredit.run(expeditionId, userId, username, role, sandAmount, melangeDelta)
      credits.push({ userId, username, role, sandAmount, melangeAmount: melangeDelta })
    }

    for (const participantId of params.participantIds) {
      applyCredit(participantId, 'participant', split.perParticipantSand)
    }

    // Harvester cut is a separate credit, even when the harvester also took a share
    if (split.harvesterSand > 0) {
      applyCredit(params.harvesterId, 'harvester', split.harvesterSand)
    }

    let guildTransactionId: number | null = null
    if (split.guildSand > 0) {
      const transaction = creditGuildTreasury(db, params.guildName, split.guildSand, split.melange.guild, {
        expeditionId,
        adminUserId: params.harvesterId,
        adminUsername: params.harvesterName ?? null,
        description: `Guild cut (${split.guildCutPct}%) from expedition #${expeditionId}`,
      })
      guildTransactionId = transaction.id
    }

    return { expeditionId, split, credits, guildTransactionId }
  })

  logger.info({
    expeditionId: result.expeditionId,
    harvesterId: params.harvesterId,
    totalSand: split.totalSand,
    participants: split.participantCount,
    guildSand: split.guildSand,
    harvesterSand: split.harvesterSand,
    perParticipantSand: split.perParticipantSand,
    unallocatedSand: split.unallocatedSand,
    sandPerMelange: split.sandPerMelange,
    landsraadBonus: params.landsraadBonus ?? false,
  }, 'Expedition recorded')

  return result
}

/**
 * Get an expedition by ID
 */
export function getExpedition(db: Database, expeditionId: number): Expedition | null {
  const row = db.prepare(`
    SELECT * FROM expeditions WHERE id = ?
  `).get(expeditionId) as ExpeditionRow | undefined

  return row ? parseExpeditionRow(row) : null
}

/**
 * Get an expedition together with every credit it applied
 */
export function getExpeditionDetails(
  db: Database,
  expeditionId: number
): { expedition: Expedition; credits: ExpeditionCredit[] } {
  const expedition = getExpedition(db, expeditionId)
  if (!expedition) {
    throw new NotFoundError(`Expedition #${expeditionId} not found`, 'expedition')
  }

  const rows = db.prepare(`
    SELECT * FROM expedition_participants
    WHERE expedition_id = ?
    ORDER BY rowid
  `).all(expeditionId) as ExpeditionParticipantRow[]

  return {
    expedition,
    credits: rows.map(parseParticipantRow),
  }
}

/**
 * Most recent expeditions, newest first
 */
export function getRecentExpeditions(db: Database, limit: number = 10): Expedition[] {
  const rows = db.prepare(`
    SELECT * FROM expeditions ORDER BY id DESC LIMIT ?
  `).all(limit) as ExpeditionRow[]

  return rows.map(parseExpeditionRow)
}
