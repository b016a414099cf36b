import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { Database } from 'better-sqlite3'
import { initDatabase } from '../../db/connection.js'
import { getExpedition, getExpeditionDetails, getRecentExpeditions, runExpedition, type RunExpeditionParams } from '../expedition.js'
import {
  depositSand,
  getGuildTransactions,
  getGuildTreasury,
  getRefiningCarry,
  getUserDeposits,
  getUserTotals,
  reconcileTreasury,
} from '../ledger.js'
import { ConsistencyError, InvalidInputError, NotFoundError } from '../../utils/errors.js'

const GUILD = 'Test Guild'

function params(overrides: Partial<RunExpeditionParams> = {}): RunExpeditionParams {
  return {
    totalSand: 50000,
    participantIds: ['p1', 'p2', 'p3', 'p4', 'p5'],
    harvesterCutPct: 25,
    guildCutPct: 10,
    harvesterId: 'h1',
    harvesterName: 'Harvester',
    sandPerMelange: 50,
    guildName: GUILD,
    ...overrides,
  }
}

function countRows(db: Database, table: 'expeditions' | 'expedition_participants' | 'guild_transactions' | 'users' | 'deposits'): number {
  const row = db.prepare(`SELECT COUNT(*) as n FROM ${table}`).get() as { n: number }
  return row.n
}

describe('runExpedition', () => {
  let db: Database

  beforeEach(() => {
    db = initDatabase(':memory:')
  })

  afterEach(() => {
    db.close()
  })

  it('credits participants, harvester and guild', () => {
    const result = runExpedition(db, params())

    expect(result.split.perParticipantSand).toBe(6750)
    for (const id of ['p1', 'p2', 'p3', 'p4', 'p5']) {
      expect(getUserTotals(db, id)).toMatchObject({ sandTotal: 6750, melangeTotal: 135 })
    }
    expect(getUserTotals(db, 'h1')).toMatchObject({ sandTotal: 11250, melangeTotal: 225, username: 'Harvester' })
    expect(getGuildTreasury(db, GUILD)).toMatchObject({ totalSand: 5000, totalMelange: 100 })

    const [deposit] = getGuildTransactions(db, GUILD)
    expect(deposit).toMatchObject({
      id: result.guildTransactionId,
      type: 'deposit',
      sandAmount: 5000,
      melangeAmount: 100,
      expeditionId: result.expeditionId,
      adminUserId: 'h1',
      description: `Guild cut (10%) from expedition #${result.expeditionId}`,
    })
    expect(reconcileTreasury(db, GUILD).consistent).toBe(true)
  })

  it('gives the harvester a separate credit when they also took part', () => {
    const result = runExpedition(db, params({
      totalSand: 1000,
      participantIds: ['h1', 'p1'],
      harvesterCutPct: 20,
      guildCutPct: 0,
    }))

    // harvester 200, then 800 / 2 = 400 each
    expect(result.credits.map(c => [c.userId, c.role, c.sandAmount])).toEqual([
      ['h1', 'participant', 400],
      ['p1', 'participant', 400],
      ['h1', 'harvester', 200],
    ])
    expect(getUserTotals(db, 'h1')).toMatchObject({ sandTotal: 600, melangeTotal: 12 })
    expect(result.guildTransactionId).toBeNull()
    expect(countRows(db, 'guild_transactions')).toBe(0)
  })

  it('credits exactly the melange the split reports, whatever the user already holds', () => {
    depositSand(db, 'p1', null, 49, 50)   // 49 sand carried, no melange yet

    const result = runExpedition(db, params())

    for (const credit of result.credits) {
      const expected = credit.role === 'harvester' ? result.split.melange.harvester : result.split.melange.perParticipant
      expect(credit.melangeAmount).toBe(expected)
    }
    expect(getUserTotals(db, 'p1')).toMatchObject({ sandTotal: 6799, melangeTotal: 135 })
    expect(getRefiningCarry(db, 'p1', 50)).toBe(49)
  })

  it('logs each credit as an expedition deposit', () => {
    const { expeditionId } = runExpedition(db, params())

    const deposits = getUserDeposits(db, 'h1')
    expect(deposits).toHaveLength(1)
    expect(deposits[0]).toMatchObject({
      type: 'expedition',
      sandAmount: 11250,
      melangeAmount: 225,
      sandPerMelange: 50,
      expeditionId,
      paidAt: null,
    })
    expect(countRows(db, 'deposits')).toBe(6)
  })

  it('records the Landsraad bonus with the reduced rate', () => {
    const { expeditionId, split } = runExpedition(db, params({
      totalSand: 1000,
      participantIds: ['p1'],
      harvesterCutPct: 0,
      sandPerMelange: 38,
      landsraadBonus: true,
    }))

    // guild 100 -> 2 melange; participant 900 -> floor(900 / 38) = 23
    expect(split.melange).toEqual({ guild: 2, harvester: 0, perParticipant: 23 })
    expect(getUserTotals(db, 'p1').melangeTotal).toBe(23)
    expect(getExpedition(db, expeditionId)).toMatchObject({ sandPerMelange: 38, landsraadBonus: true })
  })

  it('stores the split so the expedition can be read back', () => {
    const { expeditionId } = runExpedition(db, params({ totalSand: 1001, participantIds: ['a', 'b', 'c'], harvesterCutPct: 0, guildCutPct: 0 }))

    const { expedition, credits } = getExpeditionDetails(db, expeditionId)
    expect(expedition).toMatchObject({
      id: expeditionId,
      initiatorId: 'h1',
      totalSand: 1001,
      participantCount: 3,
      perParticipantSand: 333,
      unallocatedSand: 2,
      sandPerMelange: 50,
      landsraadBonus: false,
    })
    expect(credits).toHaveLength(3)
    expect(getRecentExpeditions(db).map(e => e.id)).toEqual([expeditionId])
  })

  it('validates participants before writing anything', () => {
    expect(() => runExpedition(db, params({ participantIds: [] }))).toThrow(InvalidInputError)
    expect(() => runExpedition(db, params({ participantIds: ['p1', 'p1'] }))).toThrow(/more than once/)
    expect(() => runExpedition(db, params({ participantIds: ['p1', ' '] }))).toThrow(InvalidInputError)
    expect(() => runExpedition(db, params({ totalSand: 0 }))).toThrow(InvalidInputError)
    expect(() => runExpedition(db, params({ harvesterCutPct: 95 }))).toThrow(InvalidInputError)

    expect(countRows(db, 'expeditions')).toBe(0)
    expect(countRows(db, 'users')).toBe(0)
  })

  it('rolls back every credit when one fails', () => {
    db.exec(`
      CREATE TRIGGER reject_p3 BEFORE INSERT ON users WHEN NEW.id = 'p3'
      BEGIN SELECT RAISE(ABORT, 'simulated failure'); END;
    `)

    expect(() => runExpedition(db, params())).toThrow(ConsistencyError)

    expect(countRows(db, 'expeditions')).toBe(0)
    expect(countRows(db, 'expedition_participants')).toBe(0)
    expect(countRows(db, 'guild_transactions')).toBe(0)
    expect(countRows(db, 'deposits')).toBe(0)
    expect(getUserTotals(db, 'p1').sandTotal).toBe(0)
    expect(getUserTotals(db, 'p2').sandTotal).toBe(0)
    expect(getGuildTreasury(db, GUILD).totalSand).toBe(0)
  })

  it('keeps expeditions immutable and undeletable once the treasury references them', () => {
    const { expeditionId } = runExpedition(db, params())

    expect(() => db.prepare('UPDATE expeditions SET total_sand = 1 WHERE id = ?').run(expeditionId))
      .toThrow(/immutable/)
    expect(() => db.prepare('DELETE FROM expeditions WHERE id = ?').run(expeditionId))
      .toThrow(/FOREIGN KEY constraint failed/)
    expect(getExpedition(db, expeditionId)).not.toBeNull()
  })

  it('reports unknown expeditions as not found', () => {
    expect(() => getExpeditionDetails(db, 404)).toThrow(NotFoundError)
    expect(getExpedition(db, 404)).toBeNull()
  })
})
