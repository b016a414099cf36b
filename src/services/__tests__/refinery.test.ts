import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { Database } from 'better-sqlite3'
import { initDatabase } from '../../db/connection.js'
import {
  conversionInfo,
  expeditionDetails,
  guildTreasury,
  guildWithdraw,
  leaderboard,
  logSolo,
  myLedger,
  myRefines,
  payUser,
  payroll,
  pendingPayments,
  resetStats,
  setGuildCut,
  setRate,
  spiceSplit,
} from '../refinery.js'
import { getUserTotals } from '../ledger.js'
import type { CommandContext } from '../../types/index.js'
import { InvalidInputError, PermissionDeniedError } from '../../utils/errors.js'

const GUILD = 'Test Guild'
const member: CommandContext = { userId: '100', username: 'Member', isAdmin: false }
const admin: CommandContext = { userId: '900', username: 'Officer', isAdmin: true }
const alice: CommandContext = { userId: '1', username: 'Alice', isAdmin: false }

describe('refinery commands', () => {
  let db: Database

  beforeEach(() => {
    db = initDatabase(':memory:')
  })

  afterEach(() => {
    db.close()
  })

  describe('logSolo', () => {
    it('refines 2500 sand into 50 melange at the default rate', () => {
      const result = logSolo(db, member, 2500)

      expect(result).toMatchObject({
        sandAdded: 2500,
        melangeProduced: 50,
        sandPerMelange: 50,
        remainderSand: 0,
        sandToNextMelange: 50,
      })
      expect(result.totals).toMatchObject({ userId: '100', username: 'Member', sandTotal: 2500, melangeTotal: 50 })
    })

    it('carries leftover sand toward the next melange', () => {
      logSolo(db, member, 30)
      const result = logSolo(db, member, 45)

      expect(result.melangeProduced).toBe(1)
      expect(result.remainderSand).toBe(25)
      expect(result.sandToNextMelange).toBe(25)
    })

    it('accepts 1 to 10,000 sand only', () => {
      expect(() => logSolo(db, member, 0)).toThrow(InvalidInputError)
      expect(() => logSolo(db, member, 10_001)).toThrow('Amount must be between 1 and 10,000 spice sand (got 10001)')
      expect(() => logSolo(db, member, 1.5)).toThrow(InvalidInputError)
      expect(logSolo(db, member, 10_000).sandAdded).toBe(10_000)
    })

    it('refines sand logged after a rate increase at the new rate', () => {
      setRate(db, admin, 10)
      expect(logSolo(db, member, 100).melangeProduced).toBe(10)

      setRate(db, admin, 50)
      const result = logSolo(db, member, 400)

      expect(result.melangeProduced).toBe(8)
      expect(result.totals).toMatchObject({ sandTotal: 500, melangeTotal: 18 })
    })

    it('does not refine sand carried from a higher rate after the rate drops', () => {
      expect(logSolo(db, member, 49).melangeProduced).toBe(0)

      setRate(db, admin, 10)
      const result = logSolo(db, member, 1)

      expect(result).toMatchObject({ melangeProduced: 0, remainderSand: 1, sandToNextMelange: 9 })
      expect(result.totals).toMatchObject({ sandTotal: 50, melangeTotal: 0 })
    })
  })

  describe('myRefines', () => {
    it('returns zeros for a new user without creating them', () => {
      expect(myRefines(db, 'nobody')).toMatchObject({ sandTotal: 0, melangeTotal: 0, updatedAt: null, sandPerMelange: 50 })
      expect(leaderboard(db)).toEqual([])
    })

    it('is repeatable', () => {
      logSolo(db, member, 120)

      const first = myRefines(db, member.userId)
      const second = myRefines(db, member.userId)

      expect(second).toEqual(first)
      expect(first).toMatchObject({ sandTotal: 120, melangeTotal: 2, remainderSand: 20 })
    })
  })

  describe('spiceSplit', () => {
    it('uses the configured guild cut and makes the caller the harvester', () => {
      const result = spiceSplit(db, member, GUILD, 50000, ['1', '2', '3', '4', '5'], 25)

      expect(result.split).toMatchObject({ guildCutPct: 10, guildSand: 5000, harvesterSand: 11250, perParticipantSand: 6750 })
      expect(getUserTotals(db, member.userId).sandTotal).toBe(11250)
      expect(guildTreasury(db, GUILD).treasury.totalSand).toBe(5000)
    })

    it('lets anyone restate the configured guild cut but only admins change it', () => {
      expect(() => spiceSplit(db, member, GUILD, 1000, ['1'], 0, { guildCutPct: 10 })).not.toThrow()
      expect(() => spiceSplit(db, member, GUILD, 1000, ['1'], 0, { guildCutPct: 5 })).toThrow(PermissionDeniedError)

      const result = spiceSplit(db, admin, GUILD, 1000, ['1'], 0, { guildCutPct: 5 })
      expect(result.split.guildSand).toBe(50)
    })

    it('records participant names when provided', () => {
      const { expeditionId } = spiceSplit(db, member, GUILD, 100, ['1', '2'], 0, { participantNames: { '1': 'Alice', '2': null } })

      const { credits } = expeditionDetails(db, expeditionId)
      expect(credits.map(c => c.username)).toEqual(['Alice', null])
    })
  })

  describe('spiceSplit rates', () => {
    it('credits each share the melange the split reports after a rate change', () => {
      setRate(db, admin, 10)
      logSolo(db, alice, 100)   // 10 melange at 10:1
      setRate(db, admin, 50)

      const result = spiceSplit(db, member, GUILD, 50000, ['1', '2'], 25)

      expect(result.split).toMatchObject({ guildSand: 5000, harvesterSand: 11250, perParticipantSand: 16875 })
      expect(result.split.melange).toMatchObject({ harvester: 225, perParticipant: 337 })
      expect(result.credits.filter(c => c.role === 'participant').map(c => c.melangeAmount)).toEqual([337, 337])
      expect(getUserTotals(db, '1')).toMatchObject({ sandTotal: 16975, melangeTotal: 347 })
    })

    it('refines at the reduced rate with the Landsraad bonus', () => {
      const { expeditionId, split } = spiceSplit(db, member, GUILD, 1000, ['1'], 0, { landsraadBonus: true })

      // 50 less 25%, rounded up
      expect(split.sandPerMelange).toBe(38)
      expect(split.melange).toMatchObject({ guild: 2, perParticipant: 23 })
      expect(expeditionDetails(db, expeditionId).expedition).toMatchObject({ landsraadBonus: true, sandPerMelange: 38 })
      expect(guildTreasury(db, GUILD).treasury).toMatchObject({ totalSand: 100, totalMelange: 2 })
      expect(conversionInfo(db).sandPerMelange).toBe(50)
    })
  })

  describe('myLedger', () => {
    it('lists solo and expedition deposits newest first with the unpaid total', () => {
      logSolo(db, member, 120)
      spiceSplit(db, member, GUILD, 1000, [member.userId], 20)

      const { deposits, unpaid } = myLedger(db, member.userId)

      expect(deposits.map(d => [d.type, d.sandAmount, d.melangeAmount])).toEqual([
        ['expedition', 180, 3],
        ['expedition', 720, 14],
        ['solo', 120, 2],
      ])
      expect(unpaid).toEqual({ userId: '100', username: 'Member', depositCount: 3, sandAmount: 1020, melangeAmount: 19 })
    })

    it('rejects limits outside 1-25', () => {
      expect(() => myLedger(db, member.userId, 0)).toThrow(InvalidInputError)
      expect(() => myLedger(db, member.userId, 26)).toThrow('Ledger limit must be between 1 and 25 (got 26)')
    })
  })

  describe('payments', () => {
    beforeEach(() => {
      logSolo(db, alice, 500)    // 10 melange
      logSolo(db, member, 120)   // 2 melange
    })

    it('are admin only', () => {
      expect(() => pendingPayments(db, member)).toThrow(PermissionDeniedError)
      expect(() => payUser(db, member, '1')).toThrow(PermissionDeniedError)
      expect(() => payroll(db, member)).toThrow(PermissionDeniedError)
      expect(pendingPayments(db, admin).payouts).toHaveLength(2)
    })

    it('lists who is owed, most melange first', () => {
      const report = pendingPayments(db, admin)

      expect(report.payouts.map(p => [p.userId, p.username, p.melangeAmount])).toEqual([
        ['1', 'Alice', 10],
        ['100', 'Member', 2],
      ])
      expect(report).toMatchObject({ totalDeposits: 2, totalSand: 620, totalMelange: 12 })
    })

    it('pays one user once and stamps who paid', () => {
      expect(payUser(db, admin, '1')).toEqual({ userId: '1', username: 'Alice', depositCount: 1, sandAmount: 500, melangeAmount: 10 })
      expect(payUser(db, admin, '1')).toEqual({ userId: '1', username: null, depositCount: 0, sandAmount: 0, melangeAmount: 0 })

      const [deposit] = myLedger(db, '1').deposits
      expect(deposit.paidBy).toBe('900')
      expect(deposit.paidAt).toBeInstanceOf(Date)
      expect(pendingPayments(db, admin).payouts.map(p => p.userId)).toEqual(['100'])
    })

    it('runs payroll for everyone still owed', () => {
      payUser(db, admin, '1')

      const report = payroll(db, admin)

      expect(report.payouts.map(p => p.userId)).toEqual(['100'])
      expect(report).toMatchObject({ totalDeposits: 1, totalSand: 120, totalMelange: 2 })
      expect(pendingPayments(db, admin)).toEqual({ payouts: [], totalDeposits: 0, totalSand: 0, totalMelange: 0 })
      expect(payroll(db, admin).payouts).toEqual([])
    })
  })

  describe('setRate', () => {
    it('is admin only', () => {
      expect(() => setRate(db, member, 40)).toThrow(PermissionDeniedError)
      expect(conversionInfo(db).sandPerMelange).toBe(50)
    })

    it('changes the rate for future sand', () => {
      logSolo(db, member, 100)   // 2 melange at 50:1

      expect(setRate(db, admin, 25)).toEqual({ previousRate: 50, rate: 25 })
      expect(conversionInfo(db)).toMatchObject({ sandPerMelange: 25, rateModifiedBy: '900' })

      // the 100 sand carried at 50:1 is not refined at 25:1
      expect(logSolo(db, member, 50)).toMatchObject({ melangeProduced: 2, remainderSand: 0 })
    })
  })

  describe('setGuildCut', () => {
    it('is admin only and returns the previous value', () => {
      expect(() => setGuildCut(db, member, 20)).toThrow(PermissionDeniedError)
      expect(setGuildCut(db, admin, 20)).toEqual({ previousPct: 10, pct: 20 })
      expect(conversionInfo(db).guildCutPct).toBe(20)
    })
  })

  describe('resetStats', () => {
    it('checks permission before anything else', () => {
      logSolo(db, member, 500)

      expect(() => resetStats(db, member, true)).toThrow(PermissionDeniedError)
      expect(myRefines(db, member.userId).sandTotal).toBe(500)
    })

    it('asks for confirmation before resetting', () => {
      logSolo(db, member, 500)

      expect(resetStats(db, admin, false)).toEqual({ status: 'confirmation_required' })
      expect(myRefines(db, member.userId).sandTotal).toBe(500)
    })

    it('zeroes user totals but keeps expeditions and the treasury', () => {
      logSolo(db, member, 500)
      const { expeditionId } = spiceSplit(db, member, GUILD, 1000, ['2'], 0)

      expect(resetStats(db, admin, true)).toEqual({ status: 'reset', usersReset: 2 })

      expect(myRefines(db, member.userId)).toMatchObject({ sandTotal: 0, melangeTotal: 0 })
      expect(myRefines(db, '2')).toMatchObject({ sandTotal: 0, melangeTotal: 0 })
      expect(expeditionDetails(db, expeditionId).expedition.totalSand).toBe(1000)
      expect(guildTreasury(db, GUILD).treasury.totalSand).toBe(100)
    })

    it('starts refining from scratch after a reset', () => {
      logSolo(db, member, 30)
      resetStats(db, admin, true)

      expect(logSolo(db, member, 30)).toMatchObject({ melangeProduced: 0, remainderSand: 30 })
      expect(myLedger(db, member.userId).deposits).toHaveLength(2)
    })
  })

  describe('guild treasury', () => {
    it('lets admins withdraw and keeps the ledger reconciled', () => {
      spiceSplit(db, member, GUILD, 10_000, ['1'], 0)

      expect(() => guildWithdraw(db, member, GUILD, 100, 0)).toThrow(PermissionDeniedError)

      const tx = guildWithdraw(db, admin, GUILD, 400, 0, { userId: '1', username: 'Alice' }, 'event prize')
      expect(tx).toMatchObject({ type: 'withdrawal', sandAmount: 400, adminUserId: '900', targetUsername: 'Alice', description: 'event prize' })

      const overview = guildTreasury(db, GUILD)
      expect(overview.treasury).toMatchObject({ totalSand: 600, totalMelange: 20 })
      expect(overview.recentTransactions.map(t => t.type)).toEqual(['withdrawal', 'deposit'])
      expect(overview.reconciliation.consistent).toBe(true)
    })
  })

  describe('expeditionDetails', () => {
    it('rejects ids that are not positive', () => {
      expect(() => expeditionDetails(db, 0)).toThrow(InvalidInputError)
    })
  })
})
