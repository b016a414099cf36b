import { describe, it, expect } from 'vitest'
import {
  createHarvestEmbed,
  createLedgerEmbed,
  createPayoutEmbed,
  createSplitEmbed,
  createTreasuryEmbed,
  Emoji,
  formatAmount,
  formatDeposit,
  formatLeaderboardEntry,
} from '../embeds/builders.js'
import { computeSplit } from '../../services/split.js'
import type { Deposit, ExpeditionResult, LeaderboardEntry } from '../../types/index.js'

describe('formatAmount', () => {
  it('groups thousands', () => {
    expect(formatAmount(1234567)).toBe('1,234,567')
    expect(formatAmount(0)).toBe('0')
  })
})

describe('formatLeaderboardEntry', () => {
  const entry: LeaderboardEntry = {
    rank: 1,
    userId: '100',
    username: 'Alice',
    sandTotal: 2500,
    melangeTotal: 50,
    updatedAt: null,
  }

  it('uses medals for the podium and marks the caller', () => {
    expect(formatLeaderboardEntry(entry, false)).toBe('🥇 **Alice** — 50 melange, 2,500 sand')
    expect(formatLeaderboardEntry({ ...entry, rank: 4, username: null }, true))
      .toBe('4. <@100> — 50 melange, 2,500 sand ← You')
  })
})

describe('createHarvestEmbed', () => {
  it('celebrates produced melange', () => {
    const embed = createHarvestEmbed({
      sandAdded: 2500,
      melangeProduced: 50,
      totals: { userId: '100', username: 'Alice', sandTotal: 2500, melangeTotal: 50, updatedAt: new Date() },
      sandPerMelange: 50,
      remainderSand: 0,
      sandToNextMelange: 50,
    }, 'Alice')

    expect(embed.data.description).toBe('🎉 **+50 melange produced!**')
    expect(embed.data.fields?.[0]?.value).toBe('**Sand:** 2,500 | **Melange:** 50 | **Rate:** 50:1')
  })
})

describe('createSplitEmbed', () => {
  it('lists participants, harvester and guild shares', () => {
    const result: ExpeditionResult = {
      expeditionId: 7,
      split: computeSplit(1000, 2, 20, 10, 50),
      credits: [
        { userId: '1', username: 'Alice', role: 'participant', sandAmount: 360, melangeAmount: 7 },
        { userId: '2', username: null, role: 'participant', sandAmount: 360, melangeAmount: 7 },
        { userId: '9', username: 'Harvester', role: 'harvester', sandAmount: 180, melangeAmount: 3 },
      ],
      guildTransactionId: 1,
    }

    const embed = createSplitEmbed(result)

    expect(embed.data.description).toBe('**Expedition #7** - 2 participants')
    expect(embed.data.fields?.map(f => f.value)).toEqual([
      '**Alice**: 360 sand (7 melange)\n<@2>: 360 sand (7 melange)',
      '**20%** = 180 sand → **3 melange** to **Harvester**',
      '**10%** = 100 sand → **2 melange**',
      '**Total:** 1,000 | **Per participant:** 360 | **Unallocated:** 0 | **Rate:** 50:1',
    ])
  })

  it('marks a Landsraad rate', () => {
    const result: ExpeditionResult = {
      expeditionId: 8,
      split: computeSplit(1000, 1, 0, 10, 38),
      credits: [{ userId: '1', username: 'Alice', role: 'participant', sandAmount: 900, melangeAmount: 23 }],
      guildTransactionId: 2,
    }

    const embed = createSplitEmbed(result, true)

    expect(embed.data.fields?.[3]?.value)
      .toBe('**Total:** 1,000 | **Per participant:** 900 | **Unallocated:** 0 | **Rate:** 38:1 (Landsraad bonus)')
  })
})

describe('ledger embeds', () => {
  const createdAt = new Date('2026-01-01T00:00:00Z')
  const deposit: Deposit = {
    id: 1,
    userId: '1',
    username: 'Alice',
    type: 'expedition',
    sandAmount: 720,
    melangeAmount: 14,
    sandPerMelange: 50,
    expeditionId: 7,
    createdAt,
    paidAt: null,
    paidBy: null,
  }

  it('formats unpaid expedition and paid solo deposits', () => {
    expect(formatDeposit(deposit)).toBe('**720** sand → 14 melange (expedition #7, 50:1) <t:1767225600:R> ⏳ unpaid')
    expect(formatDeposit({ ...deposit, type: 'solo', expeditionId: null, sandAmount: 1200, melangeAmount: 24, paidAt: createdAt, paidBy: '900' }))
      .toBe('**1,200** sand → 24 melange (solo, 50:1) <t:1767225600:R> 💰 paid')
  })

  it('shows an empty ledger with nothing owed', () => {
    const embed = createLedgerEmbed({
      deposits: [],
      unpaid: { userId: '1', username: null, depositCount: 0, sandAmount: 0, melangeAmount: 0 },
    }, 'Alice')

    expect(embed.data.title).toBe(`${Emoji.LEDGER} Deposit Ledger for Alice`)
    expect(embed.data.description).toBe('No deposits yet. Use `/harvest` to log sand.')
    expect(embed.data.fields?.[0]?.value).toBe('**0** melange from 0 sand (0 deposits)')
  })

  it('lists payouts with totals', () => {
    const embed = createPayoutEmbed({
      payouts: [{ userId: '1', username: 'Alice', depositCount: 2, sandAmount: 620, melangeAmount: 12 }],
      totalDeposits: 2,
      totalSand: 620,
      totalMelange: 12,
    }, 'Pending Payments')

    expect(embed.data.title).toBe(`${Emoji.PAID} Pending Payments`)
    expect(embed.data.description).toBe('**Alice**: **12** melange (620 sand, 2 deposits)')
    expect(embed.data.fields?.map(f => f.value)).toEqual(['1', '620', '12'])
  })

  it('says when nobody is owed', () => {
    const embed = createPayoutEmbed({ payouts: [], totalDeposits: 0, totalSand: 0, totalMelange: 0 }, 'Payroll Complete')

    expect(embed.data.description).toBe('Nobody is owed melange.')
  })
})

describe('createTreasuryEmbed', () => {
  it('flags a treasury that does not reconcile', () => {
    const now = new Date()
    const embed = createTreasuryEmbed(
      { guildName: 'Test Guild', totalSand: 10, totalMelange: 0, createdAt: now, updatedAt: now },
      [],
      { guildName: 'Test Guild', consistent: false, treasurySand: 10, treasuryMelange: 0, ledgerSand: 0, ledgerMelange: 0 }
    )

    expect(embed.data.title).toBe(`${Emoji.GUILD} Test Guild Treasury`)
    expect(embed.data.fields?.map(f => f.name)).toEqual([
      `${Emoji.SAND} Sand`,
      `${Emoji.MELANGE} Melange`,
      `${Emoji.LEDGER} Recent Transactions`,
      `${Emoji.WARNING} Audit`,
    ])
    expect(embed.data.fields?.[2]?.value).toBe('No transactions yet.')
  })
})
