/**
 * Embed Builders
 *
 * Helpers for creating consistent refinery embeds
 */

import { EmbedBuilder } from 'discord.js'
import type {
  Deposit,
  Expedition,
  ExpeditionCredit,
  ExpeditionResult,
  GuildTransaction,
  LeaderboardEntry,
  TreasuryReconciliation,
  GuildTreasury,
  UserPayout,
} from '../../types/index.js'
import type {
  ConversionInfo,
  LedgerView,
  PayoutReport,
  RefinesResult,
  SoloHarvestResult,
} from '../../services/refinery.js'

/** Refinery color palette */
export const Colors = {
  SPICE_ORANGE: 0xE67E22,    // Harvests, primary embed color
  SUCCESS_GREEN: 0x2ECC71,   // Completed splits
  GUILD_GOLD: 0xF1C40F,      // Treasury
  DANGER_RED: 0xE74C3C,      // Destructive admin actions
  NEUTRAL_GREY: 0x95A5A6,    // Secondary info
}

/** Emoji vocabulary */
export const Emoji = {
  DESERT: '🏜️',
  SAND: '⏳',
  MELANGE: '✨',
  GUILD: '🏛️',
  PEOPLE: '👥',
  HARVESTER: '⛏️',
  STATS: '📊',
  PRODUCTION: '⚙️',
  LEDGER: '📜',
  DEPOSIT: '🟢',
  WITHDRAWAL: '🔴',
  WARNING: '⚠️',
  CHECK: '✅',
  CROSS: '❌',
  TROPHY: '🏆',
  PAID: '💰',
}

/**
 * Format a whole number with thousands separators
 */
export function formatAmount(value: number): string {
  return value.toLocaleString('en-US')
}

/**
 * Discord relative timestamp markup
 */
function relativeTime(date: Date): string {
  return `<t:${Math.floor(date.getTime() / 1000)}:R>`
}

/**
 * Mention when we only know the ID, otherwise bold display name
 */
function displayUser(userId: string, username: string | null): string {
  return username ? `**${username}**` : `<@${userId}>`
}

/**
 * Create the /harvest result embed
 */
export function createHarvestEmbed(result: SoloHarvestResult, username: string): EmbedBuilder {
  const description = result.melangeProduced > 0
    ? `🎉 **+${formatAmount(result.melangeProduced)} melange produced!**`
    : `📦 **${formatAmount(result.sandAdded)} sand added to reserves**`

  return new EmbedBuilder()
    .setColor(Colors.SPICE_ORANGE)
    .setTitle(`${Emoji.DESERT} Harvest Complete`)
    .setDescription(description)
    .addFields(
      {
        name: `${Emoji.STATS} Current Status`,
        value: `**Sand:** ${formatAmount(result.totals.sandTotal)} | ` +
          `**Melange:** ${formatAmount(result.totals.melangeTotal)} | ` +
          `**Rate:** ${result.sandPerMelange}:1`,
      },
      {
        name: `${Emoji.PRODUCTION} Production`,
        value: `**Remaining:** ${formatAmount(result.remainderSand)} | ` +
          `**Next melange in:** ${formatAmount(result.sandToNextMelange)} sand`,
      }
    )
    .setFooter({ text: `/harvest ${result.sandAdded} • ${username}` })
    .setTimestamp()
}

/**
 * Rate label, marking rates reduced by the Landsraad bonus
 */
function formatRate(sandPerMelange: number, landsraadBonus: boolean): string {
  return landsraadBonus ? `${sandPerMelange}:1 (Landsraad bonus)` : `${sandPerMelange}:1`
}

/**
 * Create the /split result embed
 */
export function createSplitEmbed(result: ExpeditionResult, landsraadBonus: boolean = false): EmbedBuilder {
  const { split } = result

  const participantLines = result.credits
    .filter(c => c.role === 'participant')
    .map(c => `${displayUser(c.userId, c.username)}: ${formatAmount(c.sandAmount)} sand (${formatAmount(split.melange.perParticipant)} melange)`)

  const harvester = result.credits.find(c => c.role === 'harvester')

  const embed = new EmbedBuilder()
    .setColor(Colors.SUCCESS_GREEN)
    .setTitle(`${Emoji.DESERT} Expedition Split Completed`)
    .setDescription(`**Expedition #${result.expeditionId}** - ${split.participantCount} participant${split.participantCount === 1 ? '' : 's'}`)
    .addFields(
      {
        name: `${Emoji.PEOPLE} Participants`,
        value: participantLines.join('\n'),
      },
      {
        name: `${Emoji.HARVESTER} Harvester Cut`,
        value: harvester
          ? `**${split.harvesterCutPct}%** = ${formatAmount(split.harvesterSand)} sand → ` +
            `**${formatAmount(split.melange.harvester)} melange** to ${displayUser(harvester.userId, harvester.username)}`
          : `**${split.harvesterCutPct}%** = 0 sand`,
      },
      {
        name: `${Emoji.GUILD} Guild Cut`,
        value: `**${split.guildCutPct}%** = ${formatAmount(split.guildSand)} sand → ` +
          `**${formatAmount(split.melange.guild)} melange**`,
      },
      {
        name: `${Emoji.STATS} Summary`,
        value: `**Total:** ${formatAmount(split.totalSand)} | ` +
          `**Per participant:** ${formatAmount(split.perParticipantSand)} | ` +
          `**Unallocated:** ${formatAmount(split.unallocatedSand)} | ` +
          `**Rate:** ${formatRate(split.sandPerMelange, landsraadBonus)}`,
      }
    )
    .setTimestamp()

  return embed
}

/**
 * Create the /refines embed
 */
export function createRefinesEmbed(result: RefinesResult, username: string): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setColor(Colors.SPICE_ORANGE)
    .setTitle(`${Emoji.PRODUCTION} Refinery Status`)
    .setDescription(`Refinery statistics for ${username}`)
    .addFields(
      { name: `${Emoji.SAND} Sand`, value: `**${formatAmount(result.sandTotal)}**`, inline: true },
      { name: `${Emoji.MELANGE} Melange`, value: `**${formatAmount(result.melangeTotal)}**`, inline: true },
      { name: '⚗️ Rate', value: `${result.sandPerMelange} sand = 1 melange`, inline: true },
      {
        name: `${Emoji.STATS} Progress`,
        value: `${formatAmount(result.remainderSand)} / ${result.sandPerMelange} sand toward the next melange`,
      }
    )
    .setTimestamp()

  if (result.updatedAt) {
    embed.addFields({ name: '🕒 Last Activity', value: relativeTime(result.updatedAt) })
  }

  return embed
}

/**
 * One line of a user's deposit log
 */
export function formatDeposit(deposit: Deposit): string {
  const source = deposit.expeditionId !== null ? `expedition #${deposit.expeditionId}` : 'solo'
  const status = deposit.paidAt ? `${Emoji.PAID} paid` : `${Emoji.SAND} unpaid`
  return `**${formatAmount(deposit.sandAmount)}** sand → ${formatAmount(deposit.melangeAmount)} melange ` +
    `(${source}, ${deposit.sandPerMelange}:1) ${relativeTime(deposit.createdAt)} ${status}`
}

/**
 * Create the /ledger embed
 */
export function createLedgerEmbed(view: LedgerView, username: string): EmbedBuilder {
  const { deposits, unpaid } = view

  return new EmbedBuilder()
    .setColor(Colors.SPICE_ORANGE)
    .setTitle(`${Emoji.LEDGER} Deposit Ledger for ${username}`)
    .setDescription(deposits.length > 0 ? deposits.map(formatDeposit).join('\n') : 'No deposits yet. Use `/harvest` to log sand.')
    .addFields({
      name: `${Emoji.PAID} Awaiting Payment`,
      value: `**${formatAmount(unpaid.melangeAmount)}** melange from ${formatAmount(unpaid.sandAmount)} sand ` +
        `(${formatAmount(unpaid.depositCount)} deposit${unpaid.depositCount === 1 ? '' : 's'})`,
    })
    .setTimestamp()
}

/**
 * One line of a payout report
 */
export function formatPayout(payout: UserPayout): string {
  return `${displayUser(payout.userId, payout.username)}: **${formatAmount(payout.melangeAmount)}** melange ` +
    `(${formatAmount(payout.sandAmount)} sand, ${formatAmount(payout.depositCount)} deposit${payout.depositCount === 1 ? '' : 's'})`
}

/**
 * Create the embed for pending payments and payroll runs
 */
export function createPayoutEmbed(report: PayoutReport, title: string): EmbedBuilder {
  return new EmbedBuilder()
    .setColor(Colors.GUILD_GOLD)
    .setTitle(`${Emoji.PAID} ${title}`)
    .setDescription(report.payouts.length > 0 ? report.payouts.map(formatPayout).join('\n') : 'Nobody is owed melange.')
    .addFields(
      { name: `${Emoji.PEOPLE} Users`, value: formatAmount(report.payouts.length), inline: true },
      { name: `${Emoji.SAND} Sand`, value: formatAmount(report.totalSand), inline: true },
      { name: `${Emoji.MELANGE} Melange`, value: formatAmount(report.totalMelange), inline: true }
    )
    .setTimestamp()
}

/**
 * Format a single leaderboard entry line
 */
export function formatLeaderboardEntry(entry: LeaderboardEntry, isCurrentUser: boolean): string {
  // Medal for top 3, numbers for rest
  let prefix: string
  if (entry.rank === 1) prefix = '🥇'
  else if (entry.rank === 2) prefix = '🥈'
  else if (entry.rank === 3) prefix = '🥉'
  else prefix = `${entry.rank}.`

  const stats = `${formatAmount(entry.melangeTotal)} melange, ${formatAmount(entry.sandTotal)} sand`
  const name = displayUser(entry.userId, entry.username)

  return isCurrentUser ? `${prefix} ${name} — ${stats} ← You` : `${prefix} ${name} — ${stats}`
}

/**
 * Create the /leaderboard embed
 */
export function createLeaderboardEmbed(entries: LeaderboardEntry[], currentUserId: string): EmbedBuilder {
  return new EmbedBuilder()
    .setColor(Colors.SPICE_ORANGE)
    .setTitle(`${Emoji.TROPHY} Top Refiners`)
    .setDescription(entries.map(e => formatLeaderboardEntry(e, e.userId === currentUserId)).join('\n'))
    .setTimestamp()
}

/**
 * One line of the treasury ledger
 */
function formatGuildTransaction(tx: GuildTransaction): string {
  const emoji = tx.type === 'deposit' ? Emoji.DEPOSIT : Emoji.WITHDRAWAL
  const sign = tx.type === 'deposit' ? '+' : '-'
  const source = tx.expeditionId !== null ? ` (expedition #${tx.expeditionId})` : ''
  const target = tx.targetUserId ? ` → <@${tx.targetUserId}>` : ''
  return `${emoji} **${sign}${formatAmount(tx.sandAmount)}** sand, ${sign}${formatAmount(tx.melangeAmount)} melange` +
    `${source}${target} ${relativeTime(tx.createdAt)}`
}

/**
 * Create the /treasury embed
 */
export function createTreasuryEmbed(
  treasury: GuildTreasury,
  transactions: GuildTransaction[],
  reconciliation: TreasuryReconciliation
): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setColor(Colors.GUILD_GOLD)
    .setTitle(`${Emoji.GUILD} ${treasury.guildName} Treasury`)
    .addFields(
      { name: `${Emoji.SAND} Sand`, value: `**${formatAmount(treasury.totalSand)}**`, inline: true },
      { name: `${Emoji.MELANGE} Melange`, value: `**${formatAmount(treasury.totalMelange)}**`, inline: true },
      {
        name: `${Emoji.LEDGER} Recent Transactions`,
        value: transactions.length > 0 ? transactions.map(formatGuildTransaction).join('\n') : 'No transactions yet.',
      }
    )
    .setTimestamp()

  if (!reconciliation.consistent) {
    embed.addFields({
      name: `${Emoji.WARNING} Audit`,
      value: 'Treasury totals do not match the transaction log. Officers have been notified.',
    })
  }

  return embed
}

/**
 * Create the /expedition embed
 */
export function createExpeditionEmbed(expedition: Expedition, credits: ExpeditionCredit[]): EmbedBuilder {
  const creditLines = credits.map(c => {
    const role = c.role === 'harvester' ? ` ${Emoji.HARVESTER}` : ''
    return `${displayUser(c.userId, c.username)}${role}: ${formatAmount(c.sandAmount)} sand (+${formatAmount(c.melangeAmount)} melange)`
  })

  return new EmbedBuilder()
    .setColor(Colors.SPICE_ORANGE)
    .setTitle(`${Emoji.DESERT} Expedition #${expedition.id}`)
    .setDescription(`Led by ${displayUser(expedition.initiatorId, expedition.initiatorUsername)} ${relativeTime(expedition.createdAt)}`)
    .addFields(
      {
        name: `${Emoji.STATS} Split`,
        value: `**Total:** ${formatAmount(expedition.totalSand)} sand\n` +
          `**Guild (${expedition.guildCutPct}%):** ${formatAmount(expedition.guildSand)}\n` +
          `**Harvester (${expedition.harvesterCutPct}%):** ${formatAmount(expedition.harvesterSand)}\n` +
          `**Per participant:** ${formatAmount(expedition.perParticipantSand)} × ${expedition.participantCount}\n` +
          `**Unallocated:** ${formatAmount(expedition.unallocatedSand)}\n` +
          `**Rate:** ${formatRate(expedition.sandPerMelange, expedition.landsraadBonus)}`,
      },
      {
        name: `${Emoji.PEOPLE} Credits`,
        value: creditLines.length > 0 ? creditLines.join('\n') : 'No credits recorded.',
      }
    )
}

/**
 * Create the /conversion embed
 */
export function createConversionEmbed(info: ConversionInfo): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setColor(Colors.NEUTRAL_GREY)
    .setTitle('⚗️ Refinement Rate')
    .addFields(
      { name: 'Conversion', value: `**${info.sandPerMelange}** sand = **1** melange`, inline: true },
      { name: 'Default Guild Cut', value: `**${info.guildCutPct}%**`, inline: true }
    )
    .setTimestamp()

  if (info.rateModifiedBy && info.rateModifiedBy !== 'seed') {
    embed.setFooter({ text: `Rate last changed by ${info.rateModifiedBy}` })
  }

  return embed
}
