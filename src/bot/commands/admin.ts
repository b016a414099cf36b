/**
 * /refinery Admin Commands
 *
 * Rate, guild cut, treasury, payout and reset management. Discord shows these to
 * everyone; the refinery commands themselves enforce the admin check.
 */

import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  EmbedBuilder,
  MessageFlags,
} from 'discord.js'
import type { CommandDeps } from '../context.js'
import { cachedMemberName, commandContext } from '../context.js'
import {
  guildWithdraw,
  payroll,
  payUser,
  pendingPayments,
  resetStats,
  setGuildCut,
  setRate,
} from '../../services/refinery.js'
import { Colors, Emoji, createPayoutEmbed, formatAmount } from '../embeds/builders.js'
import { logger } from '../../utils/logger.js'

export const refineryAdminCommand = new SlashCommandBuilder()
  .setName('refinery')
  .setDescription('Refinery administration commands')
  .addSubcommand(sub =>
    sub
      .setName('set-rate')
      .setDescription('Set how much sand refines into one melange')
      .addIntegerOption(opt =>
        opt.setName('sand_per_melange').setDescription('Sand per melange').setRequired(true).setMinValue(1)))
  .addSubcommand(sub =>
    sub
      .setName('set-guild-cut')
      .setDescription('Set the default guild cut for expedition splits')
      .addNumberOption(opt =>
        opt.setName('percent').setDescription('Guild cut percent (0-100)').setRequired(true).setMinValue(0).setMaxValue(100)))
  .addSubcommand(sub =>
    sub
      .setName('withdraw')
      .setDescription('Pay out from the guild treasury')
      .addIntegerOption(opt =>
        opt.setName('sand').setDescription('Sand to withdraw').setMinValue(0))
      .addIntegerOption(opt =>
        opt.setName('melange').setDescription('Melange to withdraw').setMinValue(0))
      .addUserOption(opt =>
        opt.setName('user').setDescription('Who receives the payout'))
      .addStringOption(opt =>
        opt.setName('reason').setDescription('Reason for the withdrawal').setMaxLength(200)))
  .addSubcommand(sub =>
    sub
      .setName('payment')
      .setDescription('Mark all of one user\'s unpaid deposits as paid')
      .addUserOption(opt =>
        opt.setName('user').setDescription('Who was paid').setRequired(true)))
  .addSubcommand(sub =>
    sub
      .setName('payroll')
      .setDescription('Mark every unpaid deposit as paid'))
  .addSubcommand(sub =>
    sub
      .setName('pending')
      .setDescription('List users with unpaid melange'))
  .addSubcommand(sub =>
    sub
      .setName('reset-stats')
      .setDescription('Zero every user\'s sand and melange totals')
      .addBooleanOption(opt =>
        opt.setName('confirm').setDescription('Set to true to really reset everything')))

export async function executeRefineryAdmin(
  interaction: ChatInputCommandInteraction,
  deps: CommandDeps
): Promise<void> {
  const subcommand = interaction.options.getSubcommand()

  switch (subcommand) {
    case 'set-rate':
      await executeSetRate(interaction, deps)
      break
    case 'set-guild-cut':
      await executeSetGuildCut(interaction, deps)
      break
    case 'withdraw':
      await executeWithdraw(interaction, deps)
      break
    case 'payment':
      await executePayment(interaction, deps)
      break
    case 'payroll':
      await executePayroll(interaction, deps)
      break
    case 'pending':
      await executePending(interaction, deps)
      break
    case 'reset-stats':
      await executeResetStats(interaction, deps)
      break
    default:
      logger.warn({ subcommand }, 'Unknown refinery subcommand')
      await interaction.reply({
        content: `${Emoji.CROSS} Unknown subcommand.`,
        flags: MessageFlags.Ephemeral,
      })
  }
}

async function executeSetRate(interaction: ChatInputCommandInteraction, deps: CommandDeps): Promise<void> {
  const newRate = interaction.options.getInteger('sand_per_melange', true)
  const { previousRate, rate } = setRate(deps.db, commandContext(interaction, deps.config), newRate)

  const embed = new EmbedBuilder()
    .setColor(Colors.SPICE_ORANGE)
    .setTitle(`${Emoji.CHECK} Conversion Rate Updated`)
    .addFields(
      { name: 'Previous', value: `${previousRate} sand = 1 melange`, inline: true },
      { name: 'New', value: `${rate} sand = 1 melange`, inline: true },
      { name: 'Note', value: 'Applies to new sand only; existing melange is not recalculated.' }
    )
    .setTimestamp()

  await interaction.reply({ embeds: [embed], flags: MessageFlags.Ephemeral })
}

async function executeSetGuildCut(interaction: ChatInputCommandInteraction, deps: CommandDeps): Promise<void> {
  const percent = interaction.options.getNumber('percent', true)
  const { previousPct, pct } = setGuildCut(deps.db, commandContext(interaction, deps.config), percent)

  const embed = new EmbedBuilder()
    .setColor(Colors.GUILD_GOLD)
    .setTitle(`${Emoji.CHECK} Guild Cut Updated`)
    .addFields(
      { name: 'Previous', value: `${previousPct}%`, inline: true },
      { name: 'New', value: `${pct}%`, inline: true }
    )
    .setTimestamp()

  await interaction.reply({ embeds: [embed], flags: MessageFlags.Ephemeral })
}

async function executeWithdraw(interaction: ChatInputCommandInteraction, deps: CommandDeps): Promise<void> {
  const sand = interaction.options.getInteger('sand') ?? 0
  const melange = interaction.options.getInteger('melange') ?? 0
  const targetUser = interaction.options.getUser('user')
  const reason = interaction.options.getString('reason') ?? undefined

  const target = targetUser
    ? { userId: targetUser.id, username: cachedMemberName(interaction, targetUser.id) ?? targetUser.username }
    : undefined

  const transaction = guildWithdraw(
    deps.db,
    commandContext(interaction, deps.config),
    deps.config.guildName,
    sand,
    melange,
    target,
    reason
  )

  const embed = new EmbedBuilder()
    .setColor(Colors.GUILD_GOLD)
    .setTitle(`${Emoji.GUILD} Treasury Withdrawal`)
    .setDescription(
      `**-${formatAmount(transaction.sandAmount)}** sand, **-${formatAmount(transaction.melangeAmount)}** melange` +
      (target ? ` paid to <@${target.userId}>` : '')
    )
    .setFooter({ text: `Transaction #${transaction.id}` })
    .setTimestamp()

  if (reason) {
    embed.addFields({ name: 'Reason', value: reason })
  }

  await interaction.reply({ embeds: [embed] })
}

async function executePayment(interaction: ChatInputCommandInteraction, deps: CommandDeps): Promise<void> {
  const user = interaction.options.getUser('user', true)
  const payout = payUser(deps.db, commandContext(interaction, deps.config), user.id)

  if (payout.depositCount === 0) {
    await interaction.reply({
      content: `${Emoji.WARNING} <@${user.id}> has no unpaid deposits.`,
      flags: MessageFlags.Ephemeral,
    })
    return
  }

  const embed = new EmbedBuilder()
    .setColor(Colors.GUILD_GOLD)
    .setTitle(`${Emoji.PAID} Payment Recorded`)
    .setDescription(
      `<@${user.id}> was paid **${formatAmount(payout.melangeAmount)}** melange ` +
      `for ${formatAmount(payout.depositCount)} deposit${payout.depositCount === 1 ? '' : 's'} ` +
      `(${formatAmount(payout.sandAmount)} sand).`
    )
    .setTimestamp()

  await interaction.reply({ embeds: [embed] })
}

async function executePayroll(interaction: ChatInputCommandInteraction, deps: CommandDeps): Promise<void> {
  const report = payroll(deps.db, commandContext(interaction, deps.config))

  await interaction.reply({ embeds: [createPayoutEmbed(report, 'Payroll Complete')] })
}

async function executePending(interaction: ChatInputCommandInteraction, deps: CommandDeps): Promise<void> {
  const report = pendingPayments(deps.db, commandContext(interaction, deps.config))

  await interaction.reply({
    embeds: [createPayoutEmbed(report, 'Pending Payments')],
    flags: MessageFlags.Ephemeral,
  })
}

async function executeResetStats(interaction: ChatInputCommandInteraction, deps: CommandDeps): Promise<void> {
  const confirm = interaction.options.getBoolean('confirm') ?? false
  const result = resetStats(deps.db, commandContext(interaction, deps.config), confirm)

  if (result.status === 'confirmation_required') {
    await interaction.reply({
      content: `${Emoji.WARNING} This zeroes **every** user's sand and melange. ` +
        'Expedition history and the guild treasury are kept. Run `/refinery reset-stats confirm:True` to proceed.',
      flags: MessageFlags.Ephemeral,
    })
    return
  }

  const embed = new EmbedBuilder()
    .setColor(Colors.DANGER_RED)
    .setTitle(`${Emoji.CHECK} Refinery Statistics Reset`)
    .setDescription(`${formatAmount(result.usersReset)} user${result.usersReset === 1 ? '' : 's'} reset to zero.`)
    .setTimestamp()

  await interaction.reply({ embeds: [embed] })
}
