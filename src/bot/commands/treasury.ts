/**
 * /treasury Command
 *
 * Shows the guild treasury and its latest movements
 */

import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
} from 'discord.js'
import type { CommandDeps } from '../context.js'
import { guildTreasury } from '../../services/refinery.js'
import { createTreasuryEmbed } from '../embeds/builders.js'

export const treasuryCommand = new SlashCommandBuilder()
  .setName('treasury')
  .setDescription('View the guild treasury')

export async function executeTreasury(
  interaction: ChatInputCommandInteraction,
  deps: CommandDeps
): Promise<void> {
  const overview = guildTreasury(deps.db, deps.config.guildName)

  await interaction.reply({
    embeds: [createTreasuryEmbed(overview.treasury, overview.recentTransactions, overview.reconciliation)],
  })
}
