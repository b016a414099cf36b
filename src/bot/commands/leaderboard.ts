/**
 * /leaderboard Command
 *
 * Shows the top refiners by melange produced
 */

import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  MessageFlags,
} from 'discord.js'
import type { CommandDeps } from '../context.js'
import { leaderboard } from '../../services/refinery.js'
import { MAX_LEADERBOARD_LIMIT } from '../../services/ledger.js'
import { createLeaderboardEmbed, Emoji } from '../embeds/builders.js'

export const leaderboardCommand = new SlashCommandBuilder()
  .setName('leaderboard')
  .setDescription('View the top refiners')
  .addIntegerOption(opt =>
    opt
      .setName('limit')
      .setDescription(`Number of refiners to show (1-${MAX_LEADERBOARD_LIMIT})`)
      .setMinValue(1)
      .setMaxValue(MAX_LEADERBOARD_LIMIT)
  )

export async function executeLeaderboard(
  interaction: ChatInputCommandInteraction,
  deps: CommandDeps
): Promise<void> {
  const limit = interaction.options.getInteger('limit') ?? 10
  const entries = leaderboard(deps.db, limit)

  if (entries.length === 0) {
    await interaction.reply({
      content: `${Emoji.DESERT} No refiners yet. Be the first with \`/harvest\`!`,
      flags: MessageFlags.Ephemeral,
    })
    return
  }

  await interaction.reply({
    embeds: [createLeaderboardEmbed(entries, interaction.user.id)],
  })
}
