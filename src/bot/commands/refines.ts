/**
 * /refines Command
 *
 * Shows the user's cumulative sand and melange
 */

import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  MessageFlags,
} from 'discord.js'
import type { CommandDeps } from '../context.js'
import { displayNameOf } from '../context.js'
import { myRefines } from '../../services/refinery.js'
import { createRefinesEmbed } from '../embeds/builders.js'

export const refinesCommand = new SlashCommandBuilder()
  .setName('refines')
  .setDescription('View your refinery totals')

export async function executeRefines(
  interaction: ChatInputCommandInteraction,
  deps: CommandDeps
): Promise<void> {
  const result = myRefines(deps.db, interaction.user.id)

  await interaction.reply({
    embeds: [createRefinesEmbed(result, displayNameOf(interaction))],
    flags: MessageFlags.Ephemeral,
  })
}
