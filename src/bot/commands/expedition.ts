/**
 * /expedition Command
 *
 * Shows one recorded expedition and every credit it applied
 */

import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
} from 'discord.js'
import type { CommandDeps } from '../context.js'
import { expeditionDetails } from '../../services/refinery.js'
import { createExpeditionEmbed } from '../embeds/builders.js'

export const expeditionCommand = new SlashCommandBuilder()
  .setName('expedition')
  .setDescription('Look up a recorded expedition')
  .addIntegerOption(opt =>
    opt
      .setName('id')
      .setDescription('Expedition number')
      .setRequired(true)
      .setMinValue(1)
  )

export async function executeExpedition(
  interaction: ChatInputCommandInteraction,
  deps: CommandDeps
): Promise<void> {
  const { expedition, credits } = expeditionDetails(deps.db, interaction.options.getInteger('id', true))

  await interaction.reply({
    embeds: [createExpeditionEmbed(expedition, credits)],
  })
}
