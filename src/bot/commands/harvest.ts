/**
 * /harvest Command
 *
 * Logs a solo spice sand harvest and refines it into melange
 */

import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
} from 'discord.js'
import type { CommandDeps } from '../context.js'
import { commandContext } from '../context.js'
import { logSolo, MAX_SOLO_HARVEST } from '../../services/refinery.js'
import { createHarvestEmbed } from '../embeds/builders.js'

export const harvestCommand = new SlashCommandBuilder()
  .setName('harvest')
  .setDescription('Log spice sand from a solo harvest')
  .addIntegerOption(opt =>
    opt
      .setName('amount')
      .setDescription(`Spice sand harvested (1-${MAX_SOLO_HARVEST})`)
      .setRequired(true)
      .setMinValue(1)
      .setMaxValue(MAX_SOLO_HARVEST)
  )

export async function executeHarvest(
  interaction: ChatInputCommandInteraction,
  deps: CommandDeps
): Promise<void> {
  const amount = interaction.options.getInteger('amount', true)
  const ctx = commandContext(interaction, deps.config)

  const result = logSolo(deps.db, ctx, amount)

  await interaction.reply({
    embeds: [createHarvestEmbed(result, ctx.username ?? interaction.user.username)],
  })
}
