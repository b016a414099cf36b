/**
 * /conversion Command
 */

import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  MessageFlags,
} from 'discord.js'
import type { CommandDeps } from '../context.js'
import { conversionInfo } from '../../services/refinery.js'
import { createConversionEmbed } from '../embeds/builders.js'

export const conversionCommand = new SlashCommandBuilder()
  .setName('conversion')
  .setDescription('Show the current sand to melange rate')

export async function executeConversion(
  interaction: ChatInputCommandInteraction,
  deps: CommandDeps
): Promise<void> {
  await interaction.reply({
    embeds: [createConversionEmbed(conversionInfo(deps.db))],
    flags: MessageFlags.Ephemeral,
  })
}
