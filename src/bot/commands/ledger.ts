/**
 * /ledger Command
 *
 * Shows the user's recent deposits and what is still owed to them
 */

import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  MessageFlags,
} from 'discord.js'
import type { CommandDeps } from '../context.js'
import { displayNameOf } from '../context.js'
import { MAX_LEDGER_LIMIT, myLedger } from '../../services/refinery.js'
import { createLedgerEmbed } from '../embeds/builders.js'

export const ledgerCommand = new SlashCommandBuilder()
  .setName('ledger')
  .setDescription('View your deposit history and payment status')
  .addIntegerOption(opt =>
    opt
      .setName('limit')
      .setDescription(`Number of deposits to show (1-${MAX_LEDGER_LIMIT}, default 10)`)
      .setMinValue(1)
      .setMaxValue(MAX_LEDGER_LIMIT)
  )

export async function executeLedger(
  interaction: ChatInputCommandInteraction,
  deps: CommandDeps
): Promise<void> {
  const limit = interaction.options.getInteger('limit') ?? 10
  const view = myLedger(deps.db, interaction.user.id, limit)

  await interaction.reply({
    embeds: [createLedgerEmbed(view, displayNameOf(interaction))],
    flags: MessageFlags.Ephemeral,
  })
}
