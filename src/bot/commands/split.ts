/**
 * /split Command
 *
 * Splits an expedition's spice sand between participants, the harvester
 * who ran it and the guild treasury
 */

import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
} from 'discord.js'
import type { CommandDeps } from '../context.js'
import { cachedMemberName, commandContext } from '../context.js'
import { spiceSplit } from '../../services/refinery.js'
import { parseMentions } from '../../utils/mentions.js'
import { InvalidInputError } from '../../utils/errors.js'
import { createSplitEmbed } from '../embeds/builders.js'

export const splitCommand = new SlashCommandBuilder()
  .setName('split')
  .setDescription('Split expedition spice sand among its members')
  .addIntegerOption(opt =>
    opt
      .setName('total_sand')
      .setDescription('Total spice sand collected')
      .setRequired(true)
      .setMinValue(1)
  )
  .addStringOption(opt =>
    opt
      .setName('users')
      .setDescription('Participants as mentions, e.g. @alice @bob')
      .setRequired(true)
      .setMaxLength(2000)
  )
  .addNumberOption(opt =>
    opt
      .setName('harvester_cut')
      .setDescription('Percent kept by you as harvester, after the guild cut (default 0)')
      .setMinValue(0)
      .setMaxValue(100)
  )
  .addNumberOption(opt =>
    opt
      .setName('guild_cut')
      .setDescription('Override the guild cut percent (admins only)')
      .setMinValue(0)
      .setMaxValue(100)
  )
  .addBooleanOption(opt =>
    opt
      .setName('landsraad_bonus')
      .setDescription('Apply the 25% Landsraad crafting reduction to the rate (default false)')
  )

export async function executeSplit(
  interaction: ChatInputCommandInteraction,
  deps: CommandDeps
): Promise<void> {
  const totalSand = interaction.options.getInteger('total_sand', true)
  const users = interaction.options.getString('users', true)
  const harvesterCut = interaction.options.getNumber('harvester_cut') ?? 0
  const guildCut = interaction.options.getNumber('guild_cut') ?? undefined
  const landsraadBonus = interaction.options.getBoolean('landsraad_bonus') ?? false

  const { ids, duplicates } = parseMentions(users)
  if (duplicates.length > 0) {
    throw new InvalidInputError(
      `Each participant can only be listed once (repeated: ${duplicates.map(id => `<@${id}>`).join(', ')})`,
      'participantIds are distinct',
      { duplicates }
    )
  }
  if (ids.length === 0) {
    throw new InvalidInputError(
      'Mention at least one participant, e.g. `@alice @bob`',
      'participantIds is non-empty'
    )
  }

  const participantNames: Record<string, string | null> = {}
  for (const id of ids) {
    participantNames[id] = cachedMemberName(interaction, id)
  }

  const result = spiceSplit(
    deps.db,
    commandContext(interaction, deps.config),
    deps.config.guildName,
    totalSand,
    ids,
    harvesterCut,
    { guildCutPct: guildCut, participantNames, landsraadBonus }
  )

  await interaction.reply({ embeds: [createSplitEmbed(result, landsraadBonus)] })
}
