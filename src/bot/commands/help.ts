/**
 * /help Command
 *
 * Command overview and how the refinery numbers work
 */

import {
  SlashCommandBuilder,
  type ButtonInteraction,
  type ChatInputCommandInteraction,
  MessageFlags,
  EmbedBuilder,
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
} from 'discord.js'
import type { CommandDeps } from '../context.js'
import { conversionInfo, MAX_SOLO_HARVEST, type ConversionInfo } from '../../services/refinery.js'
import { landsraadRate } from '../../services/conversion.js'
import { Colors, Emoji, formatAmount } from '../embeds/builders.js'

const HELP_TOPICS = ['overview', 'commands', 'splits'] as const
type HelpTopic = typeof HELP_TOPICS[number]

function isHelpTopic(value: string): value is HelpTopic {
  return HELP_TOPICS.some(topic => topic === value)
}

export const helpCommand = new SlashCommandBuilder()
  .setName('help')
  .setDescription('Learn how to use the refinery')
  .addStringOption(opt =>
    opt
      .setName('topic')
      .setDescription('Specific topic to learn about')
      .addChoices(
        { name: '📖 Overview', value: 'overview' },
        { name: '⚡ Commands', value: 'commands' },
        { name: '🏜️ Expedition Splits', value: 'splits' },
      ))

export async function executeHelp(
  interaction: ChatInputCommandInteraction,
  deps: CommandDeps
): Promise<void> {
  const requested = interaction.options.getString('topic') ?? 'overview'
  const topic = isHelpTopic(requested) ? requested : 'overview'

  await interaction.reply({
    embeds: [createHelpEmbed(topic, conversionInfo(deps.db))],
    components: [createHelpNavButtons(topic)],
    flags: MessageFlags.Ephemeral,
  })
}

export function createHelpEmbed(topic: HelpTopic, info: ConversionInfo): EmbedBuilder {
  switch (topic) {
    case 'commands':
      return createCommandsEmbed()
    case 'splits':
      return createSplitsEmbed(info)
    default:
      return createOverviewEmbed(info)
  }
}

function createOverviewEmbed(info: ConversionInfo): EmbedBuilder {
  return new EmbedBuilder()
    .setColor(Colors.SPICE_ORANGE)
    .setTitle(`${Emoji.DESERT} Spice Refinery`)
    .setDescription(
      'The refinery tracks the **spice sand** you harvest and refines it into **melange**.\n\n' +
      '**How it works:**\n' +
      '• Log solo harvests with `/harvest`\n' +
      '• Split team expeditions with `/split`\n' +
      `• Every **${info.sandPerMelange}** sand refines into **1** melange\n` +
      '• Leftover sand carries over toward your next melange at the same rate\n' +
      '• Officers pay out melange; `/ledger` shows what is still owed to you'
    )
    .addFields(
      {
        name: '🚀 Quick Start',
        value:
          '`/harvest amount` — Log a solo harvest\n' +
          '`/refines` — Check your totals\n' +
          '`/help commands` — All available commands',
      },
      {
        name: '⚗️ Current Settings',
        value:
          `Rate: **${info.sandPerMelange}:1**\n` +
          `Guild cut: **${info.guildCutPct}%**`,
        inline: true,
      }
    )
    .setFooter({ text: 'Use the buttons below to learn more about specific topics' })
}

function createCommandsEmbed(): EmbedBuilder {
  return new EmbedBuilder()
    .setColor(Colors.SPICE_ORANGE)
    .setTitle('⚡ Refinery Commands')
    .addFields(
      {
        name: `${Emoji.HARVESTER} Harvesting`,
        value:
          `\`/harvest amount\` — Log 1-${formatAmount(MAX_SOLO_HARVEST)} sand from a solo run\n` +
          '`/split total_sand users [harvester_cut] [landsraad_bonus]` — Split an expedition',
      },
      {
        name: `${Emoji.STATS} Information`,
        value:
          '`/refines` — Your sand and melange\n' +
          '`/ledger [limit]` — Your deposits and payment status\n' +
          '`/leaderboard [limit]` — Top refiners\n' +
          '`/conversion` — Current rate and guild cut\n' +
          '`/treasury` — Guild treasury and recent movements\n' +
          '`/expedition id` — Details of a past expedition',
      },
      {
        name: '🔧 Admin Commands',
        value:
          '`/refinery set-rate` — Change the refinement rate\n' +
          '`/refinery set-guild-cut` — Change the default guild cut\n' +
          '`/refinery withdraw` — Pay out from the treasury\n' +
          '`/refinery pending` — Users with unpaid melange\n' +
          '`/refinery payment user` — Mark one user paid\n' +
          '`/refinery payroll` — Mark everyone paid\n' +
          '`/refinery reset-stats confirm:True` — Zero all user totals',
      }
    )
}

function createSplitsEmbed(info: ConversionInfo): EmbedBuilder {
  return new EmbedBuilder()
    .setColor(Colors.SPICE_ORANGE)
    .setTitle(`${Emoji.DESERT} Expedition Splits`)
    .setDescription('`/split` divides the total sand in this order:')
    .addFields(
      {
        name: `1. ${Emoji.GUILD} Guild cut`,
        value: `**${info.guildCutPct}%** of the total goes to the guild treasury (rounded down).`,
      },
      {
        name: `2. ${Emoji.HARVESTER} Harvester cut`,
        value: 'Your `harvester_cut` percent of what is left is credited to you, the harvester.',
      },
      {
        name: `3. ${Emoji.PEOPLE} Participants`,
        value: 'The rest is shared evenly. Sand that does not divide evenly stays unallocated.',
      },
      {
        name: '🏅 Landsraad bonus',
        value: '`landsraad_bonus:True` refines every share at a rate 25% lower (rounded up), ' +
          `e.g. ${info.sandPerMelange}:1 becomes ${landsraadRate(info.sandPerMelange)}:1.`,
      },
      {
        name: 'Example',
        value: '50,000 sand, 5 people, 25% harvester, 10% guild → ' +
          'guild 5,000 • harvester 11,250 • each participant 6,750',
      }
    )
}

function createHelpNavButtons(current: HelpTopic): ActionRowBuilder<ButtonBuilder> {
  const labels: Record<HelpTopic, string> = {
    overview: '📖 Overview',
    commands: '⚡ Commands',
    splits: '🏜️ Splits',
  }

  return new ActionRowBuilder<ButtonBuilder>()
    .addComponents(
      HELP_TOPICS.map(topic =>
        new ButtonBuilder()
          .setCustomId(`help_${topic}`)
          .setLabel(labels[topic])
          .setStyle(topic === current ? ButtonStyle.Primary : ButtonStyle.Secondary)
          .setDisabled(topic === current)
      )
    )
}

/**
 * Handle help button navigation
 */
export async function handleHelpButton(
  interaction: ButtonInteraction,
  deps: CommandDeps
): Promise<boolean> {
  if (!interaction.customId.startsWith('help_')) {
    return false
  }

  const requested = interaction.customId.slice('help_'.length)
  const topic = isHelpTopic(requested) ? requested : 'overview'

  await interaction.update({
    embeds: [createHelpEmbed(topic, conversionInfo(deps.db))],
    components: [createHelpNavButtons(topic)],
  })

  return true
}
