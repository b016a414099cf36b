/**
 * Command Registration and Handler
 *
 * Manages slash command registration and routing
 */

import {
  REST,
  Routes,
  type ChatInputCommandInteraction,
  type Interaction,
  MessageFlags,
} from 'discord.js'
import type { CommandDeps } from '../context.js'
import { ConsistencyError, RefineryError, userMessageFor } from '../../utils/errors.js'
import { createLogger } from '../../utils/logger.js'
import { Emoji } from '../embeds/builders.js'

// Import command modules
import { harvestCommand, executeHarvest } from './harvest.js'
import { splitCommand, executeSplit } from './split.js'
import { refinesCommand, executeRefines } from './refines.js'
import { ledgerCommand, executeLedger } from './ledger.js'
import { leaderboardCommand, executeLeaderboard } from './leaderboard.js'
import { conversionCommand, executeConversion } from './conversion.js'
import { treasuryCommand, executeTreasury } from './treasury.js'
import { expeditionCommand, executeExpedition } from './expedition.js'
import { refineryAdminCommand, executeRefineryAdmin } from './admin.js'
import { helpCommand, executeHelp, handleHelpButton } from './help.js'

const logger = createLogger({ component: 'bot' })

type CommandExecutor = (interaction: ChatInputCommandInteraction, deps: CommandDeps) => Promise<void>

/** All registered slash commands and their handlers */
const commands = {
  harvest: { data: harvestCommand, execute: executeHarvest },
  split: { data: splitCommand, execute: executeSplit },
  refines: { data: refinesCommand, execute: executeRefines },
  ledger: { data: ledgerCommand, execute: executeLedger },
  leaderboard: { data: leaderboardCommand, execute: executeLeaderboard },
  conversion: { data: conversionCommand, execute: executeConversion },
  treasury: { data: treasuryCommand, execute: executeTreasury },
  expedition: { data: expeditionCommand, execute: executeExpedition },
  refinery: { data: refineryAdminCommand, execute: executeRefineryAdmin },
  help: { data: helpCommand, execute: executeHelp },
} satisfies Record<string, { data: { name: string; toJSON(): unknown }; execute: CommandExecutor }>

function findExecutor(commandName: string): CommandExecutor | null {
  for (const command of Object.values(commands)) {
    if (command.data.name === commandName) return command.execute
  }
  return null
}

/**
 * Register slash commands with Discord
 *
 * With a dev guild configured, registers to that guild only (instant) and
 * clears global commands. Otherwise registers globally (takes ~1 hour to
 * propagate).
 */
export async function registerCommands(token: string, applicationId: string, devGuildId: string | null): Promise<void> {
  const rest = new REST({ version: '10' }).setToken(token)
  const commandData = Object.values(commands).map(cmd => cmd.data.toJSON())

  try {
    if (devGuildId) {
      logger.info({
        commandCount: commandData.length,
        guildId: devGuildId,
      }, 'Registering slash commands to dev guild (instant)...')

      await rest.put(Routes.applicationGuildCommands(applicationId, devGuildId), {
        body: commandData,
      })

      // Clear global commands to prevent duplicates
      await rest.put(Routes.applicationCommands(applicationId), {
        body: [],
      })

      logger.info({ guildId: devGuildId }, 'Successfully registered slash commands to dev guild')
    } else {
      logger.info({ commandCount: commandData.length }, 'Registering slash commands globally...')

      await rest.put(Routes.applicationCommands(applicationId), {
        body: commandData,
      })

      logger.info('Successfully registered slash commands globally (may take up to 1 hour to propagate)')
    }
  } catch (error) {
    logger.error({ error }, 'Failed to register slash commands')
    throw error
  }
}

/**
 * Handle all interaction events
 */
export async function handleInteraction(
  interaction: Interaction,
  deps: CommandDeps
): Promise<void> {
  try {
    // Chat input commands (slash commands)
    if (interaction.isChatInputCommand()) {
      await handleCommand(interaction, deps)
      return
    }

    // Help navigation buttons
    if (interaction.isButton()) {
      const handled = await handleHelpButton(interaction, deps)
      if (!handled) {
        logger.debug({ customId: interaction.customId }, 'Unhandled button')
      }
    }
  } catch (error) {
    logInteractionError(error, interaction)

    if (interaction.isRepliable()) {
      const reply = {
        content: `${Emoji.CROSS} ${userMessageFor(error)}`,
        flags: MessageFlags.Ephemeral,
      } as const

      try {
        if (interaction.replied || interaction.deferred) {
          await interaction.followUp(reply)
        } else {
          await interaction.reply(reply)
        }
      } catch (replyError) {
        logger.warn({ error: replyError, userId: interaction.user.id }, 'Could not send error reply')
      }
    }
  }
}

/**
 * User mistakes are routine; everything else is worth an error line
 */
function logInteractionError(error: unknown, interaction: Interaction): void {
  const context = {
    interactionType: interaction.type,
    command: interaction.isChatInputCommand() ? interaction.commandName : undefined,
    userId: interaction.user.id,
  }

  if (error instanceof RefineryError && !(error instanceof ConsistencyError) && error.httpStatus < 500) {
    logger.info({ ...context, code: error.code, message: error.message }, 'Command rejected')
    return
  }

  logger.error({ ...context, error }, 'Error handling interaction')
}

/**
 * Route slash commands to their handlers
 */
async function handleCommand(
  interaction: ChatInputCommandInteraction,
  deps: CommandDeps
): Promise<void> {
  const { commandName } = interaction

  logger.debug({
    command: commandName,
    userId: interaction.user.id,
    guildId: interaction.guildId,
  }, 'Handling command')

  const execute = findExecutor(commandName)
  if (!execute) {
    logger.warn({ commandName }, 'Unknown command')
    await interaction.reply({
      content: `${Emoji.CROSS} Unknown command.`,
      flags: MessageFlags.Ephemeral,
    })
    return
  }

  deps.rateLimiter.consume(interaction.user.id, commandName)
  await execute(interaction, deps)
}
