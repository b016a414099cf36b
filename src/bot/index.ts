/**
 * Refinery Discord Bot
 *
 * Slash commands for harvests, expedition splits, the leaderboard and the
 * guild treasury, plus /refinery admin commands.
 */

import { Client, GatewayIntentBits, Events, ActivityType } from 'discord.js'
import type { Database } from 'better-sqlite3'
import type { RefineryConfig } from '../types/index.js'
import type { CommandRateLimiter } from '../services/rate-limit.js'
import type { CommandDeps } from './context.js'
import { registerCommands, handleInteraction } from './commands/index.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger({ component: 'bot' })

/** Member cache lets /split show participant names without extra fetches */
const CLIENT_OPTIONS = {
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMembers,
  ],
}

export class RefineryBot {
  private client: Client
  private deps: CommandDeps
  private token: string

  constructor(db: Database, config: RefineryConfig, rateLimiter: CommandRateLimiter, token: string) {
    this.deps = { db, config, rateLimiter }
    this.token = token
    this.client = new Client(CLIENT_OPTIONS)

    this.setupEventHandlers()
  }

  private setupEventHandlers(): void {
    this.client.once(Events.ClientReady, async (readyClient) => {
      logger.info({
        user: readyClient.user.tag,
        guildCount: readyClient.guilds.cache.size,
      }, 'Refinery bot connected to Discord')

      readyClient.user.setActivity('the spice flow', { type: ActivityType.Watching })

      try {
        await registerCommands(this.token, readyClient.application.id, this.deps.config.devGuildId)
      } catch (error) {
        logger.error({ error }, 'Slash command registration failed; existing commands stay active')
      }
    })

    this.client.on(Events.InteractionCreate, async (interaction) => {
      try {
        await handleInteraction(interaction, this.deps)
      } catch (error) {
        logger.error({ error }, 'Error handling interaction')
      }
    })

    this.client.on(Events.Error, (error) => {
      logger.error({ error }, 'Discord client error')
    })

    this.client.on(Events.Warn, (message) => {
      logger.warn({ message }, 'Discord client warning')
    })
  }

  async start(): Promise<void> {
    logger.info('Starting refinery Discord bot...')
    await this.client.login(this.token)
  }

  async stop(): Promise<void> {
    logger.info('Stopping refinery Discord bot...')
    await this.client.destroy()
  }
}
