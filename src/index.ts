/**
 * Spice Refinery
 *
 * Entry point for the refinery Discord bot and its read-only API
 */

import { loadConfig } from './config.js'
import { initDatabase, closeDatabase } from './db/connection.js'
import { ApiServer } from './api/server.js'
import { RefineryBot } from './bot/index.js'
import { CommandRateLimiter } from './services/rate-limit.js'
import { logger } from './utils/logger.js'

async function main(): Promise<void> {
  logger.info('Starting spice refinery...')

  const config = loadConfig()
  logger.info({
    port: config.port,
    databasePath: config.databasePath,
    guildName: config.guildName,
    tokenCount: config.serviceTokens.length,
    botEnabled: !!config.discordToken,
  }, 'Configuration loaded')

  const db = initDatabase(config.databasePath, {
    timeoutMs: config.storageTimeoutMs,
    defaultSandPerMelange: config.defaultSandPerMelange,
    defaultGuildCutPct: config.defaultGuildCutPct,
  })

  // API only runs when someone can authenticate against it
  let server: ApiServer | null = null
  if (config.serviceTokens.length > 0) {
    server = new ApiServer(config, db)
  } else {
    logger.warn('REFINERY_SERVICE_TOKENS not set - API server will not start')
  }

  const rateLimiter = new CommandRateLimiter(config.rateLimit)

  let bot: RefineryBot | null = null
  if (config.discordToken) {
    bot = new RefineryBot(db, config, rateLimiter, config.discordToken)
  } else {
    logger.warn('REFINERY_DISCORD_TOKEN not set - Discord bot will not start')
  }

  if (!server && !bot) {
    throw new Error('Nothing to run: set REFINERY_DISCORD_TOKEN and/or REFINERY_SERVICE_TOKENS')
  }

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutting down...')

    rateLimiter.stop()
    if (bot) {
      await bot.stop()
    }
    if (server) {
      await server.stop()
    }
    closeDatabase(db)

    process.exit(0)
  }

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((error: unknown) => {
      logger.fatal({ error, signal }, 'Shutdown failed')
      process.exit(1)
    })
  }
  process.on('SIGINT', () => onSignal('SIGINT'))
  process.on('SIGTERM', () => onSignal('SIGTERM'))

  if (server) {
    const port = await server.start()
    logger.info(`Refinery API ready at http://localhost:${port}`)
  }

  if (bot) {
    rateLimiter.start()
    await bot.start()
  }

  logger.info('Spice refinery startup complete')
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Failed to start spice refinery')
  process.exit(1)
})
