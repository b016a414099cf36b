/**
 * Configuration loading from environment variables
 */

import type { RefineryConfig } from './types/index.js'

/**
 * Parse a numeric environment variable, falling back to a default when unset
 */
function readNumber(
  name: string,
  fallback: number,
  isValid: (value: number) => boolean,
  expectation: string
): number {
  const raw = process.env[name]
  if (raw === undefined || raw.trim() === '') {
    return fallback
  }

  const value = Number(raw)
  if (!Number.isFinite(value) || !isValid(value)) {
    throw new Error(`${name} must be ${expectation} (got "${raw}")`)
  }
  return value
}

/**
 * Split a comma-separated environment variable into trimmed, non-empty entries
 */
function readList(name: string): string[] {
  return (process.env[name] || '')
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0)
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): RefineryConfig {
  const isPositiveInteger = (v: number): boolean => Number.isSafeInteger(v) && v > 0
  const isPercentage = (v: number): boolean => v >= 0 && v <= 100

  return {
    port: readNumber('REFINERY_PORT', 3100, v => Number.isInteger(v) && v >= 0 && v < 65536, 'a TCP port'),
    databasePath: process.env.REFINERY_DATABASE_PATH || './data/refinery.db',
    // API is disabled when no service tokens are configured
    serviceTokens: readList('REFINERY_SERVICE_TOKENS'),
    // Discord token for the bot (optional - bot won't start without it)
    discordToken: process.env.REFINERY_DISCORD_TOKEN || null,
    devGuildId: process.env.REFINERY_DEV_GUILD_ID || null,
    guildName: process.env.REFINERY_GUILD_NAME || 'Default Guild',
    defaultSandPerMelange: readNumber('REFINERY_SAND_PER_MELANGE', 50, isPositiveInteger, 'a positive integer'),
    defaultGuildCutPct: readNumber('REFINERY_GUILD_CUT_PCT', 10, isPercentage, 'between 0 and 100'),
    storageTimeoutMs: readNumber('REFINERY_STORAGE_TIMEOUT_MS', 5000, isPositiveInteger, 'a positive integer'),
    rateLimit: {
      maxInvocations: readNumber('REFINERY_RATE_LIMIT_MAX', 5, isPositiveInteger, 'a positive integer'),
      windowSeconds: readNumber('REFINERY_RATE_LIMIT_WINDOW_SECONDS', 60, isPositiveInteger, 'a positive integer'),
    },
    adminUserIds: readList('REFINERY_ADMIN_USERS'),
    adminRoleIds: readList('REFINERY_ADMIN_ROLES'),
  }
}

/**
 * Check if running in development mode
 */
export function isDevelopment(): boolean {
  return process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test'
}

/**
 * Get log level from environment
 */
export function getLogLevel(): string {
  return process.env.LOG_LEVEL || (isDevelopment() ? 'debug' : 'info')
}
