/**
 * Pino logger setup for the refinery
 */

import { pino, type Logger } from 'pino'
import { getLogLevel, isDevelopment } from '../config.js'

const transport = isDevelopment()
  ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
      },
    }
  : undefined

export const logger = pino({
  level: getLogLevel(),
  transport,
})

/**
 * Create a child logger with additional context
 */
export function createLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings)
}
