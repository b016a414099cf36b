/**
 * Health Check Route
 */

import { Router, type Request, type Response } from 'express'
import type { Database } from 'better-sqlite3'
import type { HealthResponse } from '../../types/api.js'
import { logger } from '../../utils/logger.js'

const VERSION = '0.1.0'

function databaseReachable(db: Database): boolean {
  try {
    db.prepare('SELECT 1').get()
    return true
  } catch (error) {
    logger.warn({ error }, 'Health check could not reach the database')
    return false
  }
}

export function createHealthRouter(db: Database, getUptime: () => number): Router {
  const router = Router()

  router.get('/health', (_req: Request, res: Response) => {
    const healthy = databaseReachable(db)
    const response: HealthResponse = {
      status: healthy ? 'ok' : 'degraded',
      version: VERSION,
      uptime: getUptime(),
      database: healthy ? 'ok' : 'unavailable',
    }
    res.status(healthy ? 200 : 503).json(response)
  })

  return router
}
