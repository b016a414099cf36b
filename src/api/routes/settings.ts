/**
 * Settings Routes
 * GET /settings
 */

import { Router, type Request, type Response, type NextFunction } from 'express'
import type { Database } from 'better-sqlite3'
import type { SettingsResponse } from '../../types/api.js'
import { conversionInfo } from '../../services/refinery.js'

export function createSettingsRouter(db: Database): Router {
  const router = Router()

  router.get('/settings', (_req: Request, res: Response, next: NextFunction) => {
    try {
      const info = conversionInfo(db)
      const response: SettingsResponse = {
        sandPerMelange: info.sandPerMelange,
        guildCutPct: info.guildCutPct,
      }
      res.json(response)
    } catch (error) {
      next(error)
    }
  })

  return router
}
