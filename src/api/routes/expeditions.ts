/**
 * Expedition Routes
 * GET /expeditions
 * GET /expeditions/:id
 */

import { Router, type Request, type Response, type NextFunction } from 'express'
import type { Database } from 'better-sqlite3'
import { z } from 'zod'
import type { ExpeditionListResponse, ExpeditionResponse } from '../../types/api.js'
import { expeditionDetails } from '../../services/refinery.js'
import { getRecentExpeditions } from '../../services/expedition.js'
import { withStorageRetry } from '../../db/connection.js'
import { parseRequest } from '../validation.js'

const ExpeditionListQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(50).default(10),
})

const ExpeditionParamsSchema = z.object({
  id: z.coerce.number().int().min(1),
})

export function createExpeditionsRouter(db: Database): Router {
  const router = Router()

  router.get('/expeditions', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { limit } = parseRequest(ExpeditionListQuerySchema, req.query)
      const expeditions = withStorageRetry('recentExpeditions', () => getRecentExpeditions(db, limit))

      const response: ExpeditionListResponse = {
        expeditions: expeditions.map(e => ({
          id: e.id,
          initiatorId: e.initiatorId,
          totalSand: e.totalSand,
          participantCount: e.participantCount,
          createdAt: e.createdAt.toISOString(),
        })),
        limit,
      }

      res.json(response)
    } catch (error) {
      next(error)
    }
  })

  router.get('/expeditions/:id', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = parseRequest(ExpeditionParamsSchema, req.params)
      const { expedition, credits } = expeditionDetails(db, id)

      const response: ExpeditionResponse = {
        id: expedition.id,
        initiatorId: expedition.initiatorId,
        totalSand: expedition.totalSand,
        participantCount: expedition.participantCount,
        harvesterCutPct: expedition.harvesterCutPct,
        guildCutPct: expedition.guildCutPct,
        sandPerMelange: expedition.sandPerMelange,
        guildSand: expedition.guildSand,
        harvesterSand: expedition.harvesterSand,
        perParticipantSand: expedition.perParticipantSand,
        unallocatedSand: expedition.unallocatedSand,
        landsraadBonus: expedition.landsraadBonus,
        createdAt: expedition.createdAt.toISOString(),
        credits: credits.map(c => ({
          userId: c.userId,
          role: c.role,
          sandAmount: c.sandAmount,
          melangeAmount: c.melangeAmount,
        })),
      }

      res.json(response)
    } catch (error) {
      next(error)
    }
  })

  return router
}
