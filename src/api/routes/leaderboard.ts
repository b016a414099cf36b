/**
 * Leaderboard Routes
 * GET /leaderboard
 */

import { Router, type Request, type Response, type NextFunction } from 'express'
import type { Database } from 'better-sqlite3'
import { z } from 'zod'
import type { LeaderboardResponse } from '../../types/api.js'
import { leaderboard } from '../../services/refinery.js'
import { MAX_LEADERBOARD_LIMIT } from '../../services/ledger.js'
import { parseRequest } from '../validation.js'

const LeaderboardQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_LEADERBOARD_LIMIT).default(10),
})

export function createLeaderboardRouter(db: Database): Router {
  const router = Router()

  /**
   * Top refiners by melange, then sand
   *
   * Query params:
   * - limit: number (default: 10, max: 25)
   */
  router.get('/leaderboard', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { limit } = parseRequest(LeaderboardQuerySchema, req.query)

      const response: LeaderboardResponse = {
        entries: leaderboard(db, limit).map(e => ({
          rank: e.rank,
          userId: e.userId,
          username: e.username,
          sandTotal: e.sandTotal,
          melangeTotal: e.melangeTotal,
        })),
        limit,
      }

      res.json(response)
    } catch (error) {
      next(error)
    }
  })

  return router
}
