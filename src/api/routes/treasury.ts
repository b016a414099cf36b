/**
 * Guild Treasury Routes
 * GET /treasury
 */

import { Router, type Request, type Response, type NextFunction } from 'express'
import type { Database } from 'better-sqlite3'
import { z } from 'zod'
import type { TreasuryResponse } from '../../types/api.js'
import { guildTreasury } from '../../services/refinery.js'
import { parseRequest } from '../validation.js'

const TreasuryQuerySchema = z.object({
  guild: z.string().min(1).max(100).optional(),
  limit: z.coerce.number().int().min(1).max(50).default(10),
})

export function createTreasuryRouter(db: Database, defaultGuildName: string): Router {
  const router = Router()

  /**
   * Treasury totals with recent transactions, newest first
   *
   * Query params:
   * - guild: string (default: configured guild)
   * - limit: number of transactions (default: 10, max: 50)
   */
  router.get('/treasury', (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseRequest(TreasuryQuerySchema, req.query)
      const { treasury, recentTransactions, reconciliation } = guildTreasury(
        db,
        query.guild ?? defaultGuildName,
        query.limit
      )

      const response: TreasuryResponse = {
        guildName: treasury.guildName,
        totalSand: treasury.totalSand,
        totalMelange: treasury.totalMelange,
        updatedAt: treasury.updatedAt.toISOString(),
        consistent: reconciliation.consistent,
        transactions: recentTransactions.map(tx => ({
          id: tx.id,
          type: tx.type,
          sandAmount: tx.sandAmount,
          melangeAmount: tx.melangeAmount,
          expeditionId: tx.expeditionId,
          description: tx.description,
          createdAt: tx.createdAt.toISOString(),
        })),
      }

      res.json(response)
    } catch (error) {
      next(error)
    }
  })

  return router
}
