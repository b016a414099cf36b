/**
 * User Refines Routes
 * GET /users/:userId/refines
 * GET /users/:userId/deposits
 */

import { Router, type Request, type Response, type NextFunction } from 'express'
import type { Database } from 'better-sqlite3'
import { z } from 'zod'
import type { UserDepositsResponse, UserRefinesResponse } from '../../types/api.js'
import { MAX_LEDGER_LIMIT, myLedger, myRefines } from '../../services/refinery.js'
import { parseRequest } from '../validation.js'

const UserParamsSchema = z.object({
  userId: z.string().regex(/^\d+$/, 'must be a Discord user ID'),
})

const DepositsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_LEDGER_LIMIT).default(10),
})

export function createRefinesRouter(db: Database): Router {
  const router = Router()

  router.get('/users/:userId/refines', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { userId } = parseRequest(UserParamsSchema, req.params)
      const refines = myRefines(db, userId)

      const response: UserRefinesResponse = {
        userId: refines.userId,
        username: refines.username,
        sandTotal: refines.sandTotal,
        melangeTotal: refines.melangeTotal,
        updatedAt: refines.updatedAt?.toISOString() ?? null,
        sandPerMelange: refines.sandPerMelange,
      }

      res.json(response)
    } catch (error) {
      next(error)
    }
  })

  /**
   * Recent deposits, newest first, and what is still unpaid
   *
   * Query params:
   * - limit: number (default: 10, max: 25)
   */
  router.get('/users/:userId/deposits', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { userId } = parseRequest(UserParamsSchema, req.params)
      const { limit } = parseRequest(DepositsQuerySchema, req.query)
      const { deposits, unpaid } = myLedger(db, userId, limit)

      const response: UserDepositsResponse = {
        userId,
        deposits: deposits.map(d => ({
          id: d.id,
          type: d.type,
          sandAmount: d.sandAmount,
          melangeAmount: d.melangeAmount,
          sandPerMelange: d.sandPerMelange,
          expeditionId: d.expeditionId,
          createdAt: d.createdAt.toISOString(),
          paidAt: d.paidAt?.toISOString() ?? null,
        })),
        unpaid: {
          depositCount: unpaid.depositCount,
          sandAmount: unpaid.sandAmount,
          melangeAmount: unpaid.melangeAmount,
        },
        limit,
      }

      res.json(response)
    } catch (error) {
      next(error)
    }
  })

  return router
}
