/**
 * API Server
 * Read-only JSON views of the refinery ledger
 */

import express, { type Express, type Request, type Response, type NextFunction } from 'express'
import type { Server } from 'http'
import type { Database } from 'better-sqlite3'
import { createAuthMiddleware } from './middleware/auth.js'
import { ConsistencyError, RefineryError } from '../utils/errors.js'
import { createLogger } from '../utils/logger.js'

// Route handlers
import { createHealthRouter } from './routes/health.js'
import { createLeaderboardRouter } from './routes/leaderboard.js'
import { createRefinesRouter } from './routes/refines.js'
import { createTreasuryRouter } from './routes/treasury.js'
import { createExpeditionsRouter } from './routes/expeditions.js'
import { createSettingsRouter } from './routes/settings.js'

const logger = createLogger({ component: 'api' })

export interface ApiServerConfig {
  port: number
  serviceTokens: string[]
  guildName: string
}

export class ApiServer {
  readonly app: Express
  private server: Server | null = null
  private startTime: Date

  constructor(
    private config: ApiServerConfig,
    private db: Database
  ) {
    this.app = express()
    this.startTime = new Date()

    this.setupMiddleware()
    this.setupRoutes()
    this.setupErrorHandler()
  }

  private setupMiddleware(): void {
    // CORS headers
    this.app.use((req: Request, res: Response, next: NextFunction): void => {
      res.header('Access-Control-Allow-Origin', '*')
      res.header('Access-Control-Allow-Methods', 'GET, OPTIONS')
      res.header('Access-Control-Allow-Headers', 'Content-Type, Authorization')

      if (req.method === 'OPTIONS') {
        res.sendStatus(200)
        return
      }
      next()
    })

    // Request logging
    this.app.use((req: Request, res: Response, next: NextFunction): void => {
      const start = Date.now()
      res.on('finish', () => {
        logger.debug({
          method: req.method,
          path: req.path,
          status: res.statusCode,
          duration: Date.now() - start,
        }, 'Request handled')
      })
      next()
    })

    this.app.use(createAuthMiddleware(this.config.serviceTokens))
  }

  private setupRoutes(): void {
    // Health check (no auth)
    this.app.use(createHealthRouter(this.db, () => this.getUptime()))

    const v1 = '/api/v1'
    this.app.use(v1, createLeaderboardRouter(this.db))
    this.app.use(v1, createRefinesRouter(this.db))
    this.app.use(v1, createTreasuryRouter(this.db, this.config.guildName))
    this.app.use(v1, createExpeditionsRouter(this.db))
    this.app.use(v1, createSettingsRouter(this.db))

    // 404 handler
    this.app.use((req: Request, res: Response) => {
      res.status(404).json({
        error: 'NOT_FOUND',
        message: `Endpoint ${req.method} ${req.path} not found`,
      })
    })
  }

  private setupErrorHandler(): void {
    this.app.use((err: Error, req: Request, res: Response, _next: NextFunction): void => {
      if (err instanceof RefineryError && !(err instanceof ConsistencyError)) {
        if (err.httpStatus >= 500) {
          logger.error({ error: err, path: req.path, method: req.method }, 'Request failed')
        }
        res.status(err.httpStatus).json(err.toResponse())
        return
      }

      logger.error({ error: err, path: req.path, method: req.method }, 'Unhandled error')
      res.status(500).json({
        error: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
      })
    })
  }

  private getUptime(): number {
    return Math.floor((Date.now() - this.startTime.getTime()) / 1000)
  }

  async start(port: number = this.config.port): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(port)
      server.once('listening', () => {
        const address = server.address()
        const boundPort = typeof address === 'object' && address ? address.port : port
        logger.info({ port: boundPort }, 'API server started')
        resolve(boundPort)
      })
      server.once('error', reject)
      this.server = server
    })
  }

  async stop(): Promise<void> {
    const server = this.server
    if (!server) return

    this.server = null
    return new Promise((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error)
          return
        }
        logger.info('API server stopped')
        resolve()
      })
    })
  }
}
