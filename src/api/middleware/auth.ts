/**
 * Authentication Middleware
 * Bearer token validation for API requests
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express'
import { timingSafeEqual } from 'node:crypto'
import { logger } from '../../utils/logger.js'

function tokenMatches(candidate: string, validTokens: Buffer[]): boolean {
  const given = Buffer.from(candidate)
  let matched = false
  for (const token of validTokens) {
    if (token.length === given.length && timingSafeEqual(token, given)) {
      matched = true
    }
  }
  return matched
}

/**
 * Create auth middleware with configured tokens
 */
export function createAuthMiddleware(validTokens: string[]): RequestHandler {
  const tokens = validTokens.map(token => Buffer.from(token))

  return (req: Request, res: Response, next: NextFunction): void => {
    // Skip auth for health check and OPTIONS
    if (req.path === '/health' || req.method === 'OPTIONS') {
      return next()
    }

    const authHeader = req.headers.authorization
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      logger.warn({ path: req.path, method: req.method }, 'Missing authorization header')
      res.status(401).json({
        error: 'UNAUTHORIZED',
        message: 'Missing or invalid authorization header',
      })
      return
    }

    if (!tokenMatches(authHeader.substring(7), tokens)) {
      logger.warn({ path: req.path, method: req.method }, 'Invalid bearer token')
      res.status(403).json({
        error: 'FORBIDDEN',
        message: 'Invalid bearer token',
      })
      return
    }

    next()
  }
}
