/**
 * Command Rate Limiter
 *
 * Sliding window per (user, command), held in process memory only: it starts
 * empty, is never persisted, and resets when the process restarts.
 */

import type { RateLimitConfig } from '../types/index.js'
import { RateLimitedError } from '../utils/errors.js'

interface RateLimitEntry {
  timestamps: number[]
}

export class CommandRateLimiter {
  private store = new Map<string, RateLimitEntry>()
  private cleanupInterval: NodeJS.Timeout | null = null
  private readonly windowMs: number

  constructor(
    private readonly config: RateLimitConfig,
    private readonly now: () => number = Date.now
  ) {
    this.windowMs = config.windowSeconds * 1000
  }

  private key(userId: string, commandName: string): string {
    return `${userId}:${commandName}`
  }

  /**
   * Record one invocation, or throw RateLimitedError if the window is full
   */
  consume(userId: string, commandName: string): void {
    const now = this.now()
    const windowStart = now - this.windowMs
    const key = this.key(userId, commandName)

    let entry = this.store.get(key)
    if (!entry) {
      entry = { timestamps: [] }
      this.store.set(key, entry)
    }

    // Remove expired timestamps
    entry.timestamps = entry.timestamps.filter(t => t > windowStart)

    if (entry.timestamps.length >= this.config.maxInvocations) {
      const oldestInWindow = entry.timestamps[0] ?? now
      const retryAfter = Math.max(1, Math.ceil((oldestInWindow + this.windowMs - now) / 1000))
      throw new RateLimitedError(retryAfter)
    }

    entry.timestamps.push(now)
  }

  /**
   * Invocations left in the current window
   */
  remaining(userId: string, commandName: string): number {
    const entry = this.store.get(this.key(userId, commandName))
    if (!entry) {
      return this.config.maxInvocations
    }
    const windowStart = this.now() - this.windowMs
    const active = entry.timestamps.filter(t => t > windowStart).length
    return Math.max(0, this.config.maxInvocations - active)
  }

  /**
   * Drop entries whose whole window has expired
   */
  prune(): number {
    const windowStart = this.now() - this.windowMs
    let removed = 0
    for (const [key, entry] of this.store) {
      entry.timestamps = entry.timestamps.filter(t => t > windowStart)
      if (entry.timestamps.length === 0) {
        this.store.delete(key)
        removed++
      }
    }
    return removed
  }

  get size(): number {
    return this.store.size
  }

  /**
   * Prune periodically; the timer never keeps the process alive
   */
  start(): void {
    if (this.cleanupInterval) return
    this.cleanupInterval = setInterval(() => this.prune(), this.windowMs)
    this.cleanupInterval.unref()
  }

  stop(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval)
      this.cleanupInterval = null
    }
  }
}
