import { describe, it, expect } from 'vitest'
import {
  ConsistencyError,
  INTERNAL_ERROR_MESSAGE,
  InvalidInputError,
  NotFoundError,
  PermissionDeniedError,
  RateLimitedError,
  STORAGE_RETRY_MESSAGE,
  StorageError,
  userMessageFor,
} from '../errors.js'

describe('userMessageFor', () => {
  it('shows input problems as-is', () => {
    expect(userMessageFor(new InvalidInputError('Total sand must be at least 1 (got 0)', 'totalSand >= 1')))
      .toBe('Total sand must be at least 1 (got 0)')
    expect(userMessageFor(new NotFoundError('Expedition #7 not found'))).toBe('Expedition #7 not found')
    expect(userMessageFor(new PermissionDeniedError('change the conversion rate')))
      .toBe('Only guild admins can change the conversion rate')
  })

  it('asks the user to retry on storage failures', () => {
    expect(userMessageFor(new StorageError('SQLITE_BUSY', true))).toBe(STORAGE_RETRY_MESSAGE)
  })

  it('tells rate-limited users when to come back', () => {
    expect(userMessageFor(new RateLimitedError(12))).toBe('Slow down! Try again in 12s.')
  })

  it('hides consistency and unexpected errors', () => {
    expect(userMessageFor(new ConsistencyError('treasury mismatch'))).toBe(INTERNAL_ERROR_MESSAGE)
    expect(userMessageFor(new Error('boom'))).toBe(INTERNAL_ERROR_MESSAGE)
    expect(userMessageFor('not even an error')).toBe(INTERNAL_ERROR_MESSAGE)
  })
})

describe('RefineryError.toResponse', () => {
  it('carries the violated constraint for invalid input', () => {
    const error = new InvalidInputError('bad', 'participantCount > 0', { participantCount: 0 })

    expect(error.httpStatus).toBe(400)
    expect(error.toResponse()).toEqual({
      error: 'INVALID_INPUT',
      message: 'bad',
      details: { constraint: 'participantCount > 0', participantCount: 0 },
    })
  })
})
