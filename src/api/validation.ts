/**
 * Request validation helpers
 */

import type { z } from 'zod'
import { InvalidInputError } from '../utils/errors.js'

/**
 * Parse query or path parameters, turning zod issues into a 400
 */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const validation = schema.safeParse(input)
  if (!validation.success) {
    throw new InvalidInputError(
      'Invalid request parameters',
      'request parameters match schema',
      { errors: validation.error.flatten().fieldErrors }
    )
  }
  return validation.data
}
