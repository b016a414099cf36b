/**
 * Conversion Service
 * Sand to melange refinement at a fixed rate
 */

import type { ConversionResult } from '../types/index.js'
import { InvalidInputError } from '../utils/errors.js'

/**
 * Reject anything that is not a positive whole number of sand per melange
 */
function assertRate(rate: number): void {
  if (!Number.isSafeInteger(rate) || rate <= 0) {
    throw new InvalidInputError(
      `Conversion rate must be a positive whole number (got ${rate})`,
      'rate > 0',
      { rate }
    )
  }
}

/**
 * Convert raw sand into melange plus the sand left over
 *
 * `melange * rate + remainderSand === sandAmount` always holds.
 */
export function convert(sandAmount: number, rate: number): ConversionResult {
  if (!Number.isSafeInteger(sandAmount) || sandAmount < 0) {
    throw new InvalidInputError(
      `Sand amount must be a non-negative whole number (got ${sandAmount})`,
      'sandAmount >= 0',
      { sandAmount }
    )
  }
  assertRate(rate)

  return {
    melange: Math.floor(sandAmount / rate),
    remainderSand: sandAmount % rate,
  }
}

/** Landsraad crafting reduction on the sand needed per melange */
export const LANDSRAAD_REDUCTION_PCT = 25

/**
 * Rate with the Landsraad reduction applied, rounded up to whole sand
 *
 * 50 sand per melange becomes 38 (37.5 rounded up); never below 1.
 */
export function landsraadRate(sandPerMelange: number): number {
  assertRate(sandPerMelange)
  return Math.max(1, Math.ceil((sandPerMelange * (100 - LANDSRAAD_REDUCTION_PCT)) / 100))
}
