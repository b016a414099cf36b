/**
 * Split Service
 * Divides an expedition's sand between the guild, the harvester and the participants
 */

import type { SplitResult } from '../types/index.js'
import { InvalidInputError } from '../utils/errors.js'
import { convert } from './conversion.js'

/**
 * A percentage as the exact fraction `numerator / denominator` of a whole
 *
 * Built from the percentage's shortest decimal form, so `33.333` is exactly
 * 33333 / 100000 and shares can be floored without float error.
 */
export interface PercentShare {
  numerator: bigint
  denominator: bigint
}

const DECIMAL = /^(\d+)(?:\.(\d+))?(?:e([+-]?\d+))?$/

/**
 * Validate a percentage and return it as an exact fraction
 */
export function toPercentShare(pct: number, field: string): PercentShare {
  if (!Number.isFinite(pct) || pct < 0 || pct > 100) {
    throw new InvalidInputError(
      `${field} must be between 0 and 100 (got ${pct})`,
      `0 <= ${field} <= 100`,
      { [field]: pct }
    )
  }

  const match = DECIMAL.exec(String(pct))
  if (!match) {
    throw new InvalidInputError(`${field} is not a decimal number (got ${pct})`, `${field} is decimal`, { [field]: pct })
  }

  const [, whole = '0', fraction = '', exponent = '0'] = match
  const scale = fraction.length - Number(exponent)
  const digits = BigInt(whole + fraction)

  return scale >= 0
    ? { numerator: digits, denominator: 100n * 10n ** BigInt(scale) }
    : { numerator: digits * 10n ** BigInt(-scale), denominator: 100n }
}

/**
 * floor(amount * share), exact for any safe integer amount
 */
function takeShare(amount: number, share: PercentShare): number {
  return Number((BigInt(amount) * share.numerator) / share.denominator)
}

/**
 * Compute the split of one expedition
 *
 * The guild cut comes off the top, the harvester cut comes off what is left,
 * and the rest is shared evenly. Whatever the even division cannot place is
 * reported as `unallocatedSand`, so the shares always add back up to
 * `totalSand`.
 */
export function computeSplit(
  totalSand: number,
  participantCount: number,
  harvesterCutPct: number,
  guildCutPct: number,
  sandPerMelange: number
): SplitResult {
  if (!Number.isSafeInteger(totalSand) || totalSand < 0) {
    throw new InvalidInputError(
      `Total sand must be a non-negative whole number (got ${totalSand})`,
      'totalSand >= 0',
      { totalSand }
    )
  }
  if (!Number.isSafeInteger(participantCount) || participantCount <= 0) {
    throw new InvalidInputError(
      `An expedition needs at least one participant (got ${participantCount})`,
      'participantCount > 0',
      { participantCount }
    )
  }

  const guildShare = toPercentShare(guildCutPct, 'guildCutPct')
  const harvesterShare = toPercentShare(harvesterCutPct, 'harvesterCutPct')

  const combined = guildShare.numerator * harvesterShare.denominator + harvesterShare.numerator * guildShare.denominator
  if (combined > guildShare.denominator * harvesterShare.denominator) {
    throw new InvalidInputError(
      `Harvester cut (${harvesterCutPct}%) plus guild cut (${guildCutPct}%) cannot exceed 100%`,
      'harvesterCutPct + guildCutPct <= 100',
      { harvesterCutPct, guildCutPct }
    )
  }
  const guildSand = takeShare(totalSand, guildShare)
  const remainingSand = totalSand - guildSand
  const harvesterSand = takeShare(remainingSand, harvesterShare)
  const distributableSand = remainingSand - harvesterSand
  const perParticipantSand = Math.floor(distributableSand / participantCount)
  const unallocatedSand = distributableSand - perParticipantSand * participantCount

  return {
    totalSand,
    participantCount,
    harvesterCutPct,
    guildCutPct,
    guildSand,
    remainingSand,
    harvesterSand,
    distributableSand,
    perParticipantSand,
    unallocatedSand,
    sandPerMelange,
    melange: {
      guild: convert(guildSand, sandPerMelange).melange,
      harvester: convert(harvesterSand, sandPerMelange).melange,
      perParticipant: convert(perParticipantSand, sandPerMelange).melange,
    },
  }
}
