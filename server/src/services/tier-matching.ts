/**
 * Tier Matching
 *
 * Donation amounts arrive as floats, so a donation matches a tier when the two
 * amounts differ by strictly less than a tolerance. Tiers are kept ascending
 * with distinct amounts; if two tiers ever sit closer than twice the
 * tolerance, the first one in list order wins.
 */

import type { DonationTier } from '../types/models.js';
import { NoMatchingTierError, ValidationError } from '../utils/errors.js';

export const DEFAULT_TIER_TOLERANCE = 0.01;
export const MIN_TIERS = 1;
export const MAX_TIERS = 10;

export interface TierMatch {
  tier: DonationTier;
  index: number;
}

/**
 * Index of the first amount within `tolerance` of `amountUsd`, or null
 */
export function findTierIndex(
  tierAmounts: readonly number[],
  amountUsd: number,
  tolerance: number = DEFAULT_TIER_TOLERANCE
): number | null {
  for (let index = 0; index < tierAmounts.length; index++) {
    if (Math.abs(tierAmounts[index] - amountUsd) < tolerance) {
      return index;
    }
  }
  return null;
}

export function matchDonationTier(
  tiers: readonly DonationTier[],
  amountUsd: number,
  tolerance: number = DEFAULT_TIER_TOLERANCE
): TierMatch {
  const amounts = tiers.map((tier) => tier.amount_usd);
  const index = findTierIndex(amounts, amountUsd, tolerance);
  if (index === null) {
    throw new NoMatchingTierError(amountUsd, amounts);
  }
  return { tier: tiers[index], index };
}

export function validateTierOrdering(tiers: readonly DonationTier[]): void {
  if (tiers.length < MIN_TIERS || tiers.length > MAX_TIERS) {
    throw new ValidationError(
      `A streamer must define between ${MIN_TIERS} and ${MAX_TIERS} donation tiers (got ${tiers.length})`,
      'INVALID_TIERS'
    );
  }

  for (let index = 1; index < tiers.length; index++) {
    const previous = tiers[index - 1].amount_usd;
    const current = tiers[index].amount_usd;

    if (current === previous) {
      throw new ValidationError(
        `Donation tier amounts must be unique: $${current.toFixed(2)} appears more than once`,
        'INVALID_TIERS'
      );
    }
    if (current < previous) {
      throw new ValidationError(
        `Donation tiers must be sorted by ascending amount: $${current.toFixed(2)} follows $${previous.toFixed(2)}`,
        'INVALID_TIERS'
      );
    }
  }
}
