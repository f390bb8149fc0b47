import {
  findTierIndex,
  matchDonationTier,
  validateTierOrdering,
} from '../../src/services/tier-matching';
import type { DonationTier } from '../../src/types/models';
import { NoMatchingTierError, ValidationError } from '../../src/utils/errors';

function tiers(...amounts: number[]): DonationTier[] {
  return amounts.map((amount_usd) => ({ amount_usd, popup_message: `$${amount_usd}`, duration_ms: 3000 }));
}

describe('tier matching', () => {
  describe('findTierIndex', () => {
    it('should match an exact amount', () => {
      expect(findTierIndex([1, 5, 10], 5)).toBe(1);
    });

    it('should match within the tolerance', () => {
      expect(findTierIndex([1, 5, 10], 5.005)).toBe(1);
    });

    it('should match just inside the default tolerance', () => {
      expect(findTierIndex([1, 5, 10], 5.009)).toBe(1);
    });

    it('should match a wider miss only under a wider tolerance', () => {
      expect(findTierIndex([1, 5, 10], 5.05)).toBeNull();
      expect(findTierIndex([1, 5, 10], 5.05, 0.1)).toBe(1);
    });

    it('should not match outside the tolerance', () => {
      expect(findTierIndex([1, 5, 10], 5.02)).toBeNull();
      expect(findTierIndex([1, 5, 10], 7.5)).toBeNull();
    });

    it('should return the first tier when several are within tolerance', () => {
      expect(findTierIndex([1, 1.005], 1.003)).toBe(0);
    });

    it('should honour a custom tolerance', () => {
      expect(findTierIndex([1, 5, 10], 5.4, 0.5)).toBe(1);
    });

    it('should return null for no tiers', () => {
      expect(findTierIndex([], 5)).toBeNull();
    });
  });

  describe('matchDonationTier', () => {
    it('should return the matched tier and its index', () => {
      const match = matchDonationTier(tiers(1, 5, 10), 10);

      expect(match.index).toBe(2);
      expect(match.tier.popup_message).toBe('$10');
    });

    it('should list the available amounts when nothing matches', () => {
      let caught: unknown;
      try {
        matchDonationTier(tiers(1, 5, 10), 7.5);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(NoMatchingTierError);
      expect(caught).toMatchObject({
        message: 'Invalid donation amount: $7.5. Must match one of: $1.00, $5.00, $10.00',
        code: 'NO_MATCHING_TIER',
        statusCode: 400,
        availableAmounts: [1, 5, 10],
      });
    });
  });

  describe('validateTierOrdering', () => {
    it('should accept strictly ascending tiers', () => {
      expect(() => validateTierOrdering(tiers(1, 5, 10))).not.toThrow();
    });

    it('should reject an empty tier list', () => {
      expect(() => validateTierOrdering([])).toThrow(
        'A streamer must define between 1 and 10 donation tiers (got 0)'
      );
    });

    it('should reject more than ten tiers', () => {
      expect(() => validateTierOrdering(tiers(1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11))).toThrow(ValidationError);
    });

    it('should reject duplicate amounts', () => {
      expect(() => validateTierOrdering(tiers(1, 5, 5))).toThrow(
        'Donation tier amounts must be unique: $5.00 appears more than once'
      );
    });

    it('should reject descending amounts', () => {
      expect(() => validateTierOrdering(tiers(10, 5))).toThrow(
        'Donation tiers must be sorted by ascending amount: $5.00 follows $10.00'
      );
    });
  });
});
