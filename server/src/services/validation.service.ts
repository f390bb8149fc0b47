/**
 * Validation Service
 *
 * Input checks shared by the donation pipeline: wallet address shape,
 * donor message cleanup and donation amount limits.
 */

import { load } from 'cheerio';
import { logger } from '../config/logger.js';
import { DEFAULT_TIER_TOLERANCE, findTierIndex } from './tier-matching.js';

const WALLET_ADDRESS_PATTERN = /^0x[a-fA-F0-9]{40}$/;
// Anything shaped like a tag, including ones produced by decoding entities
const TAG_PATTERN = /<[^>]*>/g;
// Brackets left over from unterminated tags
const ANGLE_BRACKETS = /[<>]/g;

export interface ValidationConfig {
  minDonationUsd: number;
  maxDonationUsd: number;
  maxMessageLength: number;
  tierTolerance: number;
}

export const DEFAULT_VALIDATION_CONFIG: ValidationConfig = {
  minDonationUsd: 0.01,
  maxDonationUsd: 1000,
  maxMessageLength: 200,
  tierTolerance: DEFAULT_TIER_TOLERANCE,
};

export type AmountCheck =
  | { valid: true; error: null }
  | { valid: false; error: string };

export interface TierMatchCheck {
  matched: boolean;
  index: number | null;
}

export class ValidationService {
  readonly config: ValidationConfig;

  constructor(config: Partial<ValidationConfig> = {}) {
    this.config = { ...DEFAULT_VALIDATION_CONFIG, ...config };
  }

  /**
   * Check that a value is a 0x-prefixed, 40 hex digit address.
   * Never throws; anything that is not a string is simply invalid.
   */
  validateWalletAddress(address: unknown): boolean {
    if (typeof address !== 'string') {
      logger.debug('[ValidationService] Wallet address is not a string', { type: typeof address });
      return false;
    }
    return WALLET_ADDRESS_PATTERN.test(address);
  }

  /**
   * Reduce a donor message to plain text.
   *
   * The message is parsed as an HTML fragment and only its text content is
   * kept, with no `<` or `>` left in it. Truncation counts code points, so a
   * surrogate pair is never split. Returns null when nothing but whitespace
   * remains.
   */
  sanitizeMessage(message: string | null | undefined, maxLength: number = this.config.maxMessageLength): string | null {
    if (message === null || message === undefined || message.trim() === '') {
      return null;
    }

    const text = load(message, null, false).root().text();
    const plain = text.replace(TAG_PATTERN, '').replace(ANGLE_BRACKETS, '');
    const clean = Array.from(plain).slice(0, maxLength).join('').trim();

    return clean === '' ? null : clean;
  }

  validateAmountRange(amountUsd: number): AmountCheck {
    const { minDonationUsd, maxDonationUsd } = this.config;

    if (!Number.isFinite(amountUsd)) {
      return { valid: false, error: 'Donation amount must be a finite number' };
    }
    if (amountUsd < minDonationUsd) {
      return { valid: false, error: `Donation amount must be at least $${minDonationUsd.toFixed(2)}` };
    }
    if (amountUsd > maxDonationUsd) {
      return { valid: false, error: `Donation amount cannot exceed $${maxDonationUsd.toFixed(2)}` };
    }
    return { valid: true, error: null };
  }

  validateTierMatch(
    amountUsd: number,
    tierAmounts: readonly number[],
    tolerance: number = this.config.tierTolerance
  ): TierMatchCheck {
    const index = findTierIndex(tierAmounts, amountUsd, tolerance);
    return { matched: index !== null, index };
  }
}
