/**
 * Streamer Service
 *
 * Registration, lookup and donation-tier policy for streamer profiles.
 */

import { randomUUID } from 'crypto';
import { logger } from '../config/logger.js';
import type { StreamerRepository } from '../repositories/streamer.repository.js';
import type { DonationTier, Platform, Streamer, StreamerInput } from '../types/models.js';
import { ConflictError, NotFoundError } from '../utils/errors.js';
import { DEFAULT_TIER_TOLERANCE, matchDonationTier, validateTierOrdering, type TierMatch } from './tier-matching.js';

export const MAX_LIST_LIMIT = 1000;

export type StreamerActivity =
  | { active: true }
  | { active: false; reason: string };

export interface StreamerServiceOptions {
  generateId?: () => string;
  tierTolerance?: number;
}

function dedupePlatforms(platforms: readonly Platform[]): Platform[] {
  return [...new Set(platforms)];
}

export class StreamerService {
  private readonly generateId: () => string;
  private readonly tierTolerance: number;

  constructor(
    private readonly repository: StreamerRepository,
    options: StreamerServiceOptions = {}
  ) {
    this.generateId = options.generateId ?? randomUUID;
    this.tierTolerance = options.tierTolerance ?? DEFAULT_TIER_TOLERANCE;
  }

  /**
   * Register a new streamer. The wallet address must not belong to another
   * streamer (case-insensitive) and tiers must be strictly ascending.
   */
  async createStreamer(input: StreamerInput): Promise<Streamer> {
    validateTierOrdering(input.donation_tiers);

    const existing = await this.repository.getByWallet(input.wallet_address);
    if (existing) {
      logger.warn(`[StreamerService] Duplicate wallet registration attempted: ${input.wallet_address}`);
      throw new ConflictError(
        `Wallet address ${input.wallet_address} is already registered`,
        'DUPLICATE_WALLET'
      );
    }

    const streamer = this.buildStreamer(this.generateId(), input);
    await this.repository.save(streamer);

    logger.info(`[StreamerService] Streamer created: ${streamer.name} (${streamer.id})`);
    return streamer;
  }

  /**
   * Replace a streamer profile in place. The id never changes; the wallet may
   * change as long as no other streamer owns the new one.
   */
  async updateStreamer(streamerId: string, input: StreamerInput): Promise<Streamer> {
    validateTierOrdering(input.donation_tiers);

    const current = await this.repository.getById(streamerId);
    if (!current) {
      throw new NotFoundError(`Streamer not found: ${streamerId}`, 'STREAMER_NOT_FOUND');
    }

    const owner = await this.repository.getByWallet(input.wallet_address);
    if (owner && owner.id !== streamerId) {
      throw new ConflictError(
        `Wallet address ${input.wallet_address} is already registered`,
        'DUPLICATE_WALLET'
      );
    }

    const streamer = this.buildStreamer(streamerId, input);
    await this.repository.save(streamer);

    logger.info(`[StreamerService] Streamer updated: ${streamer.name} (${streamer.id})`);
    return streamer;
  }

  async deleteStreamer(streamerId: string): Promise<void> {
    const deleted = await this.repository.delete(streamerId);
    if (!deleted) {
      throw new NotFoundError(`Streamer not found: ${streamerId}`, 'STREAMER_NOT_FOUND');
    }
  }

  async getStreamerById(streamerId: string): Promise<Streamer | null> {
    return this.repository.getById(streamerId);
  }

  async getStreamerByWallet(walletAddress: string): Promise<Streamer | null> {
    return this.repository.getByWallet(walletAddress);
  }

  /**
   * List streamers in key order; the limit is capped at MAX_LIST_LIMIT
   */
  async listStreamers(limit: number = 100): Promise<Streamer[]> {
    return this.repository.listAll(Math.min(limit, MAX_LIST_LIMIT));
  }

  findMatchingTier(streamer: Streamer, amountUsd: number, tolerance: number = this.tierTolerance): TierMatch {
    try {
      const match = matchDonationTier(streamer.donation_tiers, amountUsd, tolerance);
      logger.debug(
        `[StreamerService] Matched tier: $${match.tier.amount_usd} for donation $${amountUsd} (streamer: ${streamer.name})`
      );
      return match;
    } catch (error) {
      logger.warn(`[StreamerService] No matching tier for amount $${amountUsd}`, {
        streamer: streamer.name,
        availableTiers: this.getAvailableTierAmounts(streamer),
      });
      throw error;
    }
  }

  /**
   * Whether the streamer currently accepts donations. Every streamer is
   * active until suspension is modelled.
   */
  validateStreamerActive(_streamer: Streamer): StreamerActivity {
    return { active: true };
  }

  getAvailableTierAmounts(streamer: Streamer): number[] {
    return streamer.donation_tiers.map((tier) => tier.amount_usd);
  }

  private buildStreamer(id: string, input: StreamerInput): Streamer {
    return {
      id,
      name: input.name,
      wallet_address: input.wallet_address,
      platforms: dedupePlatforms(input.platforms),
      avatar_url: input.avatar_url,
      donation_tiers: input.donation_tiers.map(
        (tier): DonationTier => ({
          amount_usd: tier.amount_usd,
          popup_message: tier.popup_message.trim(),
          duration_ms: tier.duration_ms,
        })
      ),
      thank_you_message: input.thank_you_message,
    };
  }
}
