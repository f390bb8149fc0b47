/**
 * Donation Repository
 *
 * Donations are keyed by their own id, not by streamer, so per-streamer reads
 * scan the full `donations:` range. Key order says nothing about timestamps:
 * every matching record is collected and sorted before the limit applies.
 */

import type { KeyValueStore } from '../db/client.js';
import { decodeDonation, encodeDonation } from '../db/codec.js';
import { logger } from '../config/logger.js';
import type { DonationMessage, DonationStats } from '../types/models.js';
import { CorruptedRecordError } from '../utils/errors.js';

/**
 * Upper bound on the donations aggregated by getStats
 */
export const STATS_SCAN_CEILING = 10_000;

export interface DonationRepository {
  save(donation: DonationMessage): Promise<void>;
  getById(donationId: string): Promise<DonationMessage | null>;
  /**
   * Donations for one streamer, most recent first
   */
  listByStreamer(streamerId: string, limit: number): Promise<DonationMessage[]>;
  getStats(streamerId: string): Promise<DonationStats>;
  exists(donationId: string): Promise<boolean>;
}

export class KeyValueDonationRepository implements DonationRepository {
  static readonly PREFIX = 'donations:';

  constructor(private readonly store: KeyValueStore) {}

  static keyFor(donationId: string): string {
    return `${KeyValueDonationRepository.PREFIX}${donationId}`;
  }

  async save(donation: DonationMessage): Promise<void> {
    await this.store.put(KeyValueDonationRepository.keyFor(donation.donation_id), encodeDonation(donation));
    logger.debug(
      `[DonationRepository] Saved donation: ${donation.donation_id} ($${donation.amount_usd} to ${donation.streamer_id})`
    );
  }

  async getById(donationId: string): Promise<DonationMessage | null> {
    const key = KeyValueDonationRepository.keyFor(donationId);
    const value = await this.store.get(key);
    if (value === null) {
      return null;
    }

    try {
      return decodeDonation(value, key);
    } catch (error) {
      logger.error(`[DonationRepository] Corrupted data for donation ${donationId}`, { error });
      throw error;
    }
  }

  async listByStreamer(streamerId: string, limit: number): Promise<DonationMessage[]> {
    const donations: DonationMessage[] = [];

    for await (const { key, value } of this.store.scan(KeyValueDonationRepository.PREFIX)) {
      let donation: DonationMessage;
      try {
        donation = decodeDonation(value, key);
      } catch (error) {
        if (!(error instanceof CorruptedRecordError)) {
          throw error;
        }
        logger.warn('[DonationRepository] Skipping corrupted donation data', { key, reason: error.message });
        continue;
      }

      if (donation.streamer_id === streamerId) {
        donations.push(donation);
      }
    }

    // Array.prototype.sort is stable, so equal timestamps keep scan order
    donations.sort((a, b) => b.timestamp - a.timestamp);
    return donations.slice(0, Math.max(0, limit));
  }

  async getStats(streamerId: string): Promise<DonationStats> {
    const donations = await this.listByStreamer(streamerId, STATS_SCAN_CEILING);

    let totalAmountUsd = 0;
    const donors = new Set<string>();
    for (const donation of donations) {
      totalAmountUsd += donation.amount_usd;
      donors.add(donation.donor_address.toLowerCase());
    }

    return {
      total_amount_usd: totalAmountUsd,
      donation_count: donations.length,
      unique_donors: donors.size,
    };
  }

  async exists(donationId: string): Promise<boolean> {
    return (await this.getById(donationId)) !== null;
  }
}
