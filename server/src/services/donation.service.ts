/**
 * Donation Service
 *
 * Turns a paid donation submission into a stored DonationMessage and the popup
 * configuration of the tier it matched. The steps run in a fixed order and
 * the first failure ends the request; persisting is the only side effect and
 * comes last, so nothing needs undoing.
 */

import { randomUUID } from 'crypto';
import { logger } from '../config/logger.js';
import type { DonationRepository } from '../repositories/donation.repository.js';
import type {
  DonationMessage,
  DonationReceipt,
  DonationStats,
  DonationSubmission,
} from '../types/models.js';
import { DataIntegrityError, NotFoundError, ValidationError } from '../utils/errors.js';
import { MAX_LIST_LIMIT, StreamerService } from './streamer.service.js';
import { ValidationService } from './validation.service.js';

export interface DonationServiceOptions {
  /** Current time in unix seconds */
  clock?: () => number;
  generateId?: () => string;
}

const systemClock = (): number => Math.floor(Date.now() / 1000);

export class DonationService {
  private readonly clock: () => number;
  private readonly generateId: () => string;

  constructor(
    private readonly donations: DonationRepository,
    private readonly streamers: StreamerService,
    private readonly validation: ValidationService,
    options: DonationServiceOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.generateId = options.generateId ?? randomUUID;
  }

  async processDonation(streamerId: string, submission: DonationSubmission): Promise<DonationReceipt> {
    const streamer = await this.streamers.getStreamerById(streamerId);
    if (!streamer) {
      throw new NotFoundError(`Streamer not found: ${streamerId}`, 'STREAMER_NOT_FOUND');
    }

    const activity = this.streamers.validateStreamerActive(streamer);
    if (!activity.active) {
      throw new ValidationError(activity.reason, 'STREAMER_INACTIVE');
    }

    if (!this.validation.validateWalletAddress(submission.donor_address)) {
      throw new ValidationError(`Invalid donor address: ${submission.donor_address}`, 'INVALID_DONOR_ADDRESS');
    }

    if (!this.validation.validateWalletAddress(streamer.wallet_address)) {
      logger.error(`[DonationService] Streamer has invalid wallet: ${streamer.wallet_address}`, {
        streamerId,
      });
      throw new DataIntegrityError('Streamer wallet address is invalid', 'INVALID_STREAMER_WALLET');
    }

    const range = this.validation.validateAmountRange(submission.amount_usd);
    if (!range.valid) {
      throw new ValidationError(range.error, 'AMOUNT_OUT_OF_RANGE');
    }

    const { tier } = this.streamers.findMatchingTier(streamer, submission.amount_usd);

    const message = this.validation.sanitizeMessage(submission.message);

    const donation: DonationMessage = {
      donation_id: this.generateId(),
      streamer_id: streamerId,
      amount_usd: submission.amount_usd,
      donor_address: submission.donor_address,
      tx_hash: submission.tx_hash,
      timestamp: this.clock(),
      message,
      clip_url: submission.clip_url ?? null,
    };

    await this.donations.save(donation);

    logger.info(
      `[DonationService] Donation processed: $${donation.amount_usd} from ` +
        `${donation.donor_address.slice(0, 10)}... to ${streamer.name} (tx: ${donation.tx_hash.slice(0, 10)}...)`
    );

    return {
      donation_id: donation.donation_id,
      popup_message: tier.popup_message,
      duration_ms: tier.duration_ms,
    };
  }

  async getDonationById(donationId: string): Promise<DonationMessage | null> {
    return this.donations.getById(donationId);
  }

  /**
   * Most recent donations first; the limit is capped at MAX_LIST_LIMIT
   */
  async listDonationsForStreamer(streamerId: string, limit: number = 100): Promise<DonationMessage[]> {
    return this.donations.listByStreamer(streamerId, Math.min(limit, MAX_LIST_LIMIT));
  }

  async getDonationStats(streamerId: string): Promise<DonationStats> {
    return this.donations.getStats(streamerId);
  }
}
