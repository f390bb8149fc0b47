// Domain model types

export const PLATFORMS = ['youtube', 'twitch'] as const;
export type Platform = (typeof PLATFORMS)[number];

export const DEFAULT_THANK_YOU_MESSAGE = 'Thank you for your support!';
export const DEFAULT_TIER_DURATION_MS = 3000;

export interface DonationTier {
  amount_usd: number;
  popup_message: string;
  duration_ms: number;
}

export interface Streamer {
  id: string;
  name: string;
  wallet_address: string;
  platforms: Platform[];
  avatar_url: string | null;
  donation_tiers: DonationTier[];
  thank_you_message: string;
}

/**
 * Fields a caller supplies when registering or replacing a streamer profile
 */
export type StreamerInput = Omit<Streamer, 'id'>;

export interface DonationMessage {
  donation_id: string;
  streamer_id: string;
  amount_usd: number;
  donor_address: string;
  tx_hash: string;
  timestamp: number; // unix seconds, server clock
  message: string | null;
  clip_url: string | null;
}

/**
 * Donation as submitted by a donor after payment
 */
export interface DonationSubmission {
  amount_usd: number;
  donor_address: string;
  tx_hash: string;
  message?: string | null;
  clip_url?: string | null;
}

/**
 * Popup configuration returned to the overlay once a donation is recorded
 */
export interface DonationReceipt {
  donation_id: string;
  popup_message: string;
  duration_ms: number;
}

export interface DonationStats {
  total_amount_usd: number;
  donation_count: number;
  unique_donors: number;
}
