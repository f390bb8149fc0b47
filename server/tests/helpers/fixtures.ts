import type { DonationMessage, Streamer, StreamerInput } from '../../src/types/models';

export const STREAMER_WALLET = '0xAbCdEf0123456789aBcDeF0123456789AbCdEf01';
export const DONOR_WALLET = '0x9999999999999999999999999999999999999999';
export const TX_HASH = `0x${'ab'.repeat(32)}`;

export function makeStreamerInput(overrides: Partial<StreamerInput> = {}): StreamerInput {
  return {
    name: 'TestStreamer',
    wallet_address: STREAMER_WALLET,
    platforms: ['twitch'],
    avatar_url: null,
    donation_tiers: [
      { amount_usd: 1, popup_message: 'Thanks!', duration_ms: 3000 },
      { amount_usd: 5, popup_message: 'Awesome!', duration_ms: 5000 },
      { amount_usd: 10, popup_message: 'Amazing!', duration_ms: 8000 },
    ],
    thank_you_message: 'Thank you for your support!',
    ...overrides,
  };
}

export function makeStreamer(overrides: Partial<Streamer> = {}): Streamer {
  return {
    id: 'streamer-1',
    ...makeStreamerInput(),
    ...overrides,
  };
}

export function makeDonation(overrides: Partial<DonationMessage> = {}): DonationMessage {
  return {
    donation_id: 'donation-1',
    streamer_id: 'streamer-1',
    amount_usd: 5,
    donor_address: DONOR_WALLET,
    tx_hash: TX_HASH,
    timestamp: 1_700_000_000,
    message: null,
    clip_url: null,
    ...overrides,
  };
}

/**
 * Returns "<prefix>-1", "<prefix>-2", ... on successive calls
 */
export function sequentialIds(prefix: string): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}
