/**
 * Entity Codec
 *
 * Streamers and donations are stored as UTF-8 JSON with named fields. Fields
 * are written in a fixed order so equal entities always encode to equal bytes.
 * Decoding re-validates the record; anything that does not fit the shape is
 * reported as a CorruptedRecordError instead of being defaulted.
 */

import { z } from 'zod';
import {
  DEFAULT_THANK_YOU_MESSAGE,
  DEFAULT_TIER_DURATION_MS,
  PLATFORMS,
  type DonationMessage,
  type Streamer,
} from '../types/models.js';
import { CorruptedRecordError } from '../utils/errors.js';

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? null);

export const donationTierRecordSchema = z.object({
  amount_usd: z.number(),
  popup_message: z.string(),
  duration_ms: z.number().int().default(DEFAULT_TIER_DURATION_MS),
});

export const streamerRecordSchema = z.object({
  id: z.string(),
  name: z.string(),
  wallet_address: z.string(),
  platforms: z.array(z.enum(PLATFORMS)),
  avatar_url: optionalText,
  donation_tiers: z.array(donationTierRecordSchema),
  thank_you_message: z.string().default(DEFAULT_THANK_YOU_MESSAGE),
});

export const donationRecordSchema = z.object({
  donation_id: z.string(),
  streamer_id: z.string(),
  amount_usd: z.number(),
  donor_address: z.string(),
  tx_hash: z.string(),
  timestamp: z.number().int(),
  message: optionalText,
  clip_url: optionalText,
});

function toBytes(record: object): Uint8Array {
  return Buffer.from(JSON.stringify(record), 'utf8');
}

function parseRecord<T extends z.ZodTypeAny>(schema: T, bytes: Uint8Array, key: string): z.output<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(bytes).toString('utf8'));
  } catch (error) {
    throw new CorruptedRecordError(key, 'value is not valid JSON', { cause: error });
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.errors
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new CorruptedRecordError(key, issues, { cause: result.error });
  }
  return result.data;
}

export function encodeStreamer(streamer: Streamer): Uint8Array {
  return toBytes({
    id: streamer.id,
    name: streamer.name,
    wallet_address: streamer.wallet_address,
    platforms: [...streamer.platforms],
    avatar_url: streamer.avatar_url,
    donation_tiers: streamer.donation_tiers.map((tier) => ({
      amount_usd: tier.amount_usd,
      popup_message: tier.popup_message,
      duration_ms: tier.duration_ms,
    })),
    thank_you_message: streamer.thank_you_message,
  });
}

export function decodeStreamer(bytes: Uint8Array, key: string): Streamer {
  return parseRecord(streamerRecordSchema, bytes, key);
}

export function encodeDonation(donation: DonationMessage): Uint8Array {
  return toBytes({
    donation_id: donation.donation_id,
    streamer_id: donation.streamer_id,
    amount_usd: donation.amount_usd,
    donor_address: donation.donor_address,
    tx_hash: donation.tx_hash,
    timestamp: donation.timestamp,
    message: donation.message,
    clip_url: donation.clip_url,
  });
}

export function decodeDonation(bytes: Uint8Array, key: string): DonationMessage {
  return parseRecord(donationRecordSchema, bytes, key);
}
