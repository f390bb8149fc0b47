import { z } from 'zod';
import {
  DEFAULT_THANK_YOU_MESSAGE,
  DEFAULT_TIER_DURATION_MS,
  PLATFORMS,
} from '../types/models.js';
import { MAX_TIERS, MIN_TIERS } from '../services/tier-matching.js';

export const walletAddressSchema = z
  .string()
  .regex(/^0x[a-fA-F0-9]{40}$/, 'Wallet address must be 0x followed by 40 hex characters');

export const donationTierSchema = z.object({
  amount_usd: z.number().positive().max(1000),
  popup_message: z
    .string()
    .min(1)
    .max(100)
    .transform((message) => message.trim())
    .refine((message) => message.length > 0, 'Popup message cannot be empty'),
  duration_ms: z.number().int().min(1000).max(30000).default(DEFAULT_TIER_DURATION_MS),
});

/**
 * Body of POST /api/streamer and PUT /api/streamer/:streamerId
 */
export const streamerInputSchema = z.object({
  name: z.string().min(1).max(50),
  wallet_address: walletAddressSchema,
  platforms: z.array(z.enum(PLATFORMS)).min(1),
  avatar_url: z
    .string()
    .url()
    .nullish()
    .transform((url) => url ?? null),
  donation_tiers: z.array(donationTierSchema).min(MIN_TIERS).max(MAX_TIERS),
  thank_you_message: z.string().max(500).default(DEFAULT_THANK_YOU_MESSAGE),
});

export const streamerIdParamsSchema = z.object({
  streamerId: z.string().min(1),
});

export const walletParamsSchema = z.object({
  walletAddress: z.string().min(1),
});

export const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).default(100),
});

export type StreamerInputBody = z.infer<typeof streamerInputSchema>;
