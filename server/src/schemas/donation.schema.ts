import { z } from 'zod';

/**
 * Body of POST /api/donate/:streamerId/message.
 * Address shape and amount limits are checked by the donation pipeline so the
 * caller gets the domain error; long messages are truncated there, not rejected.
 */
export const donationSubmissionSchema = z.object({
  amount_usd: z.number().positive(),
  donor_address: z.string().min(1),
  tx_hash: z
    .string()
    .regex(/^0x[a-fA-F0-9]{64}$/, 'Transaction hash must be 0x followed by 64 hex characters'),
  message: z.string().nullish(),
  clip_url: z.string().url().nullish(),
});

export const donationIdParamsSchema = z.object({
  donationId: z.string().min(1),
});

export type DonationSubmissionBody = z.infer<typeof donationSubmissionSchema>;
