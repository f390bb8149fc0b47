import { Router, Request, Response, NextFunction } from 'express';
import { logger } from '../config/logger.js';
import { donationIdParamsSchema, donationSubmissionSchema } from '../schemas/donation.schema.js';
import { listQuerySchema, streamerIdParamsSchema } from '../schemas/streamer.schema.js';
import type { DonationService } from '../services/donation.service.js';
import { NotFoundError } from '../utils/errors.js';

export function createDonationRoutes(donationService: DonationService): Router {
  const router = Router();

  /**
   * POST /api/donate/:streamerId/message
   * Record a paid donation and return the popup configuration
   */
  router.post('/donate/:streamerId/message', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { streamerId } = streamerIdParamsSchema.parse(req.params);
      const submission = donationSubmissionSchema.parse(req.body);
      const receipt = await donationService.processDonation(streamerId, submission);
      res.status(201).json(receipt);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/donations/streamer/:streamerId
   * Donations for a streamer, most recent first
   */
  router.get('/donations/streamer/:streamerId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { streamerId } = streamerIdParamsSchema.parse(req.params);
      const { limit } = listQuerySchema.parse(req.query);
      const donations = await donationService.listDonationsForStreamer(streamerId, limit);

      logger.debug(`Retrieved ${donations.length} donations for streamer ${streamerId}`);
      res.json(donations);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/donations/streamer/:streamerId/stats
   * Totals for a streamer; zeros when it has no donations
   */
  router.get('/donations/streamer/:streamerId/stats', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { streamerId } = streamerIdParamsSchema.parse(req.params);
      const stats = await donationService.getDonationStats(streamerId);
      res.json(stats);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/donations/:donationId
   * Get a single donation
   */
  router.get('/donations/:donationId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { donationId } = donationIdParamsSchema.parse(req.params);
      const donation = await donationService.getDonationById(donationId);

      if (!donation) {
        throw new NotFoundError(`Donation not found: ${donationId}`, 'DONATION_NOT_FOUND');
      }

      res.json(donation);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
