import { Router, Request, Response, NextFunction } from 'express';
import { logger } from '../config/logger.js';
import {
  listQuerySchema,
  streamerIdParamsSchema,
  streamerInputSchema,
  walletParamsSchema,
} from '../schemas/streamer.schema.js';
import type { StreamerService } from '../services/streamer.service.js';
import { NotFoundError } from '../utils/errors.js';

export function createStreamerRoutes(streamerService: StreamerService): Router {
  const router = Router();

  /**
   * POST /api/streamer
   * Register a new streamer profile
   */
  router.post('/streamer', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = streamerInputSchema.parse(req.body);
      const streamer = await streamerService.createStreamer(input);
      res.status(201).json(streamer);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/streamers
   * List registered streamers (limit defaults to 100, capped at 1000)
   */
  router.get('/streamers', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { limit } = listQuerySchema.parse(req.query);
      const streamers = await streamerService.listStreamers(limit);

      logger.debug(`Retrieved ${streamers.length} streamers`);
      res.json(streamers);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/streamer/by-wallet/:walletAddress
   * Find a streamer by wallet address (case-insensitive)
   */
  router.get('/streamer/by-wallet/:walletAddress', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { walletAddress } = walletParamsSchema.parse(req.params);
      const streamer = await streamerService.getStreamerByWallet(walletAddress);

      if (!streamer) {
        throw new NotFoundError(`No streamer found with wallet: ${walletAddress}`, 'STREAMER_NOT_FOUND');
      }

      res.json(streamer);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/streamer/:streamerId
   * Get a streamer profile with its donation tiers
   */
  router.get('/streamer/:streamerId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { streamerId } = streamerIdParamsSchema.parse(req.params);
      const streamer = await streamerService.getStreamerById(streamerId);

      if (!streamer) {
        throw new NotFoundError(`Streamer not found: ${streamerId}`, 'STREAMER_NOT_FOUND');
      }

      res.json(streamer);
    } catch (error) {
      next(error);
    }
  });

  /**
   * PUT /api/streamer/:streamerId
   * Replace a streamer profile
   */
  router.put('/streamer/:streamerId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { streamerId } = streamerIdParamsSchema.parse(req.params);
      const input = streamerInputSchema.parse(req.body);
      const streamer = await streamerService.updateStreamer(streamerId, input);
      res.json(streamer);
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /api/streamer/:streamerId
   * Remove a streamer profile (donations are kept)
   */
  router.delete('/streamer/:streamerId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { streamerId } = streamerIdParamsSchema.parse(req.params);
      await streamerService.deleteStreamer(streamerId);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
