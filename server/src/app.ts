import express from 'express';
import cors from 'cors';
import type { KeyValueStore } from './db/client.js';
import { errorHandler, notFoundHandler, requestLogger } from './middleware/index.js';
import { createDonationRoutes } from './routes/donations.js';
import { createStreamerRoutes } from './routes/streamers.js';
import { createSystemRoutes } from './routes/system.js';
import type { DonationService } from './services/donation.service.js';
import type { StreamerService } from './services/streamer.service.js';

export interface AppDependencies {
  store: KeyValueStore;
  streamerService: StreamerService;
  donationService: DonationService;
  allowedOrigins: string[];
  network: string;
}

export function createApp(deps: AppDependencies) {
  const app = express();

  // Middleware
  app.use(
    cors({
      origin: deps.allowedOrigins,
      credentials: true,
      methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    })
  );
  app.use(express.json({ limit: '100kb' }));
  app.use(requestLogger);

  // Health check and service info
  app.use(createSystemRoutes(deps.store, deps.network));

  // API routes
  app.use('/api', createStreamerRoutes(deps.streamerService));
  app.use('/api', createDonationRoutes(deps.donationService));

  // 404 handler
  app.use(notFoundHandler);

  // Error handler
  app.use(errorHandler);

  return app;
}
