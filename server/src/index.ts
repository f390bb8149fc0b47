import type { Server } from 'http';
import { env } from './config/env.js';
import { logger } from './config/logger.js';
import { createApp } from './app.js';
import { LevelStore } from './db/client.js';
import { KeyValueDonationRepository } from './repositories/donation.repository.js';
import { KeyValueStreamerRepository } from './repositories/streamer.repository.js';
import { seedDemoStreamers } from './services/demo-data.service.js';
import { DonationService } from './services/donation.service.js';
import { StreamerService } from './services/streamer.service.js';
import { ValidationService } from './services/validation.service.js';

/**
 * Web server entry point
 */

async function startServer() {
  logger.info('Starting streamer donations server');
  logger.info(`Environment: ${env.NODE_ENV}`);
  logger.info(`Network: ${env.NETWORK}`);

  const store = await LevelStore.open(env.DATABASE_PATH);

  let server: Server;
  try {
    const streamerRepository = new KeyValueStreamerRepository(store);
    const donationRepository = new KeyValueDonationRepository(store);

    const validationService = new ValidationService({
      minDonationUsd: env.MIN_DONATION_USD,
      maxDonationUsd: env.MAX_DONATION_USD,
      maxMessageLength: env.MAX_MESSAGE_LENGTH,
      tierTolerance: env.TIER_MATCH_TOLERANCE,
    });
    const streamerService = new StreamerService(streamerRepository, {
      tierTolerance: env.TIER_MATCH_TOLERANCE,
    });
    const donationService = new DonationService(donationRepository, streamerService, validationService);

    if (env.SEED_DEMO_DATA) {
      await seedDemoStreamers(streamerRepository);
    }

    const app = createApp({
      store,
      streamerService,
      donationService,
      allowedOrigins: env.ALLOWED_ORIGINS,
      network: env.NETWORK,
    });

    server = app.listen(env.PORT, () => {
      logger.info(`Server listening on port ${env.PORT}`);
      logger.info(`Health check: http://localhost:${env.PORT}/health`);
    });
  } catch (error) {
    await store.close();
    throw error;
  }

  // Graceful shutdown
  const shutdown = () => {
    logger.info('Shutting down gracefully...');

    server.close(() => {
      logger.info('HTTP server closed');
      store
        .close()
        .then(() => process.exit(0))
        .catch((error) => {
          logger.error('Failed to close database', { error });
          process.exit(1);
        });
    });

    // Force shutdown after 10 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

startServer().catch((error) => {
  logger.error('Failed to start server', { error });
  process.exit(1);
});
