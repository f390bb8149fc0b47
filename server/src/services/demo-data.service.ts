/**
 * Demo Data
 *
 * Sample streamer profiles for local development, written on start-up when
 * SEED_DEMO_DATA=true.
 */

import { z } from 'zod';
import demoStreamers from '../data/demo-streamers.json';
import { streamerRecordSchema } from '../db/codec.js';
import { logger } from '../config/logger.js';
import type { StreamerRepository } from '../repositories/streamer.repository.js';
import type { Streamer } from '../types/models.js';

export function loadDemoStreamers(): Streamer[] {
  return z.array(streamerRecordSchema).parse(demoStreamers);
}

/**
 * Save every demo streamer whose id is not stored yet
 * @returns number of streamers written
 */
export async function seedDemoStreamers(
  repository: StreamerRepository,
  streamers: Streamer[] = loadDemoStreamers()
): Promise<number> {
  let written = 0;

  for (const streamer of streamers) {
    if (await repository.exists(streamer.id)) {
      continue;
    }
    await repository.save(streamer);
    written++;
  }

  logger.info(`[DemoData] Seeded ${written} demo streamer(s)`, { total: streamers.length });
  return written;
}
