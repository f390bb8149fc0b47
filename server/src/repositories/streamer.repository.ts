/**
 * Streamer Repository
 *
 * Wallet lookups and listings walk the whole `streamers:` key range. Callers
 * only see the StreamerRepository interface, so an indexed implementation can
 * replace the scan without touching them.
 */

import type { KeyValueStore } from '../db/client.js';
import { decodeStreamer, encodeStreamer } from '../db/codec.js';
import { logger } from '../config/logger.js';
import type { Streamer } from '../types/models.js';
import { CorruptedRecordError } from '../utils/errors.js';

export interface StreamerRepository {
  save(streamer: Streamer): Promise<void>;
  getById(streamerId: string): Promise<Streamer | null>;
  getByWallet(walletAddress: string): Promise<Streamer | null>;
  listAll(limit: number): Promise<Streamer[]>;
  delete(streamerId: string): Promise<boolean>;
  exists(streamerId: string): Promise<boolean>;
}

export class KeyValueStreamerRepository implements StreamerRepository {
  static readonly PREFIX = 'streamers:';

  constructor(private readonly store: KeyValueStore) {}

  static keyFor(streamerId: string): string {
    return `${KeyValueStreamerRepository.PREFIX}${streamerId}`;
  }

  async save(streamer: Streamer): Promise<void> {
    await this.store.put(KeyValueStreamerRepository.keyFor(streamer.id), encodeStreamer(streamer));
    logger.debug(`[StreamerRepository] Saved streamer: ${streamer.name} (${streamer.id})`);
  }

  async getById(streamerId: string): Promise<Streamer | null> {
    const key = KeyValueStreamerRepository.keyFor(streamerId);
    const value = await this.store.get(key);
    if (value === null) {
      return null;
    }

    try {
      return decodeStreamer(value, key);
    } catch (error) {
      logger.error(`[StreamerRepository] Corrupted data for streamer ${streamerId}`, { error });
      throw error;
    }
  }

  async getByWallet(walletAddress: string): Promise<Streamer | null> {
    const wanted = walletAddress.toLowerCase();

    for await (const streamer of this.decodeAll()) {
      if (streamer.wallet_address.toLowerCase() === wanted) {
        return streamer;
      }
    }
    return null;
  }

  async listAll(limit: number): Promise<Streamer[]> {
    const streamers: Streamer[] = [];
    if (limit <= 0) {
      return streamers;
    }

    for await (const streamer of this.decodeAll()) {
      streamers.push(streamer);
      if (streamers.length >= limit) {
        break;
      }
    }
    return streamers;
  }

  async delete(streamerId: string): Promise<boolean> {
    const deleted = await this.store.delete(KeyValueStreamerRepository.keyFor(streamerId));
    if (deleted) {
      logger.info(`[StreamerRepository] Deleted streamer: ${streamerId}`);
    }
    return deleted;
  }

  async exists(streamerId: string): Promise<boolean> {
    return (await this.getById(streamerId)) !== null;
  }

  /**
   * Decode every stored streamer in key order, skipping unreadable records
   */
  private async *decodeAll(): AsyncGenerator<Streamer> {
    for await (const { key, value } of this.store.scan(KeyValueStreamerRepository.PREFIX)) {
      try {
        yield decodeStreamer(value, key);
      } catch (error) {
        if (!(error instanceof CorruptedRecordError)) {
          throw error;
        }
        logger.warn('[StreamerRepository] Skipping corrupted streamer data', { key, reason: error.message });
      }
    }
  }
}
