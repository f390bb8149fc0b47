/**
 * Key-Value Store Client
 *
 * Thin adapter over an ordered, byte-valued level database. Keys are
 * "<entity-kind>:<id>" strings so every entity kind occupies one contiguous
 * range of the lexicographic key order, which is what prefix scans rely on.
 */

import type { AbstractLevel } from 'abstract-level';
import { ClassicLevel } from 'classic-level';
import { logger } from '../config/logger.js';
import { StorageError } from '../utils/errors.js';

export type LevelDatabase = AbstractLevel<string | Buffer | Uint8Array, string, Uint8Array>;

export interface KeyValueEntry {
  key: string;
  value: Uint8Array;
}

export interface KeyValueStore {
  get(key: string): Promise<Uint8Array | null>;
  put(key: string, value: Uint8Array): Promise<void>;
  /**
   * @returns whether the key existed before the call
   */
  delete(key: string): Promise<boolean>;
  /**
   * Yields entries whose key starts with `prefix`, in lexicographic key order
   */
  scan(prefix: string): AsyncGenerator<KeyValueEntry>;
  isOpen(): boolean;
  close(): Promise<void>;
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'LEVEL_NOT_FOUND'
  );
}

export class LevelStore implements KeyValueStore {
  private readonly db: LevelDatabase;

  constructor(db: LevelDatabase) {
    this.db = db;
  }

  /**
   * Open (creating if missing) an on-disk store at `location`
   */
  static async open(location: string): Promise<LevelStore> {
    const db = new ClassicLevel<string, Uint8Array>(location, {
      keyEncoding: 'utf8',
      valueEncoding: 'view',
    });
    const store = new LevelStore(db);
    await store.open();
    logger.info('[LevelStore] Opened database', { location });
    return store;
  }

  async open(): Promise<void> {
    try {
      await this.db.open();
    } catch (error) {
      throw new StorageError('open', error);
    }
  }

  async get(key: string): Promise<Uint8Array | null> {
    try {
      const value = await this.db.get(key);
      return value ?? null;
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      logger.error('[LevelStore] Read failed', { key, error });
      throw new StorageError('get', error);
    }
  }

  async put(key: string, value: Uint8Array): Promise<void> {
    try {
      await this.db.put(key, value);
    } catch (error) {
      logger.error('[LevelStore] Write failed', { key, error });
      throw new StorageError('put', error);
    }
  }

  async delete(key: string): Promise<boolean> {
    const existing = await this.get(key);
    if (existing === null) {
      return false;
    }

    try {
      await this.db.del(key);
      return true;
    } catch (error) {
      logger.error('[LevelStore] Delete failed', { key, error });
      throw new StorageError('delete', error);
    }
  }

  async *scan(prefix: string): AsyncGenerator<KeyValueEntry> {
    const iterator = this.db.iterator({ gte: prefix });

    try {
      while (true) {
        let entry: [string, Uint8Array] | undefined;
        try {
          entry = await iterator.next();
        } catch (error) {
          logger.error('[LevelStore] Scan failed', { prefix, error });
          throw new StorageError('scan', error);
        }

        if (entry === undefined) {
          return;
        }

        const [key, value] = entry;
        // Keys are sorted, so the first key outside the prefix ends the range
        if (!key.startsWith(prefix)) {
          return;
        }

        yield { key, value };
      }
    } finally {
      await iterator.close();
    }
  }

  isOpen(): boolean {
    return this.db.status === 'open';
  }

  async close(): Promise<void> {
    if (this.db.status === 'closed') {
      return;
    }
    await this.db.close();
    logger.info('[LevelStore] Database closed');
  }
}
