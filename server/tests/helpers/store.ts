import { MemoryLevel } from 'memory-level';
import { LevelStore } from '../../src/db/client';

/**
 * A LevelStore over an in-process memory database, opened and empty
 */
export async function createMemoryStore(): Promise<LevelStore> {
  const db = new MemoryLevel<string, Uint8Array>({
    keyEncoding: 'utf8',
    valueEncoding: 'view',
  });
  const store = new LevelStore(db);
  await store.open();
  return store;
}

export function bytes(text: string): Uint8Array {
  return Buffer.from(text, 'utf8');
}
