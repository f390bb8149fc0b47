import type { LevelStore } from '../../src/db/client';
import { KeyValueStreamerRepository } from '../../src/repositories/streamer.repository';
import { loadDemoStreamers, seedDemoStreamers } from '../../src/services/demo-data.service';
import { validateTierOrdering } from '../../src/services/tier-matching';
import { ValidationService } from '../../src/services/validation.service';
import { makeStreamer } from '../helpers/fixtures';
import { createMemoryStore } from '../helpers/store';

describe('demo data', () => {
  let store: LevelStore;
  let repository: KeyValueStreamerRepository;

  beforeEach(async () => {
    store = await createMemoryStore();
    repository = new KeyValueStreamerRepository(store);
  });

  afterEach(async () => {
    await store.close();
  });

  describe('loadDemoStreamers', () => {
    it('should load valid streamer profiles', () => {
      const streamers = loadDemoStreamers();
      const validation = new ValidationService();

      expect(streamers.map((streamer) => streamer.name)).toEqual(['Nova', 'Pixel']);
      for (const streamer of streamers) {
        expect(validation.validateWalletAddress(streamer.wallet_address)).toBe(true);
        expect(() => validateTierOrdering(streamer.donation_tiers)).not.toThrow();
      }
    });
  });

  describe('seedDemoStreamers', () => {
    it('should write every demo streamer into an empty store', async () => {
      expect(await seedDemoStreamers(repository)).toBe(2);
      expect((await repository.listAll(10)).map((streamer) => streamer.name).sort()).toEqual(['Nova', 'Pixel']);
    });

    it('should not overwrite streamers that already exist', async () => {
      const [nova] = loadDemoStreamers();
      await repository.save({ ...nova, name: 'Nova (edited)' });

      expect(await seedDemoStreamers(repository)).toBe(1);
      expect((await repository.getById(nova.id))?.name).toBe('Nova (edited)');
    });

    it('should accept an explicit list', async () => {
      expect(await seedDemoStreamers(repository, [makeStreamer()])).toBe(1);
      expect(await seedDemoStreamers(repository, [makeStreamer()])).toBe(0);
    });
  });
});
