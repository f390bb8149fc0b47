import { getChainId, isTestnet } from '../../src/config/network';

describe('network', () => {
  describe('isTestnet', () => {
    it('should recognise test networks by name', () => {
      expect(isTestnet('base-sepolia')).toBe(true);
      expect(isTestnet('Base-Sepolia')).toBe(true);
      expect(isTestnet('local-testnet')).toBe(true);
    });

    it('should treat other networks as mainnet', () => {
      expect(isTestnet('base')).toBe(false);
      expect(isTestnet('base-mainnet')).toBe(false);
    });
  });

  describe('getChainId', () => {
    it('should return the Base chain ids', () => {
      expect(getChainId('base-sepolia')).toBe(84532);
      expect(getChainId('base')).toBe(8453);
    });
  });
});
