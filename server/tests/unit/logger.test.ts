import { resolveLogLevel } from '../../src/config/logger';

describe('logger', () => {
  describe('resolveLogLevel', () => {
    it('should accept the supported levels', () => {
      expect(resolveLogLevel('error')).toBe('error');
      expect(resolveLogLevel('debug')).toBe('debug');
    });

    it('should default to info when unset', () => {
      expect(resolveLogLevel(undefined)).toBe('info');
    });

    it('should fall back to info for an unknown level', () => {
      expect(resolveLogLevel('verbose')).toBe('info');
      expect(resolveLogLevel('')).toBe('info');
    });
  });
});
