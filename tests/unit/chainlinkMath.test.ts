import { describe, it, expect } from 'vitest';

import { formatChainlinkPrice, rescaleAnswer } from '../../src/utils/chainlinkMath.js';

describe('chainlinkMath', () => {
  describe('rescaleAnswer', () => {
    it('should keep 8-decimal answers unchanged', () => {
      expect(rescaleAnswer(300050000000n, 8)).toBe(300050000000n);
    });

    it('should scale 18-decimal answers down to 8', () => {
      expect(rescaleAnswer(3000500000000000000000n, 18)).toBe(300050000000n);
    });

    it('should scale low-precision answers up to 8', () => {
      expect(rescaleAnswer(30005n, 1)).toBe(300050000000n);
    });

    it('should reject invalid decimals', () => {
      expect(() => rescaleAnswer(1n, -1)).toThrow('Invalid feed decimals: -1');
      expect(() => rescaleAnswer(1n, 2.5)).toThrow('Invalid feed decimals: 2.5');
    });
  });

  describe('formatChainlinkPrice', () => {
    it('should format with the requested precision', () => {
      expect(formatChainlinkPrice(300050000000n, 8, 2)).toBe('3000.50');
      expect(formatChainlinkPrice(300050000000n, 8, 0)).toBe('3000');
    });
  });
});
