import { describe, it, expect } from 'vitest';

import { normalizeAddress, normalizeAddresses } from '../../src/utils/Address.js';

describe('Address', () => {
  it('should lowercase identities', () => {
    expect(normalizeAddress('0xAbCdEf0000000000000000000000000000000001')).toBe(
      '0xabcdef0000000000000000000000000000000001'
    );
    expect(normalizeAddresses(['WETH', 'wBtc'])).toEqual(['weth', 'wbtc']);
  });

  it('should leave empty identities alone', () => {
    expect(normalizeAddress('')).toBe('');
  });
});
