/**
 * Identity normalization for account and asset keys.
 *
 * Ensures ledger lookups are keyed consistently regardless of the casing
 * a caller used for a checksummed address.
 */

import { config } from '../config/index.js';

/**
 * Normalize an identity to lowercase if normalization is enabled
 */
export function normalizeAddress(address: string): string {
  if (!address) return address;

  if (config.addressNormalizeLowercase) {
    return address.toLowerCase();
  }

  return address;
}

/**
 * Normalize an array of identities
 */
export function normalizeAddresses(addresses: readonly string[]): string[] {
  return addresses.map(normalizeAddress);
}

