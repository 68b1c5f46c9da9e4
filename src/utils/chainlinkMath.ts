/**
 * Chainlink price feed normalization utilities
 * Integer-only rescaling so no floating-point rounding enters a valuation
 */

import { FEED_DECIMALS } from '../engine/constants.js';

/**
 * Rescale a Chainlink answer from the feed's own decimals to `targetDecimals`
 *
 * @param answer Raw answer from the feed
 * @param decimals Feed decimals (typically 8 for USD feeds)
 * @param targetDecimals Decimals the engine expects (8)
 *
 * @example
 * // ETH/USD feed with 18 decimals returning 3000.5
 * rescaleAnswer(3000500000000000000000n, 18) // => 300050000000n
 */
export function rescaleAnswer(
  answer: bigint,
  decimals: number,
  targetDecimals: number = FEED_DECIMALS
): bigint {
  if (!Number.isInteger(decimals) || decimals < 0 || decimals > 36) {
    throw new Error(`Invalid feed decimals: ${decimals}`);
  }

  if (decimals === targetDecimals) {
    return answer;
  }
  if (decimals < targetDecimals) {
    return answer * 10n ** BigInt(targetDecimals - decimals);
  }
  return answer / 10n ** BigInt(decimals - targetDecimals);
}

/**
 * Format a Chainlink answer for display, e.g. (300050000000n, 8, 2) -> "3000.50"
 */
export function formatChainlinkPrice(
  answer: bigint,
  decimals: number,
  displayDecimals: number = 2
): string {
  const negative = answer < 0n;
  const abs = negative ? -answer : answer;
  const divisor = 10n ** BigInt(decimals);
  const integerPart = abs / divisor;
  const fraction = (abs % divisor).toString().padStart(decimals, '0').slice(0, displayDecimals);
  const body = displayDecimals > 0
    ? `${integerPart}.${fraction.padEnd(displayDecimals, '0')}`
    : integerPart.toString();
  return negative ? `-${body}` : body;
}
