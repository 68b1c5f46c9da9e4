/**
 * Checked BigInt arithmetic bounded to the unsigned 256-bit range.
 *
 * BigInt never overflows on its own, so every helper here enforces the
 * [0, MAX_UINT256] window explicitly and throws instead of wrapping.
 */

import { MAX_UINT256 } from '../engine/constants.js';
import { EngineError } from '../errors/EngineError.js';

function assertInRange(value: bigint, operation: string): bigint {
  if (value > MAX_UINT256) {
    throw new EngineError('MathOverflow', `${operation} exceeds uint256`);
  }
  return value;
}

export function checkedAdd(a: bigint, b: bigint): bigint {
  return assertInRange(a + b, 'addition');
}

export function checkedMul(a: bigint, b: bigint): bigint {
  return assertInRange(a * b, 'multiplication');
}

/**
 * (a * b) / denominator, multiplying first so no precision is lost
 * before the single truncating division
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new EngineError('MathOverflow', 'division by zero');
  }
  return checkedMul(a, b) / denominator;
}

/**
 * Format a fixed-point value for logs, e.g. 1500000000000000000n at 18 -> "1.5"
 */
export function formatFixed(value: bigint, decimals: number = 18): string {
  const negative = value < 0n;
  const abs = negative ? -value : value;
  const divisor = 10n ** BigInt(decimals);
  const integerPart = abs / divisor;
  const fractionalPart = abs % divisor;

  const trimmed = fractionalPart.toString().padStart(decimals, '0').replace(/0+$/, '');
  const body = trimmed.length === 0 ? integerPart.toString() : `${integerPart}.${trimmed}`;

  return negative ? `-${body}` : body;
}
