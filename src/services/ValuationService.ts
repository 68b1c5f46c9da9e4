/**
 * ValuationService: converts collateral quantities to value units and back.
 *
 * Oracle answers are 8-decimal USD prices, lifted to the 18-decimal PRECISION
 * scale with ADDITIONAL_FEED_PRECISION. Every conversion multiplies before it
 * divides, so the only precision loss is the final truncation.
 */

import { ADDITIONAL_FEED_PRECISION, PRECISION } from '../engine/constants.js';
import { EngineError, describeError, isEngineError } from '../errors/EngineError.js';
import type { AssetId, PriceReading } from '../types/index.js';
import { checkedMul, mulDiv } from '../utils/bigint.js';

import type { CollateralRegistry } from './CollateralRegistry.js';

export class ValuationService {
  constructor(private readonly registry: CollateralRegistry) {}

  /**
   * Oracle price of one whole unit of `asset`, at 18 decimals
   * @throws EngineError PriceUnavailable when the oracle errors, flags the
   *   answer invalid, or reports a non-positive price. Engine errors raised
   *   through the oracle pass through unchanged.
   */
  async scaledPriceOf(asset: AssetId): Promise<bigint> {
    const oracle = this.registry.oracleOf(asset);

    let reading: PriceReading;
    try {
      reading = await oracle.latestPrice(asset);
    } catch (error) {
      if (isEngineError(error)) throw error;
      throw new EngineError(
        'PriceUnavailable',
        `oracle for ${asset} failed: ${describeError(error)}`,
        { cause: error }
      );
    }

    if (!reading.valid) {
      throw new EngineError('PriceUnavailable', `oracle for ${asset} returned a stale or invalid round`);
    }
    if (reading.price <= 0n) {
      throw new EngineError('PriceUnavailable', `oracle for ${asset} returned non-positive price ${reading.price}`);
    }

    return checkedMul(reading.price, ADDITIONAL_FEED_PRECISION);
  }

  /**
   * value = price_scaled * amount / PRECISION
   */
  async usdValue(asset: AssetId, amount: bigint): Promise<bigint> {
    const price = await this.scaledPriceOf(asset);
    return mulDiv(price, amount, PRECISION);
  }

  /**
   * amount = usd * PRECISION / price_scaled (inverse of usdValue)
   */
  async assetAmountForValue(asset: AssetId, usdAmount: bigint): Promise<bigint> {
    const price = await this.scaledPriceOf(asset);
    return mulDiv(usdAmount, PRECISION, price);
  }
}
