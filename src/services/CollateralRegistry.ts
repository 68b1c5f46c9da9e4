// CollateralRegistry: approved collateral assets and the oracle pricing each
import { EngineError } from '../errors/EngineError.js';
import type { AssetId, PriceOracle } from '../types/index.js';
import { normalizeAddresses } from '../utils/Address.js';

/**
 * Fixed at construction; nothing adds or removes assets afterwards.
 * Iteration order is the order the assets were supplied in.
 */
export class CollateralRegistry {
  private readonly oracles = new Map<AssetId, PriceOracle>();

  constructor(assets: readonly AssetId[], priceOracles: readonly PriceOracle[]) {
    if (assets.length !== priceOracles.length) {
      throw new EngineError(
        'ConfigurationMismatch',
        `${assets.length} collateral assets but ${priceOracles.length} price oracles`
      );
    }

    normalizeAddresses(assets).forEach((asset, i) => {
      this.oracles.set(asset, priceOracles[i]);
    });
  }

  isSupported(asset: AssetId): boolean {
    return this.oracles.has(asset);
  }

  get assets(): AssetId[] {
    return [...this.oracles.keys()];
  }

  /**
   * @throws EngineError UnsupportedAsset
   */
  oracleOf(asset: AssetId): PriceOracle {
    const oracle = this.oracles.get(asset);
    if (!oracle) {
      throw new EngineError('UnsupportedAsset', `${asset} is not an approved collateral asset`);
    }
    return oracle;
  }
}
