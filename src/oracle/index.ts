import { JsonRpcProvider, type ContractRunner } from 'ethers';

import { config } from '../config/index.js';
import type { AssetId, PriceOracle } from '../types/index.js';

import { ChainlinkPriceOracle } from './ChainlinkPriceOracle.js';

export interface CollateralSetup {
  assets: AssetId[];
  priceOracles: PriceOracle[];
}

/**
 * Build the engine's asset/oracle lists from COLLATERAL_FEEDS.
 * All assets share one ChainlinkPriceOracle; `runner` defaults to a
 * provider on CHAINLINK_RPC_URL.
 */
export function collateralSetupFromConfig(runner?: ContractRunner): CollateralSetup {
  const feeds = config.collateralFeeds;
  if (feeds.size === 0) {
    throw new Error('COLLATERAL_FEEDS is empty; expected ASSET:feedAddress pairs');
  }

  let contractRunner = runner;
  if (!contractRunner) {
    const rpcUrl = config.chainlinkRpcUrl;
    if (!rpcUrl) {
      throw new Error('CHAINLINK_RPC_URL is required to read collateral price feeds');
    }
    contractRunner = new JsonRpcProvider(rpcUrl);
  }

  const oracle = ChainlinkPriceOracle.fromAddresses(feeds, contractRunner);
  const assets = [...feeds.keys()];
  return { assets, priceOracles: assets.map(() => oracle) };
}

export { ChainlinkPriceOracle, AggregatorContractFeed } from './ChainlinkPriceOracle.js';
export type { AggregatorFeed, RoundData, ChainlinkPriceOracleOptions } from './ChainlinkPriceOracle.js';
