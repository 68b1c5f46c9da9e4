/**
 * ChainlinkPriceOracle: PriceOracle over Chainlink AggregatorV3 USD feeds.
 *
 * A round is reported invalid (never thrown away silently) when:
 * - updatedAt is 0 (round not complete)
 * - answeredInRound < roundId (answer carried over from an older round)
 * - now - updatedAt exceeds the staleness window (default 3 hours)
 *
 * Answers are rescaled to the engine's 8-decimal feed convention.
 */

import { Contract, type ContractRunner } from 'ethers';

import { config } from '../config/index.js';
import { engineLogger, type EngineLogger } from '../services/EngineLogger.js';
import type { AssetId, PriceOracle, PriceReading } from '../types/index.js';
import { normalizeAddress } from '../utils/Address.js';
import { formatChainlinkPrice, rescaleAnswer } from '../utils/chainlinkMath.js';

// Chainlink Aggregator V3 Interface ABI (minimal)
const AGGREGATOR_V3_ABI = [
  'function latestRoundData() external view returns (uint80 roundId, int256 answer, uint256 startedAt, uint256 updatedAt, uint80 answeredInRound)',
  'function decimals() external view returns (uint8)'
];

export interface RoundData {
  roundId: bigint;
  answer: bigint;
  startedAt: bigint;
  updatedAt: bigint;
  answeredInRound: bigint;
}

export interface AggregatorFeed {
  latestRoundData(): Promise<RoundData>;
  decimals(): Promise<number>;
}

/**
 * AggregatorFeed backed by an on-chain contract
 */
export class AggregatorContractFeed implements AggregatorFeed {
  private readonly contract: Contract;

  constructor(address: string, runner: ContractRunner) {
    this.contract = new Contract(address, AGGREGATOR_V3_ABI, runner);
  }

  async latestRoundData(): Promise<RoundData> {
    const round = await this.contract.latestRoundData();
    return {
      roundId: BigInt(round.roundId),
      answer: BigInt(round.answer),
      startedAt: BigInt(round.startedAt),
      updatedAt: BigInt(round.updatedAt),
      answeredInRound: BigInt(round.answeredInRound)
    };
  }

  async decimals(): Promise<number> {
    return Number(await this.contract.decimals());
  }
}

export interface ChainlinkPriceOracleOptions {
  stalenessSec?: number;
  /** Clock in unix seconds */
  now?: () => number;
  logger?: EngineLogger;
}

export class ChainlinkPriceOracle implements PriceOracle {
  private readonly feeds = new Map<AssetId, AggregatorFeed>();
  private readonly decimalsCache = new Map<AssetId, number>();
  private readonly stalenessSec: bigint;
  private readonly now: () => number;
  private readonly logger: EngineLogger;

  constructor(feeds: Map<AssetId, AggregatorFeed>, options: ChainlinkPriceOracleOptions = {}) {
    for (const [asset, feed] of feeds) {
      this.feeds.set(normalizeAddress(asset), feed);
    }
    this.stalenessSec = BigInt(options.stalenessSec ?? config.priceStalenessSec);
    this.now = options.now ?? (() => Math.floor(Date.now() / 1000));
    this.logger = options.logger ?? engineLogger;
  }

  /**
   * Build one contract-backed feed per `asset -> feed address` entry
   */
  static fromAddresses(
    feedAddresses: Map<AssetId, string>,
    runner: ContractRunner,
    options: ChainlinkPriceOracleOptions = {}
  ): ChainlinkPriceOracle {
    const feeds = new Map<AssetId, AggregatorFeed>();
    for (const [asset, address] of feedAddresses) {
      feeds.set(asset, new AggregatorContractFeed(address, runner));
    }
    return new ChainlinkPriceOracle(feeds, options);
  }

  get assets(): AssetId[] {
    return [...this.feeds.keys()];
  }

  async latestPrice(asset: AssetId): Promise<PriceReading> {
    const key = normalizeAddress(asset);
    const feed = this.feeds.get(key);
    if (!feed) {
      throw new Error(`No Chainlink feed configured for ${asset}`);
    }

    const [round, decimals] = await Promise.all([
      feed.latestRoundData(),
      this.decimalsOf(key, feed)
    ]);

    const valid = this.isFresh(round);
    if (!valid) {
      this.logger.warn('Chainlink round rejected', {
        asset: key,
        price: formatChainlinkPrice(round.answer, decimals),
        roundId: round.roundId,
        answeredInRound: round.answeredInRound,
        updatedAt: round.updatedAt
      });
    }

    return { price: rescaleAnswer(round.answer, decimals), valid };
  }

  private isFresh(round: RoundData): boolean {
    if (round.updatedAt === 0n) return false;
    if (round.answeredInRound < round.roundId) return false;

    const age = BigInt(this.now()) - round.updatedAt;
    return age <= this.stalenessSec;
  }

  private async decimalsOf(asset: AssetId, feed: AggregatorFeed): Promise<number> {
    const cached = this.decimalsCache.get(asset);
    if (cached !== undefined) return cached;

    const decimals = await feed.decimals();
    this.decimalsCache.set(asset, decimals);
    this.logger.debug('Cached feed decimals', { asset, decimals });
    return decimals;
  }
}
