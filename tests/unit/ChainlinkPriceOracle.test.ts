import { describe, it, expect, vi } from 'vitest';

import {
  ChainlinkPriceOracle,
  type AggregatorFeed,
  type RoundData
} from '../../src/oracle/ChainlinkPriceOracle.js';
import { EngineLogger } from '../../src/services/EngineLogger.js';

const NOW = 1_700_000_000;

function round(overrides: Partial<RoundData> = {}): RoundData {
  return {
    roundId: 5n,
    answer: 200000000000n,
    startedAt: BigInt(NOW - 120),
    updatedAt: BigInt(NOW - 60),
    answeredInRound: 5n,
    ...overrides
  };
}

function stubFeed(data: RoundData, decimals: number = 8) {
  return {
    latestRoundData: vi.fn(async () => data),
    decimals: vi.fn(async () => decimals)
  } satisfies AggregatorFeed;
}

function oracleFor(feed: AggregatorFeed): ChainlinkPriceOracle {
  return new ChainlinkPriceOracle(new Map([['WETH', feed]]), {
    stalenessSec: 10800,
    now: () => NOW
  });
}

describe('ChainlinkPriceOracle', () => {
  it('should report a fresh 8-decimal answer as valid', async () => {
    const oracle = oracleFor(stubFeed(round()));
    expect(await oracle.latestPrice('WETH')).toEqual({ price: 200000000000n, valid: true });
  });

  it('should key feeds case-insensitively', async () => {
    const oracle = oracleFor(stubFeed(round()));
    expect(oracle.assets).toEqual(['weth']);
    expect((await oracle.latestPrice('weth')).price).toBe(200000000000n);
  });

  it('should rescale answers from other precisions', async () => {
    const oracle = oracleFor(stubFeed(round({ answer: 2000n * 10n ** 18n }), 18));
    expect((await oracle.latestPrice('WETH')).price).toBe(200000000000n);
  });

  it('should accept an answer exactly at the staleness limit', async () => {
    const oracle = oracleFor(stubFeed(round({ updatedAt: BigInt(NOW - 10800) })));
    expect((await oracle.latestPrice('WETH')).valid).toBe(true);
  });

  it('should flag an answer older than the staleness limit', async () => {
    const oracle = oracleFor(stubFeed(round({ updatedAt: BigInt(NOW - 10801) })));
    expect(await oracle.latestPrice('WETH')).toEqual({ price: 200000000000n, valid: false });
  });

  it('should log the rejected round', async () => {
    const logger = new EngineLogger('error', true);
    const warn = vi.spyOn(logger, 'warn');
    const oracle = new ChainlinkPriceOracle(new Map([['WETH', stubFeed(round({ answeredInRound: 4n }))]]), {
      now: () => NOW,
      logger
    });

    await oracle.latestPrice('WETH');

    expect(warn).toHaveBeenCalledWith('Chainlink round rejected', {
      asset: 'weth',
      price: '2000.00',
      roundId: 5n,
      answeredInRound: 4n,
      updatedAt: BigInt(NOW - 60)
    });
  });

  it('should flag incomplete rounds', async () => {
    const oracle = oracleFor(stubFeed(round({ updatedAt: 0n })));
    expect((await oracle.latestPrice('WETH')).valid).toBe(false);
  });

  it('should flag answers carried over from an earlier round', async () => {
    const oracle = oracleFor(stubFeed(round({ answeredInRound: 4n })));
    expect((await oracle.latestPrice('WETH')).valid).toBe(false);
  });

  it('should read feed decimals once', async () => {
    const feed = stubFeed(round());
    const oracle = oracleFor(feed);

    await oracle.latestPrice('WETH');
    await oracle.latestPrice('WETH');

    expect(feed.latestRoundData).toHaveBeenCalledTimes(2);
    expect(feed.decimals).toHaveBeenCalledTimes(1);
  });

  it('should throw for assets without a feed', async () => {
    const oracle = oracleFor(stubFeed(round()));
    await expect(oracle.latestPrice('WBTC')).rejects.toThrow('No Chainlink feed configured for WBTC');
  });
});
