import { describe, it, expect, beforeEach, vi } from 'vitest';

import { MAX_UINT256 } from '../../src/engine/constants.js';
import type { CollateralEngine } from '../../src/engine/CollateralEngine.js';
import type { LiquidationStage } from '../../src/types/index.js';
import { expectEngineError } from '../helpers/assertions.js';
import {
  ALICE,
  BOB,
  FakeCustody,
  FakeDebtLedger,
  FakePriceOracle,
  LIQUIDATOR,
  UNIT,
  WETH,
  createHarness,
  usd
} from '../helpers/fakes.js';

describe('CollateralEngine liquidation', () => {
  let engine: CollateralEngine;
  let oracle: FakePriceOracle;
  let debtLedger: FakeDebtLedger;
  let custody: FakeCustody;

  beforeEach(async () => {
    ({ engine, oracle, debtLedger, custody } = createHarness());
    custody.fund(ALICE, WETH, 10n * UNIT);
    custody.fund(LIQUIDATOR, WETH, 20n * UNIT);
    custody.fund(BOB, WETH, UNIT);

    await engine.depositAndMint(ALICE, WETH, 10n * UNIT, 10000n * UNIT);
    await engine.depositAndMint(LIQUIDATOR, WETH, 20n * UNIT, 10000n * UNIT);
  });

  describe('eligibility', () => {
    it('should refuse a healthy target and leave it untouched', async () => {
      await engine.depositAndMint(BOB, WETH, UNIT, 100n * UNIT);
      const callsBefore = [...debtLedger.calls];

      const error = await expectEngineError(
        engine.liquidate(LIQUIDATOR, BOB, WETH, 50n * UNIT),
        'HealthFactorOk'
      );

      expect(error.healthFactor).toBe(10n * UNIT);
      expect(engine.collateralBalanceOf(BOB, WETH)).toBe(UNIT);
      expect(engine.debtOf(BOB)).toBe(100n * UNIT);
      expect(debtLedger.calls).toEqual(callsBefore);
    });

    it('should refuse a target without debt', async () => {
      const error = await expectEngineError(engine.liquidate(LIQUIDATOR, BOB, WETH, UNIT), 'HealthFactorOk');
      expect(error.healthFactor).toBe(MAX_UINT256);
    });

    it('should treat a target sitting exactly on the minimum as liquidatable', async () => {
      const result = await engine.liquidate(LIQUIDATOR, ALICE, WETH, 2000n * UNIT);
      expect(result.startingHealthFactor).toBe(UNIT);
      expect(result.endingHealthFactor).toBeGreaterThan(UNIT);
    });

    it('should reject a zero debt to cover', async () => {
      oracle.setPrice(WETH, usd(1800n));
      await expectEngineError(engine.liquidate(LIQUIDATOR, ALICE, WETH, 0n), 'InvalidAmount');
    });
  });

  describe('after a price drop to $1800', () => {
    beforeEach(() => {
      oracle.setPrice(WETH, usd(1800n));
    });

    it('should quote the seizure with a 10% bonus', async () => {
      expect(await engine.computeSeizure(WETH, 2000n * UNIT)).toEqual({
        baseAmount: 1111111111111111111n,
        bonus: 111111111111111111n,
        totalSeized: 1222222222222222222n
      });
    });

    it('should partially liquidate and improve the target', async () => {
      const redeemed = vi.fn();
      const stages: LiquidationStage[] = [];
      engine.on('CollateralRedeemed', redeemed);

      const result = await engine.liquidate(LIQUIDATOR, ALICE, WETH, 2000n * UNIT, {
        onStage: (stage) => stages.push(stage)
      });

      expect(result).toEqual({
        target: ALICE,
        liquidator: LIQUIDATOR,
        asset: WETH,
        debtCovered: 2000n * UNIT,
        baseAmount: 1111111111111111111n,
        bonus: 111111111111111111n,
        totalSeized: 1222222222222222222n,
        startingHealthFactor: 9n * 10n ** 17n,
        endingHealthFactor: 987500000000000000n
      });
      expect(stages).toEqual(['eligibility', 'computing', 'seizing', 'burning', 'verifying', 'done']);

      expect(engine.collateralBalanceOf(ALICE, WETH)).toBe(8777777777777777778n);
      expect(engine.debtOf(ALICE)).toBe(8000n * UNIT);
      expect(custody.walletOf(LIQUIDATOR, WETH)).toBe(1222222222222222222n);
      expect(debtLedger.balanceOf(LIQUIDATOR)).toBe(8000n * UNIT);
      expect(debtLedger.totalSupply).toBe(18000n * UNIT);
      expect(engine.debtOf(LIQUIDATOR)).toBe(10000n * UNIT);
      expect(await engine.healthFactor(LIQUIDATOR)).toBe(18n * 10n ** 17n);
      expect(redeemed).toHaveBeenCalledWith({
        from: ALICE,
        to: LIQUIDATOR,
        amount: 1222222222222222222n,
        asset: WETH
      });
    });

    it('should fully liquidate the debt', async () => {
      const result = await engine.liquidate(LIQUIDATOR, ALICE, WETH, 10000n * UNIT);

      expect(result.totalSeized).toBe(6111111111111111110n);
      expect(result.endingHealthFactor).toBe(MAX_UINT256);
      expect(engine.debtOf(ALICE)).toBe(0n);
      expect(engine.collateralBalanceOf(ALICE, WETH)).toBe(3888888888888888890n);
      expect(debtLedger.balanceOf(LIQUIDATOR)).toBe(0n);
    });

    it('should reject covering more than the target owes', async () => {
      await expectEngineError(engine.liquidate(LIQUIDATOR, ALICE, WETH, 10001n * UNIT), 'InsufficientDebt');
      expect(engine.collateralBalanceOf(ALICE, WETH)).toBe(10n * UNIT);
    });

    it('should reject a liquidator left insolvent by the same drop', async () => {
      await engine.depositAndMint(BOB, WETH, UNIT, 900n * UNIT);
      oracle.setPrice(WETH, usd(1700n));

      const error = await expectEngineError(engine.liquidate(BOB, ALICE, WETH, 100n * UNIT), 'BreaksHealthFactor');

      expect(error.healthFactor).toBe(944444444444444444n);
      expect(engine.collateralBalanceOf(ALICE, WETH)).toBe(10n * UNIT);
      expect(engine.debtOf(ALICE)).toBe(10000n * UNIT);
      expect(custody.walletOf(BOB, WETH)).toBe(0n);
    });

    it('should restore everything when the liquidator cannot pay', async () => {
      const redeemed = vi.fn();
      engine.on('CollateralRedeemed', redeemed);
      debtLedger.balances.set(LIQUIDATOR, 0n);

      await expectEngineError(engine.liquidate(LIQUIDATOR, ALICE, WETH, 2000n * UNIT), 'TransferFailed');

      expect(engine.collateralBalanceOf(ALICE, WETH)).toBe(10n * UNIT);
      expect(engine.debtOf(ALICE)).toBe(10000n * UNIT);
      expect(custody.calls.some((call) => call.startsWith('transferOut'))).toBe(false);
      expect(redeemed).not.toHaveBeenCalled();
    });

    it('should re-issue the burnt value when the collateral payout fails', async () => {
      custody.failTransferOut = true;

      await expectEngineError(engine.liquidate(LIQUIDATOR, ALICE, WETH, 2000n * UNIT), 'TransferFailed');

      expect(engine.debtOf(ALICE)).toBe(10000n * UNIT);
      expect(debtLedger.balanceOf(LIQUIDATOR)).toBe(10000n * UNIT);
      expect(debtLedger.totalSupply).toBe(20000n * UNIT);
    });
  });

  it('should refuse a liquidation that leaves the target worse off', async () => {
    await engine.depositAndMint(BOB, WETH, UNIT, 1000n * UNIT);
    oracle.setPrice(WETH, usd(1000n));
    const stages: LiquidationStage[] = [];

    expect(await engine.healthFactor(BOB)).toBe(5n * 10n ** 17n);

    expect(await engine.computeSeizure(WETH, 500n * UNIT)).toEqual({
      baseAmount: 5n * 10n ** 17n,
      bonus: 5n * 10n ** 16n,
      totalSeized: 55n * 10n ** 16n
    });

    const error = await expectEngineError(
      engine.liquidate(LIQUIDATOR, BOB, WETH, 500n * UNIT, { onStage: (stage) => stages.push(stage) }),
      'HealthFactorNotImproved'
    );

    expect(error.healthFactor).toBe(45n * 10n ** 16n);
    // Eligible: the attempt got past the eligibility check
    expect(error.code).not.toBe('HealthFactorOk');
    expect(stages).toEqual(['eligibility', 'computing', 'seizing', 'burning', 'verifying', 'aborted']);
    expect(engine.collateralBalanceOf(BOB, WETH)).toBe(UNIT);
    expect(engine.debtOf(BOB)).toBe(1000n * UNIT);
    expect(custody.walletOf(LIQUIDATOR, WETH)).toBe(0n);
  });

  it('should fail when collateral cannot cover the debt plus bonus', async () => {
    oracle.setPrice(WETH, usd(100n));

    await expectEngineError(engine.liquidate(LIQUIDATOR, ALICE, WETH, 10000n * UNIT), 'InsufficientCollateral');

    expect(engine.collateralBalanceOf(ALICE, WETH)).toBe(10n * UNIT);
    expect(engine.debtOf(ALICE)).toBe(10000n * UNIT);
  });
});
