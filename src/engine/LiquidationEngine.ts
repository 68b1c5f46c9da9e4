/**
 * LiquidationEngine: forced partial or full close of an unhealthy position.
 *
 * Eligible? -> Computing -> Seizing -> Burning -> Verifying -> Done
 *
 * Any failure aborts the attempt; the surrounding UnitOfWork discards every
 * ledger change and reverses any collaborator effect already applied.
 * Collaborator effects run only after verification passed: debt pull, burn, then the collateral
 * payout, which is the one effect that cannot be reversed.
 *
 * Known limitation: sizing assumes the target's collateral covers
 * debtToCover plus the bonus. When collateral value has collapsed below that,
 * the seizure fails with InsufficientCollateral and there is no fallback.
 */

import { EngineError } from '../errors/EngineError.js';
import type { HealthCalculator } from '../services/HealthCalculator.js';
import type { ValuationService } from '../services/ValuationService.js';
import type {
  AccountId,
  AssetId,
  LiquidationResult,
  LiquidationStage,
  SeizureQuote
} from '../types/index.js';
import { checkedAdd, formatFixed, mulDiv } from '../utils/bigint.js';

import { LIQUIDATION_BONUS, LIQUIDATION_PRECISION, MIN_HEALTH_FACTOR } from './constants.js';
import { requirePositive, type PositionEngine } from './PositionEngine.js';
import type { UnitOfWork } from './UnitOfWork.js';

export type StageListener = (stage: LiquidationStage) => void;

export class LiquidationEngine {
  constructor(
    private readonly positions: PositionEngine,
    private readonly health: HealthCalculator,
    private readonly valuation: ValuationService
  ) {}

  /**
   * Collateral a liquidator receives for covering `debtToCover`:
   * the debt-equivalent amount plus LIQUIDATION_BONUS percent of it
   */
  async computeSeizure(asset: AssetId, debtToCover: bigint): Promise<SeizureQuote> {
    const baseAmount = await this.valuation.assetAmountForValue(asset, debtToCover);
    const bonus = mulDiv(baseAmount, LIQUIDATION_BONUS, LIQUIDATION_PRECISION);
    return { baseAmount, bonus, totalSeized: checkedAdd(baseAmount, bonus) };
  }

  async liquidate(
    uow: UnitOfWork,
    liquidator: AccountId,
    target: AccountId,
    asset: AssetId,
    debtToCover: bigint,
    onStage?: StageListener
  ): Promise<LiquidationResult> {
    const enter = (next: LiquidationStage): void => onStage?.(next);

    try {
      enter('eligibility');
      requirePositive(debtToCover, 'debt to cover');
      const startingHealthFactor = await this.health.healthFactor(target, uow);
      if (startingHealthFactor > MIN_HEALTH_FACTOR) {
        throw new EngineError(
          'HealthFactorOk',
          `${target} health factor ${formatFixed(startingHealthFactor)} is not liquidatable`,
          { healthFactor: startingHealthFactor }
        );
      }

      enter('computing');
      const quote = await this.computeSeizure(asset, debtToCover);

      enter('seizing');
      this.positions.redeemCollateral(uow, asset, quote.totalSeized, target, liquidator);

      enter('burning');
      this.positions.burnDebt(uow, debtToCover, target, liquidator);

      enter('verifying');
      const endingHealthFactor = await this.health.healthFactor(target, uow);
      if (endingHealthFactor <= startingHealthFactor) {
        throw new EngineError(
          'HealthFactorNotImproved',
          `${target} health factor went from ${formatFixed(startingHealthFactor)} to ${formatFixed(endingHealthFactor)}`,
          { healthFactor: endingHealthFactor }
        );
      }
      await this.health.assertSolvent(liquidator, uow);

      enter('done');
      return {
        target,
        liquidator,
        asset,
        debtCovered: debtToCover,
        ...quote,
        startingHealthFactor,
        endingHealthFactor
      };
    } catch (error) {
      enter('aborted');
      throw error;
    }
  }
}
