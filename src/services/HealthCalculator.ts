// HealthCalculator: solvency ratio per account and its enforcement
import {
  LIQUIDATION_PRECISION,
  LIQUIDATION_THRESHOLD,
  MAX_UINT256,
  MIN_HEALTH_FACTOR,
  PRECISION
} from '../engine/constants.js';
import type { UnitOfWork } from '../engine/UnitOfWork.js';
import { EngineError } from '../errors/EngineError.js';
import type { AccountId, AccountSummary } from '../types/index.js';
import { checkedAdd, formatFixed, mulDiv } from '../utils/bigint.js';

import type { CollateralLedger } from './CollateralLedger.js';
import type { CollateralRegistry } from './CollateralRegistry.js';
import type { DebtBook } from './DebtBook.js';
import type { ValuationService } from './ValuationService.js';

/**
 * Health Factor Formula:
 * HF = (collateral_value * LIQUIDATION_THRESHOLD / LIQUIDATION_PRECISION) * PRECISION / debt
 *
 * Zero debt maps to MAX_UINT256 (never liquidatable). Non-zero debt against
 * zero collateral value maps to 0.
 */
export function calculateHealthFactor(debt: bigint, collateralValue: bigint): bigint {
  if (debt === 0n) {
    return MAX_UINT256;
  }

  const thresholdAdjusted = mulDiv(collateralValue, LIQUIDATION_THRESHOLD, LIQUIDATION_PRECISION);
  return mulDiv(thresholdAdjusted, PRECISION, debt);
}

export class HealthCalculator {
  constructor(
    private readonly registry: CollateralRegistry,
    private readonly ledger: CollateralLedger,
    private readonly debts: DebtBook,
    private readonly valuation: ValuationService
  ) {}

  /**
   * Sum of usd_value(asset, balance) over every registered asset.
   * Every read takes an optional UnitOfWork: with it, the operation's own
   * pending writes are included; without it, committed state only.
   */
  async totalCollateralValue(account: AccountId, uow?: UnitOfWork): Promise<bigint> {
    let total = 0n;
    for (const asset of this.registry.assets) {
      const amount = this.ledger.balanceOf(account, asset, uow);
      total = checkedAdd(total, await this.valuation.usdValue(asset, amount));
    }
    return total;
  }

  async accountSummary(account: AccountId, uow?: UnitOfWork): Promise<AccountSummary> {
    return {
      debt: this.debts.debtOf(account, uow),
      collateralValue: await this.totalCollateralValue(account, uow)
    };
  }

  async healthFactor(account: AccountId, uow?: UnitOfWork): Promise<bigint> {
    const debt = this.debts.debtOf(account, uow);
    // Unbounded; skip pricing entirely
    if (debt === 0n) {
      return MAX_UINT256;
    }
    return calculateHealthFactor(debt, await this.totalCollateralValue(account, uow));
  }

  /**
   * Inclusive boundary: exactly MIN_HEALTH_FACTOR passes
   * @throws EngineError BreaksHealthFactor carrying the observed ratio
   */
  async assertSolvent(account: AccountId, uow?: UnitOfWork): Promise<bigint> {
    const healthFactor = await this.healthFactor(account, uow);
    if (healthFactor < MIN_HEALTH_FACTOR) {
      throw new EngineError(
        'BreaksHealthFactor',
        `${account} health factor ${formatFixed(healthFactor)} is below ${formatFixed(MIN_HEALTH_FACTOR)}`,
        { healthFactor }
      );
    }
    return healthFactor;
  }
}
