// CollateralLedger: per-account, per-asset deposited amounts
import type { UnitOfWork } from '../engine/UnitOfWork.js';
import { EngineError } from '../errors/EngineError.js';
import type { AccountId, AssetId } from '../types/index.js';
import { checkedAdd } from '../utils/bigint.js';

/**
 * Pure balance accounting. No pricing, no solvency rules.
 *
 * Balances live in an account -> asset -> amount map owned by the ledger.
 * Entries are created on first credit and stay at zero once emptied.
 * Mutations given a UnitOfWork are staged in it and reach the map only when
 * it commits; reads given the same unit see those staged values.
 */
export class CollateralLedger {
  private readonly balances = new Map<AccountId, Map<AssetId, bigint>>();

  balanceOf(account: AccountId, asset: AssetId, uow?: UnitOfWork): bigint {
    const holdings = this.balances.get(account);
    if (!holdings) return 0n;
    return uow?.read(holdings, asset) ?? holdings.get(asset) ?? 0n;
  }

  credit(account: AccountId, asset: AssetId, amount: bigint, uow?: UnitOfWork): void {
    if (amount <= 0n) {
      throw new EngineError('InvalidAmount', `credit amount must be positive, got ${amount}`);
    }

    const before = this.balanceOf(account, asset, uow);
    this.set(account, asset, checkedAdd(before, amount), uow);
  }

  /**
   * Fails without touching the balance when `amount` exceeds it
   */
  debit(account: AccountId, asset: AssetId, amount: bigint, uow?: UnitOfWork): void {
    if (amount <= 0n) {
      throw new EngineError('InvalidAmount', `debit amount must be positive, got ${amount}`);
    }

    const before = this.balanceOf(account, asset, uow);
    if (amount > before) {
      throw new EngineError(
        'InsufficientCollateral',
        `${account} holds ${before} of ${asset}, cannot debit ${amount}`
      );
    }

    this.set(account, asset, before - amount, uow);
  }

  private set(account: AccountId, asset: AssetId, value: bigint, uow?: UnitOfWork): void {
    let holdings = this.balances.get(account);
    if (!holdings) {
      holdings = new Map();
      this.balances.set(account, holdings);
    }

    if (uow) {
      uow.write(holdings, asset, value);
    } else {
      holdings.set(asset, value);
    }
  }
}
