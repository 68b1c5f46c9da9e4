/**
 * PositionEngine: deposit, mint, redeem and burn against one account.
 *
 * Every method runs inside a caller-supplied UnitOfWork: ledger changes are
 * staged in it, collaborator calls are deferred until the caller settles the
 * unit, and solvency is checked against the staged state.
 * Nothing here takes the reentrancy guard; CollateralEngine does.
 */

import { EngineError, describeError, isEngineError, type EngineErrorCode } from '../errors/EngineError.js';
import type { CollateralLedger } from '../services/CollateralLedger.js';
import type { CollateralRegistry } from '../services/CollateralRegistry.js';
import type { DebtBook } from '../services/DebtBook.js';
import type { HealthCalculator } from '../services/HealthCalculator.js';
import type { AccountId, AssetId, Custody, DebtLedger } from '../types/index.js';

import type { UnitOfWork } from './UnitOfWork.js';

export interface PositionEngineDeps {
  registry: CollateralRegistry;
  ledger: CollateralLedger;
  debts: DebtBook;
  health: HealthCalculator;
  debtLedger: DebtLedger;
  custody: Custody;
  /** Identity the engine holds synthetic value under before burning it */
  engineAccount: AccountId;
}

export function requirePositive(amount: bigint, what: string): void {
  if (amount <= 0n) {
    throw new EngineError('InvalidAmount', `${what} must be greater than zero, got ${amount}`);
  }
}

/**
 * Run a boolean-returning collaborator call, mapping `false` or a thrown
 * error to `code`. Engine errors (a nested Reentrancy, say) pass through.
 */
async function expectSuccess(
  call: () => Promise<boolean>,
  code: EngineErrorCode,
  description: string
): Promise<void> {
  let ok: boolean;
  try {
    ok = await call();
  } catch (error) {
    if (isEngineError(error)) throw error;
    throw new EngineError(code, `${description} threw: ${describeError(error)}`, { cause: error });
  }
  if (!ok) {
    throw new EngineError(code, `${description} returned failure`);
  }
}

export class PositionEngine {
  private readonly registry: CollateralRegistry;
  private readonly ledger: CollateralLedger;
  private readonly debts: DebtBook;
  private readonly health: HealthCalculator;
  private readonly debtLedger: DebtLedger;
  private readonly custody: Custody;
  private readonly engineAccount: AccountId;

  constructor(deps: PositionEngineDeps) {
    this.registry = deps.registry;
    this.ledger = deps.ledger;
    this.debts = deps.debts;
    this.health = deps.health;
    this.debtLedger = deps.debtLedger;
    this.custody = deps.custody;
    this.engineAccount = deps.engineAccount;
  }

  async deposit(uow: UnitOfWork, account: AccountId, asset: AssetId, amount: bigint): Promise<void> {
    requirePositive(amount, 'deposit amount');
    this.requireSupported(asset);

    this.ledger.credit(account, asset, amount, uow);
    uow.stage({ name: 'CollateralDeposited', payload: { account, asset, amount } });

    uow.defer({
      name: 'custody.transferIn',
      apply: () => expectSuccess(
        () => this.custody.transferIn(asset, account, amount),
        'TransferFailed',
        `custody transferIn of ${amount} ${asset} from ${account}`
      ),
      compensate: () => expectSuccess(
        () => this.custody.transferOut(asset, account, amount),
        'TransferFailed',
        `custody refund of ${amount} ${asset} to ${account}`
      )
    });
  }

  async mint(uow: UnitOfWork, account: AccountId, amount: bigint): Promise<void> {
    requirePositive(amount, 'mint amount');

    this.debts.increase(account, amount, uow);
    await this.health.assertSolvent(account, uow);

    uow.defer({
      name: 'debtLedger.mint',
      apply: () => expectSuccess(
        () => this.debtLedger.mint(account, amount),
        'MintFailed',
        `debt ledger mint of ${amount} to ${account}`
      )
    });
  }

  /**
   * Withdraw own collateral; solvency is checked after the withdrawal
   */
  async redeem(uow: UnitOfWork, account: AccountId, asset: AssetId, amount: bigint): Promise<void> {
    requirePositive(amount, 'redeem amount');

    this.redeemCollateral(uow, asset, amount, account, account);
    await this.health.assertSolvent(account, uow);
  }

  /**
   * Repay own debt with own synthetic value
   */
  async burn(uow: UnitOfWork, account: AccountId, amount: bigint): Promise<void> {
    requirePositive(amount, 'burn amount');

    this.burnDebt(uow, amount, account, account);
    await this.health.assertSolvent(account, uow);
  }

  /**
   * Move `amount` of `from`'s collateral to `to`. No solvency check: the
   * caller decides whose health factor has to hold afterwards.
   */
  redeemCollateral(uow: UnitOfWork, asset: AssetId, amount: bigint, from: AccountId, to: AccountId): void {
    this.requireSupported(asset);
    this.ledger.debit(from, asset, amount, uow);
    uow.stage({ name: 'CollateralRedeemed', payload: { from, to, amount, asset } });

    uow.defer({
      name: 'custody.transferOut',
      apply: () => expectSuccess(
        () => this.custody.transferOut(asset, to, amount),
        'TransferFailed',
        `custody transferOut of ${amount} ${asset} to ${to}`
      )
    });
  }

  /**
   * Reduce `onBehalfOf`'s debt by `amount`, paid with `payer`'s synthetic
   * value: pulled into the engine's account, then burnt there.
   */
  burnDebt(uow: UnitOfWork, amount: bigint, onBehalfOf: AccountId, payer: AccountId): void {
    this.debts.decrease(onBehalfOf, amount, uow);

    uow.defer({
      name: 'debtLedger.transferFrom',
      apply: () => expectSuccess(
        () => this.debtLedger.transferFrom(payer, this.engineAccount, amount),
        'TransferFailed',
        `debt ledger transferFrom of ${amount} from ${payer}`
      ),
      compensate: () => expectSuccess(
        () => this.debtLedger.transferFrom(this.engineAccount, payer, amount),
        'TransferFailed',
        `debt ledger refund of ${amount} to ${payer}`
      )
    });

    uow.defer({
      name: 'debtLedger.burn',
      apply: async () => {
        try {
          await this.debtLedger.burn(amount);
        } catch (error) {
          if (isEngineError(error)) throw error;
          throw new EngineError('BurnFailed', `debt ledger burn of ${amount} threw: ${describeError(error)}`, { cause: error });
        }
      },
      // Re-issue the burnt amount to the engine so the refund above can return it
      compensate: () => expectSuccess(
        () => this.debtLedger.mint(this.engineAccount, amount),
        'MintFailed',
        `debt ledger re-mint of ${amount} to engine`
      )
    });
  }

  private requireSupported(asset: AssetId): void {
    if (!this.registry.isSupported(asset)) {
      throw new EngineError('UnsupportedAsset', `${asset} is not an approved collateral asset`);
    }
  }
}
