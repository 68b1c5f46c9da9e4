/**
 * CollateralEngine: the public surface of the collateral/debt/liquidation core.
 *
 * Owns all balance state. Every mutating entry point:
 * 1. takes the process-wide reentrancy guard,
 * 2. runs its position/liquidation logic in a fresh UnitOfWork,
 * 3. applies the deferred collaborator effects,
 * 4. commits, or rolls everything back and rethrows,
 * 5. publishes the committed events once the guard is released.
 *
 * Read accessors see committed state only.
 *
 * Caller identity is always an explicit argument; nothing is inferred.
 */

import { EventEmitter } from 'events';

import { isEngineError } from '../errors/EngineError.js';
import {
  recordCompensationFailure,
  recordLiquidation,
  recordOperation,
  type EngineOperation
} from '../metrics/index.js';
import { CollateralLedger } from '../services/CollateralLedger.js';
import { CollateralRegistry } from '../services/CollateralRegistry.js';
import { DebtBook } from '../services/DebtBook.js';
import { engineLogger, type EngineLogger, type LogContext } from '../services/EngineLogger.js';
import { HealthCalculator, calculateHealthFactor } from '../services/HealthCalculator.js';
import { ValuationService } from '../services/ValuationService.js';
import type {
  AccountId,
  AccountSummary,
  AssetId,
  Custody,
  DebtLedger,
  EngineEventName,
  EngineEvents,
  LiquidationResult,
  PriceOracle,
  SeizureQuote,
  StagedEvent
} from '../types/index.js';
import { normalizeAddress } from '../utils/Address.js';

import { LiquidationEngine, type StageListener } from './LiquidationEngine.js';
import { PositionEngine } from './PositionEngine.js';
import { ReentrancyGuard } from './ReentrancyGuard.js';
import { UnitOfWork } from './UnitOfWork.js';

export interface CollateralEngineOptions {
  /** Approved collateral assets; must pair one-to-one with `priceOracles` */
  assets: readonly AssetId[];
  priceOracles: readonly PriceOracle[];
  debtLedger: DebtLedger;
  custody: Custody;
  engineAccount: AccountId;
  logger?: EngineLogger;
}

export interface LiquidateOptions {
  /** Observe the liquidation state machine, e.g. for tracing */
  onStage?: StageListener;
}

export class CollateralEngine {
  private readonly registry: CollateralRegistry;
  private readonly ledger = new CollateralLedger();
  private readonly debts = new DebtBook();
  private readonly valuation: ValuationService;
  private readonly health: HealthCalculator;
  private readonly positions: PositionEngine;
  private readonly liquidations: LiquidationEngine;
  private readonly guard = new ReentrancyGuard();
  private readonly emitter = new EventEmitter();
  private readonly logger: EngineLogger;

  /**
   * @throws EngineError ConfigurationMismatch when the asset and oracle lists differ in length
   */
  constructor(options: CollateralEngineOptions) {
    this.logger = options.logger ?? engineLogger;
    this.registry = new CollateralRegistry(options.assets, options.priceOracles);
    this.valuation = new ValuationService(this.registry);
    this.health = new HealthCalculator(this.registry, this.ledger, this.debts, this.valuation);
    this.positions = new PositionEngine({
      registry: this.registry,
      ledger: this.ledger,
      debts: this.debts,
      health: this.health,
      debtLedger: options.debtLedger,
      custody: options.custody,
      engineAccount: normalizeAddress(options.engineAccount)
    });
    this.liquidations = new LiquidationEngine(this.positions, this.health, this.valuation);
  }

  // ==== Events ====

  on<K extends EngineEventName>(event: K, listener: (payload: EngineEvents[K]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  off<K extends EngineEventName>(event: K, listener: (payload: EngineEvents[K]) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  // ==== Mutating entry points ====

  async deposit(account: AccountId, asset: AssetId, amount: bigint): Promise<void> {
    const who = normalizeAddress(account);
    const what = normalizeAddress(asset);
    await this.execute('deposit', { account: who, asset: what, amount }, (uow) =>
      this.positions.deposit(uow, who, what, amount)
    );
  }

  async mint(account: AccountId, amount: bigint): Promise<void> {
    const who = normalizeAddress(account);
    await this.execute('mint', { account: who, amount }, (uow) =>
      this.positions.mint(uow, who, amount)
    );
  }

  async redeem(account: AccountId, asset: AssetId, amount: bigint): Promise<void> {
    const who = normalizeAddress(account);
    const what = normalizeAddress(asset);
    await this.execute('redeem', { account: who, asset: what, amount }, (uow) =>
      this.positions.redeem(uow, who, what, amount)
    );
  }

  async burn(account: AccountId, amount: bigint): Promise<void> {
    const who = normalizeAddress(account);
    await this.execute('burn', { account: who, amount }, (uow) =>
      this.positions.burn(uow, who, amount)
    );
  }

  async depositAndMint(
    account: AccountId,
    asset: AssetId,
    collateralAmount: bigint,
    mintAmount: bigint
  ): Promise<void> {
    const who = normalizeAddress(account);
    const what = normalizeAddress(asset);
    const context = { account: who, asset: what, amount: collateralAmount, mintAmount };
    await this.execute('depositAndMint', context, async (uow) => {
      await this.positions.deposit(uow, who, what, collateralAmount);
      await this.positions.mint(uow, who, mintAmount);
    });
  }

  async redeemAndBurn(
    account: AccountId,
    asset: AssetId,
    collateralAmount: bigint,
    burnAmount: bigint
  ): Promise<void> {
    const who = normalizeAddress(account);
    const what = normalizeAddress(asset);
    const context = { account: who, asset: what, amount: collateralAmount, burnAmount };
    await this.execute('redeemAndBurn', context, async (uow) => {
      await this.positions.burn(uow, who, burnAmount);
      await this.positions.redeem(uow, who, what, collateralAmount);
    });
  }

  async liquidate(
    liquidator: AccountId,
    target: AccountId,
    asset: AssetId,
    debtToCover: bigint,
    options: LiquidateOptions = {}
  ): Promise<LiquidationResult> {
    const by = normalizeAddress(liquidator);
    const user = normalizeAddress(target);
    const what = normalizeAddress(asset);
    const context = { account: user, liquidator: by, asset: what, amount: debtToCover };

    const result = await this.execute('liquidate', context, (uow) =>
      this.liquidations.liquidate(uow, by, user, what, debtToCover, options.onStage)
    );

    recordLiquidation(what);
    this.logger.liquidated(result);
    return result;
  }

  // ==== Read accessors (never mutate) ====

  async healthFactor(account: AccountId): Promise<bigint> {
    return this.health.healthFactor(normalizeAddress(account));
  }

  async accountSummary(account: AccountId): Promise<AccountSummary> {
    return this.health.accountSummary(normalizeAddress(account));
  }

  async totalCollateralValue(account: AccountId): Promise<bigint> {
    return this.health.totalCollateralValue(normalizeAddress(account));
  }

  async usdValue(asset: AssetId, amount: bigint): Promise<bigint> {
    return this.valuation.usdValue(normalizeAddress(asset), amount);
  }

  async tokenAmountForUsd(asset: AssetId, usdAmount: bigint): Promise<bigint> {
    return this.valuation.assetAmountForValue(normalizeAddress(asset), usdAmount);
  }

  async computeSeizure(asset: AssetId, debtToCover: bigint): Promise<SeizureQuote> {
    return this.liquidations.computeSeizure(normalizeAddress(asset), debtToCover);
  }

  calculateHealthFactor(debt: bigint, collateralValue: bigint): bigint {
    return calculateHealthFactor(debt, collateralValue);
  }

  collateralBalanceOf(account: AccountId, asset: AssetId): bigint {
    return this.ledger.balanceOf(normalizeAddress(account), normalizeAddress(asset));
  }

  debtOf(account: AccountId): bigint {
    return this.debts.debtOf(normalizeAddress(account));
  }

  collateralAssets(): AssetId[] {
    return this.registry.assets;
  }

  priceOracleOf(asset: AssetId): PriceOracle {
    return this.registry.oracleOf(normalizeAddress(asset));
  }

  get isBusy(): boolean {
    return this.guard.isHeld;
  }

  // ==== Internals ====

  private async execute<T>(
    operation: EngineOperation,
    context: LogContext,
    work: (uow: UnitOfWork) => Promise<T>
  ): Promise<T> {
    const started = Date.now();
    let committed: { result: T; events: StagedEvent[] };

    try {
      committed = await this.guard.run(operation, () => this.transact(operation, context, work));
    } catch (error) {
      recordOperation(operation, (Date.now() - started) / 1000, isEngineError(error) ? error.code : 'Unknown');
      this.logger.rejected(operation, error, context);
      throw error;
    }

    recordOperation(operation, (Date.now() - started) / 1000);
    this.logger.accepted(operation, context);
    this.publish(committed.events);
    return committed.result;
  }

  private async transact<T>(
    operation: EngineOperation,
    context: LogContext,
    work: (uow: UnitOfWork) => Promise<T>
  ): Promise<{ result: T; events: StagedEvent[] }> {
    const uow = new UnitOfWork(({ effect, error }) => {
      recordCompensationFailure(effect);
      this.logger.compensationFailed(effect, error, { operation, ...context });
    });

    try {
      const result = await work(uow);
      await uow.settle();
      return { result, events: uow.commit() };
    } catch (error) {
      uow.rollback();
      throw error;
    }
  }

  private publish(events: StagedEvent[]): void {
    for (const event of events) {
      try {
        this.emitter.emit(event.name, event.payload);
      } catch (error) {
        // Already committed; listener faults are only logged
        this.logger.error('Event listener threw', { event: event.name, error });
      }
    }
  }
}
