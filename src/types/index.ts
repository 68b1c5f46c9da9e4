// Type definitions for the collateral engine and its collaborators

export type AccountId = string;
export type AssetId = string;

// ==== Collaborators ====

export interface PriceReading {
  /** Raw USD price at the feed's native 8 decimals */
  price: bigint;
  /** False when the feed cannot vouch for the answer (stale, incomplete round) */
  valid: boolean;
}

export interface PriceOracle {
  latestPrice(asset: AssetId): Promise<PriceReading>;
}

/**
 * Ledger of the synthetic value unit. The engine is its only minter and
 * burns only tokens it holds itself.
 */
export interface DebtLedger {
  mint(account: AccountId, amount: bigint): Promise<boolean>;
  burn(amount: bigint): Promise<void>;
  transferFrom(holder: AccountId, recipient: AccountId, amount: bigint): Promise<boolean>;
}

export interface Custody {
  transferIn(asset: AssetId, from: AccountId, amount: bigint): Promise<boolean>;
  transferOut(asset: AssetId, to: AccountId, amount: bigint): Promise<boolean>;
}

// ==== Events ====

export interface CollateralDepositedEvent {
  account: AccountId;
  asset: AssetId;
  amount: bigint;
}

export interface CollateralRedeemedEvent {
  from: AccountId;
  to: AccountId;
  amount: bigint;
  asset: AssetId;
}

export interface EngineEvents {
  CollateralDeposited: CollateralDepositedEvent;
  CollateralRedeemed: CollateralRedeemedEvent;
}

export type EngineEventName = keyof EngineEvents;

export type StagedEvent = {
  [K in EngineEventName]: { name: K; payload: EngineEvents[K] };
}[EngineEventName];

// ==== Read models ====

export interface AccountSummary {
  debt: bigint;
  collateralValue: bigint;
}

export interface SeizureQuote {
  baseAmount: bigint;
  bonus: bigint;
  totalSeized: bigint;
}

export interface LiquidationResult extends SeizureQuote {
  target: AccountId;
  liquidator: AccountId;
  asset: AssetId;
  debtCovered: bigint;
  startingHealthFactor: bigint;
  endingHealthFactor: bigint;
}

export type LiquidationStage =
  | 'eligibility'
  | 'computing'
  | 'seizing'
  | 'burning'
  | 'verifying'
  | 'done'
  | 'aborted';
