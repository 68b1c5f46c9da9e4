/**
 * EngineError: the single failure type surfaced by the collateral engine.
 *
 * Every failure is local, synchronous to the caller and non-retryable. The
 * operation that produced it has already been rolled back when it is thrown.
 */

export type EngineErrorCode =
  | 'InvalidAmount'
  | 'UnsupportedAsset'
  | 'InsufficientCollateral'
  | 'InsufficientDebt'
  | 'TransferFailed'
  | 'MintFailed'
  | 'BurnFailed'
  | 'BreaksHealthFactor'
  | 'HealthFactorOk'
  | 'HealthFactorNotImproved'
  | 'PriceUnavailable'
  | 'ConfigurationMismatch'
  | 'Reentrancy'
  | 'MathOverflow';

export interface EngineErrorOptions {
  /** Health factor observed when the failure was raised (1e18 scale) */
  healthFactor?: bigint;
  cause?: unknown;
}

export class EngineError extends Error {
  public readonly healthFactor?: bigint;

  constructor(
    public readonly code: EngineErrorCode,
    message: string,
    options: EngineErrorOptions = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'EngineError';
    this.healthFactor = options.healthFactor;
  }
}

/**
 * Type guard, optionally narrowed to a single code
 */
export function isEngineError(error: unknown, code?: EngineErrorCode): error is EngineError {
  if (!(error instanceof EngineError)) return false;
  return code === undefined || error.code === code;
}

/**
 * Extract a printable message from anything thrown by a collaborator
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
