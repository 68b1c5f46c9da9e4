// Public API of the collateral engine

export { CollateralEngine } from './engine/CollateralEngine.js';
export type { CollateralEngineOptions, LiquidateOptions } from './engine/CollateralEngine.js';
export type { StageListener } from './engine/LiquidationEngine.js';
export {
  PRECISION,
  ADDITIONAL_FEED_PRECISION,
  FEED_DECIMALS,
  LIQUIDATION_THRESHOLD,
  LIQUIDATION_PRECISION,
  LIQUIDATION_BONUS,
  MIN_HEALTH_FACTOR,
  MAX_UINT256
} from './engine/constants.js';
export { calculateHealthFactor } from './services/HealthCalculator.js';
export { EngineError, isEngineError } from './errors/EngineError.js';
export type { EngineErrorCode } from './errors/EngineError.js';
export { EngineLogger, engineLogger } from './services/EngineLogger.js';
export { registry as metricsRegistry } from './metrics/index.js';
export { collateralSetupFromConfig, ChainlinkPriceOracle, AggregatorContractFeed } from './oracle/index.js';
export type { CollateralSetup, AggregatorFeed, RoundData } from './oracle/index.js';
export { config } from './config/index.js';
export type * from './types/index.js';
