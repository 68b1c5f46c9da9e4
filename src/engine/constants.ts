import { MaxUint256 } from 'ethers';

/** Fixed-point scale shared by values, prices and health factors */
export const PRECISION = 10n ** 18n;

/** Lifts an 8-decimal USD feed answer to the 18-decimal PRECISION scale */
export const ADDITIONAL_FEED_PRECISION = 10n ** 10n;

/** Native decimals of the USD feeds the engine consumes */
export const FEED_DECIMALS = 8;

/** Share of collateral value that counts toward solvency (50 / 100 = 200% overcollateralization) */
export const LIQUIDATION_THRESHOLD = 50n;
export const LIQUIDATION_PRECISION = 100n;

/** Extra collateral paid to a liquidator, over LIQUIDATION_PRECISION (10%) */
export const LIQUIDATION_BONUS = 10n;

export const MIN_HEALTH_FACTOR = PRECISION;

/** Upper bound of every balance and product; also the zero-debt health factor */
export const MAX_UINT256 = MaxUint256;
