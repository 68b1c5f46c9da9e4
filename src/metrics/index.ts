import { Counter, Histogram } from 'prom-client';

import { config } from '../config/index.js';
import type { EngineErrorCode } from '../errors/EngineError.js';

import { metricsRegistry } from './registry.js';

// Re-export the central registry
export { metricsRegistry as registry };

export type EngineOperation =
  | 'deposit'
  | 'mint'
  | 'redeem'
  | 'burn'
  | 'depositAndMint'
  | 'redeemAndBurn'
  | 'liquidate';

export const operationsTotal = new Counter({
  name: 'collateral_engine_operations_total',
  help: 'Mutating engine operations by outcome',
  labelNames: ['operation', 'outcome'],
  registers: [metricsRegistry]
});

export const operationFailuresTotal = new Counter({
  name: 'collateral_engine_operation_failures_total',
  help: 'Rejected engine operations by error code',
  labelNames: ['operation', 'code'],
  registers: [metricsRegistry]
});

export const operationDuration = new Histogram({
  name: 'collateral_engine_operation_duration_seconds',
  help: 'Wall time of mutating engine operations, collaborator calls included',
  labelNames: ['operation'],
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5],
  registers: [metricsRegistry]
});

export const liquidationsTotal = new Counter({
  name: 'collateral_engine_liquidations_total',
  help: 'Completed liquidations by collateral asset',
  labelNames: ['asset'],
  registers: [metricsRegistry]
});

export const compensationFailuresTotal = new Counter({
  name: 'collateral_engine_compensation_failures_total',
  help: 'Collaborator effects that could not be reversed during rollback',
  labelNames: ['effect'],
  registers: [metricsRegistry]
});

/**
 * Record the outcome of one mutating operation
 */
export function recordOperation(
  operation: EngineOperation,
  durationSeconds: number,
  failureCode?: EngineErrorCode | 'Unknown'
): void {
  if (!config.metricsEnabled) return;

  operationDuration.observe({ operation }, durationSeconds);
  if (failureCode === undefined) {
    operationsTotal.inc({ operation, outcome: 'accepted' });
    return;
  }
  operationsTotal.inc({ operation, outcome: 'rejected' });
  operationFailuresTotal.inc({ operation, code: failureCode });
}

export function recordLiquidation(asset: string): void {
  if (!config.metricsEnabled) return;
  liquidationsTotal.inc({ asset });
}

export function recordCompensationFailure(effect: string): void {
  if (!config.metricsEnabled) return;
  compensationFailuresTotal.inc({ effect });
}
