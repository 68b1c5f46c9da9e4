// EngineLogger: Structured logging for engine operations
// Provides consistent log format with outcome, error code and position context

import { mkdirSync } from 'fs';
import { join } from 'path';

import { createLogger, format, transports, type Logger } from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

import { config } from '../config/index.js';
import { describeError, isEngineError } from '../errors/EngineError.js';
import type { EngineOperation } from '../metrics/index.js';
import type { LiquidationResult } from '../types/index.js';
import { formatFixed } from '../utils/bigint.js';

export interface LogContext {
  account?: string;
  asset?: string;
  amount?: bigint;
  healthFactor?: bigint;
  [key: string]: unknown;
}

/**
 * bigint is not JSON serializable; render it as a decimal string
 */
function toLoggable(context: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    if (value === undefined) continue;
    out[key] = typeof value === 'bigint' ? value.toString() : value;
  }
  return out;
}

type EngineTransport = InstanceType<typeof transports.Console> | DailyRotateFile;

function buildTransports(): EngineTransport[] {
  const loggerTransports: EngineTransport[] = [
    new transports.Console({
      format: format.combine(
        format.colorize(),
        format.printf(({ timestamp, level, message, ...meta }) => {
          const metaStr = Object.keys(meta).length > 0
            ? ` ${JSON.stringify(meta)}`
            : '';
          return `${String(timestamp)} [${level}] ${String(message)}${metaStr}`;
        })
      )
    })
  ];

  if (config.logFileEnabled) {
    const logsDir = join(process.cwd(), 'logs');
    mkdirSync(logsDir, { recursive: true });

    // winston-daily-rotate-file takes 'Nh' and 'Nd' retention specs
    const retentionHours = config.logFileRetentionHours;
    const retentionSpec = retentionHours >= 24
      ? `${Math.floor(retentionHours / 24)}d`
      : `${retentionHours}h`;

    loggerTransports.push(new DailyRotateFile({
      filename: join(logsDir, 'engine-%DATE%.log'),
      datePattern: 'YYYY-MM-DD-HH',
      maxSize: '50m',
      maxFiles: retentionSpec,
      format: format.combine(format.timestamp(), format.json()),
      auditFile: join(logsDir, '.audit.json')
    }));
  }

  return loggerTransports;
}

/**
 * EngineLogger wraps a winston logger with the engine's operation vocabulary
 */
export class EngineLogger {
  private logger: Logger;

  constructor(level: string = 'info', silent: boolean = false) {
    this.logger = createLogger({
      level,
      silent,
      format: format.combine(
        format.timestamp(),
        format.errors({ stack: true }),
        format.json()
      ),
      transports: buildTransports()
    });
  }

  /**
   * Log a mutating operation that committed
   */
  accepted(operation: EngineOperation, context: LogContext): void {
    this.logger.info('Operation accepted', toLoggable({
      operation,
      ...context,
      healthFactor: context.healthFactor !== undefined ? formatFixed(context.healthFactor) : undefined
    }));
  }

  /**
   * Log a mutating operation that was rolled back
   */
  rejected(operation: EngineOperation, error: unknown, context: LogContext): void {
    const code = isEngineError(error) ? error.code : 'Unknown';
    const healthFactor = isEngineError(error) ? error.healthFactor : undefined;

    // Expected business rejections are warn; anything untyped is an error
    const level = isEngineError(error) ? 'warn' : 'error';
    this.logger.log(level, 'Operation rejected', toLoggable({
      operation,
      code,
      reason: describeError(error),
      ...context,
      healthFactor: healthFactor !== undefined ? formatFixed(healthFactor) : undefined
    }));
  }

  liquidated(result: LiquidationResult): void {
    this.logger.info('Position liquidated', toLoggable({
      operation: 'liquidate',
      target: result.target,
      liquidator: result.liquidator,
      asset: result.asset,
      debtCovered: result.debtCovered,
      totalSeized: result.totalSeized,
      bonus: result.bonus,
      startingHealthFactor: formatFixed(result.startingHealthFactor),
      endingHealthFactor: formatFixed(result.endingHealthFactor)
    }));
  }

  /**
   * A collaborator effect could not be reversed; the ledger and the
   * collaborator now disagree and need manual reconciliation
   */
  compensationFailed(effect: string, error: unknown, context: LogContext = {}): void {
    this.logger.error('Rollback compensation failed', toLoggable({
      effect,
      reason: describeError(error),
      ...context
    }));
  }

  error(message: string, context: LogContext & { error?: unknown } = {}): void {
    const { error, ...ctx } = context;
    this.logger.error(message, toLoggable({
      ...ctx,
      error: error instanceof Error
        ? { message: error.message, stack: error.stack }
        : error !== undefined ? String(error) : undefined
    }));
  }

  warn(message: string, context: LogContext = {}): void {
    this.logger.warn(message, toLoggable(context));
  }

  debug(message: string, context: LogContext = {}): void {
    this.logger.debug(message, toLoggable(context));
  }
}

// Singleton instance; quiet under the test runner
export const engineLogger = new EngineLogger(config.logLevel, config.isTest);
