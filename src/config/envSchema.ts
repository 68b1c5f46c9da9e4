import { z } from 'zod';

import { getEnvString, parseBoolEnv, parseIntEnv, parsePairListEnv } from './parseEnv.js';

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export const rawEnvSchema = z.object({
  NODE_ENV: z.string().optional(),

  // Logging
  LOG_LEVEL: z.string().optional(),
  LOG_FILE_ENABLED: z.string().optional(),
  LOG_FILE_RETENTION_HOURS: z.string().optional(),

  // Oracle
  PRICE_STALENESS_SEC: z.string().optional(),
  CHAINLINK_RPC_URL: z.string().optional(),
  COLLATERAL_FEEDS: z.string().optional(),

  // Identities
  ADDRESS_NORMALIZE_LOWERCASE: z.string().optional(),

  // Metrics
  METRICS_ENABLED: z.string().optional()
});

const logLevelSchema = z.enum(LOG_LEVELS);

export type LogLevel = z.infer<typeof logLevelSchema>;

export interface EngineEnv {
  nodeEnv: string;
  logLevel: LogLevel;
  logFileEnabled: boolean;
  logFileRetentionHours: number;
  priceStalenessSec: number;
  chainlinkRpcUrl: string | undefined;
  collateralFeeds: Map<string, string>;
  addressNormalizeLowercase: boolean;
  metricsEnabled: boolean;
}

/**
 * Build the typed environment from a raw source (defaults to process.env).
 * Exposed separately from `env` so tests can parse arbitrary inputs.
 */
export function buildEnv(source: NodeJS.ProcessEnv): EngineEnv {
  const parsed = rawEnvSchema.parse(source);

  const level = logLevelSchema.safeParse((parsed.LOG_LEVEL || 'info').toLowerCase().trim());

  return {
    nodeEnv: parsed.NODE_ENV || 'development',
    logLevel: level.success ? level.data : 'info',
    logFileEnabled: parseBoolEnv(parsed.LOG_FILE_ENABLED, false),
    logFileRetentionHours: parseIntEnv(parsed.LOG_FILE_RETENTION_HOURS, 24, 1, 24 * 30),

    // 3 hours covers the slowest USD feed heartbeats
    priceStalenessSec: parseIntEnv(parsed.PRICE_STALENESS_SEC, 10800, 1),
    chainlinkRpcUrl: getEnvString(parsed.CHAINLINK_RPC_URL),
    collateralFeeds: parsePairListEnv(parsed.COLLATERAL_FEEDS),

    addressNormalizeLowercase: parseBoolEnv(parsed.ADDRESS_NORMALIZE_LOWERCASE, true),
    metricsEnabled: parseBoolEnv(parsed.METRICS_ENABLED, true)
  };
}
