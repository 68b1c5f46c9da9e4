import dotenv from 'dotenv';

import { buildEnv } from './envSchema.js';

dotenv.config();

const env = buildEnv(process.env);

export const config = {
  get nodeEnv() { return env.nodeEnv; },
  get isTest() { return env.nodeEnv.toLowerCase() === 'test'; },

  // Logging
  get logLevel() { return env.logLevel; },
  get logFileEnabled() { return env.logFileEnabled; },
  get logFileRetentionHours() { return env.logFileRetentionHours; },

  // Oracle
  get priceStalenessSec() { return env.priceStalenessSec; },
  get chainlinkRpcUrl() { return env.chainlinkRpcUrl; },
  get collateralFeeds() { return env.collateralFeeds; },

  get addressNormalizeLowercase() { return env.addressNormalizeLowercase; },
  get metricsEnabled() { return env.metricsEnabled; }
};

export type { EngineEnv, LogLevel } from './envSchema.js';
