/**
 * Bot Configuration
 *
 * Every tunable with its default. A handful can be overridden through the
 * environment (see .env.example); malformed values abort startup.
 */

import { z } from 'zod';
import { DEFAULT_LEDGER_CONFIG, type FundLedgerConfig } from './engine/fund-ledger.js';
import { DEFAULT_TRADE_STORE_CONFIG, type TradeStoreConfig } from './engine/trade-store.js';
import { DEFAULT_SIZING_CONFIG, type SizingConfig } from './engine/sizing.js';
import { validationError, type ValidationError } from './engine/errors.js';
import { ok, err, type Result } from './engine/result.js';
import { DEFAULT_TIMEOUT_MS } from './ingestion/http.js';
import { DEFAULT_CONVERGENCE_CONFIG, type ConvergenceConfig } from './signals/types.js';
import { DEFAULT_VETTING_CONFIG, type WhaleVettingConfig } from './ingestion/whales/registry.js';
import { DEFAULT_MONITOR_CONFIG, type WhaleMonitorConfig } from './ingestion/whales/monitor.js';
import { DEFAULT_NEGRISK_CONFIG, type NegRiskConfig } from './strategies/negrisk.js';
import { DEFAULT_BOND_CONFIG, type BondConfig } from './strategies/bond.js';
import { DEFAULT_WHALE_COPY_CONFIG, type WhaleCopyConfig } from './strategies/whale-copy.js';
import { DEFAULT_TEMPORAL_CONFIG, type TemporalConfig } from './strategies/temporal.js';

export interface IntervalConfig {
  negRiskMs: number;
  bondMs: number;
  whaleDiscoveryMs: number;
  whaleMonitorMs: number;
  temporalMs: number;
  settlementMs: number;
  statusMs: number;
}

export interface StrategySwitches {
  negRisk: boolean;
  bond: boolean;
  whale: boolean;
  temporal: boolean;
}

export interface BotConfig {
  databasePath: string | undefined;
  startingFund: number | null;
  requestTimeoutMs: number;
  streamEnabled: boolean;
  enabled: StrategySwitches;
  intervals: IntervalConfig;
  ledger: FundLedgerConfig;
  tradeStore: TradeStoreConfig;
  sizing: SizingConfig;
  convergence: ConvergenceConfig;
  vetting: WhaleVettingConfig;
  monitor: WhaleMonitorConfig;
  negRisk: NegRiskConfig;
  bond: BondConfig;
  whaleCopy: WhaleCopyConfig;
  temporal: TemporalConfig;
}

export const DEFAULT_CONFIG: BotConfig = {
  databasePath: undefined,
  startingFund: null,
  requestTimeoutMs: DEFAULT_TIMEOUT_MS,
  streamEnabled: true,
  enabled: {
    negRisk: true,
    bond: true,
    whale: true,
    temporal: false,
  },
  intervals: {
    negRiskMs: 30 * 1000,
    bondMs: 15 * 1000,
    whaleDiscoveryMs: 1800 * 1000,
    whaleMonitorMs: 12 * 1000,
    temporalMs: 1000,
    settlementMs: 5 * 1000,
    statusMs: 30 * 1000,
  },
  ledger: DEFAULT_LEDGER_CONFIG,
  tradeStore: DEFAULT_TRADE_STORE_CONFIG,
  sizing: DEFAULT_SIZING_CONFIG,
  convergence: DEFAULT_CONVERGENCE_CONFIG,
  vetting: DEFAULT_VETTING_CONFIG,
  monitor: DEFAULT_MONITOR_CONFIG,
  negRisk: DEFAULT_NEGRISK_CONFIG,
  bond: DEFAULT_BOND_CONFIG,
  whaleCopy: DEFAULT_WHALE_COPY_CONFIG,
  temporal: DEFAULT_TEMPORAL_CONFIG,
};

// Unset and empty variables both mean "use the default"
const blankToUndefined = (value: unknown) => (value === '' ? undefined : value);

const optionalNumber = (schema: z.ZodNumber) =>
  z.preprocess(blankToUndefined, schema.optional());

const optionalFlag = () =>
  z.preprocess(
    blankToUndefined,
    z.enum(['true', 'false']).transform(value => value === 'true').optional()
  );

const EnvSchema = z.object({
  STARTING_FUND: optionalNumber(z.coerce.number().finite()),
  DATABASE_PATH: z.preprocess(blankToUndefined, z.string().optional()),
  REQUEST_TIMEOUT_MS: optionalNumber(z.coerce.number().int().positive()),
  MARKET_STREAM_ENABLED: optionalFlag(),
  NEGRISK_ENABLED: optionalFlag(),
  BOND_ENABLED: optionalFlag(),
  WHALE_ENABLED: optionalFlag(),
  TEMPORAL_ENABLED: optionalFlag(),
  NEGRISK_SCAN_INTERVAL: optionalNumber(z.coerce.number().positive()),
  BOND_SCAN_INTERVAL: optionalNumber(z.coerce.number().positive()),
  WHALE_DISCOVERY_INTERVAL: optionalNumber(z.coerce.number().positive()),
  WHALE_MONITOR_INTERVAL: optionalNumber(z.coerce.number().positive()),
  TEMPORAL_SCAN_INTERVAL: optionalNumber(z.coerce.number().positive()),
  SETTLEMENT_INTERVAL: optionalNumber(z.coerce.number().positive()),
  WHALE_SIZING_MODE: z.preprocess(blankToUndefined, z.enum(['KELLY', 'FIXED']).optional()),
  DAILY_CAP_PCT: optionalNumber(z.coerce.number().gt(0).max(1)),
});

type Env = z.infer<typeof EnvSchema>;

const seconds = (value: number | undefined, fallbackMs: number): number =>
  value === undefined ? fallbackMs : value * 1000;

/**
 * Build the config from environment variables over DEFAULT_CONFIG
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  base: BotConfig = DEFAULT_CONFIG
): Result<BotConfig, ValidationError> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    return err(validationError('environment', issues));
  }

  return ok(applyEnv(parsed.data, base));
}

function applyEnv(env: Env, base: BotConfig): BotConfig {
  const intervals = base.intervals;

  return {
    ...base,
    databasePath: env.DATABASE_PATH ?? base.databasePath,
    startingFund: env.STARTING_FUND ?? base.startingFund,
    requestTimeoutMs: env.REQUEST_TIMEOUT_MS ?? base.requestTimeoutMs,
    streamEnabled: env.MARKET_STREAM_ENABLED ?? base.streamEnabled,
    enabled: {
      negRisk: env.NEGRISK_ENABLED ?? base.enabled.negRisk,
      bond: env.BOND_ENABLED ?? base.enabled.bond,
      whale: env.WHALE_ENABLED ?? base.enabled.whale,
      temporal: env.TEMPORAL_ENABLED ?? base.enabled.temporal,
    },
    intervals: {
      ...intervals,
      negRiskMs: seconds(env.NEGRISK_SCAN_INTERVAL, intervals.negRiskMs),
      bondMs: seconds(env.BOND_SCAN_INTERVAL, intervals.bondMs),
      whaleDiscoveryMs: seconds(env.WHALE_DISCOVERY_INTERVAL, intervals.whaleDiscoveryMs),
      whaleMonitorMs: seconds(env.WHALE_MONITOR_INTERVAL, intervals.whaleMonitorMs),
      temporalMs: seconds(env.TEMPORAL_SCAN_INTERVAL, intervals.temporalMs),
      settlementMs: seconds(env.SETTLEMENT_INTERVAL, intervals.settlementMs),
    },
    tradeStore: {
      ...base.tradeStore,
      dailyCapPct: env.DAILY_CAP_PCT ?? base.tradeStore.dailyCapPct,
    },
    sizing: {
      ...base.sizing,
      whale: {
        ...base.sizing.whale,
        mode: env.WHALE_SIZING_MODE ?? base.sizing.whale.mode,
      },
    },
  };
}
