export { NegRiskStrategy, DEFAULT_NEGRISK_CONFIG } from './negrisk.js';
export type { NegRiskConfig, NegRiskScan } from './negrisk.js';
export { BondStrategy, DEFAULT_BOND_CONFIG } from './bond.js';
export type { BondConfig, BondCheck } from './bond.js';
export { WhaleCopyExecutor, DEFAULT_WHALE_COPY_CONFIG } from './whale-copy.js';
export type { WhaleCopyConfig } from './whale-copy.js';
export { TemporalStrategy, DEFAULT_TEMPORAL_CONFIG } from './temporal.js';
export type { TemporalConfig, TemporalOpportunity, ReferencePriceSource } from './temporal.js';
export * from './indicators.js';
export { detectAsset, isFifteenMinuteMarket, isUpDownMarket } from './markets.js';
export type { Strategy, StrategyContext } from './types.js';
