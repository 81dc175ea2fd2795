/**
 * Position Sizing
 *
 * Per-strategy position size as a share of the current balance.
 * Whale-copy tiers are fixed percentages or derived once from half-Kelly.
 */

import type { ConfidenceTier } from './types.js';

export type WhaleSizingMode = 'FIXED' | 'KELLY';

export interface WhaleSizingConfig {
  mode: WhaleSizingMode;
  kellyFraction: number;         // 0.5 = half-Kelly
  defaultWinRate: number;
  representativePrice: number;
  kellyCapPct: number;           // Ceiling on the derived STRONG tier
  fixedTiers: Record<ConfidenceTier, number>;
}

export interface SizingConfig {
  negRiskMaxPct: number;
  bondDefaultPct: number;
  bondMaxPct: number;
  temporalDefaultPct: number;
  temporalMaxPct: number;
  whale: WhaleSizingConfig;
}

export const DEFAULT_SIZING_CONFIG: SizingConfig = {
  negRiskMaxPct: 0.10,
  bondDefaultPct: 0.02,
  bondMaxPct: 0.05,
  temporalDefaultPct: 0.01,
  temporalMaxPct: 0.03,
  whale: {
    mode: 'KELLY',
    kellyFraction: 0.5,
    defaultWinRate: 0.60,
    representativePrice: 0.50,
    kellyCapPct: 0.10,
    fixedTiers: { STRONG: 0.05, HIGH: 0.03, MEDIUM: 0.02 },
  },
};

// HIGH and MEDIUM as a share of STRONG, matching the 5/3/2 fixed tiers
const HIGH_RATIO = 0.6;
const MEDIUM_RATIO = 0.4;

const WARNING_MULTIPLIERS = [1.0, 0.5, 0.25];

/**
 * Full Kelly fraction for a binary contract bought at `price`
 */
export function kellyFraction(winRate: number, price: number): number {
  if (price <= 0 || price >= 1) return 0;
  return (winRate - price) / (1 - price);
}

/**
 * Size multiplier for the number of indicator warnings (0 at 3 or more)
 */
export function indicatorMultiplier(warnings: number): number {
  if (warnings < 0) return 1.0;
  return WARNING_MULTIPLIERS[warnings] ?? 0;
}

/**
 * True when the live price drifted from the signal price beyond the bound
 */
export function exceedsSlippage(signalPrice: number, livePrice: number, bound: number): boolean {
  if (signalPrice <= 0) return true;
  return Math.abs(livePrice - signalPrice) / signalPrice > bound;
}

export function whaleTierPercents(config: WhaleSizingConfig): Record<ConfidenceTier, number> {
  if (config.mode === 'FIXED') {
    return { ...config.fixedTiers };
  }

  const kelly = kellyFraction(config.defaultWinRate, config.representativePrice);
  if (kelly <= 0) {
    return { STRONG: 0, HIGH: 0, MEDIUM: 0 };
  }

  const strong = Math.min(kelly * config.kellyFraction, config.kellyCapPct);
  return {
    STRONG: strong,
    HIGH: strong * HIGH_RATIO,
    MEDIUM: strong * MEDIUM_RATIO,
  };
}

export class PositionSizer {
  private config: SizingConfig;
  private tiers: Record<ConfidenceTier, number>;

  constructor(config: SizingConfig = DEFAULT_SIZING_CONFIG) {
    this.config = config;
    // Derived once at startup
    this.tiers = whaleTierPercents(config.whale);
  }

  getWhaleTiers(): Record<ConfidenceTier, number> {
    return { ...this.tiers };
  }

  /**
   * Whole multi-leg sets affordable within the position cap
   */
  negRiskSets(balance: number, totalLegCost: number): number {
    if (totalLegCost <= 0 || balance <= 0) return 0;
    const budget = Math.min(balance * this.config.negRiskMaxPct, balance);
    return Math.floor(budget / totalLegCost);
  }

  bond(balance: number): number {
    if (balance <= 0) return 0;
    return Math.min(this.config.bondDefaultPct, this.config.bondMaxPct) * balance;
  }

  whaleCopy(balance: number, tier: ConfidenceTier, warnings: number): number {
    if (balance <= 0) return 0;
    return balance * this.tiers[tier] * indicatorMultiplier(warnings);
  }

  temporal(balance: number): number {
    if (balance <= 0) return 0;
    return Math.min(this.config.temporalDefaultPct, this.config.temporalMaxPct) * balance;
  }
}
