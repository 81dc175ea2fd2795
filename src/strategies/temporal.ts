/**
 * Temporal Mispricing
 *
 * Short "Up or Down" BTC markets lag the spot price. Close to expiry, when
 * spot has already moved decisively from the window's reference price but the
 * expected winner still trades cheaply, buy the winner.
 */

import type { Strategy, StrategyContext } from './types.js';
import type { MarketDiscovery, MarketInfo, PriceSource, SpotPriceSource } from '../ingestion/types.js';
import type { OutcomeSide } from '../engine/types.js';
import type { Clock } from '../engine/clock.js';
import { describeError } from '../engine/errors.js';
import { detectAsset, isFifteenMinuteMarket, isUpDownMarket } from './markets.js';

/**
 * Price of the asset when the market's window opened
 */
export interface ReferencePriceSource {
  getReferencePrice(market: MarketInfo): Promise<number | null>;
}

export interface TemporalConfig {
  asset: string;
  minMovePct: number;
  minMispricingPct: number;
  maxTimeRemainingMs: number;
  maxEntryPrice: number;       // Winner already priced above this is no longer lagging
  fairValue: number;           // Where the winner should trade this close to expiry
  marketTag: string;
}

export const DEFAULT_TEMPORAL_CONFIG: TemporalConfig = {
  asset: 'BTC',
  minMovePct: 0.02,
  minMispricingPct: 0.10,
  maxTimeRemainingMs: 600 * 1000,
  maxEntryPrice: 0.70,
  fairValue: 0.90,
  marketTag: 'crypto',
};

export interface TemporalOpportunity {
  market: MarketInfo;
  side: OutcomeSide;
  price: number;
  movePct: number;
  mispricingPct: number;
  timeRemainingMs: number;
}

export class TemporalStrategy implements Strategy {
  readonly id = 'TEMPORAL_ARB' as const;
  readonly name = 'Temporal';

  private ctx: StrategyContext;
  private discovery: MarketDiscovery;
  private prices: PriceSource;
  private spot: SpotPriceSource;
  private reference: ReferencePriceSource | null;
  private config: TemporalConfig;
  private now: Clock;

  constructor(
    ctx: StrategyContext,
    discovery: MarketDiscovery,
    prices: PriceSource,
    spot: SpotPriceSource,
    reference: ReferencePriceSource | null,
    config: Partial<TemporalConfig> = {},
    now: Clock = Date.now
  ) {
    this.ctx = ctx;
    this.discovery = discovery;
    this.prices = prices;
    this.spot = spot;
    this.reference = reference;
    this.config = { ...DEFAULT_TEMPORAL_CONFIG, ...config };
    this.now = now;
  }

  async runCycle(): Promise<void> {
    if (!this.reference) return;

    const spot = await this.spot.getSpotPrice(this.config.asset);
    if (!spot.ok) {
      this.ctx.log.warn(this.name, `Spot price unavailable: ${describeError(spot.error)}`);
      return;
    }

    const markets = await this.discovery.listActiveMarkets({ tag: this.config.marketTag });
    if (!markets.ok) {
      this.ctx.log.warn(this.name, `Market scan failed: ${describeError(markets.error)}`);
      return;
    }

    const held = new Set(this.ctx.store.getOpenByStrategy(this.id).map(record => record.marketId));
    for (const market of markets.value) {
      if (!this.isCandidate(market) || held.has(market.marketId)) continue;

      const opportunity = await this.evaluate(market, spot.value);
      if (opportunity) this.execute(opportunity);
    }
  }

  isCandidate(market: MarketInfo): boolean {
    return (
      isFifteenMinuteMarket(market.question) &&
      isUpDownMarket(market.question) &&
      detectAsset(market.question) === this.config.asset
    );
  }

  async evaluate(market: MarketInfo, spotPrice: number): Promise<TemporalOpportunity | null> {
    if (!this.reference || market.endTime === null) return null;

    const timeRemainingMs = market.endTime - this.now();
    if (timeRemainingMs <= 0 || timeRemainingMs > this.config.maxTimeRemainingMs) return null;

    const referencePrice = await this.reference.getReferencePrice(market);
    if (referencePrice === null || referencePrice <= 0) return null;

    const movePct = (spotPrice - referencePrice) / referencePrice;
    if (Math.abs(movePct) < this.config.minMovePct) return null;

    // Each side is quoted from its own token's book
    const side: OutcomeSide = movePct > 0 ? 'YES' : 'NO';
    const tokenId = market.tokenIds[side === 'YES' ? 0 : 1];
    if (!tokenId) return null;
    const quote = await this.prices.getPrice(tokenId);
    if (!quote.ok) return null;

    const price = quote.value.yes;
    if (price <= 0 || price >= this.config.maxEntryPrice) return null;

    const mispricingPct = (this.config.fairValue - price) / price;
    if (mispricingPct < this.config.minMispricingPct) return null;

    return { market, side, price, movePct, mispricingPct, timeRemainingMs };
  }

  execute(opportunity: TemporalOpportunity): boolean {
    const { market, side, price } = opportunity;
    const sizeUsd = this.ctx.sizer.temporal(this.ctx.ledger.availableBalance());
    if (sizeUsd <= 0) return false;

    const opened = this.ctx.store.open({
      strategyId: this.id,
      marketId: market.marketId,
      displayName: market.question,
      asset: this.config.asset,
      side,
      price,
      sizeUsd,
      feeApplies: true,
      resolutionTime: market.endTime === null ? null : new Date(market.endTime).toISOString(),
    });

    if (!opened.ok) {
      this.ctx.log.warn(
        this.name,
        `Rejected ${side} on "${market.question}" ($${sizeUsd.toFixed(2)}): ${describeError(opened.error)}`
      );
      return false;
    }

    this.ctx.log.trade(
      this.name,
      `${side} @ ${price.toFixed(3)} on "${market.question}" ` +
      `(${this.config.asset} ${(opportunity.movePct * 100).toFixed(2)}%, ` +
      `mispriced ${(opportunity.mispricingPct * 100).toFixed(1)}%, ` +
      `${(opportunity.timeRemainingMs / 60000).toFixed(1)} min left)`
    );
    return true;
  }
}
