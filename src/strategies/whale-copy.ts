/**
 * Whale Copy Execution
 *
 * Turns a convergence signal into a trade: re-checks the live price for
 * slippage, scales the tier size down by indicator warnings, and opens the
 * position with the market's asset and resolution time.
 */

import type { StrategyContext } from './types.js';
import type { Signal } from '../engine/types.js';
import type { ExecutionResult, SignalExecutor } from '../signals/types.js';
import type { MarketDiscovery, PriceSource, SpotPriceSource } from '../ingestion/types.js';
import { exceedsSlippage, indicatorMultiplier } from '../engine/sizing.js';
import { describeError } from '../engine/errors.js';
import { computeIndicators, scoreIndicators, DEFAULT_INDICATOR_CONFIG, type IndicatorConfig } from './indicators.js';
import { detectAsset } from './markets.js';

export interface WhaleCopyConfig {
  maxSlippage: number;
  candleInterval: string;
  candleLimit: number;
  fallbackAsset: string;       // Candles used when the market names no known asset
  indicators: IndicatorConfig;
}

export const DEFAULT_WHALE_COPY_CONFIG: WhaleCopyConfig = {
  maxSlippage: 0.05,
  candleInterval: '1h',
  candleLimit: 40,
  fallbackAsset: 'BTC',
  indicators: DEFAULT_INDICATOR_CONFIG,
};

export class WhaleCopyExecutor implements SignalExecutor {
  readonly name = 'WhaleCopy';

  private ctx: StrategyContext;
  private discovery: MarketDiscovery;
  private prices: PriceSource;
  private spot: SpotPriceSource;
  private config: WhaleCopyConfig;

  constructor(
    ctx: StrategyContext,
    discovery: MarketDiscovery,
    prices: PriceSource,
    spot: SpotPriceSource,
    config: Partial<WhaleCopyConfig> = {}
  ) {
    this.ctx = ctx;
    this.discovery = discovery;
    this.prices = prices;
    this.spot = spot;
    this.config = { ...DEFAULT_WHALE_COPY_CONFIG, ...config };
  }

  async execute(signal: Signal): Promise<ExecutionResult> {
    const details = await this.discovery.getMarketDetails(signal.marketId);
    if (!details.ok) return this.skip(signal, `market unavailable: ${describeError(details.error)}`);

    const market = details.value;
    const tokenId = market.tokenIds[signal.side === 'YES' ? 0 : 1];
    if (!tokenId) return this.skip(signal, `no ${signal.side} token`);

    const live = await this.prices.getPrice(tokenId);
    if (!live.ok) return this.skip(signal, `no live price: ${describeError(live.error)}`);

    const price = live.value.yes;
    if (exceedsSlippage(signal.priceAtSignal, price, this.config.maxSlippage)) {
      const moved = Math.abs(price - signal.priceAtSignal) / signal.priceAtSignal;
      return this.skip(signal, `price moved ${(moved * 100).toFixed(1)}% since signal`);
    }

    const asset = detectAsset(market.question);
    const warnings = await this.countWarnings(asset ?? this.config.fallbackAsset, signal);
    if (indicatorMultiplier(warnings) === 0) {
      return this.skip(signal, `too many indicator warnings (${warnings})`);
    }

    const balance = this.ctx.ledger.availableBalance();
    const sizeUsd = this.ctx.sizer.whaleCopy(balance, signal.confidenceTier, warnings);
    if (sizeUsd <= 0) return this.skip(signal, `zero size for ${signal.confidenceTier}`);

    const label = asset ?? 'Crypto';
    const opened = this.ctx.store.open({
      strategyId: 'WHALE_COPY',
      marketId: signal.marketId,
      displayName: `Whale Copy - ${label}`,
      asset: label,
      side: signal.side,
      price,
      sizeUsd,
      feeApplies: true,
      resolutionTime: market.endTime === null ? null : new Date(market.endTime).toISOString(),
    });

    if (!opened.ok) {
      this.ctx.log.warn(
        this.name,
        `Rejected ${signal.side} on ${signal.marketId} ($${sizeUsd.toFixed(2)}): ${describeError(opened.error)}`
      );
      return { status: 'rejected', error: opened.error };
    }

    this.ctx.log.trade(
      this.name,
      `${signal.side} @ ${price.toFixed(3)} on ${label} (${signal.confidenceTier}, ` +
      `${signal.actorCount} whales, ${warnings} warnings) $${opened.value.cost.toFixed(2)}`
    );
    return { status: 'opened', record: opened.value };
  }

  /**
   * Unavailable candles count as no warnings
   */
  private async countWarnings(asset: string, signal: Signal): Promise<number> {
    const candles = await this.spot.getCandles(asset, this.config.candleInterval, this.config.candleLimit);
    if (!candles.ok) {
      this.ctx.log.info(this.name, `${asset} indicators unavailable, using full size`);
      return 0;
    }

    const snapshot = computeIndicators(candles.value, this.config.indicators);
    if (!snapshot) {
      this.ctx.log.info(this.name, `Not enough ${asset} candles for indicators, using full size`);
      return 0;
    }
    return scoreIndicators(snapshot, signal.side, this.config.indicators);
  }

  private skip(signal: Signal, reason: string): ExecutionResult {
    this.ctx.log.info(this.name, `Skipped signal #${signal.id} on ${signal.marketId}: ${reason}`);
    return { status: 'skipped', reason };
  }
}
