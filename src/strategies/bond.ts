/**
 * High-Probability Bond
 *
 * Buys contracts already trading at or above the bond price, collecting the
 * small remainder to $1 when they resolve as expected.
 */

import type { Strategy, StrategyContext } from './types.js';
import type { MarketDiscovery, MarketInfo, PriceSource } from '../ingestion/types.js';
import type { OutcomeSide } from '../engine/types.js';
import { feePerShare, DEFAULT_FEE_POLICY, type FeePolicy } from '../engine/fees.js';
import { describeError } from '../engine/errors.js';
import { isFifteenMinuteMarket, detectAsset } from './markets.js';

export interface BondConfig {
  minPrice: number;
  minLiquidityUsd: number;
  marketTag: string;
  fee: FeePolicy;
}

export const DEFAULT_BOND_CONFIG: BondConfig = {
  minPrice: 0.95,
  minLiquidityUsd: 10,
  marketTag: 'crypto',
  fee: DEFAULT_FEE_POLICY,
};

export type BondCheck =
  | { status: 'skipped'; reason: string }
  | { status: 'opened'; tradeId: number; price: number }
  | { status: 'rejected'; reason: string };

const SIDES: OutcomeSide[] = ['YES', 'NO'];

export class BondStrategy implements Strategy {
  readonly id = 'HIGH_PROB_BOND' as const;
  readonly name = 'Bond';

  private ctx: StrategyContext;
  private discovery: MarketDiscovery;
  private prices: PriceSource;
  private config: BondConfig;

  constructor(
    ctx: StrategyContext,
    discovery: MarketDiscovery,
    prices: PriceSource,
    config: Partial<BondConfig> = {}
  ) {
    this.ctx = ctx;
    this.discovery = discovery;
    this.prices = prices;
    this.config = { ...DEFAULT_BOND_CONFIG, ...config };
  }

  async runCycle(): Promise<void> {
    const markets = await this.discovery.listActiveMarkets({ tag: this.config.marketTag });
    if (!markets.ok) {
      this.ctx.log.warn(this.name, `Market scan failed: ${describeError(markets.error)}`);
      return;
    }

    for (const market of markets.value) {
      for (const side of SIDES) {
        await this.checkSide(market, side);
      }
    }
  }

  async checkSide(market: MarketInfo, side: OutcomeSide): Promise<BondCheck> {
    const tokenId = market.tokenIds[side === 'YES' ? 0 : 1];
    if (!tokenId) return { status: 'skipped', reason: 'no token for side' };

    const held = this.ctx.store
      .getOpenByStrategy(this.id)
      .some(record => record.marketId === market.marketId && record.side === side);
    if (held) return { status: 'skipped', reason: 'position already open' };

    const quote = await this.prices.getPrice(tokenId);
    if (!quote.ok) return { status: 'skipped', reason: describeError(quote.error) };

    // Quoted against the side's own token
    const price = quote.value.yes;
    if (price < this.config.minPrice || price >= 1) {
      return { status: 'skipped', reason: `price ${price} outside bond range` };
    }

    const liquid = await this.prices.hasLiquidity(tokenId, this.config.minLiquidityUsd);
    if (!liquid.ok || !liquid.value) {
      return { status: 'skipped', reason: 'insufficient liquidity' };
    }

    const feeApplies = isFifteenMinuteMarket(market.question);
    const perShareFee = feeApplies ? feePerShare(price, this.config.fee) : 0;
    const profitPerShare = 1 - price - perShareFee;
    if (profitPerShare <= 0) {
      return { status: 'skipped', reason: `no profit after fee (${profitPerShare.toFixed(4)}/share)` };
    }

    const sizeUsd = this.ctx.sizer.bond(this.ctx.ledger.availableBalance());
    if (sizeUsd <= 0) return { status: 'skipped', reason: 'no balance' };

    const opened = this.ctx.store.open({
      strategyId: this.id,
      marketId: market.marketId,
      displayName: market.question,
      asset: detectAsset(market.question),
      side,
      price,
      sizeUsd,
      feeApplies,
      resolutionTime: market.endTime === null ? null : new Date(market.endTime).toISOString(),
    });

    if (!opened.ok) {
      const reason = describeError(opened.error);
      this.ctx.log.warn(this.name, `Rejected ${side} on "${market.question}" ($${sizeUsd.toFixed(2)}): ${reason}`);
      return { status: 'rejected', reason };
    }

    this.ctx.log.trade(
      this.name,
      `${side} @ ${price.toFixed(3)} on "${market.question}" ` +
      `$${opened.value.cost.toFixed(2)}, expected $${profitPerShare.toFixed(4)}/share`
    );
    return { status: 'opened', tradeId: opened.value.id, price };
  }
}
