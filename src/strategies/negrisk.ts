/**
 * NegRisk Arbitrage
 *
 * In a negRisk event exactly one market resolves YES. When the YES legs of
 * every market sum to less than $1 (minus a buffer), buying one share of each
 * locks in the difference. Legs are opened as one all-or-nothing group.
 */

import { randomUUID } from 'crypto';
import type { Strategy, StrategyContext } from './types.js';
import type { MarketDiscovery, MarketEvent, MarketInfo, PriceSource } from '../ingestion/types.js';
import type { OpenTradeRequest } from '../engine/trade-store.js';
import { describeError } from '../engine/errors.js';

export interface NegRiskConfig {
  buffer: number;              // Required edge below $1 per set
}

export const DEFAULT_NEGRISK_CONFIG: NegRiskConfig = {
  buffer: 0.02,
};

interface PricedLeg {
  market: MarketInfo;
  yesPrice: number;
}

export type NegRiskScan =
  | { status: 'skipped'; reason: string }
  | { status: 'no-edge'; totalCost: number }
  | { status: 'opened'; groupId: string; legs: number; sets: number; totalCost: number }
  | { status: 'rejected'; reason: string };

export class NegRiskStrategy implements Strategy {
  readonly id = 'NEGRISK_ARB' as const;
  readonly name = 'NegRisk';

  private ctx: StrategyContext;
  private discovery: MarketDiscovery;
  private prices: PriceSource;
  private config: NegRiskConfig;

  constructor(
    ctx: StrategyContext,
    discovery: MarketDiscovery,
    prices: PriceSource,
    config: Partial<NegRiskConfig> = {}
  ) {
    this.ctx = ctx;
    this.discovery = discovery;
    this.prices = prices;
    this.config = { ...DEFAULT_NEGRISK_CONFIG, ...config };
  }

  async runCycle(): Promise<void> {
    const events = await this.discovery.listNegRiskEvents();
    if (!events.ok) {
      this.ctx.log.warn(this.name, `Event scan failed: ${describeError(events.error)}`);
      return;
    }

    for (const event of events.value) {
      await this.scanEvent(event);
    }
  }

  async scanEvent(event: MarketEvent): Promise<NegRiskScan> {
    // Outcomes of a non-negRisk event are not mutually exclusive
    if (!event.negRisk) {
      return this.skip(event, 'event is not negRisk');
    }

    const markets = await this.discovery.listEventMarkets(event.eventId);
    if (!markets.ok) {
      return this.skip(event, `markets unavailable: ${describeError(markets.error)}`);
    }
    if (markets.value.length < 2) {
      return this.skip(event, `only ${markets.value.length} market(s)`);
    }

    // Every leg must be priced, otherwise the set does not cover all outcomes
    const legs: PricedLeg[] = [];
    for (const market of markets.value) {
      if (market.negRisk === false) {
        return this.skip(event, `market ${market.marketId} is not negRisk`);
      }
      const tokenId = market.tokenIds[0];
      if (!tokenId) return this.skip(event, `market ${market.marketId} has no YES token`);

      const price = await this.prices.getPrice(tokenId);
      if (!price.ok) return this.skip(event, `no price for ${market.marketId}`);
      if (price.value.yes <= 0 || price.value.yes >= 1) {
        return this.skip(event, `unusable price ${price.value.yes} for ${market.marketId}`);
      }
      legs.push({ market, yesPrice: price.value.yes });
    }

    const totalCost = legs.reduce((sum, leg) => sum + leg.yesPrice, 0);
    if (totalCost >= 1 - this.config.buffer) {
      return { status: 'no-edge', totalCost };
    }

    const balance = this.ctx.ledger.availableBalance();
    const sets = this.ctx.sizer.negRiskSets(balance, totalCost);
    if (sets < 1) {
      return this.skip(event, `no affordable sets at $${totalCost.toFixed(4)} (balance $${balance.toFixed(2)})`);
    }

    const groupId = randomUUID();
    const requests: OpenTradeRequest[] = legs.map(leg => ({
      strategyId: this.id,
      marketId: leg.market.marketId,
      displayName: `${event.title} - ${leg.market.question}`,
      side: 'YES',
      price: leg.yesPrice,
      sizeUsd: leg.yesPrice * sets,
      feeApplies: false,
      groupId,
      resolutionTime: leg.market.endTime === null ? null : new Date(leg.market.endTime).toISOString(),
    }));

    const opened = this.ctx.store.openGroup(requests);
    if (!opened.ok) {
      const reason = describeError(opened.error);
      this.ctx.log.warn(this.name, `Rejected ${event.title}: ${reason}`);
      return { status: 'rejected', reason };
    }

    const profit = (1 - totalCost) * sets;
    this.ctx.log.trade(
      this.name,
      `Opened ${legs.length} legs x ${sets} sets on "${event.title}" ` +
      `cost $${(totalCost * sets).toFixed(2)}, locked profit $${profit.toFixed(2)}`
    );
    return { status: 'opened', groupId, legs: legs.length, sets, totalCost };
  }

  private skip(event: MarketEvent, reason: string): NegRiskScan {
    this.ctx.log.info(this.name, `Skipped ${event.title}: ${reason}`);
    return { status: 'skipped', reason };
  }
}
