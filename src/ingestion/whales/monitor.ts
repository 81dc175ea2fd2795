/**
 * Whale Activity Monitor
 *
 * Polls recent trades of every tracked whale and feeds the crypto-market
 * buys to the convergence detector as observations.
 */

import type { BotDatabase } from '../../db/index.js';
import type { ActivityLog } from '../../logging/index.js';
import type { TrackedWhale, WhaleObservation } from '../../engine/types.js';
import type { Clock } from '../../engine/clock.js';
import { describeError } from '../../engine/errors.js';
import { detectAsset } from '../../strategies/markets.js';
import type { ActivitySource, MarketDiscovery, MarketInfo, RawWhaleTrade } from '../types.js';

// Receives every accepted observation, in order
export interface ObservationSink {
  ingest(observation: WhaleObservation): Promise<unknown>;
}

export interface WhaleMonitorConfig {
  tradesPerWhale: number;
  lookbackMs: number;          // Older trades cannot converge anymore
  retentionMs: number;         // Observations kept for reports
}

export const DEFAULT_MONITOR_CONFIG: WhaleMonitorConfig = {
  tradesPerWhale: 5,
  lookbackMs: 5 * 60 * 1000,
  retentionMs: 24 * 60 * 60 * 1000,
};

export interface MonitorCycleResult {
  whales: number;
  trades: number;
  observed: number;
  ignored: number;
}

export class WhaleMonitor {
  private db: BotDatabase;
  private source: ActivitySource;
  private discovery: MarketDiscovery;
  private sink: ObservationSink;
  private log: ActivityLog;
  private config: WhaleMonitorConfig;
  private now: Clock;

  constructor(
    db: BotDatabase,
    source: ActivitySource,
    discovery: MarketDiscovery,
    sink: ObservationSink,
    log: ActivityLog,
    config: Partial<WhaleMonitorConfig> = {},
    now: Clock = Date.now
  ) {
    this.db = db;
    this.source = source;
    this.discovery = discovery;
    this.sink = sink;
    this.log = log;
    this.config = { ...DEFAULT_MONITOR_CONFIG, ...config };
    this.now = now;
  }

  async runCycle(): Promise<MonitorCycleResult> {
    const result: MonitorCycleResult = { whales: 0, trades: 0, observed: 0, ignored: 0 };
    const whales = this.db.getActiveWhales();
    if (whales.length === 0) {
      this.log.info('WhaleMonitor', 'No whales to monitor yet');
      return result;
    }

    // Market lookups are shared by every whale this cycle
    const markets = new Map<string, MarketInfo | null>();

    for (const whale of whales) {
      result.whales++;
      const trades = await this.source.getRecentTrades(whale.address, this.config.tradesPerWhale);
      if (!trades.ok) {
        this.log.warn('WhaleMonitor', `Trades for ${label(whale)} skipped: ${describeError(trades.error)}`);
        continue;
      }

      for (const trade of trades.value) {
        result.trades++;
        const observation = await this.toObservation(whale, trade, markets);
        if (!observation) {
          result.ignored++;
          continue;
        }
        result.observed++;
        await this.sink.ingest(observation);
      }
    }

    const pruned = this.db.pruneObservations(this.now() - this.config.retentionMs);
    if (pruned > 0) this.log.info('WhaleMonitor', `Pruned ${pruned} old observations`);

    return result;
  }

  private async toObservation(
    whale: TrackedWhale,
    trade: RawWhaleTrade,
    markets: Map<string, MarketInfo | null>
  ): Promise<WhaleObservation | null> {
    // Only buys signal conviction
    if (trade.side !== 'BUY') return null;
    if (trade.timestamp < this.now() - this.config.lookbackMs) return null;

    const market = await this.lookup(trade.marketId, markets);
    if (!market || detectAsset(market.question) === null) return null;

    return {
      actorId: whale.address,
      marketId: trade.marketId,
      side: trade.outcomeIndex === 0 ? 'YES' : 'NO',
      price: trade.price,
      size: trade.size,
      timestamp: trade.timestamp,
    };
  }

  private async lookup(marketId: string, markets: Map<string, MarketInfo | null>): Promise<MarketInfo | null> {
    const cached = markets.get(marketId);
    if (cached !== undefined) return cached;

    const details = await this.discovery.getMarketDetails(marketId);
    const market = details.ok ? details.value : null;
    if (!details.ok) {
      this.log.warn('WhaleMonitor', `Market ${marketId.slice(0, 10)} skipped: ${describeError(details.error)}`);
    }
    markets.set(marketId, market);
    return market;
  }
}

function label(whale: TrackedWhale): string {
  return whale.displayName ?? whale.address.slice(0, 10);
}
