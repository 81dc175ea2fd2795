/**
 * Settlement Loop
 *
 * Resolves OPEN records once their market has a winner. Each leg settles on its
 * own: shares pay 1.00 when the leg's side won and nothing otherwise. The
 * record update, ledger credit and daily P&L row change commit together.
 */

import { EventEmitter } from 'events';
import type { BotDatabase } from '../db/index.js';
import type { ActivityLog } from '../logging/index.js';
import type { MarketDiscovery, ResolutionFeed } from '../ingestion/types.js';
import type { FundLedger, Settlement } from './fund-ledger.js';
import type { TradeStore } from './trade-store.js';
import type { OutcomeSide, TradeRecord } from './types.js';
import { InvariantViolationError, describeError } from './errors.js';
import { utcDate, type Clock } from './clock.js';

export interface SettlementCycleSummary {
  checkedMarkets: number;
  settled: number;
  pending: number;
  skipped: number;
}

export interface SettlementLoopEvents {
  settled: [record: TradeRecord];
  wake: [marketId: string];
}

export interface SettlementLoopOptions {
  feed?: ResolutionFeed;
  now?: Clock;
}

/**
 * Payout and P&L for one leg given the winning side
 */
export function settleLeg(
  record: Pick<TradeRecord, 'side' | 'shares' | 'cost' | 'fee'>,
  winningOutcome: OutcomeSide
): { payout: number; profitOrLoss: number; settlement: Settlement } {
  const payout = record.side === winningOutcome ? record.shares * 1.0 : 0;
  const profitOrLoss = payout - record.cost - record.fee;

  return {
    payout,
    profitOrLoss,
    settlement: {
      amount: payout,
      profit: Math.max(payout - record.cost, 0),
      loss: Math.max(record.cost - payout, 0),
      fee: record.fee,
      // Break-even counts toward neither tally
      won: profitOrLoss > 0,
      lost: profitOrLoss < 0,
    },
  };
}

export class SettlementLoop extends EventEmitter<SettlementLoopEvents> {
  private db: BotDatabase;
  private ledger: FundLedger;
  private store: TradeStore;
  private discovery: MarketDiscovery;
  private log: ActivityLog;
  private feed: ResolutionFeed | null;
  private now: Clock;
  private watchedMarkets: Set<string> = new Set();

  constructor(
    db: BotDatabase,
    ledger: FundLedger,
    store: TradeStore,
    discovery: MarketDiscovery,
    log: ActivityLog,
    options: SettlementLoopOptions = {}
  ) {
    super();
    this.db = db;
    this.ledger = ledger;
    this.store = store;
    this.discovery = discovery;
    this.log = log;
    this.feed = options.feed ?? null;
    this.now = options.now ?? Date.now;

    this.feed?.onResolved((marketId) => {
      if (this.watchedMarkets.has(marketId)) {
        this.emit('wake', marketId);
      }
    });
  }

  async runCycle(): Promise<SettlementCycleSummary> {
    const summary: SettlementCycleSummary = { checkedMarkets: 0, settled: 0, pending: 0, skipped: 0 };

    // Legs sharing a market share one lookup
    const byMarket = new Map<string, TradeRecord[]>();
    for (const record of this.store.getOpen()) {
      const legs = byMarket.get(record.marketId) ?? [];
      legs.push(record);
      byMarket.set(record.marketId, legs);
    }

    for (const [marketId, records] of byMarket) {
      summary.checkedMarkets++;

      const details = await this.discovery.getMarketDetails(marketId);
      if (!details.ok) {
        summary.skipped += records.length;
        this.log.warn('Settlement', `Market ${marketId.slice(0, 12)} skipped: ${describeError(details.error)}`);
        continue;
      }

      const market = details.value;
      if (!market.resolved) {
        summary.pending += records.length;
        this.watch(marketId, market.tokenIds);
        continue;
      }

      if (!market.winningOutcome) {
        summary.skipped += records.length;
        this.log.warn('Settlement', `Market ${marketId.slice(0, 12)} resolved without a YES/NO winner`);
        continue;
      }

      this.watchedMarkets.delete(marketId);
      for (const record of records) {
        if (this.settle(record, market.winningOutcome)) {
          summary.settled++;
        } else {
          summary.skipped++;
        }
      }
    }

    return summary;
  }

  private settle(record: TradeRecord, winningOutcome: OutcomeSide): boolean {
    const { payout, profitOrLoss, settlement } = settleLeg(record, winningOutcome);
    const outcome = profitOrLoss > 0 ? 'WIN' : 'LOSS';

    try {
      const resolved = this.db.transaction(() => {
        const result = this.store.resolve(record.id, { outcome, payout, profitOrLoss });
        if (!result.ok) return result;

        this.ledger.applyCredit(settlement);
        this.db.addDailyPnl(utcDate(this.now()), record.strategyId, profitOrLoss);
        return result;
      });

      if (!resolved.ok) {
        this.log.warn('Settlement', `Trade #${record.id} not settled: ${describeError(resolved.error)}`);
        return false;
      }

      this.log.trade(
        'Settlement',
        `${outcome === 'WIN' ? '✓' : '✗'} ${record.displayName} | ${record.side} | ${outcome} | P&L $${profitOrLoss.toFixed(2)}`
      );
      this.emit('settled', resolved.value);
      return true;
    } catch (error) {
      if (error instanceof InvariantViolationError) {
        this.log.error('Settlement', `Trade #${record.id} rolled back: ${describeError(error.violation)}`);
        return false;
      }
      throw error;
    }
  }

  private watch(marketId: string, tokenIds: string[]): void {
    if (!this.feed || tokenIds.length === 0) return;
    this.watchedMarkets.add(marketId);
    this.feed.subscribe(tokenIds);
  }
}
