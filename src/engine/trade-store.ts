/**
 * Trade Record Store
 *
 * Opens and resolves trade records. Opening runs fee, daily cap and balance
 * checks, then inserts the record and debits the ledger in one transaction.
 */

import { EventEmitter } from 'events';
import type { BotDatabase } from '../db/index.js';
import type { FundLedger } from './fund-ledger.js';
import type { OutcomeSide, StrategyId, TradeOutcome, TradeRecord } from './types.js';
import { calculateFee, feePerShare, DEFAULT_FEE_POLICY, type FeePolicy } from './fees.js';
import { utcDayStart, type Clock } from './clock.js';
import { ok, err, type Result } from './result.js';
import {
  InvariantViolationError,
  alreadyResolved,
  dailyCapExceeded,
  insufficientFunds,
  validationError,
  type AlreadyResolved,
  type DailyCapExceeded,
  type InsufficientFunds,
  type InvariantViolation,
  type ValidationError,
} from './errors.js';

export interface TradeStoreConfig {
  dailyCapPct: number;
  minTradeFloor: number;     // USD; no shrink-to-fit below this
  safetyBuffer: number;      // USD left untouched by shrink-to-fit
  fee: FeePolicy;
}

export const DEFAULT_TRADE_STORE_CONFIG: TradeStoreConfig = {
  dailyCapPct: 0.5,
  minTradeFloor: 0.01,
  safetyBuffer: 0.01,
  fee: DEFAULT_FEE_POLICY,
};

export interface OpenTradeRequest {
  strategyId: StrategyId;
  marketId: string;
  displayName: string;
  asset?: string | null;
  side: OutcomeSide;
  price: number;
  sizeUsd: number;
  feeApplies: boolean;
  groupId?: string | null;
  resolutionTime?: string | null;
}

export interface TradeResolutionInput {
  outcome: TradeOutcome;
  payout: number;
  profitOrLoss: number;
}

export type OpenTradeError = InsufficientFunds | DailyCapExceeded | ValidationError | InvariantViolation;
export type ResolveTradeError = AlreadyResolved | ValidationError;

export interface TradeStoreEvents {
  opened: [record: TradeRecord];
  resolved: [record: TradeRecord];
}

interface PricedTrade {
  shares: number;
  cost: number;
  fee: number;
  total: number;
}

// Carries a rejected leg out of a group transaction so every earlier leg rolls back
class GroupRollback extends Error {
  readonly failure: OpenTradeError;

  constructor(failure: OpenTradeError) {
    super(failure.kind);
    this.name = 'GroupRollback';
    this.failure = failure;
  }
}

export class TradeStore extends EventEmitter<TradeStoreEvents> {
  private db: BotDatabase;
  private ledger: FundLedger;
  private config: TradeStoreConfig;
  private now: Clock;

  constructor(
    db: BotDatabase,
    ledger: FundLedger,
    config: Partial<TradeStoreConfig> = {},
    now: Clock = Date.now
  ) {
    super();
    this.db = db;
    this.ledger = ledger;
    this.config = { ...DEFAULT_TRADE_STORE_CONFIG, ...config };
    this.now = now;
  }

  /**
   * Open a single-leg trade, shrinking it to fit the balance when needed
   */
  open(request: OpenTradeRequest): Result<TradeRecord, OpenTradeError> {
    try {
      const result = this.db.transaction(() => this.openWithin(request, true));
      if (result.ok) this.emit('opened', result.value);
      return result;
    } catch (error) {
      if (error instanceof InvariantViolationError) return err(error.violation);
      throw error;
    }
  }

  /**
   * Open every leg of a multi-leg set or none of them. Legs are never shrunk.
   */
  openGroup(requests: OpenTradeRequest[]): Result<TradeRecord[], OpenTradeError> {
    if (requests.length === 0) {
      return err(validationError('trade group', ['group has no legs']));
    }

    try {
      const records = this.db.transaction(() => {
        const opened: TradeRecord[] = [];
        for (const request of requests) {
          const leg = this.openWithin(request, false);
          if (!leg.ok) throw new GroupRollback(leg.error);
          opened.push(leg.value);
        }
        return opened;
      });

      for (const record of records) this.emit('opened', record);
      return ok(records);
    } catch (error) {
      if (error instanceof GroupRollback) return err(error.failure);
      if (error instanceof InvariantViolationError) return err(error.violation);
      throw error;
    }
  }

  /**
   * Single-fire resolution. Anything but an OPEN record is rejected untouched.
   */
  resolve(tradeId: number, resolution: TradeResolutionInput): Result<TradeRecord, ResolveTradeError> {
    const existing = this.db.getTradeRecord(tradeId);
    if (!existing) {
      return err(validationError('tradeId', [`trade #${tradeId} does not exist`]));
    }

    const changed = this.db.resolveTradeRecord(tradeId, {
      ...resolution,
      resolvedAt: this.now(),
    });
    if (!changed) return err(alreadyResolved(tradeId));

    const record = this.db.getTradeRecord(tradeId) ?? existing;
    this.emit('resolved', record);
    return ok(record);
  }

  get(tradeId: number): TradeRecord | undefined {
    return this.db.getTradeRecord(tradeId);
  }

  getOpen(): TradeRecord[] {
    return this.db.getOpenTradeRecords();
  }

  getOpenByStrategy(strategyId: StrategyId): TradeRecord[] {
    return this.db.getOpenTradeRecords(strategyId);
  }

  getByGroup(groupId: string): TradeRecord[] {
    return this.db.getTradeRecordsByGroup(groupId);
  }

  getRecent(limit = 20): TradeRecord[] {
    return this.db.getRecentTradeRecords(limit);
  }

  /**
   * Cost + fee still held in OPEN records
   */
  openCostBasis(): number {
    return this.db.sumOpenCostBasis();
  }

  /**
   * Cost + fee committed since the start of the current UTC day
   */
  todayCommitted(): number {
    return this.db.sumCommittedSince(utcDayStart(this.now()));
  }

  /**
   * Price a trade without opening it
   */
  quote(price: number, sizeUsd: number, feeApplies: boolean): PricedTrade {
    const shares = sizeUsd / price;
    const fee = calculateFee(shares, price, this.config.fee, feeApplies);
    return { shares, cost: sizeUsd, fee, total: sizeUsd + fee };
  }

  private openWithin(request: OpenTradeRequest, allowShrink: boolean): Result<TradeRecord, OpenTradeError> {
    const invalid = this.validate(request);
    if (invalid) return err(invalid);

    const account = this.ledger.requireAccount();
    let priced = this.quote(request.price, request.sizeUsd, request.feeApplies);

    // Daily exposure cap
    const committed = this.todayCommitted();
    const cap = this.config.dailyCapPct * (account.currentBalance + this.openCostBasis());
    if (committed + priced.total > cap) {
      return err(dailyCapExceeded(committed, priced.total, cap));
    }

    // Balance check, shrinking to fit when allowed
    if (priced.total > account.currentBalance) {
      if (!allowShrink || account.currentBalance <= this.config.minTradeFloor) {
        return err(insufficientFunds(priced.total, account.currentBalance));
      }

      priced = this.shrinkToFit(request, account.currentBalance);
      if (priced.cost < this.config.minTradeFloor || priced.total > account.currentBalance) {
        return err(insufficientFunds(priced.total, account.currentBalance));
      }
    }

    const debit = this.ledger.applyDebit(priced.total);
    if (!debit.ok) return debit;

    const id = this.db.insertTradeRecord({
      strategyId: request.strategyId,
      marketId: request.marketId,
      displayName: request.displayName,
      asset: request.asset ?? null,
      side: request.side,
      entryPrice: request.price,
      shares: priced.shares,
      cost: priced.cost,
      fee: priced.fee,
      groupId: request.groupId ?? null,
      resolutionTime: request.resolutionTime ?? null,
      createdAt: this.now(),
    });

    const record = this.db.getTradeRecord(id);
    if (!record) throw new InvariantViolationError(`trade #${id} missing after insert`);
    return ok(record);
  }

  /**
   * Solve shares so that cost + fee uses the balance minus the safety buffer.
   * The fee is linear in shares, so this is exact before rounding.
   */
  private shrinkToFit(request: OpenTradeRequest, balance: number): PricedTrade {
    const spendable = balance - this.config.safetyBuffer;
    if (spendable <= 0) return { shares: 0, cost: 0, fee: 0, total: 0 };

    const perShare = request.feeApplies ? feePerShare(request.price, this.config.fee) : 0;
    const shares = spendable / (request.price + perShare);
    const cost = shares * request.price;
    const fee = calculateFee(shares, request.price, this.config.fee, request.feeApplies);
    return { shares, cost, fee, total: cost + fee };
  }

  private validate(request: OpenTradeRequest): ValidationError | null {
    const issues: string[] = [];
    if (!request.marketId) issues.push('marketId is required');
    if (!Number.isFinite(request.price) || request.price <= 0 || request.price >= 1) {
      issues.push(`price must be between 0 and 1 exclusive, got ${request.price}`);
    }
    if (!Number.isFinite(request.sizeUsd) || request.sizeUsd <= 0) {
      issues.push(`sizeUsd must be positive, got ${request.sizeUsd}`);
    }
    return issues.length > 0 ? validationError(`${request.strategyId} trade`, issues) : null;
  }
}
