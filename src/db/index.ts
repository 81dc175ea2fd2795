/**
 * Bot Database
 *
 * SQLite storage for the fund account, trade records, tracked whales,
 * whale observations, signals and the daily P&L rollup.
 * Every method is synchronous, so a `transaction()` body runs as one
 * uninterrupted unit with respect to the other loops.
 */

import Database from 'better-sqlite3';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { mkdirSync, existsSync } from 'fs';
import type {
  ConfidenceTier,
  DailyPnL,
  FundAccount,
  OutcomeSide,
  Signal,
  StrategyId,
  TrackedWhale,
  TradeOutcome,
  TradeRecord,
  TradeStatus,
  WhaleObservation,
} from '../engine/types.js';

// Row shapes as stored
interface FundAccountRow {
  starting_balance: number;
  current_balance: number;
  total_profit: number;
  total_loss: number;
  total_fees_paid: number;
  total_trades: number;
  won_trades: number;
  lost_trades: number;
  created_at: number;
  last_updated_at: number;
}

interface TradeRecordRow {
  id: number;
  strategy_id: StrategyId;
  market_id: string;
  display_name: string;
  asset: string | null;
  side: OutcomeSide;
  entry_price: number;
  shares: number;
  cost: number;
  fee: number;
  status: TradeStatus;
  outcome: TradeOutcome | null;
  payout: number | null;
  profit_or_loss: number | null;
  group_id: string | null;
  resolution_time: string | null;
  created_at: number;
  resolved_at: number | null;
}

interface WhaleRow {
  address: string;
  display_name: string | null;
  profit_7d: number;
  total_trades: number;
  win_rate: number;
  is_active: number;
  discovered_at: number;
  last_checked_at: number;
}

interface ObservationRow {
  actor_id: string;
  market_id: string;
  side: OutcomeSide;
  price: number;
  size: number;
  timestamp: number;
}

interface SignalRow {
  id: number;
  market_id: string;
  side: OutcomeSide;
  actor_count: number;
  confidence_tier: ConfidenceTier;
  price_at_signal: number;
  created_at: number;
}

interface DailyPnlRow {
  date: string;
  negrisk_pnl: number;
  bond_pnl: number;
  whale_pnl: number;
  temporal_pnl: number;
  total_pnl: number;
  total_trades: number;
}

export type NewTradeRecord = Omit<
  TradeRecord,
  'id' | 'status' | 'outcome' | 'payout' | 'profitOrLoss' | 'resolvedAt'
>;

export interface TradeResolution {
  outcome: TradeOutcome;
  payout: number;
  profitOrLoss: number;
  resolvedAt: number;
}

export interface DatabaseStats {
  openTrades: number;
  resolvedTrades: number;
  activeWhales: number;
  observations: number;
  signals: number;
}

// Fixed column per strategy in the daily rollup
const PNL_COLUMNS: Record<StrategyId, string> = {
  NEGRISK_ARB: 'negrisk_pnl',
  HIGH_PROB_BOND: 'bond_pnl',
  WHALE_COPY: 'whale_pnl',
  TEMPORAL_ARB: 'temporal_pnl',
};

const DEFAULT_DB_FILE = 'paper-bot.db';

export class BotDatabase {
  private db: Database.Database;
  private insertTradeStmt: Database.Statement<[
    string, string, string, string | null, string, number, number, number, number,
    string | null, string | null, number,
  ]>;
  private getTradeStmt: Database.Statement<[number], TradeRecordRow>;
  private resolveTradeStmt: Database.Statement<[string, number, number, number, number]>;
  private getAccountStmt: Database.Statement<[], FundAccountRow>;
  private updateAccountStmt: Database.Statement<[
    number, number, number, number, number, number, number, number,
  ]>;
  private findDuplicateStmt: Database.Statement<[string, string, string, number, number], { id: number }>;
  private insertObservationStmt: Database.Statement<[string, string, string, number, number, number]>;
  private addPnlStmts: Record<StrategyId, Database.Statement<[string, number, number]>>;

  constructor(dbPath?: string) {
    // Default to data/paper-bot.db in project root
    if (!dbPath) {
      const __dirname = dirname(fileURLToPath(import.meta.url));
      const dataDir = join(__dirname, '..', '..', 'data');
      if (!existsSync(dataDir)) {
        mkdirSync(dataDir, { recursive: true });
      }
      dbPath = join(dataDir, DEFAULT_DB_FILE);
    } else if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);
    this.initPragmas();
    this.initSchema();

    this.insertTradeStmt = this.db.prepare<[
      string, string, string, string | null, string, number, number, number, number,
      string | null, string | null, number,
    ]>(`
      INSERT INTO trade_records
      (strategy_id, market_id, display_name, asset, side, entry_price, shares, cost, fee,
       group_id, resolution_time, created_at, status)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 'OPEN')
    `);
    this.getTradeStmt = this.db.prepare<[number], TradeRecordRow>('SELECT * FROM trade_records WHERE id = ?');
    this.resolveTradeStmt = this.db.prepare<[string, number, number, number, number]>(`
      UPDATE trade_records
      SET status = 'RESOLVED', outcome = ?, payout = ?, profit_or_loss = ?, resolved_at = ?
      WHERE id = ? AND status = 'OPEN'
    `);
    this.getAccountStmt = this.db.prepare<[], FundAccountRow>('SELECT * FROM fund_account WHERE id = 1');
    this.updateAccountStmt = this.db.prepare<[
      number, number, number, number, number, number, number, number,
    ]>(`
      UPDATE fund_account SET
        current_balance = ?,
        total_profit = ?,
        total_loss = ?,
        total_fees_paid = ?,
        total_trades = ?,
        won_trades = ?,
        lost_trades = ?,
        last_updated_at = ?
      WHERE id = 1
    `);
    this.findDuplicateStmt = this.db.prepare<[string, string, string, number, number], { id: number }>(`
      SELECT id FROM whale_observations
      WHERE actor_id = ? AND market_id = ? AND side = ? AND ABS(timestamp - ?) < ?
      LIMIT 1
    `);
    this.insertObservationStmt = this.db.prepare<[string, string, string, number, number, number]>(`
      INSERT INTO whale_observations (actor_id, market_id, side, price, size, timestamp)
      VALUES (?, ?, ?, ?, ?, ?)
    `);
    this.addPnlStmts = {
      NEGRISK_ARB: this.prepareAddPnl('NEGRISK_ARB'),
      HIGH_PROB_BOND: this.prepareAddPnl('HIGH_PROB_BOND'),
      WHALE_COPY: this.prepareAddPnl('WHALE_COPY'),
      TEMPORAL_ARB: this.prepareAddPnl('TEMPORAL_ARB'),
    };
  }

  private initPragmas(): void {
    // WAL mode for fast writes + concurrent reads
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('temp_store = MEMORY');
    this.db.pragma('busy_timeout = 5000');
  }

  private initSchema(): void {
    // Singleton account
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS fund_account (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        starting_balance REAL NOT NULL,
        current_balance REAL NOT NULL CHECK (current_balance >= 0),
        total_profit REAL NOT NULL DEFAULT 0,
        total_loss REAL NOT NULL DEFAULT 0,
        total_fees_paid REAL NOT NULL DEFAULT 0,
        total_trades INTEGER NOT NULL DEFAULT 0,
        won_trades INTEGER NOT NULL DEFAULT 0,
        lost_trades INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL,
        last_updated_at INTEGER NOT NULL
      );
    `);

    // One row per leg
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS trade_records (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        strategy_id TEXT NOT NULL
          CHECK (strategy_id IN ('NEGRISK_ARB', 'HIGH_PROB_BOND', 'WHALE_COPY', 'TEMPORAL_ARB')),
        market_id TEXT NOT NULL,
        display_name TEXT NOT NULL,
        asset TEXT,
        side TEXT NOT NULL CHECK (side IN ('YES', 'NO')),
        entry_price REAL NOT NULL,
        shares REAL NOT NULL,
        cost REAL NOT NULL,
        fee REAL NOT NULL DEFAULT 0,
        status TEXT NOT NULL DEFAULT 'OPEN' CHECK (status IN ('OPEN', 'RESOLVED')),
        outcome TEXT CHECK (outcome IN ('WIN', 'LOSS')),
        payout REAL,
        profit_or_loss REAL,
        group_id TEXT,
        resolution_time TEXT,
        created_at INTEGER NOT NULL,
        resolved_at INTEGER
      );

      CREATE INDEX IF NOT EXISTS idx_trades_status ON trade_records(status, strategy_id);
      CREATE INDEX IF NOT EXISTS idx_trades_group ON trade_records(group_id);
      CREATE INDEX IF NOT EXISTS idx_trades_created ON trade_records(created_at);
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS whales (
        address TEXT PRIMARY KEY,
        display_name TEXT,
        profit_7d REAL NOT NULL DEFAULT 0,
        total_trades INTEGER NOT NULL DEFAULT 0,
        win_rate REAL NOT NULL DEFAULT 0,
        is_active INTEGER NOT NULL DEFAULT 1,
        discovered_at INTEGER NOT NULL,
        last_checked_at INTEGER NOT NULL
      );
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS whale_observations (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        actor_id TEXT NOT NULL,
        market_id TEXT NOT NULL,
        side TEXT NOT NULL CHECK (side IN ('YES', 'NO')),
        price REAL NOT NULL,
        size REAL NOT NULL,
        timestamp INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_obs_market_ts ON whale_observations(market_id, timestamp);
      CREATE INDEX IF NOT EXISTS idx_obs_actor ON whale_observations(actor_id, market_id, side);
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS signals (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        market_id TEXT NOT NULL,
        side TEXT NOT NULL CHECK (side IN ('YES', 'NO')),
        actor_count INTEGER NOT NULL,
        confidence_tier TEXT NOT NULL CHECK (confidence_tier IN ('MEDIUM', 'HIGH', 'STRONG')),
        price_at_signal REAL NOT NULL,
        created_at INTEGER NOT NULL
      );
    `);

    // Daily rollup - one column per strategy
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS daily_pnl (
        date TEXT PRIMARY KEY,
        negrisk_pnl REAL NOT NULL DEFAULT 0,
        bond_pnl REAL NOT NULL DEFAULT 0,
        whale_pnl REAL NOT NULL DEFAULT 0,
        temporal_pnl REAL NOT NULL DEFAULT 0,
        total_pnl REAL NOT NULL DEFAULT 0,
        total_trades INTEGER NOT NULL DEFAULT 0
      );
    `);
  }

  private prepareAddPnl(strategyId: StrategyId): Database.Statement<[string, number, number]> {
    const column = PNL_COLUMNS[strategyId];
    return this.db.prepare<[string, number, number]>(`
      INSERT INTO daily_pnl (date, ${column}, total_pnl, total_trades)
      VALUES (?, ?, ?, 1)
      ON CONFLICT(date) DO UPDATE SET
        ${column} = ${column} + excluded.${column},
        total_pnl = total_pnl + excluded.total_pnl,
        total_trades = total_trades + 1
    `);
  }

  /**
   * Run `fn` atomically; a throw rolls back every write made inside it
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  // ============================================
  // Fund Account
  // ============================================

  getFundAccount(): FundAccount | undefined {
    const row = this.getAccountStmt.get();
    return row ? toFundAccount(row) : undefined;
  }

  insertFundAccount(startingBalance: number, now: number): void {
    this.db.prepare<[number, number, number, number]>(`
      INSERT INTO fund_account (id, starting_balance, current_balance, created_at, last_updated_at)
      VALUES (1, ?, ?, ?, ?)
    `).run(startingBalance, startingBalance, now, now);
  }

  updateFundAccount(account: FundAccount): void {
    this.updateAccountStmt.run(
      account.currentBalance,
      account.totalProfit,
      account.totalLoss,
      account.totalFeesPaid,
      account.totalTrades,
      account.wonTrades,
      account.lostTrades,
      account.lastUpdatedAt
    );
  }

  // ============================================
  // Trade Records
  // ============================================

  insertTradeRecord(record: NewTradeRecord): number {
    const result = this.insertTradeStmt.run(
      record.strategyId,
      record.marketId,
      record.displayName,
      record.asset,
      record.side,
      record.entryPrice,
      record.shares,
      record.cost,
      record.fee,
      record.groupId,
      record.resolutionTime,
      record.createdAt
    );
    return Number(result.lastInsertRowid);
  }

  getTradeRecord(id: number): TradeRecord | undefined {
    const row = this.getTradeStmt.get(id);
    return row ? toTradeRecord(row) : undefined;
  }

  getOpenTradeRecords(strategyId?: StrategyId): TradeRecord[] {
    const rows = strategyId
      ? this.db.prepare<[string], TradeRecordRow>(
          "SELECT * FROM trade_records WHERE status = 'OPEN' AND strategy_id = ? ORDER BY id ASC"
        ).all(strategyId)
      : this.db.prepare<[], TradeRecordRow>(
          "SELECT * FROM trade_records WHERE status = 'OPEN' ORDER BY id ASC"
        ).all();
    return rows.map(toTradeRecord);
  }

  getTradeRecordsByGroup(groupId: string): TradeRecord[] {
    return this.db.prepare<[string], TradeRecordRow>(
      'SELECT * FROM trade_records WHERE group_id = ? ORDER BY id ASC'
    ).all(groupId).map(toTradeRecord);
  }

  getRecentTradeRecords(limit = 20): TradeRecord[] {
    return this.db.prepare<[number], TradeRecordRow>(
      'SELECT * FROM trade_records ORDER BY id DESC LIMIT ?'
    ).all(limit).map(toTradeRecord);
  }

  /**
   * Resolve an OPEN record. Returns false if it was not OPEN.
   */
  resolveTradeRecord(id: number, resolution: TradeResolution): boolean {
    const result = this.resolveTradeStmt.run(
      resolution.outcome,
      resolution.payout,
      resolution.profitOrLoss,
      resolution.resolvedAt,
      id
    );
    return result.changes === 1;
  }

  /**
   * Cost + fee of every record created at or after `since`
   */
  sumCommittedSince(since: number): number {
    const row = this.db.prepare<[number], { total: number }>(
      'SELECT COALESCE(SUM(cost + fee), 0) AS total FROM trade_records WHERE created_at >= ?'
    ).get(since);
    return row?.total ?? 0;
  }

  /**
   * Cost + fee still tied up in OPEN records
   */
  sumOpenCostBasis(): number {
    const row = this.db.prepare<[], { total: number }>(
      "SELECT COALESCE(SUM(cost + fee), 0) AS total FROM trade_records WHERE status = 'OPEN'"
    ).get();
    return row?.total ?? 0;
  }

  // ============================================
  // Whales
  // ============================================

  upsertWhale(whale: TrackedWhale): void {
    this.db.prepare<[string, string | null, number, number, number, number, number, number]>(`
      INSERT INTO whales
      (address, display_name, profit_7d, total_trades, win_rate, is_active, discovered_at, last_checked_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(address) DO UPDATE SET
        display_name = excluded.display_name,
        profit_7d = excluded.profit_7d,
        total_trades = excluded.total_trades,
        win_rate = excluded.win_rate,
        is_active = excluded.is_active,
        last_checked_at = excluded.last_checked_at
    `).run(
      whale.address,
      whale.displayName,
      whale.profit7d,
      whale.totalTrades,
      whale.winRate,
      whale.isActive ? 1 : 0,
      whale.discoveredAt,
      whale.lastCheckedAt
    );
  }

  getWhale(address: string): TrackedWhale | undefined {
    const row = this.db.prepare<[string], WhaleRow>('SELECT * FROM whales WHERE address = ?').get(address);
    return row ? toTrackedWhale(row) : undefined;
  }

  getActiveWhales(): TrackedWhale[] {
    return this.db.prepare<[], WhaleRow>(
      'SELECT * FROM whales WHERE is_active = 1 ORDER BY profit_7d DESC'
    ).all().map(toTrackedWhale);
  }

  // ============================================
  // Whale Observations
  // ============================================

  /**
   * True if the same actor/market/side was already seen within `windowMs` of `timestamp`
   */
  hasRecentObservation(observation: WhaleObservation, windowMs: number): boolean {
    const row = this.findDuplicateStmt.get(
      observation.actorId,
      observation.marketId,
      observation.side,
      observation.timestamp,
      windowMs
    );
    return row !== undefined;
  }

  insertObservation(observation: WhaleObservation): void {
    this.insertObservationStmt.run(
      observation.actorId,
      observation.marketId,
      observation.side,
      observation.price,
      observation.size,
      observation.timestamp
    );
  }

  getObservationsForMarket(marketId: string, since: number): WhaleObservation[] {
    return this.db.prepare<[string, number], ObservationRow>(`
      SELECT actor_id, market_id, side, price, size, timestamp FROM whale_observations
      WHERE market_id = ? AND timestamp >= ?
      ORDER BY timestamp ASC
    `).all(marketId, since).map(row => ({
      actorId: row.actor_id,
      marketId: row.market_id,
      side: row.side,
      price: row.price,
      size: row.size,
      timestamp: row.timestamp,
    }));
  }

  pruneObservations(before: number): number {
    return this.db.prepare<[number]>('DELETE FROM whale_observations WHERE timestamp < ?').run(before).changes;
  }

  // ============================================
  // Signals
  // ============================================

  insertSignal(signal: Omit<Signal, 'id'>): Signal {
    const result = this.db.prepare<[string, string, number, string, number, number]>(`
      INSERT INTO signals (market_id, side, actor_count, confidence_tier, price_at_signal, created_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(
      signal.marketId,
      signal.side,
      signal.actorCount,
      signal.confidenceTier,
      signal.priceAtSignal,
      signal.createdAt
    );
    return { id: Number(result.lastInsertRowid), ...signal };
  }

  getRecentSignals(limit = 20): Signal[] {
    return this.db.prepare<[number], SignalRow>(
      'SELECT * FROM signals ORDER BY id DESC LIMIT ?'
    ).all(limit).map(row => ({
      id: row.id,
      marketId: row.market_id,
      side: row.side,
      actorCount: row.actor_count,
      confidenceTier: row.confidence_tier,
      priceAtSignal: row.price_at_signal,
      createdAt: row.created_at,
    }));
  }

  // ============================================
  // Daily P&L
  // ============================================

  addDailyPnl(date: string, strategyId: StrategyId, pnl: number): void {
    this.addPnlStmts[strategyId].run(date, pnl, pnl);
  }

  getDailyPnl(date: string): DailyPnL | undefined {
    const row = this.db.prepare<[string], DailyPnlRow>('SELECT * FROM daily_pnl WHERE date = ?').get(date);
    if (!row) return undefined;

    return {
      date: row.date,
      byStrategy: {
        NEGRISK_ARB: row.negrisk_pnl,
        HIGH_PROB_BOND: row.bond_pnl,
        WHALE_COPY: row.whale_pnl,
        TEMPORAL_ARB: row.temporal_pnl,
      },
      totalPnl: row.total_pnl,
      totalTrades: row.total_trades,
    };
  }

  // ============================================
  // Maintenance
  // ============================================

  /**
   * Wipe trading history and start the account over. Tracked whales are kept.
   */
  resetLedger(startingBalance: number, now: number): void {
    this.transaction(() => {
      this.db.exec(`
        DELETE FROM trade_records;
        DELETE FROM signals;
        DELETE FROM daily_pnl;
        DELETE FROM whale_observations;
        DELETE FROM fund_account;
      `);
      this.insertFundAccount(startingBalance, now);
    });
  }

  getStats(): DatabaseStats {
    const count = (sql: string): number =>
      this.db.prepare<[], { c: number }>(sql).get()?.c ?? 0;

    return {
      openTrades: count("SELECT COUNT(*) AS c FROM trade_records WHERE status = 'OPEN'"),
      resolvedTrades: count("SELECT COUNT(*) AS c FROM trade_records WHERE status = 'RESOLVED'"),
      activeWhales: count('SELECT COUNT(*) AS c FROM whales WHERE is_active = 1'),
      observations: count('SELECT COUNT(*) AS c FROM whale_observations'),
      signals: count('SELECT COUNT(*) AS c FROM signals'),
    };
  }

  /**
   * Close the database connection
   */
  close(): void {
    this.db.close();
  }
}

function toFundAccount(row: FundAccountRow): FundAccount {
  return {
    startingBalance: row.starting_balance,
    currentBalance: row.current_balance,
    totalProfit: row.total_profit,
    totalLoss: row.total_loss,
    totalFeesPaid: row.total_fees_paid,
    totalTrades: row.total_trades,
    wonTrades: row.won_trades,
    lostTrades: row.lost_trades,
    createdAt: row.created_at,
    lastUpdatedAt: row.last_updated_at,
  };
}

function toTradeRecord(row: TradeRecordRow): TradeRecord {
  return {
    id: row.id,
    strategyId: row.strategy_id,
    marketId: row.market_id,
    displayName: row.display_name,
    asset: row.asset,
    side: row.side,
    entryPrice: row.entry_price,
    shares: row.shares,
    cost: row.cost,
    fee: row.fee,
    status: row.status,
    outcome: row.outcome,
    payout: row.payout,
    profitOrLoss: row.profit_or_loss,
    groupId: row.group_id,
    resolutionTime: row.resolution_time,
    createdAt: row.created_at,
    resolvedAt: row.resolved_at,
  };
}

function toTrackedWhale(row: WhaleRow): TrackedWhale {
  return {
    address: row.address,
    displayName: row.display_name,
    profit7d: row.profit_7d,
    totalTrades: row.total_trades,
    winRate: row.win_rate,
    isActive: row.is_active === 1,
    discoveredAt: row.discovered_at,
    lastCheckedAt: row.last_checked_at,
  };
}
