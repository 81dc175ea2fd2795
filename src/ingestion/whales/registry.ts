/**
 * Whale Registry
 *
 * Vets leaderboard traders and persists the ones worth following.
 * The leaderboard reports neither trade count nor win rate, so trade count is
 * estimated from volume and win rate falls back to a configured default.
 */

import type { BotDatabase } from '../../db/index.js';
import type { ActivityLog } from '../../logging/index.js';
import type { TrackedWhale } from '../../engine/types.js';
import type { Clock } from '../../engine/clock.js';
import { describeError } from '../../engine/errors.js';
import type { ActivitySource, LeaderboardEntry, LeaderboardPeriod } from '../types.js';

export interface WhaleVettingConfig {
  minProfit: number;
  minTrades: number;
  minWinRate: number;
  defaultWinRate: number;
  volumePerTrade: number;      // USD of volume counted as one trade
  leaderboardPeriod: LeaderboardPeriod;
  leaderboardLimit: number;
}

export const DEFAULT_VETTING_CONFIG: WhaleVettingConfig = {
  minProfit: 50,
  minTrades: 3,
  minWinRate: 0.5,
  defaultWinRate: 0.6,
  volumePerTrade: 100,
  leaderboardPeriod: 'DAY',
  leaderboardLimit: 15,
};

export interface DiscoveryResult {
  scanned: number;
  added: number;
  alreadyTracked: number;
  rejected: number;
}

export class WhaleRegistry {
  private db: BotDatabase;
  private source: ActivitySource;
  private log: ActivityLog;
  private config: WhaleVettingConfig;
  private now: Clock;

  constructor(
    db: BotDatabase,
    source: ActivitySource,
    log: ActivityLog,
    config: Partial<WhaleVettingConfig> = {},
    now: Clock = Date.now
  ) {
    this.db = db;
    this.source = source;
    this.log = log;
    this.config = { ...DEFAULT_VETTING_CONFIG, ...config };
    this.now = now;
  }

  getActive(): TrackedWhale[] {
    return this.db.getActiveWhales();
  }

  /**
   * Scan the leaderboard and track every new trader that passes vetting
   */
  async discover(): Promise<DiscoveryResult> {
    const summary: DiscoveryResult = { scanned: 0, added: 0, alreadyTracked: 0, rejected: 0 };

    const leaderboard = await this.source.getLeaderboard(
      this.config.leaderboardPeriod,
      this.config.leaderboardLimit,
      'PNL'
    );
    if (!leaderboard.ok) {
      this.log.warn('WhaleRegistry', `Leaderboard skipped: ${describeError(leaderboard.error)}`);
      return summary;
    }

    for (const entry of leaderboard.value) {
      summary.scanned++;

      if (this.db.getWhale(entry.actorId)?.isActive) {
        summary.alreadyTracked++;
        continue;
      }

      const candidate = this.toCandidate(entry);
      if (!this.passesVetting(candidate)) {
        summary.rejected++;
        continue;
      }

      this.db.upsertWhale(candidate);
      summary.added++;
      this.log.info(
        'WhaleRegistry',
        `New whale ${entry.displayName ?? entry.actorId.slice(0, 10)} | profit $${entry.pnl.toFixed(0)}`
      );
    }

    this.log.info(
      'WhaleRegistry',
      `Scanned ${summary.scanned} traders: ${summary.added} added, ${summary.alreadyTracked} tracked, ${summary.rejected} rejected`
    );
    return summary;
  }

  passesVetting(whale: TrackedWhale): boolean {
    return (
      whale.profit7d >= this.config.minProfit &&
      whale.totalTrades >= this.config.minTrades &&
      whale.winRate >= this.config.minWinRate
    );
  }

  private toCandidate(entry: LeaderboardEntry): TrackedWhale {
    const now = this.now();
    return {
      address: entry.actorId,
      displayName: entry.displayName,
      profit7d: entry.pnl,
      totalTrades: Math.max(Math.floor(entry.volume / this.config.volumePerTrade), 1),
      winRate: this.config.defaultWinRate,
      isActive: true,
      discoveredAt: now,
      lastCheckedAt: now,
    };
  }
}
