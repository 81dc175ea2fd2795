/**
 * Polymarket Data API Client
 *
 * Leaderboard and per-wallet trade history for whale discovery and monitoring.
 */

import { z } from 'zod';
import type { ActivityLog } from '../../logging/index.js';
import { ok } from '../../engine/result.js';
import { fetchJson, parseEach, DEFAULT_TIMEOUT_MS } from '../http.js';
import type {
  ActivitySource,
  CollaboratorResult,
  LeaderboardEntry,
  LeaderboardPeriod,
  LeaderboardSort,
  RawWhaleTrade,
} from '../types.js';
import { DataApiTradeSchema, LeaderboardRowSchema } from './schemas.js';

const DATA_API_BASE = 'https://data-api.polymarket.com';
const SOURCE = 'data-api';

export interface DataApiClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  category?: string;           // Leaderboard category filter
  log?: ActivityLog;
}

export class DataApiClient implements ActivitySource {
  private baseUrl: string;
  private timeoutMs: number;
  private category: string;
  private log: ActivityLog | null;

  constructor(options: DataApiClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? DATA_API_BASE;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.category = options.category ?? 'CRYPTO';
    this.log = options.log ?? null;
  }

  async getLeaderboard(
    period: LeaderboardPeriod,
    limit: number,
    sortKey: LeaderboardSort
  ): CollaboratorResult<LeaderboardEntry[]> {
    const url = new URL(`${this.baseUrl}/v1/leaderboard`);
    url.searchParams.set('timePeriod', period);
    url.searchParams.set('orderBy', sortKey);
    url.searchParams.set('limit', String(limit));
    url.searchParams.set('category', this.category);

    const result = await fetchJson(url.toString(), z.array(z.unknown()), {
      source: SOURCE,
      timeoutMs: this.timeoutMs,
    });
    if (!result.ok) return result;

    const { valid, rejected } = parseEach(result.value, LeaderboardRowSchema);
    if (rejected > 0) {
      this.log?.warn('DataAPI', `Skipped ${rejected} malformed leaderboard rows`);
    }

    return ok(valid.map(row => ({
      actorId: row.proxyWallet.toLowerCase(),
      displayName: row.userName || null,
      pnl: row.pnl,
      volume: row.vol ?? 0,
    })));
  }

  async getRecentTrades(actorId: string, limit: number): CollaboratorResult<RawWhaleTrade[]> {
    const url = new URL(`${this.baseUrl}/trades`);
    url.searchParams.set('user', actorId);
    url.searchParams.set('limit', String(limit));

    const result = await fetchJson(url.toString(), z.array(z.unknown()), {
      source: SOURCE,
      timeoutMs: this.timeoutMs,
    });
    if (!result.ok) return result;

    const { valid, rejected } = parseEach(result.value, DataApiTradeSchema);
    if (rejected > 0) {
      this.log?.warn('DataAPI', `Skipped ${rejected} malformed trades for ${actorId.slice(0, 10)}`);
    }

    return ok(valid.map(trade => ({
      actorId: trade.proxyWallet.toLowerCase(),
      marketId: trade.conditionId,
      side: trade.side,
      outcomeIndex: trade.outcomeIndex,
      outcome: trade.outcome,
      price: trade.price,
      size: trade.size,
      timestamp: trade.timestamp * 1000,   // API returns seconds
      title: trade.title,
    })));
  }
}
