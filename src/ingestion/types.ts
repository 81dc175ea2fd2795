/**
 * Collaborator Contracts
 *
 * What the core consumes from market discovery, price/liquidity, leaderboard
 * and spot-price sources. Every call resolves to a Result; transport failures
 * never escape as exceptions.
 */

import type { OutcomeSide } from '../engine/types.js';
import type { CollaboratorError } from '../engine/errors.js';
import type { Result } from '../engine/result.js';

export type CollaboratorResult<T> = Promise<Result<T, CollaboratorError>>;

// Binary market, keyed by condition id
export interface MarketInfo {
  marketId: string;
  question: string;
  slug: string | null;
  eventId: string | null;
  tokenIds: string[];          // [YES, NO]
  outcomes: string[];
  outcomePrices: number[];
  endTime: number | null;      // Unix ms
  active: boolean;
  closed: boolean;
  resolved: boolean;
  winningOutcome: OutcomeSide | null;
  negRisk: boolean | null;     // null when the venue omits the flag
}

export interface MarketEvent {
  eventId: string;
  title: string;
  negRisk: boolean;
}

export interface MarketFilter {
  tag?: string;
  limit?: number;
}

export interface MarketDiscovery {
  listActiveMarkets(filter?: MarketFilter): CollaboratorResult<MarketInfo[]>;
  getMarketDetails(marketId: string): CollaboratorResult<MarketInfo>;
  listNegRiskEvents(): CollaboratorResult<MarketEvent[]>;
  listEventMarkets(eventId: string): CollaboratorResult<MarketInfo[]>;
}

export interface TokenPrice {
  yes: number;
  no: number;
}

export interface PriceSource {
  getPrice(tokenId: string): CollaboratorResult<TokenPrice>;
  hasLiquidity(tokenId: string, minUsd: number): CollaboratorResult<boolean>;
}

export type LeaderboardPeriod = 'DAY' | 'WEEK' | 'MONTH' | 'ALL';
export type LeaderboardSort = 'PNL' | 'VOL';

export interface LeaderboardEntry {
  actorId: string;
  displayName: string | null;
  pnl: number;
  volume: number;
}

// Third-party trade as reported by the activity source
export interface RawWhaleTrade {
  actorId: string;
  marketId: string;
  side: 'BUY' | 'SELL';
  outcomeIndex: number;
  outcome: string;
  price: number;
  size: number;
  timestamp: number;           // Unix ms
  title: string;
}

export interface ActivitySource {
  getLeaderboard(period: LeaderboardPeriod, limit: number, sortKey: LeaderboardSort): CollaboratorResult<LeaderboardEntry[]>;
  getRecentTrades(actorId: string, limit: number): CollaboratorResult<RawWhaleTrade[]>;
}

export interface Candle {
  openTime: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface SpotPriceSource {
  getSpotPrice(asset: string): CollaboratorResult<number>;
  getCandles(asset: string, interval: string, limit: number): CollaboratorResult<Candle[]>;
}

// Push channel announcing resolutions ahead of the next poll
export interface ResolutionFeed {
  subscribe(tokenIds: string[]): void;
  onResolved(listener: (marketId: string) => void): void;
}
