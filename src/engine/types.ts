/**
 * Paper Trading Types
 *
 * Records persisted by the ledger, trade store, signal detector and settlement loop.
 * Timestamps are Unix ms; calendar days are UTC `YYYY-MM-DD`.
 */

export type StrategyId = 'NEGRISK_ARB' | 'HIGH_PROB_BOND' | 'WHALE_COPY' | 'TEMPORAL_ARB';

export const STRATEGY_IDS: readonly StrategyId[] = [
  'NEGRISK_ARB',
  'HIGH_PROB_BOND',
  'WHALE_COPY',
  'TEMPORAL_ARB',
];

// Binary outcome token
export type OutcomeSide = 'YES' | 'NO';

export type TradeStatus = 'OPEN' | 'RESOLVED';
export type TradeOutcome = 'WIN' | 'LOSS';
export type ConfidenceTier = 'MEDIUM' | 'HIGH' | 'STRONG';

// Singleton virtual account
export interface FundAccount {
  startingBalance: number;
  currentBalance: number;
  totalProfit: number;
  totalLoss: number;
  totalFeesPaid: number;
  totalTrades: number;
  wonTrades: number;
  lostTrades: number;
  createdAt: number;
  lastUpdatedAt: number;
}

// One leg of a strategy position
export interface TradeRecord {
  id: number;
  strategyId: StrategyId;
  marketId: string;
  displayName: string;
  asset: string | null;
  side: OutcomeSide;
  entryPrice: number;        // 0-1
  shares: number;
  cost: number;              // USD spent on shares, fee excluded
  fee: number;
  status: TradeStatus;
  outcome: TradeOutcome | null;
  payout: number | null;
  profitOrLoss: number | null;
  groupId: string | null;    // Links the legs of one multi-leg set
  resolutionTime: string | null;
  createdAt: number;
  resolvedAt: number | null;
}

// Third-party trade ingested for convergence detection
export interface WhaleObservation {
  actorId: string;
  marketId: string;
  side: OutcomeSide;
  price: number;
  size: number;
  timestamp: number;
}

export interface Signal {
  id: number;
  marketId: string;
  side: OutcomeSide;
  actorCount: number;
  confidenceTier: ConfidenceTier;
  priceAtSignal: number;
  createdAt: number;
}

export interface DailyPnL {
  date: string;
  byStrategy: Record<StrategyId, number>;
  totalPnl: number;
  totalTrades: number;
}

// Vetted whale tracked for copy signals
export interface TrackedWhale {
  address: string;
  displayName: string | null;
  profit7d: number;
  totalTrades: number;
  winRate: number;
  isActive: boolean;
  discoveredAt: number;
  lastCheckedAt: number;
}
