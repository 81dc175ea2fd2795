/**
 * Strategy Types
 */

import type { StrategyId } from '../engine/types.js';
import type { FundLedger } from '../engine/fund-ledger.js';
import type { TradeStore } from '../engine/trade-store.js';
import type { PositionSizer } from '../engine/sizing.js';
import type { ActivityLog } from '../logging/index.js';

// A scanner driven by the scheduler, one cycle per interval
export interface Strategy {
  readonly id: StrategyId;
  readonly name: string;
  runCycle(): Promise<void>;
}

// Shared handles every strategy trades through
export interface StrategyContext {
  ledger: FundLedger;
  store: TradeStore;
  sizer: PositionSizer;
  log: ActivityLog;
}
