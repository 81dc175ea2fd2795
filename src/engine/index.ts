export * from './types.js';
export * from './result.js';
export * from './errors.js';
export * from './clock.js';
export * from './fees.js';
export * from './sizing.js';
export { FundLedger, DEFAULT_LEDGER_CONFIG } from './fund-ledger.js';
export type { FundLedgerConfig, FundLedgerEvents, Settlement, DebitError, CreditError } from './fund-ledger.js';
export { TradeStore, DEFAULT_TRADE_STORE_CONFIG } from './trade-store.js';
export type {
  TradeStoreConfig,
  TradeStoreEvents,
  OpenTradeRequest,
  OpenTradeError,
  ResolveTradeError,
  TradeResolutionInput,
} from './trade-store.js';
export { SettlementLoop, settleLeg } from './settlement.js';
export type { SettlementCycleSummary, SettlementLoopEvents, SettlementLoopOptions } from './settlement.js';
export { ScheduledTask, TaskGroup } from './scheduler.js';
export type { TaskBody, ScheduledTaskEvents } from './scheduler.js';
