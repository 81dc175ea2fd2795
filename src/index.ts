/**
 * Paper Trading Bot
 *
 * Runs the paper strategies against live Polymarket data and books every
 * simulated trade in a local ledger.
 */

import 'dotenv/config';

import { loadConfig } from './config.js';
import { BotDatabase } from './db/index.js';
import { ActivityLog } from './logging/index.js';
import {
  FundLedger,
  TradeStore,
  PositionSizer,
  SettlementLoop,
  ScheduledTask,
  TaskGroup,
  describeError,
} from './engine/index.js';
import { GammaClient, ClobClient, MarketStream } from './ingestion/polymarket/index.js';
import { DataApiClient, WhaleRegistry, WhaleMonitor } from './ingestion/whales/index.js';
import { SpotPriceFeed } from './ingestion/prices/index.js';
import { ConvergenceDetector } from './signals/index.js';
import {
  NegRiskStrategy,
  BondStrategy,
  WhaleCopyExecutor,
  TemporalStrategy,
  type StrategyContext,
} from './strategies/index.js';
import { ensureFundAccount, formatStatus, formatSummary } from './operator.js';

async function main() {
  console.log('Polymarket Paper Trading Bot');
  console.log('============================\n');

  const loaded = loadConfig();
  if (!loaded.ok) {
    console.error(`[System] Invalid configuration: ${describeError(loaded.error)}`);
    process.exit(1);
  }
  const config = loaded.value;

  const log = new ActivityLog();
  const db = new BotDatabase(config.databasePath);

  // Ledger and trade bookkeeping
  const ledger = new FundLedger(db, config.ledger);
  const account = await ensureFundAccount(ledger, config.startingFund);
  if (!account.ok) {
    console.error(`[System] ${describeError(account.error)}`);
    db.close();
    process.exit(1);
  }

  console.log('');
  for (const line of formatSummary(account.value)) console.log(`  ${line}`);
  console.log('');

  const store = new TradeStore(db, ledger, config.tradeStore);
  const sizer = new PositionSizer(config.sizing);
  const tiers = sizer.getWhaleTiers();
  log.info(
    'System',
    `Whale sizing ${config.sizing.whale.mode}: STRONG ${(tiers.STRONG * 100).toFixed(1)}% | ` +
    `HIGH ${(tiers.HIGH * 100).toFixed(1)}% | MEDIUM ${(tiers.MEDIUM * 100).toFixed(1)}%`
  );

  // Collaborators
  const timeoutMs = config.requestTimeoutMs;
  const gamma = new GammaClient({ timeoutMs, log });
  const clob = new ClobClient({ timeoutMs });
  const dataApi = new DataApiClient({ timeoutMs, log });
  const spot = new SpotPriceFeed({ timeoutMs, log });
  const stream = config.streamEnabled ? new MarketStream(log) : null;

  const ctx: StrategyContext = { ledger, store, sizer, log };
  const tasks = new TaskGroup();

  // Settlement
  const settlement = new SettlementLoop(db, ledger, store, gamma, log, { feed: stream ?? undefined });
  const settlementTask = tasks.add(
    new ScheduledTask('Settlement', config.intervals.settlementMs, async () => {
      await settlement.runCycle();
    }, log)
  );
  settlement.on('wake', () => settlementTask.trigger());

  // Strategies
  if (config.enabled.negRisk) {
    const negRisk = new NegRiskStrategy(ctx, gamma, clob, config.negRisk);
    tasks.add(new ScheduledTask(negRisk.name, config.intervals.negRiskMs, () => negRisk.runCycle(), log));
  }

  if (config.enabled.bond) {
    const bond = new BondStrategy(ctx, gamma, clob, config.bond);
    tasks.add(new ScheduledTask(bond.name, config.intervals.bondMs, () => bond.runCycle(), log));
  }

  if (config.enabled.whale) {
    const executor = new WhaleCopyExecutor(ctx, gamma, clob, spot, config.whaleCopy);
    const detector = new ConvergenceDetector(db, store, executor, log, config.convergence);
    const registry = new WhaleRegistry(db, dataApi, log, config.vetting);
    const monitor = new WhaleMonitor(db, dataApi, gamma, detector, log, config.monitor);

    tasks.add(new ScheduledTask('WhaleDiscovery', config.intervals.whaleDiscoveryMs, async () => {
      await registry.discover();
    }, log));
    tasks.add(new ScheduledTask('WhaleMonitor', config.intervals.whaleMonitorMs, async () => {
      await monitor.runCycle();
    }, log));
  }

  if (config.enabled.temporal) {
    // No reference price source is wired yet, so the scanner stays idle
    const temporal = new TemporalStrategy(ctx, gamma, clob, spot, null, config.temporal);
    log.warn('System', 'Temporal scanner has no reference price source and will not trade');
    tasks.add(new ScheduledTask(temporal.name, config.intervals.temporalMs, () => temporal.runCycle(), log));
  }

  if (stream) {
    try {
      await stream.connect();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.warn('System', `Resolution stream unavailable, settlement will poll only: ${message}`);
    }
  }

  tasks.startAll();
  log.info('System', `Running ${tasks.list().length} loops`);

  // Status update every 30 seconds
  const statusInterval = setInterval(() => {
    console.log(formatStatus(db, ledger, store));
  }, config.intervals.statusMs);

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`\n[System] ${signal} received, shutting down...`);
    clearInterval(statusInterval);
    await tasks.stopAll();
    stream?.disconnect();
    db.close();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    shutdown('SIGINT').catch(console.error);
  });
  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch(console.error);
  });
}

main().catch(console.error);
