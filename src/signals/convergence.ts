/**
 * Signal Convergence Detector
 *
 * Turns whale observations into at most one signal and trade per market.
 * Per market: IDLE -> PROCESSING -> IDLE. The processing guard is a
 * test-and-set over market ids held across the executor call, so two
 * observations on the same market cannot both pass the convergence check.
 */

import { EventEmitter } from 'events';
import type { BotDatabase } from '../db/index.js';
import type { ActivityLog } from '../logging/index.js';
import type { TradeStore } from '../engine/trade-store.js';
import type { Signal, WhaleObservation } from '../engine/types.js';
import type { Clock } from '../engine/clock.js';
import {
  DEFAULT_CONVERGENCE_CONFIG,
  classifyConfidence,
  type ConvergenceConfig,
  type ConvergenceOutcome,
  type SignalExecutor,
} from './types.js';

export interface ConvergenceDetectorEvents {
  signal: [signal: Signal];
}

export class ConvergenceDetector extends EventEmitter<ConvergenceDetectorEvents> {
  private db: BotDatabase;
  private store: TradeStore;
  private executor: SignalExecutor;
  private log: ActivityLog;
  private config: ConvergenceConfig;
  private now: Clock;
  private processing: Set<string> = new Set();
  private executing: Set<string> = new Set();    // Passed the limit check, trade not yet booked

  constructor(
    db: BotDatabase,
    store: TradeStore,
    executor: SignalExecutor,
    log: ActivityLog,
    config: Partial<ConvergenceConfig> = {},
    now: Clock = Date.now
  ) {
    super();
    this.db = db;
    this.store = store;
    this.executor = executor;
    this.log = log;
    this.config = { ...DEFAULT_CONVERGENCE_CONFIG, ...config };
    this.now = now;
  }

  /**
   * True while an evaluation of the market is in flight
   */
  isProcessing(marketId: string): boolean {
    return this.processing.has(marketId);
  }

  async ingest(observation: WhaleObservation): Promise<ConvergenceOutcome> {
    if (this.db.hasRecentObservation(observation, this.config.dedupWindowMs)) {
      return { status: 'duplicate' };
    }
    this.db.insertObservation(observation);

    const { marketId, side } = observation;
    if (this.processing.has(marketId)) {
      return { status: 'busy' };
    }
    this.processing.add(marketId);

    let signal: Signal | null = null;
    try {
      const recent = this.db.getObservationsForMarket(marketId, this.now() - this.config.windowMs);
      const actors = new Set(recent.filter(o => o.side === side).map(o => o.actorId));
      const actorCount = actors.size;

      if (actorCount < this.config.minActors) {
        return { status: 'insufficient', actorCount };
      }

      const open = this.store.getOpenByStrategy('WHALE_COPY');
      if (open.some(record => record.marketId === marketId)) {
        this.log.info('WhaleCopy', `Already holding ${marketId.slice(0, 12)}, signal skipped`);
        return { status: 'position-open' };
      }
      const committed = open.length + this.executing.size;
      if (committed >= this.config.maxOpenPositions) {
        this.log.warn('WhaleCopy', `Max whale copy positions reached (${committed}/${this.config.maxOpenPositions})`);
        return { status: 'position-limit', openPositions: committed };
      }

      signal = this.db.insertSignal({
        marketId,
        side,
        actorCount,
        confidenceTier: classifyConfidence(actorCount),
        priceAtSignal: observation.price,
        createdAt: this.now(),
      });
      this.log.info(
        'WhaleCopy',
        `Signal: ${actorCount} whales on ${side} | ${signal.confidenceTier} | ${marketId.slice(0, 12)}`
      );
      this.emit('signal', signal);

      this.executing.add(marketId);
      const execution = await this.executor.execute(signal);
      return { status: 'executed', signal, execution };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log.error('WhaleCopy', `Evaluation of ${marketId.slice(0, 12)} failed: ${message}`);
      return { status: 'failed', signal, error: message };
    } finally {
      this.executing.delete(marketId);
      this.processing.delete(marketId);
    }
  }
}
