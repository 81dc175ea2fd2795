/**
 * Signal Convergence Types
 */

import type { ConfidenceTier, Signal, TradeRecord } from '../engine/types.js';
import type { CoreError } from '../engine/errors.js';

export interface ConvergenceConfig {
  minActors: number;           // Distinct actors needed on one side
  windowMs: number;            // Rolling window for counting actors
  dedupWindowMs: number;       // Same actor/market/side inside this is a repeat
  maxOpenPositions: number;    // Concurrently open whale-copy records
}

export const DEFAULT_CONVERGENCE_CONFIG: ConvergenceConfig = {
  minActors: 2,
  windowMs: 5 * 60 * 1000,
  dedupWindowMs: 5 * 60 * 1000,
  maxOpenPositions: 5,
};

export type ExecutionResult =
  | { status: 'opened'; record: TradeRecord }
  | { status: 'skipped'; reason: string }
  | { status: 'rejected'; error: CoreError };

// Turns a signal into a trade (the whale-copy strategy)
export interface SignalExecutor {
  execute(signal: Signal): Promise<ExecutionResult>;
}

export type ConvergenceOutcome =
  | { status: 'duplicate' }
  | { status: 'busy' }
  | { status: 'insufficient'; actorCount: number }
  | { status: 'position-open' }
  | { status: 'position-limit'; openPositions: number }    // Open plus executing
  | { status: 'executed'; signal: Signal; execution: ExecutionResult }
  | { status: 'failed'; signal: Signal | null; error: string };

export function classifyConfidence(actorCount: number): ConfidenceTier {
  if (actorCount >= 3) return 'STRONG';
  if (actorCount >= 2) return 'HIGH';
  return 'MEDIUM';
}
