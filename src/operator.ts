/**
 * Operator Surface
 *
 * First-run fund prompt, the startup summary and the periodic status line.
 */

import { createInterface } from 'readline/promises';
import type { FundLedger } from './engine/fund-ledger.js';
import type { TradeStore } from './engine/trade-store.js';
import type { FundAccount } from './engine/types.js';
import type { BotDatabase } from './db/index.js';
import { describeError, validationError, type ValidationError } from './engine/errors.js';
import { ok, err, type Result } from './engine/result.js';
import { utcDate, type Clock } from './engine/clock.js';

export type Prompt = (question: string) => Promise<string>;

/**
 * Ask once on stdin
 */
export async function promptLine(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
}

export function parseFundAmount(input: string, min: number, max: number): Result<number, ValidationError> {
  const amount = Number(input.trim().replace(/^\$/, '').replace(/,/g, ''));
  if (input.trim() === '' || !Number.isFinite(amount)) {
    return err(validationError('starting fund', [`"${input}" is not a number`]));
  }
  if (amount < min || amount > max) {
    return err(validationError('starting fund', [`must be between $${min} and $${max}`]));
  }
  return ok(amount);
}

/**
 * Return the fund account, creating it on first run. A configured starting
 * fund answers the prompt; otherwise the operator is asked until the amount
 * is within bounds.
 */
export async function ensureFundAccount(
  ledger: FundLedger,
  startingFund: number | null,
  prompt: Prompt = promptLine
): Promise<Result<FundAccount, ValidationError>> {
  if (ledger.isInitialized()) {
    const existing = ledger.getBalance();
    if (existing.ok) return existing;
    return err(validationError('fund account', [describeError(existing.error)]));
  }

  const { minFund, maxFund } = ledger.getConfig();

  if (startingFund !== null) {
    return ledger.initialize(startingFund);
  }

  for (;;) {
    const answer = await prompt(`Starting paper fund in USD ($${minFund} - $${maxFund}): `);
    const amount = parseFundAmount(answer, minFund, maxFund);
    if (!amount.ok) {
      console.log(`[Setup] ${describeError(amount.error)}`);
      continue;
    }
    return ledger.initialize(amount.value);
  }
}

export function formatSummary(account: FundAccount): string[] {
  const net = account.currentBalance - account.startingBalance;
  const winRate = account.totalTrades > 0 ? (account.wonTrades / account.totalTrades) * 100 : 0;
  return [
    `Balance:       $${account.currentBalance.toFixed(2)}`,
    `Starting fund: $${account.startingBalance.toFixed(2)}`,
    `All-time P&L:  ${net >= 0 ? '+' : '-'}$${Math.abs(net).toFixed(2)}`,
    `Trades:        ${account.totalTrades} (${account.wonTrades}W / ${account.lostTrades}L, ${winRate.toFixed(0)}% win rate)`,
    `Fees paid:     $${account.totalFeesPaid.toFixed(2)}`,
  ];
}

export function formatStatus(db: BotDatabase, ledger: FundLedger, store: TradeStore, now: Clock = Date.now): string {
  const balance = ledger.availableBalance();
  const open = store.getOpen().length;
  const today = db.getDailyPnl(utcDate(now()));
  const todayPnl = today?.totalPnl ?? 0;
  return (
    `[Status] Balance: $${balance.toFixed(2)} | Open: ${open} ($${store.openCostBasis().toFixed(2)}) | ` +
    `Committed today: $${store.todayCommitted().toFixed(2)} | Today P&L: $${todayPnl.toFixed(2)}`
  );
}
