/**
 * Fund Ledger
 *
 * Owns the singleton virtual account. Every balance change is a read-check-write
 * inside one synchronous database transaction, so concurrent loops observe a
 * total order of debits and credits.
 */

import { EventEmitter } from 'events';
import type { BotDatabase } from '../db/index.js';
import type { FundAccount } from './types.js';
import type { Clock } from './clock.js';
import { ok, err, type Result } from './result.js';
import {
  InvariantViolationError,
  insufficientFunds,
  invariantViolation,
  validationError,
  type InsufficientFunds,
  type InvariantViolation,
  type ValidationError,
} from './errors.js';

export interface FundLedgerConfig {
  minFund: number;
  maxFund: number;
}

export const DEFAULT_LEDGER_CONFIG: FundLedgerConfig = {
  minFund: 10,
  maxFund: 1_000_000,
};

export interface Settlement {
  amount: number;    // Payout credited to the balance
  profit: number;
  loss: number;
  fee: number;
  won: boolean;
  lost: boolean;
}

export interface FundLedgerEvents {
  debited: [amount: number, account: FundAccount];
  credited: [settlement: Settlement, account: FundAccount];
}

export type DebitError = InsufficientFunds | ValidationError | InvariantViolation;
export type CreditError = ValidationError | InvariantViolation;

export class FundLedger extends EventEmitter<FundLedgerEvents> {
  private db: BotDatabase;
  private config: FundLedgerConfig;
  private now: Clock;

  constructor(db: BotDatabase, config: Partial<FundLedgerConfig> = {}, now: Clock = Date.now) {
    super();
    this.db = db;
    this.config = { ...DEFAULT_LEDGER_CONFIG, ...config };
    this.now = now;
  }

  getConfig(): FundLedgerConfig {
    return { ...this.config };
  }

  isInitialized(): boolean {
    return this.db.getFundAccount() !== undefined;
  }

  /**
   * Create the account on first run. A second call returns the existing account.
   */
  initialize(startingBalance: number): Result<FundAccount, ValidationError> {
    const bounds = this.checkBounds(startingBalance);
    if (!bounds.ok) return bounds;

    const account = this.db.transaction(() => {
      const existing = this.db.getFundAccount();
      if (existing) return existing;
      this.db.insertFundAccount(startingBalance, this.now());
      return this.requireAccount();
    });

    return ok(account);
  }

  /**
   * Wipe trade history and restart the account at `startingBalance`
   */
  reset(startingBalance: number): Result<FundAccount, ValidationError> {
    const bounds = this.checkBounds(startingBalance);
    if (!bounds.ok) return bounds;

    this.db.resetLedger(startingBalance, this.now());
    return ok(this.requireAccount());
  }

  getBalance(): Result<FundAccount, InvariantViolation> {
    const account = this.db.getFundAccount();
    if (!account) return err(invariantViolation('fund account does not exist'));
    return ok(account);
  }

  /**
   * Current balance, or 0 when the account has not been created
   */
  availableBalance(): number {
    return this.db.getFundAccount()?.currentBalance ?? 0;
  }

  debit(amount: number): Result<FundAccount, DebitError> {
    const invalid = checkAmounts('debit', { amount });
    if (invalid) return err(invalid);

    try {
      const result = this.db.transaction(() => this.applyDebit(amount));
      if (result.ok) this.emit('debited', amount, result.value);
      return result;
    } catch (error) {
      if (error instanceof InvariantViolationError) return err(error.violation);
      throw error;
    }
  }

  credit(settlement: Settlement): Result<FundAccount, CreditError> {
    const { amount, profit, loss, fee } = settlement;
    const invalid = checkAmounts('credit', { amount, profit, loss, fee });
    if (invalid) return err(invalid);

    try {
      const updated = this.db.transaction(() => this.applyCredit(settlement));
      this.emit('credited', settlement, updated);
      return ok(updated);
    } catch (error) {
      if (error instanceof InvariantViolationError) return err(error.violation);
      throw error;
    }
  }

  /**
   * Debit within the caller's transaction. Throws InvariantViolationError
   * when the account is missing so the whole transaction rolls back.
   */
  applyDebit(amount: number): Result<FundAccount, InsufficientFunds> {
    const account = this.requireAccount();
    if (amount > account.currentBalance) {
      return err(insufficientFunds(amount, account.currentBalance));
    }

    const updated: FundAccount = {
      ...account,
      currentBalance: account.currentBalance - amount,
      lastUpdatedAt: this.now(),
    };
    this.db.updateFundAccount(updated);
    return ok(updated);
  }

  /**
   * Credit within the caller's transaction
   */
  applyCredit(settlement: Settlement): FundAccount {
    const account = this.requireAccount();
    const updated: FundAccount = {
      ...account,
      currentBalance: account.currentBalance + settlement.amount,
      totalProfit: account.totalProfit + settlement.profit,
      totalLoss: account.totalLoss + settlement.loss,
      totalFeesPaid: account.totalFeesPaid + settlement.fee,
      totalTrades: account.totalTrades + 1,
      wonTrades: account.wonTrades + (settlement.won ? 1 : 0),
      lostTrades: account.lostTrades + (settlement.lost ? 1 : 0),
      lastUpdatedAt: this.now(),
    };
    this.db.updateFundAccount(updated);
    return updated;
  }

  /**
   * Account read that aborts the enclosing transaction when missing
   */
  requireAccount(): FundAccount {
    const account = this.db.getFundAccount();
    if (!account) throw new InvariantViolationError('fund account does not exist');
    return account;
  }

  private checkBounds(startingBalance: number): Result<true, ValidationError> {
    const { minFund, maxFund } = this.config;
    if (!Number.isFinite(startingBalance) || startingBalance < minFund || startingBalance > maxFund) {
      return err(validationError('startingBalance', [
        `must be between $${minFund} and $${maxFund}, got ${startingBalance}`,
      ]));
    }
    return ok(true);
  }
}

function checkAmounts(
  source: string,
  amounts: Partial<Record<'amount' | 'profit' | 'loss' | 'fee', number>>
): ValidationError | null {
  const issues = Object.entries(amounts)
    .filter(([, value]) => value === undefined || !Number.isFinite(value) || value < 0)
    .map(([key, value]) => `${key} must be a non-negative number, got ${value}`);
  return issues.length > 0 ? validationError(source, issues) : null;
}
