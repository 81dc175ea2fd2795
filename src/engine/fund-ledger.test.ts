import { describe, it, expect, beforeEach } from 'vitest';
import { BotDatabase } from '../db/index.js';
import { FundLedger, type Settlement } from './fund-ledger.js';
import { ManualClock } from '../testing/fakes.js';

function settlement(overrides: Partial<Settlement> = {}): Settlement {
  return { amount: 0, profit: 0, loss: 0, fee: 0, won: false, lost: false, ...overrides };
}

describe('FundLedger', () => {
  let db: BotDatabase;
  let clock: ManualClock;
  let ledger: FundLedger;

  beforeEach(() => {
    db = new BotDatabase(':memory:');
    clock = new ManualClock();
    ledger = new FundLedger(db, {}, clock.now);
  });

  describe('initialize', () => {
    it('creates the account once', () => {
      const first = ledger.initialize(500);
      expect(first.ok && first.value.currentBalance).toBe(500);
      expect(first.ok && first.value.startingBalance).toBe(500);

      const second = ledger.initialize(900);
      expect(second.ok && second.value.currentBalance).toBe(500);
      expect(ledger.isInitialized()).toBe(true);
    });

    it('rejects balances outside the bounds', () => {
      for (const amount of [9.99, 1_000_001, Number.NaN]) {
        const result = ledger.initialize(amount);
        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.error.kind).toBe('ValidationError');
      }
      expect(ledger.isInitialized()).toBe(false);
    });

    it('accepts the bounds themselves', () => {
      expect(ledger.initialize(10).ok).toBe(true);
    });
  });

  it('reports a missing account as an invariant violation', () => {
    const balance = ledger.getBalance();
    expect(balance.ok).toBe(false);
    if (!balance.ok) expect(balance.error.kind).toBe('InvariantViolation');

    const debit = ledger.debit(5);
    expect(!debit.ok && debit.error.kind).toBe('InvariantViolation');
    expect(ledger.availableBalance()).toBe(0);
  });

  describe('debit', () => {
    beforeEach(() => {
      ledger.initialize(100);
    });

    it('lowers the balance and stamps the update time', () => {
      clock.advance(60_000);
      const result = ledger.debit(30);
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.currentBalance).toBe(70);
        expect(result.value.lastUpdatedAt).toBe(clock.now());
      }
    });

    it('rejects an overdraft without touching the balance', () => {
      const result = ledger.debit(100.01);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toEqual({ kind: 'InsufficientFunds', required: 100.01, available: 100 });
      }
      expect(ledger.availableBalance()).toBe(100);
    });

    it('allows spending the whole balance', () => {
      const result = ledger.debit(100);
      expect(result.ok && result.value.currentBalance).toBe(0);
    });

    it('rejects negative and non-finite amounts', () => {
      expect(ledger.debit(-1).ok).toBe(false);
      expect(ledger.debit(Number.POSITIVE_INFINITY).ok).toBe(false);
      expect(ledger.availableBalance()).toBe(100);
    });

    it('serialises competing debits so the balance never goes negative', () => {
      const results = [60, 60, 60].map(amount => ledger.debit(amount));
      expect(results.map(r => r.ok)).toEqual([true, false, false]);
      expect(ledger.availableBalance()).toBe(40);
    });

    it('emits debited', () => {
      const seen: number[] = [];
      ledger.on('debited', amount => seen.push(amount));
      ledger.debit(12);
      expect(seen).toEqual([12]);
    });
  });

  describe('credit', () => {
    beforeEach(() => {
      ledger.initialize(100);
    });

    it('books a win with its fee', () => {
      ledger.debit(51.5625);
      const result = ledger.credit(settlement({ amount: 100, profit: 50, fee: 1.5625, won: true }));
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.currentBalance).toBeCloseTo(148.4375, 10);
        expect(result.value.totalProfit).toBe(50);
        expect(result.value.totalFeesPaid).toBe(1.5625);
        expect(result.value.totalTrades).toBe(1);
        expect(result.value.wonTrades).toBe(1);
        expect(result.value.lostTrades).toBe(0);
      }
    });

    it('books a loss', () => {
      ledger.debit(20);
      const result = ledger.credit(settlement({ amount: 0, loss: 20, lost: true }));
      if (!result.ok) throw new Error('credit failed');
      expect(result.value.currentBalance).toBe(80);
      expect(result.value.totalLoss).toBe(20);
      expect(result.value.lostTrades).toBe(1);
    });

    it('keeps balance = start + profit - loss - fees once everything settles', () => {
      ledger.debit(51.5625);
      ledger.credit(settlement({ amount: 100, profit: 50, fee: 1.5625, won: true }));
      ledger.debit(10.25);
      ledger.credit(settlement({ amount: 0, loss: 10, fee: 0.25, lost: true }));

      const balance = ledger.getBalance();
      if (!balance.ok) throw new Error('missing account');
      const a = balance.value;
      expect(a.currentBalance).toBeCloseTo(a.startingBalance + a.totalProfit - a.totalLoss - a.totalFeesPaid, 10);
    });

    it('rejects negative components', () => {
      const result = ledger.credit(settlement({ amount: -5 }));
      expect(!result.ok && result.error.kind).toBe('ValidationError');
      expect(ledger.availableBalance()).toBe(100);
    });
  });

  it('reset wipes the account back to a new starting balance', () => {
    ledger.initialize(100);
    ledger.debit(40);
    const result = ledger.reset(250);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.startingBalance).toBe(250);
      expect(result.value.currentBalance).toBe(250);
      expect(result.value.totalTrades).toBe(0);
    }
  });
});
