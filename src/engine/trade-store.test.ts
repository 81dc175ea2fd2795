import { describe, it, expect } from 'vitest';
import { createTestEngine } from '../testing/fakes.js';
import type { OpenTradeRequest } from './trade-store.js';
import type { TradeRecord } from './types.js';

function request(overrides: Partial<OpenTradeRequest> = {}): OpenTradeRequest {
  return {
    strategyId: 'HIGH_PROB_BOND',
    marketId: '0xabc',
    displayName: 'Will ETH close green today?',
    side: 'YES',
    price: 0.5,
    sizeUsd: 100,
    feeApplies: false,
    ...overrides,
  };
}

describe('TradeStore.open', () => {
  it('opens a fee-free trade and debits its cost', () => {
    const { store, ledger, clock } = createTestEngine(1000);
    const result = store.open(request());

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toMatchObject({
      strategyId: 'HIGH_PROB_BOND',
      marketId: '0xabc',
      side: 'YES',
      entryPrice: 0.5,
      shares: 200,
      cost: 100,
      fee: 0,
      status: 'OPEN',
      outcome: null,
      payout: null,
      groupId: null,
      createdAt: clock.now(),
    });
    expect(ledger.availableBalance()).toBe(900);
  });

  it('debits the fee with the position', () => {
    const { store, ledger } = createTestEngine(1000);
    const result = store.open(request({ sizeUsd: 50, feeApplies: true }));

    expect(result.ok && result.value.fee).toBe(1.5625);
    expect(ledger.availableBalance()).toBe(948.4375);
  });

  it('rejects invalid prices and sizes', () => {
    const { store, ledger } = createTestEngine(1000);
    for (const bad of [request({ price: 1.2 }), request({ price: 0 }), request({ sizeUsd: 0 }), request({ marketId: '' })]) {
      const result = store.open(bad);
      expect(!result.ok && result.error.kind).toBe('ValidationError');
    }
    expect(ledger.availableBalance()).toBe(1000);
    expect(store.getOpen()).toHaveLength(0);
  });

  it('rejects trades past the daily cap', () => {
    const { store, ledger } = createTestEngine(1000);
    expect(store.open(request({ sizeUsd: 400 })).ok).toBe(true);

    // cap = 0.5 * (600 balance + 400 open) = 500
    const result = store.open(request({ sizeUsd: 150 }));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toEqual({ kind: 'DailyCapExceeded', committed: 400, requested: 150, cap: 500 });
    }
    expect(ledger.availableBalance()).toBe(600);
    expect(store.getOpen()).toHaveLength(1);
  });

  it('counts the cap per UTC day', () => {
    const { store, clock } = createTestEngine(1000);
    store.open(request({ sizeUsd: 400 }));
    expect(store.todayCommitted()).toBe(400);

    clock.advance(12 * 60 * 60 * 1000);
    expect(store.todayCommitted()).toBe(0);
    expect(store.open(request({ sizeUsd: 150 })).ok).toBe(true);
  });

  it('shrinks a trade to fit the balance', () => {
    const { store, ledger } = createTestEngine(10, { dailyCapPct: 5 });
    const result = store.open(request({ sizeUsd: 20 }));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.cost).toBeCloseTo(9.99, 10);
    expect(result.value.shares).toBeCloseTo(19.98, 10);
    expect(ledger.availableBalance()).toBeCloseTo(0.01, 10);
  });

  it('shrinks fee-bearing trades so cost plus fee fits', () => {
    const { store, ledger } = createTestEngine(10, { dailyCapPct: 5 });
    const result = store.open(request({ sizeUsd: 20, feeApplies: true }));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.cost + result.value.fee).toBeCloseTo(9.99, 5);
    expect(result.value.cost).toBeCloseTo(9.6873, 4);
    expect(ledger.availableBalance()).toBeGreaterThanOrEqual(0);
  });

  it('emits opened with the stored record', () => {
    const { store } = createTestEngine(1000);
    const opened: TradeRecord[] = [];
    store.on('opened', record => opened.push(record));

    const result = store.open(request());
    expect(opened).toHaveLength(1);
    expect(result.ok && opened[0].id).toBe(result.ok && result.value.id);
  });
});

describe('TradeStore.openGroup', () => {
  it('opens every leg under one group id', () => {
    const { store, ledger } = createTestEngine(1000);
    const legs = ['0xa', '0xb', '0xc'].map(marketId =>
      request({ strategyId: 'NEGRISK_ARB', marketId, price: 0.3, sizeUsd: 30, groupId: 'set-1' })
    );

    const result = store.openGroup(legs);
    expect(result.ok && result.value).toHaveLength(3);
    expect(store.getByGroup('set-1').map(r => r.marketId).sort()).toEqual(['0xa', '0xb', '0xc']);
    expect(store.openCostBasis()).toBeCloseTo(90, 10);
    expect(ledger.availableBalance()).toBeCloseTo(910, 10);
  });

  it('rolls back earlier legs when one is rejected', () => {
    const { store, ledger } = createTestEngine(1000, { dailyCapPct: 5 });
    const legs = [400, 400, 300].map((sizeUsd, i) =>
      request({ strategyId: 'NEGRISK_ARB', marketId: `0x${i}`, sizeUsd, groupId: 'set-2' })
    );

    const result = store.openGroup(legs);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toEqual({ kind: 'InsufficientFunds', required: 300, available: 200 });
    }
    expect(ledger.availableBalance()).toBe(1000);
    expect(store.getByGroup('set-2')).toHaveLength(0);
  });

  it('rejects an empty group', () => {
    const { store } = createTestEngine(1000);
    const result = store.openGroup([]);
    expect(!result.ok && result.error.kind).toBe('ValidationError');
  });
});

describe('TradeStore.resolve', () => {
  it('resolves a record exactly once', () => {
    const { store, clock } = createTestEngine(1000);
    const opened = store.open(request());
    if (!opened.ok) throw new Error('open failed');

    clock.advance(1000);
    const first = store.resolve(opened.value.id, { outcome: 'WIN', payout: 200, profitOrLoss: 100 });
    expect(first.ok).toBe(true);
    if (first.ok) {
      expect(first.value).toMatchObject({
        status: 'RESOLVED',
        outcome: 'WIN',
        payout: 200,
        profitOrLoss: 100,
        resolvedAt: clock.now(),
      });
    }

    const second = store.resolve(opened.value.id, { outcome: 'LOSS', payout: 0, profitOrLoss: -100 });
    expect(second.ok).toBe(false);
    if (!second.ok) expect(second.error).toEqual({ kind: 'AlreadyResolved', tradeId: opened.value.id });
    expect(store.get(opened.value.id)?.outcome).toBe('WIN');
  });

  it('rejects unknown trades', () => {
    const { store } = createTestEngine(1000);
    const result = store.resolve(999, { outcome: 'WIN', payout: 1, profitOrLoss: 1 });
    expect(!result.ok && result.error.kind).toBe('ValidationError');
  });

  it('drops resolved records from the open queries', () => {
    const { store } = createTestEngine(1000);
    const opened = store.open(request({ strategyId: 'WHALE_COPY' }));
    if (!opened.ok) throw new Error('open failed');

    expect(store.getOpenByStrategy('WHALE_COPY')).toHaveLength(1);
    store.resolve(opened.value.id, { outcome: 'LOSS', payout: 0, profitOrLoss: -100 });
    expect(store.getOpenByStrategy('WHALE_COPY')).toHaveLength(0);
    expect(store.openCostBasis()).toBe(0);
    expect(store.getRecent(5)).toHaveLength(1);
  });
});
