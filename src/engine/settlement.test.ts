import { describe, it, expect } from 'vitest';
import { SettlementLoop, settleLeg } from './settlement.js';
import { createTestEngine, makeMarket, FakeDiscovery, FakeFeed, type TestEngine } from '../testing/fakes.js';
import type { OpenTradeRequest } from './trade-store.js';

function setup(startingBalance = 1000) {
  const engine = createTestEngine(startingBalance);
  const discovery = new FakeDiscovery();
  const feed = new FakeFeed();
  const loop = new SettlementLoop(engine.db, engine.ledger, engine.store, discovery, engine.log, {
    feed,
    now: engine.clock.now,
  });
  return { ...engine, discovery, feed, loop };
}

function openTrade(engine: TestEngine, overrides: Partial<OpenTradeRequest> = {}) {
  const result = engine.store.open({
    strategyId: 'WHALE_COPY',
    marketId: '0xbtc',
    displayName: 'Whale Copy - BTC',
    side: 'YES',
    price: 0.5,
    sizeUsd: 50,
    feeApplies: true,
    ...overrides,
  });
  if (!result.ok) throw new Error(`open failed: ${result.error.kind}`);
  return result.value;
}

describe('settleLeg', () => {
  it('pays one dollar per share on the winning side', () => {
    const result = settleLeg({ side: 'YES', shares: 100, cost: 50, fee: 1.5625 }, 'YES');
    expect(result.payout).toBe(100);
    expect(result.profitOrLoss).toBe(48.4375);
    expect(result.settlement).toEqual({
      amount: 100,
      profit: 50,
      loss: 0,
      fee: 1.5625,
      won: true,
      lost: false,
    });
  });

  it('pays nothing on the losing side', () => {
    const result = settleLeg({ side: 'NO', shares: 100, cost: 50, fee: 1.5625 }, 'YES');
    expect(result.payout).toBe(0);
    expect(result.profitOrLoss).toBe(-51.5625);
    expect(result.settlement).toEqual({
      amount: 0,
      profit: 0,
      loss: 50,
      fee: 1.5625,
      won: false,
      lost: true,
    });
  });

  it('counts a break-even win as neither won nor lost', () => {
    const result = settleLeg({ side: 'YES', shares: 100, cost: 99, fee: 1 }, 'YES');
    expect(result.profitOrLoss).toBe(0);
    expect(result.settlement.won).toBe(false);
    expect(result.settlement.lost).toBe(false);
  });

  it('counts a fee-eaten win as lost', () => {
    const result = settleLeg({ side: 'YES', shares: 100, cost: 99, fee: 1.5 }, 'YES');
    expect(result.profitOrLoss).toBe(-0.5);
    expect(result.settlement.profit).toBe(1);
    expect(result.settlement.won).toBe(false);
    expect(result.settlement.lost).toBe(true);
  });
});

describe('SettlementLoop', () => {
  it('settles a winning trade and credits the ledger', async () => {
    const ctx = setup();
    const record = openTrade(ctx);
    ctx.discovery.add(makeMarket({ marketId: '0xbtc', resolved: true, closed: true, winningOutcome: 'YES' }));

    const summary = await ctx.loop.runCycle();
    expect(summary).toEqual({ checkedMarkets: 1, settled: 1, pending: 0, skipped: 0 });

    const settled = ctx.store.get(record.id);
    expect(settled).toMatchObject({ status: 'RESOLVED', outcome: 'WIN', payout: 100, profitOrLoss: 48.4375 });

    const account = ctx.ledger.getBalance();
    if (!account.ok) throw new Error('missing account');
    expect(account.value.currentBalance).toBe(1048.4375);
    expect(account.value.totalProfit).toBe(50);
    expect(account.value.totalFeesPaid).toBe(1.5625);
    expect(account.value.wonTrades).toBe(1);

    const daily = ctx.db.getDailyPnl('2026-01-15');
    expect(daily?.byStrategy.WHALE_COPY).toBe(48.4375);
    expect(daily?.totalPnl).toBe(48.4375);
    expect(daily?.totalTrades).toBe(1);
  });

  it('settles each leg of a multi-leg set on its own', async () => {
    const ctx = setup();
    for (const marketId of ['0xa', '0xb', '0xc']) {
      openTrade(ctx, {
        strategyId: 'NEGRISK_ARB',
        marketId,
        price: 0.3,
        sizeUsd: 30,
        feeApplies: false,
        groupId: 'set-1',
      });
    }
    ctx.discovery.add(
      makeMarket({ marketId: '0xa', resolved: true, winningOutcome: 'NO' }),
      makeMarket({ marketId: '0xb', resolved: true, winningOutcome: 'YES' }),
      makeMarket({ marketId: '0xc', resolved: true, winningOutcome: 'NO' })
    );

    const summary = await ctx.loop.runCycle();
    expect(summary.settled).toBe(3);

    const legs = ctx.store.getByGroup('set-1');
    expect(legs.map(l => [l.marketId, l.outcome])).toEqual([
      ['0xa', 'LOSS'],
      ['0xb', 'WIN'],
      ['0xc', 'LOSS'],
    ]);

    const account = ctx.ledger.getBalance();
    if (!account.ok) throw new Error('missing account');
    expect(account.value.currentBalance).toBeCloseTo(1010, 10);
    expect(account.value.wonTrades).toBe(1);
    expect(account.value.lostTrades).toBe(2);
    expect(ctx.db.getDailyPnl('2026-01-15')?.byStrategy.NEGRISK_ARB).toBeCloseTo(10, 10);
  });

  it('looks each market up once per cycle', async () => {
    const ctx = setup();
    openTrade(ctx, { side: 'YES' });
    openTrade(ctx, { side: 'NO' });
    ctx.discovery.add(makeMarket({ marketId: '0xbtc', resolved: true, winningOutcome: 'NO' }));

    const summary = await ctx.loop.runCycle();
    expect(ctx.discovery.detailCalls).toEqual(['0xbtc']);
    expect(summary.settled).toBe(2);
  });

  it('never settles a record twice', async () => {
    const ctx = setup();
    openTrade(ctx);
    ctx.discovery.add(makeMarket({ marketId: '0xbtc', resolved: true, winningOutcome: 'YES' }));

    await ctx.loop.runCycle();
    const second = await ctx.loop.runCycle();
    expect(second).toEqual({ checkedMarkets: 0, settled: 0, pending: 0, skipped: 0 });
    expect(ctx.ledger.availableBalance()).toBe(1048.4375);
  });

  it('leaves unresolved markets open and watches them', async () => {
    const ctx = setup();
    const record = openTrade(ctx);
    ctx.discovery.add(makeMarket({ marketId: '0xbtc' }));

    const summary = await ctx.loop.runCycle();
    expect(summary.pending).toBe(1);
    expect(ctx.store.get(record.id)?.status).toBe('OPEN');
    expect(ctx.feed.subscribed).toEqual([['0xbtc-yes', '0xbtc-no']]);

    const woken: string[] = [];
    ctx.loop.on('wake', marketId => woken.push(marketId));
    ctx.feed.resolve('0xbtc');
    ctx.feed.resolve('0xother');
    expect(woken).toEqual(['0xbtc']);
  });

  it('skips markets whose lookup fails and retries next cycle', async () => {
    const ctx = setup();
    const record = openTrade(ctx);
    ctx.discovery.add(makeMarket({ marketId: '0xbtc', resolved: true, winningOutcome: 'YES' }));
    ctx.discovery.unavailable.add('0xbtc');

    const first = await ctx.loop.runCycle();
    expect(first.skipped).toBe(1);
    expect(ctx.store.get(record.id)?.status).toBe('OPEN');

    ctx.discovery.unavailable.clear();
    const second = await ctx.loop.runCycle();
    expect(second.settled).toBe(1);
  });

  it('skips resolved markets without a YES/NO winner', async () => {
    const ctx = setup();
    openTrade(ctx);
    ctx.discovery.add(makeMarket({ marketId: '0xbtc', resolved: true, winningOutcome: null }));

    const summary = await ctx.loop.runCycle();
    expect(summary).toEqual({ checkedMarkets: 1, settled: 0, pending: 0, skipped: 1 });
  });

  it('returns the balance to start + profit - loss - fees', async () => {
    const ctx = setup();
    openTrade(ctx, { marketId: '0xw', side: 'YES' });
    openTrade(ctx, { marketId: '0xl', side: 'YES', price: 0.4, sizeUsd: 40 });
    ctx.discovery.add(
      makeMarket({ marketId: '0xw', resolved: true, winningOutcome: 'YES' }),
      makeMarket({ marketId: '0xl', resolved: true, winningOutcome: 'NO' })
    );

    await ctx.loop.runCycle();
    const account = ctx.ledger.getBalance();
    if (!account.ok) throw new Error('missing account');
    const a = account.value;
    expect(a.currentBalance).toBeCloseTo(a.startingBalance + a.totalProfit - a.totalLoss - a.totalFeesPaid, 9);
    expect(ctx.store.getOpen()).toHaveLength(0);
  });
});
