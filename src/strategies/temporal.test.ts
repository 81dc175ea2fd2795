import { describe, it, expect, beforeEach } from 'vitest';
import { TemporalStrategy, type ReferencePriceSource } from './temporal.js';
import type { MarketInfo } from '../ingestion/types.js';
import {
  createTestEngine,
  makeMarket,
  FakeDiscovery,
  FakePrices,
  FakeSpot,
  type TestEngine,
} from '../testing/fakes.js';

class FixedReference implements ReferencePriceSource {
  private price: number | null;

  constructor(price: number | null) {
    this.price = price;
  }

  async getReferencePrice(): Promise<number | null> {
    return this.price;
  }
}

describe('TemporalStrategy', () => {
  let engine: TestEngine;
  let discovery: FakeDiscovery;
  let prices: FakePrices;
  let spot: FakeSpot;
  let market: MarketInfo;

  const strategy = (reference: ReferencePriceSource | null = new FixedReference(100_000), minMispricingPct?: number) =>
    new TemporalStrategy(
      engine,
      discovery,
      prices,
      spot,
      reference,
      minMispricingPct === undefined ? {} : { minMispricingPct },
      engine.clock.now
    );

  beforeEach(() => {
    engine = createTestEngine();
    market = makeMarket({
      marketId: '0xbtc15',
      question: 'Bitcoin Up or Down - 15 min',
      endTime: engine.clock.now() + 5 * 60_000,
    });
    discovery = new FakeDiscovery().add(market);
    prices = new FakePrices().set('0xbtc15-yes', 0.5);
    spot = new FakeSpot();
    spot.spot.set('BTC', 103_000);
  });

  it('buys the lagging winner after a decisive move', async () => {
    const opportunity = await strategy().evaluate(market, 103_000);

    expect(opportunity).toMatchObject({ side: 'YES', price: 0.5, timeRemainingMs: 300_000 });
    expect(opportunity?.movePct).toBeCloseTo(0.03, 9);
    expect(opportunity?.mispricingPct).toBeCloseTo(0.8, 9);
  });

  it('buys NO after a drop at the NO token price', async () => {
    prices.set('0xbtc15-yes', 0.9).set('0xbtc15-no', 0.4);

    const opportunity = await strategy().evaluate(market, 97_000);

    expect(opportunity?.side).toBe('NO');
    expect(opportunity?.price).toBe(0.4);
  });

  it('skips a drop when the NO token has no book', async () => {
    expect(await strategy().evaluate(market, 97_000)).toBeNull();
  });

  it('ignores small moves, far expiries and priced-in winners', async () => {
    expect(await strategy().evaluate(market, 101_000)).toBeNull();

    const early = { ...market, endTime: engine.clock.now() + 15 * 60_000 };
    expect(await strategy().evaluate(early, 103_000)).toBeNull();

    const expired = { ...market, endTime: engine.clock.now() };
    expect(await strategy().evaluate(expired, 103_000)).toBeNull();

    prices.set('0xbtc15-yes', 0.75);
    expect(await strategy().evaluate(market, 103_000)).toBeNull();
  });

  it('requires the configured mispricing', async () => {
    prices.set('0xbtc15-yes', 0.65);

    expect(await strategy(undefined, 0.5).evaluate(market, 103_000)).toBeNull();
    expect(await strategy().evaluate(market, 103_000)).not.toBeNull();
  });

  it('only considers fifteen-minute up/down markets on its asset', () => {
    const scanner = strategy();
    expect(scanner.isCandidate(market)).toBe(true);
    expect(scanner.isCandidate({ ...market, question: 'Ethereum Up or Down - 15 min' })).toBe(false);
    expect(scanner.isCandidate({ ...market, question: 'Bitcoin Up or Down - 1 hour' })).toBe(false);
    expect(scanner.isCandidate({ ...market, question: 'Bitcoin above $100k - 15 min' })).toBe(false);
  });

  it('opens once per market across cycles', async () => {
    const scanner = strategy();

    await scanner.runCycle();
    await scanner.runCycle();

    const open = engine.store.getOpenByStrategy('TEMPORAL_ARB');
    expect(open).toHaveLength(1);
    expect(open[0]).toMatchObject({ marketId: '0xbtc15', side: 'YES', asset: 'BTC', cost: 10 });
    expect(open[0].fee).toBeGreaterThan(0);
  });

  it('stays idle without a reference price source', async () => {
    await strategy(null).runCycle();
    expect(engine.store.getOpen()).toEqual([]);
  });
});
