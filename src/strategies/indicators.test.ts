import { describe, it, expect } from 'vitest';
import {
  atr,
  computeIndicators,
  ema,
  rsi,
  scoreIndicators,
  trendSignal,
  volatilitySignal,
  volumeSignal,
} from './indicators.js';
import { flatCandles } from '../testing/fakes.js';

const candle = (high: number, low: number, close: number) => ({ openTime: 0, open: close, high, low, close, volume: 1 });
const range = (from: number, to: number) =>
  Array.from({ length: Math.abs(to - from) + 1 }, (_, i) => (from <= to ? from + i : from - i));

describe('rsi', () => {
  it('needs one more close than the period', () => {
    expect(rsi(range(1, 14), 14)).toBeNull();
    expect(rsi(range(1, 15), 14)).toBe(100);
  });

  it('reads 50 on a flat series', () => {
    expect(rsi(Array(20).fill(100), 14)).toBe(50);
  });

  it('smooths gains and losses', () => {
    expect(rsi([1, 2, 1], 2)).toBe(50);
    expect(rsi([1, 3, 2], 2)).toBeCloseTo(66.667, 3);
    expect(rsi([1, 3, 2, 2], 2)).toBeCloseTo(66.667, 3);
  });
});

describe('ema', () => {
  it('is seeded with the first value', () => {
    expect(ema([1, 2, 3], 3)).toEqual([1, 1.5, 2.25]);
    expect(ema([], 3)).toEqual([]);
  });
});

describe('trendSignal', () => {
  it('compares the short and long averages', () => {
    expect(trendSignal(range(1, 21), 9, 21)).toBe('UP');
    expect(trendSignal(range(21, 1), 9, 21)).toBe('DOWN');
    expect(trendSignal(range(1, 20), 9, 21)).toBeNull();
  });
});

describe('volumeSignal', () => {
  it('classifies the last volume against the trailing mean', () => {
    const base = Array<number>(19).fill(10);
    expect(volumeSignal([...base, 2], 20, 0.5, 1.5)).toBe('LOW');
    expect(volumeSignal([...base, 30], 20, 0.5, 1.5)).toBe('HIGH');
    expect(volumeSignal([...base, 10], 20, 0.5, 1.5)).toBe('NORMAL');
    expect(volumeSignal(base, 20, 0.5, 1.5)).toBeNull();
  });
});

describe('atr', () => {
  it('uses the true range against the previous close', () => {
    const candles = [candle(11, 9, 10), candle(12, 10, 11), candle(15, 11, 14), candle(14, 13, 13.5)];
    expect(atr(candles, 2)).toEqual([3, 2]);
    expect(atr(candles.slice(0, 2), 2)).toEqual([]);
  });
});

describe('volatilitySignal', () => {
  it('flags a range spike', () => {
    const candles = flatCandles(28);
    expect(volatilitySignal(candles, 14, 1.5)).toBe('NORMAL');

    candles[27] = { ...candles[27], high: 130, low: 70 };
    expect(volatilitySignal(candles, 14, 1.5)).toBe('HIGH_VOLATILITY');
  });
});

describe('computeIndicators', () => {
  it('needs enough candles for every indicator', () => {
    expect(computeIndicators(flatCandles(27))).toBeNull();
    expect(computeIndicators(flatCandles(28))).toEqual({
      rsi: 50,
      trend: 'DOWN',
      volume: 'NORMAL',
      volatility: 'NORMAL',
    });
  });
});

describe('scoreIndicators', () => {
  it('counts warnings against the side being bought', () => {
    const stretched = { rsi: 85, trend: 'UP', volume: 'LOW', volatility: 'HIGH_VOLATILITY' } as const;
    expect(scoreIndicators(stretched, 'YES')).toBe(3);
    expect(scoreIndicators(stretched, 'NO')).toBe(3);

    const washedOut = { rsi: 15, trend: 'DOWN', volume: 'NORMAL', volatility: 'NORMAL' } as const;
    expect(scoreIndicators(washedOut, 'YES')).toBe(1);
    expect(scoreIndicators(washedOut, 'NO')).toBe(1);

    const calm = { rsi: 50, trend: 'UP', volume: 'HIGH', volatility: 'NORMAL' } as const;
    expect(scoreIndicators(calm, 'YES')).toBe(0);
  });
});
