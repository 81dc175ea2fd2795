/**
 * Technical Indicators
 *
 * RSI, EMA crossover, relative volume and ATR over spot candles. Whale-copy
 * sizing counts how many of them argue against the side whales are buying.
 */

import type { OutcomeSide } from '../engine/types.js';
import type { Candle } from '../ingestion/types.js';

export type TrendSignal = 'UP' | 'DOWN';
export type VolumeSignal = 'LOW' | 'NORMAL' | 'HIGH';
export type VolatilitySignal = 'HIGH_VOLATILITY' | 'NORMAL';

export interface IndicatorSnapshot {
  rsi: number;
  trend: TrendSignal;
  volume: VolumeSignal;
  volatility: VolatilitySignal;
}

export interface IndicatorConfig {
  rsiPeriod: number;
  emaShort: number;
  emaLong: number;
  volumeLookback: number;
  atrPeriod: number;
  rsiOverbought: number;
  rsiOversold: number;
  lowVolumeRatio: number;
  highVolumeRatio: number;
  highVolatilityMultiplier: number;
}

export const DEFAULT_INDICATOR_CONFIG: IndicatorConfig = {
  rsiPeriod: 14,
  emaShort: 9,
  emaLong: 21,
  volumeLookback: 20,
  atrPeriod: 14,
  rsiOverbought: 80,
  rsiOversold: 20,
  lowVolumeRatio: 0.5,
  highVolumeRatio: 1.5,
  highVolatilityMultiplier: 1.5,
};

/**
 * Wilder RSI of the last close, or null without period + 1 closes
 */
export function rsi(closes: number[], period: number): number | null {
  if (closes.length < period + 1) return null;

  let gain = 0;
  let loss = 0;
  for (let i = 1; i <= period; i++) {
    const change = closes[i] - closes[i - 1];
    if (change > 0) gain += change;
    else loss -= change;
  }
  gain /= period;
  loss /= period;

  for (let i = period + 1; i < closes.length; i++) {
    const change = closes[i] - closes[i - 1];
    gain = (gain * (period - 1) + Math.max(change, 0)) / period;
    loss = (loss * (period - 1) + Math.max(-change, 0)) / period;
  }

  if (loss === 0) return gain === 0 ? 50 : 100;
  return 100 - 100 / (1 + gain / loss);
}

/**
 * Exponential moving average series seeded with the first value
 */
export function ema(values: number[], period: number): number[] {
  if (values.length === 0) return [];
  const alpha = 2 / (period + 1);
  const out = [values[0]];
  for (let i = 1; i < values.length; i++) {
    out.push(alpha * values[i] + (1 - alpha) * out[i - 1]);
  }
  return out;
}

export function trendSignal(closes: number[], shortPeriod: number, longPeriod: number): TrendSignal | null {
  if (closes.length < longPeriod) return null;
  const short = ema(closes, shortPeriod);
  const long = ema(closes, longPeriod);
  return short[short.length - 1] > long[long.length - 1] ? 'UP' : 'DOWN';
}

/**
 * Last volume against the mean of the trailing lookback (last candle included)
 */
export function volumeSignal(
  volumes: number[],
  lookback: number,
  lowRatio: number,
  highRatio: number
): VolumeSignal | null {
  if (volumes.length < lookback) return null;
  const window = volumes.slice(-lookback);
  const mean = window.reduce((sum, v) => sum + v, 0) / lookback;
  const current = volumes[volumes.length - 1];
  if (current < mean * lowRatio) return 'LOW';
  if (current > mean * highRatio) return 'HIGH';
  return 'NORMAL';
}

/**
 * Wilder ATR series; one value per candle from index `period` on
 */
export function atr(candles: Candle[], period: number): number[] {
  if (candles.length <= period) return [];

  const ranges: number[] = [];
  for (let i = 1; i < candles.length; i++) {
    const { high, low } = candles[i];
    const prevClose = candles[i - 1].close;
    ranges.push(Math.max(high - low, Math.abs(high - prevClose), Math.abs(low - prevClose)));
  }

  let current = ranges.slice(0, period).reduce((sum, r) => sum + r, 0) / period;
  const out = [current];
  for (let i = period; i < ranges.length; i++) {
    current = (current * (period - 1) + ranges[i]) / period;
    out.push(current);
  }
  return out;
}

export function volatilitySignal(candles: Candle[], period: number, multiplier: number): VolatilitySignal | null {
  const series = atr(candles, period);
  if (series.length < period) return null;
  const recent = series.slice(-period);
  const mean = recent.reduce((sum, v) => sum + v, 0) / period;
  return series[series.length - 1] > mean * multiplier ? 'HIGH_VOLATILITY' : 'NORMAL';
}

/**
 * All four indicators, or null when the candles are too short for any of them
 */
export function computeIndicators(
  candles: Candle[],
  config: IndicatorConfig = DEFAULT_INDICATOR_CONFIG
): IndicatorSnapshot | null {
  const closes = candles.map(c => c.close);
  const volumes = candles.map(c => c.volume);

  const rsiValue = rsi(closes, config.rsiPeriod);
  const trend = trendSignal(closes, config.emaShort, config.emaLong);
  const volume = volumeSignal(volumes, config.volumeLookback, config.lowVolumeRatio, config.highVolumeRatio);
  const volatility = volatilitySignal(candles, config.atrPeriod, config.highVolatilityMultiplier);

  if (rsiValue === null || trend === null || volume === null || volatility === null) return null;
  return { rsi: rsiValue, trend, volume, volatility };
}

/**
 * Count of indicators that disagree with buying `side` (0-4)
 */
export function scoreIndicators(
  snapshot: IndicatorSnapshot,
  side: OutcomeSide,
  config: IndicatorConfig = DEFAULT_INDICATOR_CONFIG
): number {
  let warnings = 0;

  if (side === 'YES') {
    if (snapshot.rsi > config.rsiOverbought) warnings++;
    if (snapshot.trend === 'DOWN') warnings++;
  } else {
    if (snapshot.rsi < config.rsiOversold) warnings++;
    if (snapshot.trend === 'UP') warnings++;
  }

  if (snapshot.volume === 'LOW') warnings++;
  if (snapshot.volatility === 'HIGH_VOLATILITY') warnings++;

  return warnings;
}
