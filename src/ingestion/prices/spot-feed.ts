/**
 * Spot Price Feed
 *
 * Crypto spot prices from CoinGecko with a short cache; the last good price is
 * served when a refresh fails. Hourly candles come from Binance klines.
 */

import { z } from 'zod';
import type { ActivityLog } from '../../logging/index.js';
import type { Clock } from '../../engine/clock.js';
import { ok, err } from '../../engine/result.js';
import { collaboratorUnavailable, validationError, describeError } from '../../engine/errors.js';
import { fetchJson, DEFAULT_TIMEOUT_MS } from '../http.js';
import type { Candle, CollaboratorResult, SpotPriceSource } from '../types.js';

const COINGECKO_API = 'https://api.coingecko.com/api/v3';
const BINANCE_API = 'https://api.binance.com';

const CACHE_TTL_MS = 30 * 1000;

// Asset symbol -> CoinGecko id
const COINGECKO_IDS: Record<string, string> = {
  BTC: 'bitcoin',
  ETH: 'ethereum',
  SOL: 'solana',
  XRP: 'ripple',
  DOGE: 'dogecoin',
};

const SimplePriceSchema = z.record(z.string(), z.object({ usd: z.number().positive() }));

// [openTime, open, high, low, close, volume, ...]
const KlineSchema = z.array(
  z.array(z.union([z.number(), z.string()])).min(6)
);

export interface SpotPriceFeedOptions {
  coingeckoUrl?: string;
  binanceUrl?: string;
  timeoutMs?: number;
  log?: ActivityLog;
  now?: Clock;
}

interface CachedPrice {
  price: number;
  fetchedAt: number;
}

export class SpotPriceFeed implements SpotPriceSource {
  private coingeckoUrl: string;
  private binanceUrl: string;
  private timeoutMs: number;
  private log: ActivityLog | null;
  private now: Clock;
  private cache = new Map<string, CachedPrice>();

  constructor(options: SpotPriceFeedOptions = {}) {
    this.coingeckoUrl = options.coingeckoUrl ?? COINGECKO_API;
    this.binanceUrl = options.binanceUrl ?? BINANCE_API;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.log = options.log ?? null;
    this.now = options.now ?? Date.now;
  }

  async getSpotPrice(asset: string): CollaboratorResult<number> {
    const symbol = asset.toUpperCase();
    const id = COINGECKO_IDS[symbol];
    if (!id) {
      return err(validationError('spot-price', [`unsupported asset ${asset}`]));
    }

    const cached = this.cache.get(symbol);
    if (cached && this.now() - cached.fetchedAt < CACHE_TTL_MS) {
      return ok(cached.price);
    }

    const url = new URL(`${this.coingeckoUrl}/simple/price`);
    url.searchParams.set('ids', id);
    url.searchParams.set('vs_currencies', 'usd');

    const result = await fetchJson(url.toString(), SimplePriceSchema, {
      source: 'coingecko',
      timeoutMs: this.timeoutMs,
    });

    const price = result.ok ? result.value[id]?.usd : undefined;
    if (price !== undefined) {
      this.cache.set(symbol, { price, fetchedAt: this.now() });
      return ok(price);
    }

    if (cached) {
      const reason = result.ok ? 'missing from response' : describeError(result.error);
      this.log?.warn('SpotPrice', `${symbol} refresh failed (${reason}), using cached $${cached.price}`);
      return ok(cached.price);
    }

    return result.ok
      ? err(collaboratorUnavailable('coingecko', `no ${symbol} price in response`))
      : result;
  }

  async getCandles(asset: string, interval: string, limit: number): CollaboratorResult<Candle[]> {
    const url = new URL(`${this.binanceUrl}/api/v3/klines`);
    url.searchParams.set('symbol', `${asset.toUpperCase()}USDT`);
    url.searchParams.set('interval', interval);
    url.searchParams.set('limit', String(limit));

    const result = await fetchJson(url.toString(), KlineSchema, {
      source: 'binance',
      timeoutMs: this.timeoutMs,
    });
    if (!result.ok) return result;

    const candles = result.value.map(row => ({
      openTime: Number(row[0]),
      open: Number(row[1]),
      high: Number(row[2]),
      low: Number(row[3]),
      close: Number(row[4]),
      volume: Number(row[5]),
    }));

    if (candles.some(c => !Number.isFinite(c.close) || !Number.isFinite(c.high) || !Number.isFinite(c.low))) {
      return err(validationError('binance', ['non-numeric candle values']));
    }
    return ok(candles);
  }
}
