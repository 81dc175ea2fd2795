/**
 * Gamma API Client
 *
 * Market discovery, negRisk events and resolution status.
 */

import { z } from 'zod';
import type { ActivityLog } from '../../logging/index.js';
import type { OutcomeSide } from '../../engine/types.js';
import { ok, err } from '../../engine/result.js';
import { validationError } from '../../engine/errors.js';
import { fetchJson, parseEach, DEFAULT_TIMEOUT_MS } from '../http.js';
import type {
  CollaboratorResult,
  MarketDiscovery,
  MarketEvent,
  MarketFilter,
  MarketInfo,
} from '../types.js';
import { GammaEventSchema, GammaMarketSchema, type GammaMarket } from './types.js';

const GAMMA_API_URL = 'https://gamma-api.polymarket.com';
const DEFAULT_MARKET_LIMIT = 100;
const SOURCE = 'gamma';

export interface GammaClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  log?: ActivityLog;
}

export class GammaClient implements MarketDiscovery {
  private baseUrl: string;
  private timeoutMs: number;
  private log: ActivityLog | null;

  constructor(options: GammaClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? GAMMA_API_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.log = options.log ?? null;
  }

  async listActiveMarkets(filter: MarketFilter = {}): CollaboratorResult<MarketInfo[]> {
    const url = new URL(`${this.baseUrl}/markets`);
    url.searchParams.set('active', 'true');
    url.searchParams.set('closed', 'false');
    url.searchParams.set('limit', String(filter.limit ?? DEFAULT_MARKET_LIMIT));
    if (filter.tag) {
      url.searchParams.set('tag', filter.tag);
    }

    const result = await this.get(url.toString(), z.array(z.unknown()));
    if (!result.ok) return result;
    return ok(this.parseMarkets(result.value));
  }

  /**
   * Look up one market by condition id
   */
  async getMarketDetails(marketId: string): CollaboratorResult<MarketInfo> {
    const url = new URL(`${this.baseUrl}/markets`);
    url.searchParams.set('condition_ids', marketId);

    const result = await this.get(url.toString(), z.array(GammaMarketSchema));
    if (!result.ok) return result;

    const market = result.value[0];
    if (!market) {
      return err(validationError(SOURCE, [`market ${marketId} not found`]));
    }
    return ok(toMarketInfo(market));
  }

  async listNegRiskEvents(): CollaboratorResult<MarketEvent[]> {
    const url = new URL(`${this.baseUrl}/events`);
    url.searchParams.set('negRisk', 'true');
    url.searchParams.set('active', 'true');
    url.searchParams.set('closed', 'false');
    url.searchParams.set('limit', String(DEFAULT_MARKET_LIMIT));

    const result = await this.get(url.toString(), z.array(z.unknown()));
    if (!result.ok) return result;

    const { valid, rejected } = parseEach(result.value, GammaEventSchema);
    this.reportRejected('events', rejected);
    return ok(valid.map(event => ({
      eventId: event.id,
      title: event.title,
      negRisk: event.negRisk ?? true,
    })));
  }

  async listEventMarkets(eventId: string): CollaboratorResult<MarketInfo[]> {
    const result = await this.get(
      `${this.baseUrl}/events/${encodeURIComponent(eventId)}`,
      GammaEventSchema
    );
    if (!result.ok) return result;
    return ok(this.parseMarkets(result.value.markets ?? []));
  }

  private get<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
    return fetchJson(url, schema, { source: SOURCE, timeoutMs: this.timeoutMs });
  }

  private parseMarkets(entries: unknown[]): MarketInfo[] {
    const { valid, rejected } = parseEach(entries, GammaMarketSchema);
    this.reportRejected('markets', rejected);
    return valid.map(toMarketInfo);
  }

  private reportRejected(what: string, count: number): void {
    if (count > 0) {
      this.log?.warn('Gamma', `Skipped ${count} malformed ${what}`);
    }
  }
}

export function toMarketInfo(market: GammaMarket): MarketInfo {
  const outcomes = parseJsonArray(market.outcomes).map(String);
  const outcomePrices = parseJsonArray(market.outcomePrices).map(Number);
  const tokenIds = parseJsonArray(market.clobTokenIds).map(String);
  const closed = market.closed ?? false;

  const winningOutcome = parseWinner(market.winningOutcome) ?? (closed ? winnerFromPrices(outcomePrices) : null);
  const endTime = market.endDate ? Date.parse(market.endDate) : NaN;

  return {
    marketId: market.conditionId,
    question: market.question,
    slug: market.slug ?? null,
    eventId: market.events?.[0]?.id ?? null,
    tokenIds,
    outcomes,
    outcomePrices,
    endTime: Number.isFinite(endTime) ? endTime : null,
    active: market.active ?? false,
    closed,
    resolved: market.resolved ?? (closed && winningOutcome !== null),
    winningOutcome,
    negRisk: market.negRisk ?? null,
  };
}

function parseJsonArray(value: GammaMarket['outcomes']): Array<string | number> {
  if (!value) return [];
  if (Array.isArray(value)) return value;
  try {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed)
      ? parsed.filter((v): v is string | number => typeof v === 'string' || typeof v === 'number')
      : [];
  } catch {
    return [];
  }
}

function parseWinner(value: string | null | undefined): OutcomeSide | null {
  const normalized = value?.trim().toUpperCase();
  if (normalized === 'YES' || normalized === 'NO') return normalized;
  return null;
}

// A settled binary market pays 1 on exactly one outcome
function winnerFromPrices(prices: number[]): OutcomeSide | null {
  if (prices.length !== 2) return null;
  if (prices[0] === 1 && prices[1] === 0) return 'YES';
  if (prices[0] === 0 && prices[1] === 1) return 'NO';
  return null;
}
