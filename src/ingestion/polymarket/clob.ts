/**
 * CLOB REST Client
 *
 * Token prices and order book depth.
 */

import { ok } from '../../engine/result.js';
import { fetchJson, DEFAULT_TIMEOUT_MS } from '../http.js';
import type { CollaboratorResult, PriceSource, TokenPrice } from '../types.js';
import { ClobBookSchema, ClobPriceSchema, type ClobBook } from './types.js';

const CLOB_API_URL = 'https://clob.polymarket.com';
const SOURCE = 'clob';

export interface ClobClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
}

export class ClobClient implements PriceSource {
  private baseUrl: string;
  private timeoutMs: number;

  constructor(options: ClobClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? CLOB_API_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Buy price of the token; `no` is its complement
   */
  async getPrice(tokenId: string): CollaboratorResult<TokenPrice> {
    const url = new URL(`${this.baseUrl}/price`);
    url.searchParams.set('token_id', tokenId);
    url.searchParams.set('side', 'BUY');

    const result = await fetchJson(url.toString(), ClobPriceSchema, { source: SOURCE, timeoutMs: this.timeoutMs });
    if (!result.ok) return result;
    return ok({ yes: result.value.price, no: 1 - result.value.price });
  }

  async getBook(tokenId: string): CollaboratorResult<ClobBook> {
    const url = new URL(`${this.baseUrl}/book`);
    url.searchParams.set('token_id', tokenId);
    return fetchJson(url.toString(), ClobBookSchema, { source: SOURCE, timeoutMs: this.timeoutMs });
  }

  /**
   * True when the resting asks add up to at least `minUsd`
   */
  async hasLiquidity(tokenId: string, minUsd: number): CollaboratorResult<boolean> {
    const book = await this.getBook(tokenId);
    if (!book.ok) return book;
    return ok(askDepthUsd(book.value) >= minUsd);
  }
}

export function askDepthUsd(book: ClobBook): number {
  return book.asks.reduce((sum, level) => sum + level.price * level.size, 0);
}
