/**
 * Market Stream
 *
 * CLOB market-channel WebSocket, used to learn about resolutions between
 * settlement polls.
 */

import WebSocket from 'ws';
import { EventEmitter } from 'events';
import type { ActivityLog } from '../../logging/index.js';
import type { ResolutionFeed } from '../types.js';
import { MarketResolvedMessageSchema } from './types.js';

const CLOB_WS_URL = 'wss://ws-subscriptions-clob.polymarket.com/ws/market';

const RECONNECT_DELAY_MS = 5000;
const PING_INTERVAL_MS = 30000;

export interface MarketStreamOptions {
  url?: string;
  autoReconnect?: boolean;
}

export interface MarketStreamEvents {
  connected: [];
  disconnected: [code: number, reason: string];
  marketResolved: [marketId: string, assetId: string, winner: boolean];
}

export class MarketStream extends EventEmitter<MarketStreamEvents> implements ResolutionFeed {
  private ws: WebSocket | null = null;
  private url: string;
  private log: ActivityLog;
  private subscribedAssets: Set<string> = new Set();
  private autoReconnect: boolean;
  private pingInterval: NodeJS.Timeout | null = null;
  private reconnectTimeout: NodeJS.Timeout | null = null;
  private isConnecting = false;

  constructor(log: ActivityLog, options: MarketStreamOptions = {}) {
    super();
    this.log = log;
    this.url = options.url ?? CLOB_WS_URL;
    this.autoReconnect = options.autoReconnect ?? true;
  }

  connect(): Promise<void> {
    if (this.ws?.readyState === WebSocket.OPEN || this.isConnecting) {
      return Promise.resolve();
    }

    this.isConnecting = true;

    return new Promise((resolve, reject) => {
      const ws = new WebSocket(this.url);
      this.ws = ws;

      ws.on('open', () => {
        this.isConnecting = false;
        this.log.info('MarketStream', 'Connected');
        this.startPing();
        this.resubscribe();
        this.emit('connected');
        resolve();
      });

      ws.on('message', (data) => {
        this.handleMessage(data.toString());
      });

      ws.on('error', (error) => {
        this.isConnecting = false;
        this.log.error('MarketStream', `WebSocket error: ${error.message}`);
        reject(error);
      });

      ws.on('close', (code, reason) => {
        this.isConnecting = false;
        this.stopPing();
        this.log.warn('MarketStream', `Disconnected: ${code} ${reason.toString()}`);
        this.emit('disconnected', code, reason.toString());

        if (this.autoReconnect) {
          this.scheduleReconnect();
        }
      });
    });
  }

  disconnect(): void {
    this.autoReconnect = false;
    this.clearReconnectTimeout();
    this.stopPing();

    if (this.ws) {
      this.ws.close();
      this.ws = null;
    }
  }

  /**
   * Subscribe by token ids. Remembered across reconnects.
   */
  subscribe(tokenIds: string[]): void {
    const fresh = tokenIds.filter(id => !this.subscribedAssets.has(id));
    if (fresh.length === 0) return;

    for (const id of fresh) {
      this.subscribedAssets.add(id);
    }

    if (this.ws?.readyState === WebSocket.OPEN) {
      this.sendSubscription(fresh);
    }
  }

  onResolved(listener: (marketId: string) => void): void {
    this.on('marketResolved', (marketId) => listener(marketId));
  }

  getSubscriptionCount(): number {
    return this.subscribedAssets.size;
  }

  /**
   * Parse a raw frame; exposed for tests
   */
  handleMessage(data: string): void {
    let payload: unknown;
    try {
      payload = JSON.parse(data);
    } catch (error) {
      this.log.warn('MarketStream', `Unparseable message: ${error instanceof Error ? error.message : String(error)}`);
      return;
    }

    const messages = Array.isArray(payload) ? payload : [payload];
    for (const message of messages) {
      // Ignore book, price_change and the other channel messages
      const resolved = MarketResolvedMessageSchema.safeParse(message);
      if (resolved.success) {
        const { market, asset_id, winner } = resolved.data;
        this.emit('marketResolved', market, asset_id, winner);
      }
    }
  }

  private sendSubscription(assetIds: string[]): void {
    if (!this.ws || this.ws.readyState !== WebSocket.OPEN) return;

    this.ws.send(JSON.stringify({
      type: 'MARKET',
      assets_ids: assetIds,
    }));
  }

  private resubscribe(): void {
    if (this.subscribedAssets.size > 0) {
      this.sendSubscription([...this.subscribedAssets]);
    }
  }

  private startPing(): void {
    this.pingInterval = setInterval(() => {
      if (this.ws?.readyState === WebSocket.OPEN) {
        this.ws.ping();
      }
    }, PING_INTERVAL_MS);
  }

  private stopPing(): void {
    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = null;
    }
  }

  private scheduleReconnect(): void {
    this.clearReconnectTimeout();

    this.log.info('MarketStream', `Reconnecting in ${RECONNECT_DELAY_MS}ms...`);

    this.reconnectTimeout = setTimeout(() => {
      this.connect().catch((error: unknown) => {
        this.log.error('MarketStream', `Reconnect failed: ${error instanceof Error ? error.message : String(error)}`);
      });
    }, RECONNECT_DELAY_MS);
  }

  private clearReconnectTimeout(): void {
    if (this.reconnectTimeout) {
      clearTimeout(this.reconnectTimeout);
      this.reconnectTimeout = null;
    }
  }
}
