export { GammaClient, toMarketInfo } from './gamma.js';
export type { GammaClientOptions } from './gamma.js';
export { ClobClient, askDepthUsd } from './clob.js';
export type { ClobClientOptions } from './clob.js';
export { MarketStream } from './stream.js';
export type { MarketStreamOptions, MarketStreamEvents } from './stream.js';
export {
  GammaMarketSchema,
  GammaEventSchema,
  ClobPriceSchema,
  ClobBookSchema,
  MarketResolvedMessageSchema,
} from './types.js';
export type {
  GammaMarket,
  GammaEvent,
  ClobBook,
  MarketResolvedMessage,
} from './types.js';
