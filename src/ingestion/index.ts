export * from './types.js';
export { fetchJson, parseEach, DEFAULT_TIMEOUT_MS } from './http.js';
export type { FetchJsonOptions } from './http.js';
export * from './polymarket/index.js';
export * from './whales/index.js';
export * from './prices/index.js';
