export { SpotPriceFeed } from './spot-feed.js';
export type { SpotPriceFeedOptions } from './spot-feed.js';
