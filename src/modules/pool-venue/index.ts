export { PoolVenue, decodePoolState, encodeSwapData, POOL_ACCOUNT_SIZE } from './pool-venue.service.js';
export type { PoolState, PoolQuote, PoolVenueAssets } from './pool-venue.service.js';
