export { createLogger } from './logger.js';
export type { Logger } from './logger.js';
export { createRedisClient } from './redis.js';
export type { RedisClient } from './redis.js';
export { createSolanaContext, checkRpcHealth } from './solana.js';
export type { SolanaContext } from './solana.js';
export type { Container, Clock } from './container.js';
