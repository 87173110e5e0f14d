import type { RedisClient } from './redis.js';
import type { Logger } from './logger.js';
import type { SolanaContext } from './solana.js';

export type Clock = () => number;

export interface Container {
  logger: Logger;
  redis: RedisClient;
  solana: SolanaContext;
  clock: Clock;
}
