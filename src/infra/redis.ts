import { Redis } from 'ioredis';
import type { Logger } from './logger.js';

export type RedisClient = Redis;

export function createRedisClient(url: string, logger: Logger): RedisClient {
  const client = new Redis(url, {
    connectionName: 'gas-reserve-node',
    maxRetriesPerRequest: 3,
    // Snapshot writes must not queue up silently while disconnected.
    enableOfflineQueue: false,
    retryStrategy(times: number) {
      return Math.min(times * 250, 5000);
    },
    lazyConnect: true,
  });

  client.on('ready', () => {
    logger.info('Redis ready');
  });

  client.on('reconnecting', (delay: number) => {
    logger.warn({ delay }, 'Redis reconnecting');
  });

  client.on('error', (err: Error) => {
    logger.error({ err }, 'Redis error');
  });

  return client;
}
