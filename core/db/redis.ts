/**
 * Redis connection setup for the checkpoint store
 */

import Redis from 'ioredis';
import { createEnhancedLogger } from '../../utils/logger';

const logger = createEnhancedLogger('RedisConnection');

export interface RedisSettings {
  host: string;
  port: number;
  db: number;
  password?: string;
}

export function createRedisClient(settings: RedisSettings): Redis {
  const client = new Redis({
    host: settings.host,
    port: settings.port,
    db: settings.db,
    password: settings.password || undefined,
    lazyConnect: false,
    retryStrategy(times: number) {
      const delay = Math.min(times * 50, 2000);
      logger.warn(`Redis connection retry attempt ${times}, delay: ${delay}ms`);
      return delay;
    },
  });

  client.on('connect', () => {
    logger.info('Redis connection established', { host: settings.host, port: settings.port });
  });

  client.on('error', (err: Error) => {
    logger.error('Redis connection error', err);
  });

  return client;
}
