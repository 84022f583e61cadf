import { Redis } from 'ioredis';
import { logger } from './logging.js';

export const createRedisClient = (url: string): Redis => {
  const client = new Redis(url, { lazyConnect: true, maxRetriesPerRequest: 3 });

  client.on('error', (error: Error) => {
    logger.error('redis connection error', { message: error.message });
  });

  return client;
};
