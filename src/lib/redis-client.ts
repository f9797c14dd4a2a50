import { Redis } from 'ioredis';
import logger from './logger.js';

let redisClient: Redis | null = null;

/**
 * Returns the singleton Redis client, creating it lazily on first call.
 *
 * The client fails fast (short connectTimeout, one retry per request) so a
 * missing Redis shows up as an error on the first cache lookup instead of
 * hanging the batch.
 */
export function getRedisClient(redisUrl: string): Redis {
  if (redisClient) return redisClient;

  redisClient = new Redis(redisUrl, {
    maxRetriesPerRequest: 1,
    connectTimeout: 3000,
    lazyConnect: true,
  });

  redisClient.on('error', (err: Error) => {
    logger.warn({ err: err.message }, 'Redis connection error');
  });

  return redisClient;
}

/**
 * Gracefully closes the Redis connection.
 * Safe to call even if Redis was never connected.
 */
export async function shutdownRedis(): Promise<void> {
  if (!redisClient) return;
  const client = redisClient;
  redisClient = null;
  try {
    await client.quit();
  } catch (err) {
    logger.warn({ err: err instanceof Error ? err.message : String(err) }, 'Redis quit failed, disconnecting');
    client.disconnect();
  }
}
