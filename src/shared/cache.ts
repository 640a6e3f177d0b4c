import { getRedis } from '../config/redis';
import { getEnv } from '../config/env';
import { logger } from '../config/logger';

export async function withCache<T>(key: string, factory: () => Promise<T>): Promise<T> {
  const redis = getRedis();
  if (!redis) {
    return factory();
  }

  let cached: string | null = null;
  try {
    if (redis.status === 'wait' || redis.status === 'end') {
      await redis.connect();
    }
    cached = await redis.get(key);
  } catch (error) {
    logger.warn({ err: error, key }, 'cache read failure');
    return factory();
  }

  if (cached) {
    return JSON.parse(cached) as T;
  }

  // Factory errors propagate; only cache I/O failures are tolerated.
  const result = await factory();
  try {
    const ttl = parseInt(getEnv().CACHE_TTL_SECONDS, 10) || 300;
    await redis.set(key, JSON.stringify(result), 'EX', ttl);
  } catch (error) {
    logger.warn({ err: error, key }, 'cache write failure');
  }
  return result;
}

export async function clearCache(prefix: string): Promise<number> {
  const redis = getRedis();
  if (!redis) {
    return 0;
  }

  try {
    if (redis.status === 'wait' || redis.status === 'end') {
      await redis.connect();
    }
    const keys = await redis.keys(`${prefix}*`);
    if (keys.length === 0) {
      return 0;
    }
    return await redis.del(...keys);
  } catch (error) {
    logger.warn({ err: error, prefix }, 'cache clear failure');
    return 0;
  }
}
