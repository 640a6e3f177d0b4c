import Redis from 'ioredis';
import { getEnv } from './env';
import { logger } from './logger';

let client: Redis | null = null;
let initialized = false;

export function getRedis(): Redis | null {
  if (!initialized) {
    initialized = true;
    const env = getEnv();
    if (!env.REDIS_URL) {
      logger.info('REDIS_URL not set; platform response caching disabled');
      return null;
    }

    client = new Redis(env.REDIS_URL, {
      lazyConnect: true,
    });

    client.on('error', (error) => {
      logger.error({ err: error }, 'Redis error');
    });
  }

  return client;
}

export async function closeRedis(): Promise<void> {
  if (client && client.status !== 'end' && client.status !== 'wait') {
    await client.quit();
  }
  client = null;
  initialized = false;
}
