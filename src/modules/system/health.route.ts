import type { FastifyPluginAsync } from 'fastify';

import { getRedis } from '../../config/redis';

export const healthRoutes: FastifyPluginAsync = async (app) => {
  app.get('/health', async () => {
    const redis = getRedis();
    return {
      status: 'ok',
      uptimeSeconds: Math.round(process.uptime()),
      activeSessions: app.sessions.size,
      cache: redis ? redis.status : 'disabled',
    };
  });
};
