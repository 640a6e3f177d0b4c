import type { FastifyPluginAsync } from 'fastify';

import { getEnv } from '../../config/env';
import { clearCache } from '../../shared/cache';
import { AppError } from '../../shared/errors';
import { resolveCredentials } from './credentials';
import { requireSession } from './plugin';
import { createSessionBodySchema } from './schemas';

export const sessionRoutes: FastifyPluginAsync = async (app) => {
  app.post('/session', async (request, reply) => {
    const parsed = createSessionBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      throw new AppError('Invalid body', 400, parsed.error.flatten());
    }

    const credentials = resolveCredentials(parsed.data, getEnv().PLATFORM_DEFAULT_SERVER_URL);
    const session = app.sessions.create(credentials);
    const sessionToken = await reply.jwtSign({ sid: session.id });

    request.log.info({ session_id: session.id, serverUrl: credentials.serverUrl }, 'session created');

    return reply.status(201).send({
      sessionToken,
      expiresAt: session.expiresAt.toISOString(),
      serverUrl: credentials.serverUrl,
    });
  });

  app.delete('/session', {
    preHandler: [app.authenticate],
  }, async (request, reply) => {
    const session = requireSession(request);
    app.sessions.delete(session.id);
    request.log.info({ session_id: session.id }, 'session ended');
    return reply.status(204).send();
  });

  app.delete('/cache', {
    preHandler: [app.authenticate],
  }, async (request) => {
    const session = requireSession(request);
    const cleared = await clearCache(session.client.cacheNamespace);
    return { cleared };
  });
};
