import type { FastifyInstance, FastifyRequest } from 'fastify';

import { setLogContext } from '../../observability/log-context';
import { UnauthorizedError } from '../../shared/errors';
import type { DashboardSession, SessionRegistry } from './session';

export async function registerSessionDecorators(app: FastifyInstance, sessions: SessionRegistry) {
  app.decorate('sessions', sessions);

  app.decorate('authenticate', async (request) => {
    try {
      await request.jwtVerify();
    } catch {
      throw new UnauthorizedError();
    }

    const session = sessions.get(request.user.sid);
    if (!session) {
      throw new UnauthorizedError('Session expired or ended');
    }

    setLogContext({ session_id: session.id });
  });
}

/** The live session of an authenticated request. */
export function requireSession(request: FastifyRequest): DashboardSession {
  const session = request.server.sessions.get(request.user.sid);
  if (!session) {
    throw new UnauthorizedError('Session expired or ended');
  }
  return session;
}
