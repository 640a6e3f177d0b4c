import 'fastify';
import '@fastify/jwt';

import type { SessionRegistry } from '../modules/session/session';

declare module 'fastify' {
  interface FastifyInstance {
    authenticate: import('fastify').preHandlerHookHandler;
    sessions: SessionRegistry;
  }
}

declare module '@fastify/jwt' {
  interface FastifyJWT {
    payload: {
      sid: string;
    };
    user: {
      sid: string;
    };
  }
}
