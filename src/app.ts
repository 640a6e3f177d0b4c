import { context as otelContext, trace } from '@opentelemetry/api';
import { randomUUID } from 'node:crypto';

import fastify from 'fastify';
import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import jwt from '@fastify/jwt';

import { getEnv } from './config/env';
import { closeRedis } from './config/redis';
import { AppError } from './shared/errors';
import { registerModules } from './modules/register-modules';
import { PlatformClient, type FetchLike } from './modules/platform/client';
import { SessionRegistry } from './modules/session/session';
import { setLogContext } from './observability/log-context';
import { sanitizeInput } from './shared/security/sanitizer';
import { maskSensitiveData } from './shared/security/mask';

export type AppOptions = {
  /** Transport for survey platform requests; defaults to the global fetch. */
  fetchFn?: FetchLike;
};

export async function createApp(options: AppOptions = {}): Promise<FastifyInstance> {
  const env = getEnv();
  const app = fastify({
    logger: { level: env.LOG_LEVEL },
    genReqId(request) {
      const header = request.headers['x-request-id'];
      return typeof header === 'string' && header.length > 0 ? header : randomUUID();
    },
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'correlation_id',
  });

  app.addHook('onRequest', (request, reply, done) => {
    const correlationId = request.id;
    reply.header('x-request-id', correlationId);

    setLogContext({ correlation_id: correlationId });

    const span = trace.getSpan(otelContext.active());
    if (span) {
      const spanContext = span.spanContext();
      setLogContext({ trace_id: spanContext.traceId, span_id: spanContext.spanId });
      span.setAttribute('http.request_id', correlationId);
    }

    request.log = request.log.child({ correlation_id: correlationId });
    done();
  });

  await app.register(cors, { origin: true, exposedHeaders: ['x-request-id', 'x-export-skipped', 'content-disposition'] });
  await app.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        frameAncestors: ["'none'"],
        objectSrc: ["'none'"],
        baseUri: ["'self'"],
      },
    },
    crossOriginEmbedderPolicy: false,
    crossOriginResourcePolicy: { policy: 'same-origin' },
    referrerPolicy: { policy: 'no-referrer' },
  });
  await app.register(rateLimit, {
    max: Number(env.RATE_LIMIT_MAX),
    timeWindow: Number(env.RATE_LIMIT_TIME_WINDOW_MS),
    allowList: ['127.0.0.1'],
  });
  // Sessions live server-side and expire on inactivity, so tokens carry no expiry of their own.
  await app.register(jwt, { secret: env.JWT_SECRET });

  app.addHook('preValidation', (request, _reply, done) => {
    request.body = sanitizeInput(request.body);
    request.query = sanitizeInput(request.query);
    done();
  });

  const maskingEnabled = env.RESPONSE_MASKING_ENABLED === 'true';

  app.addHook('onSend', async (_request, reply, payload) => {
    reply.header('Strict-Transport-Security', 'max-age=63072000; includeSubDomains');
    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('X-Frame-Options', 'DENY');

    const contentType = reply.getHeader('content-type');
    if (!maskingEnabled || typeof payload !== 'string' || !String(contentType ?? '').includes('application/json')) {
      return payload;
    }

    try {
      return JSON.stringify(maskSensitiveData(JSON.parse(payload)));
    } catch (error) {
      app.log.warn({ err: error }, 'response masking skipped for unparseable JSON');
      return payload;
    }
  });

  app.setErrorHandler((error: FastifyError | AppError, request: FastifyRequest, reply: FastifyReply) => {
    if (error instanceof AppError) {
      request.log.warn({ err: error, details: error.details }, 'application error');
      return reply.status(error.statusCode).send({
        message: error.message,
        details: error.details,
      });
    }

    if (error.statusCode && error.statusCode >= 400 && error.statusCode < 500) {
      request.log.warn({ err: error }, 'request rejected');
      return reply.status(error.statusCode).send({ message: error.message });
    }

    request.log.error({ err: error }, 'unhandled error');
    return reply.status(500).send({ message: 'Internal server error' });
  });

  const timeoutMs = Number(env.PLATFORM_REQUEST_TIMEOUT_MS);
  const sessions = new SessionRegistry(
    Number(env.SESSION_TTL_MINUTES) * 60_000,
    (credentials) => new PlatformClient({ ...credentials, timeoutMs, fetchFn: options.fetchFn }),
  );

  await registerModules(app, sessions);

  app.addHook('onClose', async () => {
    await closeRedis();
  });

  return app;
}
