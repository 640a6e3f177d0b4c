import type { FastifyPluginAsync } from 'fastify';

import { AppError } from '../../shared/errors';
import { requireSession } from '../session/plugin';
import { lastSearchQuerySchema, searchBodySchema } from './schemas';
import { getLastSearch, listMatchMethods, runSearch } from './service';

export const searchRoutes: FastifyPluginAsync = async (app) => {
  app.get('/forms/search/methods', {
    preHandler: [app.authenticate],
  }, async () => ({ data: listMatchMethods() }));

  app.post('/forms/search', {
    preHandler: [app.authenticate],
  }, async (request) => {
    const parsedBody = searchBodySchema.safeParse(request.body ?? {});
    if (!parsedBody.success) {
      throw new AppError('Invalid body', 400, parsedBody.error.flatten());
    }

    const { onlyMatched, orderBy, ...search } = parsedBody.data;
    return runSearch(requireSession(request), search, { onlyMatched, orderBy });
  });

  app.get('/forms/search', {
    preHandler: [app.authenticate],
  }, async (request) => {
    const parsedQuery = lastSearchQuerySchema.safeParse(request.query);
    if (!parsedQuery.success) {
      throw new AppError('Invalid query', 400, parsedQuery.error.flatten());
    }

    return getLastSearch(requireSession(request), parsedQuery.data);
  });
};
