import type { FastifyPluginAsync } from 'fastify';

import { AppError } from '../../shared/errors';
import { requireSession } from '../session/plugin';
import { analyticsOverviewQuerySchema } from './schemas';
import { getAnalyticsOverview } from './service';

export const analyticsRoutes: FastifyPluginAsync = async (app) => {
  app.get('/analytics/overview', {
    preHandler: [app.authenticate],
  }, async (request) => {
    const parsed = analyticsOverviewQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      throw new AppError('Invalid query', 400, parsed.error.flatten());
    }

    const session = requireSession(request);
    return getAnalyticsOverview(session.displayedProjects, parsed.data.top);
  });
};
