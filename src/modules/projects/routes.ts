import type { FastifyPluginAsync } from 'fastify';

import { AppError } from '../../shared/errors';
import { requireSession } from '../session/plugin';
import { loadProjectsBodySchema, projectFilterBodySchema } from './schemas';
import { describeProjects, fetchProjectViews, loadProjects } from './service';

export const projectRoutes: FastifyPluginAsync = async (app) => {
  app.get('/project-views', {
    preHandler: [app.authenticate],
  }, async (request) => {
    const session = requireSession(request);
    const views = await fetchProjectViews(session);
    return { data: views };
  });

  app.post('/projects/load', {
    preHandler: [app.authenticate],
  }, async (request) => {
    const parsedBody = loadProjectsBodySchema.safeParse(request.body ?? {});
    if (!parsedBody.success) {
      throw new AppError('Invalid body', 400, parsedBody.error.flatten());
    }

    const session = requireSession(request);
    const result = await loadProjects(session, parsedBody.data);
    return { ...result, ...describeProjects(session) };
  });

  app.post('/projects/filter', {
    preHandler: [app.authenticate],
  }, async (request) => {
    const parsedBody = projectFilterBodySchema.safeParse(request.body ?? {});
    if (!parsedBody.success) {
      throw new AppError('Invalid body', 400, parsedBody.error.flatten());
    }

    const session = requireSession(request);
    session.applyFilter(parsedBody.data);
    return describeProjects(session);
  });

  app.get('/projects', {
    preHandler: [app.authenticate],
  }, async (request) => describeProjects(requireSession(request)));

  app.get('/projects/filter-options', {
    preHandler: [app.authenticate],
  }, async (request) => {
    const session = requireSession(request);
    return session.projects.filterOptions();
  });
};
