import type { FastifyPluginAsync } from 'fastify';

import { AppError, ConflictError } from '../../shared/errors';
import { requireSession } from '../session/plugin';
import { exportQuerySchema } from './schemas';
import { buildExport } from './service';

export const exportRoutes: FastifyPluginAsync = async (app) => {
  app.get('/exports', {
    preHandler: [app.authenticate],
  }, async (request, reply) => {
    const parsed = exportQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      throw new AppError('Invalid query', 400, parsed.error.flatten());
    }

    const session = requireSession(request);
    if (!session.projects.isLoaded) {
      throw new ConflictError('Load projects before exporting');
    }
    if (session.displayedProjects.length === 0) {
      throw new ConflictError('No projects are displayed');
    }

    const file = await buildExport(parsed.data.type, session.client, session.displayedProjects);
    request.log.info({ type: parsed.data.type, bytes: file.buffer.length, skipped: file.skipped.length }, 'export generated');

    reply.header('Content-Type', file.contentType);
    reply.header('Content-Disposition', `attachment; filename="${file.filename}"`);
    reply.header('x-export-skipped', String(file.skipped.length));
    return reply.send(file.buffer);
  });
};
