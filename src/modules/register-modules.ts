import type { FastifyInstance } from 'fastify';

import { registerSessionDecorators } from './session/plugin';
import type { SessionRegistry } from './session/session';
import { sessionRoutes } from './session/routes';
import { healthRoutes } from './system/health.route';
import { projectRoutes } from './projects/routes';
import { analyticsRoutes } from './analytics/routes';
import { formRoutes } from './forms/routes';
import { searchRoutes } from './search/routes';
import { exportRoutes } from './exports/routes';

export async function registerModules(app: FastifyInstance, sessions: SessionRegistry) {
  await registerSessionDecorators(app, sessions);

  await app.register(healthRoutes);
  await app.register(sessionRoutes);
  await app.register(projectRoutes);
  await app.register(analyticsRoutes);
  await app.register(formRoutes);
  await app.register(searchRoutes);
  await app.register(exportRoutes);
}
