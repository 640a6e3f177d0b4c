import type { FastifyPluginAsync } from 'fastify';

import { AppError } from '../../shared/errors';
import { requireSession } from '../session/plugin';
import { formUidParamSchema } from './schemas';
import { analyseSessionForms, describeForms, getFormQuestions } from './service';

export const formRoutes: FastifyPluginAsync = async (app) => {
  app.post('/forms/analyse', {
    preHandler: [app.authenticate],
  }, async (request) => analyseSessionForms(requireSession(request)));

  app.get('/forms', {
    preHandler: [app.authenticate],
  }, async (request) => describeForms(requireSession(request)));

  app.get('/forms/:uid/questions', {
    preHandler: [app.authenticate],
  }, async (request) => {
    const parsedParams = formUidParamSchema.safeParse(request.params);
    if (!parsedParams.success) {
      throw new AppError('Invalid params', 400, parsedParams.error.flatten());
    }

    return getFormQuestions(requireSession(request), parsedParams.data.uid);
  });
};
