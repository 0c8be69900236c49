import { Router } from 'express';
import type { ServiceContext } from '../services/context';
import { createAssessmentsRouter } from './assessments';
import { createChangesRouter } from './changes';
import { createGradeKeysRouter } from './gradeKeys';
import { createImportsRouter } from './imports';
import { createResultsRouter } from './results';

export function createApiRouter(ctx: ServiceContext, uploadLimit: string): Router {
  const apiRouter = Router();

  apiRouter.use('/grade-keys', createGradeKeysRouter(ctx));
  // nested routers first so /:id on the assessments router does not shadow them
  apiRouter.use('/assessments/:id/results', createResultsRouter(ctx));
  apiRouter.use('/assessments/:id/imports', createImportsRouter(ctx, uploadLimit));
  apiRouter.use('/assessments', createAssessmentsRouter(ctx));
  apiRouter.use('/changes', createChangesRouter(ctx));

  return apiRouter;
}
