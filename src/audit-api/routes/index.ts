import { Router } from 'express';
import type { ApiContext } from '../context';
import { createHealthRouter } from './health';
import { createIngestRouter } from './ingest';
import { createInsightsRouter } from './insights';
import { createScenariosRouter } from './scenarios';
import { createUsersRouter } from './users';

export function createApiRouter(ctx: ApiContext): Router {
  const router = Router();
  router.use(createHealthRouter(ctx));
  router.use(createScenariosRouter(ctx));
  router.use(createUsersRouter(ctx));
  router.use(createInsightsRouter(ctx));
  router.use(createIngestRouter(ctx));
  return router;
}
