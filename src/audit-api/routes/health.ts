import { Router } from 'express';
import { AUDIT_CORE_VERSION } from '@core/index';
import type { ApiContext } from '../context';

export function createHealthRouter(ctx: ApiContext): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.json({
      success: true,
      data: {
        status: 'ok',
        service: 'scenario-audit-trail',
        version: AUDIT_CORE_VERSION,
        timestamp: ctx.now().toISOString(),
      },
    });
  });

  return router;
}
