import { Router } from 'express';
import { z } from 'zod';
import { accumulateMetrics, dailySuccessRate, topErrorCategories, topFailingNodes } from '@core/index';
import { trailingWindow, type ApiContext } from '../context';
import { asyncHandler, formatZodError } from '../middleware/index';
import { daysParam, limitParam } from './params';

const reliabilityQuery = z.object({
  days: daysParam.optional(),
  limit: limitParam.optional(),
});

export function createInsightsRouter(ctx: ApiContext): Router {
  const router = Router();

  // GET /insights/reliability -- error categories, failing nodes, daily run success
  router.get(
    '/insights/reliability',
    asyncHandler(async (req, res) => {
      const query = reliabilityQuery.safeParse(req.query);
      if (!query.success) {
        res.status(400).json({ success: false, error: formatZodError(query.error) });
        return;
      }

      const days = query.data.days ?? ctx.settings.defaultWindowDays;
      const limit = query.data.limit ?? ctx.settings.topNLimit;
      const window = trailingWindow(ctx.now(), days);
      const metrics = accumulateMetrics(await ctx.repository.eventsInRange(window));

      res.json({
        success: true,
        data: {
          windowDays: days,
          from: window.from,
          topErrorCategories: topErrorCategories(metrics, limit),
          topFailingNodes: topFailingNodes(metrics, limit),
          dailySuccessRate: dailySuccessRate(metrics),
        },
      });
    }),
  );

  return router;
}
