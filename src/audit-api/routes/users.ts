import { Router } from 'express';
import { z } from 'zod';
import { accumulateMetrics, groupSessions, isUserActionEvent, userVelocity } from '@core/index';
import { trailingWindow, type ApiContext } from '../context';
import { asyncHandler, formatZodError } from '../middleware/index';
import { daysParam, gapMinutesParam } from './params';

const journeyQuery = z.object({
  days: daysParam.optional(),
  gapMinutes: gapMinutesParam.optional(),
});

const velocityQuery = z.object({
  days: daysParam.optional(),
  gapMinutes: gapMinutesParam.optional(),
});

export function createUsersRouter(ctx: ApiContext): Router {
  const router = Router();

  // GET /users/:userId/journey -- actions grouped into sessions
  router.get(
    '/users/:userId/journey',
    asyncHandler(async (req, res) => {
      const query = journeyQuery.safeParse(req.query);
      if (!query.success) {
        res.status(400).json({ success: false, error: formatZodError(query.error) });
        return;
      }

      const { userId } = req.params;
      const days = query.data.days ?? ctx.settings.defaultWindowDays;
      const gapMinutes = query.data.gapMinutes ?? ctx.settings.sessionGapMinutes;
      const events = await ctx.repository.userEvents(userId, trailingWindow(ctx.now(), days));
      const actions = events.filter(isUserActionEvent);
      const sessions = groupSessions(userId, actions, { gapMinutes });

      res.json({
        success: true,
        data: {
          userId,
          windowDays: days,
          gapMinutes,
          totalActions: actions.length,
          sessionCount: sessions.length,
          sessions,
        },
      });
    }),
  );

  // GET /users/:userId/velocity -- activity rollup and session stats over the trailing window
  router.get(
    '/users/:userId/velocity',
    asyncHandler(async (req, res) => {
      const query = velocityQuery.safeParse(req.query);
      if (!query.success) {
        res.status(400).json({ success: false, error: formatZodError(query.error) });
        return;
      }

      const { userId } = req.params;
      const days = query.data.days ?? ctx.settings.defaultWindowDays;
      const gapMinutes = query.data.gapMinutes ?? ctx.settings.sessionGapMinutes;
      const events = await ctx.repository.userEvents(userId, trailingWindow(ctx.now(), days));
      const sessions = groupSessions(userId, events.filter(isUserActionEvent), { gapMinutes });
      res.json({ success: true, data: userVelocity(accumulateMetrics(events), userId, days, sessions) });
    }),
  );

  return router;
}
