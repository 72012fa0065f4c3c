import { Router } from 'express';
import { z } from 'zod';
import {
  buildScenarioTimeline,
  compareRunPair,
  deriveRuns,
  diffRunContext,
  filterTimeline,
  runDiagnostics,
  scenarioErrorSummary,
  toInputChangeRecords,
  type AuditEvent,
} from '@core/index';
import type { ApiContext } from '../context';
import { asyncHandler, formatZodError, sendAuditError } from '../middleware/index';
import { eventTypesParam, isoTimestampParam } from './params';

const auditTrailQuery = z.object({
  from: isoTimestampParam.optional(),
  to: isoTimestampParam.optional(),
  eventTypes: eventTypesParam,
});

const runComparisonQuery = z.object({
  runA: z.string().min(1),
  runB: z.string().min(1),
});

async function scenarioTimeline(ctx: ApiContext, scenarioId: string): Promise<AuditEvent[]> {
  const stored = await ctx.repository.scenarioEvents(scenarioId);
  return buildScenarioTimeline(stored).events;
}

export function createScenariosRouter(ctx: ApiContext): Router {
  const router = Router();

  // GET /scenarios/:scenarioId/audit-trail -- merged, filtered timeline
  router.get(
    '/scenarios/:scenarioId/audit-trail',
    asyncHandler(async (req, res) => {
      const query = auditTrailQuery.safeParse(req.query);
      if (!query.success) {
        res.status(400).json({ success: false, error: formatZodError(query.error) });
        return;
      }

      const { scenarioId } = req.params;
      const timeline = await scenarioTimeline(ctx, scenarioId);
      const events = filterTimeline(timeline, {
        from: query.data.from,
        to: query.data.to,
        eventTypes: query.data.eventTypes,
      });

      res.json({
        success: true,
        data: { scenarioId, totalEvents: timeline.length, eventCount: events.length, events },
      });
    }),
  );

  // GET /scenarios/:scenarioId/runs -- runs derived from run events
  router.get(
    '/scenarios/:scenarioId/runs',
    asyncHandler(async (req, res) => {
      const { scenarioId } = req.params;
      const runs = deriveRuns(await scenarioTimeline(ctx, scenarioId));
      res.json({ success: true, data: { scenarioId, runs } });
    }),
  );

  // GET /scenarios/:scenarioId/runs/:runId/context -- changes since the last successful run
  router.get(
    '/scenarios/:scenarioId/runs/:runId/context',
    asyncHandler(async (req, res) => {
      const { scenarioId, runId } = req.params;
      const events = await scenarioTimeline(ctx, scenarioId);
      const result = diffRunContext({
        runs: deriveRuns(events),
        inputChanges: toInputChangeRecords(events),
        events,
        targetRunId: runId,
      });
      if (!result.ok) {
        sendAuditError(res, result.error);
        return;
      }
      res.json({ success: true, data: result.value });
    }),
  );

  // GET /scenarios/:scenarioId/runs/:runId/diagnostics -- the run's log lines and error categories
  router.get(
    '/scenarios/:scenarioId/runs/:runId/diagnostics',
    asyncHandler(async (req, res) => {
      const { scenarioId, runId } = req.params;
      const result = runDiagnostics(await scenarioTimeline(ctx, scenarioId), runId);
      if (!result.ok) {
        sendAuditError(res, result.error);
        return;
      }
      res.json({ success: true, data: { scenarioId, ...result.value } });
    }),
  );

  // GET /scenarios/:scenarioId/error-summary -- run outcomes and ERROR categories
  router.get(
    '/scenarios/:scenarioId/error-summary',
    asyncHandler(async (req, res) => {
      const { scenarioId } = req.params;
      res.json({ success: true, data: scenarioErrorSummary(scenarioId, await scenarioTimeline(ctx, scenarioId)) });
    }),
  );

  // GET /scenarios/:scenarioId/run-comparison?runA&runB -- explicit pair
  router.get(
    '/scenarios/:scenarioId/run-comparison',
    asyncHandler(async (req, res) => {
      const query = runComparisonQuery.safeParse(req.query);
      if (!query.success) {
        res.status(400).json({ success: false, error: formatZodError(query.error) });
        return;
      }

      const events = await scenarioTimeline(ctx, req.params.scenarioId);
      const result = compareRunPair({
        runs: deriveRuns(events),
        inputChanges: toInputChangeRecords(events),
        events,
        runAId: query.data.runA,
        runBId: query.data.runB,
      });
      if (!result.ok) {
        sendAuditError(res, result.error);
        return;
      }
      res.json({ success: true, data: result.value });
    }),
  );

  return router;
}
