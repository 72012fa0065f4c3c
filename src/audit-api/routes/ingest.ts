import { randomUUID } from 'crypto';
import { Router } from 'express';
import { auditBatchSchema } from '@core/index';
import { processAuditBatch } from '@worker/index';
import type { ApiContext } from '../context';
import { asyncHandler, formatZodError } from '../middleware/index';

export function createIngestRouter(ctx: ApiContext): Router {
  const router = Router();

  // POST /ingest -- normalize and store one batch of raw source records
  router.post(
    '/ingest',
    asyncHandler(async (req, res) => {
      const body = auditBatchSchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({ success: false, error: formatZodError(body.error) });
        return;
      }

      const batchId = body.data.batchId ?? randomUUID();
      const processed = processAuditBatch(
        { batchId, records: body.data.records },
        { anomalySampleSize: ctx.settings.anomalySampleSize },
      );
      const stored = await ctx.repository.saveBatch({
        batchId,
        events: processed.events,
        anomalies: processed.anomalies,
      });

      res.status(201).json({ success: true, data: { ...processed.report, stored } });
    }),
  );

  return router;
}
