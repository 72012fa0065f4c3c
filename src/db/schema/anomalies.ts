import { pgTable, uuid, text, timestamp } from 'drizzle-orm/pg-core';

export const normalizationAnomalies = pgTable('normalization_anomalies', {
  id: uuid('id').primaryKey().defaultRandom(),
  batchId: text('batch_id').notNull(),
  kind: text('kind').notNull(),
  source: text('source').notNull(),
  scenarioId: text('scenario_id'),
  field: text('field'),
  message: text('message').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});
