import { pgTable, uuid, text, timestamp, jsonb, index } from 'drizzle-orm/pg-core';
import type { AuditEvent } from '@core/events';

export const auditEvents = pgTable(
  'audit_events',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    identityKey: text('identity_key').notNull().unique(),
    scenarioId: text('scenario_id').notNull(),
    eventType: text('event_type').notNull(),
    occurredAt: timestamp('occurred_at', { withTimezone: true }).notNull(),
    actor: text('actor'),
    correlationId: text('correlation_id'),
    runId: text('run_id'),
    nodeId: text('node_id'),
    batchId: text('batch_id').notNull(),
    event: jsonb('event').$type<AuditEvent>().notNull(),
    ingestedAt: timestamp('ingested_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    scenarioTimeIdx: index('audit_events_scenario_time_idx').on(table.scenarioId, table.occurredAt),
    actorTimeIdx: index('audit_events_actor_time_idx').on(table.actor, table.occurredAt),
  }),
);
