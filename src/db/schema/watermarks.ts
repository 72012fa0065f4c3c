import { pgTable, text, timestamp } from 'drizzle-orm/pg-core';

// Last processed position per ETL stream, e.g. `audit_batch` -> last batch id.
export const etlWatermarks = pgTable('etl_watermarks', {
  name: text('name').primaryKey(),
  value: text('value').notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});
