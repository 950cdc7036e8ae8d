import { pgTable, pgEnum, integer, timestamp, primaryKey } from 'drizzle-orm/pg-core';

export const ledgerPipelineEnum = pgEnum('ledger_pipeline', ['margins', 'high_scorer']);

export const processedWeeks = pgTable('processed_weeks', {
  pipeline: ledgerPipelineEnum('pipeline').notNull(),
  year: integer('year').notNull(),
  week: integer('week').notNull(),
  processedAt: timestamp('processed_at').defaultNow().notNull(),
}, (t) => ({
  pk: primaryKey({ columns: [t.pipeline, t.year, t.week] }),
}));
