import { getDb } from './client';
import { processedWeeks } from './schema';
import { eq } from 'drizzle-orm';

export type LedgerPipeline = 'margins' | 'high_scorer';

export async function listProcessedWeeks(pipeline: LedgerPipeline): Promise<Array<{ year: number; week: number }>> {
  const db = getDb();
  const rows = await db
    .select({ year: processedWeeks.year, week: processedWeeks.week })
    .from(processedWeeks)
    .where(eq(processedWeeks.pipeline, pipeline));
  return rows;
}

export async function insertProcessedWeek(pipeline: LedgerPipeline, year: number, week: number): Promise<void> {
  const db = getDb();
  await db.insert(processedWeeks).values({ pipeline, year, week }).onConflictDoNothing();
}
