import { drizzle, type NeonHttpDatabase } from 'drizzle-orm/neon-http';
import { neon } from '@neondatabase/serverless';

export type LedgerDb = NeonHttpDatabase;

/**
 * Connection string for the postgres ledger backend, if the environment has one.
 */
export function resolveDatabaseUrl(env: NodeJS.ProcessEnv = process.env): string | null {
  const url = env.DATABASE_URL || env.POSTGRES_URL;
  return url ? url.trim() || null : null;
}

const connections = new Map<string, LedgerDb>();

// One drizzle handle per connection string for the life of the process
export function getDb(url: string | null = resolveDatabaseUrl()): LedgerDb {
  if (!url) throw new Error('No database URL for the postgres ledger');
  let db = connections.get(url);
  if (!db) {
    db = drizzle(neon(url));
    connections.set(url, db);
  }
  return db;
}
