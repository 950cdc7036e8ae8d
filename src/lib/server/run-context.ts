import { ConfigurationError, type SyncConfig } from '@/lib/server/config';
import { FileWeekLedger, InMemoryWeekLedger, PostgresWeekLedger, type WeekLedger } from '@/lib/server/week-ledger';
import { SleeperClient, type LeagueDataSource, type PlayerDirectory } from '@/lib/utils/sleeper-api';
import { loadPlayerDirectory } from '@/lib/utils/players';
import { resolveDatabaseUrl } from '@/server/db/client';
import { SheetPublisher } from '@/server/sheets/publisher';
import { createGoogleSheetsClient } from '@/server/sheets/google-sheets';
import type { SheetClient } from '@/server/sheets/types';

export interface RunLedgers {
  margins: WeekLedger;
  highScorer: WeekLedger;
}

/**
 * Everything one sync run needs, built once and handed to each pipeline.
 */
export interface RunContext {
  config: SyncConfig;
  now: Date;
  currentYear: number;
  dryRun: boolean;
  source: LeagueDataSource;
  publisher: SheetPublisher;
  ledgers: RunLedgers;
  players(): Promise<PlayerDirectory>;
}

export interface RunContextOptions {
  dryRun?: boolean;
  now?: Date;
  source?: LeagueDataSource;
  sheetClient?: SheetClient;
  ledgers?: RunLedgers;
}

export async function openLedgers(config: SyncConfig, dryRun: boolean): Promise<RunLedgers> {
  let margins: WeekLedger;
  let highScorer: WeekLedger;
  if (config.ledger.backend === 'postgres') {
    if (!resolveDatabaseUrl()) {
      throw new ConfigurationError('ledger.backend is "postgres" but DATABASE_URL (or POSTGRES_URL) is not set');
    }
    margins = await PostgresWeekLedger.open('margins');
    highScorer = await PostgresWeekLedger.open('high_scorer');
  } else {
    margins = await FileWeekLedger.open('margins', config.ledger.marginsFile);
    highScorer = await FileWeekLedger.open('high_scorer', config.ledger.highScorerFile);
  }
  if (!dryRun) return { margins, highScorer };
  // Dry runs see what has been processed but never record anything
  return {
    margins: new InMemoryWeekLedger(margins.name, margins.keys()),
    highScorer: new InMemoryWeekLedger(highScorer.name, highScorer.keys()),
  };
}

export async function createRunContext(config: SyncConfig, options: RunContextOptions = {}): Promise<RunContext> {
  const now = options.now ?? new Date();
  const dryRun = options.dryRun === true;
  const source = options.source ?? new SleeperClient({
    baseUrl: config.sleeperApiBase,
    timeoutMs: config.requestTimeoutMs,
  });
  const sheetClient = options.sheetClient ?? createGoogleSheetsClient({
    spreadsheetId: config.spreadsheetId,
    keyFile: config.serviceAccountFile,
  });
  const ledgers = options.ledgers ?? await openLedgers(config, dryRun);

  let playersPromise: Promise<PlayerDirectory> | null = null;
  const players = (): Promise<PlayerDirectory> => {
    if (!playersPromise) {
      playersPromise = loadPlayerDirectory({ file: config.playersFile, source, persist: !dryRun });
    }
    return playersPromise;
  };

  return {
    config,
    now,
    currentYear: config.currentYear ?? now.getFullYear(),
    dryRun,
    source,
    publisher: new SheetPublisher(sheetClient, { dryRun }),
    ledgers,
    players,
  };
}
