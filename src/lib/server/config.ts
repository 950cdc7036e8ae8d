/**
 * Sync configuration
 * Loaded from a JSON document (see config.example.json) and validated before
 * any remote call is made.
 */

import { access, readFile } from 'node:fs/promises';
import { constants as fsConstants } from 'node:fs';
import { z } from 'zod';
import type { LeagueSeason } from '@/lib/records/types';

export const DEFAULT_CONFIG_FILE = 'config.json';

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

const LedgerSchema = z
  .object({
    backend: z.enum(['file', 'postgres']).default('file'),
    margins_file: z.string().min(1).default('processed_weeks_margins.txt'),
    high_scorer_file: z.string().min(1).default('processed_weeks_high_scorer.txt'),
  })
  .default({});

export const SyncConfigSchema = z.object({
  spreadsheet_id: z.string().min(1),
  service_account_file: z.string().min(1),
  players_file: z.string().min(1),
  // year -> league id; an empty or null id skips that year
  league_ids: z.record(z.string().regex(/^\d{4}$/, 'league_ids keys must be 4-digit years'), z.string().nullable()),
  current_year: z.number().int().optional(),
  sleeper_api_base: z.string().url().optional(),
  request_timeout_ms: z.number().int().positive().optional(),
  ledger: LedgerSchema,
});

export type LedgerBackend = 'file' | 'postgres';

export interface SyncConfig {
  spreadsheetId: string;
  serviceAccountFile: string;
  playersFile: string;
  leagues: LeagueSeason[];
  currentYear?: number;
  sleeperApiBase?: string;
  requestTimeoutMs?: number;
  ledger: {
    backend: LedgerBackend;
    marginsFile: string;
    highScorerFile: string;
  };
}

export function parseConfig(data: unknown, source: string = DEFAULT_CONFIG_FILE): SyncConfig {
  const parsed = SyncConfigSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration in ${source}: ${issues}`);
  }
  const c = parsed.data;

  const leagues: LeagueSeason[] = Object.entries(c.league_ids)
    .filter(([, leagueId]) => typeof leagueId === 'string' && leagueId.trim().length > 0)
    .map(([year, leagueId]) => ({ year: Number(year), leagueId: String(leagueId).trim() }))
    .sort((a, b) => a.year - b.year);

  return {
    spreadsheetId: c.spreadsheet_id,
    serviceAccountFile: c.service_account_file,
    playersFile: c.players_file,
    leagues,
    currentYear: c.current_year,
    sleeperApiBase: c.sleeper_api_base,
    requestTimeoutMs: c.request_timeout_ms,
    ledger: {
      backend: c.ledger.backend,
      marginsFile: c.ledger.margins_file,
      highScorerFile: c.ledger.high_scorer_file,
    },
  };
}

export async function loadConfig(filePath: string = DEFAULT_CONFIG_FILE): Promise<SyncConfig> {
  console.log(`[config] Loading configuration from ${filePath}...`);
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Unable to read ${filePath}: ${reason}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`${filePath} is not valid JSON: ${reason}`);
  }

  const config = parseConfig(data, filePath);
  try {
    await access(config.serviceAccountFile, fsConstants.R_OK);
  } catch {
    throw new ConfigurationError(`service_account_file ${config.serviceAccountFile} is not readable`);
  }

  console.log(`[config] Loaded ${config.leagues.length} leagues (${config.leagues.map((l) => l.year).join(', ') || 'none'})`);
  return config;
}
