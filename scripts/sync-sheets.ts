#!/usr/bin/env tsx
import dotenv from 'dotenv';
dotenv.config({ path: '.env.local' });
dotenv.config();

import { ConfigurationError, DEFAULT_CONFIG_FILE, loadConfig } from '@/lib/server/config';
import { createRunContext } from '@/lib/server/run-context';
import { PIPELINES, formatSummary, isPipelineName, runSync, type PipelineName } from '@/lib/server/sync-runner';

function flag(name: string): boolean {
  return process.argv.includes(`--${name}`);
}

function strFlag(name: string, def = ''): string {
  const p = process.argv.find((a) => a.startsWith(`--${name}=`));
  return p ? p.slice(name.length + 3) : def;
}

function parsePipelines(raw: string): PipelineName[] {
  if (!raw) return [...PIPELINES];
  const names = raw.split(',').map((s) => s.trim()).filter(Boolean);
  const bad = names.filter((n) => !isPipelineName(n));
  if (bad.length > 0) {
    throw new ConfigurationError(`Unknown pipeline(s): ${bad.join(', ')}. Expected one of ${PIPELINES.join(', ')}`);
  }
  return names.filter(isPipelineName);
}

async function main() {
  const dryRun = flag('dry-run');
  const configFile = strFlag('config', process.env.SYNC_CONFIG || DEFAULT_CONFIG_FILE);
  const pipelines = parsePipelines(strFlag('only'));

  console.log(`[sync-sheets] Starting${dryRun ? ' (dry run)' : ''}: ${pipelines.join(', ')}`);
  const config = await loadConfig(configFile);
  const ctx = await createRunContext(config, { dryRun });
  const summary = await runSync(ctx, pipelines);
  for (const line of formatSummary(summary)) console.log(`[sync-sheets] ${line}`);
  console.log('[sync-sheets] Done.');
}

main().catch((e) => {
  if (e instanceof ConfigurationError) {
    console.error(`[sync-sheets] ${e.message}`);
  } else {
    console.error(e);
  }
  process.exit(1);
});
