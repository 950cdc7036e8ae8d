import {
  syncHighScorers,
  syncMargins,
  syncSeasonPoints,
  type HighScorerSyncResult,
  type MarginSyncResult,
  type SeasonSyncResult,
} from '@/lib/records';
import type { RunContext } from '@/lib/server/run-context';

export const PIPELINES = ['seasons', 'margins', 'high-scorer'] as const;
export type PipelineName = (typeof PIPELINES)[number];

export function isPipelineName(x: string): x is PipelineName {
  return (PIPELINES as readonly string[]).includes(x);
}

export interface SyncSummary {
  seasons?: SeasonSyncResult;
  margins?: MarginSyncResult;
  highScorer?: HighScorerSyncResult;
}

/**
 * Run the selected pipelines in a fixed order: seasons (with league records),
 * margins, then high scorers. Leagues and weeks are processed one at a time.
 */
export async function runSync(ctx: RunContext, pipelines: readonly PipelineName[] = PIPELINES): Promise<SyncSummary> {
  const selected = new Set(pipelines);
  const summary: SyncSummary = {};
  if (ctx.config.leagues.length === 0) {
    console.log('[sync] No leagues configured; nothing to do');
    return summary;
  }

  if (selected.has('seasons')) {
    console.log('[sync] Season points');
    summary.seasons = await syncSeasonPoints(ctx);
  }
  if (selected.has('margins')) {
    console.log('[sync] Victory margins');
    summary.margins = await syncMargins(ctx);
  }
  if (selected.has('high-scorer')) {
    console.log('[sync] Weekly high scorers');
    summary.highScorer = await syncHighScorers(ctx);
  }
  return summary;
}

export function formatSummary(summary: SyncSummary): string[] {
  const lines: string[] = [];
  if (summary.seasons) {
    const years = summary.seasons.seasons.map((s) => s.year).join(', ') || 'none';
    lines.push(`seasons published: ${years}`);
    if (summary.seasons.leader) {
      const l = summary.seasons.leader;
      lines.push(`highest season total: ${l.displayName} ${l.total} (${l.year})`);
    }
  }
  if (summary.margins) {
    const written = summary.margins.published.map((p) => `${p.sheet}=${p.written}`).join(', ');
    lines.push(`margins (${summary.margins.mode}): ${written}`);
  }
  if (summary.highScorer) {
    lines.push(`high scorer rows appended: ${summary.highScorer.records.length}`);
  }
  return lines;
}
