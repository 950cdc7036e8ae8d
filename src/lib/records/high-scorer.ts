import { HIGH_SCORER_HEADER, SEASON_WEEK_NUMBERS, SHEET_NAMES, UNKNOWN_PLAYER } from '@/lib/constants/league';
import type { RunContext } from '@/lib/server/run-context';
import { formatPlayerName, type LeagueMatchup, type PlayerDirectory, type StarterScore } from '@/lib/utils/sleeper-api';
import type { SheetRow } from '@/server/sheets/types';
import type { PublishResult } from '@/server/sheets/publisher';
import { buildLookups, displayNameForRoster, type LeagueLookups } from './lookups';
import type { HighScorerRecord, LeagueSeason, WeekResult } from './types';

export interface TopStarter {
  matchup: LeagueMatchup;
  starter: StarterScore;
}

/**
 * Single best starter performance across every roster in the week. The first
 * one encountered keeps a tie.
 */
export function findTopStarter(matchups: LeagueMatchup[]): TopStarter | null {
  let best: TopStarter | null = null;
  for (const matchup of matchups) {
    for (const starter of matchup.starters) {
      if (!best || starter.points > best.starter.points) best = { matchup, starter };
    }
  }
  return best;
}

export function toHighScorerRecord(
  year: number,
  week: number,
  top: TopStarter,
  lookups: LeagueLookups,
  players: PlayerDirectory,
): HighScorerRecord {
  return {
    year,
    week,
    displayName: displayNameForRoster(lookups, top.matchup.rosterId),
    playerName: formatPlayerName(players[top.starter.playerId]) ?? UNKNOWN_PLAYER,
    points: top.starter.points,
    playerId: top.starter.playerId,
  };
}

export function highScorerToRow(r: HighScorerRecord): SheetRow {
  return [r.year, r.week, r.displayName, r.playerName, r.points, r.playerId];
}

export interface LeagueHighScorerResult {
  records: HighScorerRecord[];
  weeks: WeekResult[];
  published: PublishResult[];
}

/**
 * Walk the unprocessed weeks of one league, appending each week's top performer
 * as soon as it is known. A week whose best starter scored nothing ends the
 * walk and stays unprocessed so a later run picks it up.
 */
export async function trackLeagueHighScorers(ctx: RunContext, season: LeagueSeason): Promise<LeagueHighScorerResult> {
  const { year, leagueId } = season;
  const ledger = ctx.ledgers.highScorer;
  const result: LeagueHighScorerResult = { records: [], weeks: [], published: [] };

  for (const week of SEASON_WEEK_NUMBERS) {
    if (ledger.isProcessed(year, week)) {
      result.weeks.push({ year, week, outcome: 'skipped' });
      continue;
    }

    console.log(`[high-scorer] Processing ${year} week ${week}...`);
    const matchups = await ctx.source.getMatchups(leagueId, week);
    const rosters = await ctx.source.getRosters(leagueId);
    const users = await ctx.source.getUsers(leagueId);

    const top = findTopStarter(matchups);
    if (!top || top.starter.points <= 0) {
      console.log(`[high-scorer] ${year} week ${week} has no points; stopping`);
      result.weeks.push({ year, week, outcome: 'stopped' });
      break;
    }

    const players = await ctx.players();
    const record = toHighScorerRecord(year, week, top, buildLookups(users, rosters), players);
    result.published.push(await ctx.publisher.publish(
      SHEET_NAMES.highScorer,
      { header: HIGH_SCORER_HEADER, rows: [highScorerToRow(record)] },
      'append',
    ));
    await ledger.markProcessed(year, week);
    result.records.push(record);
    result.weeks.push({ year, week, outcome: 'recorded' });
    console.log(`[high-scorer] ${year} week ${week}: ${record.playerName} ${record.points} (${record.displayName})`);
  }
  return result;
}

export interface HighScorerSyncResult {
  records: HighScorerRecord[];
  published: PublishResult[];
}

export async function syncHighScorers(ctx: RunContext): Promise<HighScorerSyncResult> {
  const records: HighScorerRecord[] = [];
  const published: PublishResult[] = [];
  for (const season of ctx.config.leagues) {
    const res = await trackLeagueHighScorers(ctx, season);
    records.push(...res.records);
    published.push(...res.published);
  }
  return { records, published };
}
