import {
  MAX_ZERO_WEEKS,
  SEASON_POINTS_HEADER,
  SEASON_WEEKS,
  SEASON_WEEK_NUMBERS,
  SHEET_NAMES,
  WEEKLY_WINNER_LABEL,
} from '@/lib/constants/league';
import type { LeagueDataSource, LeagueMatchup, SleeperRoster, SleeperUser } from '@/lib/utils/sleeper-api';
import type { SheetRow, SheetTable } from '@/server/sheets/types';
import { buildLookups, roundPoints } from './lookups';
import { findSeasonLeader, leagueRecordsTable } from './league-records';
import type { LeagueSeason, SeasonLeader, SeasonRow } from './types';
import type { RunContext } from '@/lib/server/run-context';
import type { PublishResult } from '@/server/sheets/publisher';

/**
 * Fold a season's matchups into one row per user. Users that own no roster are
 * left out, as are matchups whose roster has no owner in the league.
 */
export function buildSeasonRows(params: {
  users: SleeperUser[];
  rosters: SleeperRoster[];
  matchups: LeagueMatchup[];
}): SeasonRow[] {
  const { rosterOwner, userName } = buildLookups(params.users, params.rosters);
  const owners = new Set(rosterOwner.values());

  const weeksByUser = new Map<string, number[]>();
  for (const u of params.users) {
    if (!owners.has(u.user_id) || weeksByUser.has(u.user_id)) continue;
    weeksByUser.set(u.user_id, new Array<number>(SEASON_WEEKS).fill(0));
  }

  for (const m of params.matchups) {
    if (m.week < 1 || m.week > SEASON_WEEKS) continue;
    const ownerId = rosterOwner.get(m.rosterId);
    if (!ownerId) continue;
    const weeks = weeksByUser.get(ownerId);
    if (!weeks) continue;
    weeks[m.week - 1] = roundPoints(weeks[m.week - 1] + m.points);
  }

  return Array.from(weeksByUser.entries()).map(([userId, weeks]) => ({
    userId,
    displayName: userName.get(userId) ?? userId,
    weeks,
    total: roundPoints(weeks.reduce((sum, p) => sum + p, 0)),
  }));
}

export function countZeroWeeks(row: SeasonRow): number {
  return row.weeks.filter((p) => p === 0).length;
}

/**
 * Drop rows with more than MAX_ZERO_WEEKS empty weeks (abandoned teams).
 * Only meaningful for finished seasons.
 */
export function applyInactivityFilter(rows: SeasonRow[]): SeasonRow[] {
  return rows.filter((row) => countZeroWeeks(row) <= MAX_ZERO_WEEKS);
}

function topScorerName(rows: SeasonRow[], pick: (row: SeasonRow) => number): string {
  let best: SeasonRow | null = null;
  for (const row of rows) {
    if (pick(row) > (best ? pick(best) : 0)) best = row;
  }
  return best ? best.displayName : '';
}

export function buildWeeklyWinnerRow(rows: SeasonRow[]): SheetRow {
  return [
    '',
    WEEKLY_WINNER_LABEL,
    ...SEASON_WEEK_NUMBERS.map((w) => topScorerName(rows, (row) => row.weeks[w - 1])),
    topScorerName(rows, (row) => row.total),
  ];
}

export function seasonRowsToTable(rows: SeasonRow[]): SheetTable {
  const body: SheetRow[] = rows.map((row) => [row.userId, row.displayName, ...row.weeks, row.total]);
  if (rows.length > 0) body.push(buildWeeklyWinnerRow(rows));
  return { header: SEASON_POINTS_HEADER, rows: body };
}

export async function aggregateSeason(
  source: LeagueDataSource,
  season: LeagueSeason,
  currentYear: number,
): Promise<SeasonRow[]> {
  const { year, leagueId } = season;
  console.log(`[season-points] Processing ${year} season (league ${leagueId})...`);
  const users = await source.getUsers(leagueId);
  const rosters = await source.getRosters(leagueId);
  if (users.length === 0 || rosters.length === 0) {
    console.log(`[season-points] No data available for ${year}`);
    return [];
  }

  const matchups: LeagueMatchup[] = [];
  for (const week of SEASON_WEEK_NUMBERS) {
    const weekMatchups = await source.getMatchups(leagueId, week);
    matchups.push(...weekMatchups);
  }

  const rows = buildSeasonRows({ users, rosters, matchups });
  // The current season is still in progress, so its empty weeks are expected
  if (year === currentYear) {
    console.log(`[season-points] ${year}: ${rows.length} rows`);
    return rows;
  }
  const kept = applyInactivityFilter(rows);
  console.log(`[season-points] ${year}: ${kept.length} rows (${rows.length - kept.length} inactive dropped)`);
  return kept;
}

export interface SeasonSyncResult {
  seasons: Array<{ year: number; rows: SeasonRow[] }>;
  leader: SeasonLeader | null;
  published: PublishResult[];
}

/**
 * Rebuild every configured season's weekly-points tab, then the league records
 * tab from whatever seasons produced rows.
 */
export async function syncSeasonPoints(ctx: RunContext): Promise<SeasonSyncResult> {
  const seasons: SeasonSyncResult['seasons'] = [];
  const published: PublishResult[] = [];

  for (const season of ctx.config.leagues) {
    const rows = await aggregateSeason(ctx.source, season, ctx.currentYear);
    if (rows.length === 0) continue;
    published.push(await ctx.publisher.publish(SHEET_NAMES.seasonPoints(season.year), seasonRowsToTable(rows), 'replace'));
    seasons.push({ year: season.year, rows });
  }

  const leader = findSeasonLeader(seasons);
  if (leader) {
    published.push(await ctx.publisher.publish(SHEET_NAMES.leagueRecords, leagueRecordsTable(leader), 'replace'));
  }
  return { seasons, leader, published };
}
