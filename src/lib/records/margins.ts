import { MARGIN_HEADER, SEASON_WEEK_NUMBERS, SHEET_NAMES } from '@/lib/constants/league';
import type { RunContext } from '@/lib/server/run-context';
import type { WeekLedger } from '@/lib/server/week-ledger';
import type { LeagueDataSource, LeagueMatchup } from '@/lib/utils/sleeper-api';
import type { PublishMode, SheetRow } from '@/server/sheets/types';
import type { PublishResult } from '@/server/sheets/publisher';
import { buildLookups, displayNameForRoster, roundPoints, type LeagueLookups } from './lookups';
import type { LeagueSeason, MarginRecord, WeekResult } from './types';

export type MatchupPair = [LeagueMatchup, LeagueMatchup];

/**
 * Group a week's matchups by matchup_id. Groups keep first-appearance order and
 * members keep listing order; anything other than a two-team group (byes,
 * unpaired playoff rosters) is dropped.
 */
export function pairMatchups(matchups: LeagueMatchup[]): MatchupPair[] {
  const byId = new Map<number, LeagueMatchup[]>();
  for (const m of matchups) {
    if (m.matchupId === null) continue;
    const arr = byId.get(m.matchupId) || [];
    arr.push(m);
    byId.set(m.matchupId, arr);
  }
  const pairs: MatchupPair[] = [];
  for (const group of byId.values()) {
    if (group.length !== 2) continue;
    pairs.push([group[0], group[1]]);
  }
  return pairs;
}

export function isUnplayedPair([a, b]: MatchupPair): boolean {
  return a.points === 0 && b.points === 0;
}

// The first-listed side takes a tie
export function toMarginRecord(year: number, week: number, [a, b]: MatchupPair, lookups: LeagueLookups): MarginRecord {
  const [winner, loser] = a.points >= b.points ? [a, b] : [b, a];
  return {
    year,
    week,
    winner: displayNameForRoster(lookups, winner.rosterId),
    loser: displayNameForRoster(lookups, loser.rosterId),
    winnerPoints: winner.points,
    loserPoints: loser.points,
    margin: roundPoints(Math.abs(a.points - b.points)),
  };
}

export type MarginWeekResult =
  | { outcome: 'recorded'; largest: MarginRecord; smallest: MarginRecord }
  | { outcome: 'stopped' }
  | { outcome: 'no-data' };

/**
 * Reduce one week to its largest and smallest victory margins. A 0-0 pair means
 * the week has not been played.
 */
export function analyzeMarginWeek(
  year: number,
  week: number,
  matchups: LeagueMatchup[],
  lookups: LeagueLookups,
): MarginWeekResult {
  const pairs = pairMatchups(matchups);
  if (pairs.some(isUnplayedPair)) return { outcome: 'stopped' };
  if (pairs.length === 0) return { outcome: 'no-data' };

  let largest: MarginRecord | null = null;
  let smallest: MarginRecord | null = null;
  for (const pair of pairs) {
    const record = toMarginRecord(year, week, pair, lookups);
    if (!largest || record.margin > largest.margin) largest = record;
    if (!smallest || record.margin < smallest.margin) smallest = record;
  }
  if (!largest || !smallest) return { outcome: 'no-data' };
  return { outcome: 'recorded', largest, smallest };
}

export function marginToRow(r: MarginRecord): SheetRow {
  return [r.year, r.week, r.winner, r.loser, r.winnerPoints, r.loserPoints, r.margin];
}

export function compareByYearWeek(a: { year: number; week: number }, b: { year: number; week: number }): number {
  return a.year - b.year || a.week - b.week;
}

export interface LeagueMarginResult {
  largest: MarginRecord[];
  smallest: MarginRecord[];
  weeks: WeekResult[];
}

/**
 * Walk weeks 1..18 of one league. With `backfill` the ledger is ignored and
 * every week is recomputed.
 */
export async function analyzeLeagueMargins(params: {
  source: LeagueDataSource;
  ledger: WeekLedger;
  season: LeagueSeason;
  backfill: boolean;
}): Promise<LeagueMarginResult> {
  const { source, ledger, season, backfill } = params;
  const { year, leagueId } = season;
  const result: LeagueMarginResult = { largest: [], smallest: [], weeks: [] };
  let lookups: LeagueLookups | null = null;

  for (const week of SEASON_WEEK_NUMBERS) {
    if (!backfill && ledger.isProcessed(year, week)) {
      result.weeks.push({ year, week, outcome: 'skipped' });
      continue;
    }

    const matchups = await source.getMatchups(leagueId, week);
    if (!lookups) {
      const users = await source.getUsers(leagueId);
      const rosters = await source.getRosters(leagueId);
      lookups = buildLookups(users, rosters);
    }

    const weekResult = analyzeMarginWeek(year, week, matchups, lookups);
    if (weekResult.outcome === 'stopped') {
      console.log(`[margins] ${year} week ${week} has a 0-0 matchup; season not played past here`);
      // The stopping week is recorded as processed
      if (!ledger.isProcessed(year, week)) await ledger.markProcessed(year, week);
      result.weeks.push({ year, week, outcome: 'stopped' });
      break;
    }
    if (weekResult.outcome === 'no-data') {
      console.log(`[margins] ${year} week ${week} has no paired matchups`);
      result.weeks.push({ year, week, outcome: 'no-data' });
      continue;
    }

    result.largest.push(weekResult.largest);
    result.smallest.push(weekResult.smallest);
    if (!ledger.isProcessed(year, week)) await ledger.markProcessed(year, week);
    result.weeks.push({ year, week, outcome: 'recorded' });
    console.log(
      `[margins] ${year} week ${week}: largest ${weekResult.largest.margin} (${weekResult.largest.winner}), smallest ${weekResult.smallest.margin} (${weekResult.smallest.winner})`,
    );
  }
  return result;
}

export interface MarginSyncResult {
  mode: PublishMode;
  largest: MarginRecord[];
  smallest: MarginRecord[];
  published: PublishResult[];
}

export async function syncMargins(ctx: RunContext): Promise<MarginSyncResult> {
  const sheets = await ctx.publisher.listSheets();
  const backfill = !sheets.includes(SHEET_NAMES.largestMargin) || !sheets.includes(SHEET_NAMES.smallestMargin);
  const mode: PublishMode = backfill ? 'replace' : 'append-new';
  if (backfill) console.log('[margins] Margin tabs missing; recomputing every week');

  const largest: MarginRecord[] = [];
  const smallest: MarginRecord[] = [];
  for (const season of ctx.config.leagues) {
    console.log(`[margins] Processing ${season.year} season (league ${season.leagueId})...`);
    const res = await analyzeLeagueMargins({ source: ctx.source, ledger: ctx.ledgers.margins, season, backfill });
    largest.push(...res.largest);
    smallest.push(...res.smallest);
  }
  largest.sort(compareByYearWeek);
  smallest.sort(compareByYearWeek);

  const published: PublishResult[] = [];
  published.push(await ctx.publisher.publish(
    SHEET_NAMES.largestMargin,
    { header: MARGIN_HEADER, rows: largest.map(marginToRow) },
    mode,
  ));
  published.push(await ctx.publisher.publish(
    SHEET_NAMES.smallestMargin,
    { header: MARGIN_HEADER, rows: smallest.map(marginToRow) },
    mode,
  ));
  return { mode, largest, smallest, published };
}
