import { HIGHEST_SEASON_TOTAL_LABEL, LEAGUE_RECORDS_HEADER } from '@/lib/constants/league';
import type { SheetTable } from '@/server/sheets/types';
import type { SeasonLeader, SeasonRow } from './types';

/**
 * Highest season total across every processed season. Seasons are expected in
 * ascending year order; the earliest wins a tie.
 */
export function findSeasonLeader(seasons: Array<{ year: number; rows: SeasonRow[] }>): SeasonLeader | null {
  let leader: SeasonLeader | null = null;
  for (const { year, rows } of seasons) {
    for (const row of rows) {
      if (!leader || row.total > leader.total) {
        leader = { year, userId: row.userId, displayName: row.displayName, total: row.total };
      }
    }
  }
  return leader;
}

export function leagueRecordsTable(leader: SeasonLeader): SheetTable {
  return {
    header: LEAGUE_RECORDS_HEADER,
    rows: [[HIGHEST_SEASON_TOTAL_LABEL, leader.year, leader.userId, leader.displayName, leader.total]],
  };
}
