/**
 * League records
 * Season points tables, victory margins, weekly high scorers and the all-time
 * season high.
 */

export * from './types';
export { buildLookups, displayNameForRoster } from './lookups';
export {
  aggregateSeason,
  applyInactivityFilter,
  buildSeasonRows,
  buildWeeklyWinnerRow,
  countZeroWeeks,
  seasonRowsToTable,
  syncSeasonPoints,
  type SeasonSyncResult,
} from './season-points';
export { findSeasonLeader, leagueRecordsTable } from './league-records';
export {
  analyzeLeagueMargins,
  analyzeMarginWeek,
  pairMatchups,
  syncMargins,
  type MarginSyncResult,
} from './margins';
export {
  findTopStarter,
  syncHighScorers,
  trackLeagueHighScorers,
  type HighScorerSyncResult,
} from './high-scorer';
