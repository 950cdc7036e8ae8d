// League constants for the sheets sync

// Regular season plus playoffs as Sleeper numbers them
export const SEASON_WEEKS = 18;

// Past-season rows with more zero weeks than this are treated as abandoned teams
export const MAX_ZERO_WEEKS = 5;

export const SEASON_WEEK_NUMBERS: number[] = Array.from({ length: SEASON_WEEKS }, (_, i) => i + 1);

export const SHEET_NAMES = {
  seasonPoints: (year: number | string) => `${year} Season - Weekly Points`,
  largestMargin: 'Largest Margin',
  smallestMargin: 'Smallest Margin',
  highScorer: 'Most Points Generated by Rostered Player All-Time',
  leagueRecords: 'League Records',
} as const;

export const SEASON_POINTS_HEADER: string[] = [
  'User ID',
  'Display Name',
  ...SEASON_WEEK_NUMBERS.map((w) => `Week ${w}`),
  'Season Total',
];

export const MARGIN_HEADER: string[] = ['Year', 'Week', 'Winner', 'Loser', 'Winner Points', 'Loser Points', 'Margin'];

export const HIGH_SCORER_HEADER: string[] = ['Year', 'Week', 'Display Name', 'Player Name', 'Points', 'Player ID'];

export const LEAGUE_RECORDS_HEADER: string[] = ['Record', 'Year', 'User ID', 'Display Name', 'Points'];

export const WEEKLY_WINNER_LABEL = 'Weekly Winner';
export const HIGHEST_SEASON_TOTAL_LABEL = 'Highest Season Total';

export const UNKNOWN_USER = 'Unknown';
export const UNKNOWN_PLAYER = 'Unknown Player';
