export interface LeagueSeason {
  year: number;
  leagueId: string;
}

export interface SeasonRow {
  userId: string;
  displayName: string;
  weeks: number[]; // index 0 is week 1
  total: number;
}

export interface MarginRecord {
  year: number;
  week: number;
  winner: string;
  loser: string;
  winnerPoints: number;
  loserPoints: number;
  margin: number;
}

export interface HighScorerRecord {
  year: number;
  week: number;
  displayName: string;
  playerName: string;
  points: number;
  playerId: string;
}

export interface SeasonLeader {
  year: number;
  userId: string;
  displayName: string;
  total: number;
}

export type WeekOutcome = 'recorded' | 'skipped' | 'no-data' | 'stopped';

export interface WeekResult {
  year: number;
  week: number;
  outcome: WeekOutcome;
}
