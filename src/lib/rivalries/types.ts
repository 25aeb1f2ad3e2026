// Domain records shared by the rivalry pipeline. Wire shapes live in sleeper-api.ts.

export interface LeagueSummary {
  leagueId: string;
  leagueName: string;
  /** Decided games for the account in this league; drives prioritization. */
  totalGames: number;
  wins?: number;
  losses?: number;
  teamName?: string;
  totalTeams?: number;
}

export interface Roster {
  rosterId: number;
  ownerId: string | null;
  teamName?: string;
}

export interface MatchupRecord {
  week: number;
  rosterId: number;
  /** Null when the roster had no opponent that week (e.g. eliminated from playoffs). */
  matchupId: number | null;
  points: number;
}

export interface AccountInfo {
  accountId: string;
  username: string;
  displayName: string;
}

/** Per-league result for one opponent, before merging. */
export interface LeagueOpponentRecord {
  wins: number;
  losses: number;
  displayName: string;
}

export type LeagueOpponentMap = Map<string, LeagueOpponentRecord>;

export interface OpponentTally {
  opponentId: string;
  displayName: string;
  wins: number;
  losses: number;
  /** Always wins + losses. */
  matchups: number;
}

export interface RivalryRecord extends OpponentTally {
  winPercentage: number;
}

export interface PerformanceMetrics {
  cacheHits: number;
  cacheMisses: number;
  apiCallsMade: number;
  apiCallsSaved: number;
  leaguesProcessed: number;
  leaguesSkipped: number;
  leaguesFailed: number;
  fetchFailures: number;
  batchesProcessed: number;
  opponentsFound: number;
  earlyTermination: boolean;
  durationMs: number;
}

export interface RivalryResult {
  mostWinsAgainst: RivalryRecord | null;
  mostLossesTo: RivalryRecord | null;
  performance: PerformanceMetrics;
}

export interface WeekRange {
  start: number;
  end: number;
}

export function emptyMetrics(): PerformanceMetrics {
  return {
    cacheHits: 0,
    cacheMisses: 0,
    apiCallsMade: 0,
    apiCallsSaved: 0,
    leaguesProcessed: 0,
    leaguesSkipped: 0,
    leaguesFailed: 0,
    fetchFailures: 0,
    batchesProcessed: 0,
    opponentsFound: 0,
    earlyTermination: false,
    durationMs: 0,
  };
}

export function emptyResult(): RivalryResult {
  return { mostWinsAgainst: null, mostLossesTo: null, performance: emptyMetrics() };
}
