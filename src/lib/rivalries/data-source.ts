import type { AccountInfo, MatchupRecord, Roster } from './types';

export interface DataSourceCallOptions {
  signal?: AbortSignal;
}

export interface SleeperLeagueListing {
  leagueId: string;
  name: string;
  totalRosters: number;
}

export interface RosterRecord extends Roster {
  wins: number;
  losses: number;
  ties: number;
}

/**
 * Upstream league data as the rivalry engine sees it.
 *
 * Implementations must tolerate concurrent calls. The league and account
 * lookups never reject: transient failures are retried internally and
 * exhausted retries come back as an empty list or null.
 *
 * The directory lookups (`fetchUser`, `fetchUserLeagues`) reject once retries
 * are exhausted, so an outage is never mistaken for an unknown user.
 */
export interface LeagueDataSource {
  fetchLeagueRosters(leagueId: string, options?: DataSourceCallOptions): Promise<RosterRecord[]>;
  fetchLeagueMatchups(leagueId: string, week: number, options?: DataSourceCallOptions): Promise<MatchupRecord[]>;
  fetchAccountInfo(accountId: string, options?: DataSourceCallOptions): Promise<AccountInfo | null>;
  /** Looks up an account by username (or id); null only when Sleeper has no such user. */
  fetchUser(username: string, options?: DataSourceCallOptions): Promise<AccountInfo | null>;
  fetchUserLeagues(accountId: string, season: string, options?: DataSourceCallOptions): Promise<SleeperLeagueListing[]>;
}
