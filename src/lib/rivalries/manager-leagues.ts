import type { LeagueDataSource, DataSourceCallOptions, RosterRecord } from './data-source';
import { RivalryUnavailableError } from './errors';
import { runPool, type LeagueFetcher } from './fetch-scheduler';
import type { AccountInfo, LeagueSummary } from './types';

export interface ManagerLeagues {
  account: AccountInfo;
  season: string;
  leagues: LeagueSummary[];
  /** First custom team name seen across leagues, else the account's display name. */
  displayName: string;
  /** Listed leagues whose rosters could not be read; they are left out of `leagues`. */
  unreadableLeagues: number;
}

export interface ManagerSummary {
  totalLeagues: number;
  /** Leagues with at least one decided game. */
  activeLeagues: number;
  totalWins: number;
  totalLosses: number;
  totalGames: number;
  winPercentage: number;
}

export interface ManagerDirectoryOptions extends DataSourceCallOptions {
  concurrency?: number;
  /** Routes roster lookups through a shared response cache. */
  fetcher?: LeagueFetcher;
}

async function upstream<T>(what: string, signal: AbortSignal | undefined, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (err) {
    signal?.throwIfAborted();
    throw new RivalryUnavailableError(`${what} failed`, { cause: err });
  }
}

function lookupUser(dataSource: LeagueDataSource, username: string, signal?: AbortSignal) {
  const name = username.trim();
  return upstream(`user lookup for "${name}"`, signal, () => dataSource.fetchUser(name, { signal }));
}

/**
 * Sleeper user id for `username`, or null when there is no such user.
 * Rejects with RivalryUnavailableError when Sleeper cannot be reached.
 */
export async function resolveAccountId(
  dataSource: LeagueDataSource,
  username: string,
  opts: DataSourceCallOptions = {}
): Promise<string | null> {
  const account = await lookupUser(dataSource, username, opts.signal);
  return account?.accountId ?? null;
}

/**
 * Builds the league list the rivalry engine consumes: every league the user
 * is in for `season`, with the user's decided games taken from their roster.
 * Returns null for an unknown username; rejects with RivalryUnavailableError
 * when the user, their leagues or every league's rosters cannot be read.
 */
export async function getManagerLeagueSummaries(
  dataSource: LeagueDataSource,
  username: string,
  season: string,
  opts: ManagerDirectoryOptions = {}
): Promise<ManagerLeagues | null> {
  const { concurrency = 6, fetcher, signal } = opts;
  const account = await lookupUser(dataSource, username, signal);
  if (!account) return null;

  const listings = await upstream(`leagues for ${account.accountId}`, signal, () =>
    dataSource.fetchUserLeagues(account.accountId, season, { signal })
  );
  const rostersOf = async (leagueId: string): Promise<RosterRecord[]> =>
    fetcher ? (await fetcher.rosters(leagueId)).value : dataSource.fetchLeagueRosters(leagueId, { signal });

  const outcomes = await runPool(listings, concurrency, async (listing): Promise<LeagueSummary | null> => {
    const rosters = await rostersOf(listing.leagueId);
    // a league always has rosters; none means the lookup failed
    if (rosters.length === 0) return null;
    const mine = rosters.find((r) => r.ownerId === account.accountId);
    const wins = mine?.wins ?? 0;
    const losses = mine?.losses ?? 0;
    return {
      leagueId: listing.leagueId,
      leagueName: listing.name,
      totalTeams: listing.totalRosters,
      wins,
      losses,
      totalGames: wins + losses,
      teamName: mine?.teamName,
    };
  });
  signal?.throwIfAborted();

  // keep the order Sleeper listed the leagues in
  outcomes.sort((a, b) => a.index - b.index);
  const leagues: LeagueSummary[] = [];
  let unreadableLeagues = 0;
  for (const o of outcomes) {
    if (o.status === 'fulfilled' && o.value) leagues.push(o.value);
    else unreadableLeagues++;
  }
  if (listings.length > 0 && leagues.length === 0) {
    throw new RivalryUnavailableError(`rosters for all ${listings.length} leagues failed`);
  }
  const displayName = leagues.find((l) => l.teamName)?.teamName ?? account.displayName;

  return { account, season, leagues, displayName, unreadableLeagues };
}

/** Season totals across every league the manager plays in. */
export function summarizeManager(manager: ManagerLeagues): ManagerSummary {
  let totalWins = 0;
  let totalLosses = 0;
  let activeLeagues = 0;
  for (const league of manager.leagues) {
    totalWins += league.wins ?? 0;
    totalLosses += league.losses ?? 0;
    if (league.totalGames > 0) activeLeagues++;
  }
  const totalGames = totalWins + totalLosses;
  return {
    totalLeagues: manager.leagues.length + manager.unreadableLeagues,
    activeLeagues,
    totalWins,
    totalLosses,
    totalGames,
    winPercentage: totalGames > 0 ? totalWins / totalGames : 0,
  };
}
