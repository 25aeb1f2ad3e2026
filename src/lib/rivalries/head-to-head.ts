import type { LeagueFetcher } from './fetch-scheduler';
import type { LeagueOpponentMap, MatchupRecord, Roster, WeekRange } from './types';

export interface WeekOutcome {
  opponentRosterId: number;
  result: 'win' | 'loss' | 'tie';
}

export function placeholderName(accountId: string): string {
  return `User_${accountId}`;
}

/**
 * The account's result in one week of matchups, or null when the week does
 * not count (no entry, no paired opponent, or a 0-0 bye).
 */
export function resolveWeekOutcome(matchups: readonly MatchupRecord[], rosterId: number): WeekOutcome | null {
  const mine = matchups.find((m) => m.rosterId === rosterId);
  if (!mine || mine.matchupId === null) return null;
  const theirs = matchups.find((m) => m.matchupId === mine.matchupId && m.rosterId !== rosterId);
  if (!theirs) return null;
  if (mine.points === 0 && theirs.points === 0) return null;
  const result = mine.points > theirs.points ? 'win' : mine.points < theirs.points ? 'loss' : 'tie';
  return { opponentRosterId: theirs.rosterId, result };
}

/**
 * Display name for an opponent: roster team name, then cached or remote
 * account name, then a placeholder.
 */
async function resolveOpponentName(fetcher: LeagueFetcher, ownerId: string, roster: Roster | undefined) {
  if (roster?.teamName) return roster.teamName;
  const lookup = await fetcher.accountName(ownerId);
  return lookup.value ?? placeholderName(ownerId);
}

/**
 * Win/loss tallies for the account against every opponent it met in one
 * league over `weeks`. Weeks with missing or malformed data are skipped.
 * Remote calls are counted on the fetcher's metrics.
 */
export async function resolveLeagueHeadToHead(params: {
  fetcher: LeagueFetcher;
  leagueId: string;
  rosters: readonly Roster[];
  accountRosterId: number;
  weeks: WeekRange;
}): Promise<LeagueOpponentMap> {
  const { fetcher, leagueId, rosters, accountRosterId, weeks } = params;
  const rosterById = new Map<number, Roster>();
  for (const r of rosters) rosterById.set(r.rosterId, r);

  const opponents: LeagueOpponentMap = new Map();

  for (let week = weeks.start; week <= weeks.end; week++) {
    const lookup = await fetcher.matchups(leagueId, week);
    if (lookup.value.length === 0) continue;

    const outcome = resolveWeekOutcome(lookup.value, accountRosterId);
    if (!outcome) continue;

    const opponentRoster = rosterById.get(outcome.opponentRosterId);
    const ownerId = opponentRoster?.ownerId;
    if (!ownerId) continue;

    let record = opponents.get(ownerId);
    if (!record) {
      record = { wins: 0, losses: 0, displayName: await resolveOpponentName(fetcher, ownerId, opponentRoster) };
      opponents.set(ownerId, record);
    }
    if (outcome.result === 'win') record.wins++;
    else if (outcome.result === 'loss') record.losses++;
  }

  return opponents;
}
