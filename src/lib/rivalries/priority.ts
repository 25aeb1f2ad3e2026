import type { LeagueSummary } from './types';

export interface PrioritizedLeagues {
  leagues: LeagueSummary[];
  /** Leagues dropped for having too few games. */
  skipped: number;
}

/**
 * Busiest leagues first. Early termination only makes sense if the leagues
 * with the most games against the account are resolved before the rest.
 */
export function prioritizeLeagues(
  leagues: readonly LeagueSummary[],
  opts: { minLeagueGames: number; maxLeagues?: number | null }
): PrioritizedLeagues {
  const seen = new Set<string>();
  const active: LeagueSummary[] = [];
  let skipped = 0;
  for (const league of leagues) {
    if (!league.leagueId || seen.has(league.leagueId)) continue;
    seen.add(league.leagueId);
    if (!(league.totalGames >= opts.minLeagueGames)) {
      skipped++;
      continue;
    }
    active.push(league);
  }
  // Array.prototype.sort is stable, ties keep caller order
  active.sort((a, b) => b.totalGames - a.totalGames);
  const capped = opts.maxLeagues != null && opts.maxLeagues >= 0 ? active.slice(0, opts.maxLeagues) : active;
  return { leagues: capped, skipped };
}
