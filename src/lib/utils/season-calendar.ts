/**
 * NFL season calendar helpers.
 * Week boundaries are counted in 7-day blocks from the Week 1 kickoff.
 */

import type { WeekRange } from '@/lib/rivalries/types';

const DAY_MS = 24 * 60 * 60 * 1000;
export const FINAL_WEEK = 18;

/**
 * Week 1 kickoff: the Thursday after Labor Day (first Monday of September),
 * 8:20pm Eastern, which is 00:20 UTC on the Friday.
 */
export function getSeasonKickoff(season: string | number): Date {
  const year = Number(season);
  const sept1Dow = new Date(Date.UTC(year, 8, 1)).getUTCDay();
  const laborDay = 1 + ((8 - sept1Dow) % 7);
  return new Date(Date.UTC(year, 8, laborDay + 4, 0, 20));
}

/** 1-based week in progress at `now`; 0 before kickoff; capped at `finalWeek`. */
export function getCurrentWeek(season: string | number, now: Date = new Date(), finalWeek = FINAL_WEEK): number {
  const kickoff = getSeasonKickoff(season).getTime();
  const elapsed = now.getTime() - kickoff;
  if (!Number.isFinite(elapsed) || elapsed < 0) return 0;
  return Math.min(Math.floor(elapsed / (7 * DAY_MS)) + 1, finalWeek);
}

/**
 * Weeks whose games are final. The week in progress is excluded so partial
 * (or still-zero) scores are not counted; once every week has ended the whole
 * season is returned. Empty ranges have end < start.
 */
export function getCompletedWeekRange(
  season: string | number,
  now: Date = new Date(),
  finalWeek = FINAL_WEEK
): WeekRange {
  const kickoff = getSeasonKickoff(season).getTime();
  const elapsed = now.getTime() - kickoff;
  if (!Number.isFinite(elapsed) || elapsed < 0) return { start: 1, end: 0 };
  const weeksStarted = Math.floor(elapsed / (7 * DAY_MS)) + 1;
  return { start: 1, end: weeksStarted > finalWeek ? finalWeek : weeksStarted - 1 };
}
