import { LeagueFetcher, createFetcherCaches, runPool, type FetcherCaches } from './fetch-scheduler';
import { resolveLeagueHeadToHead } from './head-to-head';
import { prioritizeLeagues } from './priority';
import { RivalryUnavailableError } from './errors';
import type { LeagueDataSource } from './data-source';
import {
  emptyMetrics,
  emptyResult,
  type LeagueOpponentMap,
  type LeagueSummary,
  type OpponentTally,
  type RivalryRecord,
  type RivalryResult,
  type WeekRange,
} from './types';
import { DEFAULT_RIVALRY_CONFIG, type RivalryConfig } from '@/lib/constants/rivalry';
import { getCompletedWeekRange } from '@/lib/utils/season-calendar';
import { TtlCache, type Clock } from '@/lib/utils/ttl-cache';
import { silentLogger, type Logger } from '@/lib/server/logger';

export type TallyMap = Map<string, OpponentTally>;

/** Adds per-league records into the running tallies. Order of maps does not matter. */
export function mergeOpponentMaps(tallies: TallyMap, leagueMaps: Iterable<LeagueOpponentMap>): TallyMap {
  for (const league of leagueMaps) {
    for (const [opponentId, record] of league) {
      const tally = tallies.get(opponentId) ?? {
        opponentId,
        displayName: record.displayName,
        wins: 0,
        losses: 0,
        matchups: 0,
      };
      tally.wins += record.wins;
      tally.losses += record.losses;
      tally.matchups = tally.wins + tally.losses;
      tallies.set(opponentId, tally);
    }
  }
  return tallies;
}

type Metric = 'wins' | 'losses';

// higher metric, then more matchups, then opponent id: independent of merge order
function rankBy(metric: Metric) {
  return (a: OpponentTally, b: OpponentTally) =>
    b[metric] - a[metric] || b.matchups - a.matchups || a.opponentId.localeCompare(b.opponentId);
}

export interface TerminationCheck {
  terminate: boolean;
  winLeader?: OpponentTally;
  lossLeader?: OpponentTally;
  winGap?: number;
  lossGap?: number;
}

/**
 * Confidence check run between batches: stop once both the win leader and the
 * loss leader have enough matchups and a clear lead over the runner-up.
 */
export function evaluateEarlyTermination(
  tallies: TallyMap,
  batchesProcessed: number,
  cfg: RivalryConfig['earlyTermination']
): TerminationCheck {
  if (!cfg.enabled || batchesProcessed < cfg.minBatches || tallies.size < Math.max(2, cfg.minOpponents)) {
    return { terminate: false };
  }
  const all = [...tallies.values()];
  const [winLeader, winRunnerUp] = [...all].sort(rankBy('wins'));
  const [lossLeader, lossRunnerUp] = [...all].sort(rankBy('losses'));
  const winGap = winLeader.wins - winRunnerUp.wins;
  const lossGap = lossLeader.losses - lossRunnerUp.losses;
  const terminate =
    winLeader.matchups >= cfg.minLeaderMatchups &&
    winGap >= cfg.minLeaderGap &&
    lossLeader.matchups >= cfg.minLeaderMatchups &&
    lossGap >= cfg.minLeaderGap;
  return { terminate, winLeader, lossLeader, winGap, lossGap };
}

function copyResult(r: RivalryResult): RivalryResult {
  return {
    mostWinsAgainst: r.mostWinsAgainst && { ...r.mostWinsAgainst },
    mostLossesTo: r.mostLossesTo && { ...r.mostLossesTo },
    performance: { ...r.performance },
  };
}

function toRivalryRecord(t: OpponentTally): RivalryRecord {
  return { ...t, winPercentage: t.matchups > 0 ? t.wins / t.matchups : 0 };
}

/** Headline rivalries; a slot is null when no opponent clears its floors. */
export function selectRivalries(
  tallies: TallyMap,
  cfg: RivalryConfig['selection']
): Pick<RivalryResult, 'mostWinsAgainst' | 'mostLossesTo'> {
  const eligible = [...tallies.values()].filter((t) => t.matchups >= cfg.minRivalryGames);
  const bestWins = eligible.filter((t) => t.wins >= cfg.minRivalryWins).sort(rankBy('wins'))[0];
  const bestLosses = eligible.filter((t) => t.losses >= cfg.minRivalryLosses).sort(rankBy('losses'))[0];
  return {
    mostWinsAgainst: bestWins ? toRivalryRecord(bestWins) : null,
    mostLossesTo: bestLosses ? toRivalryRecord(bestLosses) : null,
  };
}

export interface RivalryEngineCaches extends FetcherCaches {
  results: TtlCache<RivalryResult>;
}

export function createEngineCaches(clock?: Clock): RivalryEngineCaches {
  return { ...createFetcherCaches(clock), results: new TtlCache<RivalryResult>(clock) };
}

export interface RivalryEngineOptions {
  dataSource: LeagueDataSource;
  config?: RivalryConfig;
  caches?: RivalryEngineCaches;
  logger?: Logger;
  clock?: Clock;
  /** Separates cached results of differently configured engines sharing caches. */
  name?: string;
}

export interface ComputeOptions {
  signal?: AbortSignal;
  /** Overrides the completed-week range derived from the season calendar. */
  weeks?: WeekRange;
  /** False keeps the result out of the result cache, e.g. when the league list is incomplete. */
  storeResult?: boolean;
}

/**
 * Folds per-league head-to-head records into account-wide rivalries.
 *
 * Leagues are processed in priority order, `batchSize` at a time; league
 * lookups inside a batch run concurrently on the bounded pool. Tallies are
 * only touched between batches, after every task in the batch has settled.
 */
export class RivalryEngine {
  readonly config: RivalryConfig;
  readonly caches: RivalryEngineCaches;
  private readonly dataSource: LeagueDataSource;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly name: string;

  constructor(opts: RivalryEngineOptions) {
    this.dataSource = opts.dataSource;
    this.config = opts.config ?? DEFAULT_RIVALRY_CONFIG;
    this.clock = opts.clock ?? Date.now;
    this.caches = opts.caches ?? createEngineCaches(this.clock);
    this.logger = opts.logger ?? silentLogger;
    this.name = opts.name ?? 'default';
  }

  resultCacheKey(accountId: string, season: string): string {
    return `rivalry:${this.name}:${accountId}:${season}`;
  }

  async computeRivalries(
    accountId: string,
    leagues: readonly LeagueSummary[],
    season: string,
    options: ComputeOptions = {}
  ): Promise<RivalryResult> {
    if (!accountId || leagues.length === 0) return emptyResult();

    const started = this.clock();
    const cfg = this.config;
    const metrics = emptyMetrics();
    const cacheKey = this.resultCacheKey(accountId, season);

    const cached = this.caches.results.get(cacheKey, cfg.ttl.resultMs);
    if (cached) {
      return { ...copyResult(cached), performance: { ...emptyMetrics(), cacheHits: 1 } };
    }
    metrics.cacheMisses++;

    const { leagues: prioritized, skipped } = prioritizeLeagues(leagues, cfg);
    metrics.leaguesSkipped += skipped;
    const weeks = options.weeks ?? getCompletedWeekRange(season, new Date(this.clock()), cfg.maxWeek);
    this.logger.info(
      `${accountId} ${season}: ${prioritized.length} leagues to scan (skipped ${skipped}), weeks ${weeks.start}-${weeks.end}`
    );

    const fetcher = new LeagueFetcher({
      dataSource: this.dataSource,
      caches: this.caches,
      metrics,
      timeoutMs: cfg.fetchTimeoutMs,
      ttl: cfg.ttl,
      signal: options.signal,
    });

    const tallies: TallyMap = new Map();
    let attempted = 0;
    for (let i = 0; i < prioritized.length; i += cfg.batchSize) {
      options.signal?.throwIfAborted();
      const batch = prioritized.slice(i, i + cfg.batchSize);
      attempted += batch.length;

      const outcomes = await runPool(batch, cfg.concurrency, (league) =>
        this.resolveLeague(fetcher, accountId, league, weeks)
      );
      // fold in priority order so the first league's team name wins, whatever settled first
      outcomes.sort((a, b) => a.index - b.index);
      const maps: LeagueOpponentMap[] = [];
      for (const o of outcomes) {
        if (o.status === 'fulfilled') {
          if (o.value) maps.push(o.value);
        } else {
          metrics.leaguesFailed++;
          this.logger.error(`league ${o.item.leagueId} failed`, o.reason);
        }
      }
      mergeOpponentMaps(tallies, maps);
      metrics.batchesProcessed++;

      const check = evaluateEarlyTermination(tallies, metrics.batchesProcessed, cfg.earlyTermination);
      if (check.winLeader && check.lossLeader) {
        this.logger.debug(
          `after ${i + batch.length} leagues: win leader ${check.winLeader.displayName} ` +
            `(${check.winLeader.wins}-${check.winLeader.losses}, gap ${check.winGap}), loss leader ` +
            `${check.lossLeader.displayName} (${check.lossLeader.wins}-${check.lossLeader.losses}, gap ${check.lossGap})`
        );
      }
      if (check.terminate) {
        metrics.earlyTermination = true;
        this.logger.info(`early termination after ${i + batch.length}/${prioritized.length} leagues`);
        break;
      }
    }
    options.signal?.throwIfAborted();

    if (attempted > 0 && metrics.leaguesFailed === attempted) {
      throw new RivalryUnavailableError(`all ${attempted} league lookups failed`);
    }

    metrics.opponentsFound = tallies.size;
    metrics.durationMs = this.clock() - started;
    const result: RivalryResult = { ...selectRivalries(tallies, cfg.selection), performance: metrics };
    if (options.storeResult !== false) this.caches.results.set(cacheKey, copyResult(result));
    this.logger.info(
      `${accountId} ${season}: ${tallies.size} opponents, ${metrics.apiCallsMade} calls made, ` +
        `${metrics.apiCallsSaved} saved, ${metrics.durationMs}ms`
    );
    return result;
  }

  private async resolveLeague(
    fetcher: LeagueFetcher,
    accountId: string,
    league: LeagueSummary,
    weeks: WeekRange
  ): Promise<LeagueOpponentMap | null> {
    const metrics = fetcher.metrics;
    const rosters = await fetcher.rosters(league.leagueId);
    if (rosters.value.length === 0) {
      metrics.leaguesFailed++;
      this.logger.warn(`skipped ${league.leagueName}: could not get rosters`);
      return null;
    }
    const mine = rosters.value.find((r) => r.ownerId === accountId);
    if (!mine) {
      metrics.leaguesSkipped++;
      this.logger.warn(`skipped ${league.leagueName}: account not in league`);
      return null;
    }
    const opponents = await resolveLeagueHeadToHead({
      fetcher,
      leagueId: league.leagueId,
      rosters: rosters.value,
      accountRosterId: mine.rosterId,
      weeks,
    });
    metrics.leaguesProcessed++;
    return opponents;
  }
}
