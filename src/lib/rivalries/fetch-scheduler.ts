import type { LeagueDataSource, RosterRecord } from './data-source';
import type { MatchupRecord, PerformanceMetrics } from './types';
import { TtlCache, type Clock } from '@/lib/utils/ttl-cache';

export class FetchTimeoutError extends Error {
  constructor(readonly label: string, readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'FetchTimeoutError';
  }
}

/**
 * Runs `task` with its own timeout. The task receives a signal that fires on
 * timeout or when `parent` aborts, so well-behaved data sources stop early.
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) controller.abort(parent.reason);
  else parent?.addEventListener('abort', onParentAbort, { once: true });

  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      const err = new FetchTimeoutError(label, timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });
  const aborted = new Promise<never>((_, reject) => {
    if (controller.signal.aborted) reject(controller.signal.reason);
    else controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
  });
  // whichever loses the race must not surface as an unhandled rejection
  timeout.catch(() => undefined);
  aborted.catch(() => undefined);

  try {
    return await Promise.race([task(controller.signal), timeout, aborted]);
  } finally {
    clearTimeout(timeoutId);
    parent?.removeEventListener('abort', onParentAbort);
  }
}

export type PoolOutcome<I, R> =
  | { item: I; index: number; status: 'fulfilled'; value: R }
  | { item: I; index: number; status: 'rejected'; reason: unknown };

/**
 * Runs `worker` over `items` with at most `concurrency` in flight. Outcomes are
 * returned in completion order; a rejected worker never stops its siblings.
 */
export async function runPool<I, R>(
  items: readonly I[],
  concurrency: number,
  worker: (item: I, index: number) => Promise<R>
): Promise<PoolOutcome<I, R>[]> {
  const outcomes: PoolOutcome<I, R>[] = [];
  let next = 0;

  async function lane(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      try {
        const value = await worker(item, index);
        outcomes.push({ item, index, status: 'fulfilled', value });
      } catch (reason) {
        outcomes.push({ item, index, status: 'rejected', reason });
      }
    }
  }

  const lanes = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: lanes }, () => lane()));
  return outcomes;
}

export interface FetcherCaches {
  /** Roster lists and weekly matchups. */
  responses: TtlCache<RosterRecord[] | MatchupRecord[]>;
  accountNames: TtlCache<string>;
}

export function createFetcherCaches(clock?: Clock): FetcherCaches {
  return {
    responses: new TtlCache<RosterRecord[] | MatchupRecord[]>(clock),
    accountNames: new TtlCache<string>(clock),
  };
}

export interface LeagueFetcherOptions {
  dataSource: LeagueDataSource;
  caches: FetcherCaches;
  metrics: PerformanceMetrics;
  timeoutMs: number;
  ttl: { rostersMs: number; matchupsMs: number; accountNameMs: number };
  signal?: AbortSignal;
}

export interface RemoteLookup<T> {
  value: T;
  /** True when the value came from (or will be shared from) the cache. */
  cached: boolean;
  failed: boolean;
}

const isRosterList = (v: RosterRecord[] | MatchupRecord[]): v is RosterRecord[] =>
  v.length === 0 || 'ownerId' in v[0];
const isMatchupList = (v: RosterRecord[] | MatchupRecord[]): v is MatchupRecord[] =>
  v.length === 0 || 'matchupId' in v[0];

/**
 * Cache-first access to the data source for one rivalry run. Every remote
 * call gets its own timeout; failures degrade to empty data and are counted
 * rather than thrown.
 */
export class LeagueFetcher {
  constructor(private readonly opts: LeagueFetcherOptions) {}

  get metrics(): PerformanceMetrics {
    return this.opts.metrics;
  }

  async rosters(leagueId: string): Promise<RemoteLookup<RosterRecord[]>> {
    const { value, cached, failed } = await this.cachedList(`rosters:${leagueId}`, this.opts.ttl.rostersMs, (signal) =>
      this.opts.dataSource.fetchLeagueRosters(leagueId, { signal })
    );
    return { value: isRosterList(value) ? value : [], cached, failed };
  }

  async matchups(leagueId: string, week: number): Promise<RemoteLookup<MatchupRecord[]>> {
    const { value, cached, failed } = await this.cachedList(
      `matchups:${leagueId}:${week}`,
      this.opts.ttl.matchupsMs,
      (signal) => this.opts.dataSource.fetchLeagueMatchups(leagueId, week, { signal })
    );
    return { value: isMatchupList(value) ? value : [], cached, failed };
  }

  /** Cached display name, else a remote lookup; undefined when neither yields a name. */
  async accountName(accountId: string): Promise<RemoteLookup<string | undefined>> {
    const { caches, metrics, ttl } = this.opts;
    const key = `account-name:${accountId}`;
    const hit = caches.accountNames.get(key, ttl.accountNameMs);
    if (hit !== undefined) {
      metrics.apiCallsSaved++;
      return { value: hit, cached: true, failed: false };
    }
    metrics.apiCallsMade++;
    try {
      const info = await this.remote(`user ${accountId}`, (signal) =>
        this.opts.dataSource.fetchAccountInfo(accountId, { signal })
      );
      const name = info?.displayName || info?.username || undefined;
      if (name) caches.accountNames.set(key, name);
      return { value: name, cached: false, failed: false };
    } catch {
      metrics.fetchFailures++;
      return { value: undefined, cached: false, failed: true };
    }
  }

  private async cachedList(
    key: string,
    ttlMs: number,
    load: (signal: AbortSignal) => Promise<RosterRecord[] | MatchupRecord[]>
  ): Promise<RemoteLookup<RosterRecord[] | MatchupRecord[]>> {
    const { caches, metrics } = this.opts;
    let failed = false;
    const { value, hit } = await caches.responses.getOrLoad(
      key,
      ttlMs,
      async () => {
        metrics.apiCallsMade++;
        try {
          return await this.remote(key, load);
        } catch {
          failed = true;
          metrics.fetchFailures++;
          return [];
        }
      },
      (v) => v.length > 0
    );
    if (hit) metrics.apiCallsSaved++;
    return { value, cached: hit, failed };
  }

  private remote<T>(label: string, task: (signal: AbortSignal) => Promise<T>): Promise<T> {
    return withTimeout(label, this.opts.timeoutMs, task, this.opts.signal);
  }
}
