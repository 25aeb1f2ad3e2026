import {
  RivalryEngine,
  createEngineCaches,
  type ComputeOptions,
  type RivalryEngineCaches,
} from '@/lib/rivalries/aggregator';
import type { LeagueDataSource } from '@/lib/rivalries/data-source';
import { LeagueFetcher } from '@/lib/rivalries/fetch-scheduler';
import {
  getManagerLeagueSummaries,
  summarizeManager,
  type ManagerLeagues,
  type ManagerSummary,
} from '@/lib/rivalries/manager-leagues';
import { emptyMetrics, type LeagueSummary, type RivalryResult } from '@/lib/rivalries/types';
import {
  DEFAULT_RIVALRY_CONFIG,
  RIVALRY_PRESETS,
  resolveRivalryConfig,
  type RivalryConfig,
  type RivalryMode,
} from '@/lib/constants/rivalry';
import { createSleeperDataSource } from '@/lib/utils/sleeper-api';
import type { Clock } from '@/lib/utils/ttl-cache';
import { loadEnv, type Env } from './env';
import { createLogger, type Logger } from './logger';

export interface RivalryServiceOptions {
  dataSource: LeagueDataSource;
  config?: RivalryConfig;
  logger?: Logger;
  clock?: Clock;
}

export interface RivalryRequestOptions extends ComputeOptions {
  mode?: RivalryMode;
}

export interface UsernameRivalries extends ManagerLeagues {
  summary: ManagerSummary;
  rivalries: RivalryResult;
}

/**
 * Long-lived owner of the rivalry caches. One engine per mode, all sharing
 * the same cache instances so roster/matchup lookups are reused across modes.
 */
export class RivalryService {
  readonly caches: RivalryEngineCaches;
  private readonly engines: Record<RivalryMode, RivalryEngine>;

  constructor(private readonly opts: RivalryServiceOptions) {
    const base = opts.config ?? DEFAULT_RIVALRY_CONFIG;
    this.caches = createEngineCaches(opts.clock);
    const engineFor = (mode: RivalryMode) =>
      new RivalryEngine({
        name: mode,
        dataSource: opts.dataSource,
        config: resolveRivalryConfig(base, RIVALRY_PRESETS[mode]),
        caches: this.caches,
        logger: opts.logger,
        clock: opts.clock,
      });
    this.engines = { comprehensive: engineFor('comprehensive'), fast: engineFor('fast') };
  }

  engine(mode: RivalryMode = 'comprehensive'): RivalryEngine {
    return this.engines[mode];
  }

  computeRivalries(
    accountId: string,
    leagues: readonly LeagueSummary[],
    season: string,
    options: RivalryRequestOptions = {}
  ): Promise<RivalryResult> {
    const { mode, ...compute } = options;
    return this.engine(mode).computeRivalries(accountId, leagues, season, compute);
  }

  /**
   * Resolves the user's leagues first; null when the username is unknown.
   * Roster lookups go through the shared response cache, so the engine reuses
   * them. A result built from an incomplete league list is not cached.
   */
  async computeRivalriesForUsername(
    username: string,
    season: string,
    options: RivalryRequestOptions = {}
  ): Promise<UsernameRivalries | null> {
    const { config } = this.engine(options.mode);
    const fetcher = new LeagueFetcher({
      dataSource: this.opts.dataSource,
      caches: this.caches,
      metrics: emptyMetrics(),
      timeoutMs: config.fetchTimeoutMs,
      ttl: config.ttl,
      signal: options.signal,
    });
    const manager = await getManagerLeagueSummaries(this.opts.dataSource, username, season, {
      concurrency: config.concurrency,
      signal: options.signal,
      fetcher,
    });
    if (!manager) return null;
    const rivalries = await this.computeRivalries(manager.account.accountId, manager.leagues, season, {
      ...options,
      storeResult: manager.unreadableLeagues === 0,
    });
    return { ...manager, summary: summarizeManager(manager), rivalries };
  }

  /** Drops stale entries; meant for a periodic sweep. */
  pruneCaches(): number {
    const ttl = this.engine().config.ttl;
    return (
      this.caches.results.pruneExpired(ttl.resultMs) +
      this.caches.responses.pruneExpired(Math.max(ttl.rostersMs, ttl.matchupsMs)) +
      this.caches.accountNames.pruneExpired(ttl.accountNameMs)
    );
  }
}

export function createRivalryService(opts: RivalryServiceOptions): RivalryService {
  return new RivalryService(opts);
}

export function rivalryConfigFromEnv(env: Env): RivalryConfig {
  return resolveRivalryConfig(DEFAULT_RIVALRY_CONFIG, {
    batchSize: env.RIVALRY_BATCH_SIZE,
    concurrency: env.RIVALRY_CONCURRENCY,
    fetchTimeoutMs: env.RIVALRY_FETCH_TIMEOUT_MS,
    ttl: { resultMs: env.RIVALRY_RESULT_TTL_MINUTES * 60 * 1000 },
  });
}

export function createRivalryServiceFromEnv(env: Env): RivalryService {
  const logger = createLogger('rivalries', env.RIVALRY_LOG_LEVEL);
  const dataSource = createSleeperDataSource({
    baseUrl: env.SLEEPER_API_BASE_URL,
    timeoutMs: env.SLEEPER_TIMEOUT_MS,
    retry: { retries: env.SLEEPER_RETRIES, baseDelayMs: env.SLEEPER_RETRY_DELAY_MS },
    logger: createLogger('sleeper-api', env.RIVALRY_LOG_LEVEL),
  });
  return createRivalryService({ dataSource, config: rivalryConfigFromEnv(env), logger });
}

let _service: RivalryService | null = null;

export function getRivalryService(): RivalryService {
  if (_service) return _service;
  _service = createRivalryServiceFromEnv(loadEnv(process.env));
  return _service;
}
