// Rivalry engine tuning. The thresholds are empirical; keep them overridable.

export interface RivalryConfig {
  /** Leagues per batch; termination is checked between batches. */
  batchSize: number;
  /** Max in-flight league tasks within a batch. */
  concurrency: number;
  /** Timeout for each remote call made by the engine. */
  fetchTimeoutMs: number;
  /** Leagues with fewer recorded games are skipped outright. */
  minLeagueGames: number;
  /** Optional cap on prioritized leagues; null processes all. */
  maxLeagues: number | null;
  /** Last week ever considered (regular season + playoffs). */
  maxWeek: number;
  earlyTermination: {
    enabled: boolean;
    minBatches: number;
    minOpponents: number;
    minLeaderMatchups: number;
    minLeaderGap: number;
  };
  selection: {
    minRivalryGames: number;
    minRivalryWins: number;
    minRivalryLosses: number;
  };
  ttl: {
    resultMs: number;
    rostersMs: number;
    matchupsMs: number;
    accountNameMs: number;
  };
}

const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;

export const DEFAULT_RIVALRY_CONFIG: RivalryConfig = {
  batchSize: 6,
  concurrency: 6,
  fetchTimeoutMs: 8000,
  minLeagueGames: 2,
  maxLeagues: null,
  maxWeek: 18,
  earlyTermination: {
    enabled: true,
    minBatches: 2,
    minOpponents: 3,
    minLeaderMatchups: 7,
    minLeaderGap: 2,
  },
  selection: {
    minRivalryGames: 2,
    minRivalryWins: 2,
    minRivalryLosses: 2,
  },
  ttl: {
    resultMs: 15 * MINUTE,
    rostersMs: 24 * HOUR, // rosters rarely change mid-season
    matchupsMs: 24 * HOUR, // completed weeks never change
    accountNameMs: HOUR,
  },
};

export type RivalryMode = 'fast' | 'comprehensive';

export type RivalryConfigOverrides = Partial<Omit<RivalryConfig, 'earlyTermination' | 'selection' | 'ttl'>> & {
  earlyTermination?: Partial<RivalryConfig['earlyTermination']>;
  selection?: Partial<RivalryConfig['selection']>;
  ttl?: Partial<RivalryConfig['ttl']>;
};

// "fast" only looks at the busiest few leagues and the first half of the season
export const RIVALRY_PRESETS: Record<RivalryMode, RivalryConfigOverrides> = {
  comprehensive: {},
  fast: { maxLeagues: 3, minLeagueGames: 3, maxWeek: 8 },
};

export function resolveRivalryConfig(
  base: RivalryConfig = DEFAULT_RIVALRY_CONFIG,
  ...overrides: Array<RivalryConfigOverrides | undefined>
): RivalryConfig {
  let cfg = base;
  for (const o of overrides) {
    if (!o) continue;
    cfg = {
      ...cfg,
      ...o,
      earlyTermination: { ...cfg.earlyTermination, ...o.earlyTermination },
      selection: { ...cfg.selection, ...o.selection },
      ttl: { ...cfg.ttl, ...o.ttl },
    };
  }
  return cfg;
}
