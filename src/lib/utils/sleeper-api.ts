/**
 * Sleeper API client
 *
 * Thin HTTP layer over https://api.sleeper.app/v1 with timeout, retry and
 * cancellation, plus zod schemas for the handful of payloads the rivalry
 * engine reads. `createSleeperDataSource` wraps it in the fail-soft
 * LeagueDataSource contract.
 */

import { z } from 'zod';
import type {
  DataSourceCallOptions,
  LeagueDataSource,
  RosterRecord,
  SleeperLeagueListing,
} from '@/lib/rivalries/data-source';
import type { AccountInfo, MatchupRecord } from '@/lib/rivalries/types';
import { silentLogger, type Logger } from '@/lib/server/logger';

export const SLEEPER_API_BASE = 'https://api.sleeper.app/v1';

export interface RetryPolicy {
  /** Retry attempts after the first call. */
  retries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
  isRetryableStatus: (status: number) => boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  retries: 2,
  baseDelayMs: 500,
  maxDelayMs: 8000,
  jitterMs: 100,
  // 5xx, rate limit, request timeout
  isRetryableStatus: (status) => status >= 500 || status === 429 || status === 408,
};

export interface SleeperFetchOptions {
  signal?: AbortSignal;
  timeoutMs?: number; // default 5000ms
  retry?: Partial<RetryPolicy>;
  baseUrl?: string;
}

export class SleeperHttpError extends Error {
  constructor(
    readonly status: number,
    readonly url: string,
    statusText = ''
  ) {
    super(`HTTP ${status} ${statusText}`.trim() + ` for ${url}`);
    this.name = 'SleeperHttpError';
  }
}

function sleep(ms: number) {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function hasName(x: unknown): x is { name?: string } {
  return typeof x === 'object' && x !== null && 'name' in x;
}
function hasCode(x: unknown): x is { code?: string } {
  return typeof x === 'object' && x !== null && 'code' in x;
}

function isNetworkError(err: unknown): boolean {
  if (hasCode(err) && (err.code === 'ECONNRESET' || err.code === 'ETIMEDOUT')) return true;
  // undici reports connection failures as TypeError('fetch failed') with the code on `cause`
  if (err instanceof TypeError) {
    const cause: unknown = err.cause;
    return err.message === 'fetch failed' || (hasCode(cause) && typeof cause.code === 'string');
  }
  return false;
}

/** Exponential backoff for `attempt` (0-based), honouring a Retry-After header in seconds. */
export function backoffDelay(policy: RetryPolicy, attempt: number, retryAfter?: string | null): number {
  let delay = Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(2, attempt));
  const raSec = retryAfter ? Number(retryAfter) : NaN;
  if (Number.isFinite(raSec) && raSec > 0) delay = Math.max(delay, Math.min(policy.maxDelayMs, raSec * 1000));
  return delay + (policy.jitterMs > 0 ? Math.random() * policy.jitterMs : 0);
}

/**
 * GET `path` with timeout + retry + cancellation. Retries on network errors,
 * timeouts and retryable statuses; an abort from the caller's signal is
 * never retried.
 */
export async function sleeperFetchJson(path: string, opts?: SleeperFetchOptions): Promise<unknown> {
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...opts?.retry };
  const retries = Math.max(0, policy.retries);
  const timeoutMs = Math.max(1, opts?.timeoutMs ?? 5000);
  const url = `${opts?.baseUrl ?? SLEEPER_API_BASE}${path}`;

  for (let attempt = 0; ; attempt++) {
    if (opts?.signal?.aborted) throw opts.signal.reason;

    const controller = new AbortController();
    let abortedByCaller = false;
    const onAbort = () => {
      abortedByCaller = true;
      controller.abort();
    };
    opts?.signal?.addEventListener('abort', onAbort, { once: true });
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const resp = await fetch(url, { signal: controller.signal, headers: { accept: 'application/json' } });
      if (!resp.ok) {
        if (policy.isRetryableStatus(resp.status) && attempt < retries) {
          await sleep(backoffDelay(policy, attempt, resp.status === 429 ? resp.headers.get('retry-after') : null));
          continue;
        }
        throw new SleeperHttpError(resp.status, url, resp.statusText);
      }
      return await resp.json();
    } catch (err: unknown) {
      if (abortedByCaller) throw opts?.signal?.reason ?? err;
      if (err instanceof SleeperHttpError) throw err;
      const isTimeout = hasName(err) && err.name === 'AbortError';
      if (attempt < retries && (isTimeout || isNetworkError(err))) {
        await sleep(backoffDelay(policy, attempt));
        continue;
      }
      throw err;
    } finally {
      clearTimeout(timeoutId);
      opts?.signal?.removeEventListener('abort', onAbort);
    }
  }
}

// ---------------------------------
// Payload schemas (subset used)
// ---------------------------------

export const SleeperUserSchema = z.object({
  user_id: z.string(),
  username: z.string().nullish(),
  display_name: z.string().nullish(),
});

export const SleeperLeagueSchema = z.object({
  league_id: z.string(),
  name: z.string().nullish(),
  season: z.string().nullish(),
  total_rosters: z.number().nullish(),
});

export const SleeperRosterSchema = z.object({
  roster_id: z.number().int(),
  owner_id: z.string().nullish(),
  league_id: z.string().nullish(),
  metadata: z.record(z.string(), z.unknown()).nullish(),
  settings: z
    .object({
      wins: z.number().nullish(),
      losses: z.number().nullish(),
      ties: z.number().nullish(),
    })
    .nullish(),
});

export const SleeperMatchupSchema = z.object({
  roster_id: z.number().int(),
  matchup_id: z.number().int().nullish(),
  points: z.number().nullish(),
  // commissioner-adjusted score, wins over points when present
  custom_points: z.number().nullish(),
});

export type SleeperUser = z.infer<typeof SleeperUserSchema>;
export type SleeperRoster = z.infer<typeof SleeperRosterSchema>;
export type SleeperMatchup = z.infer<typeof SleeperMatchupSchema>;

/** Parses an array payload element by element, dropping the malformed ones. */
export function parseEach<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown): T[] {
  if (!Array.isArray(payload)) return [];
  const out: T[] = [];
  for (const item of payload) {
    const parsed = schema.safeParse(item);
    if (parsed.success) out.push(parsed.data);
  }
  return out;
}

export function toAccountInfo(user: SleeperUser): AccountInfo {
  const username = user.username ?? '';
  return {
    accountId: user.user_id,
    username,
    displayName: user.display_name || username,
  };
}

export function toRosterRecord(roster: SleeperRoster): RosterRecord {
  const rawName = roster.metadata?.team_name;
  const teamName = typeof rawName === 'string' && rawName.trim() ? rawName.trim() : undefined;
  return {
    rosterId: roster.roster_id,
    ownerId: roster.owner_id ?? null,
    teamName,
    wins: roster.settings?.wins ?? 0,
    losses: roster.settings?.losses ?? 0,
    ties: roster.settings?.ties ?? 0,
  };
}

export function toMatchupRecord(week: number, m: SleeperMatchup): MatchupRecord {
  return {
    week,
    rosterId: m.roster_id,
    matchupId: m.matchup_id ?? null,
    points: m.custom_points ?? m.points ?? 0,
  };
}

// ---------------------------------
// Endpoints
// ---------------------------------

/** Accepts either a username or a user id, like Sleeper itself. */
export async function getUser(usernameOrId: string, options?: SleeperFetchOptions): Promise<AccountInfo | null> {
  const json = await sleeperFetchJson(`/user/${encodeURIComponent(usernameOrId)}`, options);
  const parsed = SleeperUserSchema.safeParse(json);
  return parsed.success ? toAccountInfo(parsed.data) : null;
}

export async function getUserLeagues(
  userId: string,
  season: string,
  options?: SleeperFetchOptions
): Promise<SleeperLeagueListing[]> {
  const json = await sleeperFetchJson(`/user/${encodeURIComponent(userId)}/leagues/nfl/${season}`, options);
  return parseEach(SleeperLeagueSchema, json).map((l) => ({
    leagueId: l.league_id,
    name: l.name || `League ${l.league_id}`,
    totalRosters: l.total_rosters ?? 0,
  }));
}

export async function getLeagueRosters(leagueId: string, options?: SleeperFetchOptions): Promise<RosterRecord[]> {
  const json = await sleeperFetchJson(`/league/${encodeURIComponent(leagueId)}/rosters`, options);
  return parseEach(SleeperRosterSchema, json).map(toRosterRecord);
}

export async function getLeagueMatchups(
  leagueId: string,
  week: number,
  options?: SleeperFetchOptions
): Promise<MatchupRecord[]> {
  const json = await sleeperFetchJson(`/league/${encodeURIComponent(leagueId)}/matchups/${week}`, options);
  return parseEach(SleeperMatchupSchema, json).map((m) => toMatchupRecord(week, m));
}

// ---------------------------------
// Fail-soft data source
// ---------------------------------

export interface SleeperDataSourceOptions extends Omit<SleeperFetchOptions, 'signal'> {
  logger?: Logger;
}

export function createSleeperDataSource(config: SleeperDataSourceOptions = {}): LeagueDataSource {
  const { logger = silentLogger, ...fetchDefaults } = config;
  const opts = (call?: DataSourceCallOptions): SleeperFetchOptions => ({ ...fetchDefaults, signal: call?.signal });

  async function soft<T>(what: string, fallback: T, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (err) {
      logger.warn(`${what} failed, treating as no data`, err instanceof Error ? err.message : err);
      return fallback;
    }
  }

  async function strict<T>(what: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (err) {
      logger.warn(`${what} failed`, err instanceof Error ? err.message : err);
      throw err;
    }
  }

  return {
    fetchLeagueRosters: (leagueId, call) =>
      soft(`rosters for league ${leagueId}`, [], () => getLeagueRosters(leagueId, opts(call))),
    fetchLeagueMatchups: (leagueId, week, call) =>
      soft(`matchups for league ${leagueId} week ${week}`, [], () => getLeagueMatchups(leagueId, week, opts(call))),
    fetchAccountInfo: (accountId, call) =>
      soft(`user ${accountId}`, null, () => getUser(accountId, opts(call))),
    fetchUser: (username, call) => strict(`user ${username}`, () => getUser(username, opts(call))),
    fetchUserLeagues: (accountId, season, call) =>
      strict(`leagues for user ${accountId} (${season})`, () => getUserLeagues(accountId, season, opts(call))),
  };
}
