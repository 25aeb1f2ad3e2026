import { describe, expect, it } from 'vitest';
import {
  RivalryEngine,
  evaluateEarlyTermination,
  mergeOpponentMaps,
  selectRivalries,
  type TallyMap,
} from './aggregator';
import { RivalryUnavailableError } from './errors';
import { emptyMetrics, type LeagueOpponentMap, type LeagueSummary, type OpponentTally } from './types';
import { DEFAULT_RIVALRY_CONFIG, resolveRivalryConfig, type RivalryConfigOverrides } from '@/lib/constants/rivalry';
import { HANG, createFakeDataSource, game, roster, type FakeWorld } from '@/test/fake-data-source';

function league(leagueId: string, totalGames: number): LeagueSummary {
  return { leagueId, leagueName: `League ${leagueId}`, totalGames };
}

function tally(opponentId: string, wins: number, losses: number): OpponentTally {
  return { opponentId, displayName: opponentId.toUpperCase(), wins, losses, matchups: wins + losses };
}

function tallyMap(...tallies: OpponentTally[]): TallyMap {
  return new Map(tallies.map((t) => [t.opponentId, t]));
}

function engineFor(world: FakeWorld, overrides: RivalryConfigOverrides = {}) {
  const dataSource = createFakeDataSource(world);
  const engine = new RivalryEngine({
    dataSource,
    config: resolveRivalryConfig(DEFAULT_RIVALRY_CONFIG, overrides),
  });
  return { engine, dataSource };
}

describe('mergeOpponentMaps', () => {
  it('adds tallies for the same opponent across leagues', () => {
    const a: LeagueOpponentMap = new Map([['y', { wins: 3, losses: 0, displayName: 'Yankees' }]]);
    const b: LeagueOpponentMap = new Map([['y', { wins: 4, losses: 1, displayName: 'Yankees' }]]);
    const merged = mergeOpponentMaps(new Map(), [a, b]);
    expect(merged.get('y')).toEqual({ opponentId: 'y', displayName: 'Yankees', wins: 7, losses: 1, matchups: 8 });
  });

  it('is commutative across batches', () => {
    const a: LeagueOpponentMap = new Map([
      ['p', { wins: 2, losses: 1, displayName: 'P' }],
      ['q', { wins: 0, losses: 3, displayName: 'Q' }],
    ]);
    const b: LeagueOpponentMap = new Map([
      ['q', { wins: 1, losses: 1, displayName: 'Q' }],
      ['r', { wins: 5, losses: 0, displayName: 'R' }],
    ]);
    const ab = mergeOpponentMaps(mergeOpponentMaps(new Map(), [a]), [b]);
    const ba = mergeOpponentMaps(mergeOpponentMaps(new Map(), [b]), [a]);
    const sorted = (m: TallyMap) => [...m.values()].sort((x, y) => x.opponentId.localeCompare(y.opponentId));
    expect(sorted(ab)).toEqual(sorted(ba));
    expect(selectRivalries(ab, DEFAULT_RIVALRY_CONFIG.selection)).toEqual(
      selectRivalries(ba, DEFAULT_RIVALRY_CONFIG.selection)
    );
  });

  it('keeps matchups equal to wins + losses', () => {
    const merged = mergeOpponentMaps(new Map(), [
      new Map([['s', { wins: 1, losses: 2, displayName: 'S' }]]),
      new Map([['s', { wins: 0, losses: 0, displayName: 'S' }]]),
      new Map([['s', { wins: 4, losses: 0, displayName: 'S' }]]),
    ]);
    for (const t of merged.values()) expect(t.matchups).toBe(t.wins + t.losses);
    expect(merged.get('s')?.matchups).toBe(7);
  });
});

describe('evaluateEarlyTermination', () => {
  const cfg = DEFAULT_RIVALRY_CONFIG.earlyTermination;
  const strong = tallyMap(tally('a', 7, 0), tally('b', 0, 7), tally('c', 1, 1));

  it('never fires before the minimum number of batches', () => {
    expect(evaluateEarlyTermination(strong, 1, cfg).terminate).toBe(false);
    expect(evaluateEarlyTermination(strong, 2, cfg).terminate).toBe(true);
  });

  it('needs at least three known opponents', () => {
    expect(evaluateEarlyTermination(tallyMap(tally('a', 9, 0), tally('b', 0, 9)), 5, cfg)).toEqual({
      terminate: false,
    });
  });

  it('needs a clear lead for both leaders', () => {
    const closeWins = tallyMap(tally('a', 7, 0), tally('c', 6, 1), tally('b', 0, 7));
    const check = evaluateEarlyTermination(closeWins, 3, cfg);
    expect(check.winGap).toBe(1);
    expect(check.lossGap).toBe(6);
    expect(check.terminate).toBe(false);
  });

  it('needs enough matchups against each leader', () => {
    const thin = tallyMap(tally('a', 6, 0), tally('b', 0, 7), tally('c', 1, 1));
    expect(evaluateEarlyTermination(thin, 3, cfg).terminate).toBe(false);
  });

  it('can be disabled', () => {
    expect(evaluateEarlyTermination(strong, 4, { ...cfg, enabled: false }).terminate).toBe(false);
  });
});

describe('selectRivalries', () => {
  const selection = DEFAULT_RIVALRY_CONFIG.selection;

  it('does not report a single-win rivalry', () => {
    expect(selectRivalries(tallyMap(tally('a', 1, 0), tally('b', 1, 1)), selection)).toEqual({
      mostWinsAgainst: null,
      mostLossesTo: null,
    });
  });

  it('breaks ties by matchups, then opponent id', () => {
    const result = selectRivalries(tallyMap(tally('m', 3, 0), tally('k', 3, 2), tally('j', 3, 2)), selection);
    expect(result.mostWinsAgainst?.opponentId).toBe('j');
    expect(result.mostLossesTo?.opponentId).toBe('j');
  });
});

describe('RivalryEngine.computeRivalries', () => {
  it('reports the loss rivalry when the account only won once', async () => {
    const { engine } = engineFor({
      leagues: {
        L1: {
          rosters: [roster(1, 'me', 'My Team'), roster(2, 'x', 'Xavier FC')],
          weeks: {
            1: game(1, 1, [1, 80], [2, 100]),
            2: game(2, 1, [1, 90], [2, 110]),
            3: game(3, 1, [1, 120], [2, 100]),
          },
        },
      },
    });

    const result = await engine.computeRivalries('me', [league('L1', 3)], '2024', { weeks: { start: 1, end: 3 } });

    expect(result.mostWinsAgainst).toBeNull();
    expect(result.mostLossesTo).toEqual({
      opponentId: 'x',
      displayName: 'Xavier FC',
      wins: 1,
      losses: 2,
      matchups: 3,
      winPercentage: 1 / 3,
    });
    expect(result.performance).toMatchObject({
      cacheMisses: 1,
      apiCallsMade: 4,
      apiCallsSaved: 0,
      leaguesProcessed: 1,
      opponentsFound: 1,
      earlyTermination: false,
    });
  });

  it('merges the same opponent across leagues', async () => {
    const { engine } = engineFor({
      leagues: {
        A: {
          rosters: [roster(1, 'me'), roster(5, 'y', 'Yankees')],
          weeks: {
            1: game(1, 1, [1, 100], [5, 90]),
            2: game(2, 1, [1, 100], [5, 90]),
            3: game(3, 1, [1, 100], [5, 90]),
          },
        },
        B: {
          rosters: [roster(7, 'y', 'Yankees'), roster(3, 'me')],
          weeks: {
            1: game(1, 2, [3, 100], [7, 90]),
            2: game(2, 2, [3, 100], [7, 90]),
            3: game(3, 2, [3, 100], [7, 90]),
            4: game(4, 2, [3, 100], [7, 90]),
            5: game(5, 2, [3, 80], [7, 90]),
          },
        },
      },
    });

    const result = await engine.computeRivalries('me', [league('A', 3), league('B', 5)], '2024', {
      weeks: { start: 1, end: 5 },
    });

    expect(result.mostWinsAgainst).toEqual({
      opponentId: 'y',
      displayName: 'Yankees',
      wins: 7,
      losses: 1,
      matchups: 8,
      winPercentage: 7 / 8,
    });
    expect(result.mostLossesTo).toBeNull();
  });

  it('keeps aggregating when one week times out', async () => {
    const { engine, dataSource } = engineFor(
      {
        leagues: {
          L1: {
            rosters: [roster(1, 'me'), roster(2, 'z', 'Zed'), roster(3, 'w', 'Dub')],
            weeks: {
              1: game(1, 1, [1, 100], [2, 90]),
              4: game(4, 1, [1, 101], [2, 99]),
              5: HANG,
              6: game(6, 3, [3, 120], [1, 100]),
              7: game(7, 1, [1, 88], [3, 99]),
              8: game(8, 1, [1, 130], [3, 60]),
            },
          },
        },
      },
      { fetchTimeoutMs: 20 }
    );
    engine.caches.responses.set('matchups:L1:2', game(2, 1, [1, 100], [2, 90]));
    engine.caches.responses.set('matchups:L1:3', game(3, 2, [1, 70], [2, 90]));

    const result = await engine.computeRivalries('me', [league('L1', 8)], '2024', { weeks: { start: 1, end: 8 } });

    expect(result.mostWinsAgainst).toEqual({
      opponentId: 'z',
      displayName: 'Zed',
      wins: 3,
      losses: 1,
      matchups: 4,
      winPercentage: 0.75,
    });
    expect(result.mostLossesTo).toEqual({
      opponentId: 'w',
      displayName: 'Dub',
      wins: 1,
      losses: 2,
      matchups: 3,
      winPercentage: 1 / 3,
    });
    expect(result.performance).toMatchObject({
      apiCallsMade: 7,
      apiCallsSaved: 2,
      fetchFailures: 1,
      leaguesProcessed: 1,
      leaguesFailed: 0,
    });
    expect(dataSource.calls.matchups).toEqual(['L1:1', 'L1:4', 'L1:5', 'L1:6', 'L1:7', 'L1:8']);
  });

  it('stops dispatching batches once both leaders are clear', async () => {
    const l1Weeks: Record<number, ReturnType<typeof game>> = {};
    for (let w = 1; w <= 7; w++) l1Weeks[w] = game(w, 1, [1, 100], [2, 50]);
    for (let w = 8; w <= 14; w++) l1Weeks[w] = game(w, 1, [1, 50], [3, 100]);
    l1Weeks[15] = game(15, 1, [1, 100], [4, 50]);
    l1Weeks[16] = game(16, 1, [1, 50], [4, 100]);

    const { engine, dataSource } = engineFor(
      {
        leagues: {
          L1: {
            rosters: [roster(1, 'me'), roster(2, 'a', 'Team A'), roster(3, 'b', 'Team B'), roster(4, 'c', 'Team C')],
            weeks: l1Weeks,
          },
          L2: { rosters: [roster(1, 'me'), roster(2, 'c', 'Team C')], weeks: { 1: game(1, 1, [1, 100], [2, 50]) } },
          L3: { rosters: [roster(1, 'me'), roster(2, 'd', 'Team D')] },
          L4: { rosters: [roster(1, 'me'), roster(2, 'e', 'Team E')] },
        },
      },
      { batchSize: 1, concurrency: 1 }
    );

    const result = await engine.computeRivalries(
      'me',
      [league('L4', 7), league('L2', 9), league('L3', 8), league('L1', 10)],
      '2024',
      { weeks: { start: 1, end: 16 } }
    );

    expect(dataSource.calls.rosters).toEqual(['L1', 'L2']);
    expect(result.performance).toMatchObject({ earlyTermination: true, batchesProcessed: 2, leaguesProcessed: 2 });
    expect(result.mostWinsAgainst).toMatchObject({ opponentId: 'a', wins: 7, losses: 0 });
    expect(result.mostLossesTo).toMatchObject({ opponentId: 'b', wins: 0, losses: 7 });
  });

  it('serves a repeated request from the result cache', async () => {
    const { engine, dataSource } = engineFor({
      leagues: {
        L1: {
          rosters: [roster(1, 'me'), roster(2, 'x', 'X')],
          weeks: { 1: game(1, 1, [1, 1], [2, 2]), 2: game(2, 1, [1, 1], [2, 2]) },
        },
      },
    });
    const opts = { weeks: { start: 1, end: 2 } };
    const first = await engine.computeRivalries('me', [league('L1', 2)], '2024', opts);
    const second = await engine.computeRivalries('me', [league('L1', 2)], '2024', opts);

    expect(second.mostLossesTo).toEqual(first.mostLossesTo);
    expect(second.performance).toEqual({ ...emptyMetrics(), cacheHits: 1 });
    expect(dataSource.calls.rosters).toEqual(['L1']);
  });

  it('hands out copies so callers cannot alter cached results', async () => {
    const { engine } = engineFor({
      leagues: {
        L1: {
          rosters: [roster(1, 'me'), roster(2, 'x', 'X')],
          weeks: { 1: game(1, 1, [1, 1], [2, 2]), 2: game(2, 1, [1, 1], [2, 2]) },
        },
      },
    });
    const opts = { weeks: { start: 1, end: 2 } };
    const first = await engine.computeRivalries('me', [league('L1', 2)], '2024', opts);
    const record = first.mostLossesTo;
    if (!record) throw new Error('expected a loss rivalry');
    record.losses = 99;
    first.performance.apiCallsMade = 99;

    const second = await engine.computeRivalries('me', [league('L1', 2)], '2024', opts);
    expect(second.mostLossesTo?.losses).toBe(2);
    expect(engine.caches.results.get(engine.resultCacheKey('me', '2024'), 60_000)?.performance.apiCallsMade).toBe(3);
  });

  it('does not cache a result when told not to store it', async () => {
    const { engine, dataSource } = engineFor({
      leagues: {
        L1: {
          rosters: [roster(1, 'me'), roster(2, 'x', 'X')],
          weeks: { 1: game(1, 1, [1, 1], [2, 2]), 2: game(2, 1, [1, 1], [2, 2]) },
        },
      },
    });
    const opts = { weeks: { start: 1, end: 2 }, storeResult: false };
    await engine.computeRivalries('me', [league('L1', 2)], '2024', opts);
    const second = await engine.computeRivalries('me', [league('L1', 2)], '2024', opts);

    expect(second.performance.cacheMisses).toBe(1);
    expect(second.performance.apiCallsSaved).toBe(3);
    expect(dataSource.calls.rosters).toEqual(['L1']);
  });

  it('names an opponent after the higher-priority league even when it settles last', async () => {
    const { engine } = engineFor({
      leagues: {
        A: {
          rosters: [roster(1, 'me'), roster(2, 'z', 'Alpha Name')],
          weeks: { 1: game(1, 1, [1, 80], [2, 90]) },
          rosterDelayMs: 30,
        },
        B: {
          rosters: [roster(1, 'me'), roster(2, 'z', 'Beta Name')],
          weeks: { 1: game(1, 1, [1, 80], [2, 90]) },
        },
      },
    });
    const result = await engine.computeRivalries('me', [league('B', 4), league('A', 9)], '2024', {
      weeks: { start: 1, end: 1 },
    });
    expect(result.mostLossesTo).toMatchObject({ opponentId: 'z', displayName: 'Alpha Name', losses: 2 });
  });

  it('returns an empty result for missing input without calling upstream', async () => {
    const { engine, dataSource } = engineFor({});
    await expect(engine.computeRivalries('', [league('L1', 5)], '2024')).resolves.toEqual({
      mostWinsAgainst: null,
      mostLossesTo: null,
      performance: emptyMetrics(),
    });
    await expect(engine.computeRivalries('me', [], '2024')).resolves.toEqual({
      mostWinsAgainst: null,
      mostLossesTo: null,
      performance: emptyMetrics(),
    });
    expect(dataSource.calls.rosters).toEqual([]);
  });

  it('skips low-signal leagues and leagues the account is not in', async () => {
    const { engine, dataSource } = engineFor({
      leagues: { L2: { rosters: [roster(1, 'someone-else')] } },
    });
    const result = await engine.computeRivalries('me', [league('L1', 1), league('L2', 6)], '2024', {
      weeks: { start: 1, end: 3 },
    });
    expect(dataSource.calls.rosters).toEqual(['L2']);
    expect(result.mostWinsAgainst).toBeNull();
    expect(result.mostLossesTo).toBeNull();
    expect(result.performance).toMatchObject({ leaguesSkipped: 2, leaguesFailed: 0, leaguesProcessed: 0 });
  });

  it('reports unavailability when every league lookup fails', async () => {
    const { engine } = engineFor({ leagues: {} });
    await expect(engine.computeRivalries('me', [league('L1', 4), league('L2', 3)], '2024')).rejects.toBeInstanceOf(
      RivalryUnavailableError
    );
    expect(engine.caches.results.stats().entries).toBe(0);
  });

  it('rejects when the caller aborts', async () => {
    const { engine } = engineFor({ leagues: { L1: { rosters: [roster(1, 'me')] } } });
    const controller = new AbortController();
    controller.abort();
    await expect(
      engine.computeRivalries('me', [league('L1', 4)], '2024', { signal: controller.signal })
    ).rejects.toMatchObject({ name: 'AbortError' });
  });
});
