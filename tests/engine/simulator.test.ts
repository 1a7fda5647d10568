import { describe, it, expect, afterAll, afterEach } from 'vitest';
import { buildBracket } from '../../src/bracket/bracket-builder';
import { bindDefinition, bindTournament } from '../../src/bracket/fixture-binding';
import { ConfigurationError } from '../../src/core/errors';
import { matchProbability, runTrialRange } from '../../src/engine/bracket-propagator';
import { mergeAllTrialCounts } from '../../src/engine/aggregation';
import { createRng, deriveTrialSeed, seededRngFactory } from '../../src/engine/rng';
import { destroyPool, planChunks, run, runAuto, runParallel, runSync } from '../../src/engine/simulator';
import { eventBus, SimulationEventMap } from '../../src/events/event-bus';
import { FOUR_PLAYER, FOUR_PLAYER_RATINGS, makeDefinition, scriptedRng } from '../helpers';

const SIXTEEN = makeDefinition(16, [5, 7, 9, 11]);

afterEach(() => {
  eventBus.removeAllListeners();
});

afterAll(async () => {
  await destroyPool();
});

describe('planChunks', () => {
  it('splits trials into contiguous ranges, remainder first', () => {
    expect(planChunks(10, 3)).toEqual([
      { startTrial: 0, trialCount: 4 },
      { startTrial: 4, trialCount: 3 },
      { startTrial: 7, trialCount: 3 },
    ]);
  });

  it('never plans empty chunks', () => {
    expect(planChunks(2, 8)).toEqual([
      { startTrial: 0, trialCount: 1 },
      { startTrial: 1, trialCount: 1 },
    ]);
  });
});

describe('runSync', () => {
  const tournament = bindDefinition(SIXTEEN);

  it('reproduces a run from its seed', () => {
    const first = runSync(tournament, { trials: 2000, seed: 77 });
    const second = runSync(tournament, { trials: 2000, seed: 77 });
    expect(second.result).toEqual(first.result);
    expect(first.result.seed).toBe(77);
    expect(first.parallel).toBe(false);
  });

  it('records a generated seed that reproduces the run', () => {
    const first = runSync(tournament, { trials: 500 });
    expect(first.result.seed).not.toBeNull();
    const replay = runSync(tournament, { trials: 500, seed: first.result.seed ?? undefined });
    expect(replay.result.players).toEqual(first.result.players);
  });

  it('matches the merged counts of any split into trial ranges', () => {
    const options = { scalingFactor: 0.7, rangePolicy: 'clamp' as const, rngFactory: seededRngFactory(5) };
    const whole = runTrialRange(tournament, { ...options, startTrial: 0, trialCount: 1000 });
    const chunks = planChunks(1000, 3).map(chunk => runTrialRange(tournament, { ...options, ...chunk }));
    const merged = mergeAllTrialCounts(chunks);

    expect(merged.totalTrials).toBe(1000);
    expect(merged.roundCounts).toEqual(whole.roundCounts);
  });

  it('keeps every round probability between 0 and 1 and non-increasing', () => {
    const { result } = runSync(tournament, { trials: 1000, seed: 3 });
    for (const p of result.players) {
      p.roundProbabilities.forEach((prob, r) => {
        expect(prob).toBeGreaterThanOrEqual(0);
        expect(prob).toBeLessThanOrEqual(1);
        if (r > 0) expect(prob).toBeLessThanOrEqual(p.roundProbabilities[r - 1]);
      });
    }
    const titleTotal = result.players.reduce((s, p) => s + p.roundCounts[3], 0);
    expect(titleTotal).toBe(1000);
  });

  it('favours the highest-rated player over many trials', () => {
    const { result } = runSync(tournament, { trials: 5000, seed: 21 });
    const title = (name: string) => result.players.find(p => p.player === name)?.roundProbabilities[3] ?? 0;
    expect(title('P16')).toBeGreaterThan(title('P1'));
  });

  it('rejects seeds outside the unsigned 32-bit range', () => {
    expect(() => runSync(tournament, { trials: 10, seed: 77.9 })).toThrow(ConfigurationError);
    expect(() => runSync(tournament, { trials: 10, seed: 77 + 2 ** 32 })).toThrow(ConfigurationError);
  });

  it('rejects a trial count below 1', () => {
    expect(() => runSync(tournament, { trials: 0, seed: 1 })).toThrow(ConfigurationError);
  });

  it('announces the run on the event bus', () => {
    const seen: string[] = [];
    let completed: SimulationEventMap['run-completed'] | undefined;
    eventBus.on('run-started', e => seen.push(`started:${e.runId}:${e.trials}`));
    eventBus.on('run-completed', e => {
      seen.push(`completed:${e.runId}`);
      completed = e;
    });

    const draws = [[0.5, 0.7, 0.1], [0.61, 0.2, 0.8]];
    runSync(bindDefinition(FOUR_PLAYER), {
      trials: 2,
      runId: 'run-1',
      tournamentName: 'Four',
      rngFactory: trial => scriptedRng(draws[trial]),
    });

    expect(seen).toEqual(['started:run-1:2', 'completed:run-1']);
    expect(completed).toMatchObject({ tournamentName: 'Four', totalTrials: 2, favourite: 'A', favouriteProbability: 0.5 });
  });

  it('emits one warning event per out-of-range pairing', () => {
    const warnings: SimulationEventMap['model-range-warning'][] = [];
    eventBus.on('model-range-warning', e => warnings.push(e));

    const saturated = bindTournament(buildBracket(2, [1]), { A: 1, B: 0 }, [['A', 'B']]);
    const { result } = runSync(saturated, { trials: 10, seed: 1, runId: 'run-2' });

    expect(result.players.map(p => p.roundCounts)).toEqual([[10], [0]]);
    expect(warnings).toHaveLength(1);
    expect(warnings[0].runId).toBe('run-2');
    expect(warnings[0].warning).toMatchObject({ player1: 'A', player2: 'B', round: 1, occurrences: 10 });
  });
});

describe('run', () => {
  it('simulates with the caller-supplied random sources', () => {
    const draws = [[0.5, 0.7, 0.1], [0.61, 0.2, 0.8]];
    const result = run(
      buildBracket(4, [3, 3]),
      FOUR_PLAYER_RATINGS,
      FOUR_PLAYER.fixture,
      2,
      trial => scriptedRng(draws[trial]),
    );
    expect(result.seed).toBeNull();
    expect(result.players.map(p => [p.player, p.roundCounts])).toEqual([
      ['A', [1, 1]],
      ['B', [1, 0]],
      ['C', [1, 1]],
      ['D', [1, 0]],
    ]);
  });

  it('plays a single seeded trial from that seed\'s own draws', () => {
    const seed = 2024;
    const rating = (name: string) => FOUR_PLAYER_RATINGS[name];
    const draws = createRng(deriveTrialSeed(seed, 0));
    const winner = (p1: string, p2: string) =>
      draws() < matchProbability(rating(p1), rating(p2), 3) ? p1 : p2;

    const top = winner('A', 'B');
    const bottom = winner('C', 'D');
    const champion = winner(top, bottom);

    const result = run(buildBracket(4, [3, 3]), FOUR_PLAYER_RATINGS, FOUR_PLAYER.fixture, 1, seededRngFactory(seed));
    const expected = (name: string) => [
      name === top || name === bottom ? 1 : 0,
      name === champion ? 1 : 0,
    ];
    for (const p of result.players) {
      expect(p.roundCounts).toEqual(expected(p.player));
    }
    expect(result.players.reduce((s, p) => s + p.roundCounts[1], 0)).toBe(1);
  });

  it('rejects a non-integer trial count', () => {
    expect(() => run(buildBracket(4, [3, 3]), FOUR_PLAYER_RATINGS, FOUR_PLAYER.fixture, 1.5, seededRngFactory(1)))
      .toThrow(ConfigurationError);
  });
});

describe('runParallel / runAuto', () => {
  const tournament = bindDefinition(FOUR_PLAYER);

  it('refuses a custom rng factory for worker threads', async () => {
    await expect(runParallel(tournament, { trials: 10, rngFactory: seededRngFactory(1) }))
      .rejects.toThrow(ConfigurationError);
  });

  it('stays in-thread for a single worker thread', async () => {
    const auto = await runAuto(tournament, { trials: 300, seed: 8 });
    expect(auto.parallel).toBe(false);
    expect(auto.result).toEqual(runSync(tournament, { trials: 300, seed: 8 }).result);
  });
});
