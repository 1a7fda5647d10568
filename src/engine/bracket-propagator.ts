import { FixturePair, ModelOptions, ModelRangeWarning, RatingsTable, Rng, TrialOutcome } from '../core/types';
import { DEFAULT_RANGE_POLICY, DEFAULT_SCALING_FACTOR } from '../core/constants';
import { ModelRangeError } from '../core/errors';
import { Bracket, BracketRound, BoundTournament } from '../bracket/types';
import { BracketTrialState } from '../bracket/bracket-state';
import { bindTournament } from '../bracket/fixture-binding';
import { matchWinProb, resolveFrameProbability } from './probability-model';
import { TrialCounts, TrialRangeOptions } from './types';
import { sortWarnings } from './aggregation';

export function resolveModelOptions(options: Partial<ModelOptions> = {}): ModelOptions {
  return {
    scalingFactor: options.scalingFactor ?? DEFAULT_SCALING_FACTOR,
    rangePolicy: options.rangePolicy ?? DEFAULT_RANGE_POLICY,
  };
}

/**
 * Match-win probability for player 1 from the two ratings.
 * Out-of-range frame probabilities follow the range policy; under
 * `reject` this throws with the given names.
 */
export function matchProbability(
  rating1: number,
  rating2: number,
  bestOf: number,
  options: Partial<ModelOptions> = {},
  names: { player1: string; player2: string; round: number } = { player1: 'player1', player2: 'player2', round: 0 },
): number {
  const model = resolveModelOptions(options);
  const frame = resolveFrameProbability(rating1 - rating2, model);
  if (frame.outOfRange && model.rangePolicy === 'reject') {
    throw new ModelRangeError(names.player1, names.player2, names.round, frame.raw);
  }
  return matchWinProb(frame.probability, bestOf);
}

interface CachedProbability {
  probability: number;
  warning: ModelRangeWarning | null;
}

/**
 * Match probabilities memoised per (round, player1, player2). Ratings and
 * schedule are fixed for a run, so each pairing is computed once; range
 * warnings count every match that used an out-of-range value.
 */
export class MatchProbabilityCache {
  private readonly entries = new Map<number, CachedProbability>();
  private readonly warningList: ModelRangeWarning[] = [];
  private readonly playerCount: number;

  constructor(
    private readonly tournament: BoundTournament,
    private readonly model: ModelOptions,
  ) {
    this.playerCount = tournament.players.length;
  }

  get(round: BracketRound, player1: number, player2: number): number {
    const key = ((round.round - 1) * this.playerCount + player1) * this.playerCount + player2;
    let entry = this.entries.get(key);
    if (!entry) {
      entry = this.compute(round, player1, player2);
      this.entries.set(key, entry);
    }
    if (entry.warning) entry.warning.occurrences++;
    return entry.probability;
  }

  warnings(): ModelRangeWarning[] {
    return sortWarnings(this.warningList.map(w => ({ ...w })));
  }

  private compute(round: BracketRound, player1: number, player2: number): CachedProbability {
    const p1 = this.tournament.players[player1];
    const p2 = this.tournament.players[player2];
    const ratingDiff = p1.rating - p2.rating;
    const frame = resolveFrameProbability(ratingDiff, this.model);

    let warning: ModelRangeWarning | null = null;
    if (frame.outOfRange) {
      if (this.model.rangePolicy === 'reject') {
        throw new ModelRangeError(p1.name, p2.name, round.round, frame.raw);
      }
      warning = {
        player1: p1.name,
        player2: p2.name,
        round: round.round,
        ratingDiff,
        rawProbability: frame.raw,
        occurrences: 0,
      };
      this.warningList.push(warning);
    }

    return { probability: matchWinProb(frame.probability, round.bestOf), warning };
  }
}

/**
 * Play one trial. Rounds in order, matches in arena order, one uniform
 * draw per match: player 1 wins iff the draw is below their match
 * probability. Writes each player's last round won into `roundsWon`.
 */
function playTrial(
  tournament: BoundTournament,
  state: BracketTrialState,
  probabilities: MatchProbabilityCache,
  rng: Rng,
  roundsWon: Int32Array,
): void {
  state.reset();
  roundsWon.fill(0);

  for (const round of tournament.bracket.rounds) {
    for (const matchIndex of round.matchIndices) {
      const slots = state.getSlots(matchIndex);
      if (!slots) throw new Error(`Match ${matchIndex} has an undecided slot in round ${round.round}`);

      const [player1, player2] = slots;
      const prob = probabilities.get(round, player1, player2);
      const winner = rng() < prob ? player1 : player2;

      state.setWinner(matchIndex, winner);
      roundsWon[winner] = round.round;
    }
  }
}

/**
 * Simulate the tournament once.
 * Returns every fixtured player's last round won (0 = lost in round 1).
 */
export function simulate(
  bracket: Bracket,
  ratings: RatingsTable,
  round1Fixture: readonly FixturePair[],
  rng: Rng,
  options: Partial<ModelOptions> = {},
): TrialOutcome {
  const tournament = bindTournament(bracket, ratings, round1Fixture);
  return simulateBound(tournament, rng, options);
}

export function simulateBound(
  tournament: BoundTournament,
  rng: Rng,
  options: Partial<ModelOptions> = {},
): TrialOutcome {
  const state = new BracketTrialState(tournament);
  const probabilities = new MatchProbabilityCache(tournament, resolveModelOptions(options));
  const roundsWon = new Int32Array(tournament.players.length);

  playTrial(tournament, state, probabilities, rng, roundsWon);

  const outcome: TrialOutcome = new Map();
  tournament.players.forEach((p, i) => outcome.set(p.name, roundsWon[i]));
  return outcome;
}

/**
 * Run trials [startTrial, startTrial + trialCount) and count, per player
 * and round, the trials in which the player survived through that round.
 */
export function runTrialRange(tournament: BoundTournament, options: TrialRangeOptions): TrialCounts {
  const numRounds = tournament.bracket.rounds.length;
  const playerCount = tournament.players.length;

  const state = new BracketTrialState(tournament);
  const probabilities = new MatchProbabilityCache(tournament, options);
  const roundsWon = new Int32Array(playerCount);
  const counts = new Float64Array(playerCount * numRounds);

  const end = options.startTrial + options.trialCount;
  for (let trial = options.startTrial; trial < end; trial++) {
    playTrial(tournament, state, probabilities, options.rngFactory(trial), roundsWon);

    for (let p = 0; p < playerCount; p++) {
      const won = roundsWon[p];
      for (let r = 0; r < won; r++) counts[p * numRounds + r]++;
    }
  }

  const roundCounts: Record<string, number[]> = Object.fromEntries(
    tournament.players.map((p, i): [string, number[]] => [p.name, Array.from(counts.subarray(i * numRounds, (i + 1) * numRounds))]),
  );

  return {
    players: tournament.players.map(p => p.name),
    numRounds,
    totalTrials: options.trialCount,
    roundCounts,
    warnings: probabilities.warnings(),
  };
}
