import { AggregateResult, ModelRangeWarning, PlayerAdvancement, RangePolicy, TrialOutcome } from '../core/types';
import { ConfigurationError, UnknownPlayerError } from '../core/errors';
import { BoundTournament } from '../bracket/types';
import { stageLabels } from '../bracket/bracket-builder';
import { TrialCounts } from './types';

export function assertValidTrialCount(trials: number): void {
  if (!Number.isInteger(trials) || trials < 1) {
    throw new ConfigurationError(`Trial count must be an integer >= 1, got ${trials}`);
  }
}

export function createTrialCounts(players: readonly string[], numRounds: number): TrialCounts {
  const roundCounts: Record<string, number[]> = Object.fromEntries(
    players.map((p): [string, number[]] => [p, new Array<number>(numRounds).fill(0)]),
  );
  return { players: [...players], numRounds, totalTrials: 0, roundCounts, warnings: [] };
}

/**
 * Fold one trial into the counters: +1 for every round the player survived
 * through (rounds 1..roundsWon).
 */
export function foldTrialOutcome(counts: TrialCounts, outcome: TrialOutcome): TrialCounts {
  for (const [player, roundsWon] of outcome) {
    if (!Object.hasOwn(counts.roundCounts, player)) throw new UnknownPlayerError(player);
    const row = counts.roundCounts[player];
    if (roundsWon > counts.numRounds) {
      throw new ConfigurationError(`${player} won ${roundsWon} rounds of a ${counts.numRounds}-round bracket`);
    }
    for (let r = 0; r < roundsWon; r++) row[r]++;
  }
  counts.totalTrials++;
  return counts;
}

function warningKey(w: ModelRangeWarning): string {
  return `${w.round}\u0000${w.player1}\u0000${w.player2}`;
}

export function sortWarnings(warnings: ModelRangeWarning[]): ModelRangeWarning[] {
  return warnings.sort((a, b) =>
    a.round - b.round
    || a.player1.localeCompare(b.player1)
    || a.player2.localeCompare(b.player2));
}

function mergeWarnings(a: ModelRangeWarning[], b: ModelRangeWarning[]): ModelRangeWarning[] {
  const merged = new Map<string, ModelRangeWarning>();
  for (const w of [...a, ...b]) {
    const key = warningKey(w);
    const existing = merged.get(key);
    if (existing) {
      existing.occurrences += w.occurrences;
    } else {
      merged.set(key, { ...w });
    }
  }
  return sortWarnings([...merged.values()]);
}

/**
 * Element-wise sum of two batches. Associative and commutative, so worker
 * results can be combined in any order or as a tree.
 */
export function mergeTrialCounts(a: TrialCounts, b: TrialCounts): TrialCounts {
  if (a.numRounds !== b.numRounds) {
    throw new ConfigurationError(`Cannot merge counts for ${a.numRounds} and ${b.numRounds} rounds`);
  }

  const players = [...a.players];
  for (const p of b.players) {
    if (!players.includes(p)) players.push(p);
  }

  const merged = createTrialCounts(players, a.numRounds);
  for (const source of [a, b]) {
    for (const [player, row] of Object.entries(source.roundCounts)) {
      const target = merged.roundCounts[player];
      row.forEach((count, r) => { target[r] += count; });
    }
  }

  merged.totalTrials = a.totalTrials + b.totalTrials;
  merged.warnings = mergeWarnings(a.warnings, b.warnings);
  return merged;
}

export function mergeAllTrialCounts(results: TrialCounts[]): TrialCounts {
  if (results.length === 0) throw new ConfigurationError('No trial counts to merge');
  return results.reduce((acc, next) => mergeTrialCounts(acc, next));
}

export function toProbability(count: number, totalTrials: number): number {
  return count / totalTrials;
}

export function toOdds(probability: number): number {
  return probability === 0 ? Infinity : 1 / probability;
}

export interface RunInfo {
  seed: number | null;
  scalingFactor: number;
  rangePolicy: RangePolicy;
}

/**
 * Convert raw counts into per-player probability and odds tables.
 */
export function deriveAggregateResult(
  counts: TrialCounts,
  tournament: BoundTournament,
  info: RunInfo,
): AggregateResult {
  if (counts.totalTrials < 1) {
    throw new ConfigurationError('Cannot derive probabilities from zero trials');
  }

  const { bracket } = tournament;
  const players: PlayerAdvancement[] = tournament.players.map(p => {
    const roundCounts = Object.hasOwn(counts.roundCounts, p.name)
      ? counts.roundCounts[p.name]
      : new Array<number>(counts.numRounds).fill(0);
    const roundProbabilities = roundCounts.map(c => toProbability(c, counts.totalTrials));

    return {
      player: p.name,
      rating: p.rating,
      roundCounts: [...roundCounts],
      roundProbabilities,
      roundOdds: roundProbabilities.map(toOdds),
      // Matches won = rounds survived through, so E[wins] = Σ P(survive round r)
      expectedMatchWins: roundProbabilities.reduce((s, v) => s + v, 0),
    };
  });

  return {
    numEntrants: bracket.numEntrants,
    numRounds: bracket.rounds.length,
    totalTrials: counts.totalTrials,
    seed: info.seed,
    scalingFactor: info.scalingFactor,
    rangePolicy: info.rangePolicy,
    bestOfSchedule: bracket.rounds.map(r => r.bestOf),
    stageLabels: stageLabels(bracket),
    players,
    warnings: counts.warnings.map(w => ({ ...w })),
  };
}

/** Player with the highest final-round probability; first in fixture order on ties. */
export function mostLikelyChampion(result: AggregateResult): PlayerAdvancement | undefined {
  let best: PlayerAdvancement | undefined;
  for (const p of result.players) {
    const prob = p.roundProbabilities[result.numRounds - 1];
    if (!best || prob > best.roundProbabilities[result.numRounds - 1]) best = p;
  }
  return best;
}
