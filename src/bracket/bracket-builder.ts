import { ConfigurationError } from '../core/errors';
import { STAGE_NAMES, STAGE_SHORT_NAMES } from '../core/constants';
import { assertValidBestOf, framesToWin } from '../engine/probability-model';
import { Bracket, BracketMatch, BracketRound } from './types';

export function isPowerOfTwo(n: number): boolean {
  return Number.isInteger(n) && n >= 2 && (n & (n - 1)) === 0;
}

export function roundCount(numEntrants: number): number {
  if (!isPowerOfTwo(numEntrants)) {
    throw new ConfigurationError(`Entrant count must be a power of two (>= 2), got ${numEntrants}`);
  }
  return Math.log2(numEntrants);
}

/**
 * Build the match arena for a knockout of `numEntrants` players.
 *
 * Round 1 has numEntrants / 2 matches with empty slots, filled from the
 * fixture in order. Each later round numbers its matches straight after the
 * previous round's and consumes that round in order, two matches at a time:
 * match k of round i is fed by matches 2k (slot 1) and 2k + 1 (slot 2) of
 * round i - 1, which keeps the draw's bracket paths.
 */
export function buildBracket(numEntrants: number, bestOfSchedule: readonly number[]): Bracket {
  const numRounds = roundCount(numEntrants);

  if (bestOfSchedule.length !== numRounds) {
    throw new ConfigurationError(
      `Best-of schedule has ${bestOfSchedule.length} entries but a ${numEntrants}-player bracket has ${numRounds} rounds`,
    );
  }
  bestOfSchedule.forEach(assertValidBestOf);

  const matches: BracketMatch[] = [];
  const rounds: BracketRound[] = [];
  let previous: number[] = [];

  for (let round = 1; round <= numRounds; round++) {
    const matchCount = numEntrants >> round;
    const matchIndices: number[] = [];

    for (let position = 0; position < matchCount; position++) {
      const index = matches.length;
      matches.push({
        index,
        round,
        position,
        sources: round === 1 ? null : [previous[2 * position], previous[2 * position + 1]],
      });
      matchIndices.push(index);
    }

    const bestOf = bestOfSchedule[round - 1];
    rounds.push({ round, bestOf, firstTo: framesToWin(bestOf), matchIndices });
    previous = matchIndices;
  }

  return { numEntrants, rounds, matches };
}

/**
 * Check the layering invariants: each round halves the previous one, and
 * every later-round match draws from two distinct previous-round matches,
 * with the previous round covered exactly once. Used on brackets that were
 * not produced by buildBracket in this process (worker input, stored runs).
 */
export function validateBracket(bracket: Bracket): void {
  const numRounds = roundCount(bracket.numEntrants);
  if (bracket.rounds.length !== numRounds) {
    throw new ConfigurationError(`Expected ${numRounds} rounds, found ${bracket.rounds.length}`);
  }

  let previous: number[] = [];
  bracket.rounds.forEach((round, i) => {
    assertValidBestOf(round.bestOf);
    const expected = bracket.numEntrants >> (i + 1);
    if (round.round !== i + 1 || round.matchIndices.length !== expected) {
      throw new ConfigurationError(`Round ${i + 1} must have ${expected} matches`);
    }

    const used = new Set<number>();
    for (const index of round.matchIndices) {
      const match = bracket.matches[index];
      if (!match || match.index !== index || match.round !== round.round) {
        throw new ConfigurationError(`Match ${index} is not part of round ${round.round}`);
      }
      if (round.round === 1) {
        if (match.sources !== null) {
          throw new ConfigurationError(`Round-1 match ${index} cannot have sources`);
        }
        continue;
      }
      if (match.sources === null) {
        throw new ConfigurationError(`Match ${index} in round ${round.round} has no sources`);
      }
      for (const source of match.sources) {
        if (!previous.includes(source) || used.has(source)) {
          throw new ConfigurationError(`Match ${index} has an invalid source ${source}`);
        }
        used.add(source);
      }
    }

    if (round.round > 1 && used.size !== previous.length) {
      throw new ConfigurationError(`Round ${round.round} does not consume every round ${round.round - 1} match`);
    }
    previous = round.matchIndices;
  });
}

function playersLeftAfter(numEntrants: number, round: number): number {
  return numEntrants >> round;
}

/** What the winners of `round` reach, e.g. "Last 16", "Semi-finals", "Champion". */
export function stageLabel(numEntrants: number, round: number): string {
  const left = playersLeftAfter(numEntrants, round);
  return STAGE_NAMES[left] ?? `Last ${left}`;
}

export function stageShortLabel(numEntrants: number, round: number): string {
  const left = playersLeftAfter(numEntrants, round);
  return STAGE_SHORT_NAMES[left] ?? `L${left}`;
}

export function stageLabels(bracket: Bracket): string[] {
  return bracket.rounds.map(r => stageLabel(bracket.numEntrants, r.round));
}
