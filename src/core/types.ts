// === PLAYERS & FIXTURES ===

export interface Player {
  name: string;
  rating: number;
}

/** Player name -> rating. */
export type RatingsTable = Record<string, number>;

/** One round-1 pairing, player1 first. */
export type FixturePair = [player1: string, player2: string];

export interface TournamentDefinition {
  name: string;
  /** One odd best-of length per round, round 1 first. */
  bestOf: number[];
  players: Player[];
  fixture: FixturePair[];
}

// === MODEL SETTINGS ===

/**
 * What to do when the frame model leaves [0, 1]:
 *   clamp:  clamp and report a warning
 *   raw:    use the raw value and report a warning
 *   reject: throw ModelRangeError
 */
export type RangePolicy = 'clamp' | 'raw' | 'reject';

export const RANGE_POLICIES: readonly RangePolicy[] = ['clamp', 'raw', 'reject'];

export function isRangePolicy(value: string): value is RangePolicy {
  return RANGE_POLICIES.some(p => p === value);
}

export interface ModelOptions {
  scalingFactor: number;
  rangePolicy: RangePolicy;
}

/** A uniform random source on [0, 1). */
export type Rng = () => number;

/** Builds the random source for one trial from its index. */
export type RngFactory = (trialIndex: number) => Rng;

// === SIMULATION RESULTS ===

/**
 * Player name -> index of the last round whose match the player won.
 * 0 for a first-round loser, numRounds for the champion.
 */
export type TrialOutcome = Map<string, number>;

export interface ModelRangeWarning {
  player1: string;
  player2: string;
  round: number;
  ratingDiff: number;
  rawProbability: number;
  occurrences: number;
}

export interface PlayerAdvancement {
  player: string;
  rating: number;
  /** Trials in which the player survived through round r, at index r - 1. */
  roundCounts: number[];
  roundProbabilities: number[];
  /** 1 / probability; Infinity where the probability is 0. */
  roundOdds: number[];
  expectedMatchWins: number;
}

export interface AggregateResult {
  numEntrants: number;
  numRounds: number;
  totalTrials: number;
  seed: number | null;
  scalingFactor: number;
  rangePolicy: RangePolicy;
  bestOfSchedule: number[];
  stageLabels: string[];
  /** Fixture order. */
  players: PlayerAdvancement[];
  warnings: ModelRangeWarning[];
}
