import { ModelOptions } from '../core/types';
import { DEFAULT_SCALING_FACTOR } from '../core/constants';
import { ConfigurationError } from '../core/errors';

/**
 * Probability that the stronger-by-ratingDiff player wins a single frame.
 *
 * P(frame) = 0.5 + scalingFactor · ratingDiff
 *
 * Unclamped: large differentials leave [0, 1]. Use resolveFrameProbability
 * to apply a range policy.
 */
export function frameWinProb(ratingDiff: number, scalingFactor = DEFAULT_SCALING_FACTOR): number {
  return 0.5 + scalingFactor * ratingDiff;
}

export interface FrameProbability {
  /** Value handed to the match model. */
  probability: number;
  /** Value straight from the linear model. */
  raw: number;
  outOfRange: boolean;
}

/**
 * Frame probability with the configured range policy applied.
 * Under `reject` the caller turns `outOfRange` into a ModelRangeError,
 * since only it knows which players are involved.
 */
export function resolveFrameProbability(ratingDiff: number, options: ModelOptions): FrameProbability {
  const raw = frameWinProb(ratingDiff, options.scalingFactor);
  const outOfRange = raw < 0 || raw > 1;
  if (!outOfRange || options.rangePolicy !== 'clamp') {
    return { probability: raw, raw, outOfRange };
  }
  return { probability: Math.max(0, Math.min(1, raw)), raw, outOfRange };
}

export function assertValidBestOf(bestOf: number): void {
  if (!Number.isInteger(bestOf) || bestOf < 1 || bestOf % 2 === 0) {
    throw new ConfigurationError(`best-of must be a positive odd integer, got ${bestOf}`);
  }
}

/** Frames needed to win a best-of-N match. */
export function framesToWin(bestOf: number): number {
  assertValidBestOf(bestOf);
  return Math.ceil(bestOf / 2);
}

/**
 * Binomial coefficient C(n, k). Every intermediate value is itself a
 * binomial coefficient, so the result is exact while it stays below 2^53.
 */
export function binomial(n: number, k: number): number {
  if (k < 0 || k > n) return 0;
  const kk = Math.min(k, n - k);
  let result = 1;
  for (let i = 1; i <= kk; i++) {
    result = (result * (n - kk + i)) / i;
  }
  return result;
}

export interface Scoreline {
  /** Frames won by the focal player. */
  player: number;
  opponent: number;
  /** Number of frame orders ending on this score, last frame won by the winner. */
  paths: number;
}

/**
 * Every final scoreline of a best-of-N match, focal player's wins first
 * (firstTo-0, firstTo-1, ...) then losses (0-firstTo, 1-firstTo, ...).
 */
export function enumerateScorelines(bestOf: number): Scoreline[] {
  const firstTo = framesToWin(bestOf);
  const scorelines: Scoreline[] = [];

  for (let lost = 0; lost < firstTo; lost++) {
    scorelines.push({ player: firstTo, opponent: lost, paths: binomial(firstTo - 1 + lost, lost) });
  }
  for (let won = 0; won < firstTo; won++) {
    scorelines.push({ player: won, opponent: firstTo, paths: binomial(firstTo - 1 + won, won) });
  }

  return scorelines;
}

function scorelineProbability(s: Scoreline, frameProb: number): number {
  return s.paths * Math.pow(frameProb, s.player) * Math.pow(1 - frameProb, s.opponent);
}

/**
 * Probability of winning a best-of-N match given the single-frame win
 * probability, by exact summation over winning scorelines:
 *
 * P(match) = Σ_{s2 < firstTo} C(firstTo - 1 + s2, s2) · p^firstTo · (1 - p)^s2
 */
export function matchWinProb(frameProb: number, bestOf: number): number {
  let total = 0;
  for (const s of enumerateScorelines(bestOf)) {
    if (s.player <= s.opponent) continue;
    total += scorelineProbability(s, frameProb);
  }
  return total;
}

export interface ScorelineProbability {
  player: number;
  opponent: number;
  probability: number;
}

/**
 * Probability of each final scoreline, in enumerateScorelines order.
 * Sums to 1 for frameProb in [0, 1].
 */
export function scorelineDistribution(frameProb: number, bestOf: number): ScorelineProbability[] {
  return enumerateScorelines(bestOf).map(s => ({
    player: s.player,
    opponent: s.opponent,
    probability: scorelineProbability(s, frameProb),
  }));
}
