import { FixturePair, ModelOptions, ModelRangeWarning, RangePolicy, RatingsTable, RngFactory } from '../core/types';
import { Bracket } from '../bracket/types';

/**
 * Advancement counts for a batch of trials. This is the reduction state:
 * batches merge by element-wise sum, in any order.
 */
export interface TrialCounts {
  /** Fixture order. */
  players: string[];
  numRounds: number;
  totalTrials: number;
  /** player -> trials in which the player survived through round r, at index r - 1 */
  roundCounts: Record<string, number[]>;
  warnings: ModelRangeWarning[];
}

export interface TrialRangeOptions extends ModelOptions {
  /** Index of the first trial; trial seeds derive from it. */
  startTrial: number;
  trialCount: number;
  rngFactory: RngFactory;
}

export interface RunOptions {
  trials: number;
  /** Run seed. Drawn at random (and recorded) when neither this nor rngFactory is given. */
  seed?: number;
  /** Overrides seed-based trial randomness. In-thread runs only. */
  rngFactory?: RngFactory;
  scalingFactor?: number;
  rangePolicy?: RangePolicy;
  /** Tags lifecycle events; generated when absent. */
  runId?: string;
  tournamentName?: string;
}

/** Work unit for a pool thread. Plain data only: it crosses a thread boundary. */
export interface SimulationTask {
  bracket: Bracket;
  ratings: RatingsTable;
  fixture: FixturePair[];
  seed: number;
  startTrial: number;
  trialCount: number;
  scalingFactor: number;
  rangePolicy: RangePolicy;
}
