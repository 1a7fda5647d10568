import { RangePolicy } from './types';

export const DEFAULT_SCALING_FACTOR = 0.7;
export const DEFAULT_RANGE_POLICY: RangePolicy = 'clamp';

// Names for the stage a round's winners reach, keyed by players left.
export const STAGE_NAMES: Record<number, string> = {
  1: 'Champion',
  2: 'Final',
  4: 'Semi-finals',
  8: 'Quarter-finals',
};

export const STAGE_SHORT_NAMES: Record<number, string> = {
  1: 'W',
  2: 'F',
  4: 'SF',
  8: 'QF',
};
