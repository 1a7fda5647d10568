export interface OutputReport {
  title: string;
  generatedAt: string;
  simulationCount: number;
  seed: number | null;
  numEntrants: number;
  bestOfSchedule: number[];
  stageLabels: string[];
  /** Compact column headers for the terminal table. */
  stageShortLabels: string[];
  rows: OddsRow[];
  favourite: string | null;
  warnings: string[];
}

export interface OddsRow {
  rank: number;
  player: string;
  rating: string;
  /** One per stage, e.g. "42.1%". */
  probabilities: string[];
  /** Decimal odds per stage, "∞" where the stage was never reached. */
  odds: string[];
  expectedWins: string;
}
