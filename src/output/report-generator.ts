import { AggregateResult } from '../core/types';
import { stageShortLabel } from '../bracket/bracket-builder';
import { OutputReport, OddsRow } from './types';

/**
 * Generate a structured report from an aggregate simulation result.
 * Rows are ordered by title probability, then by fixture order.
 */
export function generateReport(
  result: AggregateResult,
  tournamentName: string,
  generatedAt: Date = new Date(),
): OutputReport {
  const finalRound = result.numRounds - 1;
  const ordered = result.players
    .map((p, position) => ({ p, position }))
    .sort((a, b) =>
      b.p.roundProbabilities[finalRound] - a.p.roundProbabilities[finalRound]
      || a.position - b.position);

  const rows: OddsRow[] = ordered.map(({ p }, i) => ({
    rank: i + 1,
    player: p.player,
    rating: p.rating.toFixed(3),
    probabilities: p.roundProbabilities.map(formatPct),
    odds: p.roundOdds.map(formatOdds),
    expectedWins: p.expectedMatchWins.toFixed(2),
  }));

  const stageShortLabels: string[] = [];
  for (let r = 1; r <= result.numRounds; r++) {
    stageShortLabels.push(stageShortLabel(result.numEntrants, r));
  }

  return {
    title: `${tournamentName} — Tournament Odds`,
    generatedAt: generatedAt.toISOString(),
    simulationCount: result.totalTrials,
    seed: result.seed,
    numEntrants: result.numEntrants,
    bestOfSchedule: [...result.bestOfSchedule],
    stageLabels: [...result.stageLabels],
    stageShortLabels,
    rows,
    favourite: ordered.length > 0 ? ordered[0].p.player : null,
    warnings: result.warnings.map(w =>
      `Round ${w.round}: ${w.player1} vs ${w.player2} frame probability ${w.rawProbability.toFixed(4)} outside [0, 1] (${w.occurrences} matches, policy ${result.rangePolicy})`),
  };
}

export function formatPct(value: number): string {
  if (value >= 0.9995 && value < 1) return '>99.9%';
  if (value > 0 && value < 0.001) return '<0.1%';
  return `${(value * 100).toFixed(1)}%`;
}

export function formatOdds(odds: number): string {
  if (!Number.isFinite(odds)) return '∞';
  if (odds >= 1000) return odds.toFixed(0);
  return odds.toFixed(2);
}
