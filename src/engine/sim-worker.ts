/**
 * Piscina worker thread for Monte Carlo tournament trials.
 * Each invocation receives a plain-data task and returns the trial counts
 * for its range. No shared state with the main thread.
 */

import { validateBracket } from '../bracket/bracket-builder';
import { bindTournament } from '../bracket/fixture-binding';
import { runTrialRange } from './bracket-propagator';
import { seededRngFactory } from './rng';
import { SimulationTask, TrialCounts } from './types';

export default function runSimulationTask(task: SimulationTask): TrialCounts {
  validateBracket(task.bracket);
  const tournament = bindTournament(task.bracket, task.ratings, task.fixture);

  return runTrialRange(tournament, {
    scalingFactor: task.scalingFactor,
    rangePolicy: task.rangePolicy,
    startTrial: task.startTrial,
    trialCount: task.trialCount,
    rngFactory: seededRngFactory(task.seed),
  });
}
