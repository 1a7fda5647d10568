import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import Piscina from 'piscina';
import { AggregateResult, FixturePair, ModelOptions, RatingsTable, RngFactory } from '../core/types';
import { ConfigurationError } from '../core/errors';
import { CONFIG } from '../config';
import { Bracket, BoundTournament } from '../bracket/types';
import { bindTournament, fixtureOf, ratingsOf } from '../bracket/fixture-binding';
import { eventBus } from '../events/event-bus';
import { runTrialRange } from './bracket-propagator';
import {
  assertValidTrialCount,
  deriveAggregateResult,
  mergeAllTrialCounts,
  mostLikelyChampion,
} from './aggregation';
import { assertValidSeed, seededRngFactory, randomRunSeed } from './rng';
import { RunOptions, SimulationTask, TrialCounts } from './types';

export interface SimulationRun {
  runId: string;
  result: AggregateResult;
  durationMs: number;
  parallel: boolean;
}

interface PreparedRun {
  runId: string;
  tournamentName: string;
  trials: number;
  seed: number | null;
  model: ModelOptions;
  startedAt: number;
}

let pool: Piscina | null = null;
let missingWorkerReported = false;

function workerFilename(): string {
  return path.resolve(__dirname, 'sim-worker.js');
}

function getPool(): Piscina {
  if (pool) return pool;
  pool = new Piscina({
    filename: workerFilename(),
    maxThreads: CONFIG.WORKER_THREADS,
    idleTimeout: 30000,
  });
  return pool;
}

/**
 * Destroy the worker pool. Call on shutdown.
 */
export async function destroyPool(): Promise<void> {
  if (pool) {
    await pool.destroy();
    pool = null;
  }
}

/**
 * Split trial indices [0, total) into contiguous chunks, one per worker.
 * Earlier chunks take the remainder.
 */
export function planChunks(total: number, workers: number): { startTrial: number; trialCount: number }[] {
  const workerCount = Math.max(1, Math.min(workers, total));
  const perWorker = Math.floor(total / workerCount);
  const remainder = total % workerCount;

  const chunks: { startTrial: number; trialCount: number }[] = [];
  let start = 0;
  for (let i = 0; i < workerCount; i++) {
    const count = perWorker + (i < remainder ? 1 : 0);
    chunks.push({ startTrial: start, trialCount: count });
    start += count;
  }
  return chunks;
}

function prepareRun(tournament: BoundTournament, options: RunOptions, parallel: boolean): PreparedRun {
  assertValidTrialCount(options.trials);
  if (options.seed !== undefined) assertValidSeed(options.seed);

  const seed = options.seed ?? (options.rngFactory ? null : randomRunSeed());
  const prepared: PreparedRun = {
    runId: options.runId ?? crypto.randomUUID(),
    tournamentName: options.tournamentName ?? 'unnamed',
    trials: options.trials,
    seed,
    model: {
      scalingFactor: options.scalingFactor ?? CONFIG.SCALING_FACTOR,
      rangePolicy: options.rangePolicy ?? CONFIG.RANGE_POLICY,
    },
    startedAt: Date.now(),
  };

  eventBus.emit('run-started', {
    runId: prepared.runId,
    tournamentName: prepared.tournamentName,
    numEntrants: tournament.bracket.numEntrants,
    trials: prepared.trials,
    seed: prepared.seed,
    parallel,
  });

  return prepared;
}

function finishRun(
  prepared: PreparedRun,
  tournament: BoundTournament,
  counts: TrialCounts,
  parallel: boolean,
): SimulationRun {
  const result = deriveAggregateResult(counts, tournament, {
    seed: prepared.seed,
    scalingFactor: prepared.model.scalingFactor,
    rangePolicy: prepared.model.rangePolicy,
  });
  const durationMs = Date.now() - prepared.startedAt;

  for (const warning of result.warnings) {
    eventBus.emit('model-range-warning', { runId: prepared.runId, warning });
  }

  const favourite = mostLikelyChampion(result);
  eventBus.emit('run-completed', {
    runId: prepared.runId,
    tournamentName: prepared.tournamentName,
    totalTrials: result.totalTrials,
    durationMs,
    favourite: favourite?.player ?? null,
    favouriteProbability: favourite?.roundProbabilities[result.numRounds - 1] ?? 0,
  });

  return { runId: prepared.runId, result, durationMs, parallel };
}

function trialRngFactory(prepared: PreparedRun, options: RunOptions): RngFactory {
  if (options.rngFactory) return options.rngFactory;
  if (prepared.seed === null) throw new ConfigurationError('A run needs a seed or an rngFactory');
  return seededRngFactory(prepared.seed);
}

/**
 * Run all trials in the calling thread.
 */
export function runSync(tournament: BoundTournament, options: RunOptions): SimulationRun {
  const prepared = prepareRun(tournament, options, false);
  const counts = runTrialRange(tournament, {
    ...prepared.model,
    startTrial: 0,
    trialCount: prepared.trials,
    rngFactory: trialRngFactory(prepared, options),
  });
  return finishRun(prepared, tournament, counts, false);
}

/**
 * Run trials on the worker pool. Each worker takes a contiguous range of
 * trial indices; trial seeds depend only on the run seed and the index, so
 * the merged counts match runSync for the same seed.
 */
export async function runParallel(tournament: BoundTournament, options: RunOptions): Promise<SimulationRun> {
  if (options.rngFactory) {
    throw new ConfigurationError('A custom rngFactory cannot be sent to worker threads; pass a seed instead');
  }

  const prepared = prepareRun(tournament, options, true);
  const seed = prepared.seed ?? randomRunSeed();
  const bracket = tournament.bracket;
  const ratings = ratingsOf(tournament);
  const fixture = fixtureOf(tournament);

  const tasks: SimulationTask[] = planChunks(prepared.trials, CONFIG.WORKER_THREADS).map(chunk => ({
    bracket,
    ratings,
    fixture,
    seed,
    startTrial: chunk.startTrial,
    trialCount: chunk.trialCount,
    scalingFactor: prepared.model.scalingFactor,
    rangePolicy: prepared.model.rangePolicy,
  }));

  const workerPool = getPool();
  const results: TrialCounts[] = await Promise.all(
    tasks.map(task => workerPool.run(task))
  );

  return finishRun(prepared, tournament, mergeAllTrialCounts(results), true);
}

function shouldUseWorkers(options: RunOptions): boolean {
  if (options.rngFactory) return false;
  if (CONFIG.WORKER_THREADS <= 1 || options.trials < CONFIG.PARALLEL_THRESHOLD) return false;

  if (!fs.existsSync(workerFilename())) {
    if (!missingWorkerReported) {
      console.warn(`Worker script ${workerFilename()} not found (run the build); simulating in-thread.`);
      missingWorkerReported = true;
    }
    return false;
  }
  return true;
}

/**
 * Pick the worker pool for large runs and the calling thread otherwise.
 */
export async function runAuto(tournament: BoundTournament, options: RunOptions): Promise<SimulationRun> {
  if (shouldUseWorkers(options)) {
    return runParallel(tournament, options);
  }
  return runSync(tournament, options);
}

/**
 * Repeat the simulation `numTrials` times with one random source per trial
 * and reduce the outcomes into probability and odds tables.
 */
export function run(
  bracket: Bracket,
  ratings: RatingsTable,
  round1Fixture: readonly FixturePair[],
  numTrials: number,
  rngFactory: RngFactory,
  options: Omit<RunOptions, 'trials' | 'rngFactory'> = {},
): AggregateResult {
  assertValidTrialCount(numTrials);
  const tournament = bindTournament(bracket, ratings, round1Fixture);
  return runSync(tournament, { ...options, trials: numTrials, rngFactory }).result;
}
