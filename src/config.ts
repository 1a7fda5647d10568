import os from 'os';
import path from 'path';
import { RangePolicy, isRangePolicy } from './core/types';
import { DEFAULT_RANGE_POLICY, DEFAULT_SCALING_FACTOR } from './core/constants';

function parseRangePolicy(value: string | undefined): RangePolicy {
  if (value && isRangePolicy(value)) return value;
  return DEFAULT_RANGE_POLICY;
}

export const CONFIG = {
  // Simulation settings
  DEFAULT_TRIALS: parseInt(process.env.DEFAULT_TRIALS || '10000'),
  WORKER_THREADS: parseInt(process.env.WORKER_THREADS || String(Math.max(1, os.cpus().length - 1))),
  // Runs with at least this many trials go to the worker pool
  PARALLEL_THRESHOLD: parseInt(process.env.PARALLEL_THRESHOLD || '50000'),

  // Model settings
  SCALING_FACTOR: parseFloat(process.env.SCALING_FACTOR || String(DEFAULT_SCALING_FACTOR)),
  RANGE_POLICY: parseRangePolicy(process.env.RANGE_POLICY),

  // Paths
  ROOT_DIR: path.resolve(__dirname, '..'),
  DATA_DIR: path.resolve(__dirname, '..', 'data'),
  TOURNAMENTS_DIR: path.resolve(__dirname, '..', 'data', 'tournaments'),
  OUTPUT_DIR: path.resolve(__dirname, '..', 'output'),
  DB_PATH: process.env.DB_PATH || path.resolve(__dirname, '..', 'data', 'knockout-odds.db'),

  DEFAULT_TOURNAMENT: process.env.DEFAULT_TOURNAMENT || 'sample-32',
  PORT: parseInt(process.env.PORT || '3000'),
};
