import { Rng, RngFactory } from '../core/types';
import { ConfigurationError } from '../core/errors';

export const MAX_SEED = 0xffffffff;

function rotl(x: number, k: number): number {
  return (x << k) | (x >>> (32 - k));
}

/** 32-bit finaliser from splitmix/murmur3; spreads nearby seeds apart. */
export function mix32(value: number): number {
  let z = (value + 0x9e3779b9) | 0;
  z = Math.imul(z ^ (z >>> 16), 0x85ebca6b);
  z = Math.imul(z ^ (z >>> 13), 0xc2b2ae35);
  return (z ^ (z >>> 16)) >>> 0;
}

/**
 * Seeded random number generator (xoshiro128**).
 * Provides reproducible randomness for each trial.
 */
export function createRng(seed: number): Rng {
  let s0 = mix32(seed);
  let s1 = mix32(s0);
  let s2 = mix32(s1);
  let s3 = mix32(s2);
  if ((s0 | s1 | s2 | s3) === 0) s0 = 1;

  return () => {
    const result = Math.imul(rotl(Math.imul(s1, 5), 7), 9) >>> 0;
    const t = s1 << 9;

    s2 ^= s0;
    s3 ^= s1;
    s1 ^= s2;
    s0 ^= s3;
    s2 ^= t;
    s3 = rotl(s3, 11);

    return result / 4294967296;
  };
}

/** Run seeds are unsigned 32-bit integers. */
export function assertValidSeed(seed: number): void {
  if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
    throw new ConfigurationError(`Seed must be an integer in [0, ${MAX_SEED}], got ${seed}`);
  }
}

/**
 * Seed for one trial. Depends only on the run seed and the trial index,
 * so a run gives the same counts however its trials are split across workers.
 */
export function deriveTrialSeed(runSeed: number, trialIndex: number): number {
  return mix32((mix32(runSeed >>> 0) + trialIndex) >>> 0);
}

export function seededRngFactory(runSeed: number): RngFactory {
  return trialIndex => createRng(deriveTrialSeed(runSeed, trialIndex));
}

/** Fresh run seed for runs started without one. */
export function randomRunSeed(): number {
  return Math.floor(Math.random() * 4294967296);
}
