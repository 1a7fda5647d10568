#!/usr/bin/env node
import { RANGE_POLICIES, RangePolicy, isRangePolicy } from './core/types';
import { ConfigurationError } from './core/errors';
import { CONFIG } from './config';
import { runSimulation } from './pipeline/runner';
import { listTournaments } from './data/loader';
import { listRuns, closeDatabase } from './storage/database';
import { destroyPool } from './engine/simulator';
import { matchWinProb, scorelineDistribution } from './engine/probability-model';
import { assertValidSeed } from './engine/rng';

function printUsage(): void {
  console.log(`
Knockout Odds — Monte Carlo Tournament Odds Engine

Usage:
  npm run dev -- simulate [options]      Simulate a tournament and print odds
  npm run dev -- tournaments             List tournament definition files
  npm run dev -- runs [--limit n]        List saved runs
  npm run dev -- match [options]         Match-win probability for one match

Simulate options:
  --tournament <name>         Tournament file under data/tournaments (default: ${CONFIG.DEFAULT_TOURNAMENT})
  --trials <count>            Number of simulated tournaments (default: ${CONFIG.DEFAULT_TRIALS})
  --seed <number>             Run seed for reproducibility
  --scaling <factor>          Frame model scaling factor (default: ${CONFIG.SCALING_FACTOR})
  --policy <${RANGE_POLICIES.join('|')}>  Out-of-range frame probability handling (default: ${CONFIG.RANGE_POLICY})
  --export                    Export the report to JSON
  --save                      Store the run in the results database

Match options:
  --frame-prob <p>            Single-frame win probability
  --best-of <n>               Odd best-of length

Examples:
  npm run dev -- simulate --tournament sample-32 --trials 100000 --seed 7
  npm run dev -- match --frame-prob 0.55 --best-of 35
  `);
}

function parseArgs(args: string[]): Record<string, string> {
  const parsed: Record<string, string> = {};
  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith('--')) {
      const key = args[i].slice(2);
      const next = args[i + 1];
      if (next && !next.startsWith('--')) {
        parsed[key] = next;
        i++;
      } else {
        parsed[key] = 'true';
      }
    }
  }
  return parsed;
}

function numberFlag(flags: Record<string, string>, key: string): number | undefined {
  const raw = flags[key];
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`--${key} expects a number, got "${raw}"`);
  }
  return value;
}

function seedFlag(flags: Record<string, string>): number | undefined {
  const seed = numberFlag(flags, 'seed');
  if (seed !== undefined) assertValidSeed(seed);
  return seed;
}

function policyFlag(flags: Record<string, string>): RangePolicy | undefined {
  const raw = flags.policy;
  if (raw === undefined) return undefined;
  if (!isRangePolicy(raw)) {
    throw new ConfigurationError(`--policy must be one of ${RANGE_POLICIES.join(', ')}, got "${raw}"`);
  }
  return raw;
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];
  const flags = parseArgs(args.slice(1));

  try {
    switch (command) {
      case 'simulate': {
        await runSimulation({
          tournament: flags.tournament,
          trials: numberFlag(flags, 'trials'),
          seed: seedFlag(flags),
          scalingFactor: numberFlag(flags, 'scaling'),
          rangePolicy: policyFlag(flags),
          exportJson: flags.export === 'true',
          save: flags.save === 'true',
        });
        break;
      }

      case 'tournaments': {
        const names = listTournaments();
        console.log('\nAvailable tournaments:');
        for (const name of names) console.log(`  ${name}`);
        console.log('');
        break;
      }

      case 'runs': {
        const runs = listRuns(numberFlag(flags, 'limit') ?? 20);
        console.log('\nSaved runs:');
        for (const r of runs) {
          console.log(
            `  ${r.runId}  ${r.tournamentName.padEnd(24)} ${String(r.totalTrials).padStart(9)} trials` +
            `  seed ${r.seed ?? '-'}  ${new Date(r.createdAt).toISOString()}`,
          );
        }
        console.log('');
        break;
      }

      case 'match': {
        const frameProb = numberFlag(flags, 'frame-prob') ?? 0.5;
        const bestOf = numberFlag(flags, 'best-of') ?? 1;
        console.log(`\nP(match) = ${matchWinProb(frameProb, bestOf).toFixed(6)} (frame ${frameProb}, best of ${bestOf})`);
        for (const s of scorelineDistribution(frameProb, bestOf)) {
          console.log(`  ${String(s.player).padStart(2)}-${String(s.opponent).padEnd(2)}  ${(s.probability * 100).toFixed(3)}%`);
        }
        console.log('');
        break;
      }

      default:
        printUsage();
    }
  } finally {
    await destroyPool();
    closeDatabase();
  }
}

main().catch(err => {
  console.error('Fatal error:', err instanceof Error ? err.message : err);
  closeDatabase();
  process.exit(1);
});
