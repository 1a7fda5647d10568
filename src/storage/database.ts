import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { CONFIG } from '../config';
import { AggregateResult, ModelRangeWarning, PlayerAdvancement, isRangePolicy } from '../core/types';
import { stageLabel } from '../bracket/bracket-builder';
import { toOdds, toProbability } from '../engine/aggregation';

let db: Database.Database | null = null;

export function getDatabase(): Database.Database {
  if (db) return db;

  if (CONFIG.DB_PATH !== ':memory:') {
    const dir = path.dirname(CONFIG.DB_PATH);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  db = new Database(CONFIG.DB_PATH);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  initializeSchema(db);
  return db;
}

function initializeSchema(database: Database.Database): void {
  const schemaPath = path.resolve(__dirname, 'schema.sql');
  const schema = fs.readFileSync(schemaPath, 'utf-8');
  database.exec(schema);
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}

interface RunRow {
  id: string;
  tournament_name: string;
  num_entrants: number;
  num_rounds: number;
  total_trials: number;
  seed: number | null;
  scaling_factor: number;
  range_policy: string;
  best_of_json: string;
  warnings_json: string;
  created_at: number;
}

interface AdvancementRow {
  player: string;
  position: number;
  rating: number;
  round: number;
  reach_count: number;
}

export interface StoredRun {
  runId: string;
  tournamentName: string;
  createdAt: number;
  result: AggregateResult;
}

export interface RunSummary {
  runId: string;
  tournamentName: string;
  numEntrants: number;
  totalTrials: number;
  seed: number | null;
  createdAt: number;
}

// === Run Operations ===

export function saveRun(runId: string, tournamentName: string, result: AggregateResult): void {
  const database = getDatabase();

  const insertRun = database.prepare(`
    INSERT INTO simulation_runs (id, tournament_name, num_entrants, num_rounds, total_trials, seed, scaling_factor, range_policy, best_of_json, warnings_json, created_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);
  const insertAdvancement = database.prepare(`
    INSERT INTO player_advancements (run_id, player, position, rating, round, reach_count, probability)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `);

  const save = database.transaction(() => {
    insertRun.run(
      runId,
      tournamentName,
      result.numEntrants,
      result.numRounds,
      result.totalTrials,
      result.seed,
      result.scalingFactor,
      result.rangePolicy,
      JSON.stringify(result.bestOfSchedule),
      JSON.stringify(result.warnings),
      Date.now(),
    );
    result.players.forEach((p, position) => {
      p.roundCounts.forEach((count, r) => {
        insertAdvancement.run(runId, p.player, position, p.rating, r + 1, count, p.roundProbabilities[r]);
      });
    });
  });

  save();
}

function parseNumberArray(json: string): number[] {
  const value: unknown = JSON.parse(json);
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is number => typeof v === 'number');
}

function isWarning(value: unknown): value is ModelRangeWarning {
  if (typeof value !== 'object' || value === null) return false;
  return 'player1' in value && typeof value.player1 === 'string'
    && 'player2' in value && typeof value.player2 === 'string'
    && 'round' in value && typeof value.round === 'number'
    && 'ratingDiff' in value && typeof value.ratingDiff === 'number'
    && 'rawProbability' in value && typeof value.rawProbability === 'number'
    && 'occurrences' in value && typeof value.occurrences === 'number';
}

function parseWarnings(json: string): ModelRangeWarning[] {
  const value: unknown = JSON.parse(json);
  return Array.isArray(value) ? value.filter(isWarning) : [];
}

function rowsToResult(run: RunRow, rows: AdvancementRow[]): AggregateResult {
  const byPlayer = new Map<string, { position: number; rating: number; counts: number[] }>();
  for (const row of rows) {
    let entry = byPlayer.get(row.player);
    if (!entry) {
      entry = { position: row.position, rating: row.rating, counts: new Array<number>(run.num_rounds).fill(0) };
      byPlayer.set(row.player, entry);
    }
    entry.counts[row.round - 1] = row.reach_count;
  }

  const players: PlayerAdvancement[] = [...byPlayer.entries()]
    .sort((a, b) => a[1].position - b[1].position)
    .map(([player, entry]) => {
      const roundProbabilities = entry.counts.map(c => toProbability(c, run.total_trials));
      return {
        player,
        rating: entry.rating,
        roundCounts: entry.counts,
        roundProbabilities,
        roundOdds: roundProbabilities.map(toOdds),
        expectedMatchWins: roundProbabilities.reduce((s, v) => s + v, 0),
      };
    });

  const stageLabels: string[] = [];
  for (let r = 1; r <= run.num_rounds; r++) stageLabels.push(stageLabel(run.num_entrants, r));

  return {
    numEntrants: run.num_entrants,
    numRounds: run.num_rounds,
    totalTrials: run.total_trials,
    seed: run.seed,
    scalingFactor: run.scaling_factor,
    rangePolicy: isRangePolicy(run.range_policy) ? run.range_policy : 'clamp',
    bestOfSchedule: parseNumberArray(run.best_of_json),
    stageLabels,
    players,
    warnings: parseWarnings(run.warnings_json),
  };
}

export function getRun(runId: string): StoredRun | null {
  const database = getDatabase();
  const run = database.prepare<[string], RunRow>(
    'SELECT * FROM simulation_runs WHERE id = ?'
  ).get(runId);
  if (!run) return null;

  const rows = database.prepare<[string], AdvancementRow>(`
    SELECT player, position, rating, round, reach_count
    FROM player_advancements
    WHERE run_id = ?
    ORDER BY position, round
  `).all(runId);

  return {
    runId: run.id,
    tournamentName: run.tournament_name,
    createdAt: run.created_at,
    result: rowsToResult(run, rows),
  };
}

export function listRuns(limit = 20): RunSummary[] {
  const database = getDatabase();
  const rows = database.prepare<[number], RunRow>(
    'SELECT * FROM simulation_runs ORDER BY created_at DESC, rowid DESC LIMIT ?'
  ).all(limit);

  return rows.map(r => ({
    runId: r.id,
    tournamentName: r.tournament_name,
    numEntrants: r.num_entrants,
    totalTrials: r.total_trials,
    seed: r.seed,
    createdAt: r.created_at,
  }));
}

export function deleteRun(runId: string): boolean {
  const database = getDatabase();
  const info = database.prepare('DELETE FROM simulation_runs WHERE id = ?').run(runId);
  return info.changes > 0;
}
