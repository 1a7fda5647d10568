import { describe, it, expect, vi, afterAll, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import { CONFIG } from '../../src/config';
import { runSimulation } from '../../src/pipeline/runner';
import { closeDatabase, getRun } from '../../src/storage/database';
import { destroyPool } from '../../src/engine/simulator';
import { FOUR_PLAYER } from '../helpers';

afterEach(() => {
  vi.restoreAllMocks();
});

afterAll(async () => {
  await destroyPool();
  closeDatabase();
});

describe('runSimulation', () => {
  it('runs a bundled tournament', async () => {
    const { run, report, tournamentName, exportPath } = await runSimulation({
      tournament: 'sample-8',
      trials: 400,
      seed: 6,
      silent: true,
    });

    expect(tournamentName).toBe('Sample Invitational');
    expect(run.result.totalTrials).toBe(400);
    expect(report.rows).toHaveLength(8);
    expect(report.title).toBe('Sample Invitational — Tournament Odds');
    expect(exportPath).toBeNull();
    expect(getRun(run.runId)).toBeNull();
  });

  it('saves the run when asked', async () => {
    const { run } = await runSimulation({ definition: FOUR_PLAYER, trials: 100, seed: 5, save: true, silent: true });
    expect(getRun(run.runId)?.result).toEqual(run.result);
  });

  it('exports the report as JSON', async () => {
    const { run, report, exportPath } = await runSimulation({
      definition: FOUR_PLAYER,
      trials: 50,
      seed: 5,
      exportJson: true,
      silent: true,
    });
    try {
      expect(exportPath).toBe(path.join(CONFIG.OUTPUT_DIR, `${run.runId}.json`));
      expect(JSON.parse(fs.readFileSync(path.join(CONFIG.OUTPUT_DIR, `${run.runId}.json`), 'utf-8'))).toEqual(report);
    } finally {
      if (exportPath) fs.rmSync(exportPath, { force: true });
    }
  });

  it('prints the report and range warnings unless silent', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    await runSimulation({
      definition: {
        name: 'Saturated',
        bestOf: [1],
        players: [{ name: 'A', rating: 1 }, { name: 'B', rating: 0 }],
        fixture: [['A', 'B']],
      },
      trials: 10,
      seed: 1,
    });

    expect(warn).toHaveBeenCalledWith(
      'Warning: frame probability 1.2000 for A vs B (round 1) is outside [0, 1]; 10 matches affected.',
    );
    expect(log).toHaveBeenCalledWith('Loaded Saturated: 2 players, 1 first-round matches.');
  });

  it('stays quiet when silent', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    await runSimulation({ definition: FOUR_PLAYER, trials: 10, seed: 1, silent: true });
    expect(log).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
  });
});
