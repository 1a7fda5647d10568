import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigurationError } from '../../src/core/errors';
import {
  listTournaments,
  loadTournament,
  parseTournamentDefinition,
  TournamentNotFoundError,
} from '../../src/data/loader';
import { FOUR_PLAYER } from '../helpers';

describe('parseTournamentDefinition', () => {
  it('accepts a well-formed definition', () => {
    expect(parseTournamentDefinition(FOUR_PLAYER)).toEqual(FOUR_PLAYER);
  });

  it('reports the path of each invalid field', () => {
    const raw = {
      ...FOUR_PLAYER,
      bestOf: [3, 'three'],
      players: [{ name: 'A', rating: 0.6 }, { name: '', rating: 0.5 }],
    };
    expect(() => parseTournamentDefinition(raw)).toThrow(ConfigurationError);
    expect(() => parseTournamentDefinition(raw)).toThrow(/bestOf\.1/);
    expect(() => parseTournamentDefinition(raw)).toThrow(/players\.1\.name/);
  });

  it('rejects duplicate player names', () => {
    const raw = { ...FOUR_PLAYER, players: [...FOUR_PLAYER.players, { name: 'B', rating: 0.3 }] };
    expect(() => parseTournamentDefinition(raw)).toThrow(/duplicate player "B"/);
  });

  it('rejects a fixture entry that is not a pair', () => {
    const raw = { ...FOUR_PLAYER, fixture: [['A', 'B', 'C']] };
    expect(() => parseTournamentDefinition(raw)).toThrow(ConfigurationError);
  });

  it('rejects something that is not an object', () => {
    expect(() => parseTournamentDefinition('nope', 'request body')).toThrow(/Invalid tournament request body/);
  });
});

describe('bundled tournaments', () => {
  it('lists the sample files', () => {
    expect(listTournaments()).toEqual(['sample-32', 'sample-8']);
  });

  it('loads the 32-player sample', () => {
    const def = loadTournament('sample-32');
    expect(def.name).toBe('Sample Open');
    expect(def.players).toHaveLength(32);
    expect(def.fixture).toHaveLength(16);
    expect(def.bestOf).toEqual([19, 25, 25, 33, 35]);
    expect(def.fixture[0]).toEqual(['Arlo Whitcombe', 'Bea Lindqvist']);
  });

  it('loads the 8-player sample', () => {
    const def = loadTournament('sample-8');
    expect(def.bestOf).toEqual([9, 11, 17]);
    expect(def.fixture).toHaveLength(4);
  });
});

describe('loadTournament', () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tournaments-'));
    fs.writeFileSync(path.join(dir, 'four.json'), JSON.stringify(FOUR_PLAYER));
    fs.writeFileSync(path.join(dir, 'broken.json'), '{ "name": ');
    fs.writeFileSync(path.join(dir, 'notes.txt'), 'ignored');
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads a definition from the given directory', () => {
    expect(loadTournament('four', dir)).toEqual(FOUR_PLAYER);
  });

  it('lists only JSON files', () => {
    expect(listTournaments(dir)).toEqual(['broken', 'four']);
  });

  it('throws TournamentNotFoundError for a missing file', () => {
    expect(() => loadTournament('missing', dir)).toThrow(TournamentNotFoundError);
  });

  it('throws ConfigurationError for malformed JSON', () => {
    expect(() => loadTournament('broken', dir)).toThrow(/not valid JSON/);
  });

  it('refuses names that could leave the directory', () => {
    expect(() => loadTournament('../four', dir)).toThrow(ConfigurationError);
  });

  it('returns an empty list for a missing directory', () => {
    expect(listTournaments(path.join(dir, 'nowhere'))).toEqual([]);
  });
});
