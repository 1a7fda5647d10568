import fs from 'fs';
import path from 'path';
import * as z from 'zod';
import { CONFIG } from '../config';
import { TournamentDefinition } from '../core/types';
import { ConfigurationError } from '../core/errors';

const playerSchema = z.object({
  name: z.string().min(1),
  rating: z.number().finite(),
});

const fixturePairSchema = z.tuple([z.string().min(1), z.string().min(1)]);

export const tournamentDefinitionSchema = z
  .object({
    name: z.string().min(1),
    bestOf: z.array(z.number().int().positive()).min(1),
    players: z.array(playerSchema).min(2),
    fixture: z.array(fixturePairSchema).min(1),
  })
  .superRefine((def, ctx) => {
    const names = new Set<string>();
    def.players.forEach((p, i) => {
      if (names.has(p.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['players', i, 'name'], message: `duplicate player "${p.name}"` });
      }
      names.add(p.name);
    });
  });

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate an in-memory tournament definition (parsed JSON, request body).
 * Bracket-level checks (power of two, schedule length, fixture coverage)
 * happen when the bracket is built and bound.
 */
export function parseTournamentDefinition(raw: unknown, source = 'definition'): TournamentDefinition {
  const parsed = tournamentDefinitionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid tournament ${source}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export class TournamentNotFoundError extends Error {
  constructor(public readonly tournamentName: string, filePath: string) {
    super(`Tournament data file not found: ${filePath}`);
    this.name = 'TournamentNotFoundError';
  }
}

const TOURNAMENT_NAME = /^[A-Za-z0-9_-]+$/;

function tournamentPath(name: string, dir: string): string {
  if (!TOURNAMENT_NAME.test(name)) {
    throw new ConfigurationError(`Invalid tournament name "${name}"`);
  }
  return path.join(dir, `${name}.json`);
}

export function loadTournament(name: string, dir = CONFIG.TOURNAMENTS_DIR): TournamentDefinition {
  const filePath = tournamentPath(name, dir);
  if (!fs.existsSync(filePath)) {
    throw new TournamentNotFoundError(name, filePath);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Tournament file ${filePath} is not valid JSON: ${reason}`);
  }
  return parseTournamentDefinition(raw, `file ${filePath}`);
}

/** Names of the tournament files available, sorted. */
export function listTournaments(dir = CONFIG.TOURNAMENTS_DIR): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs.readdirSync(dir)
    .filter(f => f.endsWith('.json'))
    .map(f => f.slice(0, -'.json'.length))
    .sort();
}
