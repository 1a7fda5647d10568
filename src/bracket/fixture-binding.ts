import { FixturePair, Player, RatingsTable, TournamentDefinition } from '../core/types';
import { ConfigurationError, UnknownPlayerError } from '../core/errors';
import { BoundTournament, Bracket } from './types';
import { buildBracket } from './bracket-builder';

/**
 * Attach the round-1 fixture and ratings to a bracket.
 * Every fixtured player must be rated and appear exactly once.
 */
export function bindTournament(
  bracket: Bracket,
  ratings: RatingsTable,
  fixture: readonly FixturePair[],
): BoundTournament {
  const expected = bracket.numEntrants / 2;
  if (fixture.length !== expected) {
    throw new ConfigurationError(
      `Fixture has ${fixture.length} matches but a ${bracket.numEntrants}-player bracket needs ${expected}`,
    );
  }

  const players: Player[] = [];
  const ratingValues: number[] = [];
  const round1: [number, number][] = [];
  const seen = new Set<string>();

  for (const pair of fixture) {
    const indices: number[] = [];
    for (const name of pair) {
      if (seen.has(name)) {
        throw new ConfigurationError(`Player "${name}" appears more than once in the fixture`);
      }
      seen.add(name);

      if (!Object.hasOwn(ratings, name)) {
        throw new UnknownPlayerError(name, 1);
      }
      const rating = ratings[name];
      if (!Number.isFinite(rating)) {
        throw new ConfigurationError(`Rating for "${name}" must be a finite number, got ${rating}`);
      }

      indices.push(players.length);
      players.push({ name, rating });
      ratingValues.push(rating);
    }
    round1.push([indices[0], indices[1]]);
  }

  return { bracket, players, ratings: ratingValues, round1 };
}

/** Ratings table from a player list; duplicate names are rejected. */
export function ratingsFromPlayers(players: readonly Player[]): RatingsTable {
  const seen = new Set<string>();
  for (const p of players) {
    if (seen.has(p.name)) {
      throw new ConfigurationError(`Duplicate player "${p.name}"`);
    }
    seen.add(p.name);
  }
  // fromEntries defines own properties, so names like "__proto__" stay plain keys
  return Object.fromEntries(players.map((p): [string, number] => [p.name, p.rating]));
}

/** The fixture a bound tournament was built from. */
export function fixtureOf(tournament: BoundTournament): FixturePair[] {
  return tournament.round1.map(([a, b]): FixturePair => [tournament.players[a].name, tournament.players[b].name]);
}

export function ratingsOf(tournament: BoundTournament): RatingsTable {
  return ratingsFromPlayers(tournament.players);
}

/** Build and bind the bracket a tournament definition describes. */
export function bindDefinition(definition: TournamentDefinition): BoundTournament {
  const bracket = buildBracket(definition.fixture.length * 2, definition.bestOf);
  return bindTournament(bracket, ratingsFromPlayers(definition.players), definition.fixture);
}
