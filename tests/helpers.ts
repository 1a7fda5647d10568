import { FixturePair, Player, RatingsTable, Rng, TournamentDefinition } from '../src/core/types';

/** Rng that replays fixed draws and fails once they run out. */
export function scriptedRng(values: number[]): Rng {
  let i = 0;
  return () => {
    if (i >= values.length) throw new Error('scripted rng exhausted');
    return values[i++];
  };
}

export const FOUR_PLAYER: TournamentDefinition = {
  name: 'Four Player Test',
  bestOf: [3, 3],
  players: [
    { name: 'A', rating: 0.6 },
    { name: 'B', rating: 0.5 },
    { name: 'C', rating: 0.5 },
    { name: 'D', rating: 0.4 },
  ],
  fixture: [['A', 'B'], ['C', 'D']],
};

export const FOUR_PLAYER_RATINGS: RatingsTable = { A: 0.6, B: 0.5, C: 0.5, D: 0.4 };

/**
 * Players P1..Pn with ratings spread evenly over [0.4, 0.6],
 * paired in order: (P1, P2), (P3, P4), ...
 */
export function makeDefinition(numEntrants: number, bestOf: number[]): TournamentDefinition {
  const players: Player[] = [];
  for (let i = 0; i < numEntrants; i++) {
    players.push({ name: `P${i + 1}`, rating: 0.4 + (0.2 * i) / (numEntrants - 1) });
  }
  const fixture: FixturePair[] = [];
  for (let i = 0; i < numEntrants; i += 2) {
    fixture.push([players[i].name, players[i + 1].name]);
  }
  return { name: `${numEntrants}-player test`, bestOf, players, fixture };
}
