import { Player } from '../core/types';

export interface BracketMatch {
  /** Arena position; unique across the bracket, contiguous round after round. */
  index: number;
  /** 1-based. */
  round: number;
  /** Position within the round, 0-based. */
  position: number;
  /** Arena indices of the previous-round matches whose winners fill slot 1 and slot 2. Null in round 1. */
  sources: [number, number] | null;
}

export interface BracketRound {
  round: number;
  bestOf: number;
  firstTo: number;
  matchIndices: number[];
}

export interface Bracket {
  numEntrants: number;
  rounds: BracketRound[];
  matches: BracketMatch[];
}

/**
 * A bracket with its entrants attached. Players are indexed in fixture
 * order: round-1 match m holds players 2m and 2m + 1.
 */
export interface BoundTournament {
  bracket: Bracket;
  players: Player[];
  ratings: number[];
  round1: [number, number][];
}
