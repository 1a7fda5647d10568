import { Bracket, BoundTournament } from './types';

const EMPTY = -1;

/**
 * Mutable bracket state for a single trial.
 * Tracks the winner of each match by arena index; later-round slots
 * resolve through the match's sources. One instance is reset and reused
 * across the trials of a run.
 */
export class BracketTrialState {
  private readonly bracket: Bracket;
  private readonly round1: [number, number][];
  private readonly winners: Int32Array;

  constructor(tournament: BoundTournament) {
    this.bracket = tournament.bracket;
    this.round1 = tournament.round1;
    this.winners = new Int32Array(tournament.bracket.matches.length).fill(EMPTY);
  }

  reset(): void {
    this.winners.fill(EMPTY);
  }

  /**
   * Player indices in slot 1 and slot 2 of a match, or null while a
   * feeding match is still undecided.
   */
  getSlots(matchIndex: number): [number, number] | null {
    const match = this.bracket.matches[matchIndex];
    if (match.sources === null) {
      return this.round1[match.position];
    }

    const player1 = this.winners[match.sources[0]];
    const player2 = this.winners[match.sources[1]];
    if (player1 === EMPTY || player2 === EMPTY) return null;
    return [player1, player2];
  }

  setWinner(matchIndex: number, playerIndex: number): void {
    this.winners[matchIndex] = playerIndex;
  }

  getWinner(matchIndex: number): number | undefined {
    const winner = this.winners[matchIndex];
    return winner === EMPTY ? undefined : winner;
  }

  /** Winner of the final, once decided. */
  getChampion(): number | undefined {
    return this.getWinner(this.bracket.matches.length - 1);
  }
}
