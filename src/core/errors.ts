/**
 * Invalid tournament setup or run parameters: bracket size, best-of lengths,
 * schedule or fixture shape, trial count.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** A fixtured player has no rating. */
export class UnknownPlayerError extends Error {
  constructor(
    public readonly playerName: string,
    public readonly round?: number,
  ) {
    super(
      round === undefined
        ? `No rating for player "${playerName}"`
        : `No rating for player "${playerName}" (round ${round})`,
    );
    this.name = 'UnknownPlayerError';
  }
}

/** Raised under the `reject` range policy when a frame probability leaves [0, 1]. */
export class ModelRangeError extends Error {
  constructor(
    public readonly player1: string,
    public readonly player2: string,
    public readonly round: number,
    public readonly rawProbability: number,
  ) {
    super(
      `Frame probability ${rawProbability} for ${player1} vs ${player2} in round ${round} is outside [0, 1]`,
    );
    this.name = 'ModelRangeError';
  }
}

/** Errors caused by the caller's input rather than by the engine. */
export function isInputError(err: unknown): err is ConfigurationError | UnknownPlayerError | ModelRangeError {
  return err instanceof ConfigurationError
    || err instanceof UnknownPlayerError
    || err instanceof ModelRangeError;
}
