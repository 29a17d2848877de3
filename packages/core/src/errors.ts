export type ReversiErrorCode =
  | "INVALID_CONFIGURATION"
  | "INVALID_LOCATION"
  | "INVALID_DIRECTION"
  | "ILLEGAL_MOVE"
  | "GAME_OVER";

/**
 * Base class for every error the rules engine raises.
 * `code` is stable and safe to branch on; messages are for humans.
 */
export class ReversiError extends Error {
  readonly code: ReversiErrorCode;

  constructor(code: ReversiErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Board size is not an even integer of at least 4. Fatal at construction. */
export class InvalidConfigurationError extends ReversiError {
  constructor(message: string) {
    super("INVALID_CONFIGURATION", message);
  }
}

export class InvalidLocationError extends ReversiError {
  readonly location: number;

  constructor(location: number, size: number) {
    super(
      "INVALID_LOCATION",
      `location must be a valid board index (0-${size * size - 1}), got ${location}`
    );
    this.location = location;
  }
}

export class InvalidDirectionError extends ReversiError {
  constructor(direction: string) {
    super(
      "INVALID_DIRECTION",
      `direction must be one of n, ne, e, se, s, sw, w, nw, got "${direction}"`
    );
  }
}

/** The square is not in the current legal-move table. Recoverable. */
export class IllegalMoveError extends ReversiError {
  readonly location: number;

  constructor(location: number) {
    super("ILLEGAL_MOVE", `Square ${location} is not a legal move`);
    this.location = location;
  }
}

export class GameOverError extends ReversiError {
  constructor() {
    super("GAME_OVER", "Game is already over");
  }
}

export function isReversiError(err: unknown): err is ReversiError {
  return err instanceof ReversiError;
}
