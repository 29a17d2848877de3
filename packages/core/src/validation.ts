import { InvalidConfigurationError } from "./errors";

export const DEFAULT_BOARD_SIZE = 8;
export const MIN_BOARD_SIZE = 4;

/**
 * Returns true if `value` is a usable board side length: an even integer >= 4.
 */
export function isValidBoardSize(value: number): boolean {
  return Number.isInteger(value) && value >= MIN_BOARD_SIZE && value % 2 === 0;
}

/**
 * Throw InvalidConfigurationError unless `size` is a valid board side length.
 * The checks run in order so the message names the first rule broken.
 */
export function assertBoardSize(size: number): void {
  if (!Number.isInteger(size)) {
    throw new InvalidConfigurationError("n must be an integer.");
  }
  if (size < MIN_BOARD_SIZE) {
    throw new InvalidConfigurationError(
      `n must be greater than or equal to ${MIN_BOARD_SIZE}.`
    );
  }
  if (size % 2 !== 0) {
    throw new InvalidConfigurationError("n must be even.");
  }
}

/**
 * Parse a board size from config or command-line text.
 * Only plain decimal integers are accepted ("8", not "8.0" or "0x8").
 */
export function parseBoardSize(raw: string): number {
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new InvalidConfigurationError(
      `Board size must be an integer, got "${raw}"`
    );
  }
  const size = parseInt(trimmed, 10);
  assertBoardSize(size);
  return size;
}
