import { Color, Direction, LegalMoveTable } from "@reversi/core";
import { Board, isEmpty } from "./state";
import { DIRECTIONS, assertLocation, ray } from "./geometry";

/**
 * Opponent tiles captured in one direction by placing `color` at `location`,
 * nearest first. A run counts only when an own-color tile closes it inside
 * the board; an empty square or the edge before that captures nothing.
 */
export function capturesInDirection(
  board: Board,
  location: number,
  color: Color,
  direction: Direction
): number[] {
  const captured: number[] = [];
  for (const loc of ray(board.size, location, direction)) {
    const cell = board.cells[loc];
    if (cell === null) return [];
    if (cell === color) return captured;
    captured.push(loc);
  }
  return [];
}

/**
 * Every tile captured by placing `color` at `location`, grouped by direction
 * in N, NE, E, SE, S, SW, W, NW order. Empty when the square is occupied.
 */
export function capturesAt(board: Board, location: number, color: Color): number[] {
  assertLocation(board.size, location);
  if (!isEmpty(board, location)) return [];

  const captured: number[] = [];
  for (const direction of DIRECTIONS) {
    captured.push(...capturesInDirection(board, location, color, direction));
  }
  return captured;
}

/** Legal squares for `color` in ascending index order, each with its captures. */
export function legalMoves(board: Board, color: Color): LegalMoveTable {
  const table = new Map<number, number[]>();
  for (let location = 0; location < board.cells.length; location++) {
    const captured = capturesAt(board, location, color);
    if (captured.length > 0) {
      table.set(location, captured);
    }
  }
  return table;
}

/** Check if the given color has at least one legal move on the board */
export function hasLegalMove(board: Board, color: Color): boolean {
  for (let location = 0; location < board.cells.length; location++) {
    if (capturesAt(board, location, color).length > 0) return true;
  }
  return false;
}
