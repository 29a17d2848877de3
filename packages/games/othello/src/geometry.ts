import {
  Direction,
  InvalidDirectionError,
  InvalidLocationError,
} from "@reversi/core";

/**
 * Board squares are numbered row-major from 0 at the bottom-left corner:
 *
 *   +----+----+----+----+
 *   | 12 | 13 | 14 | 15 |   row 3
 *   +----+----+----+----+
 *   |  8 |  9 | 10 | 11 |
 *   +----+----+----+----+
 *   |  4 |  5 |  6 |  7 |
 *   +----+----+----+----+
 *   |  0 |  1 |  2 |  3 |   row 0
 *   +----+----+----+----+
 *
 * so north is +n and east is +1.
 */

/** All 8 directions, in the order captures are collected */
export const DIRECTIONS: readonly Direction[] = [
  "n", "ne", "e", "se", "s", "sw", "w", "nw",
];

export function isDirection(value: string): value is Direction {
  return (DIRECTIONS as readonly string[]).includes(value);
}

export function parseDirection(raw: string): Direction {
  const value = raw.trim().toLowerCase();
  if (!isDirection(value)) {
    throw new InvalidDirectionError(raw);
  }
  return value;
}

export function isOnBoard(size: number, location: number): boolean {
  return Number.isInteger(location) && location >= 0 && location < size * size;
}

export function assertLocation(size: number, location: number): void {
  if (!isOnBoard(size, location)) {
    throw new InvalidLocationError(location, size);
  }
}

export function rowOf(size: number, location: number): number {
  return Math.floor(location / size);
}

export function colOf(size: number, location: number): number {
  return location % size;
}

export function indexOf(size: number, row: number, col: number): number {
  if (row < 0 || row >= size || col < 0 || col >= size) {
    throw new InvalidLocationError(row * size + col, size);
  }
  return row * size + col;
}

/** Signed index delta for one step in `direction`. */
export function directionIncrement(size: number, direction: Direction): number {
  switch (direction) {
    case "n":
      return size;
    case "s":
      return -size;
    case "e":
      return 1;
    case "w":
      return -1;
    case "ne":
      return size + 1;
    case "nw":
      return size - 1;
    case "se":
      return -(size - 1);
    case "sw":
      return -(size + 1);
    default:
      throw new InvalidDirectionError(String(direction));
  }
}

/**
 * The furthest index (maximum when the increment is positive, minimum when
 * negative) a scan from `location` may visit in `direction`.
 *
 * Diagonal bounds are the square where the diagonal meets the left or right
 * edge, clamped to the board's first or last index when the top or bottom
 * edge comes first. Stepping from `location` until passing the bound never
 * wraps onto another row.
 */
export function directionalBound(
  size: number,
  location: number,
  direction: Direction
): number {
  assertLocation(size, location);

  const rowStart = rowOf(size, location) * size;
  const rowEnd = rowStart + size - 1;
  const boardMax = size * size - 1;
  const stepsEast = size - 1 - colOf(size, location);
  const stepsWest = colOf(size, location);

  switch (direction) {
    case "n":
      return boardMax;
    case "s":
      return 0;
    case "e":
      return rowEnd;
    case "w":
      return rowStart;
    case "ne":
      return Math.min(rowEnd + stepsEast * size, boardMax);
    case "se":
      return Math.max(rowEnd - stepsEast * size, 0);
    case "nw":
      return Math.min(rowStart + stepsWest * size, boardMax);
    case "sw":
      return Math.max(rowStart - stepsWest * size, 0);
    default:
      throw new InvalidDirectionError(String(direction));
  }
}

/**
 * Indices visited walking from `location` (exclusive) toward its bound
 * (inclusive) in `direction`.
 */
export function ray(size: number, location: number, direction: Direction): number[] {
  const inc = directionIncrement(size, direction);
  const end = directionalBound(size, location, direction);
  const squares: number[] = [];
  for (
    let loc = location + inc;
    inc > 0 ? loc <= end : loc >= end;
    loc += inc
  ) {
    squares.push(loc);
  }
  return squares;
}

/**
 * The four starting squares as [upper-left, upper-right, lower-right,
 * lower-left]. The upper-right center square is (n^2 + n) / 2.
 */
export function centerSquares(size: number): [number, number, number, number] {
  const ur = (size * size + size) / 2;
  const ul = ur - 1;
  const lr = ur - size;
  const ll = lr - 1;
  return [ul, ur, lr, ll];
}
