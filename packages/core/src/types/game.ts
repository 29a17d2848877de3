/** Tile colors. Dark ("black") always moves first. */
export type Color = "black" | "white";

/** A board cell: a tile color, or null when the square is empty. */
export type Cell = Color | null;

/** The eight compass directions, in the order captures are collected. */
export type Direction = "n" | "ne" | "e" | "se" | "s" | "sw" | "w" | "nw";

export type GameStatus = "in_progress" | "game_over";

/** Why a game ended */
export type EndReason = "board_full" | "no_moves";

export interface TileCounts {
  black: number;
  white: number;
}

/**
 * Maps each legal square to the indices of the tiles a move there captures.
 * Only squares with at least one capture appear as keys.
 */
export type LegalMoveTable = ReadonlyMap<number, readonly number[]>;

export interface GameResult {
  winner: Color | null;
  draw: boolean;
  /** e.g. "Black wins!", "White wins!", "You tied!" */
  message: string;
  /** e.g. "black: 6, white: 2" */
  score: string;
  counts: TileCounts;
}

export interface MoveRecord {
  color: Color;
  location: number;
  captured: number[];
}

/** Everything a renderer needs to draw the current position. */
export interface GameSnapshot {
  size: number;
  board: Cell[];
  turn: Color;
  status: GameStatus;
  counts: TileCounts;
  legalMoves: number[];
  lastMove: number | null;
  endReason: EndReason | null;
  result: GameResult | null;
}

export function opponentOf(color: Color): Color {
  return color === "black" ? "white" : "black";
}
