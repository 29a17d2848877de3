import { Cell, Color, TileCounts, assertBoardSize } from "@reversi/core";
import { centerSquares } from "./geometry";

/** An n x n board stored as a flat row-major array of n^2 cells */
export interface Board {
  size: number;
  cells: Cell[];
}

/** Create an empty n x n board */
export function emptyBoard(size: number): Board {
  assertBoardSize(size);
  return { size, cells: new Array<Cell>(size * size).fill(null) };
}

/**
 * Create the starting position: the four center squares filled
 * upper-left, upper-right, lower-right, lower-left with alternating
 * colors starting from black, so each color sits on one diagonal.
 */
export function initialBoard(size: number): Board {
  const board = emptyBoard(size);
  let color: Color = "black";
  for (const location of centerSquares(size)) {
    board.cells[location] = color;
    color = color === "black" ? "white" : "black";
  }
  return board;
}

/**
 * Build a board from rows of text, top row first: "B" black, "W" white,
 * "." empty. Whitespace is ignored.
 */
export function boardFromRows(rows: string[]): Board {
  const size = rows.length;
  const board = emptyBoard(size);
  rows.forEach((text, i) => {
    const row = size - 1 - i;
    const marks = text.replace(/\s+/g, "");
    if (marks.length !== size) {
      throw new Error(`Row ${i} has ${marks.length} cells, expected ${size}`);
    }
    for (let col = 0; col < size; col++) {
      const mark = marks[col];
      board.cells[row * size + col] =
        mark === "B" ? "black" : mark === "W" ? "white" : null;
    }
  });
  return board;
}

export function cloneBoard(board: Board): Board {
  return { size: board.size, cells: [...board.cells] };
}

/** Count tiles of each color on the board */
export function countPieces(board: Board): TileCounts {
  let black = 0;
  let white = 0;
  for (const cell of board.cells) {
    if (cell === "black") black++;
    else if (cell === "white") white++;
  }
  return { black, white };
}

export function isEmpty(board: Board, location: number): boolean {
  return board.cells[location] === null;
}

/** Check if every cell on the board is occupied */
export function isBoardFull(board: Board): boolean {
  return board.cells.every((cell) => cell !== null);
}

export function emptyCount(board: Board): number {
  return board.cells.filter((cell) => cell === null).length;
}
