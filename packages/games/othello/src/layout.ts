import { assertBoardSize } from "@reversi/core";
import { assertLocation, colOf, rowOf } from "./geometry";

/** Side of one square, in pixels */
export const SQUARE_SIZE = 50;

export interface Point {
  x: number;
  y: number;
}

/**
 * Pixel geometry of a board centered on the origin with y growing upward,
 * so square 0 is the bottom-left one. Used to turn pointer positions into
 * board indices.
 */
export class BoardLayout {
  readonly size: number;
  readonly squareSize: number;
  /** x and y of the board's bottom-left corner */
  readonly corner: number;

  constructor(size: number, squareSize: number = SQUARE_SIZE) {
    assertBoardSize(size);
    this.size = size;
    this.squareSize = squareSize;
    this.corner = -Math.floor((size * squareSize) / 2);
  }

  /** Width and height of the whole board */
  get extent(): number {
    return this.size * this.squareSize;
  }

  /** Bottom-left corner of a square */
  squareOrigin(location: number): Point {
    assertLocation(this.size, location);
    return {
      x: this.corner + colOf(this.size, location) * this.squareSize,
      y: this.corner + rowOf(this.size, location) * this.squareSize,
    };
  }

  squareCenter(location: number): Point {
    const { x, y } = this.squareOrigin(location);
    const offset = this.squareSize - Math.floor(this.squareSize / 2);
    return { x: x + offset, y: y + offset };
  }

  /**
   * The square strictly containing (x, y), or null. Points on a grid line
   * or outside the board belong to no square.
   */
  squareAt(x: number, y: number): number | null {
    const col = this.cellIndex(x - this.corner);
    const row = this.cellIndex(y - this.corner);
    if (col === null || row === null) return null;
    return row * this.size + col;
  }

  private cellIndex(offset: number): number | null {
    if (!Number.isFinite(offset) || offset <= 0 || offset >= this.extent) {
      return null;
    }
    if (offset % this.squareSize === 0) return null;
    return Math.floor(offset / this.squareSize);
  }
}
