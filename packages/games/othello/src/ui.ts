import { Cell, GameSnapshot } from "@reversi/core";
import { GameUISpec } from "@reversi/engine";
import { colOf, rowOf } from "./geometry";

const COL_LETTERS = "abcdefghijklmnopqrstuvwxyz";

function renderCell(
  cell: Cell,
  classes: string[],
  hint: boolean
): string {
  let glyph = ".";
  if (cell === "black") {
    glyph = "●";
    classes.push("oth-b");
  } else if (cell === "white") {
    glyph = "○";
    classes.push("oth-w");
  } else if (hint) {
    glyph = "·";
    classes.push("oth-hint");
  }

  if (classes.includes("oth-cursor")) {
    return `<span class="${classes.join(" ")}">[${glyph}]</span>`;
  }
  if (classes.length > 0) {
    return ` <span class="${classes.join(" ")}">${glyph}</span> `;
  }
  return ` ${glyph} `;
}

export function formatSquare(location: number, size: number): string {
  if (size > COL_LETTERS.length) return `#${location}`;
  return `${COL_LETTERS[colOf(size, location)]}${rowOf(size, location) + 1}`;
}

/**
 * Parse a square as a column letter and 1-based row ("d3"), or as a raw
 * board index ("19"). Returns null for anything off the board.
 */
export function parseSquare(raw: string, size: number): number | null {
  const trimmed = raw.trim().toLowerCase();

  if (/^\d+$/.test(trimmed)) {
    const index = parseInt(trimmed, 10);
    return index < size * size ? index : null;
  }

  const match = /^([a-z])(\d+)$/.exec(trimmed);
  if (match && size <= COL_LETTERS.length) {
    const col = match[1].charCodeAt(0) - "a".charCodeAt(0);
    const row = parseInt(match[2], 10) - 1;
    if (col >= 0 && col < size && row >= 0 && row < size) {
      return row * size + col;
    }
  }

  return null;
}

export const OthelloUI: GameUISpec = {
  pieces: {
    black: { symbol: "●", label: "B" },
    white: { symbol: "○", label: "W" },
  },

  inputHint: "Enter a square (e.g. d3), or use the arrow keys and Enter",

  renderBoard(view: GameSnapshot, cursor: number | null = null): string {
    const n = view.size;
    const labelWidth = String(n).length;
    const pad = " ".repeat(labelWidth);
    const hints = new Set(view.legalMoves);
    const lines: string[] = [];

    // Column header
    if (n <= COL_LETTERS.length) {
      lines.push(pad + "   " + COL_LETTERS.slice(0, n).split("").join("   "));
    }
    // Top border
    lines.push(pad + " ┌" + "───┬".repeat(n - 1) + "───┐");

    // Row n-1 is the top of the board
    for (let r = n - 1; r >= 0; r--) {
      const cells: string[] = [];
      for (let c = 0; c < n; c++) {
        const location = r * n + c;
        const classes: string[] = [];
        if (location === cursor) classes.push("oth-cursor");
        if (location === view.lastMove) classes.push("oth-last");
        cells.push(renderCell(view.board[location], classes, hints.has(location)));
      }
      lines.push(`${String(r + 1).padStart(labelWidth)} │${cells.join("│")}│`);

      if (r > 0) {
        lines.push(pad + " ├" + "───┼".repeat(n - 1) + "───┤");
      }
    }

    // Bottom border
    lines.push(pad + " └" + "───┴".repeat(n - 1) + "───┘");

    return lines.join("\n");
  },

  renderStatus(view: GameSnapshot): string {
    return `Black: ${view.counts.black}  White: ${view.counts.white}`;
  },

  parseInput(raw: string, view: GameSnapshot): number | null {
    return parseSquare(raw, view.size);
  },

  formatMove(location: number, size: number): string {
    return formatSquare(location, size);
  },
};
