import {
  Color,
  EndReason,
  GameResult,
  GameSnapshot,
  GameStatus,
  LegalMoveTable,
  MoveRecord,
  TileCounts,
} from "@reversi/core";

// ---------------------------------------------------------------------------
// Game UI Specification — shipped by the game module for text front ends
// ---------------------------------------------------------------------------

export interface PieceDisplay {
  /** Unicode or ASCII character (e.g. "●") */
  symbol: string;
  /** Short text label (e.g. "B") */
  label: string;
}

/**
 * UI specification a game module provides so terminal front ends can draw
 * the board and read moves without knowing the board's numbering.
 */
export interface GameUISpec {
  /** Display info for each tile color */
  pieces: Record<Color, PieceDisplay>;

  /** Hint text shown to the human (e.g. "Enter a square (e.g. d3)") */
  inputHint: string;

  /** Render the board as text lines, top row first. */
  renderBoard(view: GameSnapshot, cursor?: number | null): string;

  /** One-line status (e.g. "Black: 2  White: 2"). */
  renderStatus(view: GameSnapshot): string;

  /** Parse raw user input into a board index, or return null if invalid. */
  parseInput(raw: string, view: GameSnapshot): number | null;

  /** Format a board index for move history (e.g. "d3"). */
  formatMove(location: number, size: number): string;
}

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

/**
 * Draws the position. Called after every state change with a fresh snapshot;
 * the snapshot is a copy and may be kept.
 */
export interface IRenderer {
  render(view: GameSnapshot): void;
}

/** Picks a square from the current legal-move table, or null to pass. */
export interface IComputerPlayer {
  readonly name: string;
  chooseMove(table: LegalMoveTable): number | null;
}

/**
 * The rules engine as the orchestrator drives it. The game owns the board,
 * the turn and the legal-move table; everything else reads snapshots.
 */
export interface IReversiGame {
  readonly size: number;
  readonly turn: Color;
  readonly status: GameStatus;

  /** Legal moves for the side to move. Read-only. */
  legalMoves(): LegalMoveTable;

  /** Place a tile for the side to move, flip its captures and switch turn. */
  applyMove(location: number): MoveRecord;

  /** Hand the turn to the other side without placing a tile. */
  passTurn(): void;

  /** True once every square holds a tile. */
  isTerminal(): boolean;

  endGame(reason: EndReason): void;

  result(): GameResult;

  counts(): TileCounts;

  /** Number of empty squares left on the board. */
  emptyCount(): number;

  snapshot(): GameSnapshot;
}
