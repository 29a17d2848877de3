import {
  Cell,
  Color,
  EndReason,
  GameOverError,
  GameResult,
  GameSnapshot,
  GameStatus,
  IllegalMoveError,
  InvalidConfigurationError,
  LegalMoveTable,
  MoveRecord,
  TileCounts,
  DEFAULT_BOARD_SIZE,
  opponentOf,
} from "@reversi/core";
import { IReversiGame } from "@reversi/engine";
import {
  Board,
  cloneBoard,
  countPieces,
  emptyBoard,
  emptyCount,
  isBoardFull,
} from "./state";
import { assertLocation, centerSquares } from "./geometry";
import { legalMoves } from "./rules";
import { getSnapshot } from "./observation";

/** Winner, message and score line for the given tile counts */
export function gameResult(counts: TileCounts): GameResult {
  const { black, white } = counts;
  let winner: Color | null = null;
  let message = "You tied!";
  if (white > black) {
    winner = "white";
    message = "White wins!";
  } else if (black > white) {
    winner = "black";
    message = "Black wins!";
  }
  return {
    winner,
    draw: winner === null,
    message,
    score: `black: ${black}, white: ${white}`,
    counts: { black, white },
  };
}

/**
 * Othello game state machine. Sole owner of the board, the turn, the tile
 * counts and the legal-move table; the table is rebuilt after every turn
 * switch.
 */
export class OthelloGame implements IReversiGame {
  readonly size: number;
  private board: Board;
  private currentTurn: Color = "black";
  private black = 0;
  private white = 0;
  private table: LegalMoveTable = new Map();
  private currentStatus: GameStatus = "in_progress";
  private reason: EndReason | null = null;
  private history: MoveRecord[] = [];

  constructor(size: number = DEFAULT_BOARD_SIZE) {
    this.board = emptyBoard(size);
    this.size = size;

    // Starting tiles go down upper-left, upper-right, lower-right,
    // lower-left, alternating colors from black.
    for (const location of centerSquares(size)) {
      this.place(location);
      this.switchTurn();
    }
    this.table = legalMoves(this.board, this.currentTurn);
  }

  /**
   * Resume from an arbitrary position with `turn` to move. Counts come from
   * the board itself.
   */
  static fromPosition(board: Board, turn: Color = "black"): OthelloGame {
    const expected = board.size * board.size;
    if (board.cells.length !== expected) {
      throw new InvalidConfigurationError(
        `board has ${board.cells.length} cells, expected ${expected}`
      );
    }
    const game = new OthelloGame(board.size);
    game.board = cloneBoard(board);
    const counts = countPieces(game.board);
    game.black = counts.black;
    game.white = counts.white;
    game.currentTurn = turn;
    game.table = legalMoves(game.board, turn);
    return game;
  }

  get turn(): Color {
    return this.currentTurn;
  }

  get status(): GameStatus {
    return this.currentStatus;
  }

  get endReason(): EndReason | null {
    return this.reason;
  }

  get lastMove(): number | null {
    return this.history.length > 0
      ? this.history[this.history.length - 1].location
      : null;
  }

  get moveHistory(): readonly MoveRecord[] {
    return this.history;
  }

  get cells(): readonly Cell[] {
    return this.board.cells;
  }

  legalMoves(): LegalMoveTable {
    return this.table;
  }

  counts(): TileCounts {
    return { black: this.black, white: this.white };
  }

  emptyCount(): number {
    return emptyCount(this.board);
  }

  /**
   * Place a tile for the side to move at `location`, flip its captures,
   * switch turn and rebuild the legal-move table. State is untouched when
   * the move is rejected.
   */
  applyMove(location: number): MoveRecord {
    if (this.currentStatus === "game_over") {
      throw new GameOverError();
    }
    assertLocation(this.size, location);

    const captured = this.table.get(location);
    if (!captured) {
      throw new IllegalMoveError(location);
    }

    const record: MoveRecord = {
      color: this.currentTurn,
      location,
      captured: [...captured],
    };

    this.place(location);
    for (const tile of record.captured) {
      this.flip(tile);
    }
    this.history.push(record);

    this.switchTurn();
    this.table = legalMoves(this.board, this.currentTurn);
    return record;
  }

  passTurn(): void {
    if (this.currentStatus === "game_over") {
      throw new GameOverError();
    }
    this.switchTurn();
    this.table = legalMoves(this.board, this.currentTurn);
  }

  isTerminal(): boolean {
    return isBoardFull(this.board);
  }

  endGame(reason: EndReason): void {
    this.currentStatus = "game_over";
    this.reason = reason;
  }

  result(): GameResult {
    return gameResult(this.counts());
  }

  snapshot(): GameSnapshot {
    return getSnapshot(this);
  }

  /** Check that the running counts agree with the board. */
  checkCounts(): boolean {
    const actual = countPieces(this.board);
    return actual.black === this.black && actual.white === this.white;
  }

  private place(location: number): void {
    this.board.cells[location] = this.currentTurn;
    if (this.currentTurn === "black") this.black++;
    else this.white++;
  }

  private flip(location: number): void {
    const cell = this.board.cells[location];
    if (cell === null || cell === this.currentTurn) {
      throw new Error(`Cannot flip square ${location}: holds ${cell ?? "nothing"}`);
    }
    this.board.cells[location] = this.currentTurn;
    if (this.currentTurn === "black") {
      this.black++;
      this.white--;
    } else {
      this.white++;
      this.black--;
    }
  }

  private switchTurn(): void {
    this.currentTurn = opponentOf(this.currentTurn);
  }
}
