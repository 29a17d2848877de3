import type Logger from "bunyan";
import {
  Color,
  EndReason,
  GameResult,
  GameSnapshot,
  IScoreStore,
  MoveRecord,
  ReversiErrorCode,
  isReversiError,
} from "@reversi/core";
import { IComputerPlayer, IRenderer, IReversiGame } from "./interfaces/IGame";

export interface MatchOrchestratorOptions {
  game: IReversiGame;
  computer: IComputerPlayer;
  renderer?: IRenderer;
  scoreStore?: IScoreStore;
  logger?: Logger;
  /** Color the human plays. Defaults to black, which moves first. */
  humanColor?: Color;
}

export type SubmitResult =
  | {
      accepted: true;
      human: MoveRecord;
      computer: MoveRecord[];
      terminal: boolean;
      result?: GameResult;
    }
  | {
      accepted: false;
      reason: ReversiErrorCode | "BUSY" | "NOT_YOUR_TURN";
      message: string;
    };

/**
 * Runs one human-vs-computer match: applies the human's moves, plays the
 * computer's replies (again and again while the human has no move) and
 * decides when the game is over. The renderer sees every change.
 */
export class MatchOrchestrator {
  private game: IReversiGame;
  private computer: IComputerPlayer;
  private renderer?: IRenderer;
  private scoreStore?: IScoreStore;
  private log?: Logger;
  private humanColor: Color;
  private inFlight = false;

  constructor(opts: MatchOrchestratorOptions) {
    this.game = opts.game;
    this.computer = opts.computer;
    this.renderer = opts.renderer;
    this.scoreStore = opts.scoreStore;
    this.log = opts.logger;
    this.humanColor = opts.humanColor ?? "black";

    this.log?.info(
      { size: this.game.size, human: this.humanColor, computer: this.computer.name },
      "Match created"
    );

    // The computer opens when the human plays second
    if (this.game.turn !== this.humanColor) {
      this.playComputerTurns();
    } else if (this.game.isTerminal()) {
      this.finish("board_full");
    } else if (this.game.legalMoves().size === 0) {
      this.finish("no_moves");
    }
    this.render();
  }

  getSnapshot(): GameSnapshot {
    return this.game.snapshot();
  }

  isTerminal(): boolean {
    return this.game.status === "game_over";
  }

  getResult(): GameResult | null {
    return this.isTerminal() ? this.game.result() : null;
  }

  isHumanTurn(): boolean {
    return !this.isTerminal() && this.game.turn === this.humanColor;
  }

  /**
   * Play the human's move at `location`, then everything it triggers.
   * Illegal or out-of-turn submissions are rejected with the game untouched.
   */
  submitMove(location: number): SubmitResult {
    if (this.inFlight) {
      return { accepted: false, reason: "BUSY", message: "A move is already being played" };
    }
    if (!this.isTerminal() && this.game.turn !== this.humanColor) {
      return { accepted: false, reason: "NOT_YOUR_TURN", message: "Not your turn" };
    }

    this.inFlight = true;
    try {
      let human: MoveRecord;
      try {
        human = this.game.applyMove(location);
      } catch (err: unknown) {
        if (
          isReversiError(err) &&
          (err.code === "ILLEGAL_MOVE" || err.code === "GAME_OVER")
        ) {
          this.log?.debug({ location, reason: err.code }, "Move rejected");
          return { accepted: false, reason: err.code, message: err.message };
        }
        throw err;
      }

      this.log?.info(
        { color: human.color, location, captured: human.captured.length },
        "Human moved"
      );
      this.render();

      let computer: MoveRecord[] = [];
      if (this.game.isTerminal()) {
        this.finish("board_full");
      } else {
        computer = this.playComputerTurns();
      }

      return {
        accepted: true,
        human,
        computer,
        terminal: this.isTerminal(),
        result: this.getResult() ?? undefined,
      };
    } finally {
      this.inFlight = false;
    }
  }

  /**
   * Record the human's final score. A blank name skips saving.
   * Returns true if a score was written.
   */
  async saveScore(name: string): Promise<boolean> {
    if (!this.isTerminal()) {
      throw new Error("Game is not over yet");
    }
    const trimmed = name.trim();
    if (!trimmed || !this.scoreStore) {
      return false;
    }

    const counts = this.game.counts();
    const score = this.humanColor === "black" ? counts.black : counts.white;
    await this.scoreStore.save(trimmed, score);
    this.log?.info({ name: trimmed, score }, "Score saved");
    return true;
  }

  /**
   * The computer moves until the human has a legal move, the computer has
   * none, or the board fills. Each pass through the loop places a tile, so
   * it runs at most once per empty square. Ends the game when control comes
   * back to a human with nothing to play.
   */
  private playComputerTurns(): MoveRecord[] {
    const played: MoveRecord[] = [];
    const limit = this.game.emptyCount();

    for (let i = 0; i <= limit && !this.isTerminal(); i++) {
      const choice = this.computer.chooseMove(this.game.legalMoves());

      if (choice === null) {
        this.log?.info({ color: this.game.turn }, "Computer passed");
        this.game.passTurn();
        this.render();
        break;
      }

      const record = this.game.applyMove(choice);
      played.push(record);
      this.log?.info(
        { color: record.color, location: choice, captured: record.captured.length },
        "Computer moved"
      );
      this.render();

      if (this.game.isTerminal()) {
        this.finish("board_full");
        return played;
      }
      if (this.game.legalMoves().size > 0) {
        break;
      }

      // Human is stuck: hand the turn straight back
      this.log?.info({ color: this.game.turn }, "Human has no move, passing");
      this.game.passTurn();
      this.render();
    }

    if (!this.isTerminal() && this.game.legalMoves().size === 0) {
      this.finish("no_moves");
    }
    return played;
  }

  private finish(reason: EndReason): void {
    this.game.endGame(reason);
    const result = this.game.result();
    this.log?.info(
      { reason, winner: result.winner, black: result.counts.black, white: result.counts.white },
      "Game over"
    );
    this.render();
  }

  private render(): void {
    this.renderer?.render(this.game.snapshot());
  }
}
