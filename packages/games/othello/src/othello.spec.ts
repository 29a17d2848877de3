import { strict as assert } from "assert";
import {
  GameOverError,
  IllegalMoveError,
  InvalidConfigurationError,
  InvalidLocationError,
  LegalMoveTable,
  opponentOf,
} from "@reversi/core";
import { MatchOrchestrator } from "@reversi/engine";
import { OthelloGame, gameResult } from "./game";
import { GreedyComputerPlayer, chooseMove } from "./ai";
import { capturesAt, capturesInDirection, hasLegalMove, legalMoves } from "./rules";
import { boardFromRows, countPieces, initialBoard } from "./state";

function occupied(game: OthelloGame): number {
  return game.cells.filter((c) => c !== null).length;
}

describe("Othello", () => {
  // -----------------------------------------------------------------------
  // setup
  // -----------------------------------------------------------------------
  describe("init", () => {
    it("should fill the four center squares diagonally", () => {
      const game = new OthelloGame(8);

      assert.equal(game.cells[35], "black");
      assert.equal(game.cells[36], "white");
      assert.equal(game.cells[28], "black");
      assert.equal(game.cells[27], "white");
      assert.equal(occupied(game), 4);
    });

    it("should start with 2 tiles each and black to move", () => {
      const game = new OthelloGame();

      assert.equal(game.size, 8);
      assert.deepEqual(game.counts(), { black: 2, white: 2 });
      assert.equal(game.turn, "black");
      assert.equal(game.status, "in_progress");
      assert.equal(game.lastMove, null);
      assert.equal(game.endReason, null);
    });

    it("should offer black exactly four single-capture moves", () => {
      const game = new OthelloGame(8);

      assert.deepEqual(
        Array.from(game.legalMoves()),
        [
          [19, [27]],
          [26, [27]],
          [37, [36]],
          [44, [36]],
        ]
      );
    });

    it("should set up smaller boards the same way", () => {
      const game = new OthelloGame(4);

      assert.deepEqual(game.cells, [
        null, null, null, null,
        null, "white", "black", null,
        null, "black", "white", null,
        null, null, null, null,
      ]);
      assert.deepEqual(Array.from(game.legalMoves().keys()), [1, 4, 11, 14]);
    });

    it("should match initialBoard", () => {
      assert.deepEqual(initialBoard(6).cells, new OthelloGame(6).cells);
    });

    it("should reject bad board sizes", () => {
      assert.throws(() => new OthelloGame(9), InvalidConfigurationError);
      assert.throws(() => new OthelloGame(2), /greater than or equal to 4/);
      assert.throws(() => new OthelloGame(7.5), /n must be an integer/);
    });
  });

  // -----------------------------------------------------------------------
  // captures
  // -----------------------------------------------------------------------
  describe("capturesInDirection", () => {
    const closed = boardFromRows([
      ". . . B",
      ". . W .",
      ". W . .",
      ". . . .",
    ]);

    it("should capture a run closed by an own tile, nearest first", () => {
      assert.deepEqual(capturesInDirection(closed, 0, "black", "ne"), [5, 10]);
    });

    it("should not include the closing tile", () => {
      const captured = capturesInDirection(closed, 0, "black", "ne");
      assert.equal(captured.includes(15), false);
    });

    it("should capture nothing when the first tile is the mover's own", () => {
      assert.deepEqual(capturesInDirection(closed, 0, "white", "ne"), []);
    });

    it("should capture nothing when the next square is empty or off the board", () => {
      assert.deepEqual(capturesInDirection(closed, 0, "black", "n"), []);
      assert.deepEqual(capturesInDirection(closed, 0, "black", "w"), []);
      assert.deepEqual(capturesInDirection(closed, 0, "black", "s"), []);
    });

    it("should give no partial credit for a run that reaches the edge", () => {
      const open = boardFromRows([
        ". . . W",
        ". . W .",
        ". W . .",
        ". . . .",
      ]);
      assert.deepEqual(capturesInDirection(open, 0, "black", "ne"), []);
    });

    it("should give no partial credit for a run broken by an empty square", () => {
      const gap = boardFromRows([
        ". . . B",
        ". . . .",
        ". W . .",
        ". . . .",
      ]);
      assert.deepEqual(capturesInDirection(gap, 0, "black", "ne"), []);
    });

    it("should not wrap around the end of a row", () => {
      const board = boardFromRows([
        ". . . .",
        ". . . .",
        "B . . .",
        ". . . W",
      ]);
      assert.deepEqual(capturesInDirection(board, 2, "black", "e"), []);
    });
  });

  describe("capturesAt", () => {
    // Black at 5 closes runs going N, NE and E only
    const board = boardFromRows([
      ". B . B",
      "W W W .",
      "W . W B",
      "W W W .",
    ]);

    it("should concatenate captures in N, NE, E, SE, S, SW, W, NW order", () => {
      assert.deepEqual(capturesAt(board, 5, "black"), [9, 10, 6]);
    });

    it("should return nothing for an occupied square", () => {
      assert.deepEqual(capturesAt(board, 9, "black"), []);
      assert.deepEqual(capturesAt(board, 13, "white"), []);
    });

    it("should throw InvalidLocationError off the board", () => {
      assert.throws(() => capturesAt(board, 16, "black"), InvalidLocationError);
    });

    it("should build the legal-move table from non-empty captures only", () => {
      const table = legalMoves(board, "black");
      assert.deepEqual(Array.from(table), [[5, [9, 10, 6]]]);
      assert.equal(hasLegalMove(board, "black"), true);
    });
  });

  describe("legalMoves", () => {
    it("should list squares in ascending order", () => {
      const keys = Array.from(legalMoves(initialBoard(6), "black").keys());
      assert.deepEqual(keys, [8, 13, 22, 27]);
    });

    it("should be empty when a color has no tiles to capture", () => {
      const board = boardFromRows([
        "B B . .",
        "B B . .",
        ". . . .",
        ". . . .",
      ]);
      assert.equal(legalMoves(board, "white").size, 0);
      assert.equal(hasLegalMove(board, "white"), false);
    });
  });

  // -----------------------------------------------------------------------
  // applyMove
  // -----------------------------------------------------------------------
  describe("applyMove", () => {
    it("should place, flip, switch turn and rebuild the table", () => {
      const game = new OthelloGame(8);
      const record = game.applyMove(19);

      assert.deepEqual(record, { color: "black", location: 19, captured: [27] });
      assert.equal(game.cells[19], "black");
      assert.equal(game.cells[27], "black");
      assert.deepEqual(game.counts(), { black: 4, white: 1 });
      assert.equal(game.turn, "white");
      assert.equal(game.lastMove, 19);
      assert.deepEqual(
        Array.from(game.legalMoves()),
        [
          [18, [27]],
          [20, [28]],
          [34, [35]],
        ]
      );
    });

    it("should reject a square that is not a legal move and keep state", () => {
      const game = new OthelloGame(8);
      const before = game.snapshot();

      assert.throws(() => game.applyMove(0), IllegalMoveError);
      assert.throws(() => game.applyMove(27), /Square 27 is not a legal move/);
      assert.deepEqual(game.snapshot(), before);
    });

    it("should throw InvalidLocationError for an index off the board", () => {
      const game = new OthelloGame(8);

      assert.throws(() => game.applyMove(64), InvalidLocationError);
      assert.throws(() => game.applyMove(-1), InvalidLocationError);
      assert.equal(game.turn, "black");
    });

    it("should refuse moves once the game has ended", () => {
      const game = new OthelloGame(4);
      game.endGame("no_moves");

      assert.throws(() => game.applyMove(1), GameOverError);
      assert.throws(() => game.passTurn(), GameOverError);
    });

    it("should flip every run a move closes", () => {
      const board = boardFromRows([
        ". B . B",
        "W W W .",
        "W . W B",
        "W W W .",
      ]);
      const game = OthelloGame.fromPosition(board, "black");
      game.applyMove(5);

      assert.deepEqual(game.counts(), { black: 7, white: 5 });
      assert.equal(game.cells[9], "black");
      assert.equal(game.cells[10], "black");
      assert.equal(game.cells[6], "black");
      assert.equal(game.cells[8], "white");
      assert.equal(game.checkCounts(), true);
    });

    it("should keep counts consistent with the board through a whole game", () => {
      const game = new OthelloGame(6);
      let passes = 0;

      for (let i = 0; i < 100 && passes < 2 && !game.isTerminal(); i++) {
        const table = game.legalMoves();
        for (const location of table.keys()) {
          assert.equal(game.cells[location], null);
        }

        const choice = chooseMove(table);
        if (choice === null) {
          game.passTurn();
          passes++;
          continue;
        }
        passes = 0;

        const before = game.counts();
        const filled = occupied(game);
        const { color, captured } = game.applyMove(choice);
        const after = game.counts();

        assert.equal(occupied(game), filled + 1);
        const other = opponentOf(color);
        assert.equal(after[color], before[color] + 1 + captured.length);
        assert.equal(after[other], before[other] - captured.length);
        assert.equal(after.black + after.white, occupied(game));
        assert.ok(after.black >= 0 && after.white >= 0);
        assert.equal(game.checkCounts(), true);
      }

      assert.ok(passes === 2 || game.isTerminal());
      assert.deepEqual(game.counts(), countPieces({ size: 6, cells: [...game.cells] }));
    });
  });

  // -----------------------------------------------------------------------
  // terminal state and result
  // -----------------------------------------------------------------------
  describe("fromPosition", () => {
    it("should take counts and the move table from the board", () => {
      const game = OthelloGame.fromPosition(
        boardFromRows(["W W . .", "W W . .", ". . . .", ". . . ."]),
        "white"
      );

      assert.deepEqual(game.counts(), { black: 0, white: 4 });
      assert.equal(game.turn, "white");
      assert.equal(game.legalMoves().size, 0);
    });

    it("should reject a board whose cell count does not match its size", () => {
      const board = { size: 4, cells: new Array<null>(15).fill(null) };

      assert.throws(
        () => OthelloGame.fromPosition(board),
        (err: unknown) =>
          err instanceof InvalidConfigurationError &&
          err.message === "board has 15 cells, expected 16"
      );
    });
  });

  describe("isTerminal", () => {
    it("should be true only for a full board", () => {
      assert.equal(new OthelloGame(4).isTerminal(), false);

      const full = OthelloGame.fromPosition(
        boardFromRows(["B B B B", "B W W B", "B W W B", "B B B B"])
      );
      assert.equal(full.isTerminal(), true);
      assert.deepEqual(full.counts(), { black: 12, white: 4 });
    });
  });

  describe("result", () => {
    it("should report a black win", () => {
      const r = gameResult({ black: 6, white: 2 });
      assert.equal(r.message, "Black wins!");
      assert.equal(r.score, "black: 6, white: 2");
      assert.equal(r.winner, "black");
      assert.equal(r.draw, false);
    });

    it("should report a white win", () => {
      const r = gameResult({ black: 2, white: 6 });
      assert.equal(r.message, "White wins!");
      assert.equal(r.score, "black: 2, white: 6");
      assert.equal(r.winner, "white");
    });

    it("should report a tie", () => {
      const r = gameResult({ black: 4, white: 4 });
      assert.equal(r.message, "You tied!");
      assert.equal(r.score, "black: 4, white: 4");
      assert.equal(r.winner, null);
      assert.equal(r.draw, true);
    });

    it("should use the game's own counts", () => {
      assert.equal(new OthelloGame(8).result().message, "You tied!");
    });
  });

  describe("snapshot", () => {
    it("should copy the board and list legal squares", () => {
      const game = new OthelloGame(4);
      const view = game.snapshot();

      assert.equal(view.size, 4);
      assert.deepEqual(view.legalMoves, [1, 4, 11, 14]);
      assert.equal(view.result, null);

      view.board[0] = "black";
      assert.equal(game.cells[0], null);
    });

    it("should carry the result once the game is over", () => {
      const game = new OthelloGame(4);
      game.endGame("no_moves");
      const view = game.snapshot();

      assert.equal(view.status, "game_over");
      assert.equal(view.endReason, "no_moves");
      assert.deepEqual(view.legalMoves, []);
      assert.equal(view.result?.score, "black: 2, white: 2");
    });
  });

  // -----------------------------------------------------------------------
  // computer player
  // -----------------------------------------------------------------------
  describe("chooseMove", () => {
    it("should pick the square capturing the most tiles", () => {
      const table: LegalMoveTable = new Map([
        [1, [20]],
        [2, [20, 21]],
        [3, [20, 21, 22]],
        [4, [20, 21, 22, 23]],
        [5, [20]],
      ]);
      assert.equal(chooseMove(table), 4);
    });

    it("should break ties by the first square in the table", () => {
      const table: LegalMoveTable = new Map([
        [9, [1, 2]],
        [3, [4, 5]],
        [12, [6]],
      ]);
      assert.equal(chooseMove(table), 9);
    });

    it("should return null for an empty table", () => {
      assert.equal(chooseMove(new Map()), null);
      assert.equal(new GreedyComputerPlayer().chooseMove(new Map()), null);
    });
  });

  // -----------------------------------------------------------------------
  // full turns through the orchestrator
  // -----------------------------------------------------------------------
  describe("with MatchOrchestrator", () => {
    function match(game: OthelloGame): MatchOrchestrator {
      return new MatchOrchestrator({ game, computer: new GreedyComputerPlayer() });
    }

    it("should answer the human's opening move", () => {
      const game = new OthelloGame(8);
      const orch = match(game);

      const result = orch.submitMove(19);

      assert.equal(result.accepted, true);
      // white's three replies each capture one tile; the first wins
      assert.equal(game.cells[18], "white");
      assert.equal(game.cells[27], "white");
      assert.deepEqual(game.counts(), { black: 3, white: 3 });
      assert.equal(game.turn, "black");
      assert.deepEqual(Array.from(game.legalMoves().keys()), [17, 26, 37, 44]);
    });

    it("should leave the game untouched after a click on an illegal square", () => {
      const game = new OthelloGame(8);
      const orch = match(game);

      const result = orch.submitMove(0);

      assert.equal(result.accepted, false);
      assert.deepEqual(game.counts(), { black: 2, white: 2 });
      assert.equal(game.turn, "black");
    });

    it("should move again for the computer while the human is stuck", () => {
      const game = OthelloGame.fromPosition(
        boardFromRows([
          ". . W .",
          "W W W B",
          "W W W .",
          "W W W B",
        ])
      );
      const orch = match(game);

      const result = orch.submitMove(12);

      assert.equal(result.accepted, true);
      if (result.accepted) {
        assert.deepEqual(result.human.captured, [9, 6]);
        assert.deepEqual(
          result.computer.map((m) => m.location),
          [7, 13]
        );
        assert.equal(result.terminal, false);
      }
      assert.equal(orch.isHumanTurn(), true);
      assert.deepEqual(game.counts(), { black: 3, white: 12 });
      assert.deepEqual(Array.from(game.legalMoves()), [[15, [14, 13]]]);
    });

    it("should end with a full board after chained computer moves", () => {
      const game = OthelloGame.fromPosition(
        boardFromRows([
          "B B B .",
          ". B W .",
          "B W B W",
          ". W W W",
        ])
      );
      const orch = match(game);

      const result = orch.submitMove(11);

      if (result.accepted) {
        assert.deepEqual(
          result.computer.map((m) => m.location),
          [15, 8, 0]
        );
      }
      assert.equal(orch.isTerminal(), true);
      assert.equal(game.endReason, "board_full");
      assert.equal(orch.getResult()?.message, "White wins!");
      assert.equal(orch.getResult()?.score, "black: 4, white: 12");
    });

    it("should end when both sides run out of moves in succession", () => {
      const game = OthelloGame.fromPosition(
        boardFromRows([
          ". W . .",
          ". W W B",
          "W W B B",
          ". B B B",
        ])
      );
      const orch = match(game);

      const result = orch.submitMove(8);

      if (result.accepted) {
        assert.deepEqual(
          result.computer.map((m) => m.location),
          [12, 14]
        );
      }
      assert.equal(orch.isTerminal(), true);
      assert.equal(game.endReason, "no_moves");
      assert.equal(game.isTerminal(), false);
      assert.equal(orch.getResult()?.score, "black: 8, white: 6");
      assert.equal(orch.getResult()?.message, "Black wins!");
    });

    it("should end a game resumed with the human unable to move", () => {
      const game = OthelloGame.fromPosition(
        boardFromRows(["W W . .", "W W . .", ". . . .", ". . . ."]),
        "black"
      );
      const orch = match(game);

      assert.equal(orch.isTerminal(), true);
      assert.equal(orch.isHumanTurn(), false);
      assert.equal(game.endReason, "no_moves");
      assert.equal(orch.getResult()?.message, "White wins!");
      assert.equal(orch.getResult()?.score, "black: 0, white: 4");
      assert.equal(orch.submitMove(2).accepted, false);
    });
  });
});
