import { GameSnapshot } from "@reversi/core";
import type { OthelloGame } from "./game";

/**
 * Othello is a perfect information game, so the snapshot is the full state.
 * Everything is copied; renderers may hold on to it.
 */
export function getSnapshot(game: OthelloGame): GameSnapshot {
  const over = game.status === "game_over";
  return {
    size: game.size,
    board: [...game.cells],
    turn: game.turn,
    status: game.status,
    counts: game.counts(),
    legalMoves: over ? [] : Array.from(game.legalMoves().keys()),
    lastMove: game.lastMove,
    endReason: game.endReason,
    result: over ? game.result() : null,
  };
}
