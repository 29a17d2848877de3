import { LegalMoveTable } from "@reversi/core";
import { IComputerPlayer } from "@reversi/engine";

/**
 * Greedy move choice: the square capturing the most tiles. Ties go to the
 * first square in the table's iteration order (ascending index). Returns
 * null when there is nothing to play.
 */
export function chooseMove(table: LegalMoveTable): number | null {
  let best: number | null = null;
  let bestCount = 0;
  for (const [location, captured] of table) {
    if (captured.length > bestCount) {
      bestCount = captured.length;
      best = location;
    }
  }
  return best;
}

export class GreedyComputerPlayer implements IComputerPlayer {
  readonly name = "greedy";

  chooseMove(table: LegalMoveTable): number | null {
    return chooseMove(table);
  }
}
