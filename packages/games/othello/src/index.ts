export { OthelloGame, gameResult } from "./game";
export { OthelloUI, formatSquare, parseSquare } from "./ui";
export { BoardLayout, SQUARE_SIZE } from "./layout";
export type { Point } from "./layout";
export { chooseMove, GreedyComputerPlayer } from "./ai";
export { getSnapshot } from "./observation";
export {
  capturesInDirection,
  capturesAt,
  legalMoves,
  hasLegalMove,
} from "./rules";
export {
  DIRECTIONS,
  directionIncrement,
  directionalBound,
  parseDirection,
  isDirection,
  centerSquares,
  rowOf,
  colOf,
  indexOf,
  isOnBoard,
  ray,
} from "./geometry";
export {
  emptyBoard,
  initialBoard,
  boardFromRows,
  cloneBoard,
  countPieces,
  isBoardFull,
} from "./state";
export type { Board } from "./state";
