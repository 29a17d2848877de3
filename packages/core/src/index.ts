export * from "./types/game";
export * from "./errors";

// Validation
export {
  isValidBoardSize,
  assertBoardSize,
  parseBoardSize,
  DEFAULT_BOARD_SIZE,
  MIN_BOARD_SIZE,
} from "./validation";

// Score persistence
export { ScoreFile, parseScoreLine, formatScoreLine } from "./libs/ScoreFile";
export type { ScoreEntry, IScoreStore } from "./libs/ScoreFile";
