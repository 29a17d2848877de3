export { MatchOrchestrator } from "./MatchOrchestrator";
export type { MatchOrchestratorOptions, SubmitResult } from "./MatchOrchestrator";
export type {
  IReversiGame,
  IComputerPlayer,
  IRenderer,
  GameUISpec,
  PieceDisplay,
} from "./interfaces/IGame";
