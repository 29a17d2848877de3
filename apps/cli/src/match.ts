import type Logger from "bunyan";
import { ScoreFile } from "@reversi/core";
import { MatchOrchestrator } from "@reversi/engine";
import { GreedyComputerPlayer, OthelloGame } from "@reversi/othello";
import type { Settings } from "./config/index.js";
import { SnapshotRenderer } from "./tui/renderer.js";

export interface Match {
  orchestrator: MatchOrchestrator;
  renderer: SnapshotRenderer;
  scores: ScoreFile;
}

/** A fresh game against the greedy computer; the human plays black. */
export function createMatch(
  settings: Pick<Settings, "boardSize" | "scoresPath">,
  logger?: Logger,
): Match {
  const renderer = new SnapshotRenderer();
  const scores = new ScoreFile(settings.scoresPath);
  const orchestrator = new MatchOrchestrator({
    game: new OthelloGame(settings.boardSize),
    computer: new GreedyComputerPlayer(),
    renderer,
    scoreStore: scores,
    logger: logger?.child({ size: settings.boardSize }),
  });
  return { orchestrator, renderer, scores };
}
