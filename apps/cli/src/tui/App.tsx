import React, { useCallback, useState } from "react";
import { Box, useApp } from "ink";
import type Logger from "bunyan";
import { GameResult } from "@reversi/core";
import { OthelloUI } from "@reversi/othello";
import { StatusBar } from "./components/StatusBar.js";
import { GameBoard } from "./screens/GameBoard.js";
import { GameOver } from "./screens/GameOver.js";
import { Leaderboard } from "./screens/Leaderboard.js";
import type { Settings } from "../config/index.js";
import { createMatch, Match } from "../match.js";

type Screen =
  | { type: "game" }
  | { type: "gameover"; result: GameResult; scoreHandled: boolean }
  | { type: "scores"; result: GameResult };

interface AppProps {
  settings: Settings;
  log: Logger;
}

export function App({ settings, log }: AppProps) {
  const { exit } = useApp();
  const [match, setMatch] = useState<Match>(() => createMatch(settings, log));
  const [round, setRound] = useState(1);
  const [screen, setScreen] = useState<Screen>({ type: "game" });

  const handleGameOver = useCallback(
    (result: GameResult) => setScreen({ type: "gameover", result, scoreHandled: false }),
    [],
  );

  const rematch = () => {
    log.info({ round: round + 1 }, "Starting new game");
    setMatch(createMatch(settings, log));
    setRound((r) => r + 1);
    setScreen({ type: "game" });
  };

  return (
    <Box flexDirection="column">
      <StatusBar boardSize={settings.boardSize} scoresPath={settings.scoresPath} />

      {screen.type === "game" && (
        <GameBoard
          key={round}
          match={match}
          ui={OthelloUI}
          onGameOver={handleGameOver}
          onQuit={() => exit()}
        />
      )}

      {screen.type === "gameover" && (
        <GameOver
          result={screen.result}
          humanColor="black"
          defaultName={settings.playerName}
          scoreHandled={screen.scoreHandled}
          onSave={(name) => match.orchestrator.saveScore(name)}
          onScores={() => setScreen({ type: "scores", result: screen.result })}
          onRematch={rematch}
          onQuit={() => exit()}
        />
      )}

      {screen.type === "scores" && (
        <Leaderboard
          scores={match.scores}
          onBack={() =>
            setScreen({ type: "gameover", result: screen.result, scoreHandled: true })
          }
        />
      )}
    </Box>
  );
}
