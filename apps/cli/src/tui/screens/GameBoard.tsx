import React, { useCallback, useEffect, useState } from "react";
import { Box, Text, useInput } from "ink";
import { GameResult, GameSnapshot } from "@reversi/core";
import { GameUISpec } from "@reversi/engine";
import { colors, tileColors } from "../theme.js";
import { ColoredBoard } from "../components/ColoredBoard.js";
import { moveCursor } from "../cursor.js";
import type { Match } from "../../match.js";

interface GameBoardProps {
  match: Match;
  ui: GameUISpec;
  onGameOver: (result: GameResult) => void;
  onQuit: () => void;
}

function initialView(match: Match): GameSnapshot {
  return match.renderer.current() ?? match.orchestrator.getSnapshot();
}

export function GameBoard({ match, ui, onGameOver, onQuit }: GameBoardProps) {
  const { orchestrator, renderer } = match;
  const [view, setView] = useState<GameSnapshot>(() => initialView(match));
  const [cursor, setCursor] = useState(() => initialView(match).legalMoves[0] ?? 0);
  const [inputBuffer, setInputBuffer] = useState("");
  const [error, setError] = useState("");
  const [notice, setNotice] = useState("");
  const [quitConfirm, setQuitConfirm] = useState(false);

  useEffect(() => renderer.subscribe(setView), [renderer]);

  useEffect(() => {
    const result = orchestrator.getResult();
    if (result) onGameOver(result);
  }, [view, orchestrator, onGameOver]);

  const play = useCallback(
    (location: number) => {
      const outcome = orchestrator.submitMove(location);
      if (!outcome.accepted) {
        setError(outcome.message);
        return;
      }

      setError("");
      setInputBuffer("");
      const replies = outcome.computer.map((m) => ui.formatMove(m.location, view.size));
      if (outcome.terminal) {
        setNotice("");
      } else if (replies.length === 0) {
        setNotice("Computer has no move and passes.");
      } else {
        setNotice(`Computer played ${replies.join(", ")}`);
      }
    },
    [orchestrator, ui, view.size],
  );

  const handleSubmit = useCallback(() => {
    if (!inputBuffer.trim()) {
      play(cursor);
      return;
    }
    const location = ui.parseInput(inputBuffer, view);
    if (location === null) {
      setError("Invalid square. " + ui.inputHint);
      setInputBuffer("");
      return;
    }
    setCursor(location);
    play(location);
  }, [inputBuffer, cursor, ui, view, play]);

  useInput((input, key) => {
    if (quitConfirm) {
      if (input === "y" || input === "Y") onQuit();
      setQuitConfirm(false);
      return;
    }

    if (key.upArrow) return setCursor((c) => moveCursor(c, view.size, "up"));
    if (key.downArrow) return setCursor((c) => moveCursor(c, view.size, "down"));
    if (key.leftArrow) return setCursor((c) => moveCursor(c, view.size, "left"));
    if (key.rightArrow) return setCursor((c) => moveCursor(c, view.size, "right"));

    if (key.return) {
      handleSubmit();
      return;
    }

    if (key.escape) {
      if (!inputBuffer && !error) {
        setQuitConfirm(true);
      } else {
        setInputBuffer("");
        setError("");
      }
      return;
    }

    if (key.backspace || key.delete) {
      setInputBuffer((prev) => prev.slice(0, -1));
      return;
    }

    if (input && !key.ctrl && !key.meta) {
      setInputBuffer((prev) => prev + input);
      if (error) setError("");
    }
  });

  const humanTurn = orchestrator.isHumanTurn();
  const lastMove = view.lastMove === null ? "-" : ui.formatMove(view.lastMove, view.size);

  return (
    <Box flexDirection="column" paddingX={2} paddingY={1}>
      <Box flexDirection="row" justifyContent="space-between">
        <Text>
          <Text color={tileColors.black} bold>
            {ui.pieces.black.symbol} You (Black)
          </Text>
          <Text color={colors.dimmed}>{"  vs  "}</Text>
          <Text color={tileColors.white} bold>
            {ui.pieces.white.symbol} Computer (White)
          </Text>
        </Text>
        <Text color={colors.dimmed}>last move: {lastMove}</Text>
      </Box>

      <Text>{""}</Text>

      <ColoredBoard html={ui.renderBoard(view, cursor)} />

      <Text color={colors.warning} bold>
        {ui.renderStatus(view)}
      </Text>
      {notice && <Text color={colors.dimmed}>{notice}</Text>}

      <Text>{""}</Text>

      {quitConfirm && (
        <Text color={colors.warning} bold>
          Quit this game? [y] yes  [n] cancel
        </Text>
      )}

      {error && <Text color={colors.error}>{error}</Text>}
      {humanTurn ? (
        <Box flexDirection="column">
          <Text color={colors.primary} bold>
            YOUR TURN - {ui.inputHint}
          </Text>
          <Box>
            <Text color={colors.secondary}>{"> "}</Text>
            <Text color={colors.text}>{inputBuffer}</Text>
            <Text color={colors.dimmed}>{"_"}</Text>
          </Box>
        </Box>
      ) : (
        <Text color={colors.dimmed}>Game over</Text>
      )}

      <Text color={colors.dimmed}>[arrows] move  [enter] play  [esc] quit</Text>
    </Box>
  );
}
