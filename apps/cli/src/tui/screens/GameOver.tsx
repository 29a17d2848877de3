import React, { useEffect, useRef, useState } from "react";
import { Box, Text, useInput } from "ink";
import { Color, GameResult } from "@reversi/core";
import { colors, symbols } from "../theme.js";

interface GameOverProps {
  result: GameResult;
  humanColor: Color;
  defaultName: string;
  /** Skip the name prompt when the score was already saved or skipped */
  scoreHandled: boolean;
  onSave: (name: string) => Promise<boolean>;
  onScores: () => void;
  onRematch: () => void;
  onQuit: () => void;
}

export type Phase = "naming" | "saving" | "done";

/**
 * Where the screen starts: nothing to do once the score was handled, an
 * immediate save when a player name is configured, otherwise the prompt.
 */
export function initialPhase(scoreHandled: boolean, defaultName: string): Phase {
  if (scoreHandled) return "done";
  return defaultName.trim() ? "saving" : "naming";
}

export function GameOver({
  result,
  humanColor,
  defaultName,
  scoreHandled,
  onSave,
  onScores,
  onRematch,
  onQuit,
}: GameOverProps) {
  const [phase, setPhase] = useState<Phase>(() => initialPhase(scoreHandled, defaultName));
  const [name, setName] = useState(defaultName);
  const [saveMessage, setSaveMessage] = useState("");
  const [saveFailed, setSaveFailed] = useState(false);

  const isWinner = result.winner === humanColor;

  const autoSaved = useRef(false);

  const save = (player: string) => {
    setPhase("saving");
    onSave(player)
      .then((saved) => {
        setSaveMessage(saved ? `Score saved for ${player.trim()}` : "Score not saved");
        setPhase("done");
      })
      .catch((err: Error) => {
        setSaveFailed(true);
        setSaveMessage(`Could not save score: ${err.message}`);
        setPhase("done");
      });
  };

  useEffect(() => {
    if (phase === "saving" && !autoSaved.current) {
      autoSaved.current = true;
      save(defaultName);
    }
  }, []);

  useInput((input, key) => {
    if (phase === "naming") {
      if (key.return) {
        save(name);
      } else if (key.escape) {
        setSaveMessage("Score not saved");
        setPhase("done");
      } else if (key.backspace || key.delete) {
        setName((prev) => prev.slice(0, -1));
      } else if (input && !key.ctrl && !key.meta) {
        setName((prev) => prev + input);
      }
      return;
    }
    if (phase === "saving") return;

    if (input === "s") onScores();
    if (input === "r") onRematch();
    if (input === "q") onQuit();
  });

  return (
    <Box flexDirection="column" paddingX={2} paddingY={1} alignItems="center">
      <Text color={colors.primary} bold>
        {"═══════════════════"}
      </Text>
      <Text color={colors.primary} bold>
        {"    GAME OVER    "}
      </Text>
      <Text color={colors.primary} bold>
        {"═══════════════════"}
      </Text>

      <Text>{""}</Text>

      <Text color={result.draw ? colors.secondary : isWinner ? colors.primary : colors.error} bold>
        {result.message}
      </Text>
      <Text color={colors.dimmed}>{result.score}</Text>

      <Text>{""}</Text>

      {phase === "naming" && (
        <Box flexDirection="column" alignItems="center">
          <Text color={colors.white}>Enter your name to save your score (esc to skip)</Text>
          <Box>
            <Text color={colors.secondary}>{"> "}</Text>
            <Text color={colors.text}>{name}</Text>
            <Text color={colors.dimmed}>{"_"}</Text>
          </Box>
        </Box>
      )}

      {phase === "saving" && <Text color={colors.dimmed}>Saving...</Text>}

      {phase === "done" && (
        <>
          {saveMessage && (
            <Text color={saveFailed ? colors.error : colors.dimmed}>
              {saveFailed ? symbols.x : symbols.check} {saveMessage}
            </Text>
          )}
          <Text>{""}</Text>
          <Text color={colors.dimmed}>[S] High scores  [R] Play again  [Q] Quit</Text>
        </>
      )}
    </Box>
  );
}
