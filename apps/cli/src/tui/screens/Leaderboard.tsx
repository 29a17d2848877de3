import React, { useEffect, useState } from "react";
import { Box, Text, useInput } from "ink";
import { ScoreEntry, ScoreFile } from "@reversi/core";
import { colors, symbols } from "../theme.js";

interface LeaderboardProps {
  scores: ScoreFile;
  onBack: () => void;
}

const PAGE_SIZE = 15;

export function Leaderboard({ scores, onBack }: LeaderboardProps) {
  const [entries, setEntries] = useState<ScoreEntry[]>([]);
  const [selectedRow, setSelectedRow] = useState(0);
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState("");
  const [page, setPage] = useState(0);

  useEffect(() => {
    setLoading(true);
    setError("");
    scores
      .read()
      .then((read) => {
        setEntries(read);
        setSelectedRow(0);
        setLoading(false);
      })
      .catch((err: Error) => {
        setError(err.message);
        setLoading(false);
      });
  }, [scores]);

  // The high score sits on top; the rest is listed most recent first
  const [best, ...rest] = entries;
  const recent = rest.reverse();
  const totalPages = Math.max(1, Math.ceil(recent.length / PAGE_SIZE));
  const visible = recent.slice(page * PAGE_SIZE, (page + 1) * PAGE_SIZE);

  useInput((input, key) => {
    if (key.escape || input === "q") {
      onBack();
      return;
    }

    if (key.upArrow) setSelectedRow((s) => Math.max(0, s - 1));
    if (key.downArrow) setSelectedRow((s) => Math.min(visible.length - 1, s + 1));

    if (input === "n" && page + 1 < totalPages) {
      setPage((p) => p + 1);
      setSelectedRow(0);
    }
    if (input === "p" && page > 0) {
      setPage((p) => p - 1);
      setSelectedRow(0);
    }
  });

  return (
    <Box flexDirection="column" paddingX={2} paddingY={1}>
      <Text color={colors.primary} bold>
        {"═══ HIGH SCORES ═══"}
      </Text>
      <Text color={colors.dimmed}>{scores.getPath()}</Text>
      <Text>{""}</Text>

      {loading && <Text color={colors.dimmed}>  Loading...</Text>}
      {error && <Text color={colors.error}>  Error: {error}</Text>}

      {!loading && !error && !best && (
        <Text color={colors.warning}>  No scores recorded yet.</Text>
      )}

      {!loading && !error && best && (
        <>
          <Text color={colors.secondary} bold>
            {"  Best: "}
            {best.name} ({best.score})
          </Text>
          <Text>{""}</Text>
          <Text color={colors.secondary} bold>
            {"     Player               Score"}
          </Text>
          <Text color={colors.border}>
            {"     ──────────────────── ─────"}
          </Text>
          {visible.map((e, i) => (
            <Text key={`${page}-${i}`} color={i === selectedRow ? colors.primary : colors.text}>
              {i === selectedRow ? `  ${symbols.arrow}  ` : "     "}
              {e.name.padEnd(20)} {String(e.score).padStart(5)}
            </Text>
          ))}
        </>
      )}

      <Text>{""}</Text>
      <Text color={colors.dimmed}>
        {"  "}Page {page + 1}/{totalPages} | ↑↓: navigate | n/p: page | Esc: back
      </Text>
    </Box>
  );
}
