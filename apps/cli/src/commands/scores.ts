import { Command } from "commander";
import { ScoreEntry, ScoreFile } from "@reversi/core";
import { loadSettings } from "../config/index.js";

export function formatScores(entries: ScoreEntry[], limit: number): string {
  if (entries.length === 0) {
    return "No scores recorded yet.";
  }

  const [best, ...rest] = entries;
  const width = Math.max(...entries.map((e) => e.name.length), 4);
  const lines = [
    `High score: ${best.name} (${best.score})`,
    "────────────────────────",
  ];
  for (const entry of rest.slice(-limit)) {
    lines.push(`  ${entry.name.padEnd(width)}  ${String(entry.score).padStart(3)}`);
  }
  return lines.join("\n");
}

export function parseLimit(raw: string): number {
  const limit = parseInt(raw, 10);
  if (!/^\d+$/.test(raw.trim()) || limit < 1) {
    throw new Error(`--limit must be a positive integer, got "${raw}"`);
  }
  return limit;
}

export function registerScoresCommand(program: Command): void {
  program
    .command("scores")
    .description("Show the high score and recent games")
    .option("-l, --limit <count>", "Number of recent games to show", "10")
    .action(async (opts: { limit: string }) => {
      const limit = parseLimit(opts.limit);
      const settings = await loadSettings();
      const scores = new ScoreFile(settings.scoresPath);
      console.log(formatScores(await scores.read(), limit));
    });
}
