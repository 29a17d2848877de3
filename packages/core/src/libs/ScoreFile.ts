import { readFile, writeFile, appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";

export interface ScoreEntry {
  name: string;
  score: number;
}

/** Where finished games are recorded. */
export interface IScoreStore {
  save(name: string, score: number): Promise<void>;
}

const LINE_RE = /^(.*\S)\s+(-?\d+)$/;

/** Parse one `"<name> <score>"` line, or null if it is not one. */
export function parseScoreLine(line: string): ScoreEntry | null {
  const match = LINE_RE.exec(line.trim());
  if (!match) return null;
  return { name: match[1], score: parseInt(match[2], 10) };
}

export function formatScoreLine(entry: ScoreEntry): string {
  return `${entry.name} ${entry.score}\n`;
}

/**
 * Flat text score file. The all-time high score is kept on the first line;
 * every other entry follows in the order it was played.
 */
export class ScoreFile implements IScoreStore {
  constructor(private readonly path: string) {}

  getPath(): string {
    return this.path;
  }

  async save(name: string, score: number): Promise<void> {
    const line = formatScoreLine({ name, score });
    const existing = await this.readRaw();

    if (existing === null) {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(this.path, line, "utf-8");
      return;
    }

    const best = parseScoreLine(existing.split("\n", 1)[0]);
    if (best === null || score > best.score) {
      await writeFile(this.path, line + existing, "utf-8");
    } else {
      const sep = existing.length > 0 && !existing.endsWith("\n") ? "\n" : "";
      await appendFile(this.path, sep + line, "utf-8");
    }
  }

  /** All parseable entries, top line first. Missing file reads as empty. */
  async read(): Promise<ScoreEntry[]> {
    const raw = await this.readRaw();
    if (raw === null) return [];

    const entries: ScoreEntry[] = [];
    for (const line of raw.split("\n")) {
      const entry = parseScoreLine(line);
      if (entry) entries.push(entry);
    }
    return entries;
  }

  async highScore(): Promise<ScoreEntry | null> {
    const raw = await this.readRaw();
    if (raw === null) return null;
    return parseScoreLine(raw.split("\n", 1)[0]);
  }

  private async readRaw(): Promise<string | null> {
    try {
      return await readFile(this.path, "utf-8");
    } catch (err: unknown) {
      if (isNodeError(err) && err.code === "ENOENT") {
        return null;
      }
      throw err;
    }
  }
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
