import type { LogLevelString } from "bunyan";
import { InvalidConfigurationError, parseBoardSize } from "@reversi/core";
import { ConfigData } from "./defaults.js";
import { resolveConfig } from "./resolve.js";

const LOG_LEVELS: readonly LogLevelString[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
];

/** Resolved config with every value checked and converted. */
export interface Settings {
  boardSize: number;
  playerName: string;
  scoresPath: string;
  logLevel: LogLevelString;
  logFile: string;
}


export function parseLogLevel(raw: string): LogLevelString {
  const level = raw.trim().toLowerCase();
  const match = LOG_LEVELS.find((l) => l === level);
  if (!match) {
    throw new InvalidConfigurationError(
      `logLevel must be one of ${LOG_LEVELS.join(", ")}, got "${raw}"`,
    );
  }
  return match;
}

/** Throws InvalidConfigurationError for the first bad value. */
export function toSettings(config: ConfigData): Settings {
  return {
    boardSize: parseBoardSize(config.boardSize),
    playerName: config.playerName.trim(),
    scoresPath: config.scoresPath,
    logLevel: parseLogLevel(config.logLevel),
    logFile: config.logFile,
  };
}

/** Resolve every config layer and check the result. */
export async function loadSettings(): Promise<Settings> {
  return toSettings(await resolveConfig());
}
