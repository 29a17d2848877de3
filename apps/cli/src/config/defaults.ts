import { join } from "node:path";
import { homedir } from "node:os";

export interface ConfigData {
  /** Board side length, as typed; validated when a game starts */
  boardSize: string;
  /** Name saved with scores. When empty the game-over screen asks for one */
  playerName: string;
  scoresPath: string;
  logLevel: string;
  logFile: string;
}

export const CONFIG_KEYS: (keyof ConfigData)[] = [
  "boardSize",
  "playerName",
  "scoresPath",
  "logLevel",
  "logFile",
];

export const DEFAULTS: ConfigData = {
  boardSize: "8",
  playerName: "",
  scoresPath: "./scores.txt",
  logLevel: "info",
  logFile: join(homedir(), ".reversi", "reversi.log"),
};

export const ENV_MAP: Record<keyof ConfigData, string> = {
  boardSize: "REVERSI_BOARD_SIZE",
  playerName: "REVERSI_PLAYER_NAME",
  scoresPath: "REVERSI_SCORES_PATH",
  logLevel: "LOG_LEVEL",
  logFile: "REVERSI_LOG_FILE",
};

export function isConfigKey(key: string): key is keyof ConfigData {
  return CONFIG_KEYS.some((k) => k === key);
}
