import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import bunyan from "bunyan";
import type { Settings } from "./config/index.js";

/**
 * The TUI owns stdout, so the CLI logs to a file only.
 */
export function createLogger(settings: Pick<Settings, "logLevel" | "logFile">): bunyan {
  mkdirSync(dirname(settings.logFile), { recursive: true });
  return bunyan.createLogger({
    name: "reversi-cli",
    level: settings.logLevel,
    streams: [{ path: settings.logFile }],
  });
}
