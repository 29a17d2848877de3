import dotenv from "dotenv";
dotenv.config({ quiet: true });

import { program } from "commander";
import React from "react";
import { render } from "ink";
import { App } from "./tui/App.js";
import { loadSettings, setCliOverride } from "./config/index.js";
import { registerConfigCommand } from "./commands/config.js";
import { registerScoresCommand } from "./commands/scores.js";
import { createLogger } from "./logger.js";

program
  .name("reversi")
  .description("Play Othello against a greedy computer opponent")
  .version("0.1.0", "-v, --version");

registerConfigCommand(program);
registerScoresCommand(program);

program
  .command("play", { isDefault: true })
  .description("Start a game in the terminal")
  .option("-s, --size <n>", "Board side length (even, at least 4)")
  .option("-n, --name <name>", "Name to save your score under")
  .action(async (opts: { size?: string; name?: string }) => {
    if (opts.size) setCliOverride("boardSize", opts.size);
    if (opts.name) setCliOverride("playerName", opts.name);

    const settings = await loadSettings();
    const log = createLogger(settings);
    log.info({ size: settings.boardSize, scores: settings.scoresPath }, "reversi started");

    const app = render(React.createElement(App, { settings, log }));
    await app.waitUntilExit();
    log.info("reversi exited");
  });

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
