import { Command } from "commander";
import { parseBoardSize } from "@reversi/core";
import {
  resolveConfig,
  readConfigFile,
  updateConfigFile,
  getConfigPath,
  getSource,
  isConfigKey,
  parseLogLevel,
  CONFIG_KEYS,
  ConfigData,
} from "../config/index.js";

export function registerConfigCommand(program: Command): void {
  const configCmd = program
    .command("config")
    .description("Manage CLI configuration (~/.reversi/config.json)");

  configCmd.action(async () => {
    console.log(await formatConfigList());
  });

  configCmd
    .command("set <key> <value>")
    .description("Set a config value")
    .action(async (key: string, value: string) => {
      const checked = checkKey(key);
      validateValue(checked, value);
      await updateConfigFile(checked, value);
      console.log(`Set ${checked} = ${value}`);
    });

  configCmd
    .command("get <key>")
    .description("Get a config value")
    .action(async (key: string) => {
      const resolved = await resolveConfig();
      console.log(resolved[checkKey(key)]);
    });

  configCmd
    .command("list")
    .description("List all config values with sources")
    .action(async () => {
      console.log(await formatConfigList());
    });
}

export async function formatConfigList(): Promise<string> {
  const resolved = await resolveConfig();
  const fileData = await readConfigFile();

  const lines = [
    "",
    `Config file: ${getConfigPath()}`,
    "──────────────────────────────────────",
  ];
  for (const key of CONFIG_KEYS) {
    const value = resolved[key] === "" ? "(not set)" : resolved[key];
    lines.push(`  ${key}: ${value}  (${getSource(key, fileData)})`);
  }
  lines.push("");
  return lines.join("\n");
}

function checkKey(key: string): keyof ConfigData {
  if (!isConfigKey(key)) {
    throw new Error(
      `Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`,
    );
  }
  return key;
}

/** Reject values a game could never start with. */
export function validateValue(key: keyof ConfigData, value: string): void {
  if (key === "boardSize") parseBoardSize(value);
  if (key === "logLevel") parseLogLevel(value);
}
