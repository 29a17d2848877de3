import { readFile, writeFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { homedir } from "node:os";
import { ConfigData, isConfigKey } from "./defaults.js";

/** ~/.reversi, or REVERSI_CONFIG_DIR when set */
export function getConfigDir(): string {
  return process.env.REVERSI_CONFIG_DIR || join(homedir(), ".reversi");
}

export function getConfigPath(): string {
  return join(getConfigDir(), "config.json");
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

export async function readConfigFile(): Promise<Partial<ConfigData>> {
  const path = getConfigPath();
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err: unknown) {
    if (isNodeError(err) && err.code === "ENOENT") {
      return {};
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    if (err instanceof SyntaxError) {
      console.error(
        `Warning: ${path} is malformed and was ignored. ` +
          `Run "reversi config set" to recreate it.`,
      );
      return {};
    }
    throw err;
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return {};
  }

  // Unknown keys and non-string values are dropped
  const data: Partial<ConfigData> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (isConfigKey(key) && typeof value === "string") {
      data[key] = value;
    }
  }
  return data;
}

export async function writeConfigFile(
  data: Partial<ConfigData>,
): Promise<void> {
  await mkdir(getConfigDir(), { recursive: true });
  await writeFile(getConfigPath(), JSON.stringify(data, null, 2) + "\n", "utf-8");
}

export async function updateConfigFile(
  key: keyof ConfigData,
  value: string,
): Promise<Partial<ConfigData>> {
  const existing = await readConfigFile();
  existing[key] = value;
  await writeConfigFile(existing);
  return existing;
}
