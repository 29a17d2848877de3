export {
  CONFIG_KEYS,
  DEFAULTS,
  ENV_MAP,
  isConfigKey,
} from "./defaults.js";
export type { ConfigData } from "./defaults.js";
export {
  readConfigFile,
  writeConfigFile,
  updateConfigFile,
  getConfigDir,
  getConfigPath,
} from "./configFile.js";
export {
  resolveConfig,
  setCliOverride,
  clearCliOverrides,
  getSource,
} from "./resolve.js";
export type { ConfigSource } from "./resolve.js";
export { loadSettings, parseLogLevel, toSettings } from "./runtime.js";
export type { Settings } from "./runtime.js";
