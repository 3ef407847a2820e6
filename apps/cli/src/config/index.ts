export { CONFIG_KEYS, DEFAULTS, ENV_MAP } from "./defaults.js";
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
  applyCliFlags,
  clearCliOverrides,
  getSource,
} from "./resolve.js";
export { parseSettings, parseInteger, isDifficulty } from "./settings.js";
export type { Settings } from "./settings.js";
export { initConfig } from "./runtime.js";
