import { ConfigData, DEFAULTS, ENV_MAP, CONFIG_KEYS } from "./defaults.js";
import { readConfigFile } from "./configFile.js";

const cliOverrides: Partial<ConfigData> = {};

export function setCliOverride<K extends keyof ConfigData>(
  key: K,
  value: ConfigData[K],
): void {
  cliOverrides[key] = value;
}

/** Record every flag the user gave as a command-line override */
export function applyCliFlags(flags: Partial<ConfigData>): void {
  for (const key of CONFIG_KEYS) {
    const value = flags[key];
    if (value !== undefined && value !== "") setCliOverride(key, value);
  }
}

export function clearCliOverrides(): void {
  for (const key of CONFIG_KEYS) delete cliOverrides[key];
}

export async function resolveConfig(): Promise<ConfigData> {
  const fileConfig = await readConfigFile();
  const resolved: ConfigData = { ...DEFAULTS };

  for (const key of CONFIG_KEYS) {
    const fileVal = fileConfig[key];
    if (fileVal !== undefined && fileVal !== "") {
      resolved[key] = fileVal;
    }

    const envVal = process.env[ENV_MAP[key]];
    if (envVal !== undefined && envVal !== "") {
      resolved[key] = envVal;
    }

    const cliVal = cliOverrides[key];
    if (cliVal !== undefined && cliVal !== "") {
      resolved[key] = cliVal;
    }
  }

  return resolved;
}

/** Where the resolved value of `key` comes from */
export function getSource(
  key: keyof ConfigData,
  fileData: Partial<ConfigData>,
): string {
  const cliVal = cliOverrides[key];
  if (cliVal !== undefined && cliVal !== "") return "command line";
  const envVal = process.env[ENV_MAP[key]];
  if (envVal !== undefined && envVal !== "") return `env: ${ENV_MAP[key]}`;
  const fileVal = fileData[key];
  if (fileVal !== undefined && fileVal !== "") return "config file";
  return "default";
}
