import { Command } from "commander";
import {
  readConfigFile,
  updateConfigFile,
  resolveConfig,
  getConfigPath,
  getSource,
  parseSettings,
  CONFIG_KEYS,
  ConfigData,
} from "../config/index.js";

export function registerConfigCommand(program: Command): void {
  const configCmd = program
    .command("config")
    .description("Manage CLI configuration (~/.gridcollapse/config.json)");

  configCmd
    .command("set <key> <value>")
    .description("Set a config value")
    .action(async (key: string, value: string) => {
      if (!isValidKey(key)) {
        console.error(
          `Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`,
        );
        process.exit(1);
      }
      try {
        // Reject values the other commands would fail on later
        parseSettings({ ...(await resolveConfig()), [key]: value });
      } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      }
      await updateConfigFile(key, value);
      console.log(`Set ${key} = ${value}`);
    });

  configCmd
    .command("get <key>")
    .description("Get a config value")
    .action(async (key: string) => {
      if (!isValidKey(key)) {
        console.error(
          `Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`,
        );
        process.exit(1);
      }
      const resolved = await resolveConfig();
      console.log(resolved[key]);
    });

  configCmd
    .command("list")
    .description("List all config values with sources")
    .action(async () => {
      for (const line of await buildConfigList()) console.log(line);
    });
}

export async function buildConfigList(): Promise<string[]> {
  const resolved = await resolveConfig();
  const fileData = await readConfigFile();

  const lines = [`Config file: ${getConfigPath()}`, "──────────────────────────────────────"];
  for (const key of CONFIG_KEYS) {
    lines.push(`  ${key}: ${resolved[key]}  (${getSource(key, fileData)})`);
  }
  return lines;
}

export function isValidKey(key: string): key is keyof ConfigData {
  return CONFIG_KEYS.some((k) => k === key);
}
