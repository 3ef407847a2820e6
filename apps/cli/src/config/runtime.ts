import { log } from "@gridcollapse/sudoku";
import { resolveConfig } from "./resolve.js";
import { Settings, parseSettings } from "./settings.js";

/** Resolve and parse the configuration, and apply the log level. */
export async function initConfig(): Promise<Settings> {
  const settings = parseSettings(await resolveConfig());
  log.level(settings.logLevel);
  return settings;
}
