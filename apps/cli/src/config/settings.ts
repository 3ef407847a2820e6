import {
  Difficulty,
  DIFFICULTY_RANGES,
  InvalidConfigurationError,
  isLogLevel,
  LogLevel,
} from "@gridcollapse/sudoku";
import { ConfigData } from "./defaults.js";

/** Resolved configuration, parsed and checked */
export interface Settings {
  logLevel: LogLevel;
  difficulty: Difficulty;
  maxSteps: number;
}

export function isDifficulty(value: string): value is Difficulty {
  return Object.keys(DIFFICULTY_RANGES).includes(value);
}

/** Parse a whole number no smaller than `min` */
export function parseInteger(name: string, value: string, min = 1): number {
  const n = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(n) || n < min) {
    throw new InvalidConfigurationError(
      `${name} must be an integer of at least ${min}, got "${value}"`,
    );
  }
  return n;
}

export function parseSettings(config: ConfigData): Settings {
  if (!isLogLevel(config.logLevel)) {
    throw new InvalidConfigurationError(`Unknown log level: "${config.logLevel}"`);
  }
  if (!isDifficulty(config.difficulty)) {
    throw new InvalidConfigurationError(
      `Unknown difficulty: "${config.difficulty}". Must be ${Object.keys(DIFFICULTY_RANGES).join(", ")}.`,
    );
  }
  return {
    logLevel: config.logLevel,
    difficulty: config.difficulty,
    maxSteps: parseInteger("maxSteps", config.maxSteps),
  };
}
