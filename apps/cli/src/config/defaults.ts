export interface ConfigData {
  /** bunyan level for solver and generator logs */
  logLevel: string;
  /** Removal preset used by `generate` when no hint bounds are given */
  difficulty: string;
  /** Solver step cap */
  maxSteps: string;
}

export const CONFIG_KEYS: (keyof ConfigData)[] = [
  "logLevel",
  "difficulty",
  "maxSteps",
];

export const DEFAULTS: ConfigData = {
  logLevel: "info",
  difficulty: "medium",
  maxSteps: "20000",
};

export const ENV_MAP: Record<keyof ConfigData, string> = {
  logLevel: "LOG_LEVEL",
  difficulty: "GRIDCOLLAPSE_DIFFICULTY",
  maxSteps: "GRIDCOLLAPSE_MAX_STEPS",
};
