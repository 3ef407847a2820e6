import bunyan from "bunyan";

export type LogLevel = bunyan.LogLevelString;

const LOG_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

const envLevel = process.env.LOG_LEVEL ?? "";

const log = bunyan.createLogger({
  name: "gridcollapse",
  stream: process.stderr,
  level: isLogLevel(envLevel) ? envLevel : "info",
});

export type Logger = bunyan;

export default log;
