import bunyan from "bunyan";

export type Logger = bunyan;
export type LogLevel = bunyan.LogLevelString;

const LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
];

export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

function envLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL;
  return raw && isLogLevel(raw) ? raw : "info";
}

/**
 * Create a named logger. Packages create one at module scope and hand
 * children (`log.child({ agent })`) to the objects they build.
 */
export function createLogger(
  name: string,
  level: LogLevel = envLevel()
): Logger {
  return bunyan.createLogger({ name, level });
}
