export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

/**
 * Read the default level from OPSCHED_LOG_LEVEL. Unknown values fall back to "warn".
 */
export function resolveLogLevel(
  env: Record<string, string | undefined> = typeof process !== "undefined"
    ? process.env
    : {},
): LogLevel {
  const raw = env.OPSCHED_LOG_LEVEL?.trim().toLowerCase();
  return raw && isLogLevel(raw) ? raw : "warn";
}

/**
 * Console-backed logger. Every line is prefixed with `[scope]`.
 */
export function createLogger(
  scope: string,
  level: LogLevel = resolveLogLevel(),
): Logger {
  const threshold = LEVEL_RANK[level];
  const prefix = `[${scope}]`;
  const enabled = (at: LogLevel) => LEVEL_RANK[at] >= threshold;
  return {
    debug(message) {
      if (enabled("debug")) console.debug(prefix, message);
    },
    info(message) {
      if (enabled("info")) console.info(prefix, message);
    },
    warn(message) {
      if (enabled("warn")) console.warn(prefix, message);
    },
    error(message) {
      if (enabled("error")) console.error(prefix, message);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
