import { createLogger, type Logger, type LogLevel, resolveLogLevel } from "./core/logger";

export type Env = Record<string, string | undefined>;

export type SchedulerConfig = {
  /** Insert Load/Store boundary nodes before scheduling. */
  normalize: boolean;
  /** Rewrite graph order to the admission order after scheduling. */
  reorderGraph: boolean;
  logLevel: LogLevel;
  logger: Logger;
};

function readEnv(): Env {
  return typeof process !== "undefined" ? process.env : {};
}

/**
 * Explicit overrides win over OPSCHED_* environment flags, which win over
 * defaults.
 *
 *   OPSCHED_NORMALIZE=0   skip boundary normalization
 *   OPSCHED_REORDER=1     emit the admission order into the graph
 *   OPSCHED_LOG_LEVEL     debug | info | warn | error | silent
 */
export function resolveSchedulerConfig(
  overrides: Partial<SchedulerConfig> = {},
  env: Env = readEnv(),
): SchedulerConfig {
  const logLevel = overrides.logLevel ?? resolveLogLevel(env);
  return {
    normalize: overrides.normalize ?? env.OPSCHED_NORMALIZE !== "0",
    reorderGraph: overrides.reorderGraph ?? env.OPSCHED_REORDER === "1",
    logLevel,
    logger: overrides.logger ?? createLogger("scheduler", logLevel),
  };
}
