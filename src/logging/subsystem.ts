import { Logger, type ILogObj } from "tslog";

/**
 * tslog numeric levels: 0 silly, 1 trace, 2 debug, 3 info, 4 warn, 5 error, 6 fatal.
 */
const LOG_LEVELS = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
} as const;

type LogLevelName = keyof typeof LOG_LEVELS;

export type LogMeta = Record<string, unknown>;

export type SubsystemLogger = {
  subsystem: string;
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
};

function isLogLevelName(value: string): value is LogLevelName {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function resolveRootSettings(env: NodeJS.ProcessEnv): {
  minLevel: number;
  type: "pretty" | "json" | "hidden";
} {
  const requested = (env.HARVEST_LOG_LEVEL ?? "").trim().toLowerCase();
  const format = (env.HARVEST_LOG_FORMAT ?? "").trim().toLowerCase();

  if (requested === "silent") {
    return { minLevel: LOG_LEVELS.fatal, type: "hidden" };
  }
  return {
    minLevel: isLogLevelName(requested) ? LOG_LEVELS[requested] : LOG_LEVELS.info,
    type: format === "json" ? "json" : "pretty",
  };
}

let rootLogger: Logger<ILogObj> | null = null;

function getRootLogger(): Logger<ILogObj> {
  if (!rootLogger) {
    const settings = resolveRootSettings(process.env);
    rootLogger = new Logger<ILogObj>({
      name: "trace-harvester",
      minLevel: settings.minLevel,
      type: settings.type,
    });
  }
  return rootLogger;
}

/**
 * Creates a named logger for one part of the harvester.
 * The root logger is built lazily so env overrides made before first use apply.
 */
export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  let logger: Logger<ILogObj> | null = null;
  const resolve = (): Logger<ILogObj> => {
    logger ??= getRootLogger().getSubLogger({ name: subsystem });
    return logger;
  };

  const emit =
    (level: "debug" | "info" | "warn" | "error") =>
    (message: string, meta?: LogMeta): void => {
      const target = resolve();
      if (meta) {
        target[level](message, meta);
      } else {
        target[level](message);
      }
    };

  return {
    subsystem,
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}
