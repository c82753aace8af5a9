import { nanoid } from "nanoid";
import pino, { type DestinationStream, type Logger } from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Log {
  atFunction: string;
  message: string;
  data?: unknown;
  /** Reuse an existing id, e.g. to correlate a retry with the first failure */
  log_id?: string;
}

/** Logger shape shared by the model, REST layer and server */
export interface TaskLogger {
  debug: (log: Log) => string;
  info: (log: Log) => string;
  warn: (log: Log) => string;
  error: (log: Log) => string;
}

export interface LoggerConfig {
  /** Minimum level written. Default: 'info' */
  level?: LogLevel | "silent";
  /**
   * Where log lines go. A string is a file path (created with its directory),
   * a stream receives each serialized line. Default: stdout.
   */
  destination?: string | DestinationStream;
}

const LOG_ID_LENGTH = 6;

/** Error instances serialize to `{}` with JSON.stringify, so flatten them first */
function toLoggable(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }

  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return value;
  }

  const entries = Object.entries(value).map(([key, inner]) => [
    key,
    inner instanceof Error ? toLoggable(inner) : inner,
  ]);
  return Object.fromEntries(entries);
}

function resolveDestination(
  destination: LoggerConfig["destination"]
): DestinationStream | undefined {
  if (typeof destination === "string") {
    return pino.destination({ dest: destination, mkdir: true, sync: false });
  }
  return destination;
}

function createPinoInstance(appName: string, config: LoggerConfig): Logger {
  const options: pino.LoggerOptions = {
    level: config.level ?? "info",
    base: { app: appName },
    messageKey: "message",
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
  };

  const destination = resolveDestination(config.destination);
  return destination ? pino(options, destination) : pino(options);
}

/**
 * Creates a logger bound to an app name.
 * Every call writes one JSON line and returns the log id, so callers can hand
 * the id to clients and find the matching line later.
 */
export const createLogger = (
  appName: string,
  config: LoggerConfig = {}
): TaskLogger => {
  const instance = createPinoInstance(appName, config);

  const write = (level: LogLevel, log: Log): string => {
    const log_id = log.log_id ?? nanoid(LOG_ID_LENGTH);
    instance[level](
      {
        log_id,
        atFunction: log.atFunction,
        data: toLoggable(log.data) ?? null,
      },
      log.message
    );
    return log_id;
  };

  return {
    debug: (log) => write("debug", log),
    info: (log) => write("info", log),
    warn: (log) => write("warn", log),
    error: (log) => write("error", log),
  };
};
