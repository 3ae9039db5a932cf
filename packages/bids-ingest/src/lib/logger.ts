/**
 * Structured logger utility for consistent logging across the ingest pipeline
 * Provides namespaced logging with structured context for easier debugging
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry {
  level: LogLevel;
  namespace: string;
  message: string;
  context?: LogContext;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

// BIDS_INGEST_LOG_LEVEL wins over the environment default
function resolveMinLogLevel(): LogLevel {
  const override = process.env.BIDS_INGEST_LOG_LEVEL?.toLowerCase();
  if (isLogLevel(override)) {
    return override;
  }
  switch (process.env.NODE_ENV) {
    case "production":
      return "info";
    case "test":
      return "warn";
    default:
      return "debug";
  }
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[resolveMinLogLevel()];
}

function formatMessage(entry: LogEntry): string {
  return `[${entry.namespace}] ${entry.message}`;
}

function createLogEntry(
  level: LogLevel,
  namespace: string,
  message: string,
  context?: LogContext,
): LogEntry {
  return {
    level,
    namespace,
    message,
    context,
  };
}

export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
  child: (childNamespace: string) => Logger;
}

/**
 * Creates a namespaced logger instance
 * @param namespace - The namespace for this logger (e.g., "Ingest", "ICA")
 *
 * @example
 * const logger = createLogger("Ingest");
 * logger.info("Sidecar resolved", { kind: "events", path });
 *
 * // Create a child logger for more specific context
 * const rowLogger = logger.child("Rows");
 * rowLogger.debug("Processing row", { rowIndex: 5 });
 */
export function createLogger(namespace: string): Logger {
  const log = (
    level: LogLevel,
    message: string,
    context?: LogContext,
  ): void => {
    if (!shouldLog(level)) return;

    const entry = createLogEntry(level, namespace, message, context);
    const formattedMessage = formatMessage(entry);

    switch (level) {
      case "debug":
      case "info":
        if (context) {
          console.info(formattedMessage, context);
        } else {
          console.info(formattedMessage);
        }
        break;
      case "warn":
        if (context) {
          console.warn(formattedMessage, context);
        } else {
          console.warn(formattedMessage);
        }
        break;
      case "error":
        if (context) {
          console.error(formattedMessage, context);
        } else {
          console.error(formattedMessage);
        }
        break;
    }
  };

  return {
    debug: (message: string, context?: LogContext) =>
      log("debug", message, context),
    info: (message: string, context?: LogContext) =>
      log("info", message, context),
    warn: (message: string, context?: LogContext) =>
      log("warn", message, context),
    error: (message: string, context?: LogContext) =>
      log("error", message, context),
    child: (childNamespace: string) =>
      createLogger(`${namespace}:${childNamespace}`),
  };
}

// Pre-configured loggers for the ingest stages
export const loggers = {
  ingest: createLogger("Ingest"),
  tables: createLogger("Tables"),
  electrodes: createLogger("Electrodes"),
  events: createLogger("Events"),
  ica: createLogger("ICA"),
  annotations: createLogger("Annotations"),
} as const;
