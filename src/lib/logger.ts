/**
 * Structured logging module with JSON output.
 *
 * Log lines go to stderr so the coverage report on stdout can be piped or
 * redirected without progress chatter mixed in.
 *
 * @module logger
 *
 * @example
 * ```typescript
 * const logger = createLogger(
 *   { component: "InventoryFetcher", region: "us-east-1" },
 *   { minLevel: "DEBUG" }
 * );
 *
 * logger.debug("Fetched page", { operation: "DescribeInstances", page: 2 });
 * // stderr: {"timestamp":"2026-01-01T12:00:00.000Z","level":"DEBUG","component":"InventoryFetcher","region":"us-east-1","message":"Fetched page","operation":"DescribeInstances","page":2}
 *
 * logger.warn("Skipping database instance without availability zone", { dbInstanceId: "orders" });
 * logger.error("Failed to describe reservations", error);
 * ```
 */

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

/**
 * Context fields that persist across all log entries for a logger instance.
 */
export interface LogContext {
  /**
   * Component name (e.g., "InventoryFetcher", "CLI").
   */
  component: string;

  /**
   * Optional AWS region for correlation.
   */
  region?: string;

  /**
   * Any additional context fields.
   */
  [key: string]: string | number | boolean | null | undefined;
}

/**
 * Additional fields to include in a specific log entry.
 */
export interface LogFields {
  [key: string]: string | number | boolean | null | undefined | Error;
}

export interface LoggerOptions {
  /**
   * Entries below this level are dropped. Defaults to "INFO".
   */
  minLevel?: LogLevel;
}

/**
 * Structured log entry format.
 */
interface LogEntry extends LogContext {
  timestamp: string;
  level: LogLevel;
  message: string;
  error?: string;
  errorStack?: string;
}

/**
 * Logger interface with context-aware logging methods.
 */
export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;

  /**
   * Log an error message with optional Error object and additional fields.
   *
   * @param message - Human-readable error message
   * @param error - Optional Error object (stack trace will be included)
   * @param fields - Optional additional fields to include in log entry
   */
  error(message: string, error?: Error, fields?: LogFields): void;

  /**
   * Creates a logger that shares this logger's level and adds context fields.
   */
  child(context: Partial<LogContext>): Logger;
}

function writeLogEntry(entry: LogEntry): void {
  console.error(JSON.stringify(entry));
}

/**
 * Creates a logger instance with persistent context fields.
 * All log entries from this logger will include the provided context.
 *
 * @param context - Context fields to include in all log entries
 * @param options - Minimum level to emit
 */
export function createLogger(
  context: LogContext,
  options: LoggerOptions = {}
): Logger {
  const minLevel = options.minLevel ?? "INFO";

  function log(
    level: LogLevel,
    message: string,
    fields?: LogFields,
    error?: Error
  ): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      ...context,
      message,
      ...extractFields(fields),
    };

    if (error) {
      entry.error = error.message;
      if (error.stack) {
        entry.errorStack = error.stack;
      }
    }

    writeLogEntry(entry);
  }

  return {
    debug(message: string, fields?: LogFields): void {
      log("DEBUG", message, fields);
    },

    info(message: string, fields?: LogFields): void {
      log("INFO", message, fields);
    },

    warn(message: string, fields?: LogFields): void {
      log("WARN", message, fields);
    },

    error(message: string, error?: Error, fields?: LogFields): void {
      log("ERROR", message, fields, error);
    },

    child(extra: Partial<LogContext>): Logger {
      return createLogger({ ...context, ...extra }, { minLevel });
    },
  };
}

/**
 * Extracts and sanitizes fields for logging.
 * Converts Error objects to strings and filters out undefined values.
 */
function extractFields(
  fields?: LogFields
): Record<string, string | number | boolean | null> {
  if (!fields) {
    return {};
  }

  const sanitized: Record<string, string | number | boolean | null> = {};

  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) {
      continue;
    }

    if (value instanceof Error) {
      sanitized[key] = value.message;
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}
