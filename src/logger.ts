/**
 * Diagnostic Logger Module
 * Console channel for the appender's own status messages. Never writes to
 * the log event store: a failing store must still be able to report itself.
 */

type LogLevel = "error" | "warning" | "info" | "debug";

export interface LogOptions {
  source?: string;
  context?: Record<string, unknown>;
  skipConsole?: boolean;
}

/**
 * Sink for appender status: integrity warnings and contained failures
 */
export interface StatusReporter {
  warning(message: string, options?: LogOptions): void;
  error(message: string, options?: LogOptions): void;
}

/**
 * Get the calling file name from stack trace
 */
function getCallerInfo(): string {
  const stack = new Error().stack;
  if (!stack) return "unknown";

  const lines = stack.split("\n");
  // Skip first 4 lines: Error, getCallerInfo, log, logger method
  const callerLine = lines[4] || "";

  const match = callerLine.match(/at\s+(?:.*\s+)?\(?(.*):(\d+):(\d+)\)?/);
  if (match) {
    const fullPath = match[1];
    const fileName = fullPath.split("/").pop() || fullPath;
    return fileName.replace(".ts", "").replace(".js", "");
  }

  return "unknown";
}

function formatContext(context?: Record<string, unknown>): string {
  if (!context) return "";
  try {
    return ` ${JSON.stringify(context)}`;
  } catch {
    return " [unserializable context]";
  }
}

/**
 * Core logging function
 */
function log(level: LogLevel, message: string, options?: LogOptions): void {
  if (options?.skipConsole) return;

  const source = options?.source || getCallerInfo();
  const line = `[${level.toUpperCase()}] [${source}] ${message}${formatContext(options?.context)}`;

  switch (level) {
    case "error":
      console.error(line);
      break;
    case "warning":
      console.warn(line);
      break;
    case "info":
      console.info(line);
      break;
    case "debug":
      console.debug(line);
      break;
  }
}

/**
 * Global logger instance with convenience methods
 */
export const logger = {
  error(message: string, options?: LogOptions): void {
    log("error", message, options);
  },

  warning(message: string, options?: LogOptions): void {
    log("warning", message, options);
  },

  info(message: string, options?: LogOptions): void {
    log("info", message, options);
  },

  debug(message: string, options?: LogOptions): void {
    log("debug", message, options);
  },

  /**
   * Log an error from an Error object, including its stack and causes
   */
  errorFromException(error: unknown, options?: LogOptions): void {
    const message = error instanceof Error ? error.message : String(error);
    log("error", message, options);

    if (options?.skipConsole) return;
    const seen = new Set<Error>();
    let current: unknown = error;
    while (current instanceof Error && !seen.has(current)) {
      seen.add(current);
      if (current.stack) {
        console.error(current.stack);
      }
      current = current.cause;
    }
  },
};

export default logger;
