/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * logger.ts: Logging utilities with color-coded output for Reelcast.
 */
import { initDebugFilter, isCategoryEnabled } from "./debugFilter.js";
import { format } from "util";
import { getRunId } from "./runContext.js";
import { writeLogEntry } from "./fileLogger.js";

/* Terminal color codes for log output formatting. Warnings appear in yellow, errors in red and debug output in cyan. The reset code restores the default color
 * after each colored message.
 */

const ANSI_COLORS = {

  cyan: "\x1b[36m",
  red: "\x1b[31m",
  reset: "\x1b[0m",
  yellow: "\x1b[33m"
};

/**
 * Log levels understood by the logger.
 */
export type LogLevel = "debug" | "error" | "info" | "warn";

/* The logger operates in console mode (stdout/stderr with colors, used in containers) or file mode (the configured log file). File mode is the default. Console
 * mode is enabled via the --console CLI flag.
 */

// Flag indicating whether to use console logging instead of file logging.
let useConsoleLogging = false;

/**
 * Sets the logging mode. When true, logs go to console with colors. When false, logs go to the file logger.
 * @param enabled - True to enable console logging, false for file logging.
 */
export function setConsoleLogging(enabled: boolean): void {

  useConsoleLogging = enabled;
}

/**
 * Returns whether console logging is currently enabled.
 * @returns True if using console logging, false if using file logging.
 */
export function isConsoleLogging(): boolean {

  return useConsoleLogging;
}

/**
 * Enables or disables debug logging for every category. Equivalent to REELCAST_DEBUG=*.
 * @param enabled - True to enable all debug logging, false to disable.
 */
export function setDebugLogging(enabled: boolean): void {

  initDebugFilter(enabled ? "*" : "");
}

/**
 * Core logging implementation shared by all log levels. Handles run ID prefixing and output routing.
 * @param level - The log level.
 * @param color - ANSI color code for console output (empty string for no color).
 * @param message - The format string.
 * @param args - Format arguments.
 * @param explicitRunId - Optional explicit run ID (used by the withRunId helper).
 * @param categoryTag - Optional debug category tag.
 */
function logWithLevel(level: LogLevel, color: string, message: string, args: unknown[], explicitRunId?: string, categoryTag?: string): void {

  const runId = explicitRunId ?? getRunId();
  const formatted = args.length > 0 ? format(message, ...args) : message;

  if(!useConsoleLogging) {

    writeLogEntry(level, runId ? [ "[", runId, "] ", formatted ].join("") : formatted, color || undefined, categoryTag);

    return;
  }

  /* eslint-disable no-console */
  const consoleMethod = (level === "error") ? console.error : ((level === "warn") ? console.warn : console.log);
  /* eslint-enable no-console */

  const prefix = runId ? [ "[", runId, "] " ].join("") : "";

  if(color) {

    consoleMethod("%s%s%s%s", color, prefix, formatted, ANSI_COLORS.reset);
  } else {

    consoleMethod("%s%s", prefix, formatted);
  }
}

/**
 * Bound logger interface returned by LOG.withRunId(). Provides the same logging methods but with a fixed run ID.
 */
export interface BoundLogger {

  debug: (category: string, message: string, ...args: unknown[]) => void;
  error: (message: string, ...args: unknown[]) => void;
  info: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
}

/* The LOG object provides a centralized logging interface with printf-style format strings (%s, %d, %j, %o via util.format). Inside a run context established by
 * runWithRunContext(), messages are prefixed with the run ID automatically.
 */
export const LOG = {

  /**
   * Logs a debug message in cyan, filtered by category. Debug messages are only output when the category is enabled via REELCAST_DEBUG or --debug.
   * @param category - The debug category (e.g., "supervisor", "transcoder:stderr").
   * @param message - The format string.
   * @param args - Values to interpolate into the format string.
   */
  debug: function(category: string, message: string, ...args: unknown[]): void {

    if(!isCategoryEnabled(category)) {

      return;
    }

    logWithLevel("debug", ANSI_COLORS.cyan, message, args, undefined, category);
  },

  /**
   * Logs an error message in red. Use this for failures that end streaming or that an operator needs to act on.
   * @param message - The format string.
   * @param args - Values to interpolate into the format string.
   */
  error: function(message: string, ...args: unknown[]): void {

    logWithLevel("error", ANSI_COLORS.red, message, args);
  },

  /**
   * Logs an informational message in the default terminal color.
   * @param message - The format string.
   * @param args - Values to interpolate into the format string.
   */
  info: function(message: string, ...args: unknown[]): void {

    logWithLevel("info", "", message, args);
  },

  /**
   * Logs a warning message in yellow. Use this for problems that were recovered from, such as a restarted transcoder or a skipped file.
   * @param message - The format string.
   * @param args - Values to interpolate into the format string.
   */
  warn: function(message: string, ...args: unknown[]): void {

    logWithLevel("warn", ANSI_COLORS.yellow, message, args);
  },

  /**
   * Creates a bound logger with a fixed run ID, for logging about a run from outside its async context.
   * @param runId - The run ID to include in all log messages.
   * @returns A logger whose messages include the specified run ID.
   */
  withRunId: function(runId: string): BoundLogger {

    return {

      debug: (category: string, message: string, ...args: unknown[]): void => {

        if(isCategoryEnabled(category)) {

          logWithLevel("debug", ANSI_COLORS.cyan, message, args, runId, category);
        }
      },
      error: (message: string, ...args: unknown[]): void => { logWithLevel("error", ANSI_COLORS.red, message, args, runId); },
      info: (message: string, ...args: unknown[]): void => { logWithLevel("info", "", message, args, runId); },
      warn: (message: string, ...args: unknown[]): void => { logWithLevel("warn", ANSI_COLORS.yellow, message, args, runId); }
    };
  }
};
