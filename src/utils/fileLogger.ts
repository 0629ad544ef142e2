/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * fileLogger.ts: Buffered file logging with size-based trimming for Reelcast.
 */
import type { Nullable } from "../types/index.js";
import df from "dateformat";
import fs from "node:fs";
import { isDebugEnabled } from "./debugFilter.js";
import path from "node:path";

const { promises: fsPromises } = fs;

/* Log entries are buffered in memory and appended to the log file once a second, so that a burst of transcoder diagnostics never blocks the event loop on disk
 * writes. Every SIZE_CHECK_FREQUENCY entries the real file size is checked; once it exceeds the configured maximum, the file is cut down to the most recent half,
 * on a line boundary, through a temp file and a rename. A failed append disables file logging for a minute instead of reporting the same failure on every line.
 */

// Path to the log file, set during initialization.
let logFilePath: Nullable<string> = null;

// Entries waiting to be flushed.
let writeBuffer: string[] = [];

// Entries written since the last real size check.
let writeCount = 0;

// Timer for periodic buffer flushing.
let flushTimer: Nullable<ReturnType<typeof setInterval>> = null;

// Time at which logging was disabled after a write error, or zero while logging is healthy.
let disabledAt = 0;

// Maximum log file size in bytes.
let maxLogSize = 1048576;

// Interval in milliseconds between buffer flushes.
const FLUSH_INTERVAL_MS = 1000;

// Number of writes between file size checks.
const SIZE_CHECK_FREQUENCY = 100;

// Duration in milliseconds to disable logging after a write error before retrying.
const ERROR_RETRY_DELAY_MS = 60000;

const ANSI_RESET = "\x1b[0m";

/**
 * Initializes the file logger, creating the log file and its directory if needed. File logging is best effort: a failure here is reported on the console and
 * leaves file logging disabled.
 * @param logPath - Absolute path to the log file.
 * @param maxSize - Maximum log file size in bytes.
 */
export async function initializeFileLogger(logPath: string, maxSize: number): Promise<void> {

  maxLogSize = maxSize;

  try {

    await fsPromises.mkdir(path.dirname(logPath), { recursive: true });

    // Opening in append mode creates the file without truncating an existing one.
    const handle = await fsPromises.open(logPath, "a");

    await handle.close();

    logFilePath = logPath;

    flushTimer = setInterval((): void => {

      void flushLogBuffer();
    }, FLUSH_INTERVAL_MS);
  } catch(error) {

    // eslint-disable-next-line no-console
    console.error("Failed to initialize file logger: %s. File logging disabled.", (error instanceof Error) ? error.message : String(error));
  }
}

/**
 * Formats a log entry the way it appears in the file: timestamp, a level tag for anything but info, and the message in the level's color.
 * @param level - Log level.
 * @param message - The formatted log message.
 * @param color - Optional ANSI color code.
 * @param categoryTag - Optional debug category, shown as [DEBUG:category].
 * @param now - Timestamp for the entry.
 * @returns The entry, terminated with a newline.
 */
export function formatLogEntry(level: string, message: string, color?: string, categoryTag?: string, now = new Date()): string {

  const levelTag = categoryTag ? [ level.toUpperCase(), ":", categoryTag ].join("") : level.toUpperCase();
  const levelPrefix = (level === "info") ? "" : [ "[", levelTag, "] " ].join("");

  return [ "[", df(now, "yyyy/mm/dd HH:MM:ss.l"), "] ", color ?? "", levelPrefix, message, color ? ANSI_RESET : "", "\n" ].join("");
}

/**
 * Queues a log entry for the next flush.
 * @param level - Log level ("info", "warn", "error", "debug").
 * @param message - The formatted log message.
 * @param color - Optional ANSI color code to apply to the entry.
 * @param categoryTag - Optional debug category tag.
 */
export function writeLogEntry(level: string, message: string, color?: string, categoryTag?: string): void {

  if(!logFilePath) {

    return;
  }

  if(disabledAt) {

    if((Date.now() - disabledAt) < ERROR_RETRY_DELAY_MS) {

      return;
    }

    disabledAt = 0;
  }

  writeBuffer.push(formatLogEntry(level, message, color, categoryTag));

  if((++writeCount % SIZE_CHECK_FREQUENCY) === 0) {

    void checkAndTrimFile();
  }
}

/**
 * Appends the buffered entries to the log file. Called by the flush timer.
 */
export async function flushLogBuffer(): Promise<void> {

  if(!logFilePath || (writeBuffer.length === 0)) {

    return;
  }

  const content = writeBuffer.join("");

  writeBuffer = [];

  try {

    await fsPromises.appendFile(logFilePath, content, "utf-8");
  } catch(error) {

    disabledAt = Date.now();

    // eslint-disable-next-line no-console
    console.error("Failed to write to log file: %s. File logging disabled for %s seconds.", (error instanceof Error) ? error.message : String(error),
      ERROR_RETRY_DELAY_MS / 1000);
  }
}

/**
 * Flushes the buffer synchronously. Used on exit, where asynchronous work no longer runs.
 */
export function flushLogBufferSync(): void {

  if(!logFilePath || (writeBuffer.length === 0)) {

    return;
  }

  const content = writeBuffer.join("");

  writeBuffer = [];

  try {

    fs.appendFileSync(logFilePath, content, "utf-8");
  } catch(error) {

    // eslint-disable-next-line no-console
    console.error("Failed to write final log entries: %s.", (error instanceof Error) ? error.message : String(error));
  }
}

/**
 * Checks the real file size and trims the file to half the maximum, keeping the most recent complete lines. Trimming is skipped while debug logging is active so
 * a debugging session keeps everything it captured.
 */
async function checkAndTrimFile(): Promise<void> {

  if(!logFilePath) {

    return;
  }

  const currentPath = logFilePath;

  try {

    const stats = await fsPromises.stat(currentPath);

    if((stats.size <= maxLogSize) || isDebugEnabled()) {

      return;
    }

    const content = await fsPromises.readFile(currentPath, "utf-8");
    const cutPosition = content.length - Math.floor(maxLogSize / 2);

    if(cutPosition <= 0) {

      return;
    }

    const newline = content.indexOf("\n", cutPosition);
    const tempPath = currentPath + ".tmp";

    await fsPromises.writeFile(tempPath, content.substring((newline === -1) ? cutPosition : (newline + 1)), "utf-8");
    await fsPromises.rename(tempPath, currentPath);
  } catch(error) {

    // eslint-disable-next-line no-console
    console.warn("Error trimming log file: %s.", (error instanceof Error) ? error.message : String(error));
  }
}

/**
 * Shuts down the file logger, flushing any remaining entries synchronously.
 */
export function shutdownFileLogger(): void {

  if(flushTimer) {

    clearInterval(flushTimer);
    flushTimer = null;
  }

  flushLogBufferSync();

  logFilePath = null;
}
