/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Entry point for Reelcast.
 */
import { DEBUG_CATEGORIES, LOG, formatError, getPackageVersion, initDebugFilter, setDebugLogging } from "./utils/index.js";
import { formatEnvironmentVariables, initializeDataDir } from "./config/index.js";
import type { PlaybackMode } from "./types/index.js";
import type { StartOptions } from "./app.js";
import { flushLogBufferSync } from "./utils/fileLogger.js";
import path from "node:path";
import { startServer } from "./app.js";

/* These handlers catch unhandled promise rejections and uncaught exceptions so that a single stray error does not end a stream that is otherwise healthy. The
 * handlers log the error and allow the process to continue. Transcoder failures are handled by the supervisor.
 */

process.on("unhandledRejection", (reason: unknown): void => {

  LOG.error("Unhandled promise rejection: %s.", formatError(reason));
});

process.on("uncaughtException", (error: Error): void => {

  LOG.error("Uncaught exception: %s.", formatError(error));
});

/**
 * Prints usage information to the console.
 */
function printUsage(): void {

  /* eslint-disable no-console */
  console.log("Usage: reelcast [options]");
  console.log("");
  console.log("Options:");
  console.log("  -c, --console                   Log to console instead of file (for Docker or debugging)");
  console.log("  -d, --debug                     Enable debug logging (verbose output for troubleshooting)");
  console.log("  -h, --help                      Show this help message");
  console.log("  -m, --media-dir <path>          Set the media directory (default: /media)");
  console.log("  -p, --port <port>               Set server port (default: 8090)");
  console.log("  -v, --version                   Show version number");
  console.log("  --data-dir <path>               Set data directory (default: ~/.reelcast)");
  console.log("  --list-env                      List all environment variables");
  console.log("  --log-file <path>               Set log file path (default: <data-dir>/reelcast.log)");
  console.log("  --mode <per-item|manifest>      Set the playback mode (default: per-item)");
  console.log("");
  console.log("Reelcast scans the media directory, shuffles it, and streams it continuously as HLS at /stream.m3u8.");
  console.log("");
  console.log("Debug categories (REELCAST_DEBUG):");

  for(const entry of DEBUG_CATEGORIES) {

    console.log("  " + entry.category.padEnd(22) + entry.description);
  }

  console.log("");
  console.log("  Run 'reelcast --list-env' for a complete list of all environment variables.");
  /* eslint-enable no-console */
}

/**
 * Prints every environment variable with its description and default.
 */
function printEnvironmentVariables(): void {

  /* eslint-disable no-console */
  console.log("Reelcast Environment Variables");
  console.log("");
  console.log("Priority: CLI flags > environment variables > config.json > defaults.");
  console.log("");

  for(const line of formatEnvironmentVariables()) {

    console.log("  " + line);
  }

  // Special environment variables that are not part of CONFIG_METADATA. REELCAST_DATA_DIR is resolved before config.json is loaded, so it cannot be in
  // config.json. REELCAST_DEBUG is a runtime-only setting parsed here.
  console.log("");
  console.log("Special:");
  console.log("  REELCAST_DATA_DIR    Data directory path. Must be an absolute path. Default: ~/.reelcast.");
  console.log("  REELCAST_DEBUG       Debug category filter (e.g., 'supervisor', 'transcoder:*', '*,-transcoder:stderr'). Default: (disabled).");
  /* eslint-enable no-console */
}

/**
 * Result of parsing command-line arguments. CLI flags have the highest priority in the configuration merge order.
 */
export interface ParsedArgs extends StartOptions {

  dataDir?: string;
  debugLogging: boolean;
}

/**
 * Prints an argument error and exits.
 * @param message - What is wrong.
 */
function exitWithUsageError(message: string): never {

  // eslint-disable-next-line no-console
  console.error("Error: " + message);

  process.exit(1);
}

/**
 * Validates that a path argument is present and absolute. Prints an error and exits otherwise.
 * @param flag - The CLI flag name for the error message.
 * @param value - The path value to validate, or undefined when the flag was the last argument.
 * @returns The path.
 */
function requireAbsolutePath(flag: string, value: string | undefined): string {

  if(!value) {

    exitWithUsageError(flag + " requires a path argument.");
  }

  if(!path.isAbsolute(value)) {

    exitWithUsageError(flag + " requires an absolute path, got: " + value);
  }

  return value;
}

/**
 * Parses command-line arguments into a structured result. Values are stored in ParsedArgs rather than written directly to CONFIG, so that the configuration merge
 * can apply CLI overrides at the correct priority level.
 * @param args - The arguments, without the node executable and script.
 * @returns Parsed argument flags and values.
 */
function parseArgs(args: readonly string[]): ParsedArgs {

  const parsed: ParsedArgs = { consoleLogging: false, debugLogging: false };

  for(let i = 0; i < args.length; i++) {

    const arg = args[i];

    switch(arg) {

      case "-c":
      case "--console": {

        parsed.consoleLogging = true;

        break;
      }

      case "-d":
      case "--debug": {

        parsed.debugLogging = true;

        break;
      }

      case "-h":
      case "--help": {

        printUsage();

        process.exit(0);
      }

      case "-m":
      case "--media-dir": {

        parsed.mediaDir = requireAbsolutePath(arg, args[++i]);

        break;
      }

      case "-p":
      case "--port": {

        const port = Number(args[++i]);

        if(!Number.isInteger(port) || (port < 1) || (port > 65535)) {

          exitWithUsageError(arg + " requires a port number between 1 and 65535.");
        }

        parsed.port = port;

        break;
      }

      case "--mode": {

        const mode = args[++i];

        if(!isPlaybackMode(mode)) {

          exitWithUsageError("--mode must be per-item or manifest.");
        }

        parsed.mode = mode;

        break;
      }

      case "--data-dir": {

        parsed.dataDir = requireAbsolutePath(arg, args[++i]);

        break;
      }

      case "--log-file": {

        parsed.logFile = requireAbsolutePath(arg, args[++i]);

        break;
      }

      case "-v":
      case "--version": {

        // eslint-disable-next-line no-console
        console.log("Reelcast v" + getPackageVersion());

        process.exit(0);
      }

      default: {

        exitWithUsageError("unknown option " + arg + ". Run 'reelcast --help' for usage.");
      }
    }
  }

  return parsed;
}

/**
 * Type guard for the playback mode flag.
 * @param value - The flag value.
 * @returns True for a known mode.
 */
function isPlaybackMode(value: string | undefined): value is PlaybackMode {

  return (value === "manifest") || (value === "per-item");
}

/* The main entry point. --list-env is handled before anything else so that it never starts the service. Everything else parses the arguments, sets up debug
 * logging and starts the service. If startup fails, we exit with a non-zero code to signal the failure to process managers.
 */

const rawArgs = process.argv.slice(2);

if(rawArgs.includes("--list-env")) {

  printEnvironmentVariables();

  process.exit(0);
}

const parsedArgs = parseArgs(rawArgs);

try {

  initializeDataDir(parsedArgs.dataDir);
} catch(error) {

  exitWithUsageError(formatError(error));
}

// REELCAST_DEBUG takes precedence over the --debug CLI flag, allowing fine-grained category selection.
const debugEnv = process.env.REELCAST_DEBUG;

if(debugEnv) {

  const unknownCategories = initDebugFilter(debugEnv);

  if(unknownCategories.length) {

    // eslint-disable-next-line no-console
    console.warn("Warning: REELCAST_DEBUG names unknown debug categories: " + unknownCategories.join(", ") + ". Run 'reelcast --help' for the list.");
  }
} else if(parsedArgs.debugLogging) {

  setDebugLogging(true);
}

// The 'exit' event runs synchronously. Buffered log entries from a fatal exit that bypassed graceful shutdown are written here.
process.on("exit", (): void => {

  flushLogBufferSync();
});

startServer(parsedArgs).catch((error: unknown): void => {

  LOG.error("Fatal startup error occurred: %s.", formatError(error));

  process.exit(1);
});
