/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * paths.ts: Centralized filesystem path resolution for Reelcast.
 */
import type { Config } from "../types/index.js";
import os from "node:os";
import path from "node:path";

/* This module is the single source of truth for the filesystem paths Reelcast writes to. The data directory is resolved once at startup via initializeDataDir(),
 * before config.json is loaded, because the data directory determines where config.json lives.
 *
 * Resolution priority for the data directory (highest to lowest):
 *   1. CLI flag (--data-dir)
 *   2. Environment variable (REELCAST_DATA_DIR)
 *   3. Default (~/.reelcast)
 *
 * The output directory, denylist, manifest and log file are stored in Config (settable via config.json, env var, or CLI flag). When unset they live inside the
 * data directory.
 */

// The resolved data directory, initialized once at startup. All path getters depend on this value.
let resolvedDataDir: string | undefined;

/**
 * Initializes the data directory from the CLI flag, environment variable, or default.
 * @param cliDataDir - Optional data directory from the --data-dir CLI flag.
 * @throws If REELCAST_DATA_DIR is set to a relative path.
 */
export function initializeDataDir(cliDataDir?: string): void {

  const envDataDir = process.env.REELCAST_DATA_DIR;

  if(cliDataDir) {

    resolvedDataDir = path.resolve(cliDataDir);
  } else if(envDataDir) {

    if(!path.isAbsolute(envDataDir)) {

      throw new Error("REELCAST_DATA_DIR must be an absolute path, got: " + envDataDir);
    }

    resolvedDataDir = envDataDir;
  } else {

    resolvedDataDir = path.join(os.homedir(), ".reelcast");
  }
}

/**
 * Returns the resolved data directory. Throws if called before initializeDataDir().
 * @returns The absolute path to the data directory.
 */
export function getDataDir(): string {

  if(!resolvedDataDir) {

    throw new Error("Data directory not initialized. Call initializeDataDir() first.");
  }

  return resolvedDataDir;
}

/**
 * Returns the path to the user configuration file.
 * @returns The absolute path to config.json inside the data directory.
 */
export function getConfigFilePath(): string {

  return path.join(getDataDir(), "config.json");
}

/**
 * Returns the directory the transcoder writes the playlist and segments to, and the segment server reads from.
 * @param config - The application configuration.
 * @returns The absolute path to the output directory.
 */
export function getOutputDir(config: Config): string {

  return path.resolve(config.paths.outputDir ?? path.join(getDataDir(), "hls"));
}

/**
 * Returns the denylist file path.
 * @param config - The application configuration.
 * @returns The absolute path to the denylist file.
 */
export function getDenylistPath(config: Config): string {

  return path.resolve(config.paths.denylistFile ?? path.join(getDataDir(), "denylist.txt"));
}

/**
 * Returns the path of the concat manifest written in manifest mode.
 * @param config - The application configuration.
 * @returns The absolute path to the manifest.
 */
export function getManifestPath(config: Config): string {

  return path.resolve(config.paths.manifestFile ?? path.join(getDataDir(), "playlist.txt"));
}

/**
 * Returns the log file path.
 * @param config - The application configuration.
 * @returns The absolute path to the log file.
 */
export function getLogFilePath(config: Config): string {

  return path.resolve(config.paths.logFile ?? path.join(getDataDir(), "reelcast.log"));
}
