/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Configuration management for Reelcast.
 */
import type { Config, Nullable } from "../types/index.js";
import { DEFAULTS, type SettingValue, getAllSettings, getNestedValue, loadUserConfig, mergeConfiguration } from "./userConfig.js";
import { getConfigFilePath, getDenylistPath, getLogFilePath, getManifestPath, getOutputDir } from "./paths.js";
import { LOG } from "../utils/index.js";

/*
 * CONFIGURATION
 *
 * The CONFIG object centralizes all tunable parameters for the application. Configuration uses a layered approach with the following priority (highest to lowest):
 *
 * 1. Command-line flags
 * 2. Environment variables (SCREAMING_SNAKE_CASE naming)
 * 3. User config file (<data-dir>/config.json)
 * 4. Hard-coded defaults (defined in userConfig.ts)
 *
 * The settings are organized by functional area:
 *
 * - server: Network binding for the segment server
 * - paths: Media root, output directory, denylist, manifest and log file
 * - inventory: Which files count as media and how they are validated
 * - playback: Supervision mode, item gap, history and status reporting
 * - hls: Segment duration, playlist window and startup wait
 * - transcoder: FFmpeg location and encoder settings
 * - recovery: Liveness window, stop grace period, restart and spawn backoff
 *
 * Configuration is initialized at startup via initializeConfiguration() and validated by validateConfiguration(). If validation fails, the process exits with a
 * message listing every invalid value.
 */

// The CONFIG object is initialized during startup. It starts as a copy of DEFAULTS and is replaced by the merged configuration.
export let CONFIG: Config = structuredClone(DEFAULTS);

/**
 * Initializes the configuration by loading the user config file and merging it with defaults, environment variables and command-line overrides. This must be
 * called at startup, after initializeDataDir(), before any code reads CONFIG.
 * @param cliOverrides - Values from command-line flags, keyed by setting path.
 */
export async function initializeConfiguration(cliOverrides: ReadonlyMap<string, SettingValue> = new Map()): Promise<void> {

  const result = await loadUserConfig(getConfigFilePath());

  CONFIG = mergeConfiguration(result.config, cliOverrides);

  LOG.debug("config", "Configuration initialized from defaults, %s, environment variables and %s command-line overrides.",
    result.parseError ? "an unreadable config file" : getConfigFilePath(), cliOverrides.size);
}

/*
 * CONFIGURATION VALIDATION
 *
 * Before anything starts, every setting is checked against the type, range and valid values recorded in CONFIG_METADATA. All errors are collected so that an
 * operator can fix every problem in one pass.
 */

/**
 * Validates that a configuration value is a positive integer within an optional range. Returns an error message if validation fails, allowing the caller to
 * collect all errors before reporting them.
 * @param name - The configuration name for error messages, typically the environment variable name.
 * @param value - The value to validate.
 * @param min - Optional minimum allowed value (inclusive).
 * @param max - Optional maximum allowed value (inclusive).
 * @returns Error message if invalid, null if valid.
 */
export function validatePositiveInt(name: string, value: number, min?: number, max?: number): Nullable<string> {

  if(!Number.isInteger(value) || (value < 1)) {

    return [ name, " must be a positive integer, got: ", String(value) ].join("");
  }

  return checkRange(name, value, min, max);
}

/**
 * Validates that a configuration value is a non-negative integer within an optional range. Used for delays and jitter, where zero turns the wait off.
 * @param name - The configuration name for error messages.
 * @param value - The value to validate.
 * @param max - Optional maximum allowed value (inclusive).
 * @returns Error message if invalid, null if valid.
 */
export function validateNonNegativeInt(name: string, value: number, max?: number): Nullable<string> {

  if(!Number.isInteger(value) || (value < 0)) {

    return [ name, " must be a non-negative integer, got: ", String(value) ].join("");
  }

  return checkRange(name, value, undefined, max);
}

/**
 * Validates that a configuration value is a positive number (including floats) within an optional range.
 * @param name - The configuration name for error messages.
 * @param value - The value to validate.
 * @param min - Optional minimum allowed value (inclusive).
 * @param max - Optional maximum allowed value (inclusive).
 * @returns Error message if invalid, null if valid.
 */
export function validatePositiveNumber(name: string, value: number, min?: number, max?: number): Nullable<string> {

  if(Number.isNaN(value) || (value <= 0)) {

    return [ name, " must be a positive number, got: ", String(value) ].join("");
  }

  return checkRange(name, value, min, max);
}

/**
 * Checks optional inclusive bounds.
 * @param name - The configuration name for error messages.
 * @param value - The value to check.
 * @param min - Optional minimum.
 * @param max - Optional maximum.
 * @returns Error message if out of range, null otherwise.
 */
function checkRange(name: string, value: number, min?: number, max?: number): Nullable<string> {

  if((min !== undefined) && (value < min)) {

    return [ name, " must be at least ", String(min), ", got: ", String(value) ].join("");
  }

  if((max !== undefined) && (value > max)) {

    return [ name, " must be at most ", String(max), ", got: ", String(value) ].join("");
  }

  return null;
}

/**
 * Validates all configuration values and throws an error if any are invalid.
 * @param config - The configuration to validate.
 * @throws If any configuration value is invalid. The error message lists all invalid values.
 */
export function validateConfiguration(config: Config = CONFIG): void {

  const errors: string[] = [];

  for(const setting of getAllSettings()) {

    const value = getNestedValue(config, setting.path);
    let error: Nullable<string> = null;

    switch(setting.type) {

      case "boolean":

        if(typeof value !== "boolean") {

          error = [ setting.envVar, " must be true or false, got: ", String(value) ].join("");
        }

        break;

      case "float":

        error = (typeof value === "number") ? validatePositiveNumber(setting.envVar, value, setting.min, setting.max) :
          [ setting.envVar, " must be a number, got: ", String(value) ].join("");

        break;

      case "integer":
      case "port":

        if(typeof value !== "number") {

          error = [ setting.envVar, " must be an integer, got: ", String(value) ].join("");
        } else if(setting.min === 0) {

          error = validateNonNegativeInt(setting.envVar, value, setting.max);
        } else {

          error = validatePositiveInt(setting.envVar, value, setting.min, setting.max);
        }

        break;

      case "path":

        // Null means the path is derived from the data directory. Only settings without a computed default must be set.
        if((value === null) && (getNestedValue(DEFAULTS, setting.path) === null)) {

          break;
        }

        if((typeof value !== "string") || (value.length === 0)) {

          error = [ setting.envVar, " must be a path, got: ", String(value) ].join("");
        }

        break;

      default:

        if((typeof value !== "string") || (value.length === 0)) {

          error = [ setting.envVar, " must be a non-empty string, got: ", String(value) ].join("");
        } else if(setting.validValues && !setting.validValues.includes(value)) {

          error = [ setting.envVar, " must be one of ", setting.validValues.join(", "), ", got: ", value ].join("");
        }

        break;
    }

    if(error) {

      errors.push(error);
    }
  }

  if(config.inventory.extensions.split(",").every((extension) => extension.trim().length === 0)) {

    errors.push("MEDIA_EXTENSIONS must list at least one extension.");
  }

  // If any validation errors occurred, throw with the complete list for the operator to fix all issues at once.
  if(errors.length > 0) {

    throw new Error([ "Configuration validation failed:\n  ", errors.join("\n  ") ].join(""));
  }

  // Manifest mode attributes failures to the input FFmpeg reports opening, which it only logs at verbose level and above.
  if((config.playback.mode === "manifest") && [ "quiet", "panic", "fatal", "error", "warning", "info" ].includes(config.transcoder.logLevel)) {

    LOG.warn("FFmpeg log level %s hides input changes. Failing files cannot be identified and will not be denylisted in manifest mode.",
      config.transcoder.logLevel);
  }
}

/**
 * Displays the active configuration at startup, so operators can verify their settings.
 */
export function displayConfiguration(): void {

  LOG.info("Starting Reelcast with configuration:");
  LOG.info("  Server: %s:%s", CONFIG.server.host, CONFIG.server.port);
  LOG.info("  Media directory: %s", CONFIG.paths.mediaDir);
  LOG.info("  Output directory: %s", getOutputDir(CONFIG));
  LOG.info("  Denylist: %s", getDenylistPath(CONFIG));
  LOG.info("  Playback mode: %s", CONFIG.playback.mode);

  if(CONFIG.playback.mode === "manifest") {

    LOG.info("  Manifest: %s", getManifestPath(CONFIG));
  }

  LOG.info("  Encoder: libx264 %s CRF %s, AAC %s kbps", CONFIG.transcoder.videoPreset, CONFIG.transcoder.crf, Math.round(CONFIG.transcoder.audioBitrate / 1000));
  LOG.info("  HLS segment duration: %ss, max segments: %s", CONFIG.hls.segmentDuration, CONFIG.hls.maxSegments);
  LOG.info("  Liveness window: %ss, stop grace period: %ss", CONFIG.recovery.livenessWindow / 1000, CONFIG.recovery.stopGracePeriod / 1000);
  LOG.info("  Log file: %s", getLogFilePath(CONFIG));
}

export * from "./paths.js";
export * from "./userConfig.js";
