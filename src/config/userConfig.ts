/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * userConfig.ts: User configuration file management for Reelcast.
 */
import type { Config, Nullable } from "../types/index.js";
import { LOG, formatError } from "../utils/index.js";
import fs from "node:fs";

const { promises: fsPromises } = fs;

/*
 * USER CONFIGURATION FILE
 *
 * Reelcast reads optional user configuration from config.json in its data directory. The configuration system uses a layered approach:
 *
 * 1. Hard-coded defaults (defined in DEFAULTS)
 * 2. User config file (<data-dir>/config.json)
 * 3. Environment variables
 * 4. Command-line flags (highest priority)
 *
 * Container deployments typically use environment variables alone, while standalone installations can keep their settings in the config file.
 */

/*
 * SETTING METADATA
 *
 * Each configurable setting has metadata describing its type, valid range, environment variable name, and description. The merge step uses the type to coerce
 * values from the config file and the environment, validateConfiguration() uses the ranges and valid values, and --list-env prints the whole table.
 */

/**
 * Metadata describing a single configuration setting. Default values are not stored here. Use getNestedValue(DEFAULTS, setting.path) to get the default value
 * for a setting.
 */
export interface SettingMetadata {

  // Human-readable description shown by --list-env.
  description: string;

  // Environment variable that can override this setting.
  envVar: string;

  // Maximum allowed value for numeric settings.
  max?: number;

  // Minimum allowed value for numeric settings. Numeric settings without a minimum must be at least 1.
  min?: number;

  // Dot-separated path to the setting (e.g., "recovery.livenessWindow").
  path: string;

  // Data type for coercion and validation.
  type: "boolean" | "float" | "host" | "integer" | "path" | "port" | "string";

  // Valid values for string type settings.
  validValues?: string[];

  // Unit of measurement shown by --list-env (e.g., "ms", "bps").
  unit?: string;
}

/**
 * Metadata for all configurable settings, organized by category.
 */
export const CONFIG_METADATA: Record<string, SettingMetadata[]> = {

  hls: [
    {

      description: "Maximum number of segments listed in the playlist.",
      envVar: "HLS_MAX_SEGMENTS",
      max: 60,
      min: 3,
      path: "hls.maxSegments",
      type: "integer"
    },
    {

      description: "Target duration of each HLS segment.",
      envVar: "HLS_SEGMENT_DURATION",
      max: 30,
      min: 1,
      path: "hls.segmentDuration",
      type: "integer",
      unit: "seconds"
    },
    {

      description: "Time to wait for the first playlist before warning that the transcoder is not producing output.",
      envVar: "STARTUP_TIMEOUT",
      max: 600000,
      min: 1000,
      path: "hls.startupTimeout",
      type: "integer",
      unit: "ms"
    }
  ],

  inventory: [
    {

      description: "Comma-separated list of media file extensions, without the dot.",
      envVar: "MEDIA_EXTENSIONS",
      path: "inventory.extensions",
      type: "string"
    },
    {

      description: "Minimum playable duration. Shorter files are excluded.",
      envVar: "MIN_DURATION",
      max: 86400,
      min: 1,
      path: "inventory.minDuration",
      type: "integer",
      unit: "seconds"
    },
    {

      description: "Minimum file size. Smaller files are skipped without probing.",
      envVar: "MIN_FILE_SIZE",
      min: 1,
      path: "inventory.minFileSize",
      type: "integer",
      unit: "bytes"
    },
    {

      description: "Time allowed for probing a single file.",
      envVar: "PROBE_TIMEOUT",
      max: 120000,
      min: 1000,
      path: "inventory.probeTimeout",
      type: "integer",
      unit: "ms"
    }
  ],

  logging: [
    {

      description: "HTTP request logging: none, errors (4xx and 5xx only) or all.",
      envVar: "HTTP_LOG_LEVEL",
      path: "logging.httpLogLevel",
      type: "string",
      validValues: [ "all", "errors", "none" ]
    },
    {

      description: "Maximum log file size before it is trimmed.",
      envVar: "LOG_MAX_SIZE",
      max: 104857600,
      min: 10240,
      path: "logging.maxSize",
      type: "integer",
      unit: "bytes"
    }
  ],

  paths: [
    {

      description: "Denylist file. Defaults to denylist.txt in the data directory.",
      envVar: "DENYLIST_FILE",
      path: "paths.denylistFile",
      type: "path"
    },
    {

      description: "Log file. Defaults to reelcast.log in the data directory.",
      envVar: "REELCAST_LOG_FILE",
      path: "paths.logFile",
      type: "path"
    },
    {

      description: "Concat manifest written in manifest mode. Defaults to playlist.txt in the data directory.",
      envVar: "MANIFEST_FILE",
      path: "paths.manifestFile",
      type: "path"
    },
    {

      description: "Root directory scanned for media.",
      envVar: "MEDIA_DIR",
      path: "paths.mediaDir",
      type: "path"
    },
    {

      description: "Directory receiving the playlist and segments. Defaults to hls in the data directory.",
      envVar: "OUTPUT_DIR",
      path: "paths.outputDir",
      type: "path"
    }
  ],

  playback: [
    {

      description: "Clear the play history when a new shuffle cycle begins.",
      envVar: "CLEAR_HISTORY_ON_RESHUFFLE",
      path: "playback.clearHistoryOnReshuffle",
      type: "boolean"
    },
    {

      description: "Maximum number of play history entries retained.",
      envVar: "HISTORY_LIMIT",
      max: 100000,
      min: 5,
      path: "playback.historyLimit",
      type: "integer"
    },
    {

      description: "Idle gap between items in per-item mode.",
      envVar: "ITEM_GAP",
      max: 60000,
      min: 0,
      path: "playback.itemGap",
      type: "integer",
      unit: "ms"
    },
    {

      description: "Supervision strategy: per-item runs one transcoder per file, manifest runs one looping transcoder over a concat manifest.",
      envVar: "PLAYBACK_MODE",
      path: "playback.mode",
      type: "string",
      validValues: [ "manifest", "per-item" ]
    },
    {

      description: "Interval between status reports.",
      envVar: "STATUS_INTERVAL",
      max: 3600000,
      min: 5000,
      path: "playback.statusInterval",
      type: "integer",
      unit: "ms"
    }
  ],

  recovery: [
    {

      description: "Maximum random jitter added to restart and retry delays.",
      envVar: "BACKOFF_JITTER",
      max: 60000,
      min: 0,
      path: "recovery.backoffJitter",
      type: "integer",
      unit: "ms"
    },
    {

      description: "Critical decoder errors within one run that trigger a denylist-and-restart.",
      envVar: "CRITICAL_ERROR_THRESHOLD",
      max: 100,
      min: 1,
      path: "recovery.criticalErrorThreshold",
      type: "integer"
    },
    {

      description: "Maximum time without a progress report before a running transcoder is considered hung.",
      envVar: "LIVENESS_WINDOW",
      max: 600000,
      min: 5000,
      path: "recovery.livenessWindow",
      type: "integer",
      unit: "ms"
    },
    {

      description: "Cap for the exponential spawn retry backoff.",
      envVar: "MAX_BACKOFF_DELAY",
      max: 300000,
      min: 100,
      path: "recovery.maxBackoffDelay",
      type: "integer",
      unit: "ms"
    },
    {

      description: "Consecutive hangs on the same item before per-item mode moves on.",
      envVar: "MAX_HANG_RESTARTS",
      max: 100,
      min: 1,
      path: "recovery.maxHangRestarts",
      type: "integer"
    },
    {

      description: "Attempts to start the transcoder before giving up.",
      envVar: "MAX_SPAWN_ATTEMPTS",
      max: 100,
      min: 1,
      path: "recovery.maxSpawnAttempts",
      type: "integer"
    },
    {

      description: "Base delay before restarting after a failed or hung run.",
      envVar: "RESTART_DELAY",
      max: 300000,
      min: 0,
      path: "recovery.restartDelay",
      type: "integer",
      unit: "ms"
    },
    {

      description: "Time a transcoder gets to exit after SIGTERM before it is sent SIGKILL.",
      envVar: "STOP_GRACE_PERIOD",
      max: 120000,
      min: 100,
      path: "recovery.stopGracePeriod",
      type: "integer",
      unit: "ms"
    }
  ],

  server: [
    {

      description: "Address the HTTP server binds to.",
      envVar: "HOST",
      path: "server.host",
      type: "host"
    },
    {

      description: "TCP port the HTTP server listens on.",
      envVar: "PORT",
      max: 65535,
      min: 1,
      path: "server.port",
      type: "port"
    }
  ],

  transcoder: [
    {

      description: "AAC audio bitrate.",
      envVar: "AUDIO_BITRATE",
      max: 512000,
      min: 32000,
      path: "transcoder.audioBitrate",
      type: "integer",
      unit: "bps"
    },
    {

      description: "Audio sample rate.",
      envVar: "AUDIO_SAMPLE_RATE",
      max: 96000,
      min: 8000,
      path: "transcoder.audioSampleRate",
      type: "integer",
      unit: "Hz"
    },
    {

      description: "libx264 constant rate factor. Lower is better quality.",
      envVar: "VIDEO_CRF",
      max: 51,
      min: 0,
      path: "transcoder.crf",
      type: "integer"
    },
    {

      description: "Path to the ffmpeg executable. Leave empty to search the system PATH.",
      envVar: "FFMPEG_PATH",
      path: "transcoder.ffmpegPath",
      type: "path"
    },
    {

      description: "Path to the ffprobe executable. Leave empty to search the system PATH.",
      envVar: "FFPROBE_PATH",
      path: "transcoder.ffprobePath",
      type: "path"
    },
    {

      description: "Frames between forced keyframes.",
      envVar: "KEYFRAME_INTERVAL",
      max: 600,
      min: 1,
      path: "transcoder.keyframeInterval",
      type: "integer",
      unit: "frames"
    },
    {

      description: "FFmpeg log level. Manifest mode needs verbose or higher to attribute failures to a file.",
      envVar: "FFMPEG_LOG_LEVEL",
      path: "transcoder.logLevel",
      type: "string",
      validValues: [ "quiet", "panic", "fatal", "error", "warning", "info", "verbose", "debug", "trace" ]
    },
    {

      description: "libx264 speed preset.",
      envVar: "VIDEO_PRESET",
      path: "transcoder.videoPreset",
      type: "string",
      validValues: [ "ultrafast", "superfast", "veryfast", "faster", "fast", "medium", "slow", "slower", "veryslow" ]
    }
  ]
};

/**
 * Returns every setting in CONFIG_METADATA as a flat list.
 * @returns All settings, in category order.
 */
export function getAllSettings(): SettingMetadata[] {

  return Object.values(CONFIG_METADATA).flat();
}

/**
 * Hard-coded default configuration values. These are the baseline values used when neither the config file, the environment nor the command line provide one.
 */
export const DEFAULTS: Config = {

  hls: {

    maxSegments: 12,
    segmentDuration: 4,
    startupTimeout: 30000
  },

  inventory: {

    extensions: "mp4,m4v,mkv,mov,avi,webm",
    minDuration: 60,
    minFileSize: 1048576,
    probeTimeout: 10000
  },

  logging: {

    httpLogLevel: "errors",
    maxSize: 1048576
  },

  paths: {

    denylistFile: null,
    logFile: null,
    manifestFile: null,
    mediaDir: "/media",
    outputDir: null
  },

  playback: {

    clearHistoryOnReshuffle: false,
    historyLimit: 100,
    itemGap: 2000,
    mode: "per-item",
    statusInterval: 60000
  },

  recovery: {

    backoffJitter: 1000,
    criticalErrorThreshold: 1,
    livenessWindow: 45000,
    maxBackoffDelay: 10000,
    maxHangRestarts: 3,
    maxSpawnAttempts: 5,
    restartDelay: 2000,
    stopGracePeriod: 5000
  },

  server: {

    host: "0.0.0.0",
    port: 8090
  },

  transcoder: {

    audioBitrate: 128000,
    audioSampleRate: 44100,
    crf: 26,
    ffmpegPath: null,
    ffprobePath: null,
    keyframeInterval: 60,
    logLevel: "verbose",
    videoPreset: "veryfast"
  }
};

/**
 * The contents of config.json. Values are untrusted until mergeConfiguration() has coerced them against CONFIG_METADATA.
 */
export type UserConfig = Record<string, unknown>;

/**
 * Result of loading the user config file.
 */
export interface UserConfigLoadResult {

  // The loaded configuration (empty object if the file is missing or unreadable).
  config: UserConfig;

  // True if the config file exists but does not contain a JSON object.
  parseError: boolean;

  // Error message if parseError is true.
  parseErrorMessage?: string;
}

/**
 * Type guard for plain objects, used when walking untrusted configuration trees.
 * @param value - The value to check.
 * @returns True if the value is a non-null, non-array object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {

  return (value !== null) && (typeof value === "object") && !Array.isArray(value);
}

/*
 * CONFIG FILE OPERATIONS
 */

/**
 * Loads user configuration from the config file. Returns an empty config if the file doesn't exist, and sets parseError if the file exists but does not contain a
 * JSON object.
 * @param configFilePath - Absolute path to config.json.
 * @returns The loaded configuration with parse status.
 */
export async function loadUserConfig(configFilePath: string): Promise<UserConfigLoadResult> {

  let content: string;

  try {

    content = await fsPromises.readFile(configFilePath, "utf-8");
  } catch(error) {

    // File doesn't exist - this is normal, use defaults.
    if(isRecord(error) && (error.code === "ENOENT")) {

      return { config: {}, parseError: false };
    }

    LOG.warn("Failed to read configuration file %s: %s. Using defaults.", configFilePath, formatError(error));

    return { config: {}, parseError: false };
  }

  let parsed: unknown;

  try {

    parsed = JSON.parse(content);
  } catch(parseError) {

    const message = formatError(parseError);

    LOG.warn("Invalid JSON in configuration file %s: %s. Using defaults.", configFilePath, message);

    return { config: {}, parseError: true, parseErrorMessage: message };
  }

  if(!isRecord(parsed)) {

    LOG.warn("Configuration file %s does not contain a JSON object. Using defaults.", configFilePath);

    return { config: {}, parseError: true, parseErrorMessage: "Expected a JSON object." };
  }

  return { config: parsed, parseError: false };
}

/*
 * CONFIGURATION MERGING
 *
 * These functions merge defaults, the user config, environment overrides and command-line overrides into the final CONFIG object.
 */

/**
 * A value a setting can hold once coerced.
 */
export type SettingValue = Nullable<boolean | number | string>;

/**
 * Coerces a raw value from the config file or the environment to the setting's type. Strings are parsed for numeric and boolean settings, so the same function
 * serves both sources. An empty string or null clears a path setting back to its computed default.
 * @param value - The raw value.
 * @param type - The expected type of the setting.
 * @returns The coerced value, or undefined if the value cannot represent the type.
 */
export function parseSettingValue(value: unknown, type: SettingMetadata["type"]): SettingValue | undefined {

  switch(type) {

    case "boolean": {

      if(typeof value === "boolean") {

        return value;
      }

      if(typeof value !== "string") {

        return undefined;
      }

      // Accept common truthy values for environment variables.
      const lower = value.toLowerCase();

      return (lower === "true") || (lower === "1") || (lower === "yes");
    }

    case "float":
    case "integer":
    case "port": {

      if(typeof value === "number") {

        return value;
      }

      if((typeof value !== "string") || (value.trim().length === 0)) {

        return undefined;
      }

      const num = (type === "float") ? parseFloat(value) : parseInt(value, 10);

      return Number.isNaN(num) ? undefined : num;
    }

    case "path": {

      if((value === null) || (value === "")) {

        return null;
      }

      return (typeof value === "string") ? value : undefined;
    }

    default: {

      return (typeof value === "string") ? value : undefined;
    }
  }
}

/**
 * Gets a value from a nested object using a dot-separated path.
 * @param obj - The object to read from.
 * @param settingPath - Dot-separated path (e.g., "recovery.livenessWindow").
 * @returns The value at the path, or undefined if not found.
 */
export function getNestedValue(obj: unknown, settingPath: string): unknown {

  let current: unknown = obj;

  for(const part of settingPath.split(".")) {

    if(!isRecord(current)) {

      return undefined;
    }

    current = current[part];
  }

  return current;
}

/**
 * Sets a value in a nested object using a dot-separated path, creating intermediate objects as needed.
 * @param obj - The object to modify.
 * @param settingPath - Dot-separated path (e.g., "recovery.livenessWindow").
 * @param value - The value to set.
 */
export function setNestedValue(obj: Record<string, unknown>, settingPath: string, value: unknown): void {

  const parts = settingPath.split(".");
  const last = parts.pop();
  let current = obj;

  if(last === undefined) {

    return;
  }

  for(const part of parts) {

    const next = current[part];

    if(isRecord(next)) {

      current = next;

      continue;
    }

    const created: Record<string, unknown> = {};

    current[part] = created;
    current = created;
  }

  current[last] = value;
}

/**
 * Merges the user configuration with defaults, environment overrides and command-line overrides to produce the final configuration. Priority: CLI flags > env
 * vars > user config > defaults. Values that cannot be coerced to a setting's type are logged and ignored; ranges are checked afterwards by
 * validateConfiguration().
 * @param userConfig - User configuration from the config file.
 * @param cliOverrides - Values from command-line flags, keyed by setting path.
 * @param env - Environment to read overrides from.
 * @returns The merged configuration.
 */
export function mergeConfiguration(userConfig: UserConfig, cliOverrides: ReadonlyMap<string, SettingValue> = new Map(),
  env: NodeJS.ProcessEnv = process.env): Config {

  const config = structuredClone(DEFAULTS);

  // The guard always holds for a Config. It gives us an index signature to write setting paths through.
  if(!isRecord(config)) {

    return config;
  }

  for(const setting of getAllSettings()) {

    const userValue = getNestedValue(userConfig, setting.path);

    if(userValue !== undefined) {

      const parsedValue = parseSettingValue(userValue, setting.type);

      if(parsedValue === undefined) {

        LOG.warn("Ignoring invalid value for %s in the configuration file: %s.", setting.path, JSON.stringify(userValue));
      } else {

        setNestedValue(config, setting.path, parsedValue);
      }
    }

    const envValue = env[setting.envVar];

    if(envValue !== undefined) {

      const parsedValue = parseSettingValue(envValue, setting.type);

      if(parsedValue === undefined) {

        LOG.warn("Ignoring invalid value for %s: %s.", setting.envVar, envValue);
      } else {

        LOG.debug("config", "%s set from %s.", setting.path, setting.envVar);
        setNestedValue(config, setting.path, parsedValue);
      }
    }

    const cliValue = cliOverrides.get(setting.path);

    if(cliValue !== undefined) {

      LOG.debug("config", "%s set from the command line.", setting.path);
      setNestedValue(config, setting.path, cliValue);
    }
  }

  return config;
}

/**
 * Formats every environment variable with its default and description, for --list-env.
 * @returns One line per setting.
 */
export function formatEnvironmentVariables(): string[] {

  const settings = getAllSettings();
  const width = Math.max(...settings.map((setting) => setting.envVar.length));

  return settings.map((setting) => {

    const defaultValue = getNestedValue(DEFAULTS, setting.path);
    const shownDefault = (defaultValue === null) ? "(computed)" : String(defaultValue) + (setting.unit ? " " + setting.unit : "");

    return [ setting.envVar.padEnd(width), "  ", setting.description, " Default: ", shownDefault, "." ].join("");
  });
}
