/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Type definitions for Reelcast.
 */

/**
 * A utility type that represents a value that can be null.
 * @typeParam T - The type that can be nullable.
 */
export type Nullable<T> = T | null;

/*
 * CONFIGURATION TYPES
 *
 * These interfaces define the structure of the application configuration. The Config interface is the root configuration object, with nested interfaces for each
 * functional area. Values come from defaults, the user config file, environment variables and CLI flags, and are validated at startup before anything starts.
 */

/**
 * HLS output configuration handed to the transcoder.
 */
export interface HLSConfig {

  // Maximum number of segments listed in the playlist. Older segments are deleted by the transcoder as new ones appear, giving a rolling window of
  // maxSegments * segmentDuration seconds. Environment variable: HLS_MAX_SEGMENTS. Default: 12.
  maxSegments: number;

  // Target duration of each segment in seconds. Environment variable: HLS_SEGMENT_DURATION. Default: 4.
  segmentDuration: number;

  // Time in milliseconds to wait for the first playlist to appear after startup before warning that the transcoder is not producing output. Environment
  // variable: STARTUP_TIMEOUT. Default: 30000ms.
  startupTimeout: number;
}

/**
 * Media library scanning and validation thresholds.
 */
export interface InventoryConfig {

  // Comma-separated list of file extensions (without the dot) considered to be media. Matching is case-insensitive. Environment variable: MEDIA_EXTENSIONS.
  extensions: string;

  // Minimum playable duration in seconds. Shorter files (bumpers, samples, truncated downloads) are excluded. Environment variable: MIN_DURATION. Default: 60.
  minDuration: number;

  // Minimum file size in bytes. Files below this size are skipped without probing. Environment variable: MIN_FILE_SIZE. Default: 1048576 (1 MiB).
  minFileSize: number;

  // Time in milliseconds allowed for a single ffprobe run. A probe that exceeds it marks the file invalid. Environment variable: PROBE_TIMEOUT. Default: 10000ms.
  probeTimeout: number;
}

/**
 * Logging configuration.
 */
export interface LoggingConfig {

  // HTTP request logging level. "none" disables it, "errors" logs only 4xx and 5xx responses, "all" logs every request. Segment polling is frequent, so "all" is
  // noisy. Environment variable: HTTP_LOG_LEVEL. Default: "errors".
  httpLogLevel: "all" | "errors" | "none";

  // Maximum log file size in bytes before it is trimmed to half. Environment variable: LOG_MAX_SIZE. Default: 1048576.
  maxSize: number;
}

/**
 * Filesystem locations. Null values resolve to defaults inside the data directory at runtime (see config/paths.ts).
 */
export interface PathsConfig {

  // Denylist file listing media that crashed the transcoder. Environment variable: DENYLIST_FILE.
  denylistFile: Nullable<string>;

  // Log file path. Environment variable: REELCAST_LOG_FILE.
  logFile: Nullable<string>;

  // Concat manifest written in manifest mode. Environment variable: MANIFEST_FILE.
  manifestFile: Nullable<string>;

  // Root directory scanned for media. Environment variable: MEDIA_DIR. Default: /media.
  mediaDir: string;

  // Directory receiving the playlist and segments, and served over HTTP. Environment variable: OUTPUT_DIR.
  outputDir: Nullable<string>;
}

/**
 * The two supervision strategies. "per-item" runs one transcoder per media file. "manifest" runs a single looping transcoder over a concat manifest.
 */
export type PlaybackMode = "manifest" | "per-item";

/**
 * Sequencing and reporting configuration.
 */
export interface PlaybackConfig {

  // Whether the play history is cleared when a new shuffle cycle begins. Retaining it gives better diagnostics; it is capped by historyLimit either way.
  // Environment variable: CLEAR_HISTORY_ON_RESHUFFLE. Default: false.
  clearHistoryOnReshuffle: boolean;

  // Maximum number of history entries retained. Environment variable: HISTORY_LIMIT. Default: 100.
  historyLimit: number;

  // Idle gap in milliseconds between items in per-item mode. Environment variable: ITEM_GAP. Default: 2000ms.
  itemGap: number;

  // Supervision strategy. Environment variable: PLAYBACK_MODE. Default: "per-item".
  mode: PlaybackMode;

  // Interval in milliseconds between status reports. Environment variable: STATUS_INTERVAL. Default: 60000ms.
  statusInterval: number;
}

/**
 * Failure detection and recovery timing for the transcoder.
 */
export interface RecoveryConfig {

  // Maximum random jitter in milliseconds added to restart and retry delays. Environment variable: BACKOFF_JITTER. Default: 1000ms.
  backoffJitter: number;

  // Number of critical decoder errors within one run that triggers a denylist-and-restart. Environment variable: CRITICAL_ERROR_THRESHOLD. Default: 1.
  criticalErrorThreshold: number;

  // Maximum time in milliseconds without a progress report from a live transcoder before it is considered hung and killed. Environment variable:
  // LIVENESS_WINDOW. Default: 45000ms.
  livenessWindow: number;

  // Cap in milliseconds for the exponential spawn retry backoff. Environment variable: MAX_BACKOFF_DELAY. Default: 10000ms.
  maxBackoffDelay: number;

  // Consecutive hangs on the same item before per-item mode moves on to the next item. Environment variable: MAX_HANG_RESTARTS. Default: 3.
  maxHangRestarts: number;

  // Attempts to spawn the transcoder before giving up and exiting. Environment variable: MAX_SPAWN_ATTEMPTS. Default: 5.
  maxSpawnAttempts: number;

  // Base delay in milliseconds before restarting after a failed or hung run. Environment variable: RESTART_DELAY. Default: 2000ms.
  restartDelay: number;

  // Time in milliseconds a transcoder gets to exit after SIGTERM before it is sent SIGKILL. Environment variable: STOP_GRACE_PERIOD. Default: 5000ms.
  stopGracePeriod: number;
}

/**
 * HTTP server binding.
 */
export interface ServerConfig {

  // Environment variable: HOST. Default: 0.0.0.0.
  host: string;

  // Environment variable: PORT. Default: 8090.
  port: number;
}

/**
 * Encoder settings passed to FFmpeg.
 */
export interface TranscoderConfig {

  // AAC audio bitrate in bits per second. Environment variable: AUDIO_BITRATE. Default: 128000.
  audioBitrate: number;

  // Audio sample rate in Hz. Environment variable: AUDIO_SAMPLE_RATE. Default: 44100.
  audioSampleRate: number;

  // libx264 constant rate factor. Lower is better quality and more bits. Environment variable: VIDEO_CRF. Default: 26.
  crf: number;

  // Path to the ffmpeg executable, or null to search the system PATH. Environment variable: FFMPEG_PATH.
  ffmpegPath: Nullable<string>;

  // Path to the ffprobe executable, or null to search the system PATH. Environment variable: FFPROBE_PATH.
  ffprobePath: Nullable<string>;

  // Frames between forced keyframes. Segments can only be cut on keyframes. Environment variable: KEYFRAME_INTERVAL. Default: 60.
  keyframeInterval: number;

  // FFmpeg log level. Input attribution in manifest mode depends on "Opening ... for reading" lines, which FFmpeg emits at verbose. Environment variable:
  // FFMPEG_LOG_LEVEL. Default: "verbose".
  logLevel: string;

  // libx264 speed preset. Environment variable: VIDEO_PRESET. Default: "veryfast".
  videoPreset: string;
}

/**
 * The root configuration object.
 */
export interface Config {

  hls: HLSConfig;
  inventory: InventoryConfig;
  logging: LoggingConfig;
  paths: PathsConfig;
  playback: PlaybackConfig;
  recovery: RecoveryConfig;
  server: ServerConfig;
  transcoder: TranscoderConfig;
}

/*
 * MEDIA TYPES
 */

/**
 * A validated media file. Identity is the path. Items are frozen once the inventory is built.
 */
export interface MediaItem {

  durationSeconds: Nullable<number>;
  path: string;
  sizeBytes: number;
}

/**
 * The validated set of media produced by the inventory scan.
 */
export type ValidatedInventory = readonly MediaItem[];

/**
 * An ordered concat manifest written for manifest mode.
 */
export interface PlaylistManifest {

  generatedAt: Date;
  items: readonly MediaItem[];
  path: string;
}

/**
 * The unit of work handed to a transcoder run: one media item in per-item mode, or a whole manifest in manifest mode.
 */
export type RunTarget =
  { item: MediaItem; kind: "item" } |
  { kind: "manifest"; manifest: PlaylistManifest };

/**
 * Health status returned by the /health endpoint.
 */
export interface HealthStatus {

  cycle: number;
  mode: PlaybackMode;
  nowPlaying: Nullable<string>;
  played: number;
  remaining: number;
  restarts: number;
  run: Nullable<{ id: string; startedAt: string; state: string }>;
  status: "playing" | "starting" | "stopped";
  timestamp: string;
  uptime: number;
  version: string;
}
