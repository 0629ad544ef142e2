/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * ffmpeg.ts: FFmpeg process management for HLS transcoding.
 */
import type { HLSConfig, Nullable, RunTarget, TranscoderConfig } from "../types/index.js";
import { LOG } from "./logger.js";
import { ProcessSpawnError } from "./errors.js";
import type { Readable } from "node:stream";
import { join } from "node:path";
import { spawn } from "node:child_process";

/*
 * FFMPEG TRANSCODING
 *
 * Every run is a single FFmpeg process that reads its input in real time (-re), encodes H264 video and AAC audio, and writes an HLS playlist with MPEG-TS
 * segments into the output directory. The segment server only ever reads those files; it has no connection to the process.
 *
 * There are two kinds of input:
 *
 * - A single media file, in per-item mode. The playlist carries omit_endlist so that players keep polling while the next item is being started.
 * - A concat manifest looped forever with -stream_loop -1, in manifest mode. FFmpeg moves from file to file on its own and logs "Opening '<path>' for reading" at
 *   verbose level each time, which is how the supervisor knows which input is current.
 *
 * Stdin and stdout are ignored. Stderr carries the diagnostics (-stats progress lines and log output) and is handed to the supervisor as a stream.
 */

// Output file names inside the output directory. The segment server only serves names of this shape.
export const PLAYLIST_FILE_NAME = "stream.m3u8";
export const SEGMENT_FILE_PATTERN = "stream%d.ts";

/**
 * How a transcoder process ended.
 */
export interface TranscoderExit {

  code: Nullable<number>;
  signal: Nullable<NodeJS.Signals>;
}

/**
 * A running transcoder process, as seen by the supervisor.
 */
export interface TranscoderProcess {

  // Diagnostic output. Ends when the process has exited and its stderr is drained.
  diagnostics: Readable;

  // Resolves once the process has exited and its stdio has closed. Never rejects.
  exited: Promise<TranscoderExit>;

  // Sends SIGKILL.
  kill: () => void;

  // Operating system process ID, when known.
  pid: number | undefined;

  // Sends SIGTERM.
  terminate: () => void;
}

/**
 * Starts transcoder processes. The supervisor depends on this interface only, so tests can substitute an in-process fake.
 */
export interface TranscoderEngine {

  /**
   * Starts a transcoder for the given target.
   * @param target - The media item or manifest to encode.
   * @returns The running process, once the operating system has started it.
   * @throws ProcessSpawnError if the process could not be started.
   */
  start: (target: RunTarget) => Promise<TranscoderProcess>;
}

/**
 * Settings that shape the FFmpeg command line.
 */
export interface TranscoderArgsOptions {

  hls: HLSConfig;
  outputDir: string;
  transcoder: TranscoderConfig;
}

/**
 * Builds the FFmpeg argument list for a run target.
 * @param target - The media item or manifest to encode.
 * @param options - Encoder and HLS settings, and the output directory.
 * @returns The argument list, without the executable.
 */
export function buildTranscoderArgs(target: RunTarget, options: TranscoderArgsOptions): string[] {

  const { hls, outputDir, transcoder } = options;

  const inputArgs = (target.kind === "item") ?
    [ "-re", "-i", target.item.path ] :
    [ "-re", "-f", "concat", "-safe", "0", "-stream_loop", "-1", "-i", target.manifest.path ];

  // A single item ends, and players must not treat that as the end of the channel. The looping manifest never ends on its own.
  const hlsFlags = (target.kind === "item") ? "delete_segments+independent_segments+omit_endlist" : "delete_segments+independent_segments";

  return [
    "-hide_banner",
    "-loglevel", transcoder.logLevel,
    "-stats",
    ...inputArgs,
    "-map", "0:v:0",
    "-map", "0:a:0?",
    "-c:v", "libx264",
    "-preset", transcoder.videoPreset,
    "-crf", String(transcoder.crf),
    "-g", String(transcoder.keyframeInterval),
    "-keyint_min", String(transcoder.keyframeInterval),
    "-sc_threshold", "0",
    "-pix_fmt", "yuv420p",
    "-c:a", "aac",
    "-b:a", String(transcoder.audioBitrate),
    "-ar", String(transcoder.audioSampleRate),
    "-ac", "2",
    "-f", "hls",
    "-hls_time", String(hls.segmentDuration),
    "-hls_list_size", String(hls.maxSegments),
    "-hls_flags", hlsFlags,
    "-hls_segment_type", "mpegts",
    "-start_number", "1",
    "-hls_segment_filename", join(outputDir, SEGMENT_FILE_PATTERN),
    join(outputDir, PLAYLIST_FILE_NAME)
  ];
}

/*
 * EXECUTABLE RESOLUTION
 *
 * FFmpeg and FFprobe come either from an explicitly configured path or from the system PATH. A candidate counts as available when running it with -version exits
 * cleanly. Resolved paths are cached for the lifetime of the process.
 */

const resolvedExecutables = new Map<string, Nullable<string>>();

/**
 * Checks if an executable runs successfully with -version.
 * @param pathToCheck - Path or bare command name.
 * @returns Promise resolving to true if the executable ran and exited with code 0.
 */
async function checkExecutable(pathToCheck: string): Promise<boolean> {

  return new Promise((resolve) => {

    const child = spawn(pathToCheck, ["-version"], {

      stdio: [ "ignore", "ignore", "ignore" ]
    });

    child.on("error", () => {

      resolve(false);
    });

    child.on("exit", (code) => {

      resolve(code === 0);
    });
  });
}

/**
 * Resolves an executable from its configured path, falling back to the bare command name on the system PATH.
 * @param command - Bare command name ("ffmpeg" or "ffprobe").
 * @param configuredPath - Path from the configuration, or null.
 * @returns The usable path, or null if neither candidate runs.
 */
async function resolveExecutable(command: string, configuredPath: Nullable<string>): Promise<Nullable<string>> {

  const cacheKey = [ command, configuredPath ?? "" ].join(":");
  const cached = resolvedExecutables.get(cacheKey);

  if(cached !== undefined) {

    return cached;
  }

  const candidates = configuredPath ? [ configuredPath, command ] : [command];
  let resolved: Nullable<string> = null;

  for(const candidate of candidates) {

    // eslint-disable-next-line no-await-in-loop
    if(await checkExecutable(candidate)) {

      resolved = candidate;

      break;
    }

    if(candidate === configuredPath) {

      LOG.warn("Configured %s path %s could not be run. Trying the system PATH.", command, candidate);
    }
  }

  resolvedExecutables.set(cacheKey, resolved);

  return resolved;
}

/**
 * Resolves the FFmpeg executable.
 * @param configuredPath - transcoder.ffmpegPath from the configuration.
 * @returns The usable path, or null if FFmpeg is not available.
 */
export async function resolveFFmpegPath(configuredPath: Nullable<string>): Promise<Nullable<string>> {

  return resolveExecutable("ffmpeg", configuredPath);
}

/**
 * Resolves the FFprobe executable.
 * @param configuredPath - transcoder.ffprobePath from the configuration.
 * @returns The usable path, or null if FFprobe is not available.
 */
export async function resolveFFprobePath(configuredPath: Nullable<string>): Promise<Nullable<string>> {

  return resolveExecutable("ffprobe", configuredPath);
}

/**
 * The FFmpeg-backed transcoder engine.
 */
export class FfmpegEngine implements TranscoderEngine {

  private readonly ffmpegPath: string;
  private readonly options: TranscoderArgsOptions;

  constructor(ffmpegPath: string, options: TranscoderArgsOptions) {

    this.ffmpegPath = ffmpegPath;
    this.options = options;
  }

  /**
   * Spawns FFmpeg for the target. Resolves on the child's spawn event and rejects with ProcessSpawnError on its error event, whichever comes first.
   * @param target - The media item or manifest to encode.
   * @returns The running process.
   */
  public async start(target: RunTarget): Promise<TranscoderProcess> {

    const args = buildTranscoderArgs(target, this.options);

    LOG.debug("transcoder:args", "%s %s", this.ffmpegPath, args.join(" "));

    const child = spawn(this.ffmpegPath, args, {

      stdio: [ "ignore", "ignore", "pipe" ]
    });

    const exited = new Promise<TranscoderExit>((resolve) => {

      child.once("close", (code, signal) => {

        resolve({ code, signal });
      });
    });

    await new Promise<void>((resolve, reject) => {

      const onSpawn = (): void => {

        child.off("error", onError);
        resolve();
      };

      const onError = (error: Error): void => {

        child.off("spawn", onSpawn);
        reject(new ProcessSpawnError(this.ffmpegPath, [ "Unable to start ", this.ffmpegPath, ": ", error.message ].join(""), { cause: error }));
      };

      child.once("spawn", onSpawn);
      child.once("error", onError);
    });

    // Errors after a successful spawn are signal delivery failures on a process that is already gone. The exit path reports those runs.
    child.on("error", (error) => {

      LOG.debug("transcoder:args", "FFmpeg process error: %s.", error.message);
    });

    const isRunning = (): boolean => (child.exitCode === null) && (child.signalCode === null);

    return {

      diagnostics: child.stderr,
      exited,
      kill: (): void => {

        if(isRunning()) {

          child.kill("SIGKILL");
        }
      },
      pid: child.pid,
      terminate: (): void => {

        if(isRunning()) {

          child.kill("SIGTERM");
        }
      }
    };
  }
}
