/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * prober.ts: FFprobe-backed media probing for Reelcast.
 */
import type { Nullable } from "../types/index.js";
import { ProbeError } from "../utils/index.js";
import { spawn } from "node:child_process";

/*
 * MEDIA PROBING
 *
 * Before a file is admitted to the inventory it is opened with ffprobe, which has to parse the container and report its streams within the probe timeout. A file
 * that ffprobe cannot read, that has no video stream, or that takes too long is excluded. Probing is the only decoding work done at startup; corruption that ffprobe
 * misses surfaces later as a critical transcoder error and is handled by the supervisor.
 */

/**
 * What probing learned about a file.
 */
export interface ProbeResult {

  // Container duration in seconds, or null if the container does not report one.
  durationSeconds: Nullable<number>;

  // Container format name as reported by ffprobe (e.g., "mov,mp4,m4a,3gp,3g2,mj2").
  formatName: Nullable<string>;

  hasAudio: boolean;
  hasVideo: boolean;
}

/**
 * Probes media files. The inventory depends on this interface only, so tests can substitute an in-process fake.
 */
export interface MediaProber {

  /**
   * Probes a file.
   * @param path - Absolute path to the file.
   * @returns What the probe found.
   * @throws ProbeError if the file cannot be read or the probe times out.
   */
  probe: (path: string) => Promise<ProbeResult>;
}

/**
 * Parses ffprobe's JSON output (-show_format -show_streams).
 * @param output - The JSON text ffprobe wrote to stdout.
 * @returns The probe result, or null if the output is not an ffprobe report.
 */
export function parseProbeOutput(output: string): Nullable<ProbeResult> {

  let report: unknown;

  try {

    report = JSON.parse(output);
  } catch {

    return null;
  }

  if(!report || (typeof report !== "object") || !("format" in report) || !report.format || (typeof report.format !== "object")) {

    return null;
  }

  const format = report.format;
  const rawDuration = ("duration" in format) ? format.duration : undefined;
  const duration = (typeof rawDuration === "string") || (typeof rawDuration === "number") ? Number(rawDuration) : NaN;
  const streams = ("streams" in report) && Array.isArray(report.streams) ? report.streams : [];

  const codecTypes = streams.map((stream: unknown) => {

    return (stream && (typeof stream === "object") && ("codec_type" in stream) && (typeof stream.codec_type === "string")) ? stream.codec_type : "";
  });

  return {

    durationSeconds: Number.isFinite(duration) ? duration : null,
    formatName: ("format_name" in format) && (typeof format.format_name === "string") ? format.format_name : null,
    hasAudio: codecTypes.includes("audio"),
    hasVideo: codecTypes.includes("video")
  };
}

/**
 * The ffprobe-backed prober. Each probe is a separate ffprobe process that is killed if it outlives the timeout.
 */
export class FfprobeProber implements MediaProber {

  private readonly ffprobePath: string;
  private readonly timeout: number;

  constructor(ffprobePath: string, timeout: number) {

    this.ffprobePath = ffprobePath;
    this.timeout = timeout;
  }

  public async probe(path: string): Promise<ProbeResult> {

    const args = [ "-v", "error", "-print_format", "json", "-show_format", "-show_streams", path ];

    return new Promise<ProbeResult>((resolve, reject) => {

      const child = spawn(this.ffprobePath, args, {

        stdio: [ "ignore", "pipe", "pipe" ]
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let timedOut = false;

      const timer = setTimeout(() => {

        timedOut = true;
        child.kill("SIGKILL");
      }, this.timeout);

      child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

      child.once("error", (error) => {

        clearTimeout(timer);
        reject(new ProbeError(path, [ "Unable to run ", this.ffprobePath, ": ", error.message ].join("")));
      });

      child.once("close", (code) => {

        clearTimeout(timer);

        if(timedOut) {

          reject(new ProbeError(path, [ "Probe timed out after ", String(this.timeout / 1000), "s" ].join(""), true));

          return;
        }

        if(code !== 0) {

          const detail = Buffer.concat(stderr).toString("utf-8").trim().split("\n").pop() ?? "";

          reject(new ProbeError(path, [ "ffprobe exited with code ", String(code), detail ? ": " + detail : "" ].join("")));

          return;
        }

        const result = parseProbeOutput(Buffer.concat(stdout).toString("utf-8"));

        if(!result) {

          reject(new ProbeError(path, "ffprobe returned an unreadable report"));

          return;
        }

        resolve(result);
      });
    });
  }
}
