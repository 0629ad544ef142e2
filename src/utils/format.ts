/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * format.ts: Formatting utilities for Reelcast.
 */
import path from "node:path";

/**
 * Formats a duration in milliseconds as a human-readable string. The format varies based on duration length:
 * - Less than 60 seconds: "17s"
 * - Less than 1 hour: "6m 39s"
 * - 1 hour or more: "1h 23m"
 * @param ms - Duration in milliseconds.
 * @returns Formatted duration string.
 */
export function formatDuration(ms: number): string {

  const totalSeconds = Math.round(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  if(hours > 0) {

    return [ String(hours), "h ", String(minutes), "m" ].join("");
  }

  if(minutes > 0) {

    return [ String(minutes), "m ", String(seconds), "s" ].join("");
  }

  return [ String(seconds), "s" ].join("");
}

/**
 * Formats a byte count with a binary unit ("512 B", "1.5 KiB", "12.0 MiB").
 * @param bytes - Size in bytes.
 * @returns Formatted size string.
 */
export function formatBytes(bytes: number): string {

  const units = [ "B", "KiB", "MiB", "GiB", "TiB" ];
  let value = bytes;
  let unit = 0;

  while((value >= 1024) && (unit < (units.length - 1))) {

    value /= 1024;
    unit++;
  }

  return (unit === 0) ? [ String(value), " B" ].join("") : [ value.toFixed(1), " ", units[unit] ].join("");
}

/**
 * Returns the file name portion of a media path, which is what status lines and the manifest comments show.
 * @param mediaPath - Path to a media file.
 * @returns The base name.
 */
export function mediaName(mediaPath: string): string {

  return path.basename(mediaPath);
}

/**
 * Starts an elapsed-time measurement.
 * @returns A closure returning the milliseconds since the call, rounded.
 */
export function startTimer(): () => number {

  const start = performance.now();

  return (): number => Math.round(performance.now() - start);
}
