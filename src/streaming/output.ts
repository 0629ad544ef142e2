/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * output.ts: HLS output directory housekeeping for Reelcast.
 */
import { LOG, PLAYLIST_FILE_NAME, delay, formatError } from "../utils/index.js";
import type { Nullable } from "../types/index.js";
import fs from "node:fs";
import path from "node:path";

const { promises: fsPromises } = fs;

/* The transcoder owns the files in the output directory while it runs: it writes stream<N>.ts segments and rewrites stream.m3u8, deleting segments that fall out
 * of the playlist window. Between runs the supervisor removes leftover segments so a new run, which numbers its segments from 1 again, never mixes with stale
 * ones. The playlist is kept so that players polling it between runs do not get a 404.
 */

// Segment file names written by the transcoder.
const SEGMENT_FILE_REGEX = /^stream(\d+)\.ts$/;

/**
 * A summary of the output directory.
 */
export interface OutputStats {

  // Name of the highest-numbered segment, or null if there are none.
  latestSegment: Nullable<string>;

  // Size of the playlist in bytes, or null if it does not exist.
  playlistBytes: Nullable<number>;

  segmentCount: number;
}

/**
 * Lists segment files in the output directory, sorted by segment number.
 * @param outputDir - The output directory.
 * @returns Segment file names. Empty if the directory does not exist.
 */
export async function listSegments(outputDir: string): Promise<string[]> {

  let names: string[];

  try {

    names = await fsPromises.readdir(outputDir);
  } catch(error) {

    if((error instanceof Error) && ("code" in error) && (error.code === "ENOENT")) {

      return [];
    }

    throw error;
  }

  return names.map((name) => ({ match: SEGMENT_FILE_REGEX.exec(name), name })).filter((entry) => entry.match !== null)
    .sort((a, b) => Number(a.match?.[1]) - Number(b.match?.[1])).map((entry) => entry.name);
}

/**
 * Creates the output directory if needed and deletes every segment file in it, keeping the playlist.
 * @param outputDir - The output directory.
 * @returns The number of segments deleted.
 */
export async function clearSegments(outputDir: string): Promise<number> {

  await fsPromises.mkdir(outputDir, { recursive: true });

  const segments = await listSegments(outputDir);
  let removed = 0;

  for(const segment of segments) {

    try {

      // eslint-disable-next-line no-await-in-loop
      await fsPromises.unlink(path.join(outputDir, segment));
      removed++;
    } catch(error) {

      LOG.warn("Unable to remove stale segment %s: %s.", segment, formatError(error));
    }
  }

  if(removed > 0) {

    LOG.debug("output", "Removed %s stale segments from %s.", removed, outputDir);
  }

  return removed;
}

/**
 * Summarizes the output directory for status reporting.
 * @param outputDir - The output directory.
 * @returns Segment count, playlist size and the latest segment.
 */
export async function getOutputStats(outputDir: string): Promise<OutputStats> {

  const segments = await listSegments(outputDir);
  let playlistBytes: Nullable<number> = null;

  try {

    playlistBytes = (await fsPromises.stat(path.join(outputDir, PLAYLIST_FILE_NAME))).size;
  } catch(error) {

    if(!(error instanceof Error) || !("code" in error) || (error.code !== "ENOENT")) {

      throw error;
    }
  }

  return { latestSegment: segments.at(-1) ?? null, playlistBytes, segmentCount: segments.length };
}

/**
 * Options for waitForPlaylist().
 */
export interface WaitForPlaylistOptions {

  // How often to check for the playlist, in milliseconds.
  pollInterval?: number;

  // How often to log that we are still waiting, in milliseconds.
  progressInterval?: number;

  signal?: AbortSignal;

  // Maximum time to wait, in milliseconds.
  timeout: number;
}

/**
 * Waits for the transcoder to write its first playlist.
 * @param outputDir - The output directory.
 * @param options - Timeout, poll cadence and an abort signal.
 * @returns True once the playlist exists, false on timeout or abort.
 */
export async function waitForPlaylist(outputDir: string, options: WaitForPlaylistOptions): Promise<boolean> {

  const { pollInterval = 1000, progressInterval = 5000, signal, timeout } = options;
  const playlistPath = path.join(outputDir, PLAYLIST_FILE_NAME);
  const startedAt = Date.now();
  let lastProgressLog = startedAt;

  while(!signal?.aborted) {

    // eslint-disable-next-line no-await-in-loop
    if(await fsPromises.access(playlistPath, fs.constants.R_OK).then(() => true, () => false)) {

      return true;
    }

    const elapsed = Date.now() - startedAt;

    if(elapsed >= timeout) {

      return false;
    }

    if((Date.now() - lastProgressLog) >= progressInterval) {

      lastProgressLog = Date.now();

      LOG.debug("output", "Waiting for %s (%ss elapsed).", PLAYLIST_FILE_NAME, Math.round(elapsed / 1000));
    }

    // eslint-disable-next-line no-await-in-loop
    await delay(Math.min(pollInterval, timeout - elapsed), signal);
  }

  return false;
}
