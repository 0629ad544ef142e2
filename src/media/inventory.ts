/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * inventory.ts: Media library scanning and validation for Reelcast.
 */
import { LOG, NoMediaFoundError, ProbeError, formatBytes, formatError, mediaName, startTimer } from "../utils/index.js";
import type { MediaItem, ValidatedInventory } from "../types/index.js";
import type { MediaProber } from "./prober.js";
import fs from "node:fs";
import path from "node:path";

const { promises: fsPromises } = fs;

/*
 * INVENTORY
 *
 * The inventory is built once at startup:
 *
 * 1. Walk the media directory recursively. Subdirectories that cannot be read and files that cannot be stat'ed are logged and skipped.
 * 2. Keep files with a known extension and at least the minimum size.
 * 3. Probe the survivors one at a time. A file is kept only if the probe succeeds, finds a video stream, and reports at least the minimum duration.
 *
 * Probing is sequential so that a large library does not start hundreds of ffprobe processes at once. An empty result at either filtering stage is fatal: there
 * is nothing to stream.
 */

/**
 * Inventory scan settings.
 */
export interface InventoryOptions {

  // Lower-case file extensions without the dot.
  extensions: ReadonlySet<string>;

  minDurationSeconds: number;
  minSizeBytes: number;
  prober: MediaProber;
}

/**
 * Parses the comma-separated extension list from the configuration.
 * @param list - Extensions such as "mp4, MKV,.mov".
 * @returns Lower-case extensions without dots.
 */
export function parseExtensions(list: string): Set<string> {

  return new Set(list.split(",").map((entry) => entry.trim().replace(/^\./, "").toLowerCase()).filter((entry) => entry.length > 0));
}

/**
 * A file that passed the extension filter, with its size.
 */
interface Candidate {

  path: string;
  sizeBytes: number;
}

/**
 * Recursively collects files with a matching extension.
 * @param dir - Directory to scan.
 * @param extensions - Accepted extensions.
 * @param found - Accumulator.
 */
async function collectFiles(dir: string, extensions: ReadonlySet<string>, found: Candidate[]): Promise<void> {

  let entries: fs.Dirent[];

  try {

    entries = await fsPromises.readdir(dir, { withFileTypes: true });
  } catch(error) {

    LOG.warn("Unable to read directory %s: %s. Skipping.", dir, formatError(error));

    return;
  }

  // Directory order is filesystem dependent. Sorting keeps scans and logs reproducible.
  entries.sort((a, b) => a.name.localeCompare(b.name));

  for(const entry of entries) {

    const entryPath = path.join(dir, entry.name);

    if(entry.isDirectory()) {

      // eslint-disable-next-line no-await-in-loop
      await collectFiles(entryPath, extensions, found);

      continue;
    }

    if(!extensions.has(path.extname(entry.name).replace(/^\./, "").toLowerCase())) {

      continue;
    }

    try {

      // eslint-disable-next-line no-await-in-loop
      const stats = await fsPromises.stat(entryPath);

      if(stats.isFile()) {

        found.push({ path: entryPath, sizeBytes: stats.size });
      }
    } catch(error) {

      LOG.warn("Unable to read %s: %s. Skipping.", entryPath, formatError(error));
    }
  }
}

/**
 * Scans the media directory and returns every file that passed validation.
 * @param rootDir - The media directory.
 * @param options - Scan settings and the prober.
 * @returns The validated inventory, in path order.
 * @throws NoMediaFoundError if the root cannot be read, no candidates are found, or none of them pass validation.
 */
export async function buildInventory(rootDir: string, options: InventoryOptions): Promise<ValidatedInventory> {

  const elapsed = startTimer();

  try {

    await fsPromises.access(rootDir, fs.constants.R_OK);
  } catch(error) {

    throw new NoMediaFoundError(rootDir, [ "Unable to read the media directory ", rootDir, ": ", formatError(error), "." ].join(""));
  }

  const files: Candidate[] = [];

  await collectFiles(rootDir, options.extensions, files);

  const candidates = files.filter((file) => {

    if(file.sizeBytes < options.minSizeBytes) {

      LOG.info("Skipping %s: %s is below the minimum size of %s.", mediaName(file.path), formatBytes(file.sizeBytes), formatBytes(options.minSizeBytes));

      return false;
    }

    return true;
  });

  if(candidates.length === 0) {

    throw new NoMediaFoundError(rootDir, [ "No media files found in ", rootDir, "." ].join(""));
  }

  LOG.info("Found %s media files in %s. Validating...", candidates.length, rootDir);

  const valid: MediaItem[] = [];

  for(const [ index, candidate ] of candidates.entries()) {

    const name = mediaName(candidate.path);

    try {

      // eslint-disable-next-line no-await-in-loop
      const result = await options.prober.probe(candidate.path);

      if(!result.hasVideo) {

        LOG.warn("Excluding %s (%s of %s): no video stream.", name, index + 1, candidates.length);

        continue;
      }

      if((result.durationSeconds === null) || (result.durationSeconds < options.minDurationSeconds)) {

        LOG.warn("Excluding %s (%s of %s): duration %s is below the minimum of %ss.", name, index + 1, candidates.length,
          (result.durationSeconds === null) ? "unknown" : result.durationSeconds.toFixed(1) + "s", options.minDurationSeconds);

        continue;
      }

      LOG.debug("inventory", "%s (%s of %s): %ss, %s.", name, index + 1, candidates.length, result.durationSeconds.toFixed(1), formatBytes(candidate.sizeBytes));

      valid.push(Object.freeze({ durationSeconds: result.durationSeconds, path: candidate.path, sizeBytes: candidate.sizeBytes }));
    } catch(error) {

      if(error instanceof ProbeError) {

        LOG.warn("Excluding %s (%s of %s): %s.", name, index + 1, candidates.length, formatError(error));

        continue;
      }

      throw error;
    }
  }

  LOG.info("Valid files: %s of %s.", valid.length, candidates.length);
  LOG.debug("inventory", "Inventory built in %sms.", elapsed());

  if(valid.length === 0) {

    throw new NoMediaFoundError(rootDir, [ "None of the ", String(candidates.length), " media files in ", rootDir, " passed validation." ].join(""));
  }

  return Object.freeze(valid);
}
