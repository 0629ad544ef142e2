/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * manifest.ts: Concat demuxer manifest generation for manifest mode.
 */
import type { MediaItem, PlaylistManifest } from "../types/index.js";
import fs from "node:fs";
import { mediaName } from "../utils/index.js";
import path from "node:path";

const { promises: fsPromises } = fs;

/* In manifest mode a single FFmpeg process reads every item of the current cycle through the concat demuxer. Each item becomes a file directive with the path in
 * single quotes, followed by a numbered comment naming the file so the manifest can be read at a glance:
 *
 *   file '/media/shows/a.mp4'
 *   # 1. a.mp4
 *
 * Inside single quotes the demuxer treats nothing as special, so a quote or backslash in a path has to close the quoted run, appear escaped, and reopen it.
 */

/**
 * Escapes a path for a single-quoted concat demuxer directive. Each ' becomes '\'' and each \ becomes '\\'.
 * @param mediaPath - The path to escape.
 * @returns The escaped path, to be wrapped in single quotes.
 */
export function escapeConcatPath(mediaPath: string): string {

  return mediaPath.replace(/['\\]/g, (character) => [ "'\\", character, "'" ].join(""));
}

/**
 * Renders the manifest text for a list of items.
 * @param items - Items in play order.
 * @returns The manifest contents.
 */
export function formatManifest(items: readonly MediaItem[]): string {

  return items.map((item, index) => {

    return [ "file '", escapeConcatPath(item.path), "'\n# ", String(index + 1), ". ", mediaName(item.path).replace(/[\r\n]+/g, " "), "\n" ].join("");
  }).join("");
}

/**
 * Writes the manifest for a cycle. The text goes to a temporary file beside the target which is then renamed over it, so a reader never sees a partial manifest.
 * @param manifestPath - Absolute path of the manifest.
 * @param items - Items in play order.
 * @returns The written manifest.
 */
export async function writeManifest(manifestPath: string, items: readonly MediaItem[]): Promise<PlaylistManifest> {

  const tempPath = manifestPath + ".tmp";

  await fsPromises.mkdir(path.dirname(manifestPath), { recursive: true });
  await fsPromises.writeFile(tempPath, formatManifest(items), "utf-8");
  await fsPromises.rename(tempPath, manifestPath);

  return { generatedAt: new Date(), items: [...items], path: manifestPath };
}
