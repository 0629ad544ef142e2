/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * denylist.ts: Persistent denylist of media that crashed the transcoder.
 */
import { LOG, formatError } from "../utils/index.js";
import fs from "node:fs";
import path from "node:path";

const { promises: fsPromises } = fs;

/* The denylist is a plain text file with one absolute media path per line. It is read once at startup and only ever appended to, so an operator can inspect it
 * with any tool and re-admit a file by deleting its line and restarting. Blank lines and lines starting with # are ignored.
 */

/**
 * The append-only denylist file and its in-memory set.
 */
export class DenylistStore {

  private readonly entries: Set<string>;
  public readonly filePath: string;

  private constructor(filePath: string, entries: Set<string>) {

    this.entries = entries;
    this.filePath = filePath;
  }

  /**
   * Loads the denylist. A missing file is an empty denylist.
   * @param filePath - Absolute path to the denylist file.
   * @returns The loaded store.
   * @throws If the file exists but cannot be read.
   */
  public static async load(filePath: string): Promise<DenylistStore> {

    let content = "";

    try {

      content = await fsPromises.readFile(filePath, "utf-8");
    } catch(error) {

      if(!(error instanceof Error) || !("code" in error) || (error.code !== "ENOENT")) {

        throw error;
      }
    }

    const entries = new Set(content.split("\n").map((line) => line.trim()).filter((line) => (line.length > 0) && !line.startsWith("#")));

    if(entries.size > 0) {

      LOG.info("Loaded %s denylisted files from %s.", entries.size, filePath);
    }

    return new DenylistStore(filePath, entries);
  }

  /**
   * Returns whether a path is denylisted.
   * @param mediaPath - Absolute media path.
   * @returns True if the path is on the denylist.
   */
  public has(mediaPath: string): boolean {

    return this.entries.has(mediaPath);
  }

  /**
   * The number of denylisted paths.
   */
  public get size(): number {

    return this.entries.size;
  }

  /**
   * Appends a path to the denylist file. Adding a path that is already listed does nothing.
   * @param mediaPath - Absolute media path.
   * @returns True if the path was appended, false if it was already listed.
   * @throws If the file cannot be written. The path is not recorded in memory in that case.
   */
  public async add(mediaPath: string): Promise<boolean> {

    if(this.entries.has(mediaPath)) {

      return false;
    }

    if(/[\r\n]/.test(mediaPath)) {

      throw new Error("Paths containing line breaks cannot be denylisted: " + JSON.stringify(mediaPath));
    }

    // Recorded before the write so that a concurrent add of the same path does not append it twice.
    this.entries.add(mediaPath);

    try {

      await fsPromises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fsPromises.appendFile(this.filePath, mediaPath + "\n", "utf-8");
    } catch(error) {

      this.entries.delete(mediaPath);

      throw new Error([ "Unable to update the denylist ", this.filePath, ": ", formatError(error) ].join(""), { cause: error });
    }

    return true;
  }
}
