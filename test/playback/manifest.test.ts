/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * manifest.test.ts: Tests for concat manifest generation.
 */
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { escapeConcatPath, formatManifest, writeManifest } from "../../src/playback/index.js";
import { makeItem, makeTempDir, removeTempDir } from "../helpers.js";
import fs from "node:fs";
import path from "node:path";

const { promises: fsPromises } = fs;

describe("escapeConcatPath", () => {

  it("leaves ordinary paths alone", () => {

    expect(escapeConcatPath("/media/My Show (2019)/episode 1.mkv")).toBe("/media/My Show (2019)/episode 1.mkv");
  });

  it("escapes quotes and backslashes outside the quoted run", () => {

    expect(escapeConcatPath("/media/Don't Stop.mp4")).toBe("/media/Don'\\''t Stop.mp4");
    expect(escapeConcatPath("/media/a\\b.mp4")).toBe("/media/a'\\\\'b.mp4");
  });
});

describe("formatManifest", () => {

  it("writes a file directive and a numbered comment per item", () => {

    expect(formatManifest([ makeItem("b.mp4"), makeItem("it's.mkv") ])).toBe([
      "file '/media/b.mp4'\n",
      "# 1. b.mp4\n",
      "file '/media/it'\\''s.mkv'\n",
      "# 2. it's.mkv\n"
    ].join(""));
  });

  it("is empty for no items", () => {

    expect(formatManifest([])).toBe("");
  });
});

describe("writeManifest", () => {

  let dir: string;

  beforeEach(async () => {

    dir = await makeTempDir();
  });

  afterEach(async () => {

    await removeTempDir(dir);
  });

  it("replaces the manifest and leaves no temporary file behind", async () => {

    const manifestPath = path.join(dir, "state", "playlist.txt");

    await writeManifest(manifestPath, [makeItem("a.mp4")]);

    const manifest = await writeManifest(manifestPath, [ makeItem("c.mp4"), makeItem("a.mp4") ]);

    expect(manifest.path).toBe(manifestPath);
    expect(manifest.items.map((item) => item.path)).toEqual([ "/media/c.mp4", "/media/a.mp4" ]);
    expect(await fsPromises.readFile(manifestPath, "utf-8")).toBe("file '/media/c.mp4'\n# 1. c.mp4\nfile '/media/a.mp4'\n# 2. a.mp4\n");
    expect(await fsPromises.readdir(path.dirname(manifestPath))).toEqual(["playlist.txt"]);
  });
});
