/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * denylist.test.ts: Tests for the persistent denylist.
 */
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { makeTempDir, removeTempDir } from "../helpers.js";
import { DenylistStore } from "../../src/playback/index.js";
import fs from "node:fs";
import path from "node:path";

const { promises: fsPromises } = fs;

describe("DenylistStore", () => {

  let dir: string;

  beforeEach(async () => {

    dir = await makeTempDir();
  });

  afterEach(async () => {

    await removeTempDir(dir);
  });

  it("treats a missing file as an empty denylist", async () => {

    const store = await DenylistStore.load(path.join(dir, "missing.txt"));

    expect(store.size).toBe(0);
    expect(store.has("/media/a.mp4")).toBe(false);
  });

  it("ignores blank lines and comments", async () => {

    const filePath = path.join(dir, "denylist.txt");

    await fsPromises.writeFile(filePath, "# removed by hand\n/media/a.mp4\n\n  /media/b.mp4  \n", "utf-8");

    const store = await DenylistStore.load(filePath);

    expect(store.size).toBe(2);
    expect(store.has("/media/a.mp4")).toBe(true);
    expect(store.has("/media/b.mp4")).toBe(true);
    expect(store.has("# removed by hand")).toBe(false);
  });

  it("appends each path once and creates the directory", async () => {

    const filePath = path.join(dir, "nested", "denylist.txt");
    const store = await DenylistStore.load(filePath);

    expect(await store.add("/media/a.mp4")).toBe(true);
    expect(await store.add("/media/a.mp4")).toBe(false);
    expect(await store.add("/media/b c.mp4")).toBe(true);

    expect(await fsPromises.readFile(filePath, "utf-8")).toBe("/media/a.mp4\n/media/b c.mp4\n");
    expect((await DenylistStore.load(filePath)).size).toBe(2);
  });

  it("rejects paths with line breaks", async () => {

    const store = await DenylistStore.load(path.join(dir, "denylist.txt"));

    await expect(store.add("/media/a\nb.mp4")).rejects.toThrow("Paths containing line breaks cannot be denylisted");
    expect(store.size).toBe(0);
  });

  it("forgets a path it could not write", async () => {

    const filePath = path.join(dir, "denylist.txt");
    const store = await DenylistStore.load(filePath);

    // A directory where the file should be makes the append fail.
    await fsPromises.mkdir(filePath);

    await expect(store.add("/media/a.mp4")).rejects.toThrow("Unable to update the denylist " + filePath);
    expect(store.has("/media/a.mp4")).toBe(false);
  });
});
