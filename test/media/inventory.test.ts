/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * inventory.test.ts: Tests for the inventory scan.
 */
import { type MediaProber, type ProbeResult, buildInventory, parseExtensions } from "../../src/media/index.js";
import { NoMediaFoundError, ProbeError } from "../../src/utils/index.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { makeTempDir, removeTempDir } from "../helpers.js";
import fs from "node:fs";
import path from "node:path";

const { promises: fsPromises } = fs;

const VIDEO: ProbeResult = { durationSeconds: 1500, formatName: "mov,mp4,m4a,3gp,3g2,mj2", hasAudio: true, hasVideo: true };

/**
 * A prober that answers from a table keyed by file name and records what it was asked.
 */
class TableProber implements MediaProber {

  public readonly probed: string[];
  private readonly table: Map<string, Error | ProbeResult>;

  constructor(table: Record<string, Error | ProbeResult>) {

    this.probed = [];
    this.table = new Map(Object.entries(table));
  }

  public async probe(filePath: string): Promise<ProbeResult> {

    this.probed.push(path.basename(filePath));

    const answer = this.table.get(path.basename(filePath)) ?? VIDEO;

    if(answer instanceof Error) {

      throw answer;
    }

    return Promise.resolve(answer);
  }
}

describe("parseExtensions", () => {

  it("normalizes case, dots and spacing", () => {

    expect([...parseExtensions("mp4, MKV,.mov,,")]).toEqual([ "mp4", "mkv", "mov" ]);
  });
});

describe("buildInventory", () => {

  let dir: string;

  const write = async (name: string, size: number): Promise<void> => {

    await fsPromises.mkdir(path.dirname(path.join(dir, name)), { recursive: true });
    await fsPromises.writeFile(path.join(dir, name), Buffer.alloc(size));
  };

  const options = (prober: MediaProber): Parameters<typeof buildInventory>[1] => ({

    extensions: parseExtensions("mp4,mkv,mov,avi,m4v,webm"),
    minDurationSeconds: 60,
    minSizeBytes: 100,
    prober
  });

  beforeEach(async () => {

    dir = await makeTempDir();
  });

  afterEach(async () => {

    await removeTempDir(dir);
  });

  it("keeps the files that probe as long enough video", async () => {

    await write("a.mp4", 2048);
    await write("audio.m4v", 2048);
    await write("c.mov", 2048);
    await write("d.AVI", 2048);
    await write("notes.txt", 2048);
    await write("short.webm", 2048);
    await write("sub/b.mkv", 2048);
    await write("tiny.mp4", 10);

    const prober = new TableProber({

      "audio.m4v": { ...VIDEO, hasVideo: false },
      "c.mov": new ProbeError(path.join(dir, "c.mov"), "moov atom not found"),
      "short.webm": { ...VIDEO, durationSeconds: 30 }
    });

    const inventory = await buildInventory(dir, options(prober));

    expect(inventory).toEqual([
      { durationSeconds: 1500, path: path.join(dir, "a.mp4"), sizeBytes: 2048 },
      { durationSeconds: 1500, path: path.join(dir, "d.AVI"), sizeBytes: 2048 },
      { durationSeconds: 1500, path: path.join(dir, "sub", "b.mkv"), sizeBytes: 2048 }
    ]);

    expect(prober.probed).toEqual([ "a.mp4", "audio.m4v", "c.mov", "d.AVI", "short.webm", "b.mkv" ]);
    expect(Object.isFrozen(inventory)).toBe(true);
    expect(Object.isFrozen(inventory[0])).toBe(true);
  });

  it("excludes files whose duration is unknown", async () => {

    await write("a.mp4", 2048);
    await write("b.mp4", 2048);

    const inventory = await buildInventory(dir, options(new TableProber({ "b.mp4": { ...VIDEO, durationSeconds: null } })));

    expect(inventory.map((item) => path.basename(item.path))).toEqual(["a.mp4"]);
  });

  it("fails when the media directory cannot be read", async () => {

    await expect(buildInventory(path.join(dir, "missing"), options(new TableProber({})))).rejects.toBeInstanceOf(NoMediaFoundError);
  });

  it("fails when there are no candidates", async () => {

    await write("notes.txt", 2048);
    await write("tiny.mp4", 10);

    await expect(buildInventory(dir, options(new TableProber({})))).rejects.toThrow("No media files found in " + dir + ".");
  });

  it("fails when no candidate passes validation", async () => {

    await write("c.mov", 2048);

    const prober = new TableProber({ "c.mov": new ProbeError(path.join(dir, "c.mov"), "ffprobe exited with code 1: Invalid data found when processing input") });

    await expect(buildInventory(dir, options(prober))).rejects.toThrow("None of the 1 media files in " + dir + " passed validation.");
  });

  it("passes on unexpected prober failures", async () => {

    await write("a.mp4", 2048);

    await expect(buildInventory(dir, options(new TableProber({ "a.mp4": new Error("EMFILE: too many open files") })))).rejects.toThrow("EMFILE");
  });
});
