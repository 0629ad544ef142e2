/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * sequencer.test.ts: Tests for the playback sequencer.
 */
import { DenylistStore, PlaybackSequencer } from "../../src/playback/index.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { makeItem, makeTempDir, removeTempDir } from "../helpers.js";
import { NoPlayableMediaError } from "../../src/utils/index.js";
import fs from "node:fs";
import path from "node:path";

const { promises: fsPromises } = fs;

// With a random source that always returns 0, Fisher-Yates turns [ a, b, c ] into [ b, c, a ].
const alwaysZero = (): number => 0;

describe("PlaybackSequencer", () => {

  let dir: string;
  let denylist: DenylistStore;

  beforeEach(async () => {

    dir = await makeTempDir();
    denylist = await DenylistStore.load(path.join(dir, "denylist.txt"));
  });

  afterEach(async () => {

    await removeTempDir(dir);
  });

  const inventory = [ makeItem("a.mp4"), makeItem("b.mp4"), makeItem("c.mp4") ];
  const names = (items: { path: string }[]): string[] => items.map((item) => path.basename(item.path));

  it("shuffles the first cycle with Fisher-Yates over the random source", () => {

    const sequencer = new PlaybackSequencer(inventory, denylist, { clearHistoryOnReshuffle: false, historyLimit: 100, random: alwaysZero });

    expect(names(sequencer.currentOrder())).toEqual([ "b.mp4", "c.mp4", "a.mp4" ]);
    expect(sequencer.state).toBe("ready");
  });

  it("plays every item exactly once per cycle", () => {

    const items = [ "a", "b", "c", "d", "e" ].map((name) => makeItem(name + ".mkv"));
    const sequencer = new PlaybackSequencer(items, denylist, { clearHistoryOnReshuffle: false, historyLimit: 100 });

    for(let cycle = 0; cycle < 3; cycle++) {

      const played = items.map(() => sequencer.next().path);

      expect([...played].sort()).toEqual(items.map((item) => item.path));
      expect(sequencer.state).toBe("exhausted");
    }

    expect(sequencer.snapshot().cycleCount).toBe(3);
  });

  it("reshuffles when a cycle is exhausted", () => {

    const sequencer = new PlaybackSequencer(inventory, denylist, { clearHistoryOnReshuffle: false, historyLimit: 100, random: alwaysZero });

    expect(names([ sequencer.next(), sequencer.next(), sequencer.next() ])).toEqual([ "b.mp4", "c.mp4", "a.mp4" ]);
    expect(names([sequencer.next()])).toEqual(["c.mp4"]);
    expect(names(sequencer.currentOrder())).toEqual([ "c.mp4", "a.mp4", "b.mp4" ]);
    expect(sequencer.snapshot().cycleCount).toBe(2);
  });

  it("never repeats an item across a cycle boundary", () => {

    const sequencer = new PlaybackSequencer([ makeItem("a.mp4"), makeItem("b.mp4") ], denylist, {

      clearHistoryOnReshuffle: false,
      historyLimit: 100,
      random: alwaysZero
    });

    // The second shuffle would start with a.mp4 again, so it is swapped away from the front.
    expect(names([ sequencer.next(), sequencer.next(), sequencer.next(), sequencer.next() ])).toEqual([ "b.mp4", "a.mp4", "b.mp4", "a.mp4" ]);
  });

  it("plays a single item over and over", () => {

    const sequencer = new PlaybackSequencer([makeItem("only.mp4")], denylist, { clearHistoryOnReshuffle: false, historyLimit: 100 });

    expect(names([ sequencer.next(), sequencer.next(), sequencer.next() ])).toEqual([ "only.mp4", "only.mp4", "only.mp4" ]);
    expect(sequencer.snapshot().cycleCount).toBe(3);
  });

  it("hands out the rest of the cycle at once", () => {

    const sequencer = new PlaybackSequencer(inventory, denylist, { clearHistoryOnReshuffle: false, historyLimit: 100, random: alwaysZero });

    sequencer.next();

    expect(names(sequencer.nextCycle())).toEqual([ "c.mp4", "a.mp4" ]);
    expect(sequencer.state).toBe("exhausted");
    expect(sequencer.snapshot()).toEqual({ cursor: 3, cycleCount: 1, recent: ["/media/b.mp4"], size: 3, totalPlayed: 1 });
  });

  it("records cycle items only as they are reported played", () => {

    const sequencer = new PlaybackSequencer(inventory, denylist, { clearHistoryOnReshuffle: false, historyLimit: 100, random: alwaysZero });

    sequencer.nextCycle();

    expect(sequencer.snapshot().totalPlayed).toBe(0);

    sequencer.recordPlayed("/media/b.mp4");
    sequencer.recordPlayed("/media/c.mp4");

    expect(sequencer.snapshot()).toEqual({ cursor: 3, cycleCount: 1, recent: [ "/media/b.mp4", "/media/c.mp4" ], size: 3, totalPlayed: 2 });
  });

  it("removes a played item without skipping an unplayed one", async () => {

    const sequencer = new PlaybackSequencer(inventory, denylist, { clearHistoryOnReshuffle: false, historyLimit: 100, random: alwaysZero });

    expect(sequencer.next().path).toBe("/media/b.mp4");
    expect(await sequencer.reportBad("/media/b.mp4")).toBe(true);

    expect(names(sequencer.currentOrder())).toEqual([ "c.mp4", "a.mp4" ]);
    expect(names([ sequencer.next(), sequencer.next() ])).toEqual([ "c.mp4", "a.mp4" ]);
    expect(sequencer.state).toBe("exhausted");
  });

  it("removes an unplayed item from the current cycle", async () => {

    const sequencer = new PlaybackSequencer(inventory, denylist, { clearHistoryOnReshuffle: false, historyLimit: 100, random: alwaysZero });

    sequencer.next();

    await sequencer.reportBad("/media/a.mp4");

    expect(sequencer.next().path).toBe("/media/c.mp4");
    expect(sequencer.state).toBe("exhausted");
  });

  it("persists bad items once, however often they are reported", async () => {

    const sequencer = new PlaybackSequencer(inventory, denylist, { clearHistoryOnReshuffle: false, historyLimit: 100, random: alwaysZero });

    expect(await sequencer.reportBad("/media/c.mp4")).toBe(true);
    expect(await sequencer.reportBad("/media/c.mp4")).toBe(false);

    expect(await fsPromises.readFile(path.join(dir, "denylist.txt"), "utf-8")).toBe("/media/c.mp4\n");

    const reloaded = new PlaybackSequencer(inventory, await DenylistStore.load(path.join(dir, "denylist.txt")), {

      clearHistoryOnReshuffle: false,
      historyLimit: 100,
      random: alwaysZero
    });

    expect(names(reloaded.currentOrder())).toEqual([ "b.mp4", "a.mp4" ]);
  });

  it("throws once every item is denylisted", async () => {

    const sequencer = new PlaybackSequencer([makeItem("a.mp4")], denylist, { clearHistoryOnReshuffle: false, historyLimit: 100 });

    await sequencer.reportBad("/media/a.mp4");

    expect(sequencer.state).toBe("empty");
    expect(() => sequencer.next()).toThrow(NoPlayableMediaError);
    expect(() => sequencer.nextCycle()).toThrow(NoPlayableMediaError);
  });

  it("starts empty when the whole inventory is on the denylist", async () => {

    await denylist.add("/media/a.mp4");

    const sequencer = new PlaybackSequencer([makeItem("a.mp4")], denylist, { clearHistoryOnReshuffle: false, historyLimit: 100 });

    expect(sequencer.state).toBe("empty");
  });

  it("caps the history and optionally clears it on reshuffle", () => {

    const capped = new PlaybackSequencer(inventory, denylist, { clearHistoryOnReshuffle: false, historyLimit: 2, random: alwaysZero });

    capped.next();
    capped.next();
    capped.next();

    expect(capped.getHistory()).toEqual([ "/media/c.mp4", "/media/a.mp4" ]);
    expect(capped.snapshot().totalPlayed).toBe(3);

    const clearing = new PlaybackSequencer(inventory, denylist, { clearHistoryOnReshuffle: true, historyLimit: 100, random: alwaysZero });

    clearing.nextCycle();
    clearing.next();

    expect(clearing.getHistory()).toEqual(["/media/c.mp4"]);
  });
});
