/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * status.test.ts: Tests for periodic status reporting.
 */
import { DenylistStore, PlaybackSequencer } from "../../src/playback/index.js";
import { FakeEngine, TEST_RECOVERY, makeItem, makeTempDir, removeTempDir } from "../helpers.js";
import { RunSupervisor, StatusReporter, formatOutputSummary } from "../../src/streaming/index.js";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { setConsoleLogging } from "../../src/utils/index.js";

const { promises: fsPromises } = fs;

describe("formatOutputSummary", () => {

  it("describes the output directory", () => {

    expect(formatOutputSummary({ latestSegment: null, playlistBytes: null, segmentCount: 0 })).toBe("Output: no playlist yet, 0 segments.");
    expect(formatOutputSummary({ latestSegment: "stream7.ts", playlistBytes: 1536, segmentCount: 6 })).toBe("Output: playlist 1.5 KiB, 6 segments, latest stream7.ts.");
  });
});

describe("StatusReporter", () => {

  let dir: string;
  let reporter: StatusReporter;
  let sequencer: PlaybackSequencer;

  beforeEach(async () => {

    dir = await makeTempDir();
    sequencer = new PlaybackSequencer([ makeItem("a.mp4"), makeItem("b.mp4"), makeItem("c.mp4") ], await DenylistStore.load(path.join(dir, "denylist.txt")), {

      clearHistoryOnReshuffle: false,
      historyLimit: 100,
      random: () => 0
    });

    const supervisor = new RunSupervisor({

      engine: new FakeEngine(),
      itemGap: 0,
      manifestPath: path.join(dir, "playlist.txt"),
      mode: "per-item",
      outputDir: dir,
      recovery: TEST_RECOVERY,
      sequencer
    });

    reporter = new StatusReporter({ interval: 60000, outputDir: dir, sequencer, supervisor });
    setConsoleLogging(true);
  });

  afterEach(async () => {

    setConsoleLogging(false);
    await reporter.stop();
    await removeTempDir(dir);
  });

  it("summarizes playback", () => {

    expect(reporter.formatPlaybackSummary()).toBe("Played 0 items (cycle 1, 0 of 3). Now playing: nothing. Recent: none.");

    sequencer.next();
    sequencer.next();

    expect(reporter.formatPlaybackSummary()).toBe("Played 2 items (cycle 1, 2 of 3). Now playing: nothing. Recent: b.mp4, c.mp4.");
  });

  it("logs the output summary only when it changes", async () => {

    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    await fsPromises.writeFile(path.join(dir, "stream.m3u8"), "#EXTM3U\n");
    await fsPromises.writeFile(path.join(dir, "stream1.ts"), "");

    await reporter.report();
    await reporter.report();

    expect(log.mock.calls).toEqual([
      [ "%s%s", "", "Played 0 items (cycle 1, 0 of 3). Now playing: nothing. Recent: none." ],
      [ "%s%s", "", "Output: playlist 8 B, 1 segments, latest stream1.ts." ],
      [ "%s%s", "", "Played 0 items (cycle 1, 0 of 3). Now playing: nothing. Recent: none." ]
    ]);
  });
});
