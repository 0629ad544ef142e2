/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * classifier.test.ts: Tests for FFmpeg diagnostic classification.
 */
import { describe, expect, it } from "vitest";
import { classifyLine } from "../../src/streaming/index.js";

describe("classifyLine", () => {

  it("recognizes decoder corruption markers", () => {

    expect(classifyLine("[h264 @ 0x5581] Error submitting packet to decoder: Invalid data found when processing input")).toEqual({

      kind: "critical",
      line: "[h264 @ 0x5581] Error submitting packet to decoder: Invalid data found when processing input",
      marker: "Error submitting packet to decoder"
    });

    expect(classifyLine("[mov,mp4,m4a,3gp,3g2,mj2 @ 0x55] moov atom not found")).toMatchObject({ kind: "critical", marker: "moov atom not found" });
    expect(classifyLine("Decoder thread returned error")).toMatchObject({ kind: "critical" });
    expect(classifyLine("Assertion failed. Internal bug, should not have happened")).toMatchObject({ kind: "critical" });
  });

  it("extracts the path of an opened input", () => {

    expect(classifyLine("[concat @ 0x55d1] Opening '/media/Shows/it is.mkv' for reading")).toEqual({

      kind: "inputOpened",
      line: "[concat @ 0x55d1] Opening '/media/Shows/it is.mkv' for reading",
      path: "/media/Shows/it is.mkv"
    });
  });

  it("recognizes progress reports and trims them", () => {

    expect(classifyLine("frame=  250 fps= 25 q=28.0 size=N/A time=00:00:10.00 bitrate=N/A speed=1.00x   ")).toEqual({

      kind: "progress",
      line: "frame=  250 fps= 25 q=28.0 size=N/A time=00:00:10.00 bitrate=N/A speed=1.00x"
    });

    expect(classifyLine("size=    1024kB time=00:00:04.00 bitrate=2097.2kbits/s")).toMatchObject({ kind: "progress" });
  });

  it("treats warnings and errors that are not corruption as warnings", () => {

    expect(classifyLine("[aac @ 0x55] Could not update timestamps for skipped samples.")).toMatchObject({ kind: "warning" });
    expect(classifyLine("Warning: data is not aligned")).toMatchObject({ kind: "warning" });
    expect(classifyLine("[hls @ 0x55] Failed to delete old segment")).toMatchObject({ kind: "warning" });
  });

  it("classifies everything else as info", () => {

    expect(classifyLine("  Stream #0:0: Video: h264 (High), yuv420p, 1920x1080")).toEqual({ kind: "info", line: "Stream #0:0: Video: h264 (High), yuv420p, 1920x1080" });
    expect(classifyLine("")).toEqual({ kind: "info", line: "" });
  });
});
