/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * prober.test.ts: Tests for ffprobe output parsing.
 */
import { describe, expect, it } from "vitest";
import { parseProbeOutput } from "../../src/media/index.js";

describe("parseProbeOutput", () => {

  it("reads duration, format and stream types", () => {

    const output = JSON.stringify({

      format: { duration: "1325.056000", format_name: "matroska,webm" },
      streams: [ { codec_type: "video" }, { codec_type: "audio" }, { codec_type: "subtitle" } ]
    });

    expect(parseProbeOutput(output)).toEqual({ durationSeconds: 1325.056, formatName: "matroska,webm", hasAudio: true, hasVideo: true });
  });

  it("reports a missing duration as null", () => {

    expect(parseProbeOutput(JSON.stringify({ format: { duration: "N/A" }, streams: [{ codec_type: "audio" }] }))).toEqual({

      durationSeconds: null,
      formatName: null,
      hasAudio: true,
      hasVideo: false
    });
  });

  it("rejects output that is not an ffprobe report", () => {

    expect(parseProbeOutput("")).toBeNull();
    expect(parseProbeOutput("[]")).toBeNull();
    expect(parseProbeOutput(JSON.stringify({ streams: [] }))).toBeNull();
  });
});
