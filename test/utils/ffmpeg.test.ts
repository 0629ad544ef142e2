/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * ffmpeg.test.ts: Tests for FFmpeg argument building.
 */
import { describe, expect, it } from "vitest";
import { DEFAULTS } from "../../src/config/index.js";
import { buildTranscoderArgs } from "../../src/utils/index.js";
import { makeItem } from "../helpers.js";

const options = { hls: DEFAULTS.hls, outputDir: "/srv/hls", transcoder: DEFAULTS.transcoder };

const ENCODE_ARGS = [
  "-map", "0:v:0", "-map", "0:a:0?", "-c:v", "libx264", "-preset", "veryfast", "-crf", "26", "-g", "60", "-keyint_min", "60", "-sc_threshold", "0",
  "-pix_fmt", "yuv420p", "-c:a", "aac", "-b:a", "128000", "-ar", "44100", "-ac", "2", "-f", "hls", "-hls_time", "4", "-hls_list_size", "12"
];

describe("buildTranscoderArgs", () => {

  it("encodes a single item without ever ending the playlist", () => {

    expect(buildTranscoderArgs({ item: makeItem("a.mp4"), kind: "item" }, options)).toEqual([
      "-hide_banner", "-loglevel", "verbose", "-stats", "-re", "-i", "/media/a.mp4", ...ENCODE_ARGS,
      "-hls_flags", "delete_segments+independent_segments+omit_endlist", "-hls_segment_type", "mpegts", "-start_number", "1",
      "-hls_segment_filename", "/srv/hls/stream%d.ts", "/srv/hls/stream.m3u8"
    ]);
  });

  it("loops a concat manifest", () => {

    const manifest = { generatedAt: new Date(0), items: [makeItem("a.mp4")], path: "/srv/state/playlist.txt" };

    expect(buildTranscoderArgs({ kind: "manifest", manifest }, options)).toEqual([
      "-hide_banner", "-loglevel", "verbose", "-stats", "-re", "-f", "concat", "-safe", "0", "-stream_loop", "-1", "-i", "/srv/state/playlist.txt", ...ENCODE_ARGS,
      "-hls_flags", "delete_segments+independent_segments", "-hls_segment_type", "mpegts", "-start_number", "1",
      "-hls_segment_filename", "/srv/hls/stream%d.ts", "/srv/hls/stream.m3u8"
    ]);
  });

  it("follows the encoder and HLS settings", () => {

    const args = buildTranscoderArgs({ item: makeItem("a.mp4"), kind: "item" }, {

      hls: { ...DEFAULTS.hls, maxSegments: 6, segmentDuration: 2 },
      outputDir: "/srv/hls",
      transcoder: { ...DEFAULTS.transcoder, crf: 20, logLevel: "info", videoPreset: "fast" }
    });

    expect(args.slice(args.indexOf("-preset"), args.indexOf("-preset") + 4)).toEqual([ "-preset", "fast", "-crf", "20" ]);
    expect(args.slice(args.indexOf("-hls_time"), args.indexOf("-hls_time") + 4)).toEqual([ "-hls_time", "2", "-hls_list_size", "6" ]);
    expect(args.slice(0, 3)).toEqual([ "-hide_banner", "-loglevel", "info" ]);
  });
});
