/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * routes.test.ts: Tests for the segment server.
 */
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { makeTempDir, removeTempDir } from "../helpers.js";
import type { Express } from "express";
import type { SequencerSnapshot } from "../../src/playback/index.js";
import type { SupervisorStatus } from "../../src/streaming/index.js";
import { buildApp } from "../../src/app.js";
import { buildHealthStatus } from "../../src/routes/index.js";
import fs from "node:fs";
import path from "node:path";
import request from "supertest";

const { promises: fsPromises } = fs;

const NO_CACHE_HEADERS = {

  "access-control-allow-headers": "Content-Type",
  "access-control-allow-methods": "GET, OPTIONS",
  "access-control-allow-origin": "*",
  "cache-control": "no-cache, no-store, must-revalidate",
  "expires": "0",
  "pragma": "no-cache"
};

const PLAYLIST = "#EXTM3U\n#EXT-X-VERSION:3\n#EXT-X-TARGETDURATION:4\n#EXT-X-MEDIA-SEQUENCE:1\n#EXTINF:4.000000,\nstream1.ts\n";

describe("segment server", () => {

  let app: Express;
  let dir: string;
  let snapshot: SequencerSnapshot;
  let status: SupervisorStatus;

  beforeEach(async () => {

    dir = await makeTempDir();
    snapshot = { cursor: 2, cycleCount: 3, recent: [], size: 5, totalPlayed: 12 };
    status = { active: true, mode: "per-item", nowPlaying: "/media/Shows/b.mp4", restarts: 1, run: null, runsStarted: 13 };

    app = buildApp({

      outputDir: dir,
      sequencer: { snapshot: () => snapshot },
      supervisor: { getStatus: () => status }
    }, "none");
  });

  afterEach(async () => {

    await removeTempDir(dir);
  });

  it("serves the playlist with cache-disabling and CORS headers", async () => {

    await fsPromises.writeFile(path.join(dir, "stream.m3u8"), PLAYLIST);

    const response = await request(app).get("/stream.m3u8").responseType("blob");

    expect(response.status).toBe(200);
    expect(response.headers).toMatchObject(NO_CACHE_HEADERS);
    expect(response.headers["content-type"]).toBe("application/vnd.apple.mpegurl");
    expect(String(response.body)).toBe(PLAYLIST);
  });

  it("serves segments", async () => {

    await fsPromises.writeFile(path.join(dir, "stream12.ts"), Buffer.from([ 0x47, 0x40, 0x00, 0x10 ]));

    const response = await request(app).get("/stream12.ts").responseType("blob");

    expect(response.status).toBe(200);
    expect(response.headers).toMatchObject(NO_CACHE_HEADERS);
    expect(response.headers["content-type"]).toBe("video/mp2t");
    expect(response.body).toEqual(Buffer.from([ 0x47, 0x40, 0x00, 0x10 ]));
  });

  it("answers 404 with the same headers before the first playlist and for rotated segments", async () => {

    for(const url of [ "/stream.m3u8", "/stream3.ts" ]) {

      // eslint-disable-next-line no-await-in-loop
      const response = await request(app).get(url);

      expect(response.status).toBe(404);
      expect(response.headers).toMatchObject(NO_CACHE_HEADERS);
      expect(response.text).toBe("Not found.");
    }
  });

  it("answers 404 for anything else in the output directory or elsewhere", async () => {

    await fsPromises.writeFile(path.join(dir, "denylist.txt"), "/media/a.mp4\n");

    for(const url of [ "/denylist.txt", "/streamx.ts", "/../stream.m3u8", "/" ]) {

      // eslint-disable-next-line no-await-in-loop
      const response = await request(app).get(url);

      expect(response.status).toBe(404);
      expect(response.headers["content-type"]).toBe("text/plain; charset=utf-8");
      expect(response.headers["access-control-allow-origin"]).toBe("*");
      expect(response.text).toBe("Not found.");
    }
  });

  it("answers CORS preflight requests with 204", async () => {

    const response = await request(app).options("/stream.m3u8");

    expect(response.status).toBe(204);
    expect(response.headers).toMatchObject(NO_CACHE_HEADERS);
  });

  it("reports health", async () => {

    status = { ...status, run: { id: "r0013", startedAt: new Date(Date.UTC(2026, 0, 2, 3, 4, 5)), state: "running" } };

    const response = await request(app).get("/health");

    expect(response.status).toBe(200);
    expect(response.headers["cache-control"]).toBe("no-cache, no-store, must-revalidate");
    expect(response.body).toMatchObject({

      cycle: 3,
      mode: "per-item",
      nowPlaying: "b.mp4",
      played: 12,
      remaining: 3,
      restarts: 1,
      run: { id: "r0013", startedAt: "2026-01-02T03:04:05.000Z", state: "running" },
      status: "playing"
    });
  });
});

describe("buildHealthStatus", () => {

  const snapshot: SequencerSnapshot = { cursor: 0, cycleCount: 1, recent: [], size: 0, totalPlayed: 0 };
  const idle: SupervisorStatus = { active: true, mode: "manifest", nowPlaying: null, restarts: 0, run: null, runsStarted: 0 };

  it("derives the status from the supervisor", () => {

    const now = new Date(Date.UTC(2026, 4, 6));

    expect(buildHealthStatus({ sequencer: { snapshot: () => snapshot }, supervisor: { getStatus: () => idle } }, now)).toMatchObject({

      nowPlaying: null,
      remaining: 0,
      run: null,
      status: "starting",
      timestamp: "2026-05-06T00:00:00.000Z"
    });

    expect(buildHealthStatus({ sequencer: { snapshot: () => snapshot }, supervisor: { getStatus: () => ({ ...idle, active: false }) } }).status).toBe("stopped");
  });
});
