/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Route aggregator for Reelcast.
 */
import type { Express, Request, Response } from "express";
import type { PlaybackSequencer } from "../playback/index.js";
import type { RunSupervisor } from "../streaming/index.js";
import { sendNotFound, setupHLSRoutes } from "./hls.js";
import { setupHealthEndpoint } from "./health.js";

/*
 * ROUTE SETUP
 *
 * The segment server is deliberately small: the HLS playlist and segments straight from the output directory, a health endpoint, and a plain 404 for everything
 * else. Nothing here ever touches the transcoder; the filesystem is the only interface between the two.
 */

/**
 * What the routes read from.
 */
export interface RouteContext {

  outputDir: string;
  sequencer: Pick<PlaybackSequencer, "snapshot">;
  supervisor: Pick<RunSupervisor, "getStatus">;
}

/**
 * Configures all HTTP endpoints on the Express application. The catch-all 404 is registered last.
 * @param app - The Express application.
 * @param context - The output directory and the playback components the routes report on.
 */
export function setupRoutes(app: Express, context: RouteContext): void {

  setupHLSRoutes(app, context.outputDir);
  setupHealthEndpoint(app, context);

  app.use((_req: Request, res: Response): void => {

    sendNotFound(res);
  });
}

export { buildHealthStatus, setupHealthEndpoint } from "./health.js";
export { STREAM_HEADERS, sendNotFound, setupHLSRoutes } from "./hls.js";
