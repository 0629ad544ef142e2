/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * hls.ts: HLS playlist and segment routes for Reelcast.
 */
import type { Express, NextFunction, Request, Response } from "express";
import { LOG, PLAYLIST_FILE_NAME } from "../utils/index.js";

/* This module serves the files FFmpeg writes to the output directory:
 *
 * - GET /stream.m3u8 - The live playlist
 * - GET /stream<N>.ts - A MPEG-TS segment
 *
 * Players poll the playlist every few seconds and must never see a cached copy, so every response, including a 404 and the answer to a CORS preflight, carries
 * the cache-disabling headers below. A segment that has already rotated out of the window is a plain 404. Players recover from that on their own.
 */

/**
 * Headers set on every response.
 */
export const STREAM_HEADERS: Readonly<Record<string, string>> = {

  "Access-Control-Allow-Headers": "Content-Type",
  "Access-Control-Allow-Methods": "GET, OPTIONS",
  "Access-Control-Allow-Origin": "*",
  "Cache-Control": "no-cache, no-store, must-revalidate",
  "Expires": "0",
  "Pragma": "no-cache"
};

// Segment file names. Only these and the playlist are ever served.
const SEGMENT_ROUTE = /^\/stream(\d+)\.ts$/;

/**
 * Sets up the stream headers, CORS preflight handling and the playlist and segment routes.
 * @param app - The Express application.
 * @param outputDir - Directory FFmpeg writes the playlist and segments to.
 */
export function setupHLSRoutes(app: Express, outputDir: string): void {

  app.use((req: Request, res: Response, next: NextFunction): void => {

    res.set(STREAM_HEADERS);

    if(req.method === "OPTIONS") {

      res.status(204).end();

      return;
    }

    next();
  });

  app.get("/" + PLAYLIST_FILE_NAME, (_req: Request, res: Response): void => {

    sendStreamFile(res, outputDir, PLAYLIST_FILE_NAME, "application/vnd.apple.mpegurl");
  });

  app.get(SEGMENT_ROUTE, (req: Request, res: Response): void => {

    sendStreamFile(res, outputDir, req.path.slice(1), "video/mp2t");
  });
}

/**
 * Sends a file from the output directory, or the plain 404 if it does not exist (anymore).
 * @param res - Express response object.
 * @param outputDir - The output directory.
 * @param fileName - File name inside the output directory.
 * @param contentType - Content type of the file.
 */
function sendStreamFile(res: Response, outputDir: string, fileName: string, contentType: string): void {

  res.sendFile(fileName, { cacheControl: false, etag: false, headers: { "Content-Type": contentType }, lastModified: false, root: outputDir }, (error?: Error): void => {

    if(!error) {

      return;
    }

    if(res.headersSent) {

      LOG.debug("output", "Sending %s was interrupted: %s.", fileName, error.message);

      return;
    }

    sendNotFound(res);
  });
}

/**
 * Sends the plain-text 404 used for every missing resource.
 * @param res - Express response object.
 */
export function sendNotFound(res: Response): void {

  res.status(404).type("text/plain").send("Not found.");
}
