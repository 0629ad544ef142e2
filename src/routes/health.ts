/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * health.ts: Health check route for Reelcast.
 */
import type { Express, Request, Response } from "express";
import { getPackageVersion, mediaName } from "../utils/index.js";
import type { HealthStatus } from "../types/index.js";
import type { RouteContext } from "./index.js";

/* The health endpoint reports playback counters for monitoring: where we are in the shuffle, what is playing, and how often the transcoder had to be restarted.
 * It always answers 200. Internal failures show up as restarts and as the status field, never as error details.
 */

/**
 * Builds the health report.
 * @param context - The sequencer and supervisor to report on.
 * @param now - The current time.
 * @returns The health status.
 */
export function buildHealthStatus(context: Pick<RouteContext, "sequencer" | "supervisor">, now = new Date()): HealthStatus {

  const snapshot = context.sequencer.snapshot(0);
  const supervisor = context.supervisor.getStatus();

  let status: HealthStatus["status"] = "starting";

  if(!supervisor.active) {

    status = "stopped";
  } else if(supervisor.run?.state === "running") {

    status = "playing";
  }

  return {

    cycle: snapshot.cycleCount,
    mode: supervisor.mode,
    nowPlaying: supervisor.nowPlaying ? mediaName(supervisor.nowPlaying) : null,
    played: snapshot.totalPlayed,
    remaining: Math.max(snapshot.size - snapshot.cursor, 0),
    restarts: supervisor.restarts,
    run: supervisor.run ? { id: supervisor.run.id, startedAt: supervisor.run.startedAt.toISOString(), state: supervisor.run.state } : null,
    status,
    timestamp: now.toISOString(),
    uptime: process.uptime(),
    version: getPackageVersion()
  };
}

/**
 * Creates the health check endpoint.
 * @param app - The Express application.
 * @param context - The sequencer and supervisor to report on.
 */
export function setupHealthEndpoint(app: Express, context: Pick<RouteContext, "sequencer" | "supervisor">): void {

  app.get("/health", (_req: Request, res: Response): void => {

    res.status(200).json(buildHealthStatus(context));
  });
}
