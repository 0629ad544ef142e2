/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * app.ts: Express application builder and service startup for Reelcast.
 */
import { CONFIG, type SettingValue, displayConfiguration, getDenylistPath, getLogFilePath, getManifestPath, getOutputDir, initializeConfiguration,
  validateConfiguration } from "./config/index.js";
import { DenylistStore, PlaybackSequencer } from "./playback/index.js";
import type { Express, NextFunction, Request, Response } from "express";
import { FfmpegEngine, LOG, createMorganStream, formatError, getPackageVersion, isFatalStreamingError, resolveFFmpegPath, resolveFFprobePath,
  setConsoleLogging } from "./utils/index.js";
import { FfprobeProber, buildInventory, parseExtensions } from "./media/index.js";
import type { LoggingConfig, Nullable, PlaybackMode } from "./types/index.js";
import { type RouteContext, setupRoutes } from "./routes/index.js";
import { RunSupervisor, StatusReporter, waitForPlaylist } from "./streaming/index.js";
import { initializeFileLogger, shutdownFileLogger } from "./utils/fileLogger.js";
import type { Server } from "node:http";
import consoleStamp from "console-stamp";
import express from "express";
import morgan from "morgan";

/*
 * LOGGING MODE
 *
 * The logging mode is set at startup based on the --console CLI flag. When console logging is enabled, timestamps are added via console-stamp and output goes to
 * stdout/stderr. When file logging is used (the default), output goes to <data-dir>/reelcast.log.
 */

// Track whether console logging is enabled, set during startServer().
let usingConsoleLogging = false;

/**
 * Startup options gathered from the command line.
 */
export interface StartOptions {

  consoleLogging: boolean;
  logFile?: string;
  mediaDir?: string;
  mode?: PlaybackMode;
  port?: number;
}

/*
 * APPLICATION BUILDER
 *
 * The buildApp function creates and configures the Express application with request logging, routes and the error handler. This is separated from the server
 * startup so the HTTP surface can be tested on its own.
 */

/**
 * Creates and configures the Express application.
 * @param context - The output directory and the playback components the routes report on.
 * @param httpLogLevel - Which requests morgan logs.
 * @returns The configured Express application.
 */
export function buildApp(context: RouteContext, httpLogLevel: LoggingConfig["httpLogLevel"] = CONFIG.logging.httpLogLevel): Express {

  const app = express();

  app.disable("x-powered-by");

  // Configure Morgan for HTTP request logging based on httpLogLevel. Morgan output goes through morganStream which handles timestamp formatting consistently for
  // both console and file logging modes.
  if(httpLogLevel !== "none") {

    const morganFormat = ":method :url from :remote-addr responded :status in :response-time ms.";

    app.use(morgan(morganFormat, {

      // In errors mode, only 4xx and 5xx responses are logged. Players poll the playlist every few seconds, so logging everything is very noisy.
      skip: (_req, res): boolean => (httpLogLevel === "errors") && (res.statusCode < 400),
      stream: createMorganStream()
    }));
  }

  setupRoutes(app, context);

  // Global error handler. Express error handlers require 4 parameters even if unused. Clients never see error details.
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction): void => {

    LOG.error("Unhandled error in request: %s.", formatError(err));

    if(!res.headersSent) {

      res.status(500).type("text/plain").send("Internal server error.");
    }
  });

  return app;
}

/**
 * Turns command-line options into configuration overrides, keyed by setting path.
 * @param options - Startup options.
 * @returns The overrides.
 */
export function buildCliOverrides(options: Omit<StartOptions, "consoleLogging">): Map<string, SettingValue> {

  const overrides = new Map<string, SettingValue>();

  if(options.logFile) {

    overrides.set("paths.logFile", options.logFile);
  }

  if(options.mediaDir) {

    overrides.set("paths.mediaDir", options.mediaDir);
  }

  if(options.mode) {

    overrides.set("playback.mode", options.mode);
  }

  if(options.port !== undefined) {

    overrides.set("server.port", options.port);
  }

  return overrides;
}

/*
 * SERVER STARTUP
 *
 * Startup runs in a fixed order: configuration, logging, FFmpeg discovery, the inventory scan, the sequencer, and only then the supervisor and the HTTP server.
 * Anything that fails before the supervisor starts is fatal: there is nothing useful to serve without media or without FFmpeg. Once running, the only fatal
 * errors are the ones that leave the run loop: every item has been denylisted, or FFmpeg cannot be started at all.
 */

/**
 * Initializes and starts the service. Resolves once everything is running; the process then lives until a shutdown signal or a fatal run loop error.
 * @param options - Startup options gathered from the command line.
 */
export async function startServer(options: StartOptions): Promise<void> {

  // Set logging mode early before any log calls.
  usingConsoleLogging = options.consoleLogging;
  setConsoleLogging(options.consoleLogging);

  // Apply console-stamp for timestamps only when using console logging.
  if(usingConsoleLogging) {

    consoleStamp.default(console, { format: ":date(yyyy/mm/dd HH:MM:ss.l)" });
  }

  // Initialize configuration from file, environment variables and the command line, then validate.
  try {

    await initializeConfiguration(buildCliOverrides(options));
    validateConfiguration();
  } catch(error) {

    // The file logger is not running yet, so configuration errors always go to the console.
    // eslint-disable-next-line no-console
    console.error(formatError(error));

    process.exit(1);
  }

  // Initialize file logger if not using console logging.
  if(!usingConsoleLogging) {

    await initializeFileLogger(getLogFilePath(CONFIG), CONFIG.logging.maxSize);
  }

  LOG.info("Reelcast v%s.", getPackageVersion());
  displayConfiguration();

  const ffmpegPath = await resolveFFmpegPath(CONFIG.transcoder.ffmpegPath);
  const ffprobePath = await resolveFFprobePath(CONFIG.transcoder.ffprobePath);

  if(!ffmpegPath || !ffprobePath) {

    LOG.error("%s is not available. Install FFmpeg or set FFMPEG_PATH and FFPROBE_PATH.", ffmpegPath ? "ffprobe" : "FFmpeg");

    process.exit(1);
  }

  LOG.info("Using FFmpeg at %s and ffprobe at %s.", ffmpegPath, ffprobePath);

  const inventory = await buildInventory(CONFIG.paths.mediaDir, {

    extensions: parseExtensions(CONFIG.inventory.extensions),
    minDurationSeconds: CONFIG.inventory.minDuration,
    minSizeBytes: CONFIG.inventory.minFileSize,
    prober: new FfprobeProber(ffprobePath, CONFIG.inventory.probeTimeout)
  });

  const denylist = await DenylistStore.load(getDenylistPath(CONFIG));

  const sequencer = new PlaybackSequencer(inventory, denylist, {

    clearHistoryOnReshuffle: CONFIG.playback.clearHistoryOnReshuffle,
    historyLimit: CONFIG.playback.historyLimit
  });

  if(sequencer.state === "empty") {

    LOG.error("Every valid media file in %s is on the denylist at %s. Remove entries from the denylist to play them again.", CONFIG.paths.mediaDir,
      getDenylistPath(CONFIG));

    process.exit(1);
  }

  const outputDir = getOutputDir(CONFIG);

  const supervisor = new RunSupervisor({

    engine: new FfmpegEngine(ffmpegPath, { hls: CONFIG.hls, outputDir, transcoder: CONFIG.transcoder }),
    itemGap: CONFIG.playback.itemGap,
    manifestPath: getManifestPath(CONFIG),
    mode: CONFIG.playback.mode,
    outputDir,
    recovery: CONFIG.recovery,
    sequencer
  });

  const reporter = new StatusReporter({ interval: CONFIG.playback.statusInterval, outputDir, sequencer, supervisor });
  const controller = new AbortController();
  const app = buildApp({ outputDir, sequencer, supervisor });

  let server: Nullable<Server> = null;
  let shutdownInProgress = false;

  /*
   * GRACEFUL SHUTDOWN
   *
   * On SIGINT or SIGTERM, and after a fatal run loop error, we stop accepting requests, stop the transcoder and wait for it to exit, stop status reporting, and
   * flush the log before exiting.
   */
  const supervision = supervisor.run(controller.signal).then((): number => 0, (error: unknown): number => {

    LOG.error("%s streaming error: %s.", isFatalStreamingError(error) ? "Fatal" : "Unexpected", formatError(error));

    return 1;
  });

  const shutdown = async (exitCode: number): Promise<void> => {

    // Prevent multiple shutdown attempts if multiple signals are received.
    if(shutdownInProgress) {

      return;
    }

    shutdownInProgress = true;

    LOG.info("Shutting down.");

    if(server) {

      server.close((): void => {

        LOG.info("HTTP server closed.");
      });

      server.closeAllConnections();
    }

    controller.abort();

    const supervisionExitCode = await supervision;

    await reporter.stop();

    if(!usingConsoleLogging) {

      shutdownFileLogger();
    }

    process.exit(Math.max(exitCode, supervisionExitCode));
  };

  process.on("SIGINT", (): void => {

    void shutdown(0);
  });

  process.on("SIGTERM", (): void => {

    void shutdown(0);
  });

  // A run loop that ends by itself ended with a fatal error.
  void supervision.then(async (exitCode): Promise<void> => {

    if(!controller.signal.aborted) {

      await shutdown(Math.max(exitCode, 1));
    }
  });

  reporter.start();

  server = app.listen(CONFIG.server.port, CONFIG.server.host, (): void => {

    LOG.info("Reelcast is now listening on %s:%s.", CONFIG.server.host, CONFIG.server.port);
  });

  server.on("error", (error: Error): void => {

    LOG.error("HTTP server error: %s.", formatError(error));

    void shutdown(1);
  });

  if(await waitForPlaylist(outputDir, { signal: controller.signal, timeout: CONFIG.hls.startupTimeout })) {

    LOG.info("Stream is ready at http://%s:%s/stream.m3u8.", (CONFIG.server.host === "0.0.0.0") ? "localhost" : CONFIG.server.host, CONFIG.server.port);
  } else if(!controller.signal.aborted) {

    LOG.warn("No playlist after %s seconds. Playback continues and the stream becomes available once FFmpeg writes it.", CONFIG.hls.startupTimeout / 1000);
  }
}
