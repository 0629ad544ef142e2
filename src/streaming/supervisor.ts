/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * supervisor.ts: Transcoder process supervision for Reelcast.
 */
import type { HealthSignal, LineSignal } from "./classifier.js";
import { LOG, ProcessSpawnError, delay, formatDuration, formatError, jitteredDelay, mediaName, retryOperation, runWithRunContext } from "../utils/index.js";
import type { MediaItem, Nullable, PlaybackMode, PlaylistManifest, RecoveryConfig, RunTarget } from "../types/index.js";
import type { BoundLogger, TranscoderEngine, TranscoderExit, TranscoderProcess } from "../utils/index.js";
import type { PlaybackSequencer } from "../playback/index.js";
import { classifyLine } from "./classifier.js";
import { clearSegments } from "./output.js";
import { createInterface } from "node:readline";
import { writeManifest } from "../playback/index.js";

/*
 * TRANSCODE SUPERVISION
 *
 * The supervisor owns the transcoder. Exactly one FFmpeg process runs at a time, and the run loop does not start the next one until the previous one has exited.
 * Each process is a "run" with its own ID (r0001, r0002, ...) that prefixes every log line written on its behalf.
 *
 * There are two modes:
 *
 * - per-item: one run per media item. A clean exit is a finished item; after the item gap the next item starts.
 * - manifest: one run over a concat manifest of the whole shuffled cycle, looped by FFmpeg itself. A clean exit starts a fresh cycle.
 *
 * While a run is live, every stderr line is classified (see classifier.ts) and the outcome of the run is the first of:
 *
 * - critical   A decoder corruption marker, reached criticalErrorThreshold times. The run is stopped and the suspect is denylisted: the item in per-item mode, the
 *              last input FFmpeg opened in manifest mode. That attribution is best effort: FFmpeg may already have opened the next file when the marker for the
 *              previous one is printed. When no input has been seen, nothing is denylisted.
 * - hung       No progress line for livenessWindow while the process is alive. The process is killed and the same unit restarts after a backoff. After
 *              maxHangRestarts consecutive hangs, per-item mode moves on to the next item. Hangs never denylist anything.
 * - failed     A non-zero exit without a critical marker. The same unit is retried once after a backoff; a second failure is handled like a critical error.
 * - completed  A clean exit.
 * - cancelled  Shutdown. The process is stopped and the loop returns.
 *
 * Stopping is always the same sequence: SIGTERM, then SIGKILL if the process is still alive after stopGracePeriod, and then wait for the exit. Hung processes get
 * SIGKILL straight away.
 *
 * Failing to start FFmpeg at all is retried with exponential backoff up to maxSpawnAttempts times. After that ProcessSpawnError leaves the run loop, as does
 * NoPlayableMediaError once the sequencer runs out of items. Both are fatal. Anything else, such as an output directory we cannot write to, is logged and retried.
 */

/**
 * Lifecycle of a single run.
 */
export type RunState = "exited" | "running" | "stopping";

/**
 * Per-run signal counters.
 */
export interface RunCounters {

  criticalErrors: number;
  progressReports: number;
  warnings: number;
}

/**
 * A single transcoder invocation.
 */
export interface SupervisedRun {

  counters: RunCounters;

  // The input FFmpeg most recently reported opening. Always the item in per-item mode.
  currentInput: Nullable<string>;

  readonly id: string;

  // Time of the last progress report, in milliseconds since the epoch. Starts at the spawn time.
  lastHealthySignalAt: number;

  readonly process: TranscoderProcess;
  readonly startedAt: Date;
  state: RunState;
  readonly target: RunTarget;
}

/**
 * How a run ended.
 */
export type RunOutcome =
  { kind: "cancelled" } |
  { kind: "completed" } |
  { kind: "critical"; line: string; suspect: Nullable<string> } |
  { code: number | null; kind: "failed"; signal: NodeJS.Signals | null } |
  { kind: "hung"; silentFor: number };

/**
 * Supervisor settings and collaborators.
 */
export interface SupervisorOptions {

  engine: TranscoderEngine;

  // Idle gap between items in per-item mode, in milliseconds.
  itemGap: number;

  // Where the concat manifest is written in manifest mode.
  manifestPath: string;

  mode: PlaybackMode;
  outputDir: string;

  // Random source for backoff jitter. Injectable for deterministic tests.
  random?: () => number;

  recovery: RecoveryConfig;
  sequencer: PlaybackSequencer;
}

/**
 * Supervisor state for status reporting and the health endpoint.
 */
export interface SupervisorStatus {

  // True while the run loop is executing.
  active: boolean;

  mode: PlaybackMode;
  nowPlaying: Nullable<string>;
  restarts: number;
  run: Nullable<{ id: string; startedAt: Date; state: RunState }>;
  runsStarted: number;
}

// Warnings logged per run before further warnings are only counted.
const MAX_LOGGED_WARNINGS = 20;

export class RunSupervisor {

  private activeRun: Nullable<SupervisedRun>;
  private loopActive: boolean;
  private readonly options: SupervisorOptions;
  private readonly random: () => number;
  private restarts: number;
  private runCount: number;

  constructor(options: SupervisorOptions) {

    this.activeRun = null;
    this.loopActive = false;
    this.options = options;
    this.random = options.random ?? Math.random;
    this.restarts = 0;
    this.runCount = 0;
  }

  /**
   * Returns the current state for status reporting.
   * @returns The supervisor status.
   */
  public getStatus(): SupervisorStatus {

    const run = this.activeRun;

    return {

      active: this.loopActive,
      mode: this.options.mode,
      nowPlaying: run?.currentInput ?? null,
      restarts: this.restarts,
      run: run ? { id: run.id, startedAt: run.startedAt, state: run.state } : null,
      runsStarted: this.runCount
    };
  }

  /**
   * Runs the supervision loop until the signal aborts or a fatal error occurs.
   * @param signal - Aborts the loop. The active process is stopped before the returned promise resolves.
   * @throws NoPlayableMediaError when every item has been denylisted.
   * @throws ProcessSpawnError when the transcoder cannot be started.
   */
  public async run(signal: AbortSignal): Promise<void> {

    this.loopActive = true;

    try {

      await this.runLoop(signal);
    } finally {

      this.loopActive = false;
      this.activeRun = null;
    }
  }

  /**
   * The body of run().
   * @param signal - Aborts the loop.
   */
  private async runLoop(signal: AbortSignal): Promise<void> {

    let target: Nullable<RunTarget> = null;
    let failures = 0;
    let hangs = 0;
    let outputFailures = 0;

    while(!signal.aborted) {

      if(!target) {

        target = this.nextTarget();
        failures = 0;
        hangs = 0;
      }

      // Output housekeeping failures are never fatal. The same target is retried with a growing backoff until the directory is usable again or we shut down.
      try {

        // eslint-disable-next-line no-await-in-loop
        await this.prepareOutput(target);
      } catch(error) {

        outputFailures++;

        const retryIn = jitteredDelay(Math.min(this.options.recovery.restartDelay * (2 ** (outputFailures - 1)), this.options.recovery.maxBackoffDelay),
          this.options.recovery.backoffJitter, this.random);

        LOG.error("Unable to prepare the output for %s (attempt %s): %s. Retrying in %s.", describeTarget(target), outputFailures, formatError(error),
          formatDuration(retryIn));

        // eslint-disable-next-line no-await-in-loop
        await delay(retryIn, signal);

        continue;
      }

      outputFailures = 0;

      let run: SupervisedRun;

      try {

        // eslint-disable-next-line no-await-in-loop
        run = await this.startRun(target, signal);
      } catch(error) {

        if(signal.aborted) {

          return;
        }

        throw error;
      }

      // eslint-disable-next-line no-await-in-loop
      const outcome = await runWithRunContext({ runId: run.id }, async () => this.superviseRun(run, signal));
      const runLog = LOG.withRunId(run.id);
      const backoff = jitteredDelay(this.options.recovery.restartDelay, this.options.recovery.backoffJitter, this.random);

      this.activeRun = null;

      switch(outcome.kind) {

        case "cancelled": {

          return;
        }

        case "completed": {

          runLog.info("%s finished after %s.", describeTarget(target), formatDuration(Date.now() - run.startedAt.getTime()));

          target = null;

          if(this.options.mode === "per-item") {

            // eslint-disable-next-line no-await-in-loop
            await delay(this.options.itemGap, signal);
          }

          break;
        }

        case "critical": {

          runLog.error("Critical decoder error while playing %s: %s", outcome.suspect ? mediaName(outcome.suspect) : "an unidentified input", outcome.line);

          // eslint-disable-next-line no-await-in-loop
          await this.handleBadInput(outcome.suspect, runLog);

          target = null;
          this.restarts++;

          // eslint-disable-next-line no-await-in-loop
          await delay(backoff, signal);

          break;
        }

        case "failed": {

          failures++;
          this.restarts++;

          if(failures < 2) {

            runLog.warn("FFmpeg exited with %s while playing %s. Retrying in %s.", describeExit(outcome), describeTarget(target), formatDuration(backoff));

            // eslint-disable-next-line no-await-in-loop
            await delay(backoff, signal);

            break;
          }

          const suspect = (target.kind === "item") ? target.item.path : run.currentInput;

          runLog.error("FFmpeg exited with %s again while playing %s. Treating it as unplayable.", describeExit(outcome),
            suspect ? mediaName(suspect) : describeTarget(target));

          // eslint-disable-next-line no-await-in-loop
          await this.handleBadInput(suspect, runLog);

          target = null;

          // eslint-disable-next-line no-await-in-loop
          await delay(backoff, signal);

          break;
        }

        case "hung": {

          hangs++;
          this.restarts++;

          runLog.warn("No progress from FFmpeg for %s while playing %s. Restarting in %s.", formatDuration(outcome.silentFor), describeTarget(target),
            formatDuration(backoff));

          if((target.kind === "item") && (hangs >= this.options.recovery.maxHangRestarts)) {

            runLog.warn("%s hung %s times in a row. Moving on to the next item.", mediaName(target.item.path), hangs);

            target = null;
          }

          // eslint-disable-next-line no-await-in-loop
          await delay(backoff, signal);

          break;
        }

        default: {

          break;
        }
      }
    }
  }

  /**
   * Starts a transcoder for the target, retrying spawn failures with exponential backoff.
   * @param target - The item or manifest to play.
   * @param signal - Optional abort signal that ends the retries early.
   * @returns The new run.
   * @throws ProcessSpawnError if every attempt fails.
   */
  public async startRun(target: RunTarget, signal?: AbortSignal): Promise<SupervisedRun> {

    const recovery = this.options.recovery;
    let transcoder: TranscoderProcess;

    try {

      transcoder = await retryOperation(async () => this.options.engine.start(target), {

        baseDelay: Math.max(recovery.restartDelay, 100),
        jitter: recovery.backoffJitter,
        maxAttempts: recovery.maxSpawnAttempts,
        maxDelay: recovery.maxBackoffDelay
      }, "starting FFmpeg", signal);
    } catch(error) {

      if(error instanceof ProcessSpawnError) {

        throw error;
      }

      throw new ProcessSpawnError("ffmpeg", "Unable to start FFmpeg: " + formatError(error), { cause: error });
    }

    this.runCount++;

    const run: SupervisedRun = {

      counters: { criticalErrors: 0, progressReports: 0, warnings: 0 },
      currentInput: (target.kind === "item") ? target.item.path : null,
      id: "r" + String(this.runCount).padStart(4, "0"),
      lastHealthySignalAt: Date.now(),
      process: transcoder,
      startedAt: new Date(),
      state: "running",
      target
    };

    this.activeRun = run;

    LOG.withRunId(run.id).info("Started FFmpeg (pid %s) for %s.", transcoder.pid ?? "unknown", describeTarget(target));

    return run;
  }

  /**
   * Stops a run: SIGTERM, then SIGKILL after the grace period. With force, SIGKILL is sent at once.
   * @param run - The run to stop.
   * @param options - Stop options.
   * @returns Once the process has exited.
   */
  public async stopRun(run: SupervisedRun, options: { force?: boolean } = {}): Promise<TranscoderExit> {

    if(run.state === "running") {

      run.state = "stopping";

      if(options.force) {

        run.process.kill();
      } else {

        run.process.terminate();

        const graceTimer = new AbortController();
        const exitedInTime = await Promise.race([ run.process.exited.then(() => true),
          delay(this.options.recovery.stopGracePeriod, graceTimer.signal).then(() => false) ]);

        graceTimer.abort();

        if(!exitedInTime) {

          LOG.withRunId(run.id).warn("FFmpeg did not exit within %s of SIGTERM. Sending SIGKILL.", formatDuration(this.options.recovery.stopGracePeriod));

          run.process.kill();
        }
      }
    }

    const exit = await run.process.exited;

    run.state = "exited";

    return exit;
  }

  /**
   * Picks the next unit of work: the next item, or the next cycle as a manifest. The manifest file itself is written by prepareOutput().
   * @returns The run target.
   * @throws NoPlayableMediaError when every item has been denylisted.
   */
  private nextTarget(): RunTarget {

    if(this.options.mode === "per-item") {

      return { item: this.options.sequencer.next(), kind: "item" };
    }

    const items: MediaItem[] = this.options.sequencer.nextCycle();
    const manifest: PlaylistManifest = { generatedAt: new Date(), items, path: this.options.manifestPath };

    return { kind: "manifest", manifest };
  }

  /**
   * Gets the filesystem ready for a run: writes the manifest in manifest mode, then removes stale segments.
   * @param target - The run target.
   */
  private async prepareOutput(target: RunTarget): Promise<void> {

    if(target.kind === "manifest") {

      await writeManifest(target.manifest.path, target.manifest.items);

      LOG.info("Wrote a manifest of %s items to %s.", target.manifest.items.length, target.manifest.path);
    }

    await clearSegments(this.options.outputDir);
  }

  /**
   * Denylists a suspect input, or notes that the failure could not be attributed.
   * @param suspect - Path of the suspect input, or null.
   * @param runLog - Logger bound to the failed run.
   */
  private async handleBadInput(suspect: Nullable<string>, runLog: BoundLogger): Promise<void> {

    if(!suspect) {

      runLog.warn("Unable to tell which input failed. Nothing was denylisted.");

      return;
    }

    await this.options.sequencer.reportBad(suspect);
  }

  /**
   * Watches a live run until its outcome is known, then makes sure the process has exited.
   * @param run - The run to watch.
   * @param signal - Shutdown signal.
   * @returns The outcome.
   */
  private async superviseRun(run: SupervisedRun, signal: AbortSignal): Promise<RunOutcome> {

    const { criticalErrorThreshold, livenessWindow } = this.options.recovery;
    const manifestInputs = (run.target.kind === "manifest") ? new Set(run.target.manifest.items.map((item) => item.path)) : null;
    const lines = createInterface({ crlfDelay: Infinity, input: run.process.diagnostics });

    const outcome = await new Promise<RunOutcome>((resolve) => {

      let settled = false;
      let livenessTimer: Nullable<ReturnType<typeof setTimeout>> = null;

      const armLiveness = (): void => {

        if(livenessTimer) {

          clearTimeout(livenessTimer);
        }

        livenessTimer = setTimeout(() => settle({ kind: "hung", silentFor: Date.now() - run.lastHealthySignalAt }), livenessWindow);
      };

      const onAbort = (): void => settle({ kind: "cancelled" });

      const settle = (result: RunOutcome): void => {

        if(settled) {

          return;
        }

        settled = true;

        if(livenessTimer) {

          clearTimeout(livenessTimer);
        }

        signal.removeEventListener("abort", onAbort);
        resolve(result);
      };

      lines.on("line", (line) => {

        if(settled) {

          LOG.debug("transcoder:stderr", "(after outcome) %s", line);

          return;
        }

        const lineSignal = classifyLine(line);
        const result = this.applySignal(run, lineSignal, manifestInputs, criticalErrorThreshold);

        if(lineSignal.kind === "progress") {

          armLiveness();
        }

        if(result) {

          settle(result);
        }
      });

      void run.process.exited.then((exit) => {

        const exitSignal: HealthSignal = { code: exit.code, kind: "exited", signal: exit.signal };

        LOG.debug("supervisor", "FFmpeg exited (code %s, signal %s).", exitSignal.code, exitSignal.signal);

        settle((exitSignal.code === 0) ? { kind: "completed" } : { code: exitSignal.code, kind: "failed", signal: exitSignal.signal });
      });

      signal.addEventListener("abort", onAbort, { once: true });

      if(signal.aborted) {

        onAbort();

        return;
      }

      armLiveness();
    });

    LOG.debug("supervisor", "Run outcome: %s.", outcome.kind);

    switch(outcome.kind) {

      case "completed":
      case "failed": {

        run.state = "exited";

        break;
      }

      default: {

        await this.stopRun(run, { force: outcome.kind === "hung" });

        break;
      }
    }

    lines.close();

    if(run.counters.warnings > MAX_LOGGED_WARNINGS) {

      LOG.warn("FFmpeg reported %s warnings in total during this run.", run.counters.warnings);
    }

    return outcome;
  }

  /**
   * Applies a classified line to a run and decides whether it ends the run.
   * @param run - The live run.
   * @param lineSignal - The classified line.
   * @param manifestInputs - Paths in the manifest, in manifest mode.
   * @param criticalErrorThreshold - Critical markers that end a run.
   * @returns The outcome if the line decides one, or null.
   */
  private applySignal(run: SupervisedRun, lineSignal: LineSignal, manifestInputs: Nullable<Set<string>>,
    criticalErrorThreshold: number): Nullable<RunOutcome> {

    LOG.debug("transcoder:stderr", "[%s] %s", lineSignal.kind, lineSignal.line);

    switch(lineSignal.kind) {

      case "progress": {

        run.counters.progressReports++;
        run.lastHealthySignalAt = Date.now();

        return null;
      }

      case "inputOpened": {

        // The manifest itself and anything else outside it, such as an external subtitle, is not a playable input. FFmpeg opens every item again on each pass
        // through the looped manifest, and each opening counts as a play.
        if(manifestInputs?.has(lineSignal.path)) {

          run.currentInput = lineSignal.path;
          this.options.sequencer.recordPlayed(lineSignal.path);

          LOG.info("Now playing %s.", mediaName(lineSignal.path));
        }

        return null;
      }

      case "warning": {

        run.counters.warnings++;

        if(run.counters.warnings <= MAX_LOGGED_WARNINGS) {

          LOG.warn("FFmpeg: %s", lineSignal.line);
        }

        return null;
      }

      case "critical": {

        run.counters.criticalErrors++;

        if(run.counters.criticalErrors < criticalErrorThreshold) {

          LOG.warn("FFmpeg reported a decoder error (%s of %s): %s", run.counters.criticalErrors, criticalErrorThreshold, lineSignal.line);

          return null;
        }

        return { kind: "critical", line: lineSignal.line, suspect: run.currentInput };
      }

      default: {

        return null;
      }
    }
  }
}

/**
 * Describes a run target for log messages.
 * @param target - The run target.
 * @returns A short description.
 */
function describeTarget(target: RunTarget): string {

  return (target.kind === "item") ? mediaName(target.item.path) : [ "a manifest of ", String(target.manifest.items.length), " items" ].join("");
}

/**
 * Describes how a process exited.
 * @param exit - Exit code and signal.
 * @returns A short description.
 */
function describeExit(exit: { code: number | null; signal: NodeJS.Signals | null }): string {

  return (exit.code !== null) ? "code " + String(exit.code) : "signal " + (exit.signal ?? "unknown");
}
