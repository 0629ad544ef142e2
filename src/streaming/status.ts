/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * status.ts: Periodic playback status reporting for Reelcast.
 */
import { LOG, formatBytes, formatError, mediaName } from "../utils/index.js";
import { type OutputStats, getOutputStats } from "./output.js";
import type { Nullable } from "../types/index.js";
import type { PlaybackSequencer } from "../playback/index.js";
import type { RunSupervisor } from "./supervisor.js";

/* Once a minute the reporter logs one line summarizing playback: how many items have played, where we are in the current cycle, what is playing, and the last
 * few items. It also logs the state of the output directory whenever that changes, which is the quickest way to see that segments are still being produced.
 * A failed report is logged and the next one runs on schedule.
 */

// Number of recent items listed in each report.
const RECENT_ITEMS = 5;

/**
 * Reporter settings and collaborators.
 */
export interface StatusReporterOptions {

  // Interval between reports, in milliseconds.
  interval: number;

  outputDir: string;
  sequencer: PlaybackSequencer;
  supervisor: RunSupervisor;
}

export class StatusReporter {

  private inFlight: Nullable<Promise<void>>;
  private lastOutputSummary: Nullable<string>;
  private readonly options: StatusReporterOptions;
  private timer: Nullable<ReturnType<typeof setInterval>>;

  constructor(options: StatusReporterOptions) {

    this.inFlight = null;
    this.lastOutputSummary = null;
    this.options = options;
    this.timer = null;
  }

  /**
   * Starts periodic reporting. Calling start() on a running reporter does nothing.
   */
  public start(): void {

    if(this.timer) {

      return;
    }

    this.timer = setInterval(() => {

      // Skip a tick rather than overlap a slow report.
      if(this.inFlight) {

        return;
      }

      this.inFlight = this.report().finally(() => {

        this.inFlight = null;
      });
    }, this.options.interval);
  }

  /**
   * Stops periodic reporting and waits for a report that is in progress.
   */
  public async stop(): Promise<void> {

    if(this.timer) {

      clearInterval(this.timer);
      this.timer = null;
    }

    if(this.inFlight) {

      await this.inFlight;
    }
  }

  /**
   * Builds the playback summary line.
   * @returns The summary.
   */
  public formatPlaybackSummary(): string {

    const snapshot = this.options.sequencer.snapshot(RECENT_ITEMS);
    const status = this.options.supervisor.getStatus();
    const recent = snapshot.recent.map((entry) => mediaName(entry));

    return [
      "Played ", String(snapshot.totalPlayed), " items (cycle ", String(snapshot.cycleCount), ", ", String(snapshot.cursor), " of ", String(snapshot.size), "). ",
      "Now playing: ", status.nowPlaying ? mediaName(status.nowPlaying) : "nothing", ". ",
      "Recent: ", (recent.length > 0) ? recent.join(", ") : "none", "."
    ].join("");
  }

  /**
   * Logs one report. Never throws.
   */
  public async report(): Promise<void> {

    try {

      LOG.info("%s", this.formatPlaybackSummary());

      const summary = formatOutputSummary(await getOutputStats(this.options.outputDir));

      if(summary !== this.lastOutputSummary) {

        this.lastOutputSummary = summary;

        LOG.info("%s", summary);
      }
    } catch(error) {

      LOG.warn("Unable to report status: %s.", formatError(error));
    }
  }
}

/**
 * Describes the output directory in one line.
 * @param stats - Output directory statistics.
 * @returns The summary.
 */
export function formatOutputSummary(stats: OutputStats): string {

  if(stats.playlistBytes === null) {

    return [ "Output: no playlist yet, ", String(stats.segmentCount), " segments." ].join("");
  }

  return [ "Output: playlist ", formatBytes(stats.playlistBytes), ", ", String(stats.segmentCount), " segments, latest ", stats.latestSegment ?? "none", "." ].join("");
}
