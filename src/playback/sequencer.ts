/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * sequencer.ts: Shuffled, non-repeating playback order for Reelcast.
 */
import { LOG, NoPlayableMediaError, formatError, mediaName } from "../utils/index.js";
import type { MediaItem, ValidatedInventory } from "../types/index.js";
import type { DenylistStore } from "./denylist.js";

/*
 * PLAYBACK SEQUENCING
 *
 * The sequencer owns the play order. Every cycle is a fresh Fisher-Yates permutation of the playable items, and every item plays exactly once per cycle. When the
 * cycle is used up, the next request reshuffles. The state machine is small:
 *
 *   ready      cursor < order.length. next() hands out order[cursor] and advances.
 *   exhausted  cursor === order.length. next() reshuffles first, starting a new cycle.
 *   empty      every item has been denylisted. next() throws NoPlayableMediaError.
 *
 * Items reported bad are removed from the order for good and appended to the denylist, which also keeps them out after a restart. Removing an item that was
 * already played this cycle moves the cursor back by one so that no unplayed item is skipped.
 *
 * Across a cycle boundary the first item of the new permutation is never the item that just played, as long as there is more than one item.
 */

/**
 * Sequencer settings.
 */
export interface SequencerOptions {

  // Clear the play history when a new cycle begins.
  clearHistoryOnReshuffle: boolean;

  // Maximum number of history entries retained.
  historyLimit: number;

  // Random source returning values in [0, 1). Injectable for deterministic tests.
  random?: () => number;
}

/**
 * The sequencer's state. See the table above.
 */
export type SequencerState = "empty" | "exhausted" | "ready";

/**
 * Counters for status reporting.
 */
export interface SequencerSnapshot {

  cursor: number;
  cycleCount: number;

  // Most recent history entries, oldest first.
  recent: string[];

  size: number;
  totalPlayed: number;
}

export class PlaybackSequencer {

  private readonly denylist: DenylistStore;
  private readonly options: Required<SequencerOptions>;
  private order: MediaItem[];
  private cursor: number;
  private cycleCount: number;
  private history: string[];
  private totalPlayed: number;

  /**
   * Creates a sequencer over the inventory, leaving out denylisted items, and shuffles the first cycle.
   * @param inventory - The validated inventory.
   * @param denylist - The persistent denylist.
   * @param options - Sequencer settings.
   */
  constructor(inventory: ValidatedInventory, denylist: DenylistStore, options: SequencerOptions) {

    this.denylist = denylist;
    this.options = { ...options, random: options.random ?? Math.random };
    this.cursor = 0;
    this.cycleCount = 1;
    this.history = [];
    this.totalPlayed = 0;

    const playable = inventory.filter((item) => !denylist.has(item.path));
    const excluded = inventory.length - playable.length;

    if(excluded > 0) {

      LOG.info("Excluding %s denylisted files from playback.", excluded);
    }

    this.order = this.shuffle(playable);

    LOG.debug("sequencer", "Cycle 1: %s.", this.order.map((item) => mediaName(item.path)).join(", "));
  }

  /**
   * The current state.
   */
  public get state(): SequencerState {

    if(this.order.length === 0) {

      return "empty";
    }

    return (this.cursor >= this.order.length) ? "exhausted" : "ready";
  }

  /**
   * Returns the next item to play, starting a new cycle first when the current one is used up.
   * @returns The next item.
   * @throws NoPlayableMediaError if every item has been denylisted.
   */
  public next(): MediaItem {

    if(this.state === "empty") {

      throw new NoPlayableMediaError();
    }

    if(this.state === "exhausted") {

      this.reshuffle();
    }

    const item = this.order[this.cursor];

    this.cursor++;
    this.record(item.path);

    return item;
  }

  /**
   * Returns every remaining item of the current cycle, starting a new cycle first when the current one is used up. Used in manifest mode, where the whole cycle
   * is handed to the transcoder at once. Nothing is recorded here: the supervisor calls recordPlayed() as the transcoder opens each item.
   * @returns The remaining items, in play order.
   * @throws NoPlayableMediaError if every item has been denylisted.
   */
  public nextCycle(): MediaItem[] {

    if(this.state === "empty") {

      throw new NoPlayableMediaError();
    }

    if(this.state === "exhausted") {

      this.reshuffle();
    }

    const items = this.order.slice(this.cursor);

    this.cursor = this.order.length;

    return items;
  }

  /**
   * Records that the transcoder started playing an item handed out by nextCycle(). In manifest mode FFmpeg loops the manifest by itself, so an item is recorded
   * each time it is opened.
   * @param mediaPath - Path of the item.
   */
  public recordPlayed(mediaPath: string): void {

    this.record(mediaPath);
  }

  /**
   * Removes an item from rotation and denylists it. Reporting an item twice, or an item that is not in the order, still makes sure it is denylisted but changes
   * nothing else. A failure to write the denylist is logged; the item stays out of rotation for the life of the process either way.
   * @param mediaPath - Path of the item.
   * @returns True if the path was newly added to the denylist.
   */
  public async reportBad(mediaPath: string): Promise<boolean> {

    let removedBeforeCursor = 0;
    const remaining: MediaItem[] = [];

    for(const [ index, item ] of this.order.entries()) {

      if(item.path !== mediaPath) {

        remaining.push(item);

        continue;
      }

      if(index < this.cursor) {

        removedBeforeCursor++;
      }
    }

    const removed = this.order.length - remaining.length;

    this.order = remaining;
    this.cursor -= removedBeforeCursor;

    if(removed > 0) {

      LOG.warn("Removed %s from rotation. %s items remain.", mediaName(mediaPath), this.order.length);
    }

    try {

      const added = await this.denylist.add(mediaPath);

      if(added) {

        LOG.warn("Added %s to the denylist.", mediaPath);
      }

      return added;
    } catch(error) {

      LOG.error("Unable to persist %s to the denylist: %s.", mediaPath, formatError(error));

      return false;
    }
  }

  /**
   * Starts a new cycle with a fresh permutation of the remaining items.
   */
  public reshuffle(): void {

    const lastPlayed = this.history.at(-1);

    this.order = this.shuffle(this.order);

    // Keep the cycle boundary from repeating an item back to back.
    if((this.order.length > 1) && (this.order[0].path === lastPlayed)) {

      const swapIndex = 1 + Math.floor(this.options.random() * (this.order.length - 1));

      [ this.order[0], this.order[swapIndex] ] = [ this.order[swapIndex], this.order[0] ];
    }

    this.cursor = 0;
    this.cycleCount++;

    if(this.options.clearHistoryOnReshuffle) {

      this.history = [];
    }

    LOG.info("Starting shuffle cycle %s with %s items.", this.cycleCount, this.order.length);
    LOG.debug("sequencer", "Cycle %s: %s.", this.cycleCount, this.order.map((item) => mediaName(item.path)).join(", "));
  }

  /**
   * Returns the counters for status reporting.
   * @param recentCount - Number of history entries to include.
   * @returns The snapshot.
   */
  public snapshot(recentCount = 5): SequencerSnapshot {

    return {

      cursor: this.cursor,
      cycleCount: this.cycleCount,
      recent: (recentCount > 0) ? this.history.slice(-recentCount) : [],
      size: this.order.length,
      totalPlayed: this.totalPlayed
    };
  }

  /**
   * Returns a copy of the current order. Used by tests and debug logging.
   * @returns The items of the current cycle, in play order.
   */
  public currentOrder(): MediaItem[] {

    return [...this.order];
  }

  /**
   * Returns a copy of the play history, oldest first.
   * @returns The recorded paths.
   */
  public getHistory(): string[] {

    return [...this.history];
  }

  /**
   * Fisher-Yates shuffle over the injected random source.
   * @param items - Items to shuffle.
   * @returns A new, shuffled array.
   */
  private shuffle(items: readonly MediaItem[]): MediaItem[] {

    const shuffled = [...items];

    for(let i = shuffled.length - 1; i > 0; i--) {

      const j = Math.floor(this.options.random() * (i + 1));

      [ shuffled[i], shuffled[j] ] = [ shuffled[j], shuffled[i] ];
    }

    return shuffled;
  }

  /**
   * Records a played item in the capped history.
   * @param mediaPath - Path of the item.
   */
  private record(mediaPath: string): void {

    this.history.push(mediaPath);
    this.totalPlayed++;

    if(this.history.length > this.options.historyLimit) {

      this.history.splice(0, this.history.length - this.options.historyLimit);
    }
  }
}
