/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Playback module exports for Reelcast.
 */
export * from "./denylist.js";
export * from "./manifest.js";
export * from "./sequencer.js";
