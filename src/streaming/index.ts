/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Streaming module exports for Reelcast.
 */
export * from "./classifier.js";
export * from "./output.js";
export * from "./status.js";
export * from "./supervisor.js";
