/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Media module exports for Reelcast.
 */
export * from "./inventory.js";
export * from "./prober.js";
