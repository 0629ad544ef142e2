/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * debugFilter.ts: Category-based debug log filtering for Reelcast.
 */

/* Debug output is grouped into the categories below. REELCAST_DEBUG takes a comma-separated list of patterns: "*" for everything, a category name (which also
 * covers its sub-categories, so "transcoder" and "transcoder:*" are the same), or a pattern prefixed with "-" to exclude it. Exclusions beat everything else.
 *
 *   REELCAST_DEBUG=supervisor                   Run loop decisions only.
 *   REELCAST_DEBUG=*,-transcoder:stderr         Everything except raw FFmpeg output.
 */

/**
 * A known debug category, listed by --help.
 */
export interface DebugCategory {

  readonly category: string;
  readonly description: string;
}

export const DEBUG_CATEGORIES: readonly DebugCategory[] = [

  { category: "config", description: "Configuration merging and path resolution." },
  { category: "inventory", description: "Directory scan, skipped files, probe results and timings." },
  { category: "output", description: "Segment cleanup and playlist readiness polling." },
  { category: "retry", description: "Spawn retry attempts." },
  { category: "sequencer", description: "Shuffles, cursor movement and denylist updates." },
  { category: "status", description: "Output directory statistics." },
  { category: "supervisor", description: "Run loop decisions: starts, stops, restarts, liveness timer." },
  { category: "transcoder:args", description: "Full FFmpeg command lines." },
  { category: "transcoder:stderr", description: "Every FFmpeg diagnostic line with its classification." }
];

/**
 * A parsed REELCAST_DEBUG value.
 */
export interface DebugRules {

  exclude: readonly string[];
  include: readonly string[];
  wildcard: boolean;
}

// The active rules, or null when debug output is off.
let activeRules: DebugRules | null = null;

/**
 * Tests whether a category falls under a pattern: the same category, or one of its sub-categories.
 * @param category - The category.
 * @param pattern - A normalized pattern, without a trailing ":*".
 * @returns True on a match.
 */
function covers(pattern: string, category: string): boolean {

  return (category === pattern) || category.startsWith(pattern + ":");
}

/**
 * Parses a REELCAST_DEBUG value.
 * @param pattern - Comma-separated patterns.
 * @returns The rules, or null when the value names nothing.
 */
export function parseDebugPattern(pattern: string): DebugRules | null {

  const parts = pattern.split(",").map((part) => part.trim().replace(/:\*$/, "")).filter((part) => part.length > 0);

  if(!parts.length) {

    return null;
  }

  return {

    exclude: parts.filter((part) => part.startsWith("-")).map((part) => part.substring(1)),
    include: parts.filter((part) => !part.startsWith("-") && (part !== "*")),
    wildcard: parts.includes("*")
  };
}

/**
 * Replaces the active debug filter.
 * @param pattern - A REELCAST_DEBUG value. An empty string turns debug output off.
 * @returns The patterns that match no known category, so the caller can warn about typos.
 */
export function initDebugFilter(pattern: string): string[] {

  activeRules = parseDebugPattern(pattern);

  if(!activeRules) {

    return [];
  }

  return [ ...activeRules.include, ...activeRules.exclude ].filter((entry) => !DEBUG_CATEGORIES.some((known) => covers(entry, known.category)));
}

/**
 * Checks whether debug output is enabled for a category.
 * @param category - The category.
 * @returns True if the message should be logged.
 */
export function isCategoryEnabled(category: string): boolean {

  if(!activeRules || activeRules.exclude.some((pattern) => covers(pattern, category))) {

    return false;
  }

  return activeRules.wildcard || activeRules.include.some((pattern) => covers(pattern, category));
}

/**
 * Whether any debug output is configured. The file logger does not trim its file while debugging.
 * @returns True when a filter is active.
 */
export function isDebugEnabled(): boolean {

  return activeRules !== null;
}
