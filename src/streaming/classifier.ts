/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * classifier.ts: Classification of FFmpeg diagnostic output into health signals.
 */

/*
 * DIAGNOSTIC CLASSIFICATION
 *
 * FFmpeg reports everything the supervisor needs to know on stderr, as free text: -stats progress lines, the inputs it opens, warnings, and the decoder failures
 * that mean a file is corrupt. Each line is matched against the table below, first match wins:
 *
 *   critical     Decoder-level corruption. The file being decoded is suspect.
 *   inputOpened  "Opening '<path>' for reading". Tells the supervisor which input is current in manifest mode.
 *   progress     A -stats frame or size report. Resets the liveness timer.
 *   warning      Anything mentioning a warning or an error. Logged, never acted on.
 *   info         Everything else.
 *
 * The process exit is not a line but completes the set of health signals the supervisor reacts to.
 */

/**
 * The classification of a single diagnostic line.
 */
export type LineSignal =
  { kind: "critical"; line: string; marker: string } |
  { kind: "info"; line: string } |
  { kind: "inputOpened"; line: string; path: string } |
  { kind: "progress"; line: string } |
  { kind: "warning"; line: string };

/**
 * Everything the supervisor observes about a running transcoder.
 */
export type HealthSignal = LineSignal | { code: number | null; kind: "exited"; signal: NodeJS.Signals | null };

/**
 * An entry in the classification table.
 */
export interface LinePattern {

  kind: Exclude<LineSignal["kind"], "info">;
  pattern: RegExp;
}

/**
 * The classification table, in priority order. Critical markers come first because they also mention errors.
 */
export const LINE_PATTERNS: readonly LinePattern[] = [

  { kind: "critical", pattern: /Error submitting packet to decoder/ },
  { kind: "critical", pattern: /Decoder thread returned error/ },
  { kind: "critical", pattern: /Internal bug, should not have happened/ },
  { kind: "critical", pattern: /moov atom not found/ },
  { kind: "inputOpened", pattern: /Opening '(.*)' for reading/ },
  { kind: "progress", pattern: /frame=\s*\d+.*fps=/ },
  { kind: "progress", pattern: /size=\s*\S+\s+time=/ },
  { kind: "warning", pattern: /\b(?:warning|error|failed|invalid|could not)\b/i }
];

/**
 * Classifies a single line of FFmpeg diagnostic output.
 * @param rawLine - The line, with or without surrounding whitespace.
 * @returns The signal the line carries.
 */
export function classifyLine(rawLine: string): LineSignal {

  const line = rawLine.trim();

  for(const entry of LINE_PATTERNS) {

    const match = entry.pattern.exec(line);

    if(!match) {

      continue;
    }

    switch(entry.kind) {

      case "critical": {

        return { kind: "critical", line, marker: match[0] };
      }

      case "inputOpened": {

        return { kind: "inputOpened", line, path: match[1] };
      }

      default: {

        return { kind: entry.kind, line };
      }
    }
  }

  return { kind: "info", line };
}
