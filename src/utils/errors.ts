/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * errors.ts: Error types and formatting utilities for Reelcast.
 */

/* These utilities provide consistent error handling and formatting throughout the application. The formatError function extracts meaningful messages from various
 * error types. The error classes below are the failures that cross module boundaries: everything else that goes wrong with a single media file is absorbed into a
 * sequencing decision (skip, retry, denylist) and never thrown.
 */

/**
 * Formats an error for logging by extracting the message if available, falling back to string conversion for non-Error objects. Trailing punctuation is stripped
 * to allow callers to add consistent punctuation in their log format strings.
 * @param error - The error to format.
 * @returns A string representation suitable for logging, without trailing punctuation.
 */
export function formatError(error: unknown): string {

  let message: string;

  if(error instanceof Error) {

    message = error.message;
  } else if(error && (typeof error === "object") && ("message" in error) && (typeof error.message === "string")) {

    message = error.message;
  } else {

    message = String(error);
  }

  // Strip trailing punctuation to prevent double punctuation when callers add their own.
  return message.replace(/[.!?]+$/, "");
}

/**
 * Thrown at startup when the media directory yields no candidates, or none of the candidates survive validation. There is nothing to stream.
 */
export class NoMediaFoundError extends Error {

  public readonly rootDir: string;

  constructor(rootDir: string, message: string) {

    super(message);

    this.name = "NoMediaFoundError";
    this.rootDir = rootDir;
  }
}

/**
 * Thrown by the sequencer when every item has been denylisted. The operator needs to refresh the media library.
 */
export class NoPlayableMediaError extends Error {

  constructor(message = "Every media item has been denylisted. Nothing is left to play.") {

    super(message);

    this.name = "NoPlayableMediaError";
  }
}

/**
 * A probe that failed or timed out. Excludes a single candidate from the inventory.
 */
export class ProbeError extends Error {

  public readonly path: string;
  public readonly timedOut: boolean;

  constructor(path: string, message: string, timedOut = false) {

    super(message);

    this.name = "ProbeError";
    this.path = path;
    this.timedOut = timedOut;
  }
}

/**
 * The transcoder could not be started. Retried with backoff by the supervisor; fatal once the attempts are exhausted.
 */
export class ProcessSpawnError extends Error {

  public readonly command: string;

  constructor(command: string, message: string, options?: { cause?: unknown }) {

    super(message, options);

    this.name = "ProcessSpawnError";
    this.command = command;
  }
}

/**
 * Returns true for the errors that end the service: an empty or exhausted catalog, or a transcoder that cannot be started.
 * @param error - The error to check.
 * @returns True if the error is fatal to streaming.
 */
export function isFatalStreamingError(error: unknown): boolean {

  return (error instanceof NoPlayableMediaError) || (error instanceof ProcessSpawnError) || (error instanceof NoMediaFoundError);
}
