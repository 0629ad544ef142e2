/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * retry.ts: Retry logic with exponential backoff for Reelcast.
 */
import { delay } from "./delay.js";
import { formatError } from "./errors.js";
import { LOG } from "./logger.js";

/* The retry system provides resilient operation execution with exponential backoff and jitter. The supervisor uses it around transcoder spawning, where failures
 * come from the environment (a missing binary, exhausted process table) rather than from a media file. The exponential backoff gives the environment time to
 * recover, while jitter keeps retries from landing at a fixed cadence.
 */

/**
 * Backoff parameters for retryOperation().
 */
export interface RetryPolicy {

  // Delay in milliseconds before the second attempt. Doubles for each further attempt.
  baseDelay: number;

  // Maximum random jitter in milliseconds added to each delay.
  jitter: number;

  // Maximum number of attempts before giving up.
  maxAttempts: number;

  // Cap in milliseconds for the exponential delay.
  maxDelay: number;
}

/**
 * Implements a generic retry mechanism with exponential backoff and jitter. This function attempts an operation multiple times, waiting progressively longer between
 * attempts.
 * @param operation - An async function to attempt. Should throw on failure.
 * @param policy - Backoff parameters.
 * @param description - Human-readable description for logging purposes.
 * @param signal - Optional abort signal. When it fires, retries stop and the last error is rethrown.
 * @returns The result of the operation if successful.
 * @throws The last error encountered if all attempts fail.
 */
export async function retryOperation<T>(operation: () => Promise<T>, policy: RetryPolicy, description: string, signal?: AbortSignal): Promise<T> {

  let lastError: unknown = new Error("Operation aborted before the first attempt: " + description + ".");

  for(let attempt = 1; attempt <= policy.maxAttempts; attempt++) {

    // Check if we should abort before starting this attempt. This catches shutdown requests that arrived during the backoff delay.
    if(signal?.aborted) {

      break;
    }

    if(attempt > 1) {

      LOG.debug("retry", "Retrying %s (attempt %s of %s).", description, attempt, policy.maxAttempts);
    }

    try {

      // eslint-disable-next-line no-await-in-loop
      return await operation();
    } catch(error) {

      lastError = error;

      LOG.warn("Attempt %s of %s failed for %s: %s.", attempt, policy.maxAttempts, description, formatError(error));

      // Between retry attempts, wait with exponential backoff plus random jitter.
      if(attempt < policy.maxAttempts) {

        const baseDelay = Math.min(policy.baseDelay * Math.pow(2, attempt - 1), policy.maxDelay);
        const jitter = Math.random() * policy.jitter;

        // eslint-disable-next-line no-await-in-loop
        await delay(baseDelay + jitter, signal);
      }
    }
  }

  throw lastError;
}
