/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * runContext.ts: AsyncLocalStorage-based run context for automatic log correlation.
 */
import { AsyncLocalStorage } from "async_hooks";

/* This module provides an AsyncLocalStorage-based context that automatically propagates through async/await chains. When the supervisor starts a transcoder run,
 * it establishes a context containing the run ID. Log statements anywhere in the call chain, including the diagnostic line handlers registered inside the context,
 * are prefixed with that ID without functions needing to accept and pass through a runId parameter.
 *
 * AsyncLocalStorage context is lost when entering a new async context that was created elsewhere, such as an interval started at boot. For those cases use
 * LOG.withRunId() instead.
 */

/**
 * Run context containing metadata for the current transcoder run.
 */
export interface RunContext {

  // Unique run identifier used for log correlation (e.g., "r0007").
  runId: string;
}

// AsyncLocalStorage instance for run context.
const runContextStorage = new AsyncLocalStorage<RunContext>();

/**
 * Runs a function within a run context. All async operations called within the function will have access to the run context via getRunId().
 * @param context - The run context.
 * @param fn - The async function to run within the context.
 * @returns The result of the function.
 */
export async function runWithRunContext<T>(context: RunContext, fn: () => Promise<T>): Promise<T> {

  return runContextStorage.run(context, fn);
}

/**
 * Retrieves the run ID for the current async operation.
 * @returns The run ID, or undefined if not running within a run context.
 */
export function getRunId(): string | undefined {

  return runContextStorage.getStore()?.runId;
}
