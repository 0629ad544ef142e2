/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * delay.ts: Async delay utility for Reelcast.
 */

/**
 * Creates a promise that resolves after the specified delay. When an abort signal is supplied, the promise resolves early as soon as the signal fires, so that
 * backoff waits never hold up shutdown. It never rejects: callers check the signal afterwards if they need to know whether the wait was cut short.
 * @param ms - The delay duration in milliseconds.
 * @param signal - Optional abort signal that ends the wait early.
 * @returns A promise that resolves after the delay or on abort.
 */
export async function delay(ms: number, signal?: AbortSignal): Promise<void> {

  if(signal?.aborted) {

    return;
  }

  return new Promise<void>((resolve) => {

    const onAbort = (): void => {

      clearTimeout(timer);
      resolve();
    };

    const timer = setTimeout(() => {

      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Returns a delay with random jitter added, used to spread restarts so a crashing input cannot produce a tight restart loop at a fixed cadence.
 * @param baseMs - The base delay in milliseconds.
 * @param jitterMs - The maximum jitter in milliseconds.
 * @param random - Random source returning values in [0, 1).
 * @returns The jittered delay in milliseconds.
 */
export function jitteredDelay(baseMs: number, jitterMs: number, random: () => number = Math.random): number {

  return baseMs + Math.floor(random() * jitterMs);
}
