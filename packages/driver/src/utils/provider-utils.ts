/**
 * Shared polling helpers for the provider binding and readiness probes.
 */

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface WaitOptions {
  maxWaitMs: number;
  pollIntervalMs: number;
}

/**
 * Poll `getState` until `isDesiredState` holds. Resolves with the matching
 * state, or undefined once `maxWaitMs` has passed; the caller decides which
 * error a timeout becomes.
 */
export async function waitForState<T>(
  getState: () => Promise<T>,
  isDesiredState: (state: T) => boolean,
  options: WaitOptions
): Promise<T | undefined> {
  const { maxWaitMs, pollIntervalMs } = options;
  const startTime = Date.now();

  for (;;) {
    const state = await getState();
    if (isDesiredState(state)) {
      return state;
    }
    const remaining = maxWaitMs - (Date.now() - startTime);
    if (remaining <= 0) {
      return undefined;
    }
    await sleep(Math.min(pollIntervalMs, remaining));
  }
}
