export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Longest delay a Node timer accepts; larger values fire after 1ms. */
export const MAX_TIMER_MS = 2_147_483_647;

/**
 * Resolves after `ms`, or as soon as `signal` aborts. Never rejects, so callers
 * check `signal.aborted` after waking. Delays past `MAX_TIMER_MS` wake early at
 * that limit; callers re-check the time after every wake.
 */
export function wait(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.min(MAX_TIMER_MS, Math.max(0, ms)));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
