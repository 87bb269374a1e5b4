/**
 * Abortable waits. Every pause in a task goes through these so that stop()
 * is observed within one tick.
 */

export type WaitOutcome = "elapsed" | "cancelled";

/** Resolve after ms, or as soon as the signal aborts. Never rejects. */
export function sleep(ms: number, signal?: AbortSignal): Promise<WaitOutcome> {
  if (signal?.aborted) return Promise.resolve("cancelled");
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve("cancelled");
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve("elapsed");
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Wait totalMs in ticks of tickMs, checking the signal between ticks.
 * onTick receives the remaining milliseconds, e.g. for a countdown display.
 */
export async function waitForDuration(
  totalMs: number,
  signal: AbortSignal,
  tickMs: number,
  onTick?: (remainingMs: number) => void
): Promise<WaitOutcome> {
  let remaining = totalMs;
  while (remaining > 0) {
    if (signal.aborted) return "cancelled";
    const step = Math.min(tickMs, remaining);
    if ((await sleep(step, signal)) === "cancelled") return "cancelled";
    remaining -= step;
    onTick?.(remaining);
  }
  return signal.aborted ? "cancelled" : "elapsed";
}

export interface Timing {
  timeScale: number;
  tickMs: number;
}

/** Scale a nominal duration by the configured time scale. */
export function scaled(ms: number, timing: Timing): number {
  return Math.round(ms * timing.timeScale);
}
