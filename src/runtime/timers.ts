import { clearTimeout as nodeClearTimeout, setTimeout as nodeSetTimeout } from "node:timers";

/**
 * Handle returned by {@link runtimeSetTimeout}. Fake timers replace the
 * implementation at runtime but the nominal Node.js shape is retained.
 */
export type TimeoutHandle = ReturnType<typeof nodeSetTimeout>;

const fallbackTimers = {
  setTimeout: nodeSetTimeout,
  clearTimeout: nodeClearTimeout,
} as const;

/**
 * Retrieves the timer function currently exposed on {@link globalThis}. When
 * Sinon installs fake timers the overrides live there, so deadlines scheduled
 * through these helpers stay under the control of the test clock.
 */
function resolveTimer<K extends keyof typeof fallbackTimers>(key: K): (typeof fallbackTimers)[K] {
  const candidate = (globalThis as Record<string, unknown>)[key];
  if (typeof candidate === "function") {
    return candidate as (typeof fallbackTimers)[K];
  }
  return fallbackTimers[key];
}

/** Schedules a timeout using the currently active timer implementation. */
export function runtimeSetTimeout(callback: () => void, delayMs: number): TimeoutHandle {
  const candidate = resolveTimer("setTimeout");
  return candidate(callback, delayMs);
}

/** Cancels a timeout scheduled with {@link runtimeSetTimeout}. */
export function runtimeClearTimeout(handle: TimeoutHandle): void {
  const candidate = resolveTimer("clearTimeout");
  candidate(handle);
}
