import type { StructuredLogger } from "../logger.js";
import { runtimeClearTimeout, runtimeSetTimeout } from "../runtime/timers.js";
import { GeminiTimeoutError } from "./errors.js";

export interface DeadlineOptions {
  readonly timeoutSecs: number;
  /** Forcefully stops the work; awaited before the timeout error is raised. */
  readonly terminate: () => Promise<void>;
  readonly logger?: StructuredLogger;
  /** Identifier attached to the timeout log entries. */
  readonly pid?: number | null;
}

const TIMED_OUT = Symbol("timed-out");

/**
 * Settles with {@link work} when it completes within the deadline. Otherwise
 * terminates the child, waits for the termination to finish and rejects with
 * {@link GeminiTimeoutError}. Whatever the abandoned work produces afterwards
 * is dropped.
 */
export async function runWithDeadline<T>(work: Promise<T>, options: DeadlineOptions): Promise<T> {
  let expire: () => void = () => undefined;
  const deadline = new Promise<typeof TIMED_OUT>((resolve) => {
    expire = () => resolve(TIMED_OUT);
  });
  const handle = runtimeSetTimeout(() => expire(), options.timeoutSecs * 1_000);

  let outcome: T | typeof TIMED_OUT;
  try {
    outcome = await Promise.race([work, deadline]);
  } finally {
    runtimeClearTimeout(handle);
  }

  if (outcome !== TIMED_OUT) {
    return outcome;
  }

  options.logger?.warn("gemini_timeout", { timeout_secs: options.timeoutSecs, pid: options.pid ?? null });
  void work.catch((error: unknown) => {
    options.logger?.debug("gemini_run_discarded", {
      reason: error instanceof Error ? error.message : String(error),
    });
  });
  await options.terminate();
  throw new GeminiTimeoutError(options.timeoutSecs);
}
