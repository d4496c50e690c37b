import { GeminiRequestError } from "./errors.js";

/** Smallest accepted deadline, in seconds. */
export const MIN_TIMEOUT_SECS = 1;
/** Largest accepted deadline, in seconds. */
export const MAX_TIMEOUT_SECS = 3_600;
/** Deadline applied when neither the request nor the environment sets one. */
export const DEFAULT_TIMEOUT_SECS = 600;

/** Raw fields accepted by {@link createInvocationRequest}. */
export interface InvocationRequestInput {
  readonly prompt: string;
  readonly sandbox?: boolean;
  readonly sessionId?: string | null;
  readonly model?: string | null;
  readonly returnAllMessages?: boolean;
  readonly timeoutSecs?: number | null;
}

/** Validated, immutable description of one Gemini invocation. */
export interface InvocationRequest {
  /** Task text, guaranteed non-blank. */
  readonly prompt: string;
  /** Run the CLI in its sandbox (isolation) mode. */
  readonly sandbox: boolean;
  /** Conversation to resume, `null` for a new session. */
  readonly sessionId: string | null;
  readonly model: string | null;
  /** Full capture: keep every decoded event for the caller. */
  readonly returnAllMessages: boolean;
  /** Per-request deadline; `null` defers to the configured default. */
  readonly timeoutSecs: number | null;
}

/** Whether a timeout (in seconds) is an integer inside [MIN, MAX]. */
export function isTimeoutWithinBounds(value: number): boolean {
  return Number.isInteger(value) && value >= MIN_TIMEOUT_SECS && value <= MAX_TIMEOUT_SECS;
}

/**
 * Validates the raw input and returns a frozen {@link InvocationRequest}.
 * Violations throw {@link GeminiRequestError} synchronously, before any file
 * is read or process spawned.
 */
export function createInvocationRequest(input: InvocationRequestInput): InvocationRequest {
  if (typeof input.prompt !== "string" || input.prompt.trim().length === 0) {
    throw new GeminiRequestError("Prompt must be a non-empty, non-whitespace string");
  }

  const timeoutSecs = input.timeoutSecs ?? null;
  if (timeoutSecs !== null && !isTimeoutWithinBounds(timeoutSecs)) {
    throw new GeminiRequestError(
      `timeout_secs must be between ${MIN_TIMEOUT_SECS} and ${MAX_TIMEOUT_SECS} seconds`,
    );
  }

  const model = input.model ?? null;
  if (model !== null && model.trim().length === 0) {
    throw new GeminiRequestError(
      "Model overrides must be explicitly requested as a non-empty, non-whitespace string",
    );
  }

  const sessionId = input.sessionId ?? null;

  return Object.freeze({
    prompt: input.prompt,
    sandbox: input.sandbox ?? false,
    sessionId: sessionId !== null && sessionId.length > 0 ? sessionId : null,
    model,
    returnAllMessages: input.returnAllMessages ?? false,
    timeoutSecs,
  });
}
