/**
 * Failures raised by the Gemini runner. Each class carries a stable `code`
 * (and optionally a `hint`/`details`) picked up by the tool error normaliser so
 * MCP clients can branch on the failure kind without parsing messages.
 *
 * Protocol-content problems (malformed lines, missing session identifier...)
 * never throw: they are folded into the aggregated result instead.
 */

/** Rejected invocation request. Raised before anything is spawned. */
export class GeminiRequestError extends Error {
  public readonly code = "E-GEMINI-INVALID-INPUT";
  public readonly hint = "invalid_input";

  constructor(message: string) {
    super(message);
    this.name = "GeminiRequestError";
  }
}

/** The executable could not be started (missing binary, permission denied...). */
export class GeminiSpawnError extends Error {
  public readonly code = "E-GEMINI-SPAWN";
  public readonly hint = "binary_unavailable";
  public readonly details: { command: string };

  constructor(command: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to spawn gemini command "${command}": ${reason}`, { cause });
    this.name = "GeminiSpawnError";
    this.details = { command };
  }
}

/** Reading one of the child's pipes failed mid-run. */
export class GeminiStreamError extends Error {
  public readonly code = "E-GEMINI-STREAM";
  public readonly details: { stream: string };

  constructor(stream: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to read from gemini ${stream}: ${reason}`, { cause });
    this.name = "GeminiStreamError";
    this.details = { stream };
  }
}

/** The deadline expired; the child was killed and no partial result is kept. */
export class GeminiTimeoutError extends Error {
  public readonly code = "E-GEMINI-TIMEOUT";
  public readonly hint = "increase_timeout_secs";
  public readonly details: { timeout_secs: number };

  constructor(timeoutSecs: number) {
    super(`Gemini command timed out after ${timeoutSecs} seconds`);
    this.name = "GeminiTimeoutError";
    this.details = { timeout_secs: timeoutSecs };
  }
}

/** The runner was shut down; no new child is started. */
export class GeminiRunnerClosedError extends Error {
  public readonly code = "E-GEMINI-SHUTDOWN";
  public readonly hint = "server_shutting_down";

  constructor() {
    super("Gemini runner is shut down; no new command is started");
    this.name = "GeminiRunnerClosedError";
  }
}
