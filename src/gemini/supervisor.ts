/**
 * Drains the two output pipes of a running Gemini CLI and aggregates its event
 * stream. A single control flow owns the {@link AggregationState}: it keeps
 * one pending line read per open pipe, handles whichever line arrives first,
 * and only stops once both pipes reported end-of-stream. Neither pipe may be
 * left unread while the other is drained: a child blocked on a full stderr
 * pipe never closes stdout.
 */
import type { StructuredLogger } from "../logger.js";
import { BoundedList, BoundedTextBuffer } from "./buffers.js";
import { describeExit, type SupervisedChild } from "./childLifecycle.js";
import { GeminiStreamError } from "./errors.js";
import { applyEvent, createAggregationState, type AggregationState } from "./interpreter.js";
import { LineReadError, readLines } from "./lineReader.js";

/** Maximum number of undecodable stdout lines kept for diagnostics. */
export const MAX_NON_JSON_LINES = 1_000;

/** Maximum amount of stderr text (in bytes) kept for diagnostics. */
export const MAX_STDERR_BYTES = 100_000;

export interface SupervisorOptions {
  /** Full capture: keep every decoded event. */
  readonly captureAll: boolean;
  readonly logger?: StructuredLogger;
}

type StreamName = "stdout" | "stderr";

interface PulledLine {
  readonly stream: StreamName;
  readonly result: IteratorResult<string, void>;
}

/** Diagnostics gathered next to the aggregation, only reported on failure. */
interface RunDiagnostics {
  readonly nonJsonLines: BoundedList<string>;
  readonly stderr: BoundedTextBuffer;
  validJsonSeen: boolean;
}

function handleStdoutLine(
  rawLine: string,
  state: AggregationState,
  diagnostics: RunDiagnostics,
  captureAll: boolean,
): void {
  const line = rawLine.trim();
  if (line.length === 0) {
    return;
  }

  let event: unknown;
  try {
    event = JSON.parse(line);
  } catch {
    diagnostics.nonJsonLines.push(line);
    return;
  }

  diagnostics.validJsonSeen = true;
  applyEvent(event, state, captureAll);
}

/**
 * Concurrently drains stdout and stderr until both close. Each stdout line is
 * decoded and folded through the event interpreter; stderr lines go to the
 * capped diagnostic buffer. A failed read aborts with {@link GeminiStreamError}.
 */
async function drainStreams(
  child: SupervisedChild,
  state: AggregationState,
  diagnostics: RunDiagnostics,
  captureAll: boolean,
): Promise<void> {
  const iterators: Record<StreamName, AsyncGenerator<string, void, undefined>> = {
    stdout: readLines(child.stdout, "stdout"),
    stderr: readLines(child.stderr, "stderr"),
  };
  const pending = new Map<StreamName, Promise<PulledLine>>();
  const pull = (stream: StreamName): void => {
    pending.set(
      stream,
      iterators[stream].next().then((result) => ({ stream, result })),
    );
  };

  pull("stdout");
  pull("stderr");

  try {
    while (pending.size > 0) {
      const { stream, result } = await Promise.race(pending.values());
      pending.delete(stream);
      if (result.done) {
        continue;
      }

      if (stream === "stdout") {
        handleStdoutLine(result.value, state, diagnostics, captureAll);
      } else {
        diagnostics.stderr.append(result.value);
      }
      pull(stream);
    }
  } catch (error) {
    throw error instanceof LineReadError
      ? new GeminiStreamError(error.stream, error.cause)
      : error;
  } finally {
    // Reads still in flight after an abort settle once the child is killed.
    for (const leftover of pending.values()) {
      void leftover.catch(() => undefined);
    }
  }
}

function composeExitFailure(base: string, diagnostics: RunDiagnostics): string {
  let message = base;
  const stderr = diagnostics.stderr.toString();
  if (stderr.length > 0) {
    message = `${message}\nStderr: ${stderr}`;
  }
  if (diagnostics.nonJsonLines.length > 0) {
    message = `${message}\nNon-JSON output: ${diagnostics.nonJsonLines.toArray().join("\n")}`;
  }
  return message;
}

/**
 * Runs the drain loop to completion, awaits the exit status and folds
 * process-level failures into the returned aggregation.
 */
export async function superviseChild(child: SupervisedChild, options: SupervisorOptions): Promise<AggregationState> {
  const state = createAggregationState();
  const diagnostics: RunDiagnostics = {
    nonJsonLines: new BoundedList<string>(MAX_NON_JSON_LINES),
    stderr: new BoundedTextBuffer(MAX_STDERR_BYTES),
    validJsonSeen: false,
  };

  await drainStreams(child, state, diagnostics, options.captureAll);

  const exit = await child.exit;
  const exitedCleanly = exit.code === 0;
  options.logger?.info("gemini_exited", {
    exit_code: exit.code,
    signal: exit.signal,
    success: exitedCleanly,
    stderr_truncated: diagnostics.stderr.isTruncated,
    non_json_lines: diagnostics.nonJsonLines.length,
  });

  if (!exitedCleanly) {
    state.success = false;
    const base = state.error ?? `gemini command failed with ${describeExit(exit)}`;
    state.error = composeExitFailure(base, diagnostics);
  } else if (!diagnostics.validJsonSeen) {
    state.success = false;
    let message = "gemini CLI exited successfully but produced no valid structured output (JSON lines).";
    if (diagnostics.nonJsonLines.length > 0) {
      message = `${message}\nOutput: ${diagnostics.nonJsonLines.toArray().join("\n")}`;
    }
    state.error = message;
  }

  return state;
}
