import type { AggregationState } from "./interpreter.js";

const MISSING_SESSION_ID = "Failed to get `SESSION_ID` from the gemini session.";
const MISSING_AGENT_MESSAGES =
  "Failed to get `agent_messages` from the gemini session.\nYou can try to set `return_all_messages` to `true` to get the full information.";
const MISSING_ANY_MESSAGES = "Failed to get any messages from the gemini session.";

/** Finalised outcome of one invocation, handed to the caller. */
export interface GeminiResult {
  readonly success: boolean;
  readonly sessionId: string;
  readonly agentMessages: string;
  /** Decoded events, only populated in full-capture mode. */
  readonly allMessages: readonly unknown[];
  readonly returnAllMessages: boolean;
  readonly error: string | null;
}

/**
 * Final gate applied once the child exited: a session identifier must have
 * been observed, and some assistant text (or, in full-capture mode, at least
 * one captured event) must exist. Violations are appended to any error the
 * supervisor already recorded.
 */
export function finalizeResult(state: AggregationState, returnAllMessages: boolean): GeminiResult {
  const violations: string[] = [];

  if (state.sessionId.length === 0) {
    violations.push(MISSING_SESSION_ID);
  }

  if (state.agentMessages.length === 0) {
    if (!returnAllMessages) {
      violations.push(MISSING_AGENT_MESSAGES);
    } else if (state.allMessages.length === 0) {
      violations.push(MISSING_ANY_MESSAGES);
    }
  }

  let success = state.success;
  let error = state.error;
  if (violations.length > 0) {
    success = false;
    const appended = violations.join("\n");
    error = error ? `${error}\n${appended}` : appended;
  }

  return Object.freeze({
    success,
    sessionId: state.sessionId,
    agentMessages: state.agentMessages,
    allMessages: Object.freeze([...state.allMessages]),
    returnAllMessages,
    error,
  });
}
