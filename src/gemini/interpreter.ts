/**
 * Event interpreter for the `stream-json` output of the Gemini CLI. Each
 * decoded line goes through {@link applyEvent}, a reducer step that mutates the
 * aggregation state and touches nothing else.
 */

/** Upper bound of events retained in full-capture mode. */
export const MAX_CAPTURED_EVENTS = 10_000;

/** Noise printed by the CLI itself as an assistant message; never forwarded. */
export const PROMPT_DEPRECATION_WARNING = "The --prompt (-p) flag has been deprecated";

/** Prefix identifying error text extracted from the event stream. */
export const EVENT_ERROR_PREFIX = "gemini error: ";

const KEY_SESSION_ID = "session_id";
const KEY_TYPE = "type";
const KEY_ROLE = "role";
const KEY_CONTENT = "content";
const KEY_ERROR = "error";
const KEY_MESSAGE = "message";
const TYPE_MESSAGE = "message";
const ROLE_ASSISTANT = "assistant";

/**
 * Mutable aggregation owned by the supervisor during a run.
 *
 * `success` only ever goes from `true` to `false`, `agentMessages` is
 * append-only, and `sessionId` is last-write-wins over non-empty values.
 */
export interface AggregationState {
  success: boolean;
  sessionId: string;
  agentMessages: string;
  allMessages: unknown[];
  error: string | null;
}

export function createAggregationState(): AggregationState {
  return {
    success: true,
    sessionId: "",
    agentMessages: "",
    allMessages: [],
    error: null,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(source: unknown, key: string): string | undefined {
  if (!isRecord(source)) {
    return undefined;
  }
  const value = source[key];
  return typeof value === "string" ? value : undefined;
}

/**
 * Extracts the most specific error text an event carries: `error.message`
 * first, then a top-level `message`.
 */
function extractErrorMessage(event: Record<string, unknown>): string | undefined {
  return readString(event[KEY_ERROR], KEY_MESSAGE) ?? readString(event, KEY_MESSAGE);
}

/**
 * Folds one decoded event into {@link state} and returns it. Any JSON shape is
 * accepted: scalars and arrays only count towards full capture.
 */
export function applyEvent(event: unknown, state: AggregationState, captureAll: boolean): AggregationState {
  if (captureAll && state.allMessages.length < MAX_CAPTURED_EVENTS) {
    state.allMessages.push(event);
  }

  if (!isRecord(event)) {
    return state;
  }

  const sessionId = readString(event, KEY_SESSION_ID);
  if (sessionId) {
    state.sessionId = sessionId;
  }

  const type = readString(event, KEY_TYPE) ?? "";
  const role = readString(event, KEY_ROLE) ?? "";
  const content = readString(event, KEY_CONTENT);
  if (type === TYPE_MESSAGE && role === ROLE_ASSISTANT && content && content !== PROMPT_DEPRECATION_WARNING) {
    state.agentMessages = state.agentMessages.length > 0 ? `${state.agentMessages}\n${content}` : content;
  }

  // Any discriminator containing "fail" or "error", whatever the case, flags the run.
  const loweredType = type.toLowerCase();
  const flagged = loweredType.includes("fail") || loweredType.includes("error");
  if (flagged || Object.prototype.hasOwnProperty.call(event, KEY_ERROR)) {
    state.success = false;
    const message = extractErrorMessage(event);
    if (message !== undefined) {
      state.error = `${EVENT_ERROR_PREFIX}${message}`;
    }
  }

  return state;
}
