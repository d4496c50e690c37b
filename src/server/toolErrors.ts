import { z } from "zod";

import type { StructuredLogger } from "../logger.js";
import { omitUndefinedEntries } from "../utils/object.js";

/** Maximum number of UTF-16 code units kept in error messages and hints. */
export const ERROR_TEXT_MAX_LENGTH = 400;

/**
 * Structured payload returned by tool handlers when an error occurs. The MCP
 * transport expects the `content` array to contain textual JSON so downstream
 * clients can parse the code, hint and optional details.
 */
export interface ToolErrorResponse {
  isError: true;
  content: Array<{ type: "text"; text: string }>;
  [key: string]: unknown;
}

/**
 * Normalised representation of a thrown error used to enrich tool responses and
 * log entries with machine readable metadata.
 */
export interface NormalisedToolError {
  code: string;
  message: string;
  hint?: string;
  details?: unknown;
}

/** Configuration describing the codes associated with an error category. */
export interface ToolErrorCodes {
  /** Default error code applied when no specific mapping is provided. */
  defaultCode: string;
  /** Optional error code used when the failure originates from input parsing. */
  invalidInputCode?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function clampText(text: string): string {
  if (text.length <= ERROR_TEXT_MAX_LENGTH) {
    return text;
  }
  return `${text.slice(0, ERROR_TEXT_MAX_LENGTH - 1)}…`;
}

/** Collapses whitespace, substitutes a fallback for blank text and clamps the length. */
export function normaliseErrorMessage(text: string, fallback = "unexpected error"): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  return clampText(collapsed.length === 0 ? fallback : collapsed);
}

/** Blank hints collapse to `undefined`; long ones are clamped. */
export function normaliseErrorHint(hint?: string): string | undefined {
  if (hint === undefined) {
    return undefined;
  }
  const collapsed = hint.replace(/\s+/g, " ").trim();
  return collapsed.length === 0 ? undefined : clampText(collapsed);
}

/**
 * Serialises a JSON payload with indentation so MCP clients can display the
 * error in a readable form while still allowing structured parsing.
 */
function serialise(payload: Record<string, unknown>): string {
  return JSON.stringify(payload, null, 2);
}

/**
 * Normalises an arbitrary error into a structured representation that captures
 * the code, message, optional hint and any provided details. Zod validation
 * errors are mapped to a dedicated invalid-input code.
 */
export function normaliseToolError(error: unknown, codes: ToolErrorCodes): NormalisedToolError {
  const message = error instanceof Error ? error.message : String(error);
  let code = codes.defaultCode;
  let hint: string | undefined;
  let details: unknown;

  if (error instanceof z.ZodError) {
    code = codes.invalidInputCode ?? codes.defaultCode;
    hint = "invalid_input";
    details = { issues: error.issues };
  } else if (isRecord(error)) {
    if (typeof error.code === "string") {
      code = error.code;
      if (typeof error.hint === "string") {
        hint = error.hint;
      }
    }
    if (Object.prototype.hasOwnProperty.call(error, "details")) {
      details = error.details;
    }
  }

  return {
    code,
    message: normaliseErrorMessage(message),
    ...omitUndefinedEntries({
      hint: normaliseErrorHint(hint),
      details,
    }),
  };
}

/** Writes the structured error into the shared logger and returns the response. */
function logAndWrap(
  logger: StructuredLogger,
  toolName: string,
  normalised: NormalisedToolError,
  context: Record<string, unknown>,
): ToolErrorResponse {
  logger.error(`${toolName}_failed`, {
    ...context,
    message: normalised.message,
    code: normalised.code,
    details: normalised.details,
  });

  const payload: Record<string, unknown> = {
    ok: false,
    error: normalised.code,
    tool: toolName,
    message: normalised.message,
  };
  if (normalised.hint) {
    payload.hint = normalised.hint;
  }
  if (normalised.details !== undefined) {
    payload.details = normalised.details;
  }

  return {
    isError: true,
    content: [{ type: "text", text: serialise(payload) }],
  };
}

/** Codes shared by every failure of the Gemini tool. */
const GEMINI_ERROR_CODES: ToolErrorCodes = {
  defaultCode: "E-GEMINI-UNEXPECTED",
  invalidInputCode: "E-GEMINI-INVALID-INPUT",
};

/**
 * Formats an error thrown while serving the Gemini tool. Runner errors carry
 * their own code; anything else falls back to the unexpected code.
 */
export function geminiToolError(
  logger: StructuredLogger,
  toolName: string,
  error: unknown,
  context: Record<string, unknown> = {},
): ToolErrorResponse {
  return logAndWrap(logger, toolName, normaliseToolError(error, GEMINI_ERROR_CODES), context);
}
