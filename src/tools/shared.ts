/**
 * Helpers shared by tool façades so every handler returns the same MCP
 * envelope shape.
 */
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

/** Structured payload type surfaced by MCP tool responses. */
type ToolStructuredContent = NonNullable<CallToolResult["structuredContent"]>;

/**
 * Parameters accepted by {@link buildToolResponse}. Callers pre-render the
 * textual payload; the helper only guarantees the envelope.
 */
interface BuildToolResponseParams<TStructured extends ToolStructuredContent> {
  /** Pre-rendered textual payload exposed on the MCP textual channel. */
  readonly text: string;
  /** Structured JSON payload surfaced under `structuredContent`. */
  readonly structured: TStructured;
  /** Whether the invocation represents an application-level failure. */
  readonly isError: boolean;
}

export function buildToolResponse<TStructured extends ToolStructuredContent>({
  text,
  structured,
  isError,
}: BuildToolResponseParams<TStructured>): CallToolResult & { structuredContent: TStructured } {
  return {
    isError,
    content: [{ type: "text", text }],
    structuredContent: structured,
  };
}

export function buildToolSuccessResult<TStructured extends ToolStructuredContent>(
  text: string,
  structured: TStructured,
): CallToolResult & { structuredContent: TStructured } {
  return buildToolResponse({ text, structured, isError: false });
}

/** Same envelope as {@link buildToolSuccessResult} with `isError: true`. */
export function buildToolErrorResult<TStructured extends ToolStructuredContent>(
  text: string,
  structured: TStructured,
): CallToolResult & { structuredContent: TStructured } {
  return buildToolResponse({ text, structured, isError: true });
}
