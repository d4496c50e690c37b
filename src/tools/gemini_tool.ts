import type { CallToolResult, Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import type { StructuredLogger } from "../logger.js";
import { createInvocationRequest, MAX_TIMEOUT_SECS, MIN_TIMEOUT_SECS } from "../gemini/request.js";
import type { GeminiInvoker } from "../gemini/runner.js";
import type { GeminiResult } from "../gemini/validator.js";
import { buildToolErrorResult, buildToolSuccessResult } from "./shared.js";

export const GEMINI_TOOL_NAME = "gemini";

/** Context injected by the server when invoking the Gemini tool. */
export interface GeminiToolContext {
  runner: GeminiInvoker;
  logger: StructuredLogger;
}

/** Schema validating the payload accepted by the `gemini` tool. */
export const GeminiToolInputSchema = z
  .object({
    PROMPT: z.string().describe("Task text sent to the Gemini CLI."),
    sandbox: z
      .boolean()
      .default(false)
      .describe("Run the CLI in sandbox mode."),
    SESSION_ID: z
      .string()
      .optional()
      .describe("Session to resume. Omit or leave empty to start a new one."),
    return_all_messages: z
      .boolean()
      .default(false)
      .describe("Also return every decoded event (reasoning, tool calls...) instead of only the assistant reply."),
    model: z
      .string()
      .optional()
      .describe("Model override. Only set when the user explicitly asks for a model."),
    timeout_secs: z
      .number()
      .int()
      .min(MIN_TIMEOUT_SECS)
      .max(MAX_TIMEOUT_SECS)
      .optional()
      .describe("Deadline in seconds. Defaults to the server configuration."),
  })
  .strict();
export type GeminiToolInput = z.infer<typeof GeminiToolInputSchema>;

/**
 * JSON Schema advertised by `tools/list`. Arguments reach
 * {@link handleGeminiTool} untouched, so {@link GeminiToolInputSchema} stays
 * the only validation applied to a call.
 */
export const GeminiToolJsonSchema: Tool["inputSchema"] = {
  type: "object",
  properties: {
    PROMPT: { type: "string", description: "Task text sent to the Gemini CLI." },
    sandbox: { type: "boolean", default: false, description: "Run the CLI in sandbox mode." },
    SESSION_ID: { type: "string", description: "Session to resume. Omit or leave empty to start a new one." },
    return_all_messages: {
      type: "boolean",
      default: false,
      description: "Also return every decoded event (reasoning, tool calls...) instead of only the assistant reply.",
    },
    model: { type: "string", description: "Model override. Only set when the user explicitly asks for a model." },
    timeout_secs: {
      type: "integer",
      minimum: MIN_TIMEOUT_SECS,
      maximum: MAX_TIMEOUT_SECS,
      description: "Deadline in seconds. Defaults to the server configuration.",
    },
  },
  required: ["PROMPT"],
  additionalProperties: false,
};

/** Structured payload mirrored on `structuredContent`. */
export type GeminiToolStructuredResult = {
  success: boolean;
  SESSION_ID: string;
  agent_messages: string;
  error?: string;
  all_messages?: unknown[];
};

function renderEventLog(events: readonly unknown[]): string {
  return JSON.stringify(events, null, 2);
}

/** Renders a finalised run as the MCP tool result. */
export function formatGeminiResult(result: GeminiResult): CallToolResult {
  const includeEvents = result.returnAllMessages && result.allMessages.length > 0;
  const structured: GeminiToolStructuredResult = {
    success: result.success,
    SESSION_ID: result.sessionId,
    agent_messages: result.agentMessages,
  };
  if (result.returnAllMessages) {
    structured.all_messages = [...result.allMessages];
  }

  if (result.success) {
    let text = `success: true\nSESSION_ID: ${result.sessionId}\nagent_messages: ${result.agentMessages}`;
    if (includeEvents) {
      text += `\nall_messages: ${result.allMessages.length} events captured\n\nFull event log:\n${renderEventLog(result.allMessages)}`;
    }
    return buildToolSuccessResult(text, structured);
  }

  const error = result.error ?? "Unknown error";
  structured.error = error;
  let text = error;
  if (includeEvents) {
    text += `\n\nCaptured ${result.allMessages.length} events before failure:\n${renderEventLog(result.allMessages)}`;
  }
  return buildToolErrorResult(text, structured);
}

/**
 * Validates the tool input, runs the Gemini CLI and formats the outcome.
 * Request, spawn, stream and timeout failures are thrown to the caller.
 */
export async function handleGeminiTool(context: GeminiToolContext, input: unknown): Promise<CallToolResult> {
  const parsed = GeminiToolInputSchema.parse(input);
  const request = createInvocationRequest({
    prompt: parsed.PROMPT,
    sandbox: parsed.sandbox,
    sessionId: parsed.SESSION_ID ?? null,
    model: parsed.model ?? null,
    returnAllMessages: parsed.return_all_messages,
    timeoutSecs: parsed.timeout_secs ?? null,
  });

  const result = await context.runner.run(request);
  context.logger.info("gemini_tool_completed", {
    success: result.success,
    session_id: result.sessionId || null,
    events: result.allMessages.length,
  });
  return formatGeminiResult(result);
}
