import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type CallToolResult,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";

import type { StructuredLogger } from "../logger.js";
import type { GeminiInvoker } from "../gemini/runner.js";
import { geminiToolError } from "../server/toolErrors.js";
import { GEMINI_TOOL_NAME, GeminiToolJsonSchema, handleGeminiTool } from "../tools/gemini_tool.js";

export const SERVER_NAME = "gemini-mcp-server";
export const SERVER_VERSION = "0.1.0";

export const SERVER_INSTRUCTIONS = [
  "Use the `gemini` tool to delegate a task to the Gemini CLI.",
  "Pass the `SESSION_ID` returned by a previous call to continue that conversation.",
  "A `GEMINI.md` file in the server's working directory is prepended to every prompt.",
  "Set `return_all_messages` to inspect every event the CLI emitted, including failures.",
].join(" ");

export const GEMINI_TOOL_DEFINITION: Tool = {
  name: GEMINI_TOOL_NAME,
  title: "Gemini",
  description: "Runs the Gemini CLI on a task and returns the session identifier together with the assistant reply.",
  inputSchema: GeminiToolJsonSchema,
};

export interface GeminiServerDependencies {
  readonly runner: GeminiInvoker;
  readonly logger: StructuredLogger;
}

/**
 * Builds the MCP server exposing the `gemini` tool. The tool is served through
 * the raw request handlers so the call arguments reach the tool's strict zod
 * schema as sent: unknown keys and out-of-range values come back as the JSON
 * error payload instead of a protocol error.
 */
export function createGeminiServer({ runner, logger }: GeminiServerDependencies): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} }, instructions: SERVER_INSTRUCTIONS },
  );

  server.setRequestHandler(ListToolsRequestSchema, () => ({ tools: [GEMINI_TOOL_DEFINITION] }));

  server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
    const { name } = request.params;
    if (name !== GEMINI_TOOL_NAME) {
      throw new McpError(ErrorCode.InvalidParams, `Tool ${name} not found`);
    }
    try {
      return await handleGeminiTool({ runner, logger }, request.params.arguments ?? {});
    } catch (error) {
      return geminiToolError(logger, GEMINI_TOOL_NAME, error);
    }
  });

  return server;
}
