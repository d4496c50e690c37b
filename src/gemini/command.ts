import type { InvocationRequest } from "./request.js";

/** Output mode making the CLI emit one JSON event per stdout line. */
export const STREAM_JSON_FORMAT = "stream-json";

/**
 * Builds the argument vector of one Gemini CLI invocation. The prompt travels
 * as a single argv entry; it is never concatenated into a shell string.
 */
export function buildGeminiArgs(request: InvocationRequest, prompt: string, forcedModel: string | null = null): string[] {
  const args = ["--prompt", prompt, "-o", STREAM_JSON_FORMAT];

  if (request.sandbox) {
    args.push("--sandbox");
  }

  const model = request.model ?? forcedModel;
  if (model) {
    args.push("--model", model);
  }

  if (request.sessionId) {
    args.push("--resume", request.sessionId);
  }

  return args;
}
