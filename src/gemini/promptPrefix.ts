import { readFile, stat } from "node:fs/promises";

import type { StructuredLogger } from "../logger.js";

/** File looked up in the working directory and prepended to every prompt. */
export const PROMPT_PREFIX_FILE = "GEMINI.md";

/** Prefix files above this size are ignored. */
export const MAX_PROMPT_PREFIX_BYTES = 100_000;

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Loads the optional prompt prefix. Absent, unreadable, oversized or blank
 * files all yield `null`; only the unreadable and oversized cases are logged.
 */
export async function readPromptPrefix(path: string, logger?: StructuredLogger): Promise<string | null> {
  let size: number;
  try {
    const stats = await stat(path);
    if (!stats.isFile()) {
      return null;
    }
    size = stats.size;
  } catch (error) {
    if (!isNotFound(error)) {
      logger?.warn("gemini_prompt_prefix_unreadable", { path, reason: describeError(error) });
    }
    return null;
  }

  if (size > MAX_PROMPT_PREFIX_BYTES) {
    logger?.warn("gemini_prompt_prefix_too_large", { path, size, max_bytes: MAX_PROMPT_PREFIX_BYTES });
    return null;
  }

  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (error) {
    logger?.warn("gemini_prompt_prefix_unreadable", { path, reason: describeError(error) });
    return null;
  }

  return content.trim().length > 0 ? content : null;
}

/** Joins the prefix and the task text with a blank line. */
export function preparePrompt(prompt: string, prefix: string | null): string {
  return prefix === null ? prompt : `${prefix}\n\n${prompt}`;
}
