import { resolve } from "node:path";

import { readInt, readOptionalString, readString } from "../config/env.js";
import { PROMPT_PREFIX_FILE } from "./promptPrefix.js";
import { DEFAULT_TIMEOUT_SECS, MAX_TIMEOUT_SECS, MIN_TIMEOUT_SECS } from "./request.js";

/** Everything the runner needs from the environment, resolved once at startup. */
export interface GeminiRunnerConfig {
  /** Executable name or path of the Gemini CLI. */
  readonly binary: string;
  /** Arguments placed before the Gemini arguments (wrappers, interpreters). */
  readonly launcherArgs: readonly string[];
  readonly defaultTimeoutSecs: number;
  /** Model applied when a request does not pick one. */
  readonly forcedModel: string | null;
  readonly promptPrefixPath: string;
  /** Working directory of the spawned CLI. */
  readonly cwd: string;
}

export const DEFAULT_GEMINI_BINARY = "gemini";

export function resolveGeminiConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): GeminiRunnerConfig {
  return Object.freeze({
    binary: readString("GEMINI_BIN", DEFAULT_GEMINI_BINARY, env),
    launcherArgs: Object.freeze([]),
    defaultTimeoutSecs: readInt(
      "GEMINI_DEFAULT_TIMEOUT",
      DEFAULT_TIMEOUT_SECS,
      { min: MIN_TIMEOUT_SECS, max: MAX_TIMEOUT_SECS },
      env,
    ),
    forcedModel: readOptionalString("GEMINI_FORCE_MODEL", env) ?? null,
    promptPrefixPath: resolve(cwd, PROMPT_PREFIX_FILE),
    cwd,
  });
}
