#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import process from "node:process";

import { readOptionalString } from "./config/env.js";
import { resolveGeminiConfig } from "./gemini/config.js";
import { GeminiRunner } from "./gemini/runner.js";
import { StructuredLogger } from "./logger.js";
import { createGeminiServer, SERVER_VERSION } from "./mcp/server.js";
import { parseServerOptions, USAGE, type ServerOptions } from "./serverOptions.js";

export { createGeminiServer } from "./mcp/server.js";
export { GeminiRunner, runGemini } from "./gemini/runner.js";
export { resolveGeminiConfig } from "./gemini/config.js";

/**
 * Bootstraps the server when the module is executed directly via the CLI:
 * parses the flags, wires the runner and the stdio transport and registers the
 * shutdown hooks.
 */
async function main(): Promise<void> {
  let options: ServerOptions;
  try {
    options = parseServerOptions(process.argv.slice(2));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    new StructuredLogger().error("cli_options_invalid", { message });
    process.stderr.write(`${message}\n\n${USAGE}`);
    process.exit(1);
  }

  if (options.help) {
    process.stdout.write(USAGE);
    return;
  }
  if (options.version) {
    process.stdout.write(`${SERVER_VERSION}\n`);
    return;
  }

  const logger = new StructuredLogger({ logFile: options.logFile ?? readOptionalString("MCP_LOG_FILE") ?? null });
  const config = resolveGeminiConfig();
  const runner = new GeminiRunner(config, { logger });
  const server = createGeminiServer({ runner, logger });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("stdio_listening", {
    binary: config.binary,
    default_timeout_secs: config.defaultTimeoutSecs,
    forced_model: config.forcedModel,
  });

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.warn("shutdown_signal", { signal, active_children: runner.activeChildren });
    try {
      await runner.shutdown();
      await server.close();
    } catch (error) {
      logger.error("shutdown_failed", { message: error instanceof Error ? error.message : String(error) });
    }
    await logger.flush();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

/** Whether this module is the process entry point, following the symlinks npm creates for `bin`. */
function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return pathToFileURL(realpathSync(entry)).href === import.meta.url;
  } catch {
    return false;
  }
}

const isMain = isEntryPoint();

if (isMain) {
  main().catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
    process.exit(1);
  });
}
