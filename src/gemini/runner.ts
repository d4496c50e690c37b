/**
 * Composition root of one Gemini invocation: prompt preparation, argument
 * construction, spawn, supervised streaming under a deadline and final
 * validation. The runner also tracks every live child so the server can reap
 * them all on shutdown.
 */
import type { ChildProcess } from "node:child_process";

import { createChildProcessGateway, type ChildProcessGateway } from "../gateways/childProcess.js";
import type { StructuredLogger } from "../logger.js";
import { trackChild, waitForSpawn, type ChildHandle } from "./childLifecycle.js";
import { buildGeminiArgs } from "./command.js";
import type { GeminiRunnerConfig } from "./config.js";
import { runWithDeadline } from "./deadline.js";
import { GeminiRunnerClosedError, GeminiSpawnError, GeminiStreamError } from "./errors.js";
import { preparePrompt, readPromptPrefix } from "./promptPrefix.js";
import type { InvocationRequest } from "./request.js";
import { superviseChild } from "./supervisor.js";
import { finalizeResult, type GeminiResult } from "./validator.js";

/** Seam used by the MCP tool, replaced by stubs in tests. */
export interface GeminiInvoker {
  run(request: InvocationRequest): Promise<GeminiResult>;
}

export interface GeminiRunnerDependencies {
  readonly gateway?: ChildProcessGateway;
  readonly logger?: StructuredLogger;
}

export class GeminiRunner implements GeminiInvoker {
  private readonly gateway: ChildProcessGateway;
  private readonly logger?: StructuredLogger;
  private readonly children = new Set<ChildHandle>();
  private closed = false;

  constructor(
    private readonly config: GeminiRunnerConfig,
    dependencies: GeminiRunnerDependencies = {},
  ) {
    this.gateway = dependencies.gateway ?? createChildProcessGateway();
    this.logger = dependencies.logger;
  }

  /** Number of children currently owned by the runner. */
  get activeChildren(): number {
    return this.children.size;
  }

  async run(request: InvocationRequest): Promise<GeminiResult> {
    this.assertOpen();
    const prefix = await readPromptPrefix(this.config.promptPrefixPath, this.logger);
    const prompt = preparePrompt(request.prompt, prefix);
    const args = [...this.config.launcherArgs, ...buildGeminiArgs(request, prompt, this.config.forcedModel)];

    this.assertOpen();
    const handle = await this.spawn(args);
    if (this.closed) {
      // shutdown() ran while the spawn was settling and could not see this child.
      await handle.terminate();
      throw new GeminiRunnerClosedError();
    }
    this.children.add(handle);
    try {
      const work = superviseChild(handle, { captureAll: request.returnAllMessages, logger: this.logger });
      const state = await runWithDeadline(work, {
        timeoutSecs: request.timeoutSecs ?? this.config.defaultTimeoutSecs,
        terminate: () => handle.terminate(),
        logger: this.logger,
        pid: handle.pid,
      });
      return finalizeResult(state, request.returnAllMessages);
    } catch (error) {
      if (error instanceof GeminiStreamError) {
        this.logger?.error("gemini_stream_failed", { ...error.details, pid: handle.pid, reason: error.message });
      }
      await handle.terminate();
      throw error;
    } finally {
      this.children.delete(handle);
    }
  }

  /** Kills and reaps every child still running; later runs are refused. */
  async shutdown(): Promise<void> {
    this.closed = true;
    const pending = [...this.children].map((handle) => handle.terminate());
    this.children.clear();
    await Promise.all(pending);
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new GeminiRunnerClosedError();
    }
  }

  private async spawn(args: string[]): Promise<ChildHandle> {
    const command = this.config.binary;
    let child: ChildProcess;
    let handle: ChildHandle;
    try {
      child = this.gateway.spawn({
        command,
        args,
        cwd: this.config.cwd,
        stdio: ["ignore", "pipe", "pipe"],
      });
    } catch (error) {
      throw new GeminiSpawnError(command, error);
    }

    // Listen for `error` before trackChild can kill a child Node still reports on.
    const spawned = waitForSpawn(child);
    try {
      handle = trackChild(child);
    } catch (error) {
      void spawned.catch(() => undefined);
      throw new GeminiSpawnError(command, error);
    }

    try {
      await spawned;
    } catch (error) {
      handle.stdout.destroy();
      handle.stderr.destroy();
      throw new GeminiSpawnError(command, error);
    }

    child.on("error", (error: Error) => {
      this.logger?.warn("gemini_child_error", { pid: handle.pid, reason: error.message });
    });
    this.logger?.info("gemini_spawned", { command, args: args.length, pid: handle.pid });
    return handle;
  }
}

/** One-shot helper running a single request with a dedicated runner. */
export function runGemini(
  request: InvocationRequest,
  config: GeminiRunnerConfig,
  dependencies: GeminiRunnerDependencies = {},
): Promise<GeminiResult> {
  return new GeminiRunner(config, dependencies).run(request);
}
