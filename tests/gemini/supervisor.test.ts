import { PassThrough } from "node:stream";

import { describe, it } from "mocha";
import { expect } from "chai";

import { STDERR_TRUNCATION_MARKER } from "../../src/gemini/buffers.js";
import type { ChildExit, SupervisedChild } from "../../src/gemini/childLifecycle.js";
import { GeminiStreamError } from "../../src/gemini/errors.js";
import { MAX_NON_JSON_LINES, MAX_STDERR_BYTES, superviseChild } from "../../src/gemini/supervisor.js";
import { RecordingLogger } from "../helpers/recordingLogger.js";

/** In-process double exposing two writable pipes and a controllable exit. */
class ScriptedChild implements SupervisedChild {
  public readonly stdout = new PassThrough();
  public readonly stderr = new PassThrough();
  public readonly exit: Promise<ChildExit>;
  private resolveExit: (exit: ChildExit) => void = () => undefined;

  constructor() {
    this.exit = new Promise((resolve) => {
      this.resolveExit = resolve;
    });
  }

  stdoutLines(...lines: string[]): this {
    for (const line of lines) {
      this.stdout.write(`${line}\n`);
    }
    return this;
  }

  stderrLines(...lines: string[]): this {
    for (const line of lines) {
      this.stderr.write(`${line}\n`);
    }
    return this;
  }

  finish(code: number | null, signal: NodeJS.Signals | null = null): this {
    this.stdout.end();
    this.stderr.end();
    this.resolveExit({ code, signal });
    return this;
  }
}

const event = (payload: Record<string, unknown>): string => JSON.stringify(payload);

describe("gemini/supervisor", () => {
  it("aggregates a clean run", async () => {
    const child = new ScriptedChild()
      .stdoutLines(
        event({ type: "init", session_id: "S1" }),
        event({ type: "message", role: "assistant", content: "Hello" }),
        event({ type: "message", role: "assistant", content: "World" }),
      )
      .finish(0);

    const state = await superviseChild(child, { captureAll: false });

    expect(state).to.deep.equal({
      success: true,
      sessionId: "S1",
      agentMessages: "Hello\nWorld",
      allMessages: [],
      error: null,
    });
  });

  it("skips blank and undecodable stdout lines on success", async () => {
    const child = new ScriptedChild()
      .stdoutLines(
        "not json",
        "   ",
        `  ${event({ type: "init", session_id: "S1" })}  `,
        event({ type: "message", role: "assistant", content: "ok" }),
      )
      .finish(0);

    const state = await superviseChild(child, { captureAll: true });

    expect(state.success).to.equal(true);
    expect(state.error).to.equal(null);
    expect(state.agentMessages).to.equal("ok");
    expect(state.allMessages).to.have.length(2);
  });

  it("reports stderr and non-JSON output on a non-zero exit", async () => {
    const logger = new RecordingLogger();
    const child = new ScriptedChild()
      .stdoutLines("partial output")
      .stderrLines("boom", "quota exceeded")
      .finish(3);

    const state = await superviseChild(child, { captureAll: false, logger });

    expect(state.success).to.equal(false);
    expect(state.error).to.equal(
      "gemini command failed with exit code 3\nStderr: boom\nquota exceeded\nNon-JSON output: partial output",
    );
    expect(logger.find("gemini_exited")?.payload).to.deep.equal({
      exit_code: 3,
      signal: null,
      success: false,
      stderr_truncated: false,
      non_json_lines: 1,
    });
  });

  it("records a repeated malformed line twice without touching the state", async () => {
    const child = new ScriptedChild()
      .stdoutLines(event({ session_id: "S1" }), "oops", "oops")
      .finish(2);

    const state = await superviseChild(child, { captureAll: true });

    expect(state.sessionId).to.equal("S1");
    expect(state.allMessages).to.deep.equal([{ session_id: "S1" }]);
    expect(state.error).to.equal("gemini command failed with exit code 2\nNon-JSON output: oops\noops");
  });

  it("keeps the event error as the base of an exit failure", async () => {
    const child = new ScriptedChild()
      .stdoutLines(event({ type: "error", error: { message: "quota exceeded" } }))
      .finish(null, "SIGTERM");

    const state = await superviseChild(child, { captureAll: false });

    expect(state.error).to.equal("gemini error: quota exceeded");
  });

  it("describes signal exits", async () => {
    const child = new ScriptedChild().finish(null, "SIGSEGV");

    const state = await superviseChild(child, { captureAll: false });

    expect(state.error).to.equal("gemini command failed with signal SIGSEGV");
  });

  it("fails a clean exit that produced no JSON event", async () => {
    const noisy = await superviseChild(new ScriptedChild().stdoutLines("hello", "world").finish(0), {
      captureAll: false,
    });
    expect(noisy.success).to.equal(false);
    expect(noisy.error).to.equal(
      "gemini CLI exited successfully but produced no valid structured output (JSON lines).\nOutput: hello\nworld",
    );

    const silent = await superviseChild(new ScriptedChild().finish(0), { captureAll: false });
    expect(silent.success).to.equal(false);
    expect(silent.error).to.equal(
      "gemini CLI exited successfully but produced no valid structured output (JSON lines).",
    );
  });

  it("caps stderr and the non-JSON diagnostics", async () => {
    const child = new ScriptedChild();
    const stderrLine = "e".repeat(999);
    for (let index = 0; index < 150; index += 1) {
      child.stderrLines(stderrLine);
    }
    for (let index = 0; index < MAX_NON_JSON_LINES + 10; index += 1) {
      child.stdoutLines(`noise ${index}`);
    }
    child.finish(1);

    const state = await superviseChild(child, { captureAll: false });
    const error = state.error ?? "";

    const stderrStart = error.indexOf("\nStderr: ") + "\nStderr: ".length;
    const stderrEnd = error.indexOf(STDERR_TRUNCATION_MARKER);
    expect(Buffer.byteLength(error.slice(stderrStart, stderrEnd), "utf8")).to.equal(MAX_STDERR_BYTES);
    expect(error.split(STDERR_TRUNCATION_MARKER)).to.have.length(2);

    const nonJson = error.slice(error.indexOf("\nNon-JSON output: ") + "\nNon-JSON output: ".length).split("\n");
    expect(nonJson).to.have.length(MAX_NON_JSON_LINES);
    expect(nonJson[MAX_NON_JSON_LINES - 1]).to.equal(`noise ${MAX_NON_JSON_LINES - 1}`);
  });

  it("drains stderr while stdout is still open", async () => {
    const child = new ScriptedChild();
    child.stdoutLines(event({ type: "init", session_id: "S1" }));
    const run = superviseChild(child, { captureAll: false });

    // More stderr than a pipe buffer holds, written before stdout closes.
    for (let index = 0; index < 200; index += 1) {
      child.stderrLines("w".repeat(1_000));
    }
    child.stdoutLines(event({ type: "message", role: "assistant", content: "done" }));
    child.finish(0);

    const state = await run;
    expect(state.success).to.equal(true);
    expect(state.agentMessages).to.equal("done");
  });

  it("aborts with GeminiStreamError when a pipe fails", async () => {
    const child = new ScriptedChild().stdoutLines(event({ type: "init", session_id: "S1" }));
    const run = superviseChild(child, { captureAll: false });

    child.stderr.destroy(new Error("EIO"));

    let caught: unknown;
    try {
      await run;
    } catch (error) {
      caught = error;
    }
    expect(caught).to.be.instanceOf(GeminiStreamError);
    expect(caught).to.have.property("code", "E-GEMINI-STREAM");
    expect(caught).to.have.deep.property("details", { stream: "stderr" });
  });
});
