import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema, type CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";

import { GeminiTimeoutError } from "../src/gemini/errors.js";
import type { InvocationRequest } from "../src/gemini/request.js";
import type { GeminiInvoker } from "../src/gemini/runner.js";
import type { GeminiResult } from "../src/gemini/validator.js";
import { createGeminiServer, SERVER_NAME } from "../src/mcp/server.js";
import { GeminiToolInputSchema } from "../src/tools/gemini_tool.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

/** Invoker double returning a scripted outcome and recording the requests. */
class StubInvoker implements GeminiInvoker {
  public readonly requests: InvocationRequest[] = [];
  public outcome: GeminiResult | Error = result({});

  async run(request: InvocationRequest): Promise<GeminiResult> {
    this.requests.push(request);
    if (this.outcome instanceof Error) {
      throw this.outcome;
    }
    return this.outcome;
  }
}

function result(overrides: Partial<GeminiResult>): GeminiResult {
  return {
    success: true,
    sessionId: "S1",
    agentMessages: "Hello\nWorld",
    allMessages: [],
    returnAllMessages: false,
    error: null,
    ...overrides,
  };
}

function parseResponse(response: unknown): CallToolResult & { text: string } {
  const parsed = CallToolResultSchema.parse(response);
  const [first] = parsed.content;
  if (!first || first.type !== "text") {
    throw new Error("expected a text content item");
  }
  return { ...parsed, text: first.text };
}

describe("gemini tool over MCP", () => {
  let invoker: StubInvoker;
  let logger: RecordingLogger;
  let server: Server;
  let client: Client;

  beforeEach(async () => {
    invoker = new StubInvoker();
    logger = new RecordingLogger();
    server = createGeminiServer({ runner: invoker, logger });
    client = new Client({ name: "gemini-tool-test", version: "1.0.0-test" });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    await server.close().catch(() => {});
  });

  it("advertises the gemini tool and its parameters", async () => {
    expect(client.getServerVersion()?.name).to.equal(SERVER_NAME);

    const { tools } = await client.listTools();
    const tool = tools.find((candidate) => candidate.name === "gemini");

    expect(tool).to.not.equal(undefined);
    expect(Object.keys(tool?.inputSchema.properties ?? {})).to.have.members([
      "PROMPT",
      "sandbox",
      "SESSION_ID",
      "return_all_messages",
      "model",
      "timeout_secs",
    ]);
    expect(tool?.inputSchema.required).to.deep.equal(["PROMPT"]);
    expect(tool?.inputSchema.additionalProperties).to.equal(false);
  });

  it("advertises exactly the parameters the input schema accepts", async () => {
    const { tools } = await client.listTools();
    const [tool] = tools;

    expect(Object.keys(tool.inputSchema.properties ?? {})).to.have.members(Object.keys(GeminiToolInputSchema.shape));
  });

  it("maps the tool arguments onto an invocation request", async () => {
    await client.callTool({
      name: "gemini",
      arguments: { PROMPT: "Review this diff", SESSION_ID: "", sandbox: true, model: "gemini-2.5-pro", timeout_secs: 90 },
    });

    expect(invoker.requests).to.deep.equal([
      {
        prompt: "Review this diff",
        sandbox: true,
        sessionId: null,
        model: "gemini-2.5-pro",
        returnAllMessages: false,
        timeoutSecs: 90,
      },
    ]);
  });

  it("renders a successful run", async () => {
    const response = parseResponse(await client.callTool({ name: "gemini", arguments: { PROMPT: "hi" } }));

    expect(response.isError).to.equal(false);
    expect(response.text).to.equal("success: true\nSESSION_ID: S1\nagent_messages: Hello\nWorld");
    expect(response.structuredContent).to.deep.equal({
      success: true,
      SESSION_ID: "S1",
      agent_messages: "Hello\nWorld",
    });
  });

  it("appends the event log when every message was requested", async () => {
    const events = [{ type: "init", session_id: "S1" }];
    invoker.outcome = result({ returnAllMessages: true, allMessages: events });

    const response = parseResponse(
      await client.callTool({ name: "gemini", arguments: { PROMPT: "hi", return_all_messages: true } }),
    );

    expect(response.text).to.equal(
      `success: true\nSESSION_ID: S1\nagent_messages: Hello\nWorld\nall_messages: 1 events captured\n\nFull event log:\n${JSON.stringify(events, null, 2)}`,
    );
    expect(response.structuredContent).to.deep.equal({
      success: true,
      SESSION_ID: "S1",
      agent_messages: "Hello\nWorld",
      all_messages: events,
    });
  });

  it("reports an aggregated failure with the captured events", async () => {
    const events = [{ type: "error", error: { message: "quota exceeded" } }];
    invoker.outcome = result({
      success: false,
      agentMessages: "",
      returnAllMessages: true,
      allMessages: events,
      error: "gemini error: quota exceeded",
    });

    const response = parseResponse(
      await client.callTool({ name: "gemini", arguments: { PROMPT: "hi", return_all_messages: true } }),
    );

    expect(response.isError).to.equal(true);
    expect(response.text).to.equal(
      `gemini error: quota exceeded\n\nCaptured 1 events before failure:\n${JSON.stringify(events, null, 2)}`,
    );
    expect(response.structuredContent).to.deep.equal({
      success: false,
      SESSION_ID: "S1",
      agent_messages: "",
      error: "gemini error: quota exceeded",
      all_messages: events,
    });
  });

  it("falls back to a generic message when a failure carries no error", async () => {
    invoker.outcome = result({ success: false, error: null });

    const response = parseResponse(await client.callTool({ name: "gemini", arguments: { PROMPT: "hi" } }));

    expect(response.isError).to.equal(true);
    expect(response.text).to.equal("Unknown error");
  });

  it("rejects a blank prompt before invoking the CLI", async () => {
    const response = parseResponse(await client.callTool({ name: "gemini", arguments: { PROMPT: "   " } }));

    expect(response.isError).to.equal(true);
    expect(JSON.parse(response.text)).to.deep.equal({
      ok: false,
      error: "E-GEMINI-INVALID-INPUT",
      tool: "gemini",
      message: "Prompt must be a non-empty, non-whitespace string",
      hint: "invalid_input",
    });
    expect(invoker.requests).to.deep.equal([]);
    expect(logger.find("gemini_failed")?.level).to.equal("error");
  });

  for (const timeout of [0, 3601]) {
    it(`rejects timeout_secs=${timeout} with the invalid-input payload`, async () => {
      const response = parseResponse(
        await client.callTool({ name: "gemini", arguments: { PROMPT: "hi", timeout_secs: timeout } }),
      );

      expect(response.isError).to.equal(true);
      const payload = JSON.parse(response.text);
      expect(payload.ok).to.equal(false);
      expect(payload.error).to.equal("E-GEMINI-INVALID-INPUT");
      expect(payload.tool).to.equal("gemini");
      expect(payload.hint).to.equal("invalid_input");
      expect(payload.details.issues).to.have.length(1);
      expect(payload.details.issues[0].code).to.equal(timeout === 0 ? "too_small" : "too_big");
      expect(payload.details.issues[0].path).to.deep.equal(["timeout_secs"]);
      expect(invoker.requests).to.deep.equal([]);
      expect(logger.find("gemini_failed")?.level).to.equal("error");
    });
  }

  it("rejects unknown parameters instead of dropping them", async () => {
    const response = parseResponse(
      await client.callTool({ name: "gemini", arguments: { PROMPT: "hi", prompt: "extra" } }),
    );

    expect(response.isError).to.equal(true);
    const payload = JSON.parse(response.text);
    expect(payload.error).to.equal("E-GEMINI-INVALID-INPUT");
    expect(payload.details.issues).to.have.length(1);
    expect(payload.details.issues[0].code).to.equal("unrecognized_keys");
    expect(payload.details.issues[0].keys).to.deep.equal(["prompt"]);
    expect(invoker.requests).to.deep.equal([]);
    expect(logger.find("gemini_failed")?.level).to.equal("error");
  });

  it("rejects calls to unknown tools with a protocol error", async () => {
    let caught: unknown;
    try {
      await client.callTool({ name: "codex", arguments: { PROMPT: "hi" } });
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(Error);
    expect(caught instanceof Error ? caught.message : "").to.include("Tool codex not found");
    expect(invoker.requests).to.deep.equal([]);
  });

  it("reports timeouts with their code, hint and details", async () => {
    invoker.outcome = new GeminiTimeoutError(30);

    const response = parseResponse(await client.callTool({ name: "gemini", arguments: { PROMPT: "hi" } }));

    expect(response.isError).to.equal(true);
    expect(JSON.parse(response.text)).to.deep.equal({
      ok: false,
      error: "E-GEMINI-TIMEOUT",
      tool: "gemini",
      message: "Gemini command timed out after 30 seconds",
      hint: "increase_timeout_secs",
      details: { timeout_secs: 30 },
    });
  });

  it("maps unexpected failures to the generic code", async () => {
    invoker.outcome = new Error("kaboom");

    const response = parseResponse(await client.callTool({ name: "gemini", arguments: { PROMPT: "hi" } }));

    expect(JSON.parse(response.text)).to.deep.equal({
      ok: false,
      error: "E-GEMINI-UNEXPECTED",
      tool: "gemini",
      message: "kaboom",
    });
  });
});
