import type { ServerResponse } from "node:http";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { configure, resetConfig } from "../../src/config.js";
import { ProviderError } from "../../src/errors.js";
import { CompletionsBackend, toWireMessages } from "../../src/llm/completions-backend.js";
import type { CompletionRequest } from "../../src/llm/types.js";
import { type LoopbackServer, loopback, rejection, sendJson } from "../helpers.js";

let server: LoopbackServer;
let respond: (res: ServerResponse) => void = () => {};

beforeAll(async () => {
  server = await loopback((req, res) => {
    if (req.url !== "/v1/chat/completions") {
      sendJson(res, 404, {});
      return;
    }
    respond(res);
  });
});

afterAll(async () => {
  await server.close();
});

beforeEach(() => {
  configure({ rateLimit: { enabled: false } });
});

afterEach(() => {
  resetConfig();
});

function request(extra: Partial<CompletionRequest> = {}): CompletionRequest {
  return {
    model: "gpt-test",
    instructions: "You are r1.",
    history: [{ role: "user", content: "hello" }],
    tools: [],
    signal: new AbortController().signal,
    ...extra,
  };
}

function backend(): CompletionsBackend {
  return new CompletionsBackend({ baseUrl: `${server.url}/v1/`, apiKey: "test-secret", maxTokens: 256 });
}

describe("toWireMessages", () => {
  it("puts the instructions first and maps tool traffic", () => {
    expect(
      toWireMessages("Be brief.", [
        { role: "user", content: "q" },
        { role: "assistant", content: "", toolCalls: [{ id: "c1", name: "lookup", arguments: '{"term":"x"}' }] },
        { role: "tool", toolCallId: "c1", content: "found" },
        { role: "assistant", content: "done" },
      ]),
    ).toEqual([
      { role: "system", content: "Be brief." },
      { role: "user", content: "q" },
      {
        role: "assistant",
        content: null,
        tool_calls: [{ id: "c1", type: "function", function: { name: "lookup", arguments: '{"term":"x"}' } }],
      },
      { role: "tool", tool_call_id: "c1", content: "found" },
      { role: "assistant", content: "done" },
    ]);
  });
});

describe("CompletionsBackend", () => {
  it("posts the conversation with bearer auth and returns the text", async () => {
    respond = (res) => sendJson(res, 200, { choices: [{ message: { content: "hi there" }, finish_reason: "stop" }] });

    const out = await backend().complete(request());
    expect(out).toEqual({ content: "hi there", toolCalls: [] });

    const sent = server.requests.at(-1);
    expect(sent?.method).toBe("POST");
    expect(sent?.headers.authorization).toBe("Bearer test-secret");
    expect(JSON.parse(sent?.body ?? "")).toEqual({
      model: "gpt-test",
      messages: [
        { role: "system", content: "You are r1." },
        { role: "user", content: "hello" },
      ],
      max_tokens: 256,
    });
  });

  it("offers tools and maps the calls the model makes", async () => {
    respond = (res) =>
      sendJson(res, 200, {
        choices: [
          {
            message: {
              content: null,
              tool_calls: [{ id: "c1", type: "function", function: { name: "lookup", arguments: '{"term":"x"}' } }],
            },
          },
        ],
      });

    const out = await backend().complete(
      request({ tools: [{ name: "lookup", description: "Look up", inputSchema: { type: "object" } }] }),
    );
    expect(out).toEqual({ content: "", toolCalls: [{ id: "c1", name: "lookup", arguments: '{"term":"x"}' }] });
    expect(JSON.parse(server.requests.at(-1)?.body ?? "").tools).toEqual([
      { type: "function", function: { name: "lookup", description: "Look up", parameters: { type: "object" } } },
    ]);
  });

  it("marks throttling as retryable", async () => {
    respond = (res) => sendJson(res, 429, { error: "slow down" });
    const err = await rejection(backend().complete(request()));
    expect(err).toBeInstanceOf(ProviderError);
    expect(err).toMatchObject({
      status: 429,
      retryable: true,
      message: 'Model "gpt-test" answered HTTP 429: {"error":"slow down"}',
    });
  });

  it("marks a rejected request as not retryable", async () => {
    respond = (res) => sendJson(res, 400, { error: "bad" });
    expect(await rejection(backend().complete(request()))).toMatchObject({ status: 400, retryable: false });
  });

  it("rejects a body that is not JSON", async () => {
    respond = (res) => {
      res.writeHead(200);
      res.end("<html>");
    };
    expect(await rejection(backend().complete(request()))).toMatchObject({
      message: 'Model "gpt-test" returned invalid JSON',
      retryable: false,
    });
  });

  it("rejects a response without choices", async () => {
    respond = (res) => sendJson(res, 200, { choices: [] });
    expect(await rejection(backend().complete(request()))).toMatchObject({
      message: 'Model "gpt-test" returned an unexpected body: choices: response has no choices',
      retryable: false,
    });
  });

  it("rethrows the caller's abort reason", async () => {
    respond = () => {};
    const controller = new AbortController();
    const reason = new Error("deadline");
    const pending = backend().complete(request({ signal: controller.signal }));
    setTimeout(() => controller.abort(reason), 20);
    expect(await rejection(pending)).toBe(reason);
  });
});
