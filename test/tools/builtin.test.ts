import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { z } from "zod";
import { ToolExecutionError, ValidationError } from "../../src/errors.js";
import {
  BuiltinToolRegistry,
  createDefaultBuiltinRegistry,
  defineTool,
  formatDateTime,
  getDateTime,
  httpRequest,
  searchKnowledgeBase,
} from "../../src/tools/builtin.js";
import { type LoopbackServer, loopback, rejection, thrown } from "../helpers.js";

const signal = new AbortController().signal;

describe("BuiltinToolRegistry", () => {
  it("holds the default tools by id", () => {
    expect(createDefaultBuiltinRegistry().ids()).toEqual(["get_date_time", "search_knowledge_base", "http_request"]);
  });

  it("refuses a second tool with the same id", () => {
    const registry = new BuiltinToolRegistry().register(getDateTime);
    const err = thrown(() => registry.register(getDateTime));
    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({ code: "DUPLICATE_REGISTRATION" });
  });
});

describe("defineTool", () => {
  const echo = defineTool(
    { name: "echo", description: "Echo", inputSchema: { type: "object" } },
    z.object({ text: z.string() }),
    async ({ text }) => text.toUpperCase(),
  );

  it("passes validated arguments through", async () => {
    expect(await echo.run({ text: "hi" }, signal)).toBe("HI");
  });

  it("rejects arguments that do not match the schema", async () => {
    const err = await rejection(echo.run({}, signal));
    expect(err).toBeInstanceOf(ToolExecutionError);
    expect(err).toMatchObject({ tool: "echo", message: "Invalid arguments: text: Required" });
  });
});

describe("builtin tools", () => {
  it("formats local date and time", () => {
    expect(formatDateTime(new Date(2024, 0, 5, 7, 8, 9))).toBe("2024-01-05 07:08:09");
  });

  it("returns the current time", async () => {
    expect(await getDateTime.run({}, signal)).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
  });

  it("answers knowledge-base searches", async () => {
    expect(await searchKnowledgeBase.run({ query: "refunds" }, signal)).toBe(
      "Search result for 'refunds': No specific entries found in local KB. Please try a different query or use web search.",
    );
  });
});

describe("http_request", () => {
  let server: LoopbackServer;

  beforeAll(async () => {
    server = await loopback((req, res, body) => {
      if (req.url === "/long") {
        res.writeHead(200, { "Content-Type": "text/plain" });
        res.end("a".repeat(1500));
      } else if (req.url === "/echo") {
        res.writeHead(200, { "Content-Type": "application/json" });
        res.end(body);
      } else {
        res.writeHead(500);
        res.end("nope");
      }
    });
  });

  afterAll(async () => {
    await server.close();
  });

  it("truncates the body to 1000 characters", async () => {
    const out = await httpRequest.run({ url: `${server.url}/long` }, signal);
    expect(out).toBe("a".repeat(1000));
  });

  it("posts JSON data", async () => {
    const out = await httpRequest.run({ url: `${server.url}/echo`, method: "post", data: { id: 7 } }, signal);
    expect(out).toBe('{"id":7}');
    expect(server.requests.at(-1)?.method).toBe("POST");
  });

  it("fails on a non-2xx answer", async () => {
    const url = `${server.url}/fail`;
    expect(await rejection(httpRequest.run({ url }, signal))).toMatchObject({
      message: `HTTP request to ${url} failed: HTTP 500`,
    });
  });

  it("rejects methods other than GET and POST", async () => {
    expect(await rejection(httpRequest.run({ url: server.url, method: "delete" }, signal))).toMatchObject({
      message: "Unsupported HTTP method 'DELETE'",
    });
  });
});
