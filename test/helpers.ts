import { type IncomingMessage, type ServerResponse, createServer } from "node:http";
import { buildGraph } from "../src/graph/builder.js";
import type { ExecutionGraph } from "../src/graph/types.js";
import type { CompletionRequest, CompletionResponse, ModelBackend, ToolCall } from "../src/llm/types.js";
import type { ResolvedPrompt } from "../src/prompts/resolver.js";
import type { ExecutionType, RoleConfig, RuntimeConfig } from "../src/runtime-config/types.js";
import type { ResolvedTools } from "../src/tools/types.js";

export type Reply = string | CompletionResponse | Error;
export type Script = (req: CompletionRequest, call: number) => Reply | Promise<Reply>;

/** Role names are recoverable from instructions of the form "You are <role>." */
export function roleOf(req: CompletionRequest): string {
  return /^You are (\S+)\./.exec(req.instructions)?.[1] ?? "?";
}

/** Content of the first user message. */
export function inputOf(req: CompletionRequest): string {
  const first = req.history[0];
  return first?.role === "user" ? first.content : "";
}

export function toolCall(id: string, name: string, args: Record<string, unknown>): ToolCall {
  return { id, name, arguments: JSON.stringify(args) };
}

/** Model backend that answers from a script and records every request. */
export class ScriptedBackend implements ModelBackend {
  readonly calls: CompletionRequest[] = [];

  constructor(private readonly script: Script) {}

  async complete(req: CompletionRequest): Promise<CompletionResponse> {
    this.calls.push(req);
    const reply = await this.script(req, this.calls.length);
    if (reply instanceof Error) throw reply;
    return typeof reply === "string" ? { content: reply, toolCalls: [] } : reply;
  }

  rolesCalled(): string[] {
    return this.calls.map(roleOf);
  }

  callsFor(role: string): CompletionRequest[] {
    return this.calls.filter((c) => roleOf(c) === role);
  }
}

/** Resolves after `ms`, or rejects with the abort reason. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      "abort",
      () => {
        clearTimeout(timer);
        reject(signal.reason);
      },
      { once: true },
    );
  });
}

export function role(name: string, extra: Partial<RoleConfig> = {}): RoleConfig {
  return { name, tools: [], metadata: {}, promptInline: `You are ${name}.`, ...extra };
}

export function runtimeConfig(
  executionType: ExecutionType,
  roles: RoleConfig[],
  extra: Partial<RuntimeConfig> = {},
): RuntimeConfig {
  return {
    executionType,
    roles,
    chainMode: "output",
    routing: { rules: [], unmatched: { kind: "reject" } },
    ...extra,
  };
}

export function inlinePrompts(config: RuntimeConfig): Map<string, ResolvedPrompt> {
  return new Map(
    config.roles.map((r): [string, ResolvedPrompt] => [
      r.name,
      { text: r.promptInline ?? "", source: "inline", origin: "prompt_inline", degradations: [] },
    ]),
  );
}

export function inlineGraph(config: RuntimeConfig, tools?: Map<string, ResolvedTools>): ExecutionGraph {
  return buildGraph(config, inlinePrompts(config), tools);
}

/** Returns what `fn` throws; fails when it does not throw. */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected an error to be thrown");
}

export async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("expected the promise to reject");
}

export type Handler = (req: IncomingMessage, res: ServerResponse, body: string) => void;

export type LoopbackServer = {
  url: string;
  requests: { method: string; path: string; headers: IncomingMessage["headers"]; body: string }[];
  close(): Promise<void>;
};

/** HTTP server on 127.0.0.1 with a random port, for client tests. */
export async function loopback(handler: Handler): Promise<LoopbackServer> {
  const requests: LoopbackServer["requests"] = [];
  const server = createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => {
      const body = Buffer.concat(chunks).toString("utf-8");
      requests.push({ method: req.method ?? "GET", path: req.url ?? "/", headers: req.headers, body });
      handler(req, res, body);
    });
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const addr = server.address();
  if (!addr || typeof addr === "string") throw new Error("loopback server has no port");
  const { port } = addr;
  return {
    url: `http://127.0.0.1:${port}`,
    requests,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeAllConnections();
      }),
  };
}

export function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}
