import { describe, expect, it } from "vitest";
import { ConfigError, StoreError, ToolExecutionError } from "../../src/errors.js";
import type { ToolConfig } from "../../src/runtime-config/types.js";
import { EnvSecretStore, type SecretStore } from "../../src/secrets/store.js";
import { createDefaultBuiltinRegistry } from "../../src/tools/builtin.js";
import { type ToolResolverDeps, resolveTools } from "../../src/tools/resolver.js";
import { ToolServerDirectory } from "../../src/tools/server-directory.js";
import type {
  ToolCallResult,
  ToolDescriptor,
  ToolServerConnector,
  ToolServerEntry,
  ToolServerSession,
} from "../../src/tools/types.js";
import { rejection, role } from "../helpers.js";

const signal = new AbortController().signal;

class FakeSession implements ToolServerSession {
  closed = false;
  readonly invocations: { toolId: string; args: Record<string, unknown> }[] = [];

  constructor(
    readonly server: string,
    private readonly tools: ToolDescriptor[],
    private readonly results: Record<string, ToolCallResult> = {},
    private readonly discoveryError?: Error,
  ) {}

  async discover(): Promise<ToolDescriptor[]> {
    if (this.discoveryError) throw this.discoveryError;
    return this.tools;
  }

  async invoke(toolId: string, args: Record<string, unknown>): Promise<ToolCallResult> {
    this.invocations.push({ toolId, args });
    return this.results[toolId] ?? { text: `${toolId} ok`, isError: false };
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

class FakeConnector implements ToolServerConnector {
  readonly connections: { server: ToolServerEntry; headers: Record<string, string> }[] = [];

  constructor(private readonly session: FakeSession) {}

  async connect(server: ToolServerEntry, headers: Record<string, string>): Promise<ToolServerSession> {
    this.connections.push({ server, headers });
    return this.session;
  }
}

const lookup: ToolDescriptor = {
  name: "lookup",
  description: "Look a term up",
  inputSchema: { type: "object", properties: { term: { type: "string" } } },
};

function external(id: string, extra: Partial<ToolConfig> = {}): ToolConfig {
  return {
    id,
    provider: "external",
    active: true,
    serverReference: "kb",
    parameters: { api_key: { type: "secret", value: "kb-key" }, region: { type: "text", value: "eu" } },
    ...extra,
  };
}

function builtin(id: string, active = true): ToolConfig {
  return { id, provider: "builtin", active, parameters: {} };
}

function deps(session: FakeSession, secrets: SecretStore = new EnvSecretStore({ KB_KEY: "test-secret" })) {
  const connector = new FakeConnector(session);
  const resolverDeps: ToolResolverDeps = {
    builtins: createDefaultBuiltinRegistry(),
    directory: new ToolServerDirectory([{ name: "kb", endpoint: "http://kb.local/mcp", transport: "streamable-http" }]),
    connector,
    secrets,
  };
  return { connector, resolverDeps };
}

describe("resolveTools", () => {
  it("binds builtins first, then the external server's tools with resolved headers", async () => {
    const session = new FakeSession("kb", [lookup]);
    const { connector, resolverDeps } = deps(session);
    const resolved = await resolveTools(
      role("r1", { tools: [builtin("get_date_time"), external("lookup"), builtin("search_knowledge_base")] }),
      resolverDeps,
    );

    expect(resolved.handles.map((h) => h.descriptor.name)).toEqual(["get_date_time", "search_knowledge_base", "lookup"]);
    expect(resolved.handles.map((h) => h.kind)).toEqual(["builtin", "builtin", "external"]);
    expect(connector.connections).toHaveLength(1);
    expect(connector.connections[0]?.headers).toEqual({ api_key: "test-secret", region: "eu" });
    expect(resolved.sessions).toEqual([session]);
  });

  it("redacts secret parameters in the snapshot", async () => {
    const { resolverDeps } = deps(new FakeSession("kb", [lookup]));
    const resolved = await resolveTools(role("r1", { tools: [external("lookup")] }), resolverDeps);
    expect(resolved.snapshot).toEqual([
      { name: "lookup", kind: "external", server: "kb", parameters: { api_key: "[secret]", region: "eu" } },
    ]);
  });

  it("drops inactive tools", async () => {
    const { connector, resolverDeps } = deps(new FakeSession("kb", [lookup]));
    const resolved = await resolveTools(
      role("r1", { tools: [builtin("get_date_time", false), external("lookup", { active: false })] }),
      resolverDeps,
    );
    expect(resolved.handles).toEqual([]);
    expect(connector.connections).toEqual([]);
  });

  it("keeps a deactivated tool out of the server's discovered tools", async () => {
    const deleteAll: ToolDescriptor = { ...lookup, name: "delete_all", description: "Wipe the index" };
    const search: ToolDescriptor = { ...lookup, name: "search", description: "Search the index" };
    const { connector, resolverDeps } = deps(new FakeSession("kb", [lookup, deleteAll, search]));
    const resolved = await resolveTools(
      role("r1", { tools: [external("lookup"), external("delete_all", { active: false })] }),
      resolverDeps,
    );
    expect(connector.connections).toHaveLength(1);
    expect(resolved.handles.map((h) => h.descriptor.name)).toEqual(["lookup", "search"]);
    expect(resolved.snapshot.map((s) => s.name)).toEqual(["lookup", "search"]);
  });

  it("refuses parameters on a builtin tool", async () => {
    const { resolverDeps } = deps(new FakeSession("kb", []));
    const clock: ToolConfig = { ...builtin("get_date_time"), parameters: { zone: { type: "text", value: "UTC" } } };
    const err = await rejection(resolveTools(role("r1", { tools: [clock] }), resolverDeps));
    expect(err).toMatchObject({
      code: "INVALID_CONFIG",
      role: "r1",
      message: 'Role "r1": builtin tool "get_date_time" takes no parameters; parameters are sent to tool servers only',
    });
  });

  it("fails on an unknown builtin", async () => {
    const { resolverDeps } = deps(new FakeSession("kb", []));
    const err = await rejection(resolveTools(role("r1", { tools: [builtin("teleport")] }), resolverDeps));
    expect(err).toBeInstanceOf(ConfigError);
    expect(err).toMatchObject({ code: "UNKNOWN_BUILTIN_TOOL", role: "r1" });
  });

  it("fails on an unknown tool server", async () => {
    const { resolverDeps } = deps(new FakeSession("kb", []));
    const err = await rejection(
      resolveTools(role("r1", { tools: [external("lookup", { serverReference: "elsewhere" })] }), resolverDeps),
    );
    expect(err).toMatchObject({ code: "UNKNOWN_TOOL_SERVER", message: 'Role "r1": unknown tool server "elsewhere"' });
  });

  it("does not connect when a secret cannot be resolved", async () => {
    const { connector, resolverDeps } = deps(new FakeSession("kb", [lookup]), new EnvSecretStore({}));
    const err = await rejection(resolveTools(role("r1", { tools: [external("lookup")] }), resolverDeps));
    expect(err).toMatchObject({ code: "SECRET_RESOLUTION_FAILED", role: "r1" });
    expect(err instanceof ConfigError && err.cause).toBeInstanceOf(StoreError);
    expect(connector.connections).toEqual([]);
  });

  it("closes the session when discovery fails", async () => {
    const session = new FakeSession("kb", [], {}, new Error("socket closed"));
    const { resolverDeps } = deps(session);
    const err = await rejection(resolveTools(role("r1", { tools: [external("lookup")] }), resolverDeps));
    expect(err).toMatchObject({
      code: "TOOL_SERVER_UNAVAILABLE",
      message: 'Role "r1": tool discovery on "kb" failed: socket closed',
    });
    expect(session.closed).toBe(true);
  });

  it("describes a configured tool the server did not list generically", async () => {
    const { resolverDeps } = deps(new FakeSession("kb", []));
    const resolved = await resolveTools(role("r1", { tools: [external("hidden")] }), resolverDeps);
    expect(resolved.handles[0]?.descriptor).toEqual({
      name: "hidden",
      description: "hidden",
      inputSchema: { type: "object", properties: {} },
    });
  });

  it("turns an error result into a ToolExecutionError", async () => {
    const session = new FakeSession("kb", [lookup], { lookup: { text: "term too short", isError: true } });
    const { resolverDeps } = deps(session);
    const [handle] = (await resolveTools(role("r1", { tools: [external("lookup")] }), resolverDeps)).handles;

    const err = await rejection(handle ? handle.invoke({ term: "a" }, signal) : Promise.resolve());
    expect(err).toBeInstanceOf(ToolExecutionError);
    expect(err).toMatchObject({ tool: "lookup", message: "term too short" });
    expect(session.invocations).toEqual([{ toolId: "lookup", args: { term: "a" } }]);
  });

  it("keeps the first tool when two share a name", async () => {
    const clash: ToolDescriptor = { ...lookup, name: "get_date_time", description: "Remote clock" };
    const { resolverDeps } = deps(new FakeSession("kb", [clash]));
    const resolved = await resolveTools(
      role("r1", { tools: [builtin("get_date_time"), external("get_date_time")] }),
      resolverDeps,
    );
    expect(resolved.handles).toHaveLength(1);
    expect(resolved.handles[0]?.kind).toBe("builtin");
  });
});
