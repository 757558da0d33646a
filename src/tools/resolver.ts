import { ConfigError, ToolExecutionError, errorMessage } from "../errors.js";
import type { RoleConfig, ToolConfig, ToolParameter } from "../runtime-config/types.js";
import type { SecretStore } from "../secrets/store.js";
import { log } from "../utils/logger.js";
import type { BuiltinToolRegistry } from "./builtin.js";
import type { ToolServerDirectory } from "./server-directory.js";
import type {
  ResolvedTools,
  ToolDescriptor,
  ToolHandle,
  ToolServerConnector,
  ToolServerEntry,
  ToolServerSession,
  ToolSnapshot,
} from "./types.js";

const logger = log.child("tools");

export const REDACTED = "[secret]";

export type ToolResolverDeps = {
  builtins: BuiltinToolRegistry;
  directory: ToolServerDirectory;
  connector: ToolServerConnector;
  secrets: SecretStore;
  signal?: AbortSignal;
};

type Resolved = { handle: ToolHandle; snapshot: ToolSnapshot };

export function redactParameters(params: Record<string, ToolParameter>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, param] of Object.entries(params)) {
    out[key] = param.type === "secret" ? REDACTED : param.value;
  }
  return out;
}

function externalHandle(session: ToolServerSession, descriptor: ToolDescriptor): ToolHandle {
  return {
    descriptor,
    kind: "external",
    async invoke(args, signal) {
      const result = await session.invoke(descriptor.name, args, signal);
      if (result.isError) {
        throw new ToolExecutionError(descriptor.name, result.text || `${descriptor.name} reported an error`);
      }
      return result.text;
    },
  };
}

function groupByServer(tools: ToolConfig[]): Map<string, ToolConfig[]> {
  const groups = new Map<string, ToolConfig[]>();
  for (const tool of tools) {
    const ref = tool.serverReference ?? "";
    const group = groups.get(ref);
    if (group) group.push(tool);
    else groups.set(ref, [tool]);
  }
  return groups;
}

/** Ids of deactivated external tools per server; discovery must not bring them back. */
function inactiveByServer(tools: ToolConfig[]): Map<string, Set<string>> {
  const out = new Map<string, Set<string>>();
  for (const tool of tools) {
    if (tool.active || tool.provider !== "external") continue;
    const ref = tool.serverReference ?? "";
    const ids = out.get(ref);
    if (ids) ids.add(tool.id);
    else out.set(ref, new Set([tool.id]));
  }
  return out;
}

async function resolveParameters(
  role: string,
  server: string,
  params: Record<string, ToolParameter>,
  deps: ToolResolverDeps,
): Promise<Record<string, string>> {
  const headers: Record<string, string> = {};
  for (const [key, param] of Object.entries(params)) {
    if (param.type === "text") {
      headers[key] = param.value;
      continue;
    }
    try {
      headers[key] = await deps.secrets.get(param.value, deps.signal);
    } catch (err) {
      throw new ConfigError(
        "SECRET_RESOLUTION_FAILED",
        `Role "${role}": secret parameter "${key}" for tool server "${server}" could not be resolved: ${errorMessage(err)}`,
        { role, cause: err },
      );
    }
  }
  return headers;
}

/**
 * Resolve a role's tool configs into callable handles. External servers are
 * connected and their tools discovered here; the returned sessions belong to
 * the caller and must be closed with the graph that uses them.
 */
export async function resolveTools(role: RoleConfig, deps: ToolResolverDeps): Promise<ResolvedTools> {
  const active = role.tools.filter((t) => t.active);
  const inactive = inactiveByServer(role.tools);
  const resolved: Resolved[] = [];
  const sessions: ToolServerSession[] = [];

  try {
    for (const tool of active) {
      if (tool.provider !== "builtin") continue;
      const builtin = deps.builtins.get(tool.id);
      if (!builtin) {
        throw new ConfigError("UNKNOWN_BUILTIN_TOOL", `Role "${role.name}": unknown builtin tool "${tool.id}"`, {
          role: role.name,
        });
      }
      if (Object.keys(tool.parameters).length > 0) {
        throw new ConfigError(
          "INVALID_CONFIG",
          `Role "${role.name}": builtin tool "${tool.id}" takes no parameters; parameters are sent to tool servers only`,
          { role: role.name },
        );
      }
      resolved.push({
        handle: { descriptor: builtin.descriptor, kind: "builtin", invoke: (args, signal) => builtin.run(args, signal) },
        snapshot: { name: builtin.descriptor.name, kind: "builtin", parameters: {} },
      });
    }

    const external = active.filter((t) => t.provider === "external");
    for (const [ref, tools] of groupByServer(external)) {
      let entry: ToolServerEntry;
      try {
        entry = deps.directory.get(ref);
      } catch (err) {
        throw new ConfigError("UNKNOWN_TOOL_SERVER", `Role "${role.name}": unknown tool server "${ref}"`, {
          role: role.name,
          cause: err,
        });
      }

      const params: Record<string, ToolParameter> = {};
      for (const tool of tools) Object.assign(params, tool.parameters);
      const headers = await resolveParameters(role.name, ref, params, deps);

      const session = await deps.connector.connect(entry, headers);
      sessions.push(session);

      let discovered: ToolDescriptor[];
      try {
        discovered = await session.discover(deps.signal);
      } catch (err) {
        throw new ConfigError(
          "TOOL_SERVER_UNAVAILABLE",
          `Role "${role.name}": tool discovery on "${ref}" failed: ${errorMessage(err)}`,
          { role: role.name, cause: err },
        );
      }

      const byName = new Map(discovered.map((d) => [d.name, d]));
      const descriptors: ToolDescriptor[] = tools.map(
        (t) => byName.get(t.id) ?? { name: t.id, description: t.id, inputSchema: { type: "object", properties: {} } },
      );
      const configured = new Set(tools.map((t) => t.id));
      const disabled = inactive.get(ref);
      descriptors.push(...discovered.filter((d) => !configured.has(d.name) && !disabled?.has(d.name)));

      const snapshotParams = redactParameters(params);
      for (const descriptor of descriptors) {
        resolved.push({
          handle: externalHandle(session, descriptor),
          snapshot: { name: descriptor.name, kind: "external", server: ref, parameters: { ...snapshotParams } },
        });
      }
    }
  } catch (err) {
    await closeSessions(sessions);
    throw err;
  }

  const seen = new Set<string>();
  const handles: ToolHandle[] = [];
  const snapshot: ToolSnapshot[] = [];
  for (const item of resolved) {
    const name = item.handle.descriptor.name;
    if (seen.has(name)) {
      logger.warn("Duplicate tool name, keeping the first", { role: role.name, tool: name });
      continue;
    }
    seen.add(name);
    handles.push(item.handle);
    snapshot.push(item.snapshot);
  }

  logger.debug("Tools resolved", { role: role.name, tools: handles.map((h) => h.descriptor.name) });
  return { handles, snapshot, sessions };
}

/** Close every session; failures are logged, not thrown. */
export async function closeSessions(sessions: ToolServerSession[]): Promise<void> {
  const results = await Promise.allSettled(sessions.map((s) => s.close()));
  results.forEach((r, i) => {
    if (r.status === "rejected") {
      logger.warn("Closing tool server session failed", { server: sessions[i]?.server, error: errorMessage(r.reason) });
    }
  });
}
