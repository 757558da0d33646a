import { getConfig } from "../config.js";
import { ConfigError, ParseError, errorMessage } from "../errors.js";
import { ToolServerEntrySchema, ToolServerListSchema, parseOrThrow } from "../schemas.js";
import { bearer, fetchJson, joinUrl } from "../utils/http.js";
import { log } from "../utils/logger.js";
import type { ToolServerEntry, ToolServerTransport } from "./types.js";

const logger = log.child("tool-servers");

const TRANSPORTS: Record<string, ToolServerTransport> = {
  "streamable-http": "streamable-http",
  streamable_http: "streamable-http",
  http: "streamable-http",
  sse: "sse",
};

/** Valid entries of a server list; malformed ones are logged and skipped. */
export function parseServerEntries(raw: unknown): ToolServerEntry[] {
  const list = parseOrThrow(ToolServerListSchema, raw, "tool server list");
  const entries: ToolServerEntry[] = [];
  for (const item of list) {
    const parsed = ToolServerEntrySchema.safeParse(item);
    if (!parsed.success) {
      logger.warn("Skipping malformed tool server entry", { entry: JSON.stringify(item) });
      continue;
    }
    const { name, endpoint, transport, authToken } = parsed.data;
    const kind = TRANSPORTS[transport.toLowerCase()];
    if (!name || !endpoint || !kind) {
      logger.warn("Skipping incomplete tool server entry", { name, transport, endpoint });
      continue;
    }
    entries.push({ name, endpoint, transport: kind, authToken });
  }
  return entries;
}

/** Tool servers addressable by the `server_reference` of a tool config. */
export class ToolServerDirectory {
  private servers = new Map<string, ToolServerEntry>();

  constructor(entries: ToolServerEntry[] = []) {
    for (const entry of entries) this.add(entry);
  }

  /** Later entries for the same name replace earlier ones. */
  add(entry: ToolServerEntry): void {
    this.servers.set(entry.name, entry);
  }

  has(name: string): boolean {
    return this.servers.has(name);
  }

  get(name: string): ToolServerEntry {
    const entry = this.servers.get(name);
    if (!entry) {
      throw new ConfigError("UNKNOWN_TOOL_SERVER", `Unknown tool server "${name}"`);
    }
    return entry;
  }

  names(): string[] {
    return [...this.servers.keys()];
  }

  /** Parse the MCP_SERVERS JSON array. Empty input gives an empty directory. */
  static fromJson(json: string): ToolServerDirectory {
    if (!json.trim()) return new ToolServerDirectory();
    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch (err) {
      throw new ParseError(`MCP_SERVERS is not valid JSON: ${errorMessage(err)}`, { cause: err });
    }
    return new ToolServerDirectory(parseServerEntries(raw));
  }

  /** Registry `GET /mcp-servers`. */
  static async fromRegistry(baseUrl: string, apiKey = ""): Promise<ToolServerDirectory> {
    const body = await fetchJson(joinUrl(baseUrl, "mcp-servers"), {
      store: "registry",
      headers: bearer(apiKey),
      timeoutMs: getConfig().timeouts.store,
    });
    return new ToolServerDirectory(parseServerEntries(body));
  }

  /** Entries of `other` take precedence. */
  merge(other: ToolServerDirectory): ToolServerDirectory {
    const merged = new ToolServerDirectory([...this.servers.values()]);
    for (const entry of other.servers.values()) merged.add(entry);
    return merged;
  }
}
