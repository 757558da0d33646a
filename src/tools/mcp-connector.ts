import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { SSEClientTransport } from "@modelcontextprotocol/sdk/client/sse.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { z } from "zod";
import { getConfig } from "../config.js";
import { ConfigError, ToolExecutionError, errorMessage } from "../errors.js";
import { log } from "../utils/logger.js";
import type {
  ToolCallResult,
  ToolDescriptor,
  ToolServerConnector,
  ToolServerEntry,
  ToolServerSession,
} from "./types.js";

const logger = log.child("mcp");

const CallToolResultSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() }).passthrough()).default([]),
  isError: z.boolean().optional(),
});

/** Joined text parts of a tool result; non-text parts are named by type. */
export function resultText(raw: unknown): ToolCallResult {
  const parsed = CallToolResultSchema.safeParse(raw);
  if (!parsed.success) {
    return { text: JSON.stringify(raw), isError: false };
  }
  const text = parsed.data.content
    .map((part) => (part.type === "text" && part.text !== undefined ? part.text : `[${part.type}]`))
    .join("\n");
  return { text, isError: parsed.data.isError ?? false };
}

/** An MCP client connected over any transport. */
export class McpSession implements ToolServerSession {
  constructor(
    readonly server: string,
    private readonly client: Client,
  ) {}

  static async open(server: string, transport: Transport): Promise<McpSession> {
    const client = new Client({ name: "agent-topology-runtime", version: "0.1.0" });
    await client.connect(transport);
    return new McpSession(server, client);
  }

  async discover(signal?: AbortSignal): Promise<ToolDescriptor[]> {
    const { tools } = await this.client.listTools(undefined, { signal });
    return tools.map((t) => ({
      name: t.name,
      description: t.description ?? t.name,
      inputSchema: { ...t.inputSchema },
    }));
  }

  async invoke(toolId: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<ToolCallResult> {
    try {
      const raw = await this.client.callTool({ name: toolId, arguments: args }, undefined, {
        signal,
        timeout: getConfig().timeouts.tool,
      });
      return resultText(raw);
    } catch (err) {
      if (signal?.aborted) throw err;
      throw new ToolExecutionError(toolId, `${this.server}/${toolId} failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}

/** Opens MCP sessions over streamable HTTP or SSE. */
export class McpConnector implements ToolServerConnector {
  async connect(server: ToolServerEntry, headers: Record<string, string>): Promise<ToolServerSession> {
    const requestInit: RequestInit = {
      headers: {
        ...(server.authToken ? { Authorization: `Bearer ${server.authToken}` } : {}),
        ...headers,
      },
    };
    let url: URL;
    try {
      url = new URL(server.endpoint);
    } catch (err) {
      throw new ConfigError("TOOL_SERVER_UNAVAILABLE", `Tool server "${server.name}" has an invalid endpoint`, {
        cause: err,
      });
    }

    const transport =
      server.transport === "sse"
        ? new SSEClientTransport(url, { requestInit })
        : new StreamableHTTPClientTransport(url, { requestInit });

    try {
      const session = await McpSession.open(server.name, transport);
      logger.info("Connected", { server: server.name, transport: server.transport });
      return session;
    } catch (err) {
      throw new ConfigError(
        "TOOL_SERVER_UNAVAILABLE",
        `Tool server "${server.name}" unreachable: ${errorMessage(err)}`,
        { cause: err },
      );
    }
  }
}
