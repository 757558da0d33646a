import { z } from "zod";
import { ToolExecutionError, ValidationError, errorMessage } from "../errors.js";
import { formatIssues } from "../schemas.js";
import type { ToolDescriptor } from "./types.js";

export type BuiltinTool = {
  descriptor: ToolDescriptor;
  run(args: Record<string, unknown>, signal: AbortSignal): Promise<string>;
};

/**
 * Builtin tools addressable by id. Constructed explicitly and read-only once
 * the runtime starts.
 */
export class BuiltinToolRegistry {
  private tools = new Map<string, BuiltinTool>();

  register(tool: BuiltinTool): this {
    const id = tool.descriptor.name;
    if (this.tools.has(id)) {
      throw new ValidationError("DUPLICATE_REGISTRATION", `Builtin tool "${id}" already registered`);
    }
    this.tools.set(id, tool);
    return this;
  }

  get(id: string): BuiltinTool | undefined {
    return this.tools.get(id);
  }

  ids(): string[] {
    return [...this.tools.keys()];
  }
}

export function defineTool<S extends z.ZodTypeAny>(
  descriptor: ToolDescriptor,
  schema: S,
  run: (args: z.output<S>, signal: AbortSignal) => Promise<string>,
): BuiltinTool {
  return {
    descriptor,
    async run(raw, signal) {
      const parsed = schema.safeParse(raw);
      if (!parsed.success) {
        throw new ToolExecutionError(descriptor.name, `Invalid arguments: ${formatIssues(parsed.error)}`);
      }
      return run(parsed.data, signal);
    },
  };
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatDateTime(d: Date): string {
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
  );
}

export const getDateTime = defineTool(
  {
    name: "get_date_time",
    description: "Returns the current system date and time.",
    inputSchema: { type: "object", properties: {} },
  },
  z.object({}).passthrough(),
  async () => formatDateTime(new Date()),
);

export const searchKnowledgeBase = defineTool(
  {
    name: "search_knowledge_base",
    description: "Searches the local knowledge base.",
    inputSchema: {
      type: "object",
      properties: { query: { type: "string", description: "What to look for" } },
      required: ["query"],
    },
  },
  z.object({ query: z.string() }),
  async ({ query }) =>
    `Search result for '${query}': No specific entries found in local KB. Please try a different query or use web search.`,
);

const HTTP_BODY_LIMIT = 1000;
const HTTP_TIMEOUT_MS = 10_000;

export const httpRequest = defineTool(
  {
    name: "http_request",
    description: "Performs an HTTP GET or POST and returns the first 1000 characters of the body.",
    inputSchema: {
      type: "object",
      properties: {
        url: { type: "string" },
        method: { type: "string", enum: ["GET", "POST"] },
        data: { type: "object", description: "JSON body for POST" },
      },
      required: ["url"],
    },
  },
  z.object({
    url: z.string().url(),
    method: z
      .string()
      .default("GET")
      .transform((m) => m.toUpperCase()),
    data: z.record(z.unknown()).optional(),
  }),
  async ({ url, method, data }, signal) => {
    if (method !== "GET" && method !== "POST") {
      throw new ToolExecutionError("http_request", `Unsupported HTTP method '${method}'`);
    }
    let res: Response;
    try {
      res = await fetch(url, {
        method,
        headers: method === "POST" ? { "Content-Type": "application/json" } : undefined,
        body: method === "POST" ? JSON.stringify(data ?? {}) : undefined,
        signal: AbortSignal.any([signal, AbortSignal.timeout(HTTP_TIMEOUT_MS)]),
      });
    } catch (err) {
      if (signal.aborted) throw err;
      throw new ToolExecutionError("http_request", `HTTP request to ${url} failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    if (!res.ok) {
      throw new ToolExecutionError("http_request", `HTTP request to ${url} failed: HTTP ${res.status}`);
    }
    const text = await res.text();
    return text.slice(0, HTTP_BODY_LIMIT);
  },
);

export function createDefaultBuiltinRegistry(): BuiltinToolRegistry {
  return new BuiltinToolRegistry().register(getDateTime).register(searchKnowledgeBase).register(httpRequest);
}
