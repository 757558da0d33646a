/** JSON-schema-described function exposed to the model. */
export type ToolDescriptor = {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
};

export type ToolKind = "builtin" | "external" | "worker";

/**
 * A callable tool bound to one role. `invoke` resolves with the text result
 * and rejects with ToolExecutionError.
 */
export interface ToolHandle {
  readonly descriptor: ToolDescriptor;
  readonly kind: ToolKind;
  invoke(args: Record<string, unknown>, signal: AbortSignal): Promise<string>;
}

/** What remains visible of a role's tools after construction. Secrets are redacted. */
export type ToolSnapshot = {
  name: string;
  kind: ToolKind;
  server?: string;
  parameters: Record<string, string>;
};

export type ToolCallResult = {
  text: string;
  isError: boolean;
};

/** An open connection to one external tool server. */
export interface ToolServerSession {
  readonly server: string;
  discover(signal?: AbortSignal): Promise<ToolDescriptor[]>;
  invoke(toolId: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<ToolCallResult>;
  close(): Promise<void>;
}

export type ToolServerTransport = "streamable-http" | "sse";

export type ToolServerEntry = {
  name: string;
  transport: ToolServerTransport;
  endpoint: string;
  authToken?: string;
};

export interface ToolServerConnector {
  /** `headers` carries the role's resolved tool parameters. */
  connect(server: ToolServerEntry, headers: Record<string, string>): Promise<ToolServerSession>;
}

export type ResolvedTools = {
  handles: ToolHandle[];
  snapshot: ToolSnapshot[];
  sessions: ToolServerSession[];
};
