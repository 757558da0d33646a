export const EXECUTION_TYPES = ["single", "sequential", "parallel", "coordinator", "hub_spoke", "loop"] as const;

export type ExecutionType = (typeof EXECUTION_TYPES)[number];

export type ToolProvider = "builtin" | "external";

export type ToolParameter = {
  type: "text" | "secret";
  /** Literal value for `text`; a secret-store reference for `secret`. */
  value: string;
};

export type ToolConfig = {
  id: string;
  provider: ToolProvider;
  active: boolean;
  /** Set for external tools only. */
  serverReference?: string;
  parameters: Record<string, ToolParameter>;
};

export type RoleConfig = {
  name: string;
  description?: string;
  model?: string;
  tools: ToolConfig[];
  promptInline?: string;
  externalPromptId?: string;
  promptRef?: string;
  /** Values substituted into `{name}` placeholders of fetched instructions. */
  metadata: Record<string, string>;
  maxTurns?: number;
  retries?: number;
};

export type RoutingRule = {
  spoke: string;
  /** Case-insensitive substrings; any one matches. */
  keywords: string[];
  pattern?: string;
};

export type UnmatchedPolicy =
  | { kind: "reject" }
  | { kind: "broadcast" }
  | { kind: "hub" }
  | { kind: "default"; spoke: string };

export type ChainMode = "output" | "accumulate";

export type RuntimeConfig = {
  name?: string;
  description?: string;
  executionType: ExecutionType;
  roles: RoleConfig[];
  aggregatorRole?: string;
  coordinatorRole?: string;
  hubRole?: string;
  parallelRoles?: string[];
  workerRoles?: string[];
  spokeRoles?: string[];
  chainMode: ChainMode;
  /** `loop` only: passes over the roles before the last output is returned. */
  maxIterations?: number;
  routing: {
    rules: RoutingRule[];
    unmatched: UnmatchedPolicy;
  };
};
