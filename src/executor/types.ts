export type FailureKind =
  | "ProviderError"
  | "ToolExecutionError"
  | "DependencyFailed"
  | "RoutingNoMatch"
  | "DeadlineExceeded";

export type PartialFailure = {
  role: string;
  kind: FailureKind;
  cause: string;
};

export type RoleStatus = "completed" | "failed" | "skipped";

export type RoleOutcome = {
  role: string;
  status: RoleStatus;
  /** Model answer, or a failure marker. */
  output: string;
  startedAt?: number;
  finishedAt: number;
  toolCalls: number;
};

export type TraceEvent = {
  at: number;
  role: string;
  event: "start" | "end" | "tool_call" | "worker_call" | "route" | "skip" | "iteration";
  detail?: string;
};

export type ExecutionStatus = "completed" | "partial" | "failed" | "deadline_exceeded" | "routing_no_match";

export type ExecutionOutcome = {
  taskId: string;
  status: ExecutionStatus;
  output: string;
  /** Latest output per role. */
  outputs: Record<string, string>;
  failures: PartialFailure[];
  notes: string[];
  trace: TraceEvent[];
  durationMs: number;
};

export type ExecutionCallbacks = {
  onNodeStart?: (role: string) => void;
  onNodeEnd?: (role: string, outcome: RoleOutcome) => void;
  onToolCall?: (role: string, tool: string) => void;
};

export type ExecuteOptions = {
  taskId?: string;
  /** Default: `timeouts.taskDeadline` from settings. */
  deadlineMs?: number;
  /** Aborting ends the task like an expired deadline. */
  signal?: AbortSignal;
  callbacks?: ExecutionCallbacks;
};

/** Result of running one node. `failed` propagates to dependents. */
export type NodeResult = {
  output: string;
  failed: boolean;
};
