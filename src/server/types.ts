import type { ExecutionStatus, PartialFailure, RoleOutcome } from "../executor/types.js";

// --- Task history ---

export type TaskState = "queued" | "running" | ExecutionStatus;

export type TaskRecord = {
  taskId: string;
  /** Empty in legacy single-role mode. */
  agentId: string;
  message: string;
  state: TaskState;
  output?: string;
  failures: PartialFailure[];
  notes: string[];
  /** Set when the task could not start, e.g. a configuration error. */
  error?: string;
  startedAt: number;
  finishedAt?: number;
};

export function isFinished(state: TaskState): boolean {
  return state !== "queued" && state !== "running";
}

// --- SSE Event Types ---

export type SSEEvent =
  | { type: "task:started"; taskId: string; agentId: string; message: string }
  | { type: "node:started"; taskId: string; role: string }
  | { type: "node:ended"; taskId: string; role: string; status: RoleOutcome["status"] }
  | { type: "tool:called"; taskId: string; role: string; tool: string }
  | { type: "task:complete"; taskId: string; state: TaskState; durationMs: number }
  | { type: "task:error"; taskId: string; error: string }
  | { type: "task:deleted"; taskId: string };
