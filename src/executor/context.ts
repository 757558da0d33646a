import type {
  ExecutionCallbacks,
  FailureKind,
  PartialFailure,
  RoleOutcome,
  TraceEvent,
} from "./types.js";

export function failureMarker(role: string, kind: FailureKind, cause: string): string {
  return `[${role} failed: ${kind}: ${cause}]`;
}

/**
 * Per-task state. Writes after `seal()` are dropped so that work abandoned
 * at the deadline cannot change a response already produced.
 */
export class TaskContext {
  readonly outcomes = new Map<string, RoleOutcome>();
  readonly failures: PartialFailure[] = [];
  readonly notes: string[] = [];
  readonly trace: TraceEvent[] = [];
  /** Roles with a model call in flight. */
  readonly running = new Map<string, number>();
  routingRejected = false;
  private sealedAt: number | undefined;

  constructor(
    readonly taskId: string,
    readonly input: string,
    readonly signal: AbortSignal,
    private readonly callbacks: ExecutionCallbacks = {},
  ) {}

  get sealed(): boolean {
    return this.sealedAt !== undefined;
  }

  seal(): void {
    this.sealedAt ??= Date.now();
  }

  start(role: string): number {
    const at = Date.now();
    if (this.sealed) return at;
    this.running.set(role, (this.running.get(role) ?? 0) + 1);
    this.trace.push({ at, role, event: "start" });
    this.callbacks.onNodeStart?.(role);
    return at;
  }

  finish(outcome: RoleOutcome): void {
    if (this.sealed) return;
    const left = (this.running.get(outcome.role) ?? 1) - 1;
    if (left > 0) this.running.set(outcome.role, left);
    else this.running.delete(outcome.role);
    this.outcomes.set(outcome.role, outcome);
    this.trace.push({ at: outcome.finishedAt, role: outcome.role, event: "end", detail: outcome.status });
    this.callbacks.onNodeEnd?.(outcome.role, outcome);
  }

  fail(role: string, kind: FailureKind, cause: string): string {
    if (!this.sealed) this.failures.push({ role, kind, cause });
    return failureMarker(role, kind, cause);
  }

  /** Record a role that never ran because something it depends on failed. */
  skip(role: string, cause: string): void {
    if (this.sealed) return;
    const output = this.fail(role, "DependencyFailed", cause);
    const now = Date.now();
    this.outcomes.set(role, { role, status: "skipped", output, finishedAt: now, toolCalls: 0 });
    this.trace.push({ at: now, role, event: "skip", detail: cause });
  }

  note(text: string): void {
    if (!this.sealed) this.notes.push(text);
  }

  event(role: string, event: TraceEvent["event"], detail?: string): void {
    if (this.sealed) return;
    this.trace.push({ at: Date.now(), role, event, detail });
    if (event === "tool_call" && detail !== undefined) this.callbacks.onToolCall?.(role, detail);
  }
}
