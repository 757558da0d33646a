import { randomUUID } from "node:crypto";
import { getConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { assertNever } from "../graph/builder.js";
import type {
  CompiledRoute,
  CoordinatorNode,
  ExecutionGraph,
  GraphNode,
  HubNode,
  LeafNode,
  LoopNode,
  ParallelNode,
  SequentialNode,
} from "../graph/types.js";
import type { ModelBackend } from "../llm/types.js";
import { MAX_TIMER_MS } from "../schemas.js";
import type { ToolHandle } from "../tools/types.js";
import { log } from "../utils/logger.js";
import { TaskContext } from "./context.js";
import { type LeafRunner, askLeaf, runLeaf } from "./leaf.js";
import type { ExecuteOptions, ExecutionOutcome, ExecutionStatus, NodeResult } from "./types.js";

const logger = log.child("executor");

export function labelled(parts: { label: string; output: string }[]): string {
  return parts.map((p) => `=== ${p.label} ===\n${p.output}`).join("\n\n");
}

/** Label used for a child in concatenated output and dependency notes. */
function labelOf(node: GraphNode): string {
  switch (node.kind) {
    case "leaf":
      return node.role;
    case "sequential":
    case "parallel":
    case "loop":
      return node.name;
    case "coordinator":
      return node.coordinator.role;
    case "hub":
      return node.hub.role;
    default:
      return assertNever(node);
  }
}

function leavesOf(node: GraphNode): LeafNode[] {
  switch (node.kind) {
    case "leaf":
      return [node];
    case "sequential":
    case "parallel":
    case "loop":
      return node.children.flatMap(leavesOf);
    case "coordinator":
      return [node.coordinator, ...node.workers];
    case "hub":
      return [node.hub, ...node.spokes];
    default:
      return assertNever(node);
  }
}

export function matchRoute(routes: readonly CompiledRoute[], message: string): CompiledRoute | undefined {
  const lower = message.toLowerCase();
  return routes.find(
    (r) => r.keywords.some((k) => lower.includes(k)) || (r.pattern !== undefined && r.pattern.test(message)),
  );
}

export function hubRoutingPrompt(spokes: readonly LeafNode[], message: string): string {
  return (
    `You are a hub router. Available spokes: [${spokes.map((s) => s.role).join(", ")}]. ` +
    `Route this request to the best spoke. Respond with ONLY the spoke name.\n\n` +
    `Request: ${message}`
  );
}

const WORKER_SCHEMA = {
  type: "object",
  properties: { task: { type: "string", description: "The task for this worker" } },
  required: ["task"],
};

/**
 * Runs an ExecutionGraph for one task. The graph is shared and read-only;
 * everything a task writes lives in its TaskContext.
 */
export class Executor {
  constructor(private readonly backend: ModelBackend) {}

  async execute(graph: ExecutionGraph, message: string, opts: ExecuteOptions = {}): Promise<ExecutionOutcome> {
    const start = Date.now();
    const taskId = opts.taskId ?? randomUUID();
    const deadlineMs = Math.min(Math.max(opts.deadlineMs ?? getConfig().timeouts.taskDeadline, 0), MAX_TIMER_MS);

    const controller = new AbortController();
    const onExternalAbort = () => controller.abort(new Error("task cancelled"));
    if (opts.signal?.aborted) onExternalAbort();
    opts.signal?.addEventListener("abort", onExternalAbort, { once: true });
    const timer = setTimeout(() => controller.abort(new Error(`deadline of ${deadlineMs}ms exceeded`)), deadlineMs);

    const ctx = new TaskContext(taskId, message, controller.signal, opts.callbacks);
    const run: LeafRunner = { backend: this.backend, ctx };
    logger.info("Task started", { taskId, graph: graph.name, executionType: graph.executionType });

    const expired = new Promise<undefined>((resolve) => {
      if (controller.signal.aborted) resolve(undefined);
      controller.signal.addEventListener("abort", () => resolve(undefined), { once: true });
    });

    let result: NodeResult | undefined;
    try {
      const work = controller.signal.aborted ? Promise.resolve(undefined) : this.runNode(run, graph.root, message);
      result = await Promise.race([work, expired]);
    } catch (err) {
      if (!controller.signal.aborted) throw err;
      result = undefined;
    } finally {
      clearTimeout(timer);
      opts.signal?.removeEventListener("abort", onExternalAbort);
    }

    let status: ExecutionStatus;
    let output: string;
    if (result === undefined) {
      const cause = errorMessage(controller.signal.reason);
      const inFlight = [...ctx.running.keys()];
      for (const role of inFlight.length > 0 ? inFlight : [labelOf(graph.root)]) {
        ctx.fail(role, "DeadlineExceeded", cause);
      }
      status = "deadline_exceeded";
      output = labelled(
        graph.roles.flatMap((role) => {
          const o = ctx.outcomes.get(role);
          return o && o.status === "completed" ? [{ label: role, output: o.output }] : [];
        }),
      );
    } else {
      output = result.output;
      if (ctx.routingRejected) status = "routing_no_match";
      else if (result.failed) status = "failed";
      else if (ctx.failures.length > 0) status = "partial";
      else status = "completed";
    }
    if (!controller.signal.aborted) controller.abort(new Error("task finished"));

    const outcome: ExecutionOutcome = {
      taskId,
      status,
      output,
      outputs: Object.fromEntries([...ctx.outcomes.values()].map((o) => [o.role, o.output])),
      failures: [...ctx.failures],
      notes: [...graph.notes, ...ctx.notes],
      trace: [...ctx.trace],
      durationMs: Date.now() - start,
    };
    ctx.seal();
    logger.info("Task finished", { taskId, status, failures: outcome.failures.length, durationMs: outcome.durationMs });
    return outcome;
  }

  private runNode(run: LeafRunner, node: GraphNode, input: string): Promise<NodeResult> {
    switch (node.kind) {
      case "leaf":
        return runLeaf(run, node, input);
      case "sequential":
        return this.runSequential(run, node, input);
      case "parallel":
        return this.runParallel(run, node, input);
      case "loop":
        return this.runLoop(run, node, input);
      case "coordinator":
        return this.runCoordinator(run, node, input);
      case "hub":
        return this.runHub(run, node, input);
      default:
        return assertNever(node);
    }
  }

  private async runSequential(run: LeafRunner, node: SequentialNode, message: string): Promise<NodeResult> {
    let input = message;
    let last: NodeResult = { output: "", failed: false };
    const earlier: { label: string; output: string }[] = [];
    let failedAt: string | undefined;

    for (const child of node.children) {
      if (failedAt !== undefined) {
        for (const leaf of leavesOf(child)) run.ctx.skip(leaf.role, `${failedAt} failed`);
        continue;
      }
      last = await this.runNode(run, child, input);
      if (last.failed) {
        failedAt = labelOf(child);
        continue;
      }
      earlier.push({ label: labelOf(child), output: last.output });
      input = node.chainMode === "accumulate" ? `${message}\n\n${labelled(earlier)}` : last.output;
    }
    return failedAt !== undefined ? { output: last.output, failed: true } : last;
  }

  private async runParallel(run: LeafRunner, node: ParallelNode, input: string): Promise<NodeResult> {
    const results = await Promise.all(node.children.map((child) => this.runNode(run, child, input)));
    const output = labelled(node.children.map((child, i) => ({ label: labelOf(child), output: results[i]?.output ?? "" })));
    return { output, failed: results.every((r) => r.failed) };
  }

  /**
   * Each pass chains the children like an `output`-mode sequence and feeds its
   * last output into the next pass. Stops early on a failure or when a pass
   * returns the same output as the one before it.
   */
  private async runLoop(run: LeafRunner, node: LoopNode, message: string): Promise<NodeResult> {
    const { ctx } = run;
    let last: NodeResult = { output: message, failed: false };

    for (let iteration = 1; iteration <= node.maxIterations; iteration++) {
      ctx.event(node.name, "iteration", String(iteration));
      const previous = last.output;
      let input = previous;
      let failedAt: string | undefined;

      for (const child of node.children) {
        if (failedAt !== undefined) {
          for (const leaf of leavesOf(child)) ctx.skip(leaf.role, `${failedAt} failed`);
          continue;
        }
        last = await this.runNode(run, child, input);
        if (last.failed) failedAt = labelOf(child);
        else input = last.output;
      }

      if (failedAt !== undefined) return last;
      if (iteration > 1 && last.output === previous) {
        ctx.note(`${node.name}: output unchanged after iteration ${iteration}, stopping`);
        break;
      }
    }
    return last;
  }

  private async runCoordinator(run: LeafRunner, node: CoordinatorNode, input: string): Promise<NodeResult> {
    const capabilities: ToolHandle[] = node.workers.map((worker) => ({
      descriptor: {
        name: worker.role,
        description: worker.description ?? `Delegate a task to the ${worker.role} worker`,
        inputSchema: WORKER_SCHEMA,
      },
      kind: "worker",
      invoke: async (args) => {
        const task = typeof args.task === "string" ? args.task : JSON.stringify(args);
        run.ctx.event(node.coordinator.role, "worker_call", worker.role);
        const result = await runLeaf(run, worker, task);
        return result.output;
      },
    }));
    return runLeaf(run, node.coordinator, input, capabilities);
  }

  private async runHub(run: LeafRunner, node: HubNode, input: string): Promise<NodeResult> {
    const { ctx } = run;
    const spoke = (name: string) => node.spokes.find((s) => s.role === name);

    const route = matchRoute(node.routes, input);
    const routed = route ? spoke(route.spoke) : undefined;
    if (routed) {
      ctx.event(node.hub.role, "route", routed.role);
      return runLeaf(run, routed, input);
    }

    const policy = node.unmatched;
    switch (policy.kind) {
      case "reject": {
        ctx.routingRejected = true;
        const output = ctx.fail(node.hub.role, "RoutingNoMatch", "no routing rule matched the request");
        return { output, failed: true };
      }
      case "broadcast": {
        ctx.note(`${node.hub.role}: no routing rule matched, broadcast to all spokes`);
        ctx.event(node.hub.role, "route", "*");
        const results = await Promise.all(node.spokes.map((s) => runLeaf(run, s, input)));
        const output = labelled(node.spokes.map((s, i) => ({ label: s.role, output: results[i]?.output ?? "" })));
        return { output, failed: results.every((r) => r.failed) };
      }
      case "default": {
        const target = spoke(policy.spoke);
        if (!target) {
          ctx.routingRejected = true;
          return { output: ctx.fail(node.hub.role, "RoutingNoMatch", `unknown spoke "${policy.spoke}"`), failed: true };
        }
        ctx.event(node.hub.role, "route", target.role);
        return runLeaf(run, target, input);
      }
      case "hub": {
        let answer: string;
        try {
          answer = await askLeaf(run, node.hub, hubRoutingPrompt(node.spokes, input));
        } catch (err) {
          if (ctx.signal.aborted) throw err;
          return { output: ctx.fail(node.hub.role, "ProviderError", errorMessage(err)), failed: true };
        }
        const choice = answer.trim().toLowerCase();
        const chosen = node.spokes.find((s) => s.role.toLowerCase() === choice);
        if (chosen) {
          ctx.event(node.hub.role, "route", chosen.role);
          return runLeaf(run, chosen, input);
        }
        ctx.note(`${node.hub.role}: hub chose unknown spoke "${answer.trim()}", answering directly`);
        return runLeaf(run, node.hub, input);
      }
      default:
        return assertNever(policy);
    }
  }
}
