import { getConfig } from "../config.js";
import { ProviderError, errorMessage } from "../errors.js";
import type { LeafNode } from "../graph/types.js";
import type { ChatMessage, CompletionResponse, ModelBackend, ToolCall } from "../llm/types.js";
import type { ToolHandle } from "../tools/types.js";
import { log } from "../utils/logger.js";
import { withRetry } from "../utils/retry.js";
import type { TaskContext } from "./context.js";
import type { NodeResult } from "./types.js";

const logger = log.child("leaf");

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}… (truncated)` : text;
}

function parseArguments(raw: string): Record<string, unknown> {
  const trimmed = raw.trim();
  if (!trimmed) return {};
  const parsed: unknown = JSON.parse(trimmed);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error("tool arguments must be a JSON object");
  }
  return Object.fromEntries(Object.entries(parsed));
}

export type LeafRunner = {
  backend: ModelBackend;
  ctx: TaskContext;
};

/** One model call with the node's retry policy. */
export function callModel(
  run: LeafRunner,
  node: LeafNode,
  history: ChatMessage[],
  tools: readonly ToolHandle[],
): Promise<CompletionResponse> {
  return withRetry(
    () =>
      run.backend.complete({
        model: node.model,
        instructions: node.instructions,
        history: [...history],
        tools: tools.map((t) => t.descriptor),
        signal: run.ctx.signal,
      }),
    {
      maxAttempts: node.retries !== undefined ? node.retries + 1 : undefined,
      signal: run.ctx.signal,
      shouldRetry: (err) => !(err instanceof ProviderError) || err.retryable,
      onRetry: (err, attempt, delayMs) =>
        logger.warn("Model call failed, retrying", { role: node.role, attempt, delayMs, error: errorMessage(err) }),
    },
  );
}

async function runToolCall(
  run: LeafRunner,
  node: LeafNode,
  tools: ReadonlyMap<string, ToolHandle>,
  call: ToolCall,
): Promise<string> {
  const { ctx } = run;
  ctx.event(node.role, "tool_call", call.name);
  const handle = tools.get(call.name);
  try {
    if (!handle) throw new Error(`unknown tool "${call.name}"`);
    const args = parseArguments(call.arguments);
    const text = await handle.invoke(args, ctx.signal);
    return truncate(text, getConfig().limits.outputTruncation);
  } catch (err) {
    if (ctx.signal.aborted) throw err;
    const cause = `${call.name}: ${errorMessage(err)}`;
    ctx.fail(node.role, "ToolExecutionError", cause);
    logger.warn("Tool call failed", { role: node.role, tool: call.name, error: errorMessage(err) });
    return `Error: ${errorMessage(err)}`;
  }
}

/**
 * Run one role: the tool loop up to `maxTurns` model turns, then a final
 * call without tools if the model is still asking for them. Tool calls of
 * one turn run concurrently; their results go back in issue order. A
 * provider failure is recorded and turned into a marker output; only an
 * abort escapes.
 */
export async function runLeaf(
  run: LeafRunner,
  node: LeafNode,
  input: string,
  extraTools: readonly ToolHandle[] = [],
): Promise<NodeResult> {
  const { ctx } = run;
  const startedAt = ctx.start(node.role);
  const tools = [...node.tools, ...extraTools];
  const byName = new Map(tools.map((t) => [t.descriptor.name, t]));
  const content = node.inputPreamble ? `${node.inputPreamble}\n\n${input}` : input;
  const history: ChatMessage[] = [{ role: "user", content }];
  let toolCalls = 0;

  try {
    let answer: string | undefined;
    for (let turn = 0; turn < node.maxTurns; turn++) {
      const res = await callModel(run, node, history, tools);
      if (res.toolCalls.length === 0 || tools.length === 0) {
        answer = res.content;
        break;
      }
      history.push({ role: "assistant", content: res.content, toolCalls: res.toolCalls });
      toolCalls += res.toolCalls.length;
      const results = await Promise.all(res.toolCalls.map((call) => runToolCall(run, node, byName, call)));
      res.toolCalls.forEach((call, i) => {
        history.push({ role: "tool", toolCallId: call.id, content: results[i] ?? "" });
      });
    }
    if (answer === undefined) {
      ctx.note(`${node.role}: reached ${node.maxTurns} turns, answered without tools`);
      answer = (await callModel(run, node, history, [])).content;
    }

    ctx.finish({ role: node.role, status: "completed", output: answer, startedAt, finishedAt: Date.now(), toolCalls });
    return { output: answer, failed: false };
  } catch (err) {
    if (ctx.signal.aborted) throw err;
    const marker = ctx.fail(node.role, "ProviderError", errorMessage(err));
    logger.warn("Role failed", { role: node.role, error: errorMessage(err) });
    ctx.finish({ role: node.role, status: "failed", output: marker, startedAt, finishedAt: Date.now(), toolCalls });
    return { output: marker, failed: true };
  }
}

/** A single tool-less exchange, used for routing decisions. */
export async function askLeaf(run: LeafRunner, node: LeafNode, prompt: string): Promise<string> {
  const res = await callModel(run, node, [{ role: "user", content: prompt }], []);
  return res.content;
}
