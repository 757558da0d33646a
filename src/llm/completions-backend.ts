import { getConfig } from "../config.js";
import { ProviderError, errorMessage, isAbortError } from "../errors.js";
import { ChatCompletionResponseSchema, formatIssues } from "../schemas.js";
import { bearer, joinUrl } from "../utils/http.js";
import { log } from "../utils/logger.js";
import { type RateLimiterRegistry, modelRateLimiters } from "../utils/rate-limiter.js";
import type { ChatMessage, CompletionRequest, CompletionResponse, ModelBackend } from "./types.js";

const logger = log.child("llm");

export type CompletionsBackendOptions = {
  baseUrl?: string;
  apiKey?: string;
  maxTokens?: number;
  timeoutMs?: number;
  limiters?: RateLimiterRegistry;
};

type WireMessage =
  | { role: "system" | "user"; content: string }
  | {
      role: "assistant";
      content: string | null;
      tool_calls?: { id: string; type: "function"; function: { name: string; arguments: string } }[];
    }
  | { role: "tool"; tool_call_id: string; content: string };

export function toWireMessages(instructions: string, history: ChatMessage[]): WireMessage[] {
  const messages: WireMessage[] = [{ role: "system", content: instructions }];
  for (const m of history) {
    switch (m.role) {
      case "user":
        messages.push({ role: "user", content: m.content });
        break;
      case "assistant":
        messages.push(
          m.toolCalls && m.toolCalls.length > 0
            ? {
                role: "assistant",
                content: m.content || null,
                tool_calls: m.toolCalls.map((c) => ({
                  id: c.id,
                  type: "function" as const,
                  function: { name: c.name, arguments: c.arguments },
                })),
              }
            : { role: "assistant", content: m.content },
        );
        break;
      case "tool":
        messages.push({ role: "tool", tool_call_id: m.toolCallId, content: m.content });
        break;
    }
  }
  return messages;
}

function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * OpenAI-compatible `/chat/completions` client, normally pointed at a
 * LiteLLM proxy. Each call first takes a slot from the model's rate limiter.
 */
export class CompletionsBackend implements ModelBackend {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly maxTokens: number;
  private readonly timeoutMs: number;
  private readonly limiters: RateLimiterRegistry;

  constructor(opts: CompletionsBackendOptions = {}) {
    const settings = getConfig();
    this.baseUrl = opts.baseUrl ?? settings.model.baseUrl;
    this.apiKey = opts.apiKey ?? settings.model.apiKey;
    this.maxTokens = opts.maxTokens ?? settings.model.maxTokens;
    this.timeoutMs = opts.timeoutMs ?? settings.timeouts.model;
    this.limiters = opts.limiters ?? modelRateLimiters;
  }

  async complete(req: CompletionRequest): Promise<CompletionResponse> {
    if (getConfig().rateLimit.enabled) {
      await this.limiters.acquire(req.model, req.signal);
    }

    const body = {
      model: req.model,
      messages: toWireMessages(req.instructions, req.history),
      max_tokens: this.maxTokens,
      ...(req.tools.length > 0
        ? {
            tools: req.tools.map((t) => ({
              type: "function",
              function: { name: t.name, description: t.description, parameters: t.inputSchema },
            })),
          }
        : {}),
    };

    const start = Date.now();
    let res: Response;
    try {
      res = await fetch(joinUrl(this.baseUrl, "chat/completions"), {
        method: "POST",
        headers: { "Content-Type": "application/json", ...bearer(this.apiKey) },
        body: JSON.stringify(body),
        signal: AbortSignal.any([req.signal, AbortSignal.timeout(this.timeoutMs)]),
      });
    } catch (err) {
      if (req.signal.aborted) throw req.signal.reason;
      const reason = isAbortError(err) ? `timed out after ${this.timeoutMs}ms` : errorMessage(err);
      throw new ProviderError(`Model "${req.model}" unreachable: ${reason}`, { cause: err });
    }

    const text = await res.text();
    if (!res.ok) {
      throw new ProviderError(`Model "${req.model}" answered HTTP ${res.status}: ${text.slice(0, 300)}`, {
        status: res.status,
        retryable: isRetryableStatus(res.status),
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new ProviderError(`Model "${req.model}" returned invalid JSON`, { retryable: false, cause: err });
    }
    const parsed = ChatCompletionResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new ProviderError(`Model "${req.model}" returned an unexpected body: ${formatIssues(parsed.error)}`, {
        retryable: false,
      });
    }

    const [choice] = parsed.data.choices;
    const message = choice?.message;
    const toolCalls = (message?.tool_calls ?? []).map((c) => ({
      id: c.id,
      name: c.function.name,
      arguments: c.function.arguments,
    }));
    logger.debug("Completion", {
      model: req.model,
      durationMs: Date.now() - start,
      toolCalls: toolCalls.length,
    });
    return { content: message?.content ?? "", toolCalls };
  }
}
