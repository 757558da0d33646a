import type { ToolDescriptor } from "../tools/types.js";

export type ToolCall = {
  id: string;
  name: string;
  /** JSON-encoded arguments as issued by the model. */
  arguments: string;
};

export type ChatMessage =
  | { role: "user"; content: string }
  | { role: "assistant"; content: string; toolCalls?: ToolCall[] }
  | { role: "tool"; toolCallId: string; content: string };

export type CompletionRequest = {
  model: string;
  instructions: string;
  history: ChatMessage[];
  /** Empty means the model must answer in text. */
  tools: ToolDescriptor[];
  signal: AbortSignal;
};

export type CompletionResponse = {
  content: string;
  toolCalls: ToolCall[];
};

/** Invokes a language model. Failures reject with ProviderError. */
export interface ModelBackend {
  complete(req: CompletionRequest): Promise<CompletionResponse>;
}
