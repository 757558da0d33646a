import type { PromptSource } from "../prompts/resolver.js";
import type { ChainMode, ExecutionType, UnmatchedPolicy } from "../runtime-config/types.js";
import type { ToolHandle, ToolSnapshot } from "../tools/types.js";

/** One role bound to its instructions, model and tools. */
export type LeafNode = {
  readonly kind: "leaf";
  readonly role: string;
  readonly description?: string;
  readonly model: string;
  readonly instructions: string;
  readonly tools: readonly ToolHandle[];
  readonly maxTurns: number;
  /** Provider-error retries; unset means the configured default. */
  readonly retries?: number;
  /** Placed before the node input, separated by a blank line. */
  readonly inputPreamble?: string;
};

export type SequentialNode = {
  readonly kind: "sequential";
  readonly name: string;
  readonly children: readonly GraphNode[];
  readonly chainMode: ChainMode;
};

export type ParallelNode = {
  readonly kind: "parallel";
  readonly name: string;
  readonly children: readonly GraphNode[];
};

/** Runs its children in order, then again on the last output, up to `maxIterations` passes. */
export type LoopNode = {
  readonly kind: "loop";
  readonly name: string;
  readonly children: readonly GraphNode[];
  readonly maxIterations: number;
};

export type CoordinatorNode = {
  readonly kind: "coordinator";
  readonly coordinator: LeafNode;
  /** Exposed to the coordinator as callable capabilities named by role. */
  readonly workers: readonly LeafNode[];
};

export type CompiledRoute = {
  readonly spoke: string;
  readonly keywords: readonly string[];
  readonly pattern?: RegExp;
};

export type HubNode = {
  readonly kind: "hub";
  readonly hub: LeafNode;
  readonly spokes: readonly LeafNode[];
  readonly routes: readonly CompiledRoute[];
  readonly unmatched: UnmatchedPolicy;
};

export type GraphNode = LeafNode | SequentialNode | ParallelNode | LoopNode | CoordinatorNode | HubNode;

export type PromptProvenance = {
  readonly source: PromptSource;
  readonly origin: string;
};

export type ExecutionGraph = {
  readonly name: string;
  readonly description?: string;
  readonly executionType: ExecutionType;
  readonly root: GraphNode;
  /** Role names in configuration order. */
  readonly roles: readonly string[];
  /** Build-time notes such as prompt source degradations. */
  readonly notes: readonly string[];
  readonly prompts: Readonly<Record<string, PromptProvenance>>;
  readonly toolSnapshots: Readonly<Record<string, readonly ToolSnapshot[]>>;
  /** Releases tool-server sessions opened for this graph. */
  close(): Promise<void>;
};
