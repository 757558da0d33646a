// Config
export { getConfig, configure, resetConfig, defaults, settingsFromEnv } from "./config.js";
export type { RuntimeSettings, DeepPartial } from "./config.js";

// Errors
export {
  RuntimeError,
  ConfigError,
  ParseError,
  ValidationError,
  StoreError,
  ProviderError,
  ToolExecutionError,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Schemas
export { parseOrThrow, RuntimeConfigDocumentSchema, SubmitTaskRequestSchema } from "./schemas.js";
export type { SubmitTaskRequest } from "./schemas.js";

// Runtime config
export type {
  RuntimeConfig,
  RoleConfig,
  ToolConfig,
  ToolParameter,
  ExecutionType,
  RoutingRule,
  UnmatchedPolicy,
  ChainMode,
} from "./runtime-config/types.js";
export { parseRuntimeConfig, validateRuntimeConfig } from "./runtime-config/validate.js";
export { legacyRuntimeConfig } from "./runtime-config/legacy.js";

// Prompts
export { resolvePrompt } from "./prompts/resolver.js";
export type { PromptStores, ResolvedPrompt, PromptSource } from "./prompts/resolver.js";
export { PromptManagementStore, RegistryPromptStore } from "./prompts/store.js";
export type { PromptStore } from "./prompts/store.js";
export { LocalPromptDirectory } from "./prompts/local.js";

// Secrets
export { EnvSecretStore, HttpSecretStore, ChainedSecretStore } from "./secrets/store.js";
export type { SecretStore } from "./secrets/store.js";

// Tools
export { BuiltinToolRegistry, defineTool, createDefaultBuiltinRegistry } from "./tools/builtin.js";
export type { BuiltinTool } from "./tools/builtin.js";
export { ToolServerDirectory } from "./tools/server-directory.js";
export { McpConnector } from "./tools/mcp-connector.js";
export { resolveTools } from "./tools/resolver.js";
export type { ToolHandle, ToolDescriptor, ToolSnapshot, ToolServerConnector, ToolServerSession } from "./tools/types.js";

// Model backend
export { CompletionsBackend } from "./llm/completions-backend.js";
export type { ModelBackend, CompletionRequest, CompletionResponse, ChatMessage, ToolCall } from "./llm/types.js";

// Graph
export { buildGraph } from "./graph/builder.js";
export { assembleGraph } from "./graph/assemble.js";
export { describeGraph } from "./graph/describe.js";
export type { ExecutionGraph, GraphNode, LeafNode } from "./graph/types.js";

// Executor
export { Executor } from "./executor/executor.js";
export type {
  ExecutionOutcome,
  ExecutionStatus,
  ExecuteOptions,
  ExecutionCallbacks,
  PartialFailure,
  FailureKind,
} from "./executor/types.js";

// Stores
export { RegistryConfigStore, FileConfigStore, InMemoryConfigStore, loadConfigFile } from "./stores/config-store.js";
export type { ConfigStore } from "./stores/config-store.js";
export { TaskStore } from "./persistence/store.js";

// Runtime + transport
export { AgentRuntime, createRuntime } from "./runtime.js";
export type { AgentRuntimeOptions, TaskRequest } from "./runtime.js";
export { TaskServer } from "./server/server.js";
export type { TaskServerOptions } from "./server/server.js";
export type { TaskRecord, TaskState, SSEEvent } from "./server/types.js";

// Utils
export { log, setLogLevel } from "./utils/logger.js";
export { withRetry } from "./utils/retry.js";
export { Cache } from "./utils/cache.js";
export type { CacheOptions } from "./utils/cache.js";
export { RateLimiter, RateLimiterRegistry, modelRateLimiters } from "./utils/rate-limiter.js";
export type { RateLimiterOptions } from "./utils/rate-limiter.js";
