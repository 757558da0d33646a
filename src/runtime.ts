import { type RuntimeSettings, getConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { Executor } from "./executor/executor.js";
import type { ExecuteOptions, ExecutionOutcome } from "./executor/types.js";
import { assembleGraph } from "./graph/assemble.js";
import type { ExecutionGraph } from "./graph/types.js";
import { CompletionsBackend } from "./llm/completions-backend.js";
import type { ModelBackend } from "./llm/types.js";
import { LocalPromptDirectory } from "./prompts/local.js";
import type { PromptStores } from "./prompts/resolver.js";
import { type PromptStore, PromptManagementStore, RegistryPromptStore } from "./prompts/store.js";
import { legacyRuntimeConfig } from "./runtime-config/legacy.js";
import type { RuntimeConfig } from "./runtime-config/types.js";
import { ChainedSecretStore, EnvSecretStore, HttpSecretStore, type SecretStore } from "./secrets/store.js";
import { type ConfigStore, RegistryConfigStore } from "./stores/config-store.js";
import { type BuiltinToolRegistry, createDefaultBuiltinRegistry } from "./tools/builtin.js";
import { McpConnector } from "./tools/mcp-connector.js";
import { ToolServerDirectory } from "./tools/server-directory.js";
import type { ToolServerConnector } from "./tools/types.js";
import { Cache } from "./utils/cache.js";
import { log } from "./utils/logger.js";

const logger = log.child("runtime");

/** Cache key of the env-derived single-role config. */
const LEGACY_KEY = "";

export type AgentRuntimeOptions = {
  configStore: ConfigStore;
  backend: ModelBackend;
  prompts: PromptStores;
  builtins: BuiltinToolRegistry;
  directory: ToolServerDirectory;
  connector: ToolServerConnector;
  secrets: SecretStore;
  /** Served when a task names no agent. Empty means legacy mode. */
  defaultAgentId?: string;
  /** Source of the legacy single-role config. */
  env?: NodeJS.ProcessEnv;
};

export type TaskRequest = ExecuteOptions & {
  message: string;
  agentId?: string;
};

/**
 * Task adapter: fetches and caches RuntimeConfigs, builds one graph per
 * agent id and runs tasks against it. A graph lives until `close()`; the
 * tool-server sessions it holds are closed with it.
 */
export class AgentRuntime {
  private readonly configs: Cache<RuntimeConfig>;
  private readonly graphs = new Map<string, Promise<ExecutionGraph>>();
  private readonly executor: Executor;
  private closed = false;

  constructor(private readonly opts: AgentRuntimeOptions) {
    const settings = getConfig();
    this.configs = new Cache({ name: "configs", ttlMs: settings.cache.configTtlMs, maxEntries: settings.cache.maxEntries });
    this.executor = new Executor(opts.backend);
  }

  get defaultAgentId(): string {
    return this.opts.defaultAgentId ?? "";
  }

  /** Agent id a request resolves to; empty for legacy mode. */
  agentIdFor(agentId?: string): string {
    return agentId?.trim() || this.defaultAgentId;
  }

  loadConfig(agentId?: string, signal?: AbortSignal): Promise<RuntimeConfig> {
    const id = this.agentIdFor(agentId);
    if (id === LEGACY_KEY) {
      return this.configs.getOrLoad(LEGACY_KEY, async () => legacyRuntimeConfig(this.opts.env));
    }
    return this.configs.getOrLoad(id, () => this.opts.configStore.get(id, signal));
  }

  /** The built graph for an agent, built on first use. A failed build is not cached. */
  graphFor(agentId?: string): Promise<ExecutionGraph> {
    if (this.closed) return Promise.reject(new Error("runtime is closed"));
    const id = this.agentIdFor(agentId);
    const existing = this.graphs.get(id);
    if (existing) return existing;

    const pending = this.buildGraph(id);
    this.graphs.set(id, pending);
    pending.catch(() => {
      if (this.graphs.get(id) === pending) this.graphs.delete(id);
    });
    return pending;
  }

  private async buildGraph(id: string): Promise<ExecutionGraph> {
    const config = await this.loadConfig(id);
    const settings = getConfig();
    return assembleGraph(config, {
      prompts: this.opts.prompts,
      tools: {
        builtins: this.opts.builtins,
        directory: this.opts.directory,
        connector: this.opts.connector,
        secrets: this.opts.secrets,
      },
      build: { defaultModel: settings.agent.defaultModel, maxTurns: settings.limits.maxTurns },
    });
  }

  /** Build (or reuse) the graph and execute one task against it. Configuration errors propagate. */
  async handleTask(request: TaskRequest): Promise<ExecutionOutcome> {
    const { message, agentId, ...execute } = request;
    const graph = await this.graphFor(agentId);
    return this.executor.execute(graph, message, execute);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const pending = [...this.graphs.values()];
    this.graphs.clear();
    this.configs.clear();
    const results = await Promise.allSettled(pending.map(async (g) => (await g).close()));
    for (const r of results) {
      if (r.status === "rejected") logger.debug("Graph was never built", { error: errorMessage(r.reason) });
    }
  }
}

export function promptStoresFrom(settings: Readonly<RuntimeSettings>): PromptStores {
  const management = settings.prompts.managementUrl
    ? new PromptManagementStore({ baseUrl: settings.prompts.managementUrl, apiKey: settings.prompts.managementApiKey })
    : undefined;
  const byName: PromptStore[] = management ? [management] : [];
  if (settings.registry.url) {
    byName.push(new RegistryPromptStore({ baseUrl: settings.registry.url, apiKey: settings.registry.apiKey }));
  }
  return {
    byId: management,
    byName,
    local: settings.prompts.dir ? new LocalPromptDirectory(settings.prompts.dir) : undefined,
  };
}

export function secretStoreFrom(settings: Readonly<RuntimeSettings>, env: NodeJS.ProcessEnv): SecretStore {
  const stores: SecretStore[] = [];
  if (settings.secrets.url) {
    stores.push(new HttpSecretStore({ baseUrl: settings.secrets.url, token: settings.secrets.token }));
  }
  stores.push(new EnvSecretStore(env));
  return new ChainedSecretStore(stores);
}

/**
 * Tool servers from MCP_SERVERS, overlaid with those the registry knows. An
 * unreachable registry leaves the env list in place.
 */
export async function toolServerDirectoryFrom(settings: Readonly<RuntimeSettings>): Promise<ToolServerDirectory> {
  const local = ToolServerDirectory.fromJson(settings.toolServers.json);
  if (!settings.registry.url) return local;
  try {
    return local.merge(await ToolServerDirectory.fromRegistry(settings.registry.url, settings.registry.apiKey));
  } catch (err) {
    logger.warn("Tool server list unavailable from registry", { error: errorMessage(err) });
    return local;
  }
}

/** Wire a runtime from settings. Any collaborator can be replaced through `overrides`. */
export async function createRuntime(
  overrides: Partial<AgentRuntimeOptions> = {},
  env: NodeJS.ProcessEnv = process.env,
): Promise<AgentRuntime> {
  const settings = getConfig();
  return new AgentRuntime({
    configStore: overrides.configStore ?? new RegistryConfigStore(),
    backend: overrides.backend ?? new CompletionsBackend(),
    prompts: overrides.prompts ?? promptStoresFrom(settings),
    builtins: overrides.builtins ?? createDefaultBuiltinRegistry(),
    directory: overrides.directory ?? (await toolServerDirectoryFrom(settings)),
    connector: overrides.connector ?? new McpConnector(),
    secrets: overrides.secrets ?? secretStoreFrom(settings, env),
    defaultAgentId: overrides.defaultAgentId ?? settings.agent.id,
    env: overrides.env ?? env,
  });
}
