import { getConfig } from "../config.js";
import { ConfigError } from "../errors.js";
import type { ResolvedPrompt } from "../prompts/resolver.js";
import type { RoleConfig, RuntimeConfig } from "../runtime-config/types.js";
import { compilePattern, validateRuntimeConfig } from "../runtime-config/validate.js";
import { closeSessions } from "../tools/resolver.js";
import type { ResolvedTools, ToolServerSession, ToolSnapshot } from "../tools/types.js";
import type {
  CompiledRoute,
  CoordinatorNode,
  ExecutionGraph,
  GraphNode,
  HubNode,
  LeafNode,
  LoopNode,
  PromptProvenance,
} from "./types.js";

export const AGGREGATOR_PREAMBLE = "Aggregate and synthesize these results:";

export const DEFAULT_MAX_ITERATIONS = 5;

export type BuildOptions = {
  defaultModel?: string;
  maxTurns?: number;
};

function freezeNode(node: GraphNode): void {
  switch (node.kind) {
    case "leaf":
      Object.freeze(node.tools);
      break;
    case "sequential":
    case "parallel":
    case "loop":
      node.children.forEach(freezeNode);
      Object.freeze(node.children);
      break;
    case "coordinator":
      freezeNode(node.coordinator);
      node.workers.forEach(freezeNode);
      Object.freeze(node.workers);
      break;
    case "hub":
      freezeNode(node.hub);
      node.spokes.forEach(freezeNode);
      Object.freeze(node.spokes);
      node.routes.forEach((r) => Object.freeze(r.keywords));
      Object.freeze(node.routes);
      break;
    default:
      assertNever(node);
  }
  Object.freeze(node);
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled graph node: ${JSON.stringify(value)}`);
}

class GraphAssembler {
  private readonly leaves = new Map<string, LeafNode>();

  constructor(
    private readonly config: RuntimeConfig,
    private readonly prompts: ReadonlyMap<string, ResolvedPrompt>,
    private readonly tools: ReadonlyMap<string, ResolvedTools>,
    private readonly opts: Required<BuildOptions>,
  ) {}

  leaf(role: RoleConfig, inputPreamble?: string): LeafNode {
    const cached = this.leaves.get(role.name);
    if (cached && inputPreamble === undefined) return cached;

    const prompt = this.prompts.get(role.name);
    if (!prompt || !prompt.text.trim()) {
      throw new ConfigError("INSTRUCTION_UNRESOLVED", `No instructions resolved for role "${role.name}"`, {
        role: role.name,
      });
    }
    const node: LeafNode = {
      kind: "leaf",
      role: role.name,
      description: role.description,
      model: role.model ?? this.opts.defaultModel,
      instructions: prompt.text,
      tools: [...(this.tools.get(role.name)?.handles ?? [])],
      maxTurns: role.maxTurns ?? this.opts.maxTurns,
      retries: role.retries,
      inputPreamble,
    };
    if (inputPreamble === undefined) this.leaves.set(role.name, node);
    return node;
  }

  role(name: string): RoleConfig {
    const role = this.config.roles.find((r) => r.name === name);
    if (!role) {
      throw new ConfigError("DANGLING_ROLE_REFERENCE", `"${name}" does not name a role`, { role: name });
    }
    return role;
  }

  first(): RoleConfig {
    const [first] = this.config.roles;
    if (!first) throw new ConfigError("INVALID_CONFIG", "roles must not be empty");
    return first;
  }

  /** Roles named by `subset` (or all but `exclude`), kept in config order. */
  members(subset: string[] | undefined, exclude: string | undefined): RoleConfig[] {
    const wanted = subset ? new Set(subset) : undefined;
    return this.config.roles.filter((r) => r.name !== exclude && (wanted ? wanted.has(r.name) : true));
  }
}

function compileRoutes(config: RuntimeConfig, spokes: readonly LeafNode[]): CompiledRoute[] {
  const spokeNames = new Set(spokes.map((s) => s.role));
  return config.routing.rules.map((rule) => {
    if (!spokeNames.has(rule.spoke)) {
      throw new ConfigError("INVALID_ROUTING_RULE", `Routing rule targets "${rule.spoke}", which is not a spoke`, {
        role: rule.spoke,
      });
    }
    return {
      spoke: rule.spoke,
      keywords: rule.keywords.map((k) => k.toLowerCase()),
      pattern: rule.pattern !== undefined ? compilePattern(rule.pattern, rule.spoke) : undefined,
    };
  });
}

function buildRoot(a: GraphAssembler, config: RuntimeConfig, notes: string[]): GraphNode {
  switch (config.executionType) {
    case "single":
      return a.leaf(a.first());

    case "sequential":
      return {
        kind: "sequential",
        name: "pipeline",
        chainMode: config.chainMode,
        children: config.roles.map((r) => a.leaf(r)),
      };

    case "parallel": {
      const aggregator = config.aggregatorRole;
      if (aggregator && config.parallelRoles?.includes(aggregator)) {
        throw new ConfigError("INVALID_CONFIG", `aggregator_role "${aggregator}" is also listed in parallel_roles`, {
          role: aggregator,
        });
      }
      const branches = a.members(config.parallelRoles, aggregator);
      if (branches.length === 0) {
        throw new ConfigError("INVALID_CONFIG", "parallel execution needs at least one role besides the aggregator");
      }
      const fanOut: GraphNode = { kind: "parallel", name: "fan_out", children: branches.map((r) => a.leaf(r)) };
      if (!aggregator) return fanOut;
      return {
        kind: "sequential",
        name: "parallel_gather",
        chainMode: "output",
        children: [fanOut, a.leaf(a.role(aggregator), AGGREGATOR_PREAMBLE)],
      };
    }

    case "loop": {
      const node: LoopNode = {
        kind: "loop",
        name: "refiner",
        children: config.roles.map((r) => a.leaf(r)),
        maxIterations: config.maxIterations ?? DEFAULT_MAX_ITERATIONS,
      };
      return node;
    }

    case "coordinator": {
      const coordinatorRole = config.coordinatorRole ? a.role(config.coordinatorRole) : a.first();
      const coordinator = a.leaf(coordinatorRole);
      const workers = a.members(config.workerRoles, coordinatorRole.name).map((r) => a.leaf(r));
      const own = new Set(coordinator.tools.map((t) => t.descriptor.name));
      for (const worker of workers) {
        if (own.has(worker.role)) {
          throw new ConfigError(
            "DUPLICATE_CAPABILITY",
            `Worker "${worker.role}" collides with a tool of coordinator "${coordinator.role}"`,
            { role: worker.role },
          );
        }
      }
      if (workers.length === 0) {
        notes.push(`coordinator "${coordinator.role}" has no workers and will answer alone`);
      }
      const node: CoordinatorNode = { kind: "coordinator", coordinator, workers };
      return node;
    }

    case "hub_spoke": {
      const hubRole = config.hubRole ? a.role(config.hubRole) : a.first();
      const spokes = a.members(config.spokeRoles, hubRole.name).map((r) => a.leaf(r));
      if (spokes.length === 0) {
        throw new ConfigError("INVALID_CONFIG", `hub "${hubRole.name}" has no spokes`, { role: hubRole.name });
      }
      const unmatched = config.routing.unmatched;
      if (unmatched.kind === "default" && !spokes.some((s) => s.role === unmatched.spoke)) {
        throw new ConfigError("INVALID_ROUTING_RULE", `Default spoke "${unmatched.spoke}" is not a spoke`, {
          role: unmatched.spoke,
        });
      }
      const node: HubNode = {
        kind: "hub",
        hub: a.leaf(hubRole),
        spokes,
        routes: compileRoutes(config, spokes),
        unmatched,
      };
      return node;
    }

    default:
      return assertNever(config.executionType);
  }
}

/**
 * Turn a validated RuntimeConfig plus per-role prompts and tools into an
 * immutable graph. Every configuration problem surfaces here as a
 * ConfigError; none is deferred to task time.
 */
export function buildGraph(
  config: RuntimeConfig,
  promptsByRole: ReadonlyMap<string, ResolvedPrompt>,
  toolsByRole: ReadonlyMap<string, ResolvedTools> = new Map(),
  opts: BuildOptions = {},
): ExecutionGraph {
  validateRuntimeConfig(config);
  const settings = getConfig();
  const assembler = new GraphAssembler(config, promptsByRole, toolsByRole, {
    defaultModel: opts.defaultModel ?? settings.agent.defaultModel,
    maxTurns: opts.maxTurns ?? settings.limits.maxTurns,
  });

  const notes: string[] = [];
  for (const role of config.roles) {
    for (const note of promptsByRole.get(role.name)?.degradations ?? []) {
      notes.push(`${role.name}: ${note}`);
    }
  }

  const root = buildRoot(assembler, config, notes);
  freezeNode(root);

  const prompts: Record<string, PromptProvenance> = {};
  const toolSnapshots: Record<string, readonly ToolSnapshot[]> = {};
  const sessions: ToolServerSession[] = [];
  for (const role of config.roles) {
    const prompt = promptsByRole.get(role.name);
    if (prompt) prompts[role.name] = Object.freeze({ source: prompt.source, origin: prompt.origin });
    const tools = toolsByRole.get(role.name);
    toolSnapshots[role.name] = Object.freeze((tools?.snapshot ?? []).map((s) => Object.freeze({ ...s })));
    sessions.push(...(tools?.sessions ?? []));
  }

  let closed = false;
  return Object.freeze({
    name: config.name ?? config.roles.map((r) => r.name).join("+"),
    description: config.description,
    executionType: config.executionType,
    root,
    roles: Object.freeze(config.roles.map((r) => r.name)),
    notes: Object.freeze(notes),
    prompts: Object.freeze(prompts),
    toolSnapshots: Object.freeze(toolSnapshots),
    async close() {
      if (closed) return;
      closed = true;
      await closeSessions(sessions);
    },
  });
}
