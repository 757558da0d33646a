import { type PromptStores, type ResolvedPrompt, resolvePrompt } from "../prompts/resolver.js";
import type { RuntimeConfig } from "../runtime-config/types.js";
import { validateRuntimeConfig } from "../runtime-config/validate.js";
import { type ToolResolverDeps, closeSessions, resolveTools } from "../tools/resolver.js";
import type { ResolvedTools } from "../tools/types.js";
import { log } from "../utils/logger.js";
import { type BuildOptions, buildGraph } from "./builder.js";
import type { ExecutionGraph } from "./types.js";

const logger = log.child("graph");

export type AssembleDeps = {
  prompts: PromptStores;
  tools: Omit<ToolResolverDeps, "signal">;
  build?: BuildOptions;
  signal?: AbortSignal;
};

/**
 * Resolve every role's instructions and tools, then build the graph. Tool
 * sessions opened along the way are closed again if anything fails.
 */
export async function assembleGraph(config: RuntimeConfig, deps: AssembleDeps): Promise<ExecutionGraph> {
  validateRuntimeConfig(config);

  const prompts = new Map<string, ResolvedPrompt>();
  await Promise.all(
    config.roles.map(async (role) => {
      prompts.set(role.name, await resolvePrompt(role, deps.prompts, deps.signal));
    }),
  );

  const tools = new Map<string, ResolvedTools>();
  try {
    for (const role of config.roles) {
      tools.set(role.name, await resolveTools(role, { ...deps.tools, signal: deps.signal }));
    }
    const graph = buildGraph(config, prompts, tools, deps.build);
    logger.info("Graph built", {
      name: graph.name,
      executionType: graph.executionType,
      roles: graph.roles.length,
      notes: graph.notes.length,
    });
    return graph;
  } catch (err) {
    await closeSessions([...tools.values()].flatMap((t) => t.sessions));
    throw err;
  }
}
