import { getConfig } from "../config.js";
import type { RuntimeConfig } from "./types.js";

/**
 * Single-role config for deployments that set no agent id. The role comes
 * from AGENT_ROLE (default "general"). PROMPT_REF is tried against the prompt
 * stores first; SYSTEM_PROMPT is used inline only when no PROMPT_REF is set,
 * so a missing reference still falls back to the local prompt file.
 */
export function legacyRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const name = env.AGENT_ROLE?.trim() || "general";
  const promptRef = env.PROMPT_REF?.trim() || undefined;
  const systemPrompt = env.SYSTEM_PROMPT?.trim() || undefined;

  return {
    name,
    description: `Legacy ${name} agent`,
    executionType: "single",
    roles: [
      {
        name,
        model: env.DEFAULT_MODEL?.trim() || getConfig().agent.defaultModel,
        tools: [],
        promptInline: promptRef ? undefined : systemPrompt,
        externalPromptId: promptRef,
        promptRef,
        metadata: {},
      },
    ],
    chainMode: "output",
    routing: { rules: [], unmatched: { kind: "reject" } },
  };
}
