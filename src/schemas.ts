import { z } from "zod";
import { ParseError } from "./errors.js";
import type {
  ChainMode,
  RoleConfig,
  RoutingRule,
  ToolConfig,
  ToolParameter,
  ToolProvider,
  UnmatchedPolicy,
} from "./runtime-config/types.js";

// ─── Runtime config document (wire form, snake_case) ─────────────

const optionalString = z
  .string()
  .nullish()
  .transform((v) => (v ? v : undefined));

const optionalNames = z
  .array(z.string().min(1))
  .nullish()
  .transform((v) => v ?? undefined);

const ToolParameterSchema = z.union([
  z.string().transform((value): ToolParameter => ({ type: "text", value })),
  z.object({
    type: z.enum(["text", "secret"]).default("text"),
    value: z.string(),
  }),
]);

const ToolObjectSchema = z
  .object({
    id: z.string().min(1),
    provider: z
      .enum(["builtin", "external", "mcp"])
      .default("builtin")
      .transform((p): ToolProvider => (p === "mcp" ? "external" : p)),
    active: z.boolean().default(true),
    server_reference: optionalString,
    parameters: z.record(ToolParameterSchema).default({}),
  })
  .refine((t) => t.provider === "builtin" || t.server_reference !== undefined, {
    message: "server_reference is required for external tools",
    path: ["server_reference"],
  })
  .refine((t) => t.provider === "external" || Object.keys(t.parameters).length === 0, {
    message: "parameters are only allowed on external tools",
    path: ["parameters"],
  })
  .transform(
    (t): ToolConfig => ({
      id: t.id,
      provider: t.provider,
      active: t.active,
      serverReference: t.server_reference,
      parameters: t.parameters,
    }),
  );

/** A bare string is shorthand for an active builtin tool. */
export const ToolConfigSchema = z.union([
  z
    .string()
    .min(1)
    .transform((id): ToolConfig => ({ id, provider: "builtin", active: true, parameters: {} })),
  ToolObjectSchema,
]);

export const RoleConfigSchema = z
  .object({
    name: z.string().min(1),
    description: optionalString,
    model: optionalString,
    tools: z.array(ToolConfigSchema).nullish().transform((v) => v ?? []),
    prompt_inline: optionalString,
    external_prompt_id: optionalString,
    prompt_ref: optionalString,
    metadata: z.record(z.union([z.string(), z.number(), z.boolean()]).transform(String)).nullish(),
    max_turns: z.number().int().positive().nullish(),
    retries: z.number().int().min(0).nullish(),
  })
  .transform(
    (r): RoleConfig => ({
      name: r.name,
      description: r.description,
      model: r.model,
      tools: r.tools,
      promptInline: r.prompt_inline,
      externalPromptId: r.external_prompt_id,
      promptRef: r.prompt_ref,
      metadata: r.metadata ?? {},
      maxTurns: r.max_turns ?? undefined,
      retries: r.retries ?? undefined,
    }),
  );

const RoutingRuleSchema = z
  .object({
    spoke: z.string().min(1),
    keywords: z.array(z.string().min(1)).default([]),
    pattern: optionalString,
  })
  .refine((r) => r.keywords.length > 0 || r.pattern !== undefined, {
    message: "a routing rule needs keywords or a pattern",
  })
  .transform((r): RoutingRule => ({ spoke: r.spoke, keywords: r.keywords, pattern: r.pattern }));

const UnmatchedPolicySchema = z.union([
  z.enum(["reject", "broadcast", "hub"]).transform((kind): UnmatchedPolicy => ({ kind })),
  z.object({ spoke: z.string().min(1) }).transform((d): UnmatchedPolicy => ({ kind: "default", spoke: d.spoke })),
]);

export const RuntimeConfigDocumentSchema = z
  .object({
    name: optionalString,
    description: optionalString,
    execution_type: z.string().min(1).default("single"),
    roles: z.array(RoleConfigSchema).min(1, "roles must not be empty"),
    aggregator_role: optionalString,
    coordinator_role: optionalString,
    hub_role: optionalString,
    parallel_roles: optionalNames,
    worker_roles: optionalNames,
    spoke_roles: optionalNames,
    chain_mode: z.enum(["output", "accumulate"]).nullish(),
    max_iterations: z.number().int().positive().max(100).nullish(),
    routing: z
      .object({
        rules: z.array(RoutingRuleSchema).default([]),
        unmatched: UnmatchedPolicySchema.nullish(),
      })
      .nullish(),
  })
  .transform((d) => ({
    name: d.name,
    description: d.description,
    /** Not yet checked against the supported kinds. */
    executionType: d.execution_type,
    roles: d.roles,
    aggregatorRole: d.aggregator_role,
    coordinatorRole: d.coordinator_role,
    hubRole: d.hub_role,
    parallelRoles: d.parallel_roles,
    workerRoles: d.worker_roles,
    spokeRoles: d.spoke_roles,
    chainMode: d.chain_mode ?? ("output" satisfies ChainMode),
    maxIterations: d.max_iterations ?? undefined,
    routing: {
      rules: d.routing?.rules ?? [],
      unmatched: d.routing?.unmatched ?? ({ kind: "reject" } satisfies UnmatchedPolicy),
    },
  }));

export type RuntimeConfigDocument = z.output<typeof RuntimeConfigDocumentSchema>;

/** Registry `GET /agents/{id}` body. */
export const AgentRecordSchema = z.object({
  name: optionalString,
  description: optionalString,
  runtime_config: z.unknown().optional(),
});

// ─── Tool server directory entries ───────────────────────────────

export const ToolServerEntrySchema = z
  .object({
    server_name: optionalString,
    name: optionalString,
    transport: optionalString,
    endpoint: optionalString,
    url: optionalString,
    auth_token: optionalString,
    token: optionalString,
  })
  .transform((e) => ({
    name: e.server_name ?? e.name,
    transport: e.transport ?? "streamable-http",
    endpoint: e.endpoint ?? e.url,
    authToken: e.auth_token ?? e.token,
  }));

/** `[...]`, `{ servers: [...] }` or `{ MCP_SERVERS: [...] }`. */
export const ToolServerListSchema = z.union([
  z.array(z.unknown()),
  z.object({ servers: z.array(z.unknown()) }).transform((o) => o.servers),
  z.object({ MCP_SERVERS: z.array(z.unknown()) }).transform((o) => o.MCP_SERVERS),
]);

// ─── Inbound task requests ───────────────────────────────────────

/** Longest delay a Node timer honours; larger values fire at once. */
export const MAX_TIMER_MS = 2_147_483_647;

export const SubmitTaskRequestSchema = z.object({
  message: z.string().min(1, "message is required"),
  agentId: z.string().min(1).optional(),
  /** Respond with the full outcome instead of 201 + task id. */
  wait: z.boolean().optional(),
  deadlineMs: z.number().int().positive().max(MAX_TIMER_MS).optional(),
});

export type SubmitTaskRequest = z.infer<typeof SubmitTaskRequestSchema>;

// ─── Model backend (OpenAI-compatible chat completions) ──────────

const ToolCallSchema = z.object({
  id: z.string(),
  type: z.literal("function").optional(),
  function: z.object({
    name: z.string(),
    arguments: z.string().default("{}"),
  }),
});

export const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z.array(ToolCallSchema).nullish(),
        }),
        finish_reason: z.string().nullish(),
      }),
    )
    .min(1, "response has no choices"),
});

// ─── Prompt stores ───────────────────────────────────────────────

/** LiteLLM prompt management `GET /prompts/{id}/info`. */
export const PromptInfoSchema = z.object({
  prompt_spec: z
    .object({
      litellm_params: z
        .object({
          dotprompt_content: z.string().nullish(),
        })
        .nullish(),
    })
    .nullish(),
});

/** Registry `GET /prompts/{name}`. */
export const RegistryPromptSchema = z.object({
  template: z.string().nullish(),
  prompt: z.string().nullish(),
  text: z.string().nullish(),
});

export const SecretValueSchema = z.union([
  z.object({ value: z.string() }).transform((o) => o.value),
  z.object({ secret: z.string() }).transform((o) => o.secret),
]);

// ─── Helpers ─────────────────────────────────────────────────────

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}

/** Parse `data` or throw a ParseError naming every issue. */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, data: unknown, what: string): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ParseError(`Invalid ${what}: ${formatIssues(result.error)}`, { cause: result.error });
  }
  return result.data;
}
