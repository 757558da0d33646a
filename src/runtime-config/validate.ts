import { ConfigError } from "../errors.js";
import { RuntimeConfigDocumentSchema, formatIssues } from "../schemas.js";
import { EXECUTION_TYPES, type ExecutionType, type RuntimeConfig } from "./types.js";

const EXECUTION_ALIASES: Record<string, ExecutionType> = {
  "hub-spoke": "hub_spoke",
};

export function normalizeExecutionType(raw: string): ExecutionType {
  const key = raw.trim().toLowerCase();
  const aliased = EXECUTION_ALIASES[key];
  if (aliased) return aliased;
  const known = EXECUTION_TYPES.find((t) => t === key);
  if (!known) {
    throw new ConfigError(
      "UNSUPPORTED_EXECUTION_TYPE",
      `Unsupported execution_type "${raw}" (expected one of: ${EXECUTION_TYPES.join(", ")})`,
    );
  }
  return known;
}

/**
 * Turn a wire-form runtime config document into a typed RuntimeConfig.
 * Structural problems surface as ConfigError(INVALID_CONFIG).
 */
export function parseRuntimeConfig(raw: unknown): RuntimeConfig {
  const result = RuntimeConfigDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError("INVALID_CONFIG", `Invalid runtime config: ${formatIssues(result.error)}`, {
      cause: result.error,
    });
  }
  const doc = result.data;
  const config: RuntimeConfig = { ...doc, executionType: normalizeExecutionType(doc.executionType) };
  validateRuntimeConfig(config);
  return config;
}

function requireRole(names: Set<string>, ref: string | undefined, field: string): void {
  if (ref !== undefined && !names.has(ref)) {
    throw new ConfigError("DANGLING_ROLE_REFERENCE", `${field} "${ref}" does not name a role`, { role: ref });
  }
}

/**
 * Cross-field checks: unique role names, every role reference resolves,
 * routing rules point at spokes and their patterns compile.
 */
export function validateRuntimeConfig(config: RuntimeConfig): void {
  if (config.roles.length === 0) {
    throw new ConfigError("INVALID_CONFIG", "roles must not be empty");
  }

  const names = new Set<string>();
  for (const role of config.roles) {
    if (names.has(role.name)) {
      throw new ConfigError("DUPLICATE_ROLE", `Role "${role.name}" is defined more than once`, { role: role.name });
    }
    names.add(role.name);
  }

  requireRole(names, config.aggregatorRole, "aggregator_role");
  requireRole(names, config.coordinatorRole, "coordinator_role");
  requireRole(names, config.hubRole, "hub_role");
  for (const ref of config.parallelRoles ?? []) requireRole(names, ref, "parallel_roles entry");
  for (const ref of config.workerRoles ?? []) requireRole(names, ref, "worker_roles entry");
  for (const ref of config.spokeRoles ?? []) requireRole(names, ref, "spoke_roles entry");

  for (const rule of config.routing.rules) {
    requireRole(names, rule.spoke, "routing rule spoke");
    if (rule.keywords.length === 0 && rule.pattern === undefined) {
      throw new ConfigError("INVALID_ROUTING_RULE", `Routing rule for "${rule.spoke}" has no keywords or pattern`);
    }
    if (rule.pattern !== undefined) compilePattern(rule.pattern, rule.spoke);
  }
  const unmatched = config.routing.unmatched;
  if (unmatched.kind === "default") {
    requireRole(names, unmatched.spoke, "routing.unmatched spoke");
  }
}

export function compilePattern(pattern: string, spoke: string): RegExp {
  try {
    return new RegExp(pattern, "i");
  } catch (err) {
    throw new ConfigError("INVALID_ROUTING_RULE", `Routing pattern for "${spoke}" does not compile: ${pattern}`, {
      cause: err,
    });
  }
}
