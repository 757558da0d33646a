import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { getConfig } from "../config.js";
import { ConfigError, ParseError, StoreError, errorMessage } from "../errors.js";
import type { RuntimeConfig } from "../runtime-config/types.js";
import { parseRuntimeConfig } from "../runtime-config/validate.js";
import { AgentRecordSchema, parseOrThrow } from "../schemas.js";
import { bearer, fetchJson, joinUrl } from "../utils/http.js";
import { log } from "../utils/logger.js";
import { withRetry } from "../utils/retry.js";

const logger = log.child("config-store");

/**
 * Source of RuntimeConfigs by agent id. Fails with ConfigError
 * CONFIG_NOT_FOUND or CONFIG_UNREACHABLE; a malformed document is
 * INVALID_CONFIG.
 */
export interface ConfigStore {
  get(agentId: string, signal?: AbortSignal): Promise<RuntimeConfig>;
}

/**
 * Accept either a bare runtime config or an agent record carrying one under
 * `runtime_config`. The record's name and description fill in missing ones.
 */
export function configFromDocument(agentId: string, doc: unknown): RuntimeConfig {
  const isRecord = typeof doc === "object" && doc !== null && "runtime_config" in doc;
  if (!isRecord) return parseRuntimeConfig(doc);

  const record = parseOrThrow(AgentRecordSchema, doc, `agent record for "${agentId}"`);
  if (record.runtime_config === undefined || record.runtime_config === null) {
    throw new ConfigError("CONFIG_NOT_FOUND", `Agent "${agentId}" has no runtime_config`);
  }
  const config = parseRuntimeConfig(record.runtime_config);
  return {
    ...config,
    name: config.name ?? record.name,
    description: config.description ?? record.description,
  };
}

export type RegistryConfigStoreOptions = {
  baseUrl?: string;
  apiKey?: string;
  maxAttempts?: number;
};

/** Registry API `GET /agents/{id}` with bearer auth. */
export class RegistryConfigStore implements ConfigStore {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly maxAttempts: number;

  constructor(opts: RegistryConfigStoreOptions = {}) {
    const settings = getConfig();
    this.baseUrl = opts.baseUrl ?? settings.registry.url;
    this.apiKey = opts.apiKey ?? settings.registry.apiKey;
    this.maxAttempts = opts.maxAttempts ?? 3;
  }

  async get(agentId: string, signal?: AbortSignal): Promise<RuntimeConfig> {
    const url = joinUrl(this.baseUrl, `agents/${encodeURIComponent(agentId)}`);
    let body: unknown;
    try {
      body = await withRetry(
        () => fetchJson(url, { store: "registry", headers: bearer(this.apiKey), timeoutMs: getConfig().timeouts.store, signal }),
        {
          maxAttempts: this.maxAttempts,
          signal,
          shouldRetry: (err) => err instanceof StoreError && (err.code === "UNREACHABLE" || err.code === "BAD_RESPONSE"),
          onRetry: (err, attempt) =>
            logger.warn(`Registry attempt ${attempt}/${this.maxAttempts} failed`, { agentId, error: errorMessage(err) }),
        },
      );
    } catch (err) {
      if (err instanceof StoreError && err.code === "NOT_FOUND") {
        throw new ConfigError("CONFIG_NOT_FOUND", `Agent "${agentId}" not found in registry`, { cause: err });
      }
      throw new ConfigError("CONFIG_UNREACHABLE", `Registry unavailable for agent "${agentId}": ${errorMessage(err)}`, {
        cause: err,
      });
    }
    return configFromDocument(agentId, body);
  }
}

/** Reads and parses one JSON config file. */
export async function loadConfigFile(path: string, agentId = path): Promise<RuntimeConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    throw new ConfigError("CONFIG_NOT_FOUND", `Cannot read config file ${path}: ${errorMessage(err)}`, { cause: err });
  }
  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch (err) {
    throw new ParseError(`Config file ${path} is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }
  return configFromDocument(agentId, doc);
}

/** `{dir}/{agentId}.json`. */
export class FileConfigStore implements ConfigStore {
  constructor(private readonly dir: string) {}

  async get(agentId: string): Promise<RuntimeConfig> {
    if (!/^[A-Za-z0-9._-]+$/.test(agentId) || agentId.startsWith(".")) {
      throw new ConfigError("CONFIG_NOT_FOUND", `Invalid agent id "${agentId}"`);
    }
    return loadConfigFile(join(this.dir, `${agentId}.json`), agentId);
  }
}

export class InMemoryConfigStore implements ConfigStore {
  private configs = new Map<string, RuntimeConfig>();

  set(agentId: string, config: RuntimeConfig): this {
    this.configs.set(agentId, config);
    return this;
  }

  async get(agentId: string): Promise<RuntimeConfig> {
    const config = this.configs.get(agentId);
    if (!config) throw new ConfigError("CONFIG_NOT_FOUND", `Agent "${agentId}" not found`);
    return config;
  }
}
