import type { LogLevel } from "./utils/logger.js";

export type RuntimeSettings = {
  agent: {
    /** Identifier of the RuntimeConfig to serve. Empty means legacy single-role mode. */
    id: string;
    defaultModel: string;
  };
  timeouts: {
    store: number;
    model: number;
    tool: number;
    taskDeadline: number;
  };
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
  limits: {
    maxTurns: number;
    maxTasks: number;
    outputTruncation: number;
  };
  cache: {
    configTtlMs: number;
    maxEntries: number;
  };
  rateLimit: {
    enabled: boolean;
    maxRequestsPerSecond: number;
    queueExcess: boolean;
    maxQueueSize: number;
  };
  registry: {
    url: string;
    apiKey: string;
  };
  model: {
    baseUrl: string;
    apiKey: string;
    maxTokens: number;
  };
  prompts: {
    dir: string;
    /** Base URL of the identifier-keyed prompt store. Empty disables it. */
    managementUrl: string;
    managementApiKey: string;
  };
  secrets: {
    url: string;
    token: string;
  };
  toolServers: {
    /** JSON array of server entries, as found in MCP_SERVERS. */
    json: string;
  };
  server: {
    port: number;
    host: string;
    dbPath: string;
  };
  logLevel: LogLevel;
};

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: RuntimeSettings = {
  agent: {
    id: "",
    defaultModel: "gpt-4o-mini",
  },
  timeouts: {
    store: 10_000,
    model: 120_000,
    tool: 30_000,
    taskDeadline: 300_000,
  },
  retry: {
    maxAttempts: 3,
    baseDelayMs: 500,
    maxDelayMs: 10_000,
  },
  limits: {
    maxTurns: 10,
    maxTasks: 200,
    outputTruncation: 3_000,
  },
  cache: {
    configTtlMs: 10 * 60 * 1000,
    maxEntries: 100,
  },
  rateLimit: {
    enabled: true,
    maxRequestsPerSecond: 10,
    queueExcess: true,
    maxQueueSize: 50,
  },
  registry: {
    url: "http://registry-api:9500",
    apiKey: "",
  },
  model: {
    baseUrl: "http://litellm:4000",
    apiKey: "",
    maxTokens: 4096,
  },
  prompts: {
    dir: "prompts",
    managementUrl: "",
    managementApiKey: "",
  },
  secrets: {
    url: "",
    token: "",
  },
  toolServers: {
    json: "",
  },
  server: {
    port: 9100,
    host: "0.0.0.0",
    dbPath: "",
  },
  logLevel: "info",
};

let current: RuntimeSettings = structuredClone(DEFAULTS);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge<T extends Record<string, unknown>>(base: T, overrides: DeepPartial<T>): T {
  const result = structuredClone(base);
  for (const key of Object.keys(overrides) as (keyof T)[]) {
    const val = overrides[key];
    const existing = result[key];
    if (isPlainObject(val) && isPlainObject(existing)) {
      (result as Record<string, unknown>)[key as string] = deepMerge<Record<string, unknown>>(existing, val);
    } else if (val !== undefined) {
      (result as Record<string, unknown>)[key as string] = val;
    }
  }
  return result;
}

/** Override config values. Merges deeply with defaults. */
export function configure(overrides: DeepPartial<RuntimeSettings>): void {
  current = deepMerge(DEFAULTS, overrides);
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<RuntimeSettings> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<RuntimeSettings> = Object.freeze(structuredClone(DEFAULTS));

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/** Positive integers only; anything else leaves the default in place. */
function positiveIntOf(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  const n = Number(raw.trim());
  return Number.isSafeInteger(n) && n > 0 ? n : undefined;
}

/**
 * Read overrides from environment variables. Unset variables leave the
 * defaults alone. REGISTRY_API_KEY falls back to LITELLM_API_KEY, which is
 * what registry deployments behind the proxy expect.
 */
export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): DeepPartial<RuntimeSettings> {
  const level = env.LOG_LEVEL?.toLowerCase();
  const logLevel = LOG_LEVELS.find((l) => l === level);

  return {
    agent: {
      id: env.AGENT_ID,
      defaultModel: env.DEFAULT_MODEL,
    },
    timeouts: {
      taskDeadline: positiveIntOf(env.TASK_DEADLINE_MS),
    },
    registry: {
      url: env.REGISTRY_URL ?? env.REGISTRY_API_URL,
      apiKey: env.REGISTRY_API_KEY ?? env.LITELLM_API_KEY,
    },
    model: {
      baseUrl: env.LITELLM_URL,
      apiKey: env.LITELLM_API_KEY,
    },
    prompts: {
      dir: env.PROMPTS_DIR,
      managementUrl: env.PROMPT_STORE_URL ?? env.LITELLM_URL,
      managementApiKey: env.PROMPT_STORE_API_KEY ?? env.LITELLM_API_KEY,
    },
    secrets: {
      url: env.SECRET_STORE_URL,
      token: env.SECRET_STORE_TOKEN,
    },
    toolServers: {
      json: env.MCP_SERVERS,
    },
    server: {
      port: positiveIntOf(env.AGENT_PORT),
      host: env.AGENT_HOST,
      dbPath: env.TASK_DB,
    },
    logLevel,
  };
}
