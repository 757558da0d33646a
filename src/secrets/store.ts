import { getConfig } from "../config.js";
import { StoreError } from "../errors.js";
import { SecretValueSchema, parseOrThrow } from "../schemas.js";
import { bearer, fetchJson, joinUrl } from "../utils/http.js";

/**
 * Resolves secret references. Throws StoreError with NOT_FOUND,
 * UNAUTHORIZED or UNREACHABLE; never returns an empty value.
 */
export interface SecretStore {
  readonly name: string;
  get(ref: string, signal?: AbortSignal): Promise<string>;
}

/** `github-token` → `GITHUB_TOKEN`. */
export function envNameFor(ref: string): string {
  return ref.replace(/[^A-Za-z0-9]+/g, "_").toUpperCase();
}

/** Reads a reference as an environment variable, verbatim first, then normalized. */
export class EnvSecretStore implements SecretStore {
  readonly name = "env";

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async get(ref: string): Promise<string> {
    const value = this.env[ref] || this.env[envNameFor(ref)];
    if (!value) {
      throw new StoreError(this.name, "NOT_FOUND", `Secret "${ref}" is not set in the environment`);
    }
    return value;
  }
}

export type HttpSecretStoreOptions = {
  baseUrl: string;
  token?: string;
};

/** `GET /secrets/{ref}` answering `{ value }` or `{ secret }`. */
export class HttpSecretStore implements SecretStore {
  readonly name = "secret-store";
  private readonly baseUrl: string;
  private readonly token: string;

  constructor(opts: HttpSecretStoreOptions) {
    this.baseUrl = opts.baseUrl;
    this.token = opts.token ?? "";
  }

  async get(ref: string, signal?: AbortSignal): Promise<string> {
    const url = joinUrl(this.baseUrl, `secrets/${encodeURIComponent(ref)}`);
    const body = await fetchJson(url, {
      store: this.name,
      headers: bearer(this.token),
      timeoutMs: getConfig().timeouts.store,
      signal,
    });
    const value = parseOrThrow(SecretValueSchema, body, "secret response");
    if (!value) {
      throw new StoreError(this.name, "NOT_FOUND", `Secret "${ref}" is empty`);
    }
    return value;
  }
}

/** Tries each store in order; only NOT_FOUND moves on to the next one. */
export class ChainedSecretStore implements SecretStore {
  readonly name: string;

  constructor(private readonly stores: SecretStore[]) {
    this.name = stores.map((s) => s.name).join("+") || "none";
  }

  async get(ref: string, signal?: AbortSignal): Promise<string> {
    for (const store of this.stores) {
      try {
        return await store.get(ref, signal);
      } catch (err) {
        if (err instanceof StoreError && err.code === "NOT_FOUND") continue;
        throw err;
      }
    }
    throw new StoreError(this.name, "NOT_FOUND", `Secret "${ref}" not found in ${this.name}`);
  }
}
