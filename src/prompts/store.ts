import { getConfig } from "../config.js";
import { StoreError } from "../errors.js";
import { PromptInfoSchema, RegistryPromptSchema, parseOrThrow } from "../schemas.js";
import { bearer, fetchJson, joinUrl } from "../utils/http.js";

/** A source of instruction text keyed by prompt id or logical name. */
export interface PromptStore {
  readonly name: string;
  /** Undefined when the store has no such prompt. Throws when unreachable. */
  get(key: string, signal?: AbortSignal): Promise<string | undefined>;
}

/** Body of a dotprompt document, without its YAML front matter. */
export function stripFrontMatter(content: string): string {
  if (!content.startsWith("---")) return content.trim();
  const lines = content.split("\n");
  const end = lines.findIndex((line, i) => i > 0 && line.trim() === "---");
  if (end === -1) return content.trim();
  return lines.slice(end + 1).join("\n").trim();
}

async function getOrUndefined(url: string, store: string, headers: Record<string, string>, signal?: AbortSignal) {
  try {
    return await fetchJson(url, { store, headers, timeoutMs: getConfig().timeouts.store, signal });
  } catch (err) {
    if (err instanceof StoreError && err.code === "NOT_FOUND") return undefined;
    throw err;
  }
}

export type HttpPromptStoreOptions = {
  baseUrl: string;
  apiKey?: string;
};

/** LiteLLM prompt management: `GET /prompts/{id}/info`, dotprompt content. */
export class PromptManagementStore implements PromptStore {
  readonly name = "prompt-management";
  private readonly baseUrl: string;
  private readonly apiKey: string;

  constructor(opts: HttpPromptStoreOptions) {
    this.baseUrl = opts.baseUrl;
    this.apiKey = opts.apiKey ?? "";
  }

  async get(id: string, signal?: AbortSignal): Promise<string | undefined> {
    const url = joinUrl(this.baseUrl, `prompts/${encodeURIComponent(id)}/info`);
    const body = await getOrUndefined(url, this.name, bearer(this.apiKey), signal);
    if (body === undefined) return undefined;
    const info = parseOrThrow(PromptInfoSchema, body, "prompt info");
    const content = info.prompt_spec?.litellm_params?.dotprompt_content;
    return content ? stripFrontMatter(content) : undefined;
  }
}

/** Registry API: `GET /prompts/{name}` returning a template. */
export class RegistryPromptStore implements PromptStore {
  readonly name = "registry";
  private readonly baseUrl: string;
  private readonly apiKey: string;

  constructor(opts: HttpPromptStoreOptions) {
    this.baseUrl = opts.baseUrl;
    this.apiKey = opts.apiKey ?? "";
  }

  async get(name: string, signal?: AbortSignal): Promise<string | undefined> {
    const url = joinUrl(this.baseUrl, `prompts/${encodeURIComponent(name)}`);
    const body = await getOrUndefined(url, this.name, bearer(this.apiKey), signal);
    if (body === undefined) return undefined;
    const doc = parseOrThrow(RegistryPromptSchema, body, "registry prompt");
    return doc.template || doc.prompt || doc.text || undefined;
  }
}
