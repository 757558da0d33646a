import { ConfigError, errorMessage } from "../errors.js";
import type { RoleConfig } from "../runtime-config/types.js";
import { log } from "../utils/logger.js";
import type { LocalPromptDirectory } from "./local.js";
import type { PromptStore } from "./store.js";
import { renderTemplate } from "./template.js";

const logger = log.child("prompts");

export type PromptSource = "inline" | "external_id" | "prompt_ref" | "local_file";

export type ResolvedPrompt = {
  text: string;
  source: PromptSource;
  /** Store name or file path the text came from. */
  origin: string;
  /** One note per source that was tried and failed before `source`. */
  degradations: string[];
};

export type PromptStores = {
  /** Looked up by `external_prompt_id`. */
  byId?: PromptStore;
  /** Tried in order for `prompt_ref`. */
  byName: PromptStore[];
  local?: LocalPromptDirectory;
};

type Attempt = { text: string; origin: string } | undefined;

function present(text: string | undefined): string | undefined {
  return text !== undefined && text.trim() !== "" ? text.trim() : undefined;
}

/**
 * Resolve a role's instructions. Sources are tried in rank order: inline
 * text, the identifier store, the logical-name stores, then the local
 * prompt directory. A miss or a failing store falls through with a
 * degradation note; only exhausting every source is an error.
 */
export async function resolvePrompt(
  role: RoleConfig,
  stores: PromptStores,
  signal?: AbortSignal,
): Promise<ResolvedPrompt> {
  const degradations: string[] = [];

  const inline = present(role.promptInline);
  if (inline) {
    return { text: inline, source: "inline", origin: "prompt_inline", degradations };
  }

  const tryStore = async (store: PromptStore, key: string, field: string): Promise<Attempt> => {
    try {
      const text = present(await store.get(key, signal));
      if (text) return { text: renderTemplate(text, role.metadata), origin: store.name };
      degradations.push(`${field} "${key}" not found in ${store.name}`);
    } catch (err) {
      if (signal?.aborted) throw err;
      degradations.push(`${field} "${key}" lookup in ${store.name} failed: ${errorMessage(err)}`);
    }
    return undefined;
  };

  const finish = (attempt: { text: string; origin: string }, source: PromptSource): ResolvedPrompt => {
    for (const note of degradations) {
      logger.warn("Instruction source degraded", { role: role.name, note });
    }
    logger.debug("Instructions resolved", { role: role.name, source, origin: attempt.origin });
    return { text: attempt.text, source, origin: attempt.origin, degradations };
  };

  if (role.externalPromptId) {
    if (stores.byId) {
      const hit = await tryStore(stores.byId, role.externalPromptId, "external_prompt_id");
      if (hit) return finish(hit, "external_id");
    } else {
      degradations.push(`external_prompt_id "${role.externalPromptId}" skipped: no identifier store configured`);
    }
  }

  if (role.promptRef) {
    if (stores.byName.length === 0) {
      degradations.push(`prompt_ref "${role.promptRef}" skipped: no prompt store configured`);
    }
    for (const store of stores.byName) {
      const hit = await tryStore(store, role.promptRef, "prompt_ref");
      if (hit) return finish(hit, "prompt_ref");
    }
  }

  if (stores.local) {
    try {
      const file = await stores.local.read(role.name);
      if (file) {
        return finish({ text: renderTemplate(file.text, role.metadata), origin: file.path }, "local_file");
      }
      degradations.push(`no prompt file for "${role.name}" in ${stores.local.dir}`);
    } catch (err) {
      degradations.push(`prompt file for "${role.name}" unreadable: ${errorMessage(err)}`);
    }
  }

  throw new ConfigError(
    "INSTRUCTION_UNRESOLVED",
    `No instructions for role "${role.name}"${degradations.length > 0 ? ` (${degradations.join("; ")})` : ""}`,
    { role: role.name },
  );
}
